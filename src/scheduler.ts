/**
 * SCHEDULER
 *
 * Runs scrape jobs in process on cron schedules.
 *
 * Usage: npm run schedule
 *
 * Jobs (override the expressions in .env):
 *   workers   → WORKERS_CRON   (default every 3 hours)
 *   daily     → DAILY_CRON     (default 01:00, dashboard + the newest
 *                                 DAILY_EARNINGS_DAYS earnings rows)
 *   inactive  → INACTIVE_CRON  (default every 30 minutes)
 *
 * A job that is still running when its next tick arrives skips that tick.
 */

import cron from 'node-cron';
import { credentials, paths, schedule as scheduleConfig } from './config.js';
import { errorMessage } from './errors.js';
import { resolveKinds, type ScrapeKind, type TableKind } from './kinds.js';
import { accountFromCredentials, isDirectRun, openConfiguredSink, runScraper } from './index.js';
import { log } from './logger.js';

export interface ScheduledJob {
  name: string;
  cron: string;
  kinds: ScrapeKind[];
  rowLimits?: Partial<Record<TableKind, number>>;
}

export function buildJobs(config: typeof scheduleConfig = scheduleConfig): ScheduledJob[] {
  return [
    { name: 'workers', cron: config.workers, kinds: resolveKinds(['workers']) },
    {
      name: 'daily',
      cron: config.daily,
      kinds: resolveKinds(['daily']),
      rowLimits: { earnings: config.dailyEarningsDays },
    },
    { name: 'inactive', cron: config.inactive, kinds: resolveKinds(['inactive']) },
  ];
}

const running = new Set<string>();

/**
 * Run `task` unless a run of the same job is still in progress.
 * Resolves false when the tick was skipped. Errors are logged, never thrown,
 * so the scheduler keeps running.
 */
export async function runExclusive(name: string, task: () => Promise<void>): Promise<boolean> {
  if (running.has(name)) {
    log.warn(`Job "${name}" is still running, skipping this tick`);
    return false;
  }

  running.add(name);
  try {
    await task();
    log.success(`Scheduled job "${name}" finished`);
  } catch (error) {
    log.error(`Scheduled job "${name}" failed: ${errorMessage(error)}`);
  } finally {
    running.delete(name);
  }
  return true;
}

async function runJob(job: ScheduledJob): Promise<void> {
  log.info(`Scheduler triggered, starting "${job.name}" (${job.kinds.join(', ')})`);

  const sink = openConfiguredSink();
  // Without a sink, fall back to the single account from the environment
  const accounts =
    sink || (!credentials.accessKey && !credentials.userId)
      ? undefined
      : [accountFromCredentials(credentials)];

  try {
    await runScraper({ kinds: job.kinds, rowLimits: job.rowLimits, accounts, sink, outputDir: paths.output });
  } finally {
    if (sink) await sink.close();
  }
}

function startScheduler(): void {
  const jobs = buildJobs();

  log.info('='.repeat(60));
  log.info('POOL OBSERVER SCRAPER: scheduler starting');
  log.info(`Timezone: ${scheduleConfig.timezone}`);
  log.info('Jobs:');
  for (const job of jobs) {
    log.info(`  ${job.name.padEnd(9)} ${job.cron}`);
  }
  log.info('='.repeat(60));

  for (const job of jobs) {
    if (!cron.validate(job.cron)) {
      throw new Error(`Invalid cron expression for job "${job.name}": ${job.cron}`);
    }
    cron.schedule(job.cron, () => runExclusive(job.name, () => runJob(job)), {
      timezone: scheduleConfig.timezone,
    });
  }

  log.info('Scheduler is running. Press Ctrl+C to stop.');
  log.info('To run a job immediately: npm start -- <kind> --use-sink');
}

if (isDirectRun(import.meta.url)) {
  startScheduler();
}
