#!/usr/bin/env node
/**
 * POOL OBSERVER SCRAPER
 *
 * Core run function: one orchestrated scrape of every account:
 * 1. Resolves the accounts (explicit credentials, or the sink's active list)
 * 2. Fans them out over a bounded number of browsers
 * 3. Per account: opens the observer, pages through each requested view,
 *    writes JSON + screenshot, uploads records in batches
 * 4. Records the run in the sink's run log and prints a summary
 *
 * Used by:
 *   - scheduler.ts (cron jobs)
 *   - Can also be run directly: npm start -- workers --use-sink
 */

import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { parseArgs } from 'util';
import { launchObserverBrowser, type LaunchBrowser } from './browser.js';
import {
  credentials as envCredentials,
  paths,
  scraper as scraperConfig,
  sink as sinkConfig,
  type SinkMode,
} from './config.js';
import { createConvexClient, createConvexSink } from './convexSink.js';
import { createSqliteSink, openDatabase, upsertAccount } from './database.js';
import { errorMessage } from './errors.js';
import { coarseUnitRule, type StalenessRule } from './extractor.js';
import { buildKinds, resolveKinds, SCRAPE_KINDS, KIND_ALIASES, type ScrapeKind, type TableKind } from './kinds.js';
import { log as rootLog, type Logger } from './logger.js';
import {
  checkShard,
  Orchestrator,
  selectShard,
  type AccountOutcome,
  type RunSummary,
  type Shard,
} from './orchestrator.js';
import { scrapeAccount } from './pipeline.js';
import type { DataSink, RunStatus } from './sink.js';
import type { Account } from './types.js';

// ---------------------------------------------------------------------------
// Sink + accounts
// ---------------------------------------------------------------------------

export function openConfiguredSink(mode: SinkMode = sinkConfig.mode): DataSink | null {
  switch (mode) {
    case 'convex':
      return createConvexSink(createConvexClient(sinkConfig.convexUrl, sinkConfig.convexAuthToken));
    case 'sqlite':
      return createSqliteSink(openDatabase(paths.database));
    case 'none':
      return null;
  }
}

export interface AccountCredentials {
  accessKey: string;
  userId: string;
  coinType: string;
  name?: string;
}

/** An ad-hoc account that exists only for this run (never marked as scraped) */
export function accountFromCredentials(creds: AccountCredentials): Account {
  return {
    id: null,
    name: creds.name || creds.userId,
    access_key: creds.accessKey,
    external_user_id: creds.userId,
    coin_type: creds.coinType || 'BTC',
    is_active: true,
    priority: 0,
    last_scraped_at: null,
  };
}

// ---------------------------------------------------------------------------
// Result type
// ---------------------------------------------------------------------------

export interface ScraperRunOptions {
  kinds: readonly ScrapeKind[];
  /** Accounts to scrape; when omitted, the sink's active accounts */
  accounts?: readonly Account[];
  sink: DataSink | null;
  /** Keep the sink for accounts and the run log, but upload no records */
  skipUpload?: boolean;
  outputDir: string | null;
  maxConcurrent?: number;
  batchSize?: number;
  maxPages?: number;
  /** Newest rows to read per table kind */
  rowLimits?: Partial<Record<TableKind, number>>;
  /** Scrape only this slice of the accounts */
  shard?: Shard;
  staleness?: StalenessRule;
  launch?: LaunchBrowser;
  signal?: AbortSignal;
  log?: Logger;
}

export interface ScraperRunResult {
  status: RunStatus | 'no_accounts';
  kinds: ScrapeKind[];
  outcomes: AccountOutcome[];
  summary: RunSummary | null;
  consecutiveFailures: number;
}

export function runStatus(summary: RunSummary): RunStatus {
  if (summary.failed === 0) return 'success';
  if (summary.succeeded === 0) return 'failed';
  return 'partial';
}

function failureText(summary: RunSummary): string | undefined {
  const reasons = Object.entries(summary.failuresByReason).map(([reason, count]) => `${reason}: ${count}`);
  return reasons.length > 0 ? `${summary.failed} account(s) failed (${reasons.join(', ')})` : undefined;
}

// ---------------------------------------------------------------------------
// Main run function, exported for the scheduler
// ---------------------------------------------------------------------------

export async function runScraper(options: ScraperRunOptions): Promise<ScraperRunResult> {
  const log = options.log ?? rootLog;
  const kinds = [...options.kinds];
  const sink = options.sink;

  log.info('='.repeat(60));
  log.info(`POOL OBSERVER SCRAPER: starting run (${kinds.join(', ')})`);
  log.info('='.repeat(60));

  // -------------------------------------------------------------------
  // PHASE 1: Accounts
  // -------------------------------------------------------------------
  let accounts: readonly Account[] = options.accounts ?? [];
  if (!options.accounts && sink) {
    try {
      accounts = await sink.accounts.listActiveAccounts();
    } catch (error) {
      log.error(`Could not load accounts from the data sink: ${errorMessage(error)}`);
    }
  }

  if (options.shard) {
    const total = accounts.length;
    accounts = selectShard(accounts, options.shard);
    log.info(`Group ${options.shard.group}/${options.shard.totalGroups}: ${accounts.length} of ${total} account(s)`);
  }

  if (accounts.length === 0) {
    log.error('No accounts to process. Pass --access-key and --user-id, or --use-sink with accounts stored.');
    return { status: 'no_accounts', kinds, outcomes: [], summary: null, consecutiveFailures: 0 };
  }

  let runId: string | null = null;
  if (sink) {
    try {
      runId = await sink.runs.startRun(kinds);
    } catch (error) {
      log.warn(`Could not start run log entry: ${errorMessage(error)}`);
    }
  }

  // -------------------------------------------------------------------
  // PHASE 2: Scrape
  // -------------------------------------------------------------------
  const configs = buildKinds({
    staleness: options.staleness ?? coarseUnitRule(scraperConfig.staleTokens),
  });
  const store = sink && !options.skipUpload ? sink.records : null;
  const launch: LaunchBrowser =
    options.launch ??
    (browserLog =>
      launchObserverBrowser(
        {
          headless: scraperConfig.headless,
          pageTimeout: scraperConfig.pageTimeout,
          observerBaseUrl: scraperConfig.observerBaseUrl,
        },
        browserLog
      ));

  const orchestrator = new Orchestrator({
    launch,
    maxConcurrent: options.maxConcurrent ?? scraperConfig.maxConcurrent,
    accounts: sink?.accounts ?? null,
    signal: options.signal,
    log,
    scrape: (page, account, accountLog) =>
      scrapeAccount(
        page,
        account,
        {
          kinds,
          configs,
          maxPages: options.maxPages ?? scraperConfig.maxPages,
          rowLimits: options.rowLimits,
          settleTimeoutMs: scraperConfig.settleTimeout,
          viewLoadAttempts: scraperConfig.viewLoadAttempts,
          retryBackoffMs: scraperConfig.retryBackoff,
          outputDir: options.outputDir,
          store,
          batchSize: options.batchSize ?? sinkConfig.batchSize,
        },
        accountLog
      ),
  });

  const { outcomes, summary } = await orchestrator.run(accounts);
  const status = runStatus(summary);

  // -------------------------------------------------------------------
  // PHASE 3: Run log + summary
  // -------------------------------------------------------------------
  let consecutiveFailures = 0;
  if (sink && runId !== null) {
    try {
      await sink.runs.completeRun(runId, {
        status,
        attempted: summary.attempted,
        succeeded: summary.succeeded,
        failed: summary.failed,
        records: summary.records,
        durationSeconds: summary.durationSeconds,
        error: failureText(summary),
      });
      consecutiveFailures = await sink.runs.getConsecutiveFailures();
    } catch (error) {
      log.warn(`Could not complete run log entry: ${errorMessage(error)}`);
    }
  }

  log.info('='.repeat(60));
  if (status === 'failed') log.error('RUN FAILED');
  else log.success(status === 'success' ? 'RUN COMPLETE' : 'RUN COMPLETE (partial)');
  log.info(`  Kinds:              ${kinds.join(', ')}`);
  log.info(`  Accounts attempted: ${summary.attempted}`);
  log.info(`  Succeeded:          ${summary.succeeded}`);
  log.info(`  Failed:             ${summary.failed}`);
  log.info(`  Success rate:       ${summary.successRate.toFixed(1)}%`);
  log.info(`  Records:            ${summary.records}`);
  log.info(`  Duration:           ${summary.durationSeconds.toFixed(1)} seconds`);
  for (const outcome of outcomes) {
    if (outcome.status === 'failed') {
      log.info(`  ✗ ${outcome.account.name}: [${outcome.reason}] ${outcome.error}`);
    }
  }
  log.info('='.repeat(60));

  if (consecutiveFailures > 0) {
    log.warn(`${consecutiveFailures} consecutive failed run(s) in the run log`);
  }

  return { status, kinds, outcomes, summary, consecutiveFailures };
}

// ---------------------------------------------------------------------------
// CLI
// ---------------------------------------------------------------------------

export const USAGE = `Usage:
  scrape <kind...> [options]
  scrape add-account --name <name> --access-key <key> --user-id <id> [--coin-type BTC]

Kinds: ${[...SCRAPE_KINDS, ...Object.keys(KIND_ALIASES)].join(', ')}

Options:
  --access-key <key>     Observer access key (default: ACCESS_KEY)
  --user-id <id>         Observer user id (default: USER_ID)
  --coin-type <coin>     Coin type (default: COIN_TYPE or BTC)
  --name <name>          Display name for the account
  --use-sink             Scrape every active account stored in the data sink
  --skip-sink            Do not upload records (accounts and run log still use the sink)
  --output-dir <dir>     Where JSON files and screenshots go
  --max-concurrent <n>   Browsers running side by side
  --batch-size <n>       Records per sink insert
  --max-pages <n>        Page cap per table
  --earnings-days <n>    Read only the newest <n> earnings rows
  --group <n>            Scrape only group <n> of --total-groups (1-based)
  --total-groups <n>     Number of groups the accounts are split into
  --help                 Show this message`;

export interface CliOptions {
  command: 'scrape' | 'add-account' | 'help';
  kinds: ScrapeKind[];
  credentials: AccountCredentials;
  useSink: boolean;
  skipSink: boolean;
  outputDir: string;
  maxConcurrent?: number;
  batchSize?: number;
  maxPages?: number;
  earningsDays?: number;
  shard?: Shard;
}

function positiveInt(flag: string, raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`--${flag} must be a positive integer, got "${raw}"`);
  }
  return value;
}

export function parseCli(argv: readonly string[]): CliOptions {
  const { values, positionals } = parseArgs({
    args: [...argv],
    allowPositionals: true,
    options: {
      'access-key': { type: 'string' },
      'user-id': { type: 'string' },
      'coin-type': { type: 'string' },
      name: { type: 'string' },
      'use-sink': { type: 'boolean', default: false },
      'skip-sink': { type: 'boolean', default: false },
      'output-dir': { type: 'string' },
      'max-concurrent': { type: 'string' },
      'batch-size': { type: 'string' },
      'max-pages': { type: 'string' },
      'earnings-days': { type: 'string' },
      group: { type: 'string' },
      'total-groups': { type: 'string' },
      help: { type: 'boolean', default: false },
    },
  });

  const group = positiveInt('group', values.group);
  const totalGroups = positiveInt('total-groups', values['total-groups']);
  let shard: Shard | undefined;
  if (group !== undefined || totalGroups !== undefined) {
    if (group === undefined || totalGroups === undefined) {
      throw new Error('--group and --total-groups must be given together');
    }
    shard = { group, totalGroups };
    checkShard(shard);
  }

  const isAddAccount = positionals[0] === 'add-account';
  const command = values.help || positionals.length === 0 ? 'help' : isAddAccount ? 'add-account' : 'scrape';

  return {
    command,
    kinds: command === 'scrape' ? resolveKinds(positionals) : [],
    credentials: {
      accessKey: values['access-key'] ?? envCredentials.accessKey,
      userId: values['user-id'] ?? envCredentials.userId,
      coinType: values['coin-type'] ?? envCredentials.coinType,
      name: values.name,
    },
    useSink: values['use-sink'] ?? false,
    skipSink: values['skip-sink'] ?? false,
    outputDir: path.resolve(values['output-dir'] ?? paths.output),
    maxConcurrent: positiveInt('max-concurrent', values['max-concurrent']),
    batchSize: positiveInt('batch-size', values['batch-size']),
    maxPages: positiveInt('max-pages', values['max-pages']),
    earningsDays: positiveInt('earnings-days', values['earnings-days']),
    shard,
  };
}

/** Accounts named on the command line or in the environment; none when --use-sink */
export function cliAccounts(cli: CliOptions): Account[] | undefined {
  if (cli.useSink) return undefined;
  const { accessKey, userId } = cli.credentials;
  if (!accessKey && !userId) return [];
  return [accountFromCredentials(cli.credentials)];
}

function addAccount(cli: CliOptions): number {
  const { accessKey, userId, coinType, name } = cli.credentials;
  if (!userId || !accessKey) {
    rootLog.error('add-account needs --user-id and --access-key');
    return 1;
  }
  if (sinkConfig.mode !== 'sqlite') {
    rootLog.error('add-account writes to the local database; set SINK=sqlite');
    return 1;
  }
  const db = openDatabase(paths.database);
  try {
    upsertAccount(db, { name: name || userId, access_key: accessKey, external_user_id: userId, coin_type: coinType });
    rootLog.success(`Stored account ${name || userId} (${userId})`);
    return 0;
  } finally {
    db.close();
  }
}

/** Seams for running the CLI without real browsers or the configured sink */
export interface MainDependencies {
  openSink?: () => DataSink | null;
  launch?: LaunchBrowser;
}

/**
 * Exit status 1 only when there was no account to process. Failed accounts
 * are reported in the summary and the run log.
 */
export async function main(argv: readonly string[], deps: MainDependencies = {}): Promise<number> {
  const cli = parseCli(argv);

  if (cli.command === 'help') {
    console.log(USAGE);
    return 0;
  }
  if (cli.command === 'add-account') return addAccount(cli);

  const sink = (deps.openSink ?? openConfiguredSink)();
  if (cli.useSink && !sink) {
    rootLog.error('--use-sink needs a data sink: set CONVEX_URL, or SINK=sqlite');
    return 1;
  }

  const controller = new AbortController();
  const onInterrupt = () => {
    rootLog.warn('Interrupted: finishing the accounts in progress, skipping the rest');
    controller.abort();
  };
  process.once('SIGINT', onInterrupt);

  try {
    const result = await runScraper({
      kinds: cli.kinds,
      accounts: cliAccounts(cli),
      sink,
      skipUpload: cli.skipSink,
      outputDir: cli.outputDir,
      maxConcurrent: cli.maxConcurrent,
      batchSize: cli.batchSize,
      maxPages: cli.maxPages,
      rowLimits: cli.earningsDays === undefined ? undefined : { earnings: cli.earningsDays },
      shard: cli.shard,
      launch: deps.launch,
      signal: controller.signal,
    });
    return result.status === 'no_accounts' ? 1 : 0;
  } finally {
    process.off('SIGINT', onInterrupt);
    if (sink) await sink.close();
  }
}

// ---------------------------------------------------------------------------
// CLI entry point: npm start -- <kind...>
// ---------------------------------------------------------------------------
/** True when the module at `moduleUrl` is the script node was started with */
export function isDirectRun(moduleUrl: string): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return fs.realpathSync(entry) === fileURLToPath(moduleUrl);
  } catch {
    return false;
  }
}

if (isDirectRun(import.meta.url)) {
  main(process.argv.slice(2)).then(
    code => process.exit(code),
    error => {
      rootLog.error(errorMessage(error));
      process.exit(1);
    }
  );
}
