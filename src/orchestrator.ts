import type { BrowserSession, LaunchBrowser, ObserverPage } from './browser.js';
import {
  BrowserLaunchError,
  CancelledError,
  MissingCredentialsError,
  classifyFailure,
  errorMessage,
  type FailureReason,
} from './errors.js';
import { log as rootLog, type Logger } from './logger.js';
import type { AccountScrape } from './pipeline.js';
import type { AccountSource } from './sink.js';
import { secondsSince } from './timing.js';
import type { Account } from './types.js';

// ---------------------------------------------------------------------------
// Partitioning
// ---------------------------------------------------------------------------

/**
 * Split `items` into min(groups, items.length) contiguous groups whose sizes
 * differ by at most one; the first (length % groups) groups take the extra item.
 */
export function partitionAccounts<T>(items: readonly T[], groups: number): T[][] {
  const count = Math.min(Math.max(1, Math.floor(groups)), items.length);
  if (count === 0) return [];

  const base = Math.floor(items.length / count);
  const extra = items.length % count;
  const partition: T[][] = [];

  let start = 0;
  for (let group = 0; group < count; group++) {
    const size = base + (group < extra ? 1 : 0);
    partition.push(items.slice(start, start + size));
    start += size;
  }
  return partition;
}

/** One slice of the account list, for runs spread over several processes */
export interface Shard {
  /** 1-based */
  group: number;
  totalGroups: number;
}

export function checkShard(shard: Shard): void {
  if (!Number.isInteger(shard.totalGroups) || shard.totalGroups < 1) {
    throw new RangeError(`Total groups must be a positive integer, got ${shard.totalGroups}`);
  }
  if (!Number.isInteger(shard.group) || shard.group < 1 || shard.group > shard.totalGroups) {
    throw new RangeError(`Group must be between 1 and ${shard.totalGroups}, got ${shard.group}`);
  }
}

/** The accounts of `shard.group` when the list is split into `shard.totalGroups` groups */
export function selectShard<T>(items: readonly T[], shard: Shard): T[] {
  checkShard(shard);
  return partitionAccounts(items, shard.totalGroups)[shard.group - 1] ?? [];
}

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type ScrapeAccount = (page: ObserverPage, account: Account, log: Logger) => Promise<AccountScrape>;

export interface OrchestratorOptions {
  launch: LaunchBrowser;
  scrape: ScrapeAccount;
  /** Upper bound on browsers running at once */
  maxConcurrent: number;
  /** Receives last_scraped_at after each successful account; null skips it */
  accounts?: AccountSource | null;
  /** Checked before each account starts, never mid-account */
  signal?: AbortSignal;
  log?: Logger;
  now?: () => Date;
}

export type AccountOutcome =
  | { account: Account; status: 'success'; result: AccountScrape; durationSeconds: number }
  | { account: Account; status: 'failed'; reason: FailureReason; error: string; durationSeconds: number };

export interface RunSummary {
  attempted: number;
  succeeded: number;
  failed: number;
  /** Percentage, one decimal */
  successRate: number;
  records: number;
  durationSeconds: number;
  failuresByReason: Partial<Record<FailureReason, number>>;
}

export interface OrchestratorRun {
  outcomes: AccountOutcome[];
  summary: RunSummary;
}

export function accountLabel(account: Account): string {
  return account.external_user_id ? `${account.name} (${account.external_user_id})` : account.name;
}

export function summarize(outcomes: readonly AccountOutcome[], durationSeconds: number): RunSummary {
  const failuresByReason: Partial<Record<FailureReason, number>> = {};
  let succeeded = 0;
  let records = 0;

  for (const outcome of outcomes) {
    if (outcome.status === 'success') {
      succeeded++;
      records += outcome.result.records;
    } else {
      failuresByReason[outcome.reason] = (failuresByReason[outcome.reason] ?? 0) + 1;
    }
  }

  const attempted = outcomes.length;
  return {
    attempted,
    succeeded,
    failed: attempted - succeeded,
    successRate: attempted === 0 ? 0 : Math.round((succeeded / attempted) * 1000) / 10,
    records,
    durationSeconds,
    failuresByReason,
  };
}

// ---------------------------------------------------------------------------
// Orchestrator
// ---------------------------------------------------------------------------

export class Orchestrator {
  private readonly log: Logger;
  private readonly now: () => Date;

  constructor(private readonly options: OrchestratorOptions) {
    this.log = options.log ?? rootLog;
    this.now = options.now ?? (() => new Date());
  }

  /** Scrape every account; outcomes come back in input order */
  async run(accounts: readonly Account[]): Promise<OrchestratorRun> {
    const startedAt = Date.now();
    const groups = partitionAccounts(accounts, this.options.maxConcurrent);
    const outcomes: AccountOutcome[] = [];

    this.log.info(
      `Scraping ${accounts.length} account(s) with ${groups.length} browser(s) ` +
        `(group sizes: ${groups.map(group => group.length).join(', ') || 'none'})`
    );

    let offset = 0;
    const running = groups.map((group, index) => {
      const groupOffset = offset;
      offset += group.length;
      return this.runGroup(group, index + 1, (position, outcome) => {
        outcomes[groupOffset + position] = outcome;
      });
    });
    await Promise.all(running);

    return { outcomes, summary: summarize(outcomes, secondsSince(startedAt)) };
  }

  private async runGroup(
    group: readonly Account[],
    groupNumber: number,
    record: (position: number, outcome: AccountOutcome) => void
  ): Promise<void> {
    const log = this.log.scope(`browser ${groupNumber}`);
    let session: BrowserSession | null = null;
    let launchFailure: BrowserLaunchError | null = null;

    try {
      for (const [position, account] of group.entries()) {
        const accountLog = log.scope(accountLabel(account));
        const startedAt = Date.now();

        try {
          if (this.options.signal?.aborted) throw new CancelledError();
          if (!account.access_key || !account.external_user_id) {
            throw new MissingCredentialsError(account.name);
          }
          if (launchFailure) throw launchFailure;

          if (!session) {
            try {
              session = await this.options.launch(log);
            } catch (error) {
              launchFailure = new BrowserLaunchError(error);
              throw launchFailure;
            }
          }

          accountLog.info('Starting account');
          const result = await this.scrapeOnNewPage(session, account, accountLog);
          record(position, { account, status: 'success', result, durationSeconds: secondsSince(startedAt) });
          accountLog.success(`Account done: ${result.records} record(s)`);

          await this.markScraped(account, accountLog);
        } catch (error) {
          const reason = classifyFailure(error);
          const message = errorMessage(error);
          accountLog.error(`Account failed (${reason}): ${message}`);
          record(position, {
            account,
            status: 'failed',
            reason,
            error: message,
            durationSeconds: secondsSince(startedAt),
          });
        }
      }
    } finally {
      if (session) await session.close();
    }
  }

  /** One page per account, always closed before the next account starts */
  private async scrapeOnNewPage(session: BrowserSession, account: Account, log: Logger): Promise<AccountScrape> {
    const page = await session.newPage(log);
    try {
      return await this.options.scrape(page, account, log);
    } finally {
      try {
        await page.close();
      } catch (error) {
        log.warn(`Page did not close cleanly: ${errorMessage(error)}`);
      }
    }
  }

  private async markScraped(account: Account, log: Logger): Promise<void> {
    if (!this.options.accounts) return;
    try {
      await this.options.accounts.markScraped(account, this.now().toISOString());
    } catch (error) {
      log.warn(`Could not update last_scraped_at: ${errorMessage(error)}`);
    }
  }
}
