import path from 'path';
import type { ObserverPage } from './browser.js';
import { DASHBOARD_LOCATORS, parseDashboard, textLines } from './dashboard.js';
import { EmptyTableError, errorMessage } from './errors.js';
import type {
  DashboardKindConfig,
  KindConfig,
  ScrapeKind,
  ScrapedRecord,
  TableKind,
  TableKindConfig,
} from './kinds.js';
import type { Logger } from './logger.js';
import { fileStamp, outputBaseName, writeJson } from './output.js';
import { collectPages, paginate } from './paginator.js';
import { loadWithRetry } from './retry.js';
import { uploadRecords, type RecordStore } from './sink.js';
import type { Account, RecordContext, SinkRow, UploadResult } from './types.js';

// ---------------------------------------------------------------------------
// One account, one page: every requested kind in order
// ---------------------------------------------------------------------------

export interface PipelineOptions {
  kinds: readonly ScrapeKind[];
  configs: Record<ScrapeKind, KindConfig>;
  maxPages: number;
  /** Newest rows to read per table kind; kinds left out read the whole table */
  rowLimits?: Partial<Record<TableKind, number>>;
  settleTimeoutMs: number;
  settlePollMs?: number;
  viewLoadAttempts: number;
  retryBackoffMs: number;
  /** Directory for JSON and screenshots; null writes nothing */
  outputDir: string | null;
  /** Null skips the upload */
  store: RecordStore | null;
  batchSize: number;
  now?: () => Date;
}

export interface KindResult {
  kind: ScrapeKind;
  records: number;
  rejected: number;
  pages: number;
  /** Null when no sink was configured */
  upload: UploadResult | null;
  file: string | null;
}

export interface AccountScrape {
  observedAt: string;
  kinds: KindResult[];
  records: number;
}

interface Extraction {
  records: ScrapedRecord[];
  rows: SinkRow[];
  rejected: number;
  pages: number;
}

async function extractTable(
  page: ObserverPage,
  config: TableKindConfig,
  context: RecordContext,
  options: PipelineOptions,
  log: Logger
): Promise<Extraction> {
  const collected = await collectPages(
    paginate(page.table(), cells => config.extract(cells, context), {
      view: config.kind,
      pageSize: config.pageSize,
      maxPages: options.maxPages,
      rowLimit: options.rowLimits?.[config.kind],
      settleTimeoutMs: options.settleTimeoutMs,
      settlePollMs: options.settlePollMs,
      beforeRead: () => page.dismissOverlays(),
      log,
    })
  );

  return {
    records: collected.records.map(extracted => extracted.record),
    rows: collected.records.map(extracted => extracted.row),
    rejected: collected.rejected,
    pages: collected.pagesVisited,
  };
}

async function extractDashboard(
  page: ObserverPage,
  config: DashboardKindConfig,
  context: RecordContext,
  log: Logger
): Promise<Extraction> {
  const { snapshot, missing } = parseDashboard(textLines(await page.dashboardText()), context);

  if (missing.length === Object.keys(DASHBOARD_LOCATORS).length) {
    throw new EmptyTableError('dashboard', 'No dashboard field could be located');
  }
  if (missing.length > 0) {
    log.warn(`Dashboard field(s) not found, stored as 0: ${missing.join(', ')}`);
  }

  return { records: [snapshot], rows: [config.toRow(snapshot)], rejected: 0, pages: 1 };
}

/**
 * Scrape every requested kind for one account on an already open page.
 * The first kind that fails fails the account; kinds completed before it keep
 * their files and uploads.
 */
export async function scrapeAccount(
  page: ObserverPage,
  account: Account,
  options: PipelineOptions,
  log: Logger
): Promise<AccountScrape> {
  const now = (options.now ?? (() => new Date()))();
  const observedAt = now.toISOString();
  const stamp = fileStamp(now);
  const context: RecordContext = {
    account_ref: account.external_user_id,
    coin_type: account.coin_type,
    observed_at: observedAt,
  };

  const results: KindResult[] = [];

  for (const kind of options.kinds) {
    const config = options.configs[kind];
    const kindLog = log.scope(kind);

    await loadWithRetry(() => page.open(config, account), {
      attempts: options.viewLoadAttempts,
      backoffMs: options.retryBackoffMs,
      log: kindLog,
    });

    const extraction =
      config.type === 'table'
        ? await extractTable(page, config, context, options, kindLog)
        : await extractDashboard(page, config, context, kindLog);

    kindLog.success(
      `Extracted ${extraction.records.length} record(s) from ${extraction.pages} page(s)` +
        (extraction.rejected > 0 ? `, ${extraction.rejected} row(s) rejected` : '')
    );

    let file: string | null = null;
    if (options.outputDir !== null) {
      const baseName = outputBaseName({
        stamp,
        coinType: account.coin_type,
        kind,
        userId: account.external_user_id,
      });
      file = writeJson(options.outputDir, baseName, extraction.records, kindLog);

      try {
        await page.screenshot(path.join(options.outputDir, `${baseName}.png`));
      } catch (error) {
        kindLog.warn(`Screenshot failed: ${errorMessage(error)}`);
      }
    }

    let upload: UploadResult | null = null;
    if (options.store) {
      upload = await uploadRecords(options.store, config.table, extraction.rows, options.batchSize, kindLog);
    } else {
      kindLog.debug('No data sink configured, upload skipped');
    }

    results.push({
      kind,
      records: extraction.records.length,
      rejected: extraction.rejected,
      pages: extraction.pages,
      upload,
      file,
    });
  }

  return {
    observedAt,
    kinds: results,
    records: results.reduce((sum, result) => sum + result.records, 0),
  };
}
