import { EmptyTableError, errorMessage } from './errors.js';
import { log as rootLog, type Logger } from './logger.js';
import { delay } from './timing.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** A live, paginated table: the current page's cell texts plus a pager */
export interface TableView {
  /** Trimmed cell texts of every body row on the current page */
  readRows(): Promise<string[][]>;
  /** Pagination summary such as "Total 165 items", if the table shows one */
  readSummary(): Promise<string | null>;
  /** False when the "next" control is disabled or absent */
  hasNextPage(): Promise<boolean>;
  goToNextPage(): Promise<void>;
}

export interface PaginateOptions {
  /** Name of the table, for logs and errors */
  view: string;
  pageSize: number;
  /** Safety cap: pages visited never exceed this, whatever "next" reports */
  maxPages: number;
  /** Upper bound on the wait for a refreshed, stable row set */
  settleTimeoutMs: number;
  settlePollMs?: number;
  /** Stop after this many table rows (rejected ones included); the newest come first */
  rowLimit?: number;
  /** Runs before every page read (overlay dismissal) */
  beforeRead?: () => Promise<void>;
  log?: Logger;
}

export interface PageResult<T> {
  page: number;
  /** Known page count, or null when the table shows no item total */
  totalPages: number | null;
  records: T[];
  rejected: number;
}

export interface CollectedPages<T> {
  records: T[];
  rejected: number;
  pagesVisited: number;
  totalPages: number | null;
}

// ---------------------------------------------------------------------------
// Page arithmetic
// ---------------------------------------------------------------------------

export function totalItemsFrom(summary: string | null): number | null {
  const match = summary?.match(/Total\s+([\d,]+)\s+items?/i);
  return match ? Number(match[1].replace(/,/g, '')) : null;
}

export function computeTotalPages(totalItems: number, pageSize: number): number {
  if (pageSize <= 0) throw new RangeError(`Page size must be positive, got ${pageSize}`);
  return Math.ceil(totalItems / pageSize);
}

// ---------------------------------------------------------------------------
// Settle wait
// ---------------------------------------------------------------------------

function signature(rows: string[][]): string {
  return JSON.stringify(rows);
}

/**
 * Wait until the row set is non-empty, identical across two consecutive reads
 * and different from `previous` (the last page's signature), up to
 * `timeoutMs`. On timeout, proceed with whatever was read last.
 */
export async function waitForStableRows(
  view: TableView,
  previous: string | null,
  timeoutMs: number,
  pollMs: number = 250
): Promise<string[][]> {
  const deadline = Date.now() + timeoutMs;
  let lastSignature: string | null = null;

  for (;;) {
    const rows = await view.readRows();
    const current = signature(rows);
    const settled = rows.length > 0 && current === lastSignature && current !== previous;

    if (settled || Date.now() >= deadline) return rows;

    lastSignature = current;
    await delay(pollMs);
  }
}

// ---------------------------------------------------------------------------
// Pagination
// ---------------------------------------------------------------------------

/**
 * Walk every page of `view`, running `extract` on each row. Finite and not
 * restartable: call again to re-read the table.
 *
 * An empty first page throws EmptyTableError. An empty later page ends the
 * walk, and so does a page identical to the one before it (the click did not
 * advance the table). The known page count, a disabled "next" control, the
 * row limit and the cap end it too.
 */
export async function* paginate<T>(
  view: TableView,
  extract: (cells: string[]) => T | null,
  options: PaginateOptions
): AsyncGenerator<PageResult<T>> {
  const log = options.log ?? rootLog;
  const maxPages = Math.max(1, options.maxPages);

  let summary: string | null = null;
  try {
    summary = await view.readSummary();
  } catch (error) {
    log.debug(`Could not read ${options.view} pagination summary: ${errorMessage(error)}`);
  }

  const totalItems = totalItemsFrom(summary);
  const totalPages = totalItems === null ? null : computeTotalPages(totalItems, options.pageSize);
  log.info(
    totalPages === null
      ? `${options.view}: item total unknown, following "next" (cap ${maxPages})`
      : `${options.view}: ${totalItems} item(s), ${totalPages} page(s) at ${options.pageSize}/page`
  );

  const rowLimit = options.rowLimit === undefined ? null : Math.max(1, options.rowLimit);
  let previous: string | null = null;
  let rowsRead = 0;

  for (let page = 1; page <= maxPages; page++) {
    if (options.beforeRead) await options.beforeRead();

    const rows = await waitForStableRows(view, previous, options.settleTimeoutMs, options.settlePollMs);
    if (rows.length === 0) {
      if (page === 1) throw new EmptyTableError(options.view);
      log.info(`${options.view}: page ${page} is empty, stopping`);
      return;
    }
    const current = signature(rows);
    if (current === previous) {
      log.warn(`${options.view}: page ${page} did not change after "next", stopping`);
      return;
    }
    previous = current;

    const pageRows = rowLimit === null ? rows : rows.slice(0, rowLimit - rowsRead);
    rowsRead += pageRows.length;

    const records: T[] = [];
    let rejected = 0;
    for (const cells of pageRows) {
      const record = extract(cells);
      if (record === null) rejected++;
      else records.push(record);
    }

    log.debug(`${options.view}: page ${page} → ${records.length} record(s), ${rejected} rejected`);
    yield { page, totalPages, records, rejected };

    if (totalPages !== null && page >= totalPages) return;
    if (rowLimit !== null && rowsRead >= rowLimit) {
      log.info(`${options.view}: row limit (${rowLimit}) reached, stopping`);
      return;
    }
    if (page === maxPages) {
      log.warn(`${options.view}: page cap (${maxPages}) reached, stopping`);
      return;
    }

    try {
      if (!(await view.hasNextPage())) return;
      await view.goToNextPage();
    } catch (error) {
      log.warn(`${options.view}: could not move past page ${page}: ${errorMessage(error)}`);
      return;
    }
  }
}

export async function collectPages<T>(pages: AsyncIterable<PageResult<T>>): Promise<CollectedPages<T>> {
  const collected: CollectedPages<T> = { records: [], rejected: 0, pagesVisited: 0, totalPages: null };
  for await (const page of pages) {
    collected.records.push(...page.records);
    collected.rejected += page.rejected;
    collected.pagesVisited = page.page;
    collected.totalPages = page.totalPages;
  }
  return collected;
}
