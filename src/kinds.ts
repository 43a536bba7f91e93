import {
  coarseUnitRule,
  earningsRowSpec,
  extractRow,
  inactiveRowSpec,
  workerRowSpec,
  DEFAULT_STALE_TOKENS,
  type RowSpec,
  type StalenessRule,
} from './extractor.js';
import type {
  DashboardSnapshot,
  EarningsEntry,
  InactiveWorkerRecord,
  RecordContext,
  SinkRow,
  SinkTable,
  WorkerRecord,
} from './types.js';

// ---------------------------------------------------------------------------
// Scrape kinds
// ---------------------------------------------------------------------------
// One pipeline, four configurations. Table kinds bundle the tab to open, the
// page size to select, the row spec (minimum columns + field mapping + status
// rule) and the conversion to the sink's row shape.
// ---------------------------------------------------------------------------

export type TableKind = 'workers' | 'inactive' | 'earnings';
export type ScrapeKind = TableKind | 'dashboard';

export const SCRAPE_KINDS: readonly ScrapeKind[] = ['dashboard', 'workers', 'inactive', 'earnings'];

/** Named bundles accepted wherever kinds are listed */
export const KIND_ALIASES: Record<string, readonly ScrapeKind[]> = {
  daily: ['dashboard', 'earnings'],
  all: SCRAPE_KINDS,
};

export type ScrapedRecord = WorkerRecord | InactiveWorkerRecord | EarningsEntry | DashboardSnapshot;

export interface ExtractedRow {
  record: ScrapedRecord;
  row: SinkRow;
}

export interface TableKindConfig {
  type: 'table';
  kind: TableKind;
  /** Tab label that leads to the table */
  tab: string;
  pageSize: number;
  minColumns: number;
  table: SinkTable;
  extract(cells: readonly string[], context: RecordContext): ExtractedRow | null;
}

export interface DashboardKindConfig {
  type: 'dashboard';
  kind: 'dashboard';
  table: SinkTable;
  toRow(snapshot: DashboardSnapshot): SinkRow;
}

export type KindConfig = TableKindConfig | DashboardKindConfig;

// ---------------------------------------------------------------------------
// Sink row mapping
// ---------------------------------------------------------------------------

function workerRow(record: WorkerRecord): SinkRow {
  return { ...record };
}

function inactiveRow(record: InactiveWorkerRecord): SinkRow {
  return { ...record };
}

function earningsRow(record: EarningsEntry): SinkRow {
  const { amount, currency, ...rest } = record;
  return { ...rest, earnings_amount: amount, earnings_currency: currency };
}

function dashboardRow(snapshot: DashboardSnapshot): SinkRow {
  return { ...snapshot };
}

function tableKind<T extends ScrapedRecord>(definition: {
  kind: TableKind;
  tab: string;
  pageSize: number;
  table: SinkTable;
  spec: RowSpec<T>;
  toRow: (record: T) => SinkRow;
}): TableKindConfig {
  const { spec, toRow, ...rest } = definition;
  return {
    type: 'table',
    ...rest,
    minColumns: spec.minColumns,
    extract(cells, context) {
      const record = extractRow(cells, spec, context);
      return record === null ? null : { record, row: toRow(record) };
    },
  };
}

export interface KindOptions {
  staleness?: StalenessRule;
}

export function buildKinds(options: KindOptions = {}): Record<ScrapeKind, KindConfig> {
  const staleness = options.staleness ?? coarseUnitRule(DEFAULT_STALE_TOKENS);

  return {
    dashboard: {
      type: 'dashboard',
      kind: 'dashboard',
      table: 'mining_pool_stats',
      toRow: dashboardRow,
    },
    workers: tableKind({
      kind: 'workers',
      tab: 'Worker',
      pageSize: 80,
      table: 'mining_workers',
      spec: workerRowSpec(staleness),
      toRow: workerRow,
    }),
    inactive: tableKind({
      kind: 'inactive',
      tab: 'Inactive Workers',
      pageSize: 50,
      table: 'mining_inactive_workers',
      spec: inactiveRowSpec,
      toRow: inactiveRow,
    }),
    earnings: tableKind({
      kind: 'earnings',
      tab: 'Earnings',
      pageSize: 50,
      table: 'mining_earnings',
      spec: earningsRowSpec,
      toRow: earningsRow,
    }),
  };
}

function isScrapeKind(name: string): name is ScrapeKind {
  return (SCRAPE_KINDS as readonly string[]).includes(name);
}

/** Expand aliases, drop duplicates (first mention wins), reject unknown names */
export function resolveKinds(names: readonly string[]): ScrapeKind[] {
  const resolved: ScrapeKind[] = [];
  for (const raw of names) {
    const name = raw.trim().toLowerCase();
    const expanded = isScrapeKind(name)
      ? [name]
      : Object.hasOwn(KIND_ALIASES, name)
        ? KIND_ALIASES[name]
        : undefined;
    if (!expanded) {
      const known = [...SCRAPE_KINDS, ...Object.keys(KIND_ALIASES)].join(', ');
      throw new Error(`Unknown scrape kind "${raw}". Expected one of: ${known}`);
    }
    for (const kind of expanded) {
      if (!resolved.includes(kind)) resolved.push(kind);
    }
  }
  return resolved;
}
