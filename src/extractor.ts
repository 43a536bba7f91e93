import type {
  EarningsEntry,
  InactiveWorkerRecord,
  RecordContext,
  WorkerRecord,
  WorkerStatus,
} from './types.js';

// ---------------------------------------------------------------------------
// Text helpers
// ---------------------------------------------------------------------------

/** Hint text the observer appends to worker names inside the same cell */
export const NAME_HINT_MARKER = 'Click to view';

/** Truncate at the first (case-insensitive) occurrence of `marker`, then trim. */
export function cleanName(raw: string, marker: string = NAME_HINT_MARKER): string {
  const at = raw.toLowerCase().indexOf(marker.toLowerCase());
  return (at === -1 ? raw : raw.slice(0, at)).trim();
}

/**
 * Split free text such as "0.123 BTC" into its leading numeric token and the
 * word after it. Text without a number yields amount "0" and no currency.
 */
export function parseAmount(text: string): { amount: string; currency: string } {
  const match = text.match(/(\d[\d,]*(?:\.\d+)?|\.\d+)\s*([A-Za-z]\w*)?/);
  if (!match) return { amount: '0', currency: '' };
  return { amount: match[1].replace(/,/g, ''), currency: match[2] ?? '' };
}

/** First integer in the text, or 0 */
export function parseCount(text: string): number {
  const match = text.replace(/,/g, '').match(/\d+/);
  return match ? Number(match[0]) : 0;
}

// ---------------------------------------------------------------------------
// Status derivation
// ---------------------------------------------------------------------------

/**
 * Heuristic: a last-share text mentioning a coarse time unit ("3 days ago",
 * "1 week ago") means the worker stopped reporting. There is no exact duration
 * threshold behind it; swap the tokens (or the whole rule) to change it.
 */
export interface StalenessRule {
  readonly name: string;
  statusOf(lastShareTime: string): WorkerStatus;
}

export const DEFAULT_STALE_TOKENS: readonly string[] = ['day', 'week', 'month'];

export function coarseUnitRule(tokens: readonly string[] = DEFAULT_STALE_TOKENS): StalenessRule {
  const lowered = tokens.map(token => token.toLowerCase());
  return {
    name: `coarse-unit(${lowered.join('|')})`,
    statusOf(lastShareTime) {
      const text = lastShareTime.toLowerCase();
      return lowered.some(token => text.includes(token)) ? 'inactive' : 'active';
    },
  };
}

// ---------------------------------------------------------------------------
// Row specs
// ---------------------------------------------------------------------------

export interface RowSpec<T> {
  /** Used in logs and error messages */
  view: string;
  minColumns: number;
  /** Column holding the row's identity; empty or label values reject the row */
  nameColumn: number;
  headerLabels: readonly string[];
  sentinels: readonly string[];
  build(cells: readonly string[], context: RecordContext): T;
}

export const NO_DATA_SENTINELS: readonly string[] = ['No filter data', 'No data', 'No Data Available'];

function cell(cells: readonly string[], index: number): string {
  return cells[index] ?? '';
}

/**
 * Run one row through a spec. Returns null for short rows, header rows and
 * "no data" placeholders; never throws for malformed input.
 */
export function extractRow<T>(cells: readonly string[], spec: RowSpec<T>, context: RecordContext): T | null {
  if (cells.length < spec.minColumns) return null;

  const name = cleanName(cell(cells, spec.nameColumn));
  if (!name) return null;

  const lowered = name.toLowerCase();
  if (spec.headerLabels.some(label => label.toLowerCase() === lowered)) return null;
  if (spec.sentinels.some(sentinel => sentinel.toLowerCase() === lowered)) return null;

  try {
    return spec.build(cells, context);
  } catch {
    return null;
  }
}

// Worker table: [checkbox, index, worker, 10m, 1h, 24h, reject %, last share, connections]
export function workerRowSpec(rule: StalenessRule = coarseUnitRule()): RowSpec<WorkerRecord> {
  return {
    view: 'workers',
    minColumns: 7,
    nameColumn: 2,
    headerLabels: ['Worker', 'Worker Name', 'Miner'],
    sentinels: NO_DATA_SENTINELS,
    build(cells, context) {
      const lastShare = cell(cells, 7);
      return {
        worker_id: cleanName(cell(cells, 2)),
        ten_min_hashrate: cell(cells, 3),
        one_hour_hashrate: cell(cells, 4),
        day_hashrate: cell(cells, 5),
        rejection_rate: cell(cells, 6),
        last_share_time: lastShare,
        connections_24h: cell(cells, 8),
        status: rule.statusOf(lastShare),
        ...context,
      };
    },
  };
}

// Inactive table: [checkbox, index, worker, last share, inactive for, ...]
export const inactiveRowSpec: RowSpec<InactiveWorkerRecord> = {
  view: 'inactive workers',
  minColumns: 3,
  nameColumn: 2,
  headerLabels: ['Worker', 'Worker Name', 'Miner'],
  sentinels: NO_DATA_SENTINELS,
  build(cells, context) {
    return {
      worker_id: cleanName(cell(cells, 2)),
      last_share_time: cell(cells, 3),
      inactive_duration: cell(cells, 4),
      ...context,
    };
  },
};

// Earnings table: [date, daily hashrate, amount + currency, type, payment status]
export const earningsRowSpec: RowSpec<EarningsEntry> = {
  view: 'earnings',
  minColumns: 5,
  nameColumn: 0,
  headerLabels: ['Date', 'Time', 'Earnings Date'],
  sentinels: NO_DATA_SENTINELS,
  build(cells, context) {
    const { amount, currency } = parseAmount(cell(cells, 2));
    return {
      date: cell(cells, 0),
      daily_hashrate: cell(cells, 1),
      amount,
      currency,
      earnings_type: cell(cells, 3),
      payment_status: cell(cells, 4),
      ...context,
    };
  },
};
