import { parseCount } from './extractor.js';
import type { DashboardSnapshot, RecordContext } from './types.js';

// ---------------------------------------------------------------------------
// Field locators
// ---------------------------------------------------------------------------
// The dashboard is a grid of cards, not a table. Its visible text is read as
// lines; each field is found by one locator: the first line starting with the
// label, then the first match of `pattern` on that line (after the label) or
// within the next `window` lines. When the page layout drifts, update the
// locator rather than stacking fallbacks.
// ---------------------------------------------------------------------------

export interface FieldLocator {
  label: string;
  pattern: RegExp;
  window?: number;
}

const HASHRATE = /\d[\d,]*(?:\.\d+)?\s*[KMGTPEZ]?H\/s/i;
const NUMBER = /\d[\d,]*(?:\.\d+)?/;
const INTEGER = /\d[\d,]*/;

export const DASHBOARD_LOCATORS = {
  ten_min_hashrate: { label: '10-Minute', pattern: HASHRATE },
  day_hashrate: { label: '24H', pattern: HASHRATE },
  active_worker_count: { label: 'Active', pattern: INTEGER },
  inactive_worker_count: { label: 'Inactive', pattern: INTEGER },
  account_balance: { label: 'Account Balance', pattern: NUMBER },
  yesterday_earnings: { label: 'Yesterday Earnings', pattern: NUMBER },
  total_earnings: { label: 'Total Earnings', pattern: NUMBER },
} satisfies Record<string, FieldLocator>;

export type DashboardField = keyof typeof DASHBOARD_LOCATORS;

/** Split visible page text into trimmed, non-empty lines */
export function textLines(text: string): string[] {
  return text
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(Boolean);
}

export function locateField(lines: readonly string[], locator: FieldLocator): string | null {
  const label = locator.label.toLowerCase();
  const at = lines.findIndex(line => line.toLowerCase().startsWith(label));
  if (at === -1) return null;

  const candidates = [lines[at].slice(locator.label.length), ...lines.slice(at + 1, at + 1 + (locator.window ?? 3))];
  for (const candidate of candidates) {
    const match = candidate.match(locator.pattern);
    if (match) return match[0].trim();
  }
  return null;
}

export interface DashboardReading {
  snapshot: DashboardSnapshot;
  /** Fields no locator could find; they hold "0" / 0 in the snapshot */
  missing: DashboardField[];
}

export function parseDashboard(lines: readonly string[], context: RecordContext): DashboardReading {
  const missing: DashboardField[] = [];

  const text = (field: DashboardField): string => {
    const value = locateField(lines, DASHBOARD_LOCATORS[field]);
    if (value === null) {
      missing.push(field);
      return '0';
    }
    return value.replace(/,/g, '');
  };

  const count = (field: DashboardField): number => parseCount(text(field));

  return {
    snapshot: {
      ten_min_hashrate: text('ten_min_hashrate'),
      day_hashrate: text('day_hashrate'),
      active_worker_count: count('active_worker_count'),
      inactive_worker_count: count('inactive_worker_count'),
      account_balance: text('account_balance'),
      yesterday_earnings: text('yesterday_earnings'),
      total_earnings: text('total_earnings'),
      ...context,
    },
    missing,
  };
}
