// ---------------------------------------------------------------------------
// Accounts
// ---------------------------------------------------------------------------

/** An observer account as stored in `account_credentials` */
export interface Account {
  id: string | null;
  name: string;
  access_key: string;
  external_user_id: string;
  coin_type: string;
  is_active: boolean;
  priority: number;
  last_scraped_at: string | null;
}

// ---------------------------------------------------------------------------
// Records: every record carries (account_ref, coin_type, observed_at)
// ---------------------------------------------------------------------------

export interface RecordContext {
  account_ref: string;
  coin_type: string;
  observed_at: string;
}

export type WorkerStatus = 'active' | 'inactive';

export interface WorkerRecord extends RecordContext {
  worker_id: string;
  ten_min_hashrate: string;
  one_hour_hashrate: string;
  day_hashrate: string;
  rejection_rate: string;
  last_share_time: string;
  connections_24h: string;
  status: WorkerStatus;
}

export interface DashboardSnapshot extends RecordContext {
  ten_min_hashrate: string;
  day_hashrate: string;
  active_worker_count: number;
  inactive_worker_count: number;
  account_balance: string;
  yesterday_earnings: string;
  total_earnings: string;
}

export interface EarningsEntry extends RecordContext {
  date: string;
  daily_hashrate: string;
  amount: string;
  currency: string;
  earnings_type: string;
  payment_status: string;
}

export interface InactiveWorkerRecord extends RecordContext {
  worker_id: string;
  last_share_time: string;
  inactive_duration: string;
}

// ---------------------------------------------------------------------------
// Sink shapes
// ---------------------------------------------------------------------------

export type SinkTable =
  | 'mining_workers'
  | 'mining_pool_stats'
  | 'mining_earnings'
  | 'mining_inactive_workers';

export type SinkValue = string | number | boolean | null;

/** A flat row as accepted by the data sink */
export type SinkRow = Record<string, SinkValue>;

export interface UploadResult {
  succeeded: number;
  failed: number;
}
