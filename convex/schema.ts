import { defineSchema, defineTable } from "convex/server";
import { v } from "convex/values";

// Every scraped record carries who it belongs to and when it was observed.
const provenance = {
  account_ref: v.string(),
  coin_type: v.string(),
  observed_at: v.string(),
};

export const workerFields = {
  worker_id: v.string(),
  ten_min_hashrate: v.string(),
  one_hour_hashrate: v.string(),
  day_hashrate: v.string(),
  rejection_rate: v.string(),
  last_share_time: v.string(),
  connections_24h: v.string(),
  status: v.union(v.literal("active"), v.literal("inactive")),
  ...provenance,
};

export const poolStatsFields = {
  ten_min_hashrate: v.string(),
  day_hashrate: v.string(),
  active_worker_count: v.number(),
  inactive_worker_count: v.number(),
  account_balance: v.string(),
  yesterday_earnings: v.string(),
  total_earnings: v.string(),
  ...provenance,
};

export const earningsFields = {
  date: v.string(),
  daily_hashrate: v.string(),
  earnings_amount: v.string(),
  earnings_currency: v.string(),
  earnings_type: v.string(),
  payment_status: v.string(),
  ...provenance,
};

export const inactiveWorkerFields = {
  worker_id: v.string(),
  last_share_time: v.string(),
  inactive_duration: v.string(),
  ...provenance,
};

export default defineSchema({
  mining_workers: defineTable(workerFields).index("by_account", ["account_ref", "observed_at"]),
  mining_pool_stats: defineTable(poolStatsFields).index("by_account", ["account_ref", "observed_at"]),
  mining_earnings: defineTable(earningsFields).index("by_account", ["account_ref", "observed_at"]),
  mining_inactive_workers: defineTable(inactiveWorkerFields).index("by_account", [
    "account_ref",
    "observed_at",
  ]),

  account_credentials: defineTable({
    account_name: v.string(),
    access_key: v.string(),
    user_id: v.string(),
    coin_type: v.optional(v.string()),
    is_active: v.boolean(),
    priority: v.optional(v.number()),
    last_scraped_at: v.optional(v.string()),
  })
    .index("by_active", ["is_active"])
    .index("by_user_id", ["user_id"]),

  scrape_runs: defineTable({
    startedAt: v.string(),
    completedAt: v.optional(v.string()),
    status: v.union(
      v.literal("running"),
      v.literal("success"),
      v.literal("partial"),
      v.literal("failed")
    ),
    kinds: v.array(v.string()),
    attempted: v.number(),
    succeeded: v.number(),
    failed: v.number(),
    records: v.number(),
    durationSeconds: v.optional(v.number()),
    error: v.optional(v.string()),
  }).index("by_startedAt", ["startedAt"]),
});
