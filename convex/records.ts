import { mutationGeneric } from "convex/server";
import { v, type PropertyValidators } from "convex/values";
import {
  earningsFields,
  inactiveWorkerFields,
  poolStatsFields,
  workerFields,
} from "./schema.js";

/**
 * Batch insert into one table. A mutation is a transaction, so a batch lands
 * whole or not at all; the scraper inserts single rows as batches of one.
 */
function insertInto(table: string, fields: PropertyValidators) {
  return mutationGeneric({
    args: { records: v.array(v.object(fields)) },
    handler: async (ctx, { records }) => {
      for (const record of records) {
        await ctx.db.insert(table, record);
      }
      return records.length;
    },
  });
}

export const insertWorkers = insertInto("mining_workers", workerFields);
export const insertPoolStats = insertInto("mining_pool_stats", poolStatsFields);
export const insertEarnings = insertInto("mining_earnings", earningsFields);
export const insertInactiveWorkers = insertInto("mining_inactive_workers", inactiveWorkerFields);
