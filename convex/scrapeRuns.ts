import { mutationGeneric, queryGeneric } from "convex/server";
import { v } from "convex/values";

/** Create a new run record with status "running". Returns the document ID. */
export const startRun = mutationGeneric({
  args: { kinds: v.array(v.string()) },
  handler: async (ctx, { kinds }) => {
    return await ctx.db.insert("scrape_runs", {
      startedAt: new Date().toISOString(),
      status: "running",
      kinds,
      attempted: 0,
      succeeded: 0,
      failed: 0,
      records: 0,
    });
  },
});

/** Update a run record with the final results. */
export const completeRun = mutationGeneric({
  args: {
    runId: v.id("scrape_runs"),
    status: v.union(v.literal("success"), v.literal("partial"), v.literal("failed")),
    attempted: v.number(),
    succeeded: v.number(),
    failed: v.number(),
    records: v.number(),
    durationSeconds: v.number(),
    error: v.optional(v.string()),
  },
  handler: async (ctx, { runId, ...fields }) => {
    await ctx.db.patch(runId, {
      completedAt: new Date().toISOString(),
      ...fields,
    });
  },
});

/**
 * Count how many of the most recent runs are consecutive failures.
 * Used to warn when the scraper is repeatedly broken.
 */
export const getConsecutiveFailures = queryGeneric({
  args: {},
  handler: async (ctx) => {
    const recentRuns = await ctx.db
      .query("scrape_runs")
      .withIndex("by_startedAt")
      .order("desc")
      .take(10);

    let count = 0;
    for (const run of recentRuns) {
      if (run.status === "failed") count++;
      else if (run.status !== "running") break;
    }
    return count;
  },
});
