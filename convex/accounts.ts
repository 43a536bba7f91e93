import { mutationGeneric, queryGeneric } from "convex/server";
import { v } from "convex/values";

interface AccountRow {
  priority?: number;
  last_scraped_at?: string;
}

// Priority first, then never-scraped accounts, then the stalest.
function byScrapeOrder(a: AccountRow, b: AccountRow): number {
  const priority = (b.priority ?? 0) - (a.priority ?? 0);
  if (priority !== 0) return priority;
  if (a.last_scraped_at === b.last_scraped_at) return 0;
  if (a.last_scraped_at === undefined) return -1;
  if (b.last_scraped_at === undefined) return 1;
  return a.last_scraped_at < b.last_scraped_at ? -1 : 1;
}

/** Active accounts in the order they should be scraped. */
export const getAllActiveAccounts = queryGeneric({
  args: {},
  handler: async (ctx) => {
    const accounts = await ctx.db
      .query("account_credentials")
      .withIndex("by_active", (q) => q.eq("is_active", true))
      .collect();
    return accounts.sort(byScrapeOrder);
  },
});

/** Plain filtered select; ordering is left to the caller. */
export const list = queryGeneric({
  args: { isActive: v.optional(v.boolean()) },
  handler: async (ctx, { isActive }) => {
    if (isActive === undefined) {
      return await ctx.db.query("account_credentials").collect();
    }
    return await ctx.db
      .query("account_credentials")
      .withIndex("by_active", (q) => q.eq("is_active", isActive))
      .collect();
  },
});

export const markScraped = mutationGeneric({
  args: { id: v.id("account_credentials"), scrapedAt: v.string() },
  handler: async (ctx, { id, scrapedAt }) => {
    await ctx.db.patch(id, { last_scraped_at: scrapedAt });
  },
});
