/**
 * CONVEX SINK
 *
 * The hosted data sink: scraped records, account credentials and the run log
 * all live in one Convex deployment reached over HTTPS.
 * Uses ConvexHttpClient (no WebSocket).
 *
 * makeFunctionReference is used instead of the generated `api` object so this
 * file compiles before `npx convex dev` has been run for the first time.
 */

import { ConvexHttpClient } from 'convex/browser';
import { makeFunctionReference } from 'convex/server';
import { errorMessage } from './errors.js';
import { log } from './logger.js';
import {
  orderAccounts,
  type AccountSource,
  type DataSink,
  type RecordStore,
  type RunCompletion,
  type RunLog,
} from './sink.js';
import type { Account, SinkRow, SinkTable } from './types.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** `account_credentials` document as returned by the deployment */
export interface AccountDocument {
  _id: string;
  account_name: string;
  access_key: string;
  user_id: string;
  coin_type?: string;
  is_active: boolean;
  priority?: number;
  last_scraped_at?: string;
}

export function toAccount(doc: AccountDocument): Account {
  return {
    id: doc._id,
    name: doc.account_name || doc.user_id,
    access_key: doc.access_key,
    external_user_id: doc.user_id,
    coin_type: doc.coin_type || 'BTC',
    is_active: doc.is_active,
    priority: doc.priority ?? 0,
    last_scraped_at: doc.last_scraped_at ?? null,
  };
}

// ---------------------------------------------------------------------------
// Function references (avoids dependency on convex/_generated/api)
// ---------------------------------------------------------------------------

type EmptyArgs = Record<string, never>;

function insertRef(name: string) {
  return makeFunctionReference<'mutation', { records: SinkRow[] }, number>(name);
}

const insertFns = {
  mining_workers: insertRef('records:insertWorkers'),
  mining_pool_stats: insertRef('records:insertPoolStats'),
  mining_earnings: insertRef('records:insertEarnings'),
  mining_inactive_workers: insertRef('records:insertInactiveWorkers'),
} satisfies Record<SinkTable, unknown>;

const fns = {
  getAllActiveAccounts: makeFunctionReference<'query', EmptyArgs, AccountDocument[]>(
    'accounts:getAllActiveAccounts'
  ),
  listAccounts: makeFunctionReference<'query', { isActive?: boolean }, AccountDocument[]>('accounts:list'),
  markScraped: makeFunctionReference<'mutation', { id: string; scrapedAt: string }, null>(
    'accounts:markScraped'
  ),
  startRun: makeFunctionReference<'mutation', { kinds: string[] }, string>('scrapeRuns:startRun'),
  completeRun: makeFunctionReference<'mutation', RunCompletion & { runId: string }, null>(
    'scrapeRuns:completeRun'
  ),
  getConsecutiveFailures: makeFunctionReference<'query', EmptyArgs, number>(
    'scrapeRuns:getConsecutiveFailures'
  ),
};

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

export function createConvexClient(url: string, authToken?: string): ConvexHttpClient {
  if (!url) {
    throw new Error(
      'CONVEX_URL is not set. Add it to your .env file (run `npx convex dev` to get the URL).'
    );
  }
  const client = new ConvexHttpClient(url);
  if (authToken) client.setAuth(authToken);
  return client;
}

// ---------------------------------------------------------------------------
// Sink
// ---------------------------------------------------------------------------

/** The part of the HTTP client the sink calls */
export type ConvexCaller = Pick<ConvexHttpClient, 'query' | 'mutation'>;

export function createConvexSink(client: ConvexCaller): DataSink {
  const records: RecordStore = {
    async insertMany(table, rows) {
      await client.mutation(insertFns[table], { records: rows });
    },
    async insertOne(table, row) {
      await client.mutation(insertFns[table], { records: [row] });
    },
  };

  const accounts: AccountSource = {
    async listActiveAccounts() {
      try {
        const docs = await client.query(fns.getAllActiveAccounts, {});
        log.info(`Fetched ${docs.length} active account(s) via getAllActiveAccounts`);
        return docs.map(toAccount);
      } catch (error) {
        log.warn(`getAllActiveAccounts failed, falling back to a filtered select: ${errorMessage(error)}`);
      }
      const docs = await client.query(fns.listAccounts, { isActive: true });
      log.info(`Fetched ${docs.length} active account(s) via filtered select`);
      return orderAccounts(docs.map(toAccount));
    },

    async markScraped(account, scrapedAt) {
      if (account.id === null) return;
      await client.mutation(fns.markScraped, { id: account.id, scrapedAt });
    },
  };

  const runs: RunLog = {
    async startRun(kinds) {
      return await client.mutation(fns.startRun, { kinds });
    },

    async completeRun(runId, completion) {
      const { error, ...counts } = completion;
      await client.mutation(fns.completeRun, {
        runId,
        ...counts,
        ...(error !== undefined && { error }),
      });
    },

    async getConsecutiveFailures() {
      return await client.query(fns.getConsecutiveFailures, {});
    },
  };

  return {
    records,
    accounts,
    runs,
    async close() {
      // HTTP client holds no connection
    },
  };
}
