import { Pool } from "pg";
import type { PoolClient, QueryResult, QueryResultRow } from "pg";

import { createExtractionJobsRepo } from "./repos/extraction_jobs";
import { createWebhookDeliveriesRepo } from "./repos/webhook_deliveries";

export interface Queryable {
  query<T extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]): Promise<QueryResult<T>>;
}

export type DbContext = Queryable & {
  extractionJobs: ReturnType<typeof createExtractionJobsRepo>;
  webhookDeliveries: ReturnType<typeof createWebhookDeliveriesRepo>;
};

export interface Db extends DbContext {
  tx<T>(fn: (tx: DbContext) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}

export function createDbContext(db: Queryable): DbContext {
  return {
    query: db.query.bind(db),
    extractionJobs: createExtractionJobsRepo(db),
    webhookDeliveries: createWebhookDeliveriesRepo(db),
  };
}

function asQueryable(client: PoolClient): Queryable {
  return {
    query: client.query.bind(client),
  };
}

export function createDb(databaseUrl: string): Db {
  const pool = new Pool({ connectionString: databaseUrl });
  const base: Queryable = {
    query: pool.query.bind(pool),
  };

  const ctx = createDbContext(base);

  return {
    ...ctx,
    async tx<T>(fn: (tx: DbContext) => Promise<T>): Promise<T> {
      const client = await pool.connect();
      try {
        await client.query("BEGIN");
        const result = await fn(createDbContext(asQueryable(client)));
        await client.query("COMMIT");
        return result;
      } catch (err) {
        // A failed rollback is reported together with the original error.
        await client.query("ROLLBACK").catch((rollbackErr: unknown) => {
          throw new AggregateError([err, rollbackErr], "Transaction failed and rollback failed");
        });
        throw err;
      } finally {
        client.release();
      }
    },
    async close(): Promise<void> {
      await pool.end();
    },
  };
}
