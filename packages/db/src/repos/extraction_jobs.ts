import type {
  AggregateResult,
  CreateJobParams,
  ExtractionOptions,
  Job,
  JobError,
  JobStatus,
  WebhookConfig,
  WebhookDeliveryOutcome,
} from "@chunkwise/shared";

import type { Queryable } from "../db";

export interface ExtractionJobRow {
  id: string;
  status: JobStatus;
  url: string;
  content: string;
  options_json: ExtractionOptions;
  webhook_json: WebhookConfig | null;
  result_json: AggregateResult | null;
  error_json: JobError | null;
  webhook_delivery_json: WebhookDeliveryOutcome | null;
  created_at: Date | string;
  updated_at: Date | string;
}

export interface CompareAndSetParams {
  id: string;
  to: JobStatus;
  /** The update only applies while the job is in one of these states. */
  from: readonly JobStatus[];
  result?: AggregateResult;
  error?: JobError;
}

export interface ListJobRowsParams {
  limit: number;
  status?: JobStatus;
}

const JOB_COLUMNS = `id, status, url, content, options_json, webhook_json, result_json, error_json,
  webhook_delivery_json, created_at, updated_at`;

const UUID_REGEX = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

export function isUuid(value: string): boolean {
  return UUID_REGEX.test(value);
}

function toIso(value: Date | string): string {
  return new Date(value).toISOString();
}

export function rowToJob(row: ExtractionJobRow): Job {
  return {
    id: row.id,
    status: row.status,
    createdAt: toIso(row.created_at),
    updatedAt: toIso(row.updated_at),
    input: { url: row.url, content: row.content },
    options: row.options_json,
    webhook: row.webhook_json,
    result: row.result_json,
    error: row.error_json,
    webhookDelivery: row.webhook_delivery_json,
  };
}

export function createExtractionJobsRepo(db: Queryable) {
  return {
    async insert(params: CreateJobParams): Promise<ExtractionJobRow> {
      const res = await db.query<ExtractionJobRow>(
        `insert into extraction_jobs (status, url, content, options_json, webhook_json)
         values ('pending', $1, $2, $3::jsonb, $4::jsonb)
         returning ${JOB_COLUMNS}`,
        [
          params.input.url,
          params.input.content,
          JSON.stringify(params.options),
          params.webhook ? JSON.stringify(params.webhook) : null,
        ],
      );
      const row = res.rows[0];
      if (!row) throw new Error("Failed to insert extraction job");
      return row;
    },

    async getById(id: string): Promise<ExtractionJobRow | null> {
      if (!isUuid(id)) return null;
      const res = await db.query<ExtractionJobRow>(`select ${JOB_COLUMNS} from extraction_jobs where id = $1`, [id]);
      return res.rows[0] ?? null;
    },

    /**
     * Status change guarded by the expected source states. Returns null when the
     * row is missing or was not in an allowed state.
     */
    async compareAndSetStatus(params: CompareAndSetParams): Promise<ExtractionJobRow | null> {
      if (!isUuid(params.id)) return null;
      const res = await db.query<ExtractionJobRow>(
        `update extraction_jobs
         set status = $2,
             result_json = coalesce($3::jsonb, result_json),
             error_json = coalesce($4::jsonb, error_json),
             updated_at = now()
         where id = $1 and status = any($5::text[])
         returning ${JOB_COLUMNS}`,
        [
          params.id,
          params.to,
          params.result ? JSON.stringify(params.result) : null,
          params.error ? JSON.stringify(params.error) : null,
          [...params.from],
        ],
      );
      return res.rows[0] ?? null;
    },

    /** Returns false when no such job exists. */
    async setWebhookDelivery(id: string, outcome: WebhookDeliveryOutcome): Promise<boolean> {
      if (!isUuid(id)) return false;
      const res = await db.query(
        "update extraction_jobs set webhook_delivery_json = $2::jsonb, updated_at = now() where id = $1",
        [id, JSON.stringify(outcome)],
      );
      return (res.rowCount ?? 0) > 0;
    },

    async list(params: ListJobRowsParams): Promise<ExtractionJobRow[]> {
      const values: unknown[] = [];
      let where = "";
      if (params.status) {
        values.push(params.status);
        where = `where status = $${values.length}`;
      }
      values.push(params.limit);

      const res = await db.query<ExtractionJobRow>(
        `select ${JOB_COLUMNS} from extraction_jobs ${where}
         order by created_at desc, id desc
         limit $${values.length}`,
        values,
      );
      return res.rows;
    },
  };
}

export type ExtractionJobsRepo = ReturnType<typeof createExtractionJobsRepo>;
