import type { WebhookDeliveryOutcome, WebhookDeliveryRecord } from "@chunkwise/shared";

import type { Queryable } from "../db";

interface WebhookDeliveryRow {
  job_id: string;
  url: string;
  delivered: boolean;
  attempts: number;
  last_status_code: number | null;
  error: string | null;
  delivered_at: Date | string | null;
  created_at: Date | string;
}

function toIso(value: Date | string): string {
  return new Date(value).toISOString();
}

export function createWebhookDeliveriesRepo(db: Queryable) {
  return {
    async insert(params: { jobId: string; url: string; outcome: WebhookDeliveryOutcome }): Promise<void> {
      const { outcome } = params;
      await db.query(
        `insert into webhook_deliveries (job_id, url, delivered, attempts, last_status_code, error, delivered_at)
         values ($1, $2, $3, $4, $5, $6, $7)`,
        [
          params.jobId,
          params.url,
          outcome.delivered,
          outcome.attempts,
          outcome.lastStatusCode,
          outcome.error,
          outcome.deliveredAt,
        ],
      );
    },

    /** Delivery history for one job, newest first. */
    async listForJob(jobId: string, limit = 20): Promise<WebhookDeliveryRecord[]> {
      const res = await db.query<WebhookDeliveryRow>(
        `select job_id, url, delivered, attempts, last_status_code, error, delivered_at, created_at
         from webhook_deliveries
         where job_id = $1
         order by created_at desc, id desc
         limit $2`,
        [jobId, limit],
      );
      return res.rows.map((row) => ({
        jobId: row.job_id,
        url: row.url,
        delivered: row.delivered,
        attempts: row.attempts,
        lastStatusCode: row.last_status_code,
        error: row.error,
        deliveredAt: row.delivered_at === null ? null : toIso(row.delivered_at),
        recordedAt: toIso(row.created_at),
      }));
    },
  };
}

export type WebhookDeliveriesRepo = ReturnType<typeof createWebhookDeliveriesRepo>;
