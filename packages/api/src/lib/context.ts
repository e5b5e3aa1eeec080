import type { ExtractionProvider } from "@chunkwise/llm";
import type { WebhookDispatcher } from "@chunkwise/pipeline";
import type { ExtractionDefaults, JobStore } from "@chunkwise/shared";

/**
 * Starts the run of a stored job: through the queue, or in this process when
 * there is no shared store to hand the job to a worker.
 */
export interface JobLauncher {
  launch(jobId: string): Promise<void>;
  /** Waits for anything the launcher still owns. */
  close(): Promise<void>;
}

export interface ApiContext {
  store: JobStore;
  provider: ExtractionProvider;
  extractionDefaults: ExtractionDefaults;
  launcher: JobLauncher;
  /** Notifies webhooks of jobs the API settles itself (a launch that failed). */
  dispatcher?: WebhookDispatcher;
  /** When set, every /api route except health and metrics needs X-API-Key. */
  apiKey?: string;
  /** Worker kill switch. The admin routes are only mounted when present. */
  emergencyStop?: EmergencyStopControl;
}

export interface EmergencyStopControl {
  activate(): Promise<void>;
  clear(): Promise<void>;
}

export interface RouteOptions {
  ctx: ApiContext;
}
