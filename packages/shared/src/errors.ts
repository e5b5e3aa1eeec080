import type { JobStatus } from "./types/job";

/**
 * Base class for errors that surface to API callers.
 * `code` ends up in the error envelope, `statusCode` in the HTTP status.
 */
export class CodedError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Input could not be split into chunks. Raised before any provider call. */
export class ChunkingError extends CodedError {
  constructor(message: string) {
    super(message, "CHUNKING_ERROR", 422);
  }
}

export class ValidationError extends CodedError {
  constructor(message: string) {
    super(message, "INVALID_REQUEST", 400);
  }
}

export class JobNotFoundError extends CodedError {
  constructor(public readonly jobId: string) {
    super(`Job not found: ${jobId}`, "JOB_NOT_FOUND", 404);
  }
}

export class InvalidTransitionError extends CodedError {
  constructor(
    public readonly jobId: string,
    public readonly from: JobStatus,
    public readonly to: JobStatus,
  ) {
    super(`Invalid transition for job ${jobId}: ${from} -> ${to}`, "INVALID_TRANSITION", 409);
  }
}

export class AlreadyTerminalError extends CodedError {
  constructor(
    public readonly jobId: string,
    public readonly status: JobStatus,
  ) {
    super(`Job ${jobId} already finished with status ${status}`, "ALREADY_TERMINAL", 409);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
