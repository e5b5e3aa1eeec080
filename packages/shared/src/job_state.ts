import type { OverallStatus } from "./types/extraction";
import type { JobStatus, TerminalJobStatus } from "./types/job";

const TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
  pending: ["running", "cancelled"],
  running: ["completed", "partially_completed", "failed", "cancelled"],
  completed: [],
  partially_completed: [],
  failed: [],
  cancelled: [],
};

export const JOB_STATUSES: readonly JobStatus[] = [
  "pending",
  "running",
  "completed",
  "partially_completed",
  "failed",
  "cancelled",
];

export function isJobStatus(value: unknown): value is JobStatus {
  return JOB_STATUSES.some((status) => status === value);
}

export function isTerminalStatus(status: JobStatus): status is TerminalJobStatus {
  return TRANSITIONS[status].length === 0;
}

export function canTransition(from: JobStatus, to: JobStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

/**
 * States a job may be in for a move to `to` to be legal.
 * Used as the expected-state set of compare-and-swap updates.
 */
export function sourceStatesFor(to: JobStatus): JobStatus[] {
  return JOB_STATUSES.filter((from) => canTransition(from, to));
}

export function jobStatusForOutcome(overall: OverallStatus): TerminalJobStatus {
  switch (overall) {
    case "success":
      return "completed";
    case "partial":
      return "partially_completed";
    case "failed":
      return "failed";
  }
}
