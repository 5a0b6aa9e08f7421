export type JobStatus = "PENDING" | "RUNNING" | "COMPLETED" | "FAILED" | "CANCELLED" | "TIMEOUT" | "UNKNOWN";

export const JOB_STATUSES: readonly JobStatus[] = [
  "PENDING",
  "RUNNING",
  "COMPLETED",
  "FAILED",
  "CANCELLED",
  "TIMEOUT",
  "UNKNOWN"
];

// UNKNOWN counts as active: a job the scheduler cannot place is not known to be finished.
export const ACTIVE_STATUSES: ReadonlySet<JobStatus> = new Set<JobStatus>(["PENDING", "RUNNING", "UNKNOWN"]);
export const COMPLETE_STATUSES: ReadonlySet<JobStatus> = new Set<JobStatus>([
  "COMPLETED",
  "FAILED",
  "CANCELLED",
  "TIMEOUT"
]);

const STATUS_SET = new Set<string>(JOB_STATUSES);

export function isJobStatus(value: string): value is JobStatus {
  return STATUS_SET.has(value);
}

export function isActiveStatus(status: JobStatus): boolean {
  return ACTIVE_STATUSES.has(status);
}

export function isCompleteStatus(status: JobStatus): boolean {
  return COMPLETE_STATUSES.has(status);
}
