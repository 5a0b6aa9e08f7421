import { isActiveStatus, isCompleteStatus, type JobStatus } from "./jobStatus.js";

/**
 * Scheduler-agnostic view of one job.
 *
 * Only `jobId`, `name`, `user` and `status` are always known. Every other field is
 * `null` when the backend cannot supply it. Records are frozen and rebuilt on every
 * poll; consumers diff by `jobId`.
 */
export interface JobInfo {
  readonly jobId: string;
  readonly name: string;
  readonly user: string;
  readonly status: JobStatus;

  readonly queue: string | null;

  readonly submitTime: Date | null;
  readonly startTime: Date | null;
  readonly endTime: Date | null;
  readonly runtimeSeconds: number | null;

  readonly cpu: number | null;
  readonly memory: string | null;
  readonly gpu: number | null;

  readonly exitCode: number | null;

  readonly stdoutPath: string | null;
  readonly stderrPath: string | null;

  readonly node: string | null;
  readonly dependencies: readonly string[] | null;
  readonly arrayTaskId: string | null;
}

export type JobInfoInit = Pick<JobInfo, "jobId" | "name" | "user" | "status"> &
  Partial<Omit<JobInfo, "jobId" | "name" | "user" | "status">>;

export function createJobInfo(init: JobInfoInit): JobInfo {
  return Object.freeze({
    jobId: init.jobId,
    name: init.name,
    user: init.user,
    status: init.status,
    queue: init.queue ?? null,
    submitTime: init.submitTime ?? null,
    startTime: init.startTime ?? null,
    endTime: init.endTime ?? null,
    runtimeSeconds: init.runtimeSeconds ?? null,
    cpu: init.cpu ?? null,
    memory: init.memory ?? null,
    gpu: init.gpu ?? null,
    exitCode: init.exitCode ?? null,
    stdoutPath: init.stdoutPath ?? null,
    stderrPath: init.stderrPath ?? null,
    node: init.node ?? null,
    dependencies: init.dependencies ? Object.freeze([...init.dependencies]) : null,
    arrayTaskId: init.arrayTaskId ?? null
  });
}

export function isActive(job: JobInfo): boolean {
  return isActiveStatus(job.status);
}

export function isComplete(job: JobInfo): boolean {
  return isCompleteStatus(job.status);
}

/** Seconds between two instants, or null when either end is unknown or they are out of order. */
export function elapsedSeconds(start: Date | null, end: Date | null): number | null {
  if (!start || !end) return null;
  const seconds = Math.floor((end.getTime() - start.getTime()) / 1000);
  return seconds >= 0 ? seconds : null;
}

export function formatRuntime(job: JobInfo): string {
  if (job.runtimeSeconds === null) return "—";

  const total = Math.floor(job.runtimeSeconds);
  if (total < 60) return `${total}s`;

  const minutes = Math.floor(total / 60);
  if (minutes < 60) return `${minutes}m`;

  const hours = Math.floor(minutes / 60);
  if (hours < 24) return `${hours}h ${minutes % 60}m`;

  const days = Math.floor(hours / 24);
  return `${days}d ${hours % 24}h`;
}

export function formatResources(job: JobInfo): string {
  const parts: string[] = [];
  if (job.cpu !== null) parts.push(String(job.cpu));
  if (job.memory !== null) parts.push(job.memory);
  if (job.gpu !== null) parts.push(`${job.gpu}GPU`);
  return parts.length ? parts.join("/") : "—";
}
