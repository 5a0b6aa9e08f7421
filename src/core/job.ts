import type { JobStatus } from "./jobStatus.js";

export type SchedulerName = "sge" | "slurm" | "pbs" | "local";

export const SCHEDULER_NAMES: readonly SchedulerName[] = ["sge", "slurm", "pbs", "local"];

export function isSchedulerName(value: string): value is SchedulerName {
  return (SCHEDULER_NAMES as readonly string[]).includes(value);
}

export interface JobSpec {
  name: string;
  /** Shell text run by bash inside the job. */
  command: string;
  cpu?: number;
  /** Free-form size such as "16G" or "512M". */
  memory?: string;
  gpu?: number;
  timeLimitSeconds?: number;
  queue?: string;
  workdir?: string;
  stdout?: string;
  stderr?: string;
  mergeOutput?: boolean;
  env?: Record<string, string>;
  modules?: string[];
  dependencies?: string[];
  schedulerArgs?: Partial<Record<SchedulerName, string[]>>;
}

export interface JobArraySpec {
  job: JobSpec;
  start: number;
  end: number;
  step?: number;
  maxConcurrent?: number;
}

export interface JobResult {
  jobId: string;
  scheduler: SchedulerName;
  status: JobStatus;
  exitCode: number | null;
}

export interface ArrayJobResult {
  baseJobId: string;
  scheduler: SchedulerName;
  taskIds: string[];
}

export function arrayTaskIndices(array: JobArraySpec): number[] {
  const step = array.step ?? 1;
  if (!Number.isInteger(array.start) || !Number.isInteger(array.end) || !Number.isInteger(step) || step < 1) {
    throw new Error(`invalid array range: ${array.start}-${array.end}:${step}`);
  }
  if (array.end < array.start) throw new Error(`invalid array range: ${array.start}-${array.end}:${step}`);

  const indices: number[] = [];
  for (let i = array.start; i <= array.end; i += step) indices.push(i);
  return indices;
}

export function arrayTaskIds(baseJobId: string, array: JobArraySpec): string[] {
  return arrayTaskIndices(array).map((i) => `${baseJobId}.${i}`);
}

export function arrayRangeText(array: JobArraySpec): string {
  return `${array.start}-${array.end}:${array.step ?? 1}`;
}
