import type { ArrayJobResult, JobArraySpec, JobResult, JobSpec, SchedulerName } from "../core/job.js";
import type { JobInfo } from "../core/jobInfo.js";
import type { JobStatus } from "../core/jobStatus.js";
import type { CommandRunner } from "../execution/commandRunner.js";
import type { Logger } from "../core/logger.js";

export type OutputStream = "stdout" | "stderr";

export interface ActiveJobFilter {
  /** Username; omitted means every user. */
  user?: string;
  /** Omitted means the active partition (PENDING, RUNNING, UNKNOWN). */
  status?: ReadonlySet<JobStatus>;
  queue?: string;
}

export interface CompletedJobFilter {
  user?: string;
  /** Inclusive lower bound on completion time. */
  since?: Date;
  /** Inclusive upper bound on completion time. */
  until?: Date;
  exitCode?: number;
  queue?: string;
  limit?: number;
}

export interface Scheduler {
  readonly name: SchedulerName;

  submit(job: JobSpec, interactive?: boolean): Promise<JobResult>;
  submitArray(array: JobArraySpec): Promise<ArrayJobResult>;
  cancel(jobId: string): Promise<boolean>;
  getStatus(jobId: string): Promise<JobStatus>;
  getExitCode(jobId: string): Promise<number | null>;
  getOutputPath(jobId: string, stream: OutputStream): Promise<string | null>;
  generateScript(job: JobSpec, array?: JobArraySpec): string;
  buildSubmitCommand(job: JobSpec, array?: JobArraySpec): string[];

  listActiveJobs(filter?: ActiveJobFilter): Promise<JobInfo[]>;
  listCompletedJobs(filter?: CompletedJobFilter): Promise<JobInfo[]>;
  hasAccounting(): boolean;
  getJobDetails(jobId: string): Promise<JobInfo>;
}

export interface SchedulerDeps {
  runner: CommandRunner;
  logger: Logger;
  /** Bounded timeout for every query command. */
  commandTimeoutSeconds: number;
  /** Decided once when the adapter is built so `hasAccounting()` stays pure. */
  accounting: boolean;
  now?: () => Date;
}
