import path from "path";
import { AccountingNotAvailableError, JobNotFoundError } from "../../core/errors.js";
import {
  arrayTaskIds,
  type ArrayJobResult,
  type JobArraySpec,
  type JobResult,
  type JobSpec
} from "../../core/job.js";
import { createJobInfo, type JobInfo } from "../../core/jobInfo.js";
import { COMPLETE_STATUSES, isCompleteStatus, type JobStatus } from "../../core/jobStatus.js";
import {
  applyActiveFilter,
  applyCompletedFilter,
  requireJobId,
  requireQuery,
  runInteractive,
  runSubmission,
  tryQuery
} from "../common.js";
import { formatHourTimeLimit, renderJobScript, sanitizeJobName } from "../script.js";
import type { ActiveJobFilter, CompletedJobFilter, OutputStream, Scheduler, SchedulerDeps } from "../types.js";
import { parsePbsQstatFull, parsePbsQsubOutput, pbsRecordToJobInfo } from "./parser.js";

interface SubmittedPaths {
  stdout: string;
  stderr: string;
}

/** `123.4` (array task) → `123[4]`, the form qstat and qdel take. */
function toPbsJobId(jobId: string): string {
  const m = /^(\d+)\.(\d+)$/.exec(jobId);
  return m ? `${m[1]}[${m[2]}]` : jobId;
}

/** `16G` → `16gb`; PBS wants lower-case byte suffixes. */
export function pbsMemory(memory: string): string {
  const m = /^(\d+)\s*([KMGT])B?$/i.exec(memory.trim());
  if (!m) return memory;
  return `${m[1]}${(m[2] ?? "").toLowerCase()}b`;
}

export class PbsScheduler implements Scheduler {
  readonly name = "pbs" as const;
  private readonly submitted = new Map<string, SubmittedPaths>();

  constructor(private readonly deps: SchedulerDeps) {}

  private now(): Date {
    return this.deps.now ? this.deps.now() : new Date();
  }

  private submitOptions(job: JobSpec, array?: JobArraySpec): string[][] {
    const opts: string[][] = [];
    opts.push(["-N", sanitizeJobName(job.name)]);
    opts.push(["-S", "/bin/bash"]);
    if (job.cpu !== undefined) opts.push(["-l", `ncpus=${job.cpu}`]);
    if (job.memory) opts.push(["-l", `mem=${pbsMemory(job.memory)}`]);
    if (job.gpu !== undefined && job.gpu > 0) opts.push(["-l", `ngpus=${job.gpu}`]);
    if (job.timeLimitSeconds !== undefined) opts.push(["-l", `walltime=${formatHourTimeLimit(job.timeLimitSeconds)}`]);
    if (job.queue) opts.push(["-q", job.queue]);
    if (job.stdout) opts.push(["-o", job.stdout]);
    if (job.mergeOutput) opts.push(["-j", "oe"]);
    else if (job.stderr) opts.push(["-e", job.stderr]);
    if (job.dependencies?.length) opts.push(["-W", `depend=afterok:${job.dependencies.map(toPbsJobId).join(":")}`]);
    if (array) {
      const range = `${array.start}-${array.end}:${array.step ?? 1}`;
      opts.push(["-J", `${range}${array.maxConcurrent !== undefined ? `%${array.maxConcurrent}` : ""}`]);
    }
    return opts;
  }

  generateScript(job: JobSpec, array?: JobArraySpec): string {
    const directives = this.submitOptions(job, array).map((o) => `#PBS ${o.join(" ")}`);
    return renderJobScript(job, directives);
  }

  buildSubmitCommand(job: JobSpec, _array?: JobArraySpec): string[] {
    return ["qsub", ...(job.schedulerArgs?.pbs ?? [])];
  }

  private rememberPaths(jobId: string, job: JobSpec): void {
    const dir = job.workdir ?? process.cwd();
    const name = sanitizeJobName(job.name);
    const stdout = job.stdout ?? path.join(dir, `${name}.o${jobId}`);
    const stderr = job.mergeOutput ? stdout : (job.stderr ?? path.join(dir, `${name}.e${jobId}`));
    this.submitted.set(jobId, { stdout, stderr });
  }

  async submit(job: JobSpec, interactive = false): Promise<JobResult> {
    if (interactive) {
      const argv = [
        "qsub",
        "-I",
        ...this.submitOptions(job).flat(),
        ...(job.schedulerArgs?.pbs ?? []),
        "--",
        "/bin/bash",
        "-c",
        this.generateScript(job)
      ];
      return runInteractive(this.deps, this.name, argv, job.workdir);
    }

    const res = await runSubmission(this.deps, this.buildSubmitCommand(job), this.generateScript(job), job.workdir);
    const jobId = requireJobId(parsePbsQsubOutput(res.stdout), res, "qsub");
    this.rememberPaths(jobId, job);
    this.deps.logger.info(`submitted pbs job ${jobId} (${job.name})`);
    return { jobId, scheduler: this.name, status: "PENDING", exitCode: null };
  }

  async submitArray(array: JobArraySpec): Promise<ArrayJobResult> {
    const res = await runSubmission(
      this.deps,
      this.buildSubmitCommand(array.job, array),
      this.generateScript(array.job, array),
      array.job.workdir
    );
    const baseJobId = requireJobId(parsePbsQsubOutput(res.stdout), res, "qsub");
    const taskIds = arrayTaskIds(baseJobId, array);
    this.deps.logger.info(`submitted pbs array job ${baseJobId} (${taskIds.length} tasks)`);
    return { baseJobId, scheduler: this.name, taskIds };
  }

  /** `qstat -f` for one job; with job history enabled finished jobs are included via `-x`. */
  private async lookup(jobId: string): Promise<JobInfo | null> {
    const argv = this.deps.accounting ? ["qstat", "-x", "-f", toPbsJobId(jobId)] : ["qstat", "-f", toPbsJobId(jobId)];
    const res = await tryQuery(this.deps, argv);
    if (!res || res.exitCode !== 0) return null;
    const record = parsePbsQstatFull(res.stdout)[0];
    return record ? pbsRecordToJobInfo(record, this.now()) : null;
  }

  async getStatus(jobId: string): Promise<JobStatus> {
    const info = await this.lookup(jobId);
    return info?.status ?? "UNKNOWN";
  }

  async cancel(jobId: string): Promise<boolean> {
    const status = await this.getStatus(jobId);
    if (status !== "PENDING" && status !== "RUNNING") return false;

    const res = await tryQuery(this.deps, ["qdel", toPbsJobId(jobId)]);
    const ok = res !== null && res.exitCode === 0;
    if (ok) this.deps.logger.info(`cancelled pbs job ${jobId}`);
    return ok;
  }

  async getExitCode(jobId: string): Promise<number | null> {
    const info = await this.lookup(jobId);
    if (!info || !isCompleteStatus(info.status)) return null;
    return info.exitCode;
  }

  async getOutputPath(jobId: string, stream: OutputStream): Promise<string | null> {
    const info = await this.lookup(jobId);
    const fromQstat = stream === "stdout" ? info?.stdoutPath : info?.stderrPath;
    if (fromQstat) return fromQstat;

    const remembered = this.submitted.get(jobId);
    if (!remembered) return null;
    return stream === "stdout" ? remembered.stdout : remembered.stderr;
  }

  async listActiveJobs(filter: ActiveJobFilter = {}): Promise<JobInfo[]> {
    const res = await requireQuery(this.deps, ["qstat", "-f", "-t"]);
    const now = this.now();
    const jobs = parsePbsQstatFull(res.stdout).map((r) => pbsRecordToJobInfo(r, now));
    return applyActiveFilter(jobs, filter);
  }

  async listCompletedJobs(filter: CompletedJobFilter = {}): Promise<JobInfo[]> {
    if (!this.hasAccounting()) throw new AccountingNotAvailableError(this.name);

    const argv = ["qstat", "-x", "-f", "-t"];
    if (filter.user !== undefined) argv.push("-u", filter.user);
    const res = await requireQuery(this.deps, argv);
    const now = this.now();
    const jobs = parsePbsQstatFull(res.stdout)
      .map((r) => pbsRecordToJobInfo(r, now))
      .filter((j) => COMPLETE_STATUSES.has(j.status));
    return applyCompletedFilter(jobs, filter);
  }

  hasAccounting(): boolean {
    return this.deps.accounting;
  }

  async getJobDetails(jobId: string): Promise<JobInfo> {
    const info = await this.lookup(jobId);
    if (!info) throw new JobNotFoundError(jobId);

    const remembered = this.submitted.get(jobId);
    if (!remembered || (info.stdoutPath && info.stderrPath)) return info;
    return createJobInfo({
      ...info,
      stdoutPath: info.stdoutPath ?? remembered.stdout,
      stderrPath: info.stderrPath ?? remembered.stderr
    });
  }
}
