import { spawn } from "child_process";
import { promises as fs } from "fs";
import type { FileHandle } from "fs/promises";
import os from "os";
import path from "path";
import { AccountingNotAvailableError, JobNotFoundError, SubmissionError } from "../../core/errors.js";
import {
  arrayTaskIndices,
  type ArrayJobResult,
  type JobArraySpec,
  type JobResult,
  type JobSpec
} from "../../core/job.js";
import { createJobInfo, elapsedSeconds, type JobInfo } from "../../core/jobInfo.js";
import type { JobStatus } from "../../core/jobStatus.js";
import { applyActiveFilter, runInteractive } from "../common.js";
import { renderJobScript, sanitizeJobName } from "../script.js";
import type { ActiveJobFilter, CompletedJobFilter, OutputStream, Scheduler, SchedulerDeps } from "../types.js";

export interface LaunchRequest {
  script: string;
  cwd: string;
  env: Record<string, string>;
  stdoutPath: string;
  stderrPath: string;
}

export interface LaunchedProcess {
  readonly pid: number | null;
  kill(): void;
  /** Resolves with the exit code; a signal death reports 128 + signal number. */
  readonly exited: Promise<number>;
}

export interface LocalLauncher {
  launch(request: LaunchRequest): Promise<LaunchedProcess>;
}

function signalExitCode(signal: NodeJS.Signals | null): number {
  if (!signal) return 1;
  const n = os.constants.signals[signal];
  return typeof n === "number" ? 128 + n : 1;
}

/** Runs `bash -c <script>` detached from our stdio, output redirected to files. */
export class SpawnLauncher implements LocalLauncher {
  async launch(request: LaunchRequest): Promise<LaunchedProcess> {
    await fs.mkdir(path.dirname(request.stdoutPath), { recursive: true });
    await fs.mkdir(path.dirname(request.stderrPath), { recursive: true });

    let out: FileHandle | null = null;
    let err: FileHandle | null = null;
    try {
      out = await fs.open(request.stdoutPath, "w");
      err = request.stderrPath === request.stdoutPath ? out : await fs.open(request.stderrPath, "w");

      const child = spawn("bash", ["-c", request.script], {
        cwd: request.cwd,
        env: { ...process.env, ...request.env },
        stdio: ["ignore", out.fd, err.fd]
      });

      const exited = new Promise<number>((resolve) => {
        child.on("error", () => resolve(127));
        child.on("close", (code: number | null, signal: NodeJS.Signals | null) => resolve(code ?? signalExitCode(signal)));
      });

      return {
        pid: child.pid ?? null,
        kill: () => {
          child.kill("SIGTERM");
        },
        exited
      };
    } finally {
      // The child holds its own copies of the descriptors.
      await out?.close();
      if (err && err !== out) await err.close();
    }
  }
}

interface LocalJob {
  jobId: string;
  name: string;
  user: string;
  status: JobStatus;
  submitTime: Date;
  startTime: Date | null;
  endTime: Date | null;
  exitCode: number | null;
  cpu: number | null;
  memory: string | null;
  gpu: number | null;
  stdoutPath: string;
  stderrPath: string;
  dependencies: string[] | null;
  arrayTaskId: string | null;
  process: LaunchedProcess | null;
  /** Settles when the job reaches a terminal state. */
  done: Promise<void>;
}

export interface LocalSchedulerOptions {
  /** Directory for output files when the job names none; defaults to the job's workdir. */
  outputDir?: string | null;
  launcher?: LocalLauncher;
  /** Finished jobs kept for status queries before the oldest are forgotten. */
  retainFinished?: number;
}

const DEFAULT_RETAIN_FINISHED = 1000;

function currentUser(): string {
  try {
    return os.userInfo().username;
  } catch {
    return process.env.USER ?? "unknown";
  }
}

/**
 * Runs jobs as child processes of this process. State lives only in memory, so
 * nothing survives a restart and there is no accounting.
 */
export class LocalScheduler implements Scheduler {
  readonly name = "local" as const;
  private readonly jobs = new Map<string, LocalJob>();
  /** Terminal job ids, oldest first. */
  private finished: string[] = [];
  private readonly launcher: LocalLauncher;
  private readonly outputDir: string | null;
  private readonly retainFinished: number;
  private readonly user = currentUser();
  private nextId = 1;

  constructor(
    private readonly deps: SchedulerDeps,
    options: LocalSchedulerOptions = {}
  ) {
    this.launcher = options.launcher ?? new SpawnLauncher();
    this.outputDir = options.outputDir ?? null;
    this.retainFinished = Math.max(0, options.retainFinished ?? DEFAULT_RETAIN_FINISHED);
  }

  private now(): Date {
    return this.deps.now ? this.deps.now() : new Date();
  }

  generateScript(job: JobSpec, _array?: JobArraySpec): string {
    return renderJobScript(job, []);
  }

  buildSubmitCommand(job: JobSpec, array?: JobArraySpec): string[] {
    return ["bash", "-c", this.generateScript(job, array), ...(job.schedulerArgs?.local ?? [])];
  }

  private outputPaths(jobId: string, job: JobSpec): { stdout: string; stderr: string } {
    const dir = this.outputDir ?? job.workdir ?? process.cwd();
    const name = sanitizeJobName(job.name);
    const stdout = job.stdout ?? path.join(dir, `${name}.o${jobId}`);
    const stderr = job.mergeOutput ? stdout : (job.stderr ?? path.join(dir, `${name}.e${jobId}`));
    return { stdout, stderr };
  }

  private register(jobId: string, job: JobSpec, arrayTaskId: string | null): LocalJob {
    const paths = this.outputPaths(jobId, job);
    const entry: LocalJob = {
      jobId,
      name: job.name,
      user: this.user,
      status: "PENDING",
      submitTime: this.now(),
      startTime: null,
      endTime: null,
      exitCode: null,
      cpu: job.cpu ?? null,
      memory: job.memory ?? null,
      gpu: job.gpu ?? null,
      stdoutPath: paths.stdout,
      stderrPath: paths.stderr,
      dependencies: job.dependencies?.length ? [...job.dependencies] : null,
      arrayTaskId,
      process: null,
      done: Promise.resolve()
    };
    this.jobs.set(jobId, entry);
    return entry;
  }

  private finish(entry: LocalJob, status: JobStatus, exitCode: number | null): void {
    entry.status = status;
    entry.exitCode = exitCode;
    entry.endTime = this.now();
    entry.process = null;
    this.finished.push(entry.jobId);
    this.prune();
  }

  /** Drops the oldest finished jobs over the cap, except those an unfinished job still waits on. */
  private prune(): void {
    let excess = this.finished.length - this.retainFinished;
    if (excess <= 0) return;

    const awaited = new Set<string>();
    for (const job of this.jobs.values()) {
      if (job.status === "PENDING" || job.status === "RUNNING") job.dependencies?.forEach((d) => awaited.add(d));
    }

    this.finished = this.finished.filter((jobId) => {
      if (excess <= 0 || awaited.has(jobId)) return true;
      this.jobs.delete(jobId);
      excess -= 1;
      return false;
    });
  }

  private static cancelled(entry: LocalJob): boolean {
    return entry.status === "CANCELLED";
  }

  /** Waits for dependencies, then runs the script; resolves once the job is terminal. */
  private async execute(entry: LocalJob, job: JobSpec, env: Record<string, string>): Promise<void> {
    for (const dep of entry.dependencies ?? []) {
      const upstream = this.jobs.get(dep);
      if (upstream) await upstream.done;
    }
    if (LocalScheduler.cancelled(entry)) return;

    const failedDep = (entry.dependencies ?? []).find((dep) => {
      const upstream = this.jobs.get(dep);
      return upstream !== undefined && upstream.status !== "COMPLETED";
    });
    if (failedDep !== undefined) {
      this.deps.logger.warn(`local job ${entry.jobId} not run: dependency ${failedDep} did not complete`);
      this.finish(entry, "CANCELLED", null);
      return;
    }

    let proc: LaunchedProcess;
    try {
      proc = await this.launcher.launch({
        script: this.generateScript(job),
        cwd: job.workdir ?? process.cwd(),
        env: { ...env, HPC_JOB_ID: entry.jobId },
        stdoutPath: entry.stdoutPath,
        stderrPath: entry.stderrPath
      });
    } catch (e) {
      this.deps.logger.error(`local job ${entry.jobId} failed to start: ${e instanceof Error ? e.message : String(e)}`);
      this.finish(entry, "FAILED", null);
      return;
    }

    // cancel() may have landed while the launcher was opening files.
    if (LocalScheduler.cancelled(entry)) {
      proc.kill();
      await proc.exited;
      return;
    }

    entry.status = "RUNNING";
    entry.startTime = this.now();
    entry.process = proc;

    const code = await proc.exited;
    if (LocalScheduler.cancelled(entry)) {
      entry.exitCode = code;
      entry.process = null;
      return;
    }
    this.finish(entry, code === 0 ? "COMPLETED" : "FAILED", code);
  }

  private start(entry: LocalJob, job: JobSpec, env: Record<string, string>, after?: Promise<void>): void {
    entry.done = (after ?? Promise.resolve())
      .then(() => this.execute(entry, job, env))
      .catch((e: unknown) => {
        this.deps.logger.error(`local job ${entry.jobId}: ${e instanceof Error ? e.message : String(e)}`);
        if (entry.status === "PENDING" || entry.status === "RUNNING") this.finish(entry, "FAILED", null);
      });
  }

  async submit(job: JobSpec, interactive = false): Promise<JobResult> {
    if (!job.command.trim()) throw new SubmissionError("job command must be non-empty");

    if (interactive) {
      return runInteractive(this.deps, this.name, ["bash", "-c", this.generateScript(job)], job.workdir);
    }

    const jobId = String(this.nextId++);
    const entry = this.register(jobId, job, null);
    this.start(entry, job, { ...job.env });
    this.deps.logger.info(`started local job ${jobId} (${job.name})`);
    return { jobId, scheduler: this.name, status: "PENDING", exitCode: null };
  }

  async submitArray(array: JobArraySpec): Promise<ArrayJobResult> {
    if (!array.job.command.trim()) throw new SubmissionError("job command must be non-empty");
    const indices = arrayTaskIndices(array);

    const baseJobId = String(this.nextId++);
    const limit = array.maxConcurrent !== undefined && array.maxConcurrent > 0 ? array.maxConcurrent : indices.length;
    const entries = indices.map((i) => this.register(`${baseJobId}.${i}`, array.job, String(i)));

    // Task k waits for task k - limit, so at most `limit` run at once.
    entries.forEach((entry, k) => {
      const gate = k >= limit ? entries[k - limit]?.done : undefined;
      this.start(entry, array.job, { ...array.job.env, HPC_ARRAY_TASK_ID: entry.arrayTaskId ?? "" }, gate);
    });

    this.deps.logger.info(`started local array job ${baseJobId} (${entries.length} tasks)`);
    return { baseJobId, scheduler: this.name, taskIds: entries.map((e) => e.jobId) };
  }

  async cancel(jobId: string): Promise<boolean> {
    const entry = this.jobs.get(jobId);
    if (!entry || (entry.status !== "PENDING" && entry.status !== "RUNNING")) return false;

    const proc = entry.process;
    this.finish(entry, "CANCELLED", null);
    proc?.kill();
    this.deps.logger.info(`cancelled local job ${jobId}`);
    return true;
  }

  async getStatus(jobId: string): Promise<JobStatus> {
    return this.jobs.get(jobId)?.status ?? "UNKNOWN";
  }

  async getExitCode(jobId: string): Promise<number | null> {
    const entry = this.jobs.get(jobId);
    if (!entry || entry.status === "PENDING" || entry.status === "RUNNING") return null;
    return entry.exitCode;
  }

  async getOutputPath(jobId: string, stream: OutputStream): Promise<string | null> {
    const entry = this.jobs.get(jobId);
    if (!entry) return null;
    return stream === "stdout" ? entry.stdoutPath : entry.stderrPath;
  }

  private toJobInfo(entry: LocalJob, now: Date): JobInfo {
    return createJobInfo({
      jobId: entry.jobId,
      name: entry.name,
      user: entry.user,
      status: entry.status,
      queue: "local",
      submitTime: entry.submitTime,
      startTime: entry.startTime,
      endTime: entry.endTime,
      runtimeSeconds: elapsedSeconds(entry.startTime, entry.endTime ?? now),
      cpu: entry.cpu,
      memory: entry.memory,
      gpu: entry.gpu,
      exitCode: entry.exitCode,
      stdoutPath: entry.stdoutPath,
      stderrPath: entry.stderrPath,
      node: entry.startTime ? os.hostname() : null,
      dependencies: entry.dependencies,
      arrayTaskId: entry.arrayTaskId
    });
  }

  async listActiveJobs(filter: ActiveJobFilter = {}): Promise<JobInfo[]> {
    const now = this.now();
    return applyActiveFilter(
      [...this.jobs.values()].map((e) => this.toJobInfo(e, now)),
      filter
    );
  }

  async listCompletedJobs(_filter: CompletedJobFilter = {}): Promise<JobInfo[]> {
    throw new AccountingNotAvailableError(this.name);
  }

  hasAccounting(): boolean {
    return false;
  }

  async getJobDetails(jobId: string): Promise<JobInfo> {
    const entry = this.jobs.get(jobId);
    if (!entry) throw new JobNotFoundError(jobId);
    return this.toJobInfo(entry, this.now());
  }

  /** Resolves once every job submitted so far is terminal. */
  async drain(): Promise<void> {
    await Promise.all([...this.jobs.values()].map((e) => e.done));
  }
}
