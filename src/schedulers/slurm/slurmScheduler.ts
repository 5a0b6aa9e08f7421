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
import { isCompleteStatus, type JobStatus } from "../../core/jobStatus.js";
import {
  applyActiveFilter,
  applyCompletedFilter,
  expandPathTokens,
  requireJobId,
  requireQuery,
  runInteractive,
  runSubmission,
  tryQuery
} from "../common.js";
import { formatDayTimeLimit, renderJobScript, sanitizeJobName } from "../script.js";
import type { ActiveJobFilter, CompletedJobFilter, OutputStream, Scheduler, SchedulerDeps } from "../types.js";
import {
  SACCT_FIELDS,
  SQUEUE_FORMAT,
  parseSacct,
  parseSbatchOutput,
  parseScontrolJob,
  parseSqueue,
  sacctRowToJobInfo,
  scontrolToJobInfo,
  slurmStateToStatus,
  squeueRowToJobInfo
} from "./parser.js";

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

/** sacct wants local `YYYY-MM-DDTHH:MM:SS`. */
function sacctTime(d: Date): string {
  return (
    `${d.getFullYear()}-${pad2(d.getMonth() + 1)}-${pad2(d.getDate())}` +
    `T${pad2(d.getHours())}:${pad2(d.getMinutes())}:${pad2(d.getSeconds())}`
  );
}

/** Slurm names array tasks `123_4`; the uniform task id form is `123.4`. */
function toSlurmJobId(jobId: string): string {
  const m = /^(\d+)\.(\d+)$/.exec(jobId);
  return m ? `${m[1]}_${m[2]}` : jobId;
}

interface SubmittedPaths {
  stdout: string;
  stderr: string;
}

export class SlurmScheduler implements Scheduler {
  readonly name = "slurm" as const;
  private readonly submitted = new Map<string, SubmittedPaths>();

  constructor(private readonly deps: SchedulerDeps) {}

  private now(): Date {
    return this.deps.now ? this.deps.now() : new Date();
  }

  private submitOptions(job: JobSpec, array?: JobArraySpec): string[] {
    const opts: string[] = [];
    opts.push(`--job-name=${sanitizeJobName(job.name)}`);
    if (job.cpu !== undefined) opts.push(`--cpus-per-task=${job.cpu}`);
    if (job.memory) opts.push(`--mem=${job.memory}`);
    if (job.timeLimitSeconds !== undefined) opts.push(`--time=${formatDayTimeLimit(job.timeLimitSeconds)}`);
    if (job.gpu !== undefined && job.gpu > 0) opts.push(`--gres=gpu:${job.gpu}`);
    if (job.queue) opts.push(`--partition=${job.queue}`);
    if (job.workdir) opts.push(`--chdir=${job.workdir}`);
    if (job.stdout) opts.push(`--output=${job.stdout}`);
    if (job.stderr && !job.mergeOutput) opts.push(`--error=${job.stderr}`);
    if (job.dependencies?.length) opts.push(`--dependency=afterok:${job.dependencies.map(toSlurmJobId).join(":")}`);
    if (array) {
      const range = `${array.start}-${array.end}:${array.step ?? 1}`;
      opts.push(`--array=${range}${array.maxConcurrent !== undefined ? `%${array.maxConcurrent}` : ""}`);
    }
    return opts;
  }

  generateScript(job: JobSpec, array?: JobArraySpec): string {
    const directives = this.submitOptions(job, array).map((o) => `#SBATCH ${o}`);
    return renderJobScript(job, directives);
  }

  buildSubmitCommand(job: JobSpec, _array?: JobArraySpec): string[] {
    return ["sbatch", "--parsable", ...(job.schedulerArgs?.slurm ?? [])];
  }

  private rememberPaths(jobId: string, job: JobSpec): void {
    const dir = job.workdir ?? process.cwd();
    const tokens = { "%j": jobId, "%A": jobId, "%x": sanitizeJobName(job.name) };
    const stdout = job.stdout ? expandPathTokens(job.stdout, tokens) : path.join(dir, `slurm-${jobId}.out`);
    // Without --error, sbatch writes stderr into the stdout file.
    const stderr = job.stderr && !job.mergeOutput ? expandPathTokens(job.stderr, tokens) : stdout;
    this.submitted.set(jobId, { stdout, stderr });
  }

  async submit(job: JobSpec, interactive = false): Promise<JobResult> {
    if (interactive) {
      const argv = [
        "srun",
        ...this.submitOptions(job),
        ...(job.schedulerArgs?.slurm ?? []),
        "bash",
        "-c",
        this.generateScript(job)
      ];
      return runInteractive(this.deps, this.name, argv, job.workdir);
    }

    const res = await runSubmission(this.deps, this.buildSubmitCommand(job), this.generateScript(job), job.workdir);
    const jobId = requireJobId(parseSbatchOutput(res.stdout), res, "sbatch");
    this.rememberPaths(jobId, job);
    this.deps.logger.info(`submitted slurm job ${jobId} (${job.name})`);
    return { jobId, scheduler: this.name, status: "PENDING", exitCode: null };
  }

  async submitArray(array: JobArraySpec): Promise<ArrayJobResult> {
    const res = await runSubmission(
      this.deps,
      this.buildSubmitCommand(array.job, array),
      this.generateScript(array.job, array),
      array.job.workdir
    );
    const baseJobId = requireJobId(parseSbatchOutput(res.stdout), res, "sbatch");
    const taskIds = arrayTaskIds(baseJobId, array);
    this.deps.logger.info(`submitted slurm array job ${baseJobId} (${taskIds.length} tasks)`);
    return { baseJobId, scheduler: this.name, taskIds };
  }

  private async sacctRows(argv: string[]): Promise<ReturnType<typeof parseSacct> | null> {
    const res = await tryQuery(this.deps, argv);
    if (!res || res.exitCode !== 0) return null;
    return parseSacct(res.stdout);
  }

  private sacctJobArgv(jobId: string): string[] {
    return ["sacct", "-X", "-n", "-P", "-j", toSlurmJobId(jobId), "-o", SACCT_FIELDS.join(",")];
  }

  async getStatus(jobId: string): Promise<JobStatus> {
    const slurmId = toSlurmJobId(jobId);
    const squeue = await tryQuery(this.deps, ["squeue", "-h", "-j", slurmId, "-o", "%T"]);
    const state = squeue && squeue.exitCode === 0 ? (squeue.stdout.trim().split("\n")[0] ?? "").trim() : "";
    if (state) return slurmStateToStatus(state);

    if (!this.deps.accounting) return "UNKNOWN";
    const rows = await this.sacctRows(this.sacctJobArgv(jobId));
    const row = rows?.find((r) => r.jobId === slurmId) ?? rows?.[0];
    return row ? slurmStateToStatus(row.state) : "UNKNOWN";
  }

  async cancel(jobId: string): Promise<boolean> {
    const status = await this.getStatus(jobId);
    if (status !== "PENDING" && status !== "RUNNING") return false;

    const res = await tryQuery(this.deps, ["scancel", toSlurmJobId(jobId)]);
    const ok = res !== null && res.exitCode === 0;
    if (ok) this.deps.logger.info(`cancelled slurm job ${jobId}`);
    return ok;
  }

  async getExitCode(jobId: string): Promise<number | null> {
    const status = await this.getStatus(jobId);
    if (!isCompleteStatus(status)) return null;
    const details = await this.findDetails(jobId);
    return details?.exitCode ?? null;
  }

  /** scontrol paths with filename patterns expanded, else the paths recorded at submission. */
  private outputPaths(jobId: string, details: JobInfo | null): { stdout: string | null; stderr: string | null } {
    const [base, task] = toSlurmJobId(jobId).split("_");
    const tokens = { "%j": jobId, "%A": base ?? jobId, "%a": task ?? "", "%x": details?.name ?? "" };
    const remembered = this.submitted.get(jobId);
    return {
      stdout: details?.stdoutPath ? expandPathTokens(details.stdoutPath, tokens) : (remembered?.stdout ?? null),
      stderr: details?.stderrPath ? expandPathTokens(details.stderrPath, tokens) : (remembered?.stderr ?? null)
    };
  }

  async getOutputPath(jobId: string, stream: OutputStream): Promise<string | null> {
    const paths = this.outputPaths(jobId, await this.scontrolDetails(jobId));
    return stream === "stdout" ? paths.stdout : paths.stderr;
  }

  async listActiveJobs(filter: ActiveJobFilter = {}): Promise<JobInfo[]> {
    const res = await requireQuery(this.deps, ["squeue", "-h", "-a", "-o", SQUEUE_FORMAT]);
    const now = this.now();
    const jobs = parseSqueue(res.stdout).map((row) => squeueRowToJobInfo(row, now));
    return applyActiveFilter(jobs, filter);
  }

  async listCompletedJobs(filter: CompletedJobFilter = {}): Promise<JobInfo[]> {
    if (!this.hasAccounting()) throw new AccountingNotAvailableError(this.name);

    const argv = ["sacct", "-X", "-n", "-P", "-o", SACCT_FIELDS.join(",")];
    argv.push("--state=CD,F,CA,TO,NF,OOM,BF,PR,DL");
    if (filter.user !== undefined) argv.push("-u", filter.user);
    else argv.push("-a");
    if (filter.queue !== undefined) argv.push("-r", filter.queue);
    // sacct defaults to midnight today; widen the window to the requested bounds.
    argv.push("-S", sacctTime(filter.since ?? new Date(this.now().getTime() - 7 * 86_400_000)));
    if (filter.until) argv.push("-E", sacctTime(filter.until));

    const res = await requireQuery(this.deps, argv);
    const jobs = parseSacct(res.stdout).map(sacctRowToJobInfo);
    return applyCompletedFilter(jobs, filter);
  }

  hasAccounting(): boolean {
    return this.deps.accounting;
  }

  private async scontrolDetails(jobId: string): Promise<JobInfo | null> {
    const res = await tryQuery(this.deps, ["scontrol", "show", "job", toSlurmJobId(jobId)]);
    if (!res || res.exitCode !== 0 || !res.stdout.trim()) return null;
    return scontrolToJobInfo(parseScontrolJob(res.stdout), this.now());
  }

  private async findDetails(jobId: string): Promise<JobInfo | null> {
    const live = await this.scontrolDetails(jobId);
    if (live) return live;

    if (!this.deps.accounting) return null;
    const slurmId = toSlurmJobId(jobId);
    const rows = await this.sacctRows(this.sacctJobArgv(jobId));
    const row = rows?.find((r) => r.jobId === slurmId) ?? rows?.[0];
    return row ? sacctRowToJobInfo(row) : null;
  }

  async getJobDetails(jobId: string): Promise<JobInfo> {
    const details = await this.findDetails(jobId);
    if (!details) throw new JobNotFoundError(jobId);
    const paths = this.outputPaths(jobId, details);
    return createJobInfo({ ...details, stdoutPath: paths.stdout, stderrPath: paths.stderr });
  }
}
