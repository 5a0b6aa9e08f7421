import path from "path";
import { AccountingNotAvailableError, JobNotFoundError, SchedulerQueryError } from "../../core/errors.js";
import {
  arrayRangeText,
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
import { formatHourTimeLimit, renderJobScript, sanitizeJobName } from "../script.js";
import type { ActiveJobFilter, CompletedJobFilter, OutputStream, Scheduler, SchedulerDeps } from "../types.js";
import {
  isWellFormedXml,
  parseQacctRecords,
  parseQstatJobDetail,
  parseQstatPlain,
  parseQstatXml,
  parseQsubOutput,
  sgeAccountingStatus,
  sgeAccountingToJobInfo,
  sgeDetailFields,
  sgeRecordToJobInfo,
  sgeStateToStatus,
  type SgeAccountingRecord,
  type SgeJobRecord
} from "./parser.js";

export interface SgeSchedulerOptions {
  /** Parallel environment used for multi-slot jobs. */
  parallelEnvironment?: string;
}

interface SubmittedPaths {
  stdout: string;
  stderr: string;
}

function splitTaskId(jobId: string): { base: string; task: string | null } {
  const m = /^(\d+)\.(\d+)$/.exec(jobId);
  if (m?.[1] && m[2]) return { base: m[1], task: m[2] };
  return { base: jobId, task: null };
}

export class SgeScheduler implements Scheduler {
  readonly name = "sge" as const;
  private readonly parallelEnvironment: string;
  private readonly submitted = new Map<string, SubmittedPaths>();

  constructor(
    private readonly deps: SchedulerDeps,
    options: SgeSchedulerOptions = {}
  ) {
    this.parallelEnvironment = options.parallelEnvironment ?? "smp";
  }

  private now(): Date {
    return this.deps.now ? this.deps.now() : new Date();
  }

  private submitOptions(job: JobSpec, array?: JobArraySpec): string[][] {
    const opts: string[][] = [];
    opts.push(["-N", sanitizeJobName(job.name)]);
    opts.push(["-S", "/bin/bash"]);
    opts.push(job.workdir ? ["-wd", job.workdir] : ["-cwd"]);
    if (job.cpu !== undefined && job.cpu > 1) opts.push(["-pe", this.parallelEnvironment, String(job.cpu)]);
    if (job.memory) opts.push(["-l", `h_vmem=${job.memory}`]);
    if (job.timeLimitSeconds !== undefined) opts.push(["-l", `h_rt=${formatHourTimeLimit(job.timeLimitSeconds)}`]);
    if (job.gpu !== undefined && job.gpu > 0) opts.push(["-l", `gpu=${job.gpu}`]);
    if (job.queue) opts.push(["-q", job.queue]);
    if (job.stdout) opts.push(["-o", job.stdout]);
    if (job.mergeOutput) opts.push(["-j", "y"]);
    else if (job.stderr) opts.push(["-e", job.stderr]);
    if (job.dependencies?.length) opts.push(["-hold_jid", job.dependencies.join(",")]);
    if (array) {
      opts.push(["-t", arrayRangeText(array)]);
      if (array.maxConcurrent !== undefined) opts.push(["-tc", String(array.maxConcurrent)]);
    }
    return opts;
  }

  generateScript(job: JobSpec, array?: JobArraySpec): string {
    const directives = this.submitOptions(job, array).map((o) => `#$ ${o.join(" ")}`);
    return renderJobScript(job, directives);
  }

  buildSubmitCommand(job: JobSpec, _array?: JobArraySpec): string[] {
    // Directives live in the script, which qsub reads from stdin.
    return ["qsub", ...(job.schedulerArgs?.sge ?? [])];
  }

  private rememberPaths(jobId: string, job: JobSpec): void {
    const dir = job.workdir ?? process.cwd();
    const name = sanitizeJobName(job.name);
    const tokens = { $JOB_ID: jobId, $JOB_NAME: name };
    const stdout = job.stdout ? expandPathTokens(job.stdout, tokens) : path.join(dir, `${name}.o${jobId}`);
    const stderr = job.mergeOutput
      ? stdout
      : job.stderr
        ? expandPathTokens(job.stderr, tokens)
        : path.join(dir, `${name}.e${jobId}`);
    this.submitted.set(jobId, { stdout, stderr });
  }

  async submit(job: JobSpec, interactive = false): Promise<JobResult> {
    if (interactive) {
      const argv = [
        "qrsh",
        "-now",
        "no",
        ...this.submitOptions(job).flat(),
        ...(job.schedulerArgs?.sge ?? []),
        "bash",
        "-c",
        this.generateScript(job)
      ];
      return runInteractive(this.deps, this.name, argv, job.workdir);
    }

    const res = await runSubmission(this.deps, this.buildSubmitCommand(job), this.generateScript(job), job.workdir);
    const jobId = requireJobId(parseQsubOutput(res.stdout), res, "qsub");
    this.rememberPaths(jobId, job);
    this.deps.logger.info(`submitted sge job ${jobId} (${job.name})`);
    return { jobId, scheduler: this.name, status: "PENDING", exitCode: null };
  }

  async submitArray(array: JobArraySpec): Promise<ArrayJobResult> {
    const res = await runSubmission(
      this.deps,
      this.buildSubmitCommand(array.job, array),
      this.generateScript(array.job, array),
      array.job.workdir
    );
    const baseJobId = requireJobId(parseQsubOutput(res.stdout), res, "qsub");
    const taskIds = arrayTaskIds(baseJobId, array);
    this.deps.logger.info(`submitted sge array job ${baseJobId} (${taskIds.length} tasks)`);
    return { baseJobId, scheduler: this.name, taskIds };
  }

  private async liveRecords(): Promise<Map<string, SgeJobRecord> | null> {
    const res = await tryQuery(this.deps, ["qstat", "-xml", "-u", "*"]);
    if (!res || res.exitCode !== 0) return null;
    return parseQstatXml(res.stdout);
  }

  private findLive(records: Map<string, SgeJobRecord>, jobId: string): SgeJobRecord | null {
    const direct = records.get(jobId);
    if (direct) return direct;
    const { base, task } = splitTaskId(jobId);
    if (task) return null;
    for (const r of records.values()) {
      if (r.jobId === base) return r;
    }
    return null;
  }

  private async accountingRecord(jobId: string): Promise<SgeAccountingRecord | null> {
    if (!this.deps.accounting) return null;
    const { base, task } = splitTaskId(jobId);
    const argv = task ? ["qacct", "-j", base, "-t", task] : ["qacct", "-j", base];
    const res = await tryQuery(this.deps, argv);
    if (!res || res.exitCode !== 0) return null;
    const records = parseQacctRecords(res.stdout);
    // A re-run job can appear more than once; the last record is the latest run.
    return records[records.length - 1] ?? null;
  }

  async getStatus(jobId: string): Promise<JobStatus> {
    const live = await this.liveRecords();
    const record = live ? this.findLive(live, jobId) : null;
    if (record) return record.state ? sgeStateToStatus(record.state) : "UNKNOWN";

    const acct = await this.accountingRecord(jobId);
    if (acct) return sgeAccountingStatus(acct);
    return "UNKNOWN";
  }

  async cancel(jobId: string): Promise<boolean> {
    const status = await this.getStatus(jobId);
    if (status !== "PENDING" && status !== "RUNNING") return false;

    const { base, task } = splitTaskId(jobId);
    const argv = task ? ["qdel", base, "-t", task] : ["qdel", base];
    const res = await tryQuery(this.deps, argv);
    const ok = res !== null && res.exitCode === 0;
    if (ok) this.deps.logger.info(`cancelled sge job ${jobId}`);
    return ok;
  }

  async getExitCode(jobId: string): Promise<number | null> {
    const status = await this.getStatus(jobId);
    if (!isCompleteStatus(status)) return null;
    const acct = await this.accountingRecord(jobId);
    return acct ? sgeAccountingToJobInfo(acct).exitCode : null;
  }

  private async detailFields(jobId: string): Promise<ReturnType<typeof sgeDetailFields> | null> {
    const { base } = splitTaskId(jobId);
    const res = await tryQuery(this.deps, ["qstat", "-j", base]);
    if (!res || res.exitCode !== 0) return null;
    return sgeDetailFields(parseQstatJobDetail(res.stdout));
  }

  /** `qstat -j` paths with `$JOB_ID` and `$TASK_ID` expanded, else the paths recorded at submission. */
  private outputPaths(
    jobId: string,
    detail: ReturnType<typeof sgeDetailFields> | null
  ): { stdout: string | null; stderr: string | null } {
    const { base, task } = splitTaskId(jobId);
    const tokens = { $JOB_ID: base, $TASK_ID: task ?? "undefined" };
    const remembered = this.submitted.get(base);
    return {
      stdout: detail?.stdoutPath ? expandPathTokens(detail.stdoutPath, tokens) : (remembered?.stdout ?? null),
      stderr: detail?.stderrPath ? expandPathTokens(detail.stderrPath, tokens) : (remembered?.stderr ?? null)
    };
  }

  async getOutputPath(jobId: string, stream: OutputStream): Promise<string | null> {
    const paths = this.outputPaths(jobId, await this.detailFields(jobId));
    return stream === "stdout" ? paths.stdout : paths.stderr;
  }

  async listActiveJobs(filter: ActiveJobFilter = {}): Promise<JobInfo[]> {
    const xml = await tryQuery(this.deps, ["qstat", "-xml", "-u", "*"]);
    if (!xml) throw new SchedulerQueryError("qstat -xml did not complete", ["qstat", "-xml", "-u", "*"]);

    let records: Map<string, SgeJobRecord>;
    if (xml.exitCode === 0 && xml.stdout.trimStart().startsWith("<")) {
      // A truncated document is a failed query, not an empty queue.
      if (!isWellFormedXml(xml.stdout)) {
        throw new SchedulerQueryError("qstat -xml returned a malformed document", ["qstat", "-xml", "-u", "*"]);
      }
      records = parseQstatXml(xml.stdout);
    } else {
      // Some qstat builds lack -xml; fall back to the fixed-width listing.
      const plain = await requireQuery(this.deps, ["qstat", "-u", "*"]);
      records = parseQstatPlain(plain.stdout);
    }

    const now = this.now();
    const jobs = [...records.values()].map((r) => sgeRecordToJobInfo(r, now));
    return applyActiveFilter(jobs, filter);
  }

  async listCompletedJobs(filter: CompletedJobFilter = {}): Promise<JobInfo[]> {
    if (!this.hasAccounting()) throw new AccountingNotAvailableError(this.name);

    const argv = ["qacct", "-j", "*"];
    if (filter.user !== undefined) argv.push("-o", filter.user);
    if (filter.queue !== undefined) argv.push("-q", filter.queue);
    if (filter.since) {
      const days = Math.max(1, Math.ceil((this.now().getTime() - filter.since.getTime()) / 86_400_000));
      argv.push("-d", String(days));
    }

    const res = await tryQuery(this.deps, argv);
    if (!res) throw new SchedulerQueryError("qacct did not complete", argv);
    // qacct exits non-zero when nothing matches.
    if (res.exitCode !== 0 && !res.stdout.trim()) return [];

    const jobs = parseQacctRecords(res.stdout).map(sgeAccountingToJobInfo);
    return applyCompletedFilter(jobs, filter);
  }

  hasAccounting(): boolean {
    return this.deps.accounting;
  }

  async getJobDetails(jobId: string): Promise<JobInfo> {
    const live = await this.liveRecords();
    const record = live ? this.findLive(live, jobId) : null;

    if (record) {
      const base = sgeRecordToJobInfo(record, this.now());
      const detail = await this.detailFields(jobId);
      const paths = this.outputPaths(jobId, detail);
      return createJobInfo({
        ...base,
        cpu: detail?.cpu ?? base.cpu,
        memory: detail?.memory ?? base.memory,
        gpu: detail?.gpu ?? base.gpu,
        dependencies: detail?.dependencies ?? base.dependencies,
        stdoutPath: paths.stdout,
        stderrPath: paths.stderr
      });
    }

    const acct = await this.accountingRecord(jobId);
    if (acct) {
      const paths = this.outputPaths(jobId, null);
      return createJobInfo({ ...sgeAccountingToJobInfo(acct), stdoutPath: paths.stdout, stderrPath: paths.stderr });
    }

    throw new JobNotFoundError(jobId);
  }
}
