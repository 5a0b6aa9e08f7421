import { createJobInfo, elapsedSeconds, type JobInfo } from "../../core/jobInfo.js";
import type { JobStatus } from "../../core/jobStatus.js";
import { nonEmpty, parseGpuCount, parseIntOrNull, parseSchedulerTime } from "../common.js";

/**
 * `squeue` output format. Pipe-delimited so empty fields (NODELIST for pending
 * jobs) do not collapse the way whitespace splitting would.
 */
export const SQUEUE_FORMAT = "%i|%j|%u|%T|%P|%V|%S|%M|%C|%m|%b|%N|%K|%E";

export const SACCT_FIELDS = [
  "JobID",
  "JobName",
  "User",
  "State",
  "Partition",
  "Submit",
  "Start",
  "End",
  "Elapsed",
  "AllocCPUS",
  "ReqMem",
  "ExitCode",
  "NodeList",
  "AllocTRES"
] as const;

export interface SlurmQueueRow {
  jobId: string;
  name: string;
  user: string;
  state: string;
  partition: string | null;
  submitTime: Date | null;
  startTime: Date | null;
  elapsedSeconds: number | null;
  cpus: number | null;
  memory: string | null;
  gpu: number | null;
  nodeList: string | null;
  arrayTaskId: string | null;
  dependencies: string[] | null;
}

export interface SlurmAccountingRow {
  jobId: string;
  name: string;
  user: string;
  state: string;
  partition: string | null;
  submitTime: Date | null;
  startTime: Date | null;
  endTime: Date | null;
  elapsedSeconds: number | null;
  cpus: number | null;
  memory: string | null;
  gpu: number | null;
  exitCode: number | null;
  nodeList: string | null;
}

/** `Key=Value` pairs from `scontrol show job`. */
export type ScontrolRecord = Record<string, string>;

const SLURM_STATES: Record<string, JobStatus> = {
  PENDING: "PENDING",
  PD: "PENDING",
  CONFIGURING: "PENDING",
  CF: "PENDING",
  REQUEUED: "PENDING",
  RQ: "PENDING",
  REQUEUE_HOLD: "PENDING",
  REQUEUE_FED: "PENDING",
  RESV_DEL_HOLD: "PENDING",
  SUSPENDED: "PENDING",
  S: "PENDING",
  STOPPED: "PENDING",
  ST: "PENDING",
  RUNNING: "RUNNING",
  R: "RUNNING",
  COMPLETING: "RUNNING",
  CG: "RUNNING",
  STAGE_OUT: "RUNNING",
  SO: "RUNNING",
  SIGNALING: "RUNNING",
  SI: "RUNNING",
  RESIZING: "RUNNING",
  RS: "RUNNING",
  COMPLETED: "COMPLETED",
  CD: "COMPLETED",
  FAILED: "FAILED",
  F: "FAILED",
  NODE_FAIL: "FAILED",
  NF: "FAILED",
  OUT_OF_MEMORY: "FAILED",
  OOM: "FAILED",
  BOOT_FAIL: "FAILED",
  BF: "FAILED",
  PREEMPTED: "FAILED",
  PR: "FAILED",
  SPECIAL_EXIT: "FAILED",
  SE: "FAILED",
  REVOKED: "CANCELLED",
  RV: "CANCELLED",
  CANCELLED: "CANCELLED",
  CA: "CANCELLED",
  TIMEOUT: "TIMEOUT",
  TO: "TIMEOUT",
  DEADLINE: "TIMEOUT",
  DL: "TIMEOUT"
};

/** Accepts long names, short codes and decorated forms such as `CANCELLED by 1000` or `RUNNING+`. */
export function slurmStateToStatus(state: string): JobStatus {
  const head = state.trim().toUpperCase().split(/[^A-Z_]/)[0] ?? "";
  return SLURM_STATES[head] ?? "UNKNOWN";
}

/** `[D-]HH:MM:SS`, `MM:SS` or `MM:SS.mmm` to seconds; `UNLIMITED`, `INVALID` and blanks give null. */
export function parseSlurmDuration(value: string | undefined | null): number | null {
  const text = nonEmpty(value);
  if (!text) return null;

  const m = /^(?:(\d+)-)?(?:(\d+):)?(\d+):(\d+)(?:\.\d+)?$/.exec(text);
  if (!m) return null;
  const [, d, h, mi, s] = m;
  if (d !== undefined && h === undefined) {
    // `D-HH:MM` form
    return Number(d) * 86400 + Number(mi) * 3600 + Number(s) * 60;
  }
  return Number(d ?? 0) * 86400 + Number(h ?? 0) * 3600 + Number(mi) * 60 + Number(s);
}

function field(value: string | undefined): string | null {
  const text = nonEmpty(value);
  if (!text) return null;
  if (text === "(null)" || text === "N/A" || text === "None" || text === "Unknown" || text === "(None)") return null;
  return text;
}

/** `afterok:123(unfulfilled),afterany:456_7` to `["123", "456_7"]`. */
export function parseSlurmDependencies(value: string | undefined | null): string[] | null {
  const text = field(value ?? undefined);
  if (!text) return null;
  const ids: string[] = [];
  for (const part of text.split(/[,?]/)) {
    const colon = part.indexOf(":");
    const source = colon >= 0 ? part.slice(colon + 1) : part;
    for (const id of source.split(":")) {
      const clean = id.replace(/\(.*\)$/, "").replace(/\+\d+$/, "").trim();
      if (/^\d+(?:_\d+)?$/.test(clean)) ids.push(fromSlurmJobId(clean));
    }
  }
  return ids.length ? ids : null;
}

/** Slurm names array tasks `123_4`; jobs are reported in the uniform `123.4` form. */
export function fromSlurmJobId(jobId: string): string {
  const m = /^(\d+)_(\d+)$/.exec(jobId);
  return m ? `${m[1]}.${m[2]}` : jobId;
}

/** Parses `squeue -h -o SQUEUE_FORMAT` output. Rows with too few fields are skipped. */
export function parseSqueue(output: string): SlurmQueueRow[] {
  const rows: SlurmQueueRow[] = [];

  for (const line of output.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed) continue;

    const parts = trimmed.split("|").map((p) => p.trim());
    if (parts.length < 5) continue;

    const [jobId, name, user, state, partition, submit, start, elapsed, cpus, memory, tres, nodes, task, deps] = parts;
    if (!jobId) continue;

    rows.push({
      jobId,
      name: name ?? "",
      user: user ?? "",
      state: state ?? "",
      partition: field(partition),
      submitTime: parseSchedulerTime(field(submit)),
      startTime: parseSchedulerTime(field(start)),
      elapsedSeconds: parseSlurmDuration(elapsed),
      cpus: parseIntOrNull(cpus),
      memory: field(memory),
      gpu: parseGpuCount(field(tres)),
      nodeList: field(nodes),
      arrayTaskId: field(task),
      dependencies: parseSlurmDependencies(deps)
    });
  }

  return rows;
}

/** `0:0` → 0, `1:0` → 1, `0:15` (killed by signal 15) → 128 + 15. */
export function parseSlurmExitCode(value: string | undefined | null): number | null {
  const text = nonEmpty(value);
  if (!text) return null;
  const [code, signal] = text.split(":");
  const c = parseIntOrNull(code);
  const s = parseIntOrNull(signal);
  if (c === null) return null;
  if (c === 0 && s !== null && s > 0) return 128 + s;
  return c;
}

/**
 * Parses `sacct -X -n -P -o <SACCT_FIELDS>` output. Step rows (`123.batch`) are
 * skipped in case `-X` was not honoured.
 */
export function parseSacct(output: string): SlurmAccountingRow[] {
  const rows: SlurmAccountingRow[] = [];

  for (const line of output.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed) continue;

    const parts = trimmed.split("|");
    if (parts.length < 6) continue;

    const [jobId, name, user, state, partition, submit, start, end, elapsed, cpus, reqMem, exit, nodes, tres] = parts;
    if (!jobId || jobId.includes(".")) continue;

    rows.push({
      jobId,
      name: name ?? "",
      user: user ?? "",
      state: state ?? "",
      partition: field(partition),
      submitTime: parseSchedulerTime(field(submit)),
      startTime: parseSchedulerTime(field(start)),
      endTime: parseSchedulerTime(field(end)),
      elapsedSeconds: parseSlurmDuration(elapsed),
      cpus: parseIntOrNull(cpus),
      memory: field(reqMem),
      gpu: parseGpuCount(field(tres)),
      exitCode: parseSlurmExitCode(exit),
      nodeList: field(nodes)
    });
  }

  return rows;
}

const SCONTROL_SPACED_KEYS = ["Command", "WorkDir", "StdErr", "StdIn", "StdOut", "Reason", "Comment", "SubmitLine"];

/** Parses `scontrol show job <id>` output into `Key=Value` pairs. */
export function parseScontrolJob(output: string): ScontrolRecord {
  const record: ScontrolRecord = {};
  for (const rawLine of output.split("\n")) {
    const line = rawLine.trim();
    if (!line) continue;

    // Path-like keys take the rest of the line and may contain spaces.
    const spaced = SCONTROL_SPACED_KEYS.find((k) => line.startsWith(`${k}=`));
    if (spaced) {
      record[spaced] = line.slice(spaced.length + 1).trim();
      continue;
    }

    for (const token of line.split(/\s+/)) {
      const eq = token.indexOf("=");
      if (eq <= 0) continue;
      record[token.slice(0, eq)] = token.slice(eq + 1);
    }
  }
  return record;
}

/** `sbatch --parsable` prints `id[;cluster]`; plain sbatch prints `Submitted batch job N`. */
export function parseSbatchOutput(output: string): string | null {
  const trimmed = output.trim();
  if (!trimmed) return null;

  const first = trimmed.split(/\s+/)[0] ?? "";
  if (/^\d+(;\S+)?$/.test(first)) {
    return first.split(";")[0] ?? null;
  }

  const m = /Submitted batch job\s+(\d+)/.exec(trimmed);
  return m?.[1] ?? null;
}

export function squeueRowToJobInfo(row: SlurmQueueRow, now: Date): JobInfo {
  const status = slurmStateToStatus(row.state);
  const runtimeSeconds =
    status === "RUNNING" ? (row.elapsedSeconds ?? elapsedSeconds(row.startTime, now)) : row.elapsedSeconds || null;

  return createJobInfo({
    jobId: fromSlurmJobId(row.jobId),
    name: row.name,
    user: row.user,
    status,
    queue: row.partition,
    submitTime: row.submitTime,
    startTime: status === "PENDING" ? null : row.startTime,
    runtimeSeconds,
    cpu: row.cpus,
    memory: row.memory,
    gpu: row.gpu,
    node: status === "PENDING" ? null : row.nodeList,
    dependencies: row.dependencies,
    arrayTaskId: row.arrayTaskId
  });
}

export function sacctRowToJobInfo(row: SlurmAccountingRow): JobInfo {
  return createJobInfo({
    jobId: fromSlurmJobId(row.jobId),
    name: row.name,
    user: row.user,
    status: slurmStateToStatus(row.state),
    queue: row.partition,
    submitTime: row.submitTime,
    startTime: row.startTime,
    endTime: row.endTime,
    runtimeSeconds: row.elapsedSeconds ?? elapsedSeconds(row.startTime, row.endTime),
    cpu: row.cpus,
    memory: row.memory,
    gpu: row.gpu,
    exitCode: row.exitCode,
    node: row.nodeList,
    arrayTaskId: /_(\d+)$/.exec(row.jobId)?.[1] ?? null
  });
}

export function scontrolToJobInfo(record: ScontrolRecord, now: Date): JobInfo | null {
  const jobId = nonEmpty(record["JobId"]);
  if (!jobId) return null;

  const status = slurmStateToStatus(record["JobState"] ?? "");
  const startTime = parseSchedulerTime(field(record["StartTime"]));
  const endTime = parseSchedulerTime(field(record["EndTime"]));
  const arrayJobId = field(record["ArrayJobId"]);
  const arrayTaskId = field(record["ArrayTaskId"]);

  return createJobInfo({
    jobId: arrayJobId && arrayTaskId ? `${arrayJobId}.${arrayTaskId}` : jobId,
    name: record["JobName"] ?? "",
    user: (record["UserId"] ?? "").split("(")[0] ?? "",
    status,
    queue: field(record["Partition"]),
    submitTime: parseSchedulerTime(field(record["SubmitTime"])),
    startTime: status === "PENDING" ? null : startTime,
    // EndTime of a running job is its projected limit, not a completion.
    endTime: status === "PENDING" || status === "RUNNING" ? null : endTime,
    runtimeSeconds: parseSlurmDuration(record["RunTime"]) ?? (status === "RUNNING" ? elapsedSeconds(startTime, now) : null),
    cpu: parseIntOrNull(record["NumCPUs"]),
    memory: field(record["MinMemoryNode"]) ?? field(record["MinMemoryCPU"]) ?? field(record["mem"]),
    gpu: parseGpuCount(field(record["TresPerNode"]) ?? field(record["Gres"]) ?? field(record["TRES"])),
    exitCode: status === "PENDING" || status === "RUNNING" ? null : parseSlurmExitCode(record["ExitCode"]),
    stdoutPath: field(record["StdOut"]),
    stderrPath: field(record["StdErr"]),
    node: status === "PENDING" ? null : field(record["NodeList"]),
    dependencies: parseSlurmDependencies(record["Dependency"]),
    arrayTaskId
  });
}
