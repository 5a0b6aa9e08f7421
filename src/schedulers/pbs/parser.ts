import { createJobInfo, elapsedSeconds, type JobInfo } from "../../core/jobInfo.js";
import type { JobStatus } from "../../core/jobStatus.js";
import { nonEmpty, parseIntOrNull, parseSchedulerTime } from "../common.js";

/** One `Job Id:` block of `qstat -f`, attributes keyed as printed (`Resource_List.ncpus`). */
export interface PbsJobRecord {
  jobId: string;
  attributes: Record<string, string>;
}

/**
 * Parses `qstat -f` output. Attribute lines are `key = value`; long values wrap
 * onto tab-indented continuation lines that are appended verbatim.
 */
export function parsePbsQstatFull(output: string): PbsJobRecord[] {
  const records: PbsJobRecord[] = [];
  let current: PbsJobRecord | null = null;
  let lastKey: string | null = null;

  for (const rawLine of output.split("\n")) {
    const line = rawLine.replace(/\r$/, "");
    if (!line.trim()) continue;

    const header = /^Job Id:\s*(\S+)/.exec(line);
    if (header?.[1]) {
      current = { jobId: header[1], attributes: {} };
      records.push(current);
      lastKey = null;
      continue;
    }
    if (!current) continue;

    const attr = /^\s+([A-Za-z_][\w.]*)\s+=\s?(.*)$/.exec(line);
    if (attr?.[1] !== undefined && !line.startsWith("\t")) {
      current.attributes[attr[1]] = (attr[2] ?? "").trim();
      lastKey = attr[1];
      continue;
    }

    if (lastKey !== null && /^\s/.test(line)) {
      current.attributes[lastKey] = `${current.attributes[lastKey] ?? ""}${line.trim()}`;
    }
  }

  return records;
}

const PBS_STATES: Record<string, JobStatus> = {
  Q: "PENDING",
  H: "PENDING",
  W: "PENDING",
  T: "PENDING",
  S: "PENDING",
  U: "PENDING",
  R: "RUNNING",
  E: "RUNNING",
  B: "RUNNING"
};

const PBS_FINISHED = new Set(["F", "C", "X"]);

/**
 * Finished states (`F`, `C`, `X`) carry no outcome of their own; the exit status
 * decides it. PBS reports walltime kills as -11 or -29 and `qdel` of a running
 * job as 271 (256 + SIGTERM).
 */
export function pbsStateToStatus(state: string, exitStatus: number | null): JobStatus {
  const code = state.trim().toUpperCase();
  const mapped = PBS_STATES[code];
  if (mapped) return mapped;
  if (!PBS_FINISHED.has(code)) return "UNKNOWN";

  if (exitStatus === null || exitStatus === 0) return "COMPLETED";
  if (exitStatus === -11 || exitStatus === -29) return "TIMEOUT";
  if (exitStatus === 271) return "CANCELLED";
  return "FAILED";
}

/**
 * `qsub` prints `123.server` (or `123[].server` for arrays). Returns the
 * numeric id, which `qstat` and `qdel` accept on their own.
 */
export function parsePbsQsubOutput(output: string): string | null {
  for (const line of output.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed) continue;
    const m = /^(\d+)(\[\])?(\.\S+)?$/.exec(trimmed);
    if (m?.[1]) return m[1];
  }
  return null;
}

/** `123.server` → `123`; `123[4].server` → `123.4`; `123[].server` → `123`. */
export function normalizePbsJobId(raw: string): { jobId: string; arrayTaskId: string | null } {
  const m = /^(\d+)(?:\[(\d*)\])?/.exec(raw.trim());
  if (!m?.[1]) return { jobId: raw.trim(), arrayTaskId: null };
  const task = m[2];
  if (task) return { jobId: `${m[1]}.${task}`, arrayTaskId: task };
  return { jobId: m[1], arrayTaskId: null };
}

/** `HH:MM:SS` (hours may exceed 24) to seconds. */
export function parsePbsWalltime(value: string | undefined | null): number | null {
  const text = nonEmpty(value);
  if (!text) return null;
  const m = /^(\d+):(\d{2}):(\d{2})$/.exec(text);
  if (!m) return parseIntOrNull(text);
  return Number(m[1]) * 3600 + Number(m[2]) * 60 + Number(m[3]);
}

/** `afterok:123.server:456.server,afterany:789` to `["123", "456", "789"]`. */
export function parsePbsDependencies(value: string | undefined | null): string[] | null {
  const text = nonEmpty(value);
  if (!text) return null;
  const ids: string[] = [];
  for (const part of text.split(",")) {
    const segments = part.split(":").slice(1);
    for (const seg of segments) {
      const m = /^(\d+)/.exec(seg.trim());
      if (m?.[1]) ids.push(m[1]);
    }
  }
  return ids.length ? ids : null;
}

/** `host:/path/to/file` → `/path/to/file`. */
function stripHost(value: string | undefined): string | null {
  const text = nonEmpty(value);
  if (!text) return null;
  const colon = text.indexOf(":");
  return colon >= 0 ? text.slice(colon + 1) : text;
}

function pbsCpu(attrs: Record<string, string>): number | null {
  const ncpus = parseIntOrNull(attrs["Resource_List.ncpus"]);
  if (ncpus !== null) return ncpus;
  // Torque: `nodes=1:ppn=4`
  const ppn = /ppn=(\d+)/.exec(attrs["Resource_List.nodes"] ?? "");
  return ppn ? parseIntOrNull(ppn[1]) : null;
}

export function pbsRecordToJobInfo(record: PbsJobRecord, now: Date): JobInfo {
  const attrs = record.attributes;
  const { jobId, arrayTaskId } = normalizePbsJobId(record.jobId);
  const exitStatus = parseIntOrNull(attrs["Exit_status"]);
  const status = pbsStateToStatus(attrs["job_state"] ?? "", exitStatus);
  const finished = status !== "PENDING" && status !== "RUNNING" && status !== "UNKNOWN";

  const startTime = status === "PENDING" ? null : parseSchedulerTime(attrs["stime"] ?? attrs["start_time"]);
  const endTime = finished
    ? (parseSchedulerTime(attrs["obittime"]) ?? parseSchedulerTime(attrs["comp_time"]) ?? parseSchedulerTime(attrs["mtime"]))
    : null;
  const used = parsePbsWalltime(attrs["resources_used.walltime"]);

  return createJobInfo({
    jobId,
    name: attrs["Job_Name"] ?? "",
    user: (attrs["Job_Owner"] ?? "").split("@")[0] ?? "",
    status,
    queue: nonEmpty(attrs["queue"]),
    submitTime: parseSchedulerTime(attrs["qtime"] ?? attrs["ctime"]),
    startTime,
    endTime,
    runtimeSeconds:
      used ?? (status === "RUNNING" ? elapsedSeconds(startTime, now) : elapsedSeconds(startTime, endTime)),
    cpu: pbsCpu(attrs),
    memory: nonEmpty(attrs["Resource_List.mem"]),
    gpu: parseIntOrNull(attrs["Resource_List.ngpus"]),
    exitCode: finished ? exitStatus : null,
    stdoutPath: stripHost(attrs["Output_Path"]),
    stderrPath: stripHost(attrs["Error_Path"]),
    node: status === "PENDING" ? null : (nonEmpty(attrs["exec_host"])?.split(/[/+]/)[0] ?? null),
    dependencies: parsePbsDependencies(attrs["depend"]),
    arrayTaskId: arrayTaskId ?? nonEmpty(attrs["array_indices_submitted"]) ?? nonEmpty(attrs["array_index"])
  });
}
