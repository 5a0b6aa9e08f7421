import { XMLParser, XMLValidator } from "fast-xml-parser";
import { createJobInfo, elapsedSeconds, type JobInfo } from "../../core/jobInfo.js";
import type { JobStatus } from "../../core/jobStatus.js";
import { nonEmpty, parseIntOrNull, parseSchedulerTime, epochSecondsToDate, parseGpuCount } from "../common.js";

/**
 * One job from `qstat -xml` or plain `qstat`. Every field except the id is
 * optional because SGE omits elements per job state.
 */
export interface SgeJobRecord {
  jobId: string;
  priority?: string;
  name?: string;
  user?: string;
  state?: string;
  queue?: string;
  slots?: number;
  submitTime?: Date;
  startTime?: Date;
  arrayTaskId?: string;
}

/** Key/value pairs from one `qacct` record. */
export type SgeAccountingRecord = Record<string, string>;

/** Key/value pairs from `qstat -j <id>`. */
export type SgeJobDetailRecord = Record<string, string>;

const xmlParser = new XMLParser({
  ignoreAttributes: true,
  parseTagValue: false,
  trimValues: true,
  isArray: (name) => name === "job_list"
});

type XmlNode = Record<string, unknown>;

function isNode(value: unknown): value is XmlNode {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function childNode(node: XmlNode | undefined, key: string): XmlNode | undefined {
  const v = node?.[key];
  return isNode(v) ? v : undefined;
}

function text(node: XmlNode, key: string): string | undefined {
  const v = node[key];
  if (typeof v === "string" || typeof v === "number") {
    const s = String(v).trim();
    return s.length > 0 ? s : undefined;
  }
  return undefined;
}

function jobLists(section: XmlNode | undefined): XmlNode[] {
  const list = section?.["job_list"];
  return Array.isArray(list) ? list.filter(isNode) : [];
}

function parseXmlTime(value: string | undefined): Date | undefined {
  if (value === undefined) return undefined;
  // Older SGE releases print epoch seconds, newer ones ISO timestamps.
  const d = /^\d+$/.test(value) ? epochSecondsToDate(value) : parseSchedulerTime(value);
  return d ?? undefined;
}

function parseJobElement(elem: XmlNode): SgeJobRecord | null {
  const jobId = text(elem, "JB_job_number");
  if (!jobId) return null;

  const record: SgeJobRecord = { jobId };

  const name = text(elem, "JB_name");
  if (name) record.name = name;

  const owner = text(elem, "JB_owner");
  if (owner) record.user = owner;

  const state = text(elem, "state");
  if (state) record.state = state;

  const queueName = text(elem, "queue_name");
  if (queueName) {
    record.queue = queueName.split("@")[0] ?? queueName;
  } else {
    const hardQueue = text(elem, "hard_req_queue");
    if (hardQueue) record.queue = hardQueue;
  }

  const slots = parseIntOrNull(text(elem, "slots"));
  if (slots !== null) record.slots = slots;

  const submitTime = parseXmlTime(text(elem, "JB_submission_time"));
  if (submitTime) record.submitTime = submitTime;

  const startTime = parseXmlTime(text(elem, "JAT_start_time"));
  if (startTime) record.startTime = startTime;

  const tasks = text(elem, "tasks");
  if (tasks) record.arrayTaskId = tasks;

  return record;
}

/** A single array task is reported as `base.task`; whole jobs and pending ranges keep the bare id. */
export function sgeTaskJobId(jobId: string, taskId: string | undefined): string {
  return taskId && /^\d+$/.test(taskId) ? `${jobId}.${taskId}` : jobId;
}

/** False for empty or truncated `qstat -xml` output. */
export function isWellFormedXml(xml: string): boolean {
  return xml.trim().length > 0 && XMLValidator.validate(xml) === true;
}

/**
 * Parses `qstat -xml`. Running jobs sit under `queue_info`, pending ones under the
 * inner `job_info`. Malformed documents yield an empty map.
 */
export function parseQstatXml(xml: string): Map<string, SgeJobRecord> {
  const jobs = new Map<string, SgeJobRecord>();
  if (!isWellFormedXml(xml)) return jobs;

  let doc: unknown;
  try {
    doc = xmlParser.parse(xml);
  } catch {
    return jobs;
  }
  if (!isNode(doc)) return jobs;

  const root = childNode(doc, "job_info");
  const sections = [childNode(root, "queue_info"), childNode(root, "job_info")];

  for (const section of sections) {
    for (const elem of jobLists(section)) {
      const record = parseJobElement(elem);
      if (!record) continue;
      // Array tasks share a job number; keep each task as its own row.
      jobs.set(sgeTaskJobId(record.jobId, record.arrayTaskId), record);
    }
  }

  return jobs;
}

/**
 * Parses plain `qstat` output:
 *
 * ```
 * job-ID  prior   name   user  state submit/start at     queue        slots ja-task-ID
 * ---------------------------------------------------------------------------------
 *  12345 0.55500 myjob  alice r     01/01/2024 10:00:00 all.q@node1  1
 * ```
 */
export function parseQstatPlain(output: string): Map<string, SgeJobRecord> {
  const jobs = new Map<string, SgeJobRecord>();

  let dataStarted = false;
  for (const line of output.trim().split("\n")) {
    if (line.startsWith("-")) {
      dataStarted = true;
      continue;
    }
    if (!dataStarted) continue;

    const parts = line.trim().split(/\s+/);
    if (parts.length < 5) continue;

    const [jobId, priority, name, user, state] = parts;
    if (!jobId) continue;

    const record: SgeJobRecord = { jobId, priority, name, user, state };

    const date = parts[5];
    const time = parts[6];
    if (date && time) {
      const at = parseSchedulerTime(`${date} ${time}`);
      if (at) {
        if (state && /^(qw|hqw|Eqw)$/i.test(state)) record.submitTime = at;
        else record.startTime = at;
      }
    }

    // Pending jobs have no queue column, so the remaining columns shift left.
    const rest = parts.slice(7);
    const queue = rest[0] !== undefined && !/^\d+$/.test(rest[0]) ? rest.shift() : undefined;
    if (queue !== undefined) record.queue = queue;

    const slots = parseIntOrNull(rest[0]);
    if (slots !== null) {
      record.slots = slots;
      rest.shift();
    }

    const task = rest[0];
    if (task !== undefined) record.arrayTaskId = task;

    jobs.set(sgeTaskJobId(jobId, record.arrayTaskId), record);
  }

  return jobs;
}

/**
 * Parses one `qacct -j` record into key/value pairs. Separator rows of `=` are
 * skipped; later keys overwrite earlier ones.
 */
export function parseQacct(output: string): SgeAccountingRecord {
  const info: SgeAccountingRecord = {};

  for (const line of output.trim().split("\n")) {
    if (line.startsWith("=")) continue;

    const m = /^(\S+)\s+(.*)$/.exec(line.trim());
    if (!m || m[1] === undefined || m[2] === undefined) continue;
    const value = m[2].trim();
    if (!value) continue;
    info[m[1]] = value;
  }

  return info;
}

/** Splits a multi-job `qacct` dump on its `=` separator rows. */
export function parseQacctRecords(output: string): SgeAccountingRecord[] {
  const records: SgeAccountingRecord[] = [];
  let block: string[] = [];

  const flush = (): void => {
    if (!block.length) return;
    const record = parseQacct(block.join("\n"));
    if (record["jobnumber"]) records.push(record);
    block = [];
  };

  for (const line of output.split("\n")) {
    if (line.startsWith("=")) {
      flush();
      continue;
    }
    block.push(line);
  }
  flush();

  return records;
}

/** Parses `qstat -j <id>` output (`key:   value` lines). */
export function parseQstatJobDetail(output: string): SgeJobDetailRecord {
  const info: SgeJobDetailRecord = {};
  for (const line of output.split("\n")) {
    if (line.startsWith("=")) continue;
    const m = /^([A-Za-z_][A-Za-z0-9_ ]*?):\s+(.*)$/.exec(line);
    if (!m || m[1] === undefined || m[2] === undefined) continue;
    const value = m[2].trim();
    if (value) info[m[1].trim()] = value;
  }
  return info;
}

const SGE_STATES: Record<string, JobStatus> = {
  r: "RUNNING",
  t: "RUNNING",
  rr: "RUNNING",
  rt: "RUNNING",
  qw: "PENDING",
  hqw: "PENDING",
  eqw: "FAILED",
  dr: "CANCELLED",
  dt: "CANCELLED",
  // Suspended jobs are reported as still queued; the status lattice has no SUSPENDED.
  s: "PENDING",
  ts: "PENDING",
  ss: "PENDING"
};

export function sgeStateToStatus(state: string): JobStatus {
  return SGE_STATES[state.trim().toLowerCase()] ?? "UNKNOWN";
}

/**
 * Extracts the job id from qsub output:
 * `Your job 12345 ("name") has been submitted` or
 * `Your job-array 12345.1-10:1 ("name") has been submitted`.
 */
export function parseQsubOutput(output: string): string | null {
  const single = /Your job (\d+)/.exec(output);
  if (single?.[1]) return single[1];

  const array = /Your job-array (\d+)/.exec(output);
  if (array?.[1]) return array[1];

  return null;
}

export function sgeRecordToJobInfo(record: SgeJobRecord, now: Date): JobInfo {
  const status = record.state ? sgeStateToStatus(record.state) : "UNKNOWN";
  const runtimeSeconds = status === "RUNNING" ? elapsedSeconds(record.startTime ?? null, now) : null;

  return createJobInfo({
    jobId: sgeTaskJobId(record.jobId, record.arrayTaskId),
    name: record.name ?? "",
    user: record.user ?? "",
    status,
    queue: record.queue ?? null,
    submitTime: record.submitTime ?? null,
    startTime: record.startTime ?? null,
    runtimeSeconds,
    cpu: record.slots ?? null,
    arrayTaskId: record.arrayTaskId ?? null
  });
}

/** `ru_wallclock` is `3600`, `3600.000` or `3600s` depending on the SGE flavour. */
function parseWallclock(value: string | undefined): number | null {
  const m = /^(\d+)(?:\.\d+)?s?$/.exec(value?.trim() ?? "");
  return m ? Number(m[1]) : null;
}

/**
 * Status of a finished job from its accounting record. A `failed` code of 100 with
 * exit status 137 is what qdel leaves behind.
 */
export function sgeAccountingStatus(record: SgeAccountingRecord): JobStatus {
  const exitStatus = parseIntOrNull(record["exit_status"]);
  const failedCode = parseIntOrNull((record["failed"] ?? "").split(/\s|:/)[0]);

  if (exitStatus === null && failedCode === null) return "UNKNOWN";
  if ((failedCode ?? 0) === 0 && (exitStatus ?? 0) === 0) return "COMPLETED";
  if (failedCode === 100 && exitStatus === 137) return "CANCELLED";
  return "FAILED";
}

function resourceValue(spec: string | undefined, key: string): string | null {
  if (!spec) return null;
  const m = new RegExp(`(?:^|[\\s,])${key}=([^\\s,]+)`).exec(spec);
  return m?.[1] ?? null;
}

function parallelSlots(spec: string | undefined): number | null {
  if (!spec) return null;
  const m = /-pe\s+\S+\s+(\d+)/.exec(spec);
  return m ? parseIntOrNull(m[1]) : null;
}

export function sgeAccountingToJobInfo(record: SgeAccountingRecord): JobInfo {
  const startTime = parseSchedulerTime(record["start_time"]);
  const endTime = parseSchedulerTime(record["end_time"]);
  const category = record["category"];
  const taskId = record["taskid"] && record["taskid"] !== "undefined" ? record["taskid"] : null;

  return createJobInfo({
    jobId: sgeTaskJobId(record["jobnumber"] ?? "", taskId ?? undefined),
    name: record["jobname"] ?? "",
    user: record["owner"] ?? "",
    status: sgeAccountingStatus(record),
    queue: nonEmpty(record["qname"]),
    submitTime: parseSchedulerTime(record["qsub_time"]),
    startTime,
    endTime,
    runtimeSeconds: parseWallclock(record["ru_wallclock"]) ?? elapsedSeconds(startTime, endTime),
    cpu: parseIntOrNull(record["slots"]) ?? parallelSlots(category),
    memory: resourceValue(category, "h_vmem") ?? resourceValue(category, "mem_free"),
    gpu: parseGpuCount(category),
    exitCode: parseIntOrNull(record["exit_status"]),
    node: nonEmpty(record["hostname"]),
    arrayTaskId: taskId
  });
}

function firstPath(pathList: string | undefined): string | null {
  // `NONE:NONE:/home/alice/out.log` or `node1:/scratch/out`
  const entry = nonEmpty(pathList?.split(",")[0]);
  if (!entry) return null;
  const parts = entry.split(":");
  return nonEmpty(parts[parts.length - 1]);
}

/** Fields only `qstat -j` reports: output paths, predecessors and resource requests. */
export function sgeDetailFields(detail: SgeJobDetailRecord): {
  stdoutPath: string | null;
  stderrPath: string | null;
  dependencies: string[] | null;
  memory: string | null;
  gpu: number | null;
  cpu: number | null;
} {
  const predecessors = nonEmpty(detail["jid_predecessor_list"] ?? detail["predecessor_jobs"]);
  const resources = detail["hard resource_list"];
  const pe = nonEmpty(detail["parallel environment"]);
  const peSlots = pe ? /range:\s*(\d+)/.exec(pe) : null;

  return {
    stdoutPath: firstPath(detail["stdout_path_list"]),
    stderrPath: firstPath(detail["stderr_path_list"]),
    dependencies: predecessors ? predecessors.split(/[,\s]+/).filter((d) => d.length > 0) : null,
    memory: resourceValue(resources, "h_vmem") ?? resourceValue(resources, "mem_free"),
    gpu: parseGpuCount(resources),
    cpu: peSlots ? parseIntOrNull(peSlots[1]) : null
  };
}
