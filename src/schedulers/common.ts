import type { JobInfo } from "../core/jobInfo.js";
import { ACTIVE_STATUSES } from "../core/jobStatus.js";
import { SchedulerQueryError, SubmissionError } from "../core/errors.js";
import type { JobResult, SchedulerName } from "../core/job.js";
import type { CommandOptions, CommandResult } from "../execution/commandRunner.js";
import type { ActiveJobFilter, CompletedJobFilter, SchedulerDeps } from "./types.js";

export const DEFAULT_COMPLETED_LIMIT = 100;

export function applyActiveFilter(jobs: JobInfo[], filter: ActiveJobFilter = {}): JobInfo[] {
  const statuses = filter.status ?? ACTIVE_STATUSES;
  return jobs.filter((job) => {
    if (!statuses.has(job.status)) return false;
    if (filter.user !== undefined && job.user !== filter.user) return false;
    if (filter.queue !== undefined && job.queue !== filter.queue) return false;
    return true;
  });
}

function completionTime(job: JobInfo): number | null {
  return job.endTime ? job.endTime.getTime() : null;
}

export function applyCompletedFilter(jobs: JobInfo[], filter: CompletedJobFilter = {}): JobInfo[] {
  const limit = filter.limit ?? DEFAULT_COMPLETED_LIMIT;
  const since = filter.since?.getTime();
  const until = filter.until?.getTime();

  const matched = jobs.filter((job) => {
    if (filter.user !== undefined && job.user !== filter.user) return false;
    if (filter.queue !== undefined && job.queue !== filter.queue) return false;
    if (filter.exitCode !== undefined && job.exitCode !== filter.exitCode) return false;
    if (since !== undefined || until !== undefined) {
      const t = completionTime(job);
      if (t === null) return false;
      if (since !== undefined && t < since) return false;
      if (until !== undefined && t > until) return false;
    }
    return true;
  });

  // Most recent first; jobs without an end time sink to the bottom.
  matched.sort((a, b) => (completionTime(b) ?? -Infinity) - (completionTime(a) ?? -Infinity));
  return matched.slice(0, Math.max(0, limit));
}

/**
 * Runs a scheduler query. Start failures and timeouts come back as `null` (logged),
 * so status lookups can degrade to UNKNOWN instead of throwing.
 */
export async function tryQuery(
  deps: SchedulerDeps,
  argv: string[],
  options: CommandOptions = {}
): Promise<CommandResult | null> {
  try {
    const res = await deps.runner.run(argv, { timeoutSeconds: deps.commandTimeoutSeconds, ...options });
    if (res.timedOut) {
      deps.logger.warn(`${argv[0] ?? "command"} timed out after ${deps.commandTimeoutSeconds}s`);
      return null;
    }
    return res;
  } catch (e) {
    deps.logger.warn(`${argv[0] ?? "command"} unavailable: ${e instanceof Error ? e.message : String(e)}`);
    return null;
  }
}

/** Like `tryQuery` but a failed listing is an error, so a poller can keep its previous view. */
export async function requireQuery(deps: SchedulerDeps, argv: string[]): Promise<CommandResult> {
  const res = await tryQuery(deps, argv);
  if (!res) throw new SchedulerQueryError(`${argv.join(" ")} did not complete`, argv);
  if (res.exitCode !== 0) {
    const stderr = res.stderr.trim();
    deps.logger.warn(`${argv[0] ?? "command"} failed (exit ${res.exitCode})${stderr ? `: ${stderr}` : ""}`);
    throw new SchedulerQueryError(
      `${argv[0] ?? "command"} failed (exit ${res.exitCode})${stderr ? `: ${stderr}` : ""}`,
      argv
    );
  }
  return res;
}

export function parseIntOrNull(value: string | undefined | null): number | null {
  if (value === undefined || value === null) return null;
  const trimmed = value.trim();
  if (!/^-?\d+$/.test(trimmed)) return null;
  const n = Number.parseInt(trimmed, 10);
  return Number.isSafeInteger(n) ? n : null;
}

export function nonEmpty(value: string | undefined | null): string | null {
  if (value === undefined || value === null) return null;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

/** Replaces scheduler placeholders such as `$JOB_ID` or `%j` in an output path. */
export function expandPathTokens(template: string, tokens: Record<string, string>): string {
  let out = template;
  for (const [token, value] of Object.entries(tokens)) {
    out = out.split(token).join(value);
  }
  return out;
}

const MONTHS: Record<string, number> = {
  jan: 0,
  feb: 1,
  mar: 2,
  apr: 3,
  may: 4,
  jun: 5,
  jul: 6,
  aug: 7,
  sep: 8,
  oct: 9,
  nov: 10,
  dec: 11
};

function localDate(y: number, mo: number, d: number, h: number, mi: number, s: number): Date | null {
  const date = new Date(y, mo, d, h, mi, s);
  return Number.isNaN(date.getTime()) ? null : date;
}

/**
 * Parses the timestamp shapes scheduler CLIs print, all in cluster-local time:
 * `Mon Jan  1 10:00:00 2024`, `01/01/2024 10:00:00[.123]`, `2024-01-01T10:00:00`.
 * Unknown, empty and placeholder values (`N/A`, `None`, `Unknown`, `-/-`) give null.
 */
export function parseSchedulerTime(value: string | undefined | null): Date | null {
  const text = nonEmpty(value);
  if (!text) return null;

  const ctime = /^[A-Za-z]{3}\s+([A-Za-z]{3})\s+(\d{1,2})\s+(\d{1,2}):(\d{2}):(\d{2})\s+(\d{4})$/.exec(text);
  if (ctime) {
    const month = MONTHS[(ctime[1] ?? "").toLowerCase()];
    if (month === undefined) return null;
    return localDate(
      Number(ctime[6]),
      month,
      Number(ctime[2]),
      Number(ctime[3]),
      Number(ctime[4]),
      Number(ctime[5])
    );
  }

  const us = /^(\d{2})\/(\d{2})\/(\d{4})\s+(\d{1,2}):(\d{2}):(\d{2})(?:\.\d+)?$/.exec(text);
  if (us) {
    return localDate(Number(us[3]), Number(us[1]) - 1, Number(us[2]), Number(us[4]), Number(us[5]), Number(us[6]));
  }

  const iso = /^(\d{4})-(\d{2})-(\d{2})[T\s](\d{2}):(\d{2}):(\d{2})(?:\.\d+)?$/.exec(text);
  if (iso) {
    return localDate(
      Number(iso[1]),
      Number(iso[2]) - 1,
      Number(iso[3]),
      Number(iso[4]),
      Number(iso[5]),
      Number(iso[6])
    );
  }

  return null;
}

export function epochSecondsToDate(value: string | undefined | null): Date | null {
  const n = parseIntOrNull(value ?? null);
  if (n === null || n <= 0) return null;
  return new Date(n * 1000);
}

/** Extracts a GPU count from gres/TRES strings such as `gres/gpu:2`, `gpu:a100:4` or `ngpus=1`. */
export function parseGpuCount(value: string | undefined | null): number | null {
  const text = nonEmpty(value);
  if (!text) return null;
  const m = /gpu(?::[A-Za-z0-9_-]+)?[:=](\d+)/i.exec(text) ?? /ngpus=(\d+)/i.exec(text);
  if (!m) return null;
  return parseIntOrNull(m[1]);
}

/**
 * Pipes a rendered script to a submit command. Start failures, timeouts and non-zero
 * exits all surface as `SubmissionError`; the caller parses the job id.
 */
export async function runSubmission(
  deps: SchedulerDeps,
  argv: string[],
  script: string,
  cwd?: string
): Promise<CommandResult> {
  let res: CommandResult;
  try {
    res = await deps.runner.run(argv, { timeoutSeconds: deps.commandTimeoutSeconds, input: script, cwd });
  } catch (e) {
    throw new SubmissionError(`${argv[0] ?? "submit"} could not be started: ${e instanceof Error ? e.message : String(e)}`);
  }
  if (res.timedOut) {
    throw new SubmissionError(`${argv[0] ?? "submit"} timed out after ${deps.commandTimeoutSeconds}s`, res.stdout, res.stderr);
  }
  if (res.exitCode !== 0) {
    const stderr = res.stderr.trim();
    throw new SubmissionError(
      `${argv[0] ?? "submit"} failed (exit ${res.exitCode})${stderr ? `: ${stderr}` : ""}`,
      res.stdout,
      res.stderr
    );
  }
  return res;
}

/** Runs an interactive job to completion; there is no timeout. */
export async function runInteractive(
  deps: SchedulerDeps,
  scheduler: SchedulerName,
  argv: string[],
  cwd?: string
): Promise<JobResult> {
  let res: CommandResult;
  try {
    res = await deps.runner.run(argv, { timeoutSeconds: null, cwd });
  } catch (e) {
    throw new SubmissionError(`${argv[0] ?? "interactive"} could not be started: ${e instanceof Error ? e.message : String(e)}`);
  }
  const now = deps.now ? deps.now() : new Date();
  deps.logger.info(`interactive ${scheduler} job finished (exit ${res.exitCode})`);
  return {
    jobId: `interactive-${now.getTime()}`,
    scheduler,
    status: res.exitCode === 0 ? "COMPLETED" : "FAILED",
    exitCode: res.exitCode
  };
}

export function requireJobId(id: string | null, res: CommandResult, command: string): string {
  if (!id) {
    throw new SubmissionError(`unable to parse ${command} job id from output: ${res.stdout || res.stderr}`, res.stdout, res.stderr);
  }
  return id;
}
