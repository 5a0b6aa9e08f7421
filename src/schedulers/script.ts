import type { JobSpec } from "../core/job.js";

export function bashSingleQuote(value: string): string {
  return `'${value.replace(/'/g, `'"'"'`)}'`;
}

function splitSeconds(seconds: number): { days: number; hours: number; minutes: number; secs: number } {
  if (!Number.isInteger(seconds) || seconds < 1) throw new Error(`invalid time limit seconds: ${seconds}`);
  const days = Math.floor(seconds / 86400);
  const rem = seconds - days * 86400;
  const hours = Math.floor(rem / 3600);
  const rem2 = rem - hours * 3600;
  const minutes = Math.floor(rem2 / 60);
  return { days, hours, minutes, secs: rem2 - minutes * 60 };
}

const pad2 = (n: number): string => String(n).padStart(2, "0");

/** `D-HH:MM:SS` (Slurm). */
export function formatDayTimeLimit(seconds: number): string {
  const { days, hours, minutes, secs } = splitSeconds(seconds);
  if (days > 0) return `${days}-${pad2(hours)}:${pad2(minutes)}:${pad2(secs)}`;
  return `${pad2(hours)}:${pad2(minutes)}:${pad2(secs)}`;
}

/** `HH:MM:SS` with hours past 24 (SGE h_rt, PBS walltime). */
export function formatHourTimeLimit(seconds: number): string {
  const { days, hours, minutes, secs } = splitSeconds(seconds);
  return `${pad2(days * 24 + hours)}:${pad2(minutes)}:${pad2(secs)}`;
}

function assertEnvKey(key: string): void {
  if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(key)) {
    throw new Error(`invalid env var name: ${key}`);
  }
}

/** Scheduler-specific job name rules differ; this keeps the common safe subset. */
export function sanitizeJobName(name: string): string {
  const cleaned = name.trim().replace(/[^A-Za-z0-9_.-]/g, "_").slice(0, 128);
  if (!cleaned) return "job";
  return /^[0-9]/.test(cleaned) ? `j${cleaned}` : cleaned;
}

/**
 * Renders a batch script: shebang, scheduler directives, then the shared body
 * (module loads, environment, working directory, command).
 */
export function renderJobScript(job: JobSpec, directives: string[]): string {
  const envKeys = Object.keys(job.env ?? {}).sort();
  for (const k of envKeys) assertEnvKey(k);

  const lines: string[] = [];
  lines.push("#!/usr/bin/env bash");
  lines.push(...directives);
  lines.push("");
  lines.push("set -eo pipefail");
  lines.push("");

  if (job.modules?.length) {
    for (const m of job.modules) lines.push(`module load ${bashSingleQuote(m)}`);
    lines.push("");
  }

  for (const k of envKeys) {
    lines.push(`export ${k}=${bashSingleQuote(String(job.env?.[k] ?? ""))}`);
  }
  if (envKeys.length > 0) lines.push("");

  if (job.workdir) {
    lines.push(`cd ${bashSingleQuote(job.workdir)}`);
    lines.push("");
  }

  if (!job.command.trim()) throw new Error("job command must be non-empty");
  lines.push(job.command.trimEnd());
  lines.push("");

  return lines.join("\n");
}
