import { promises as fs } from "fs";
import YAML from "yaml";
import * as z from "zod/v4";
import { ConfigError } from "../core/errors.js";
import type { SchedulerName } from "../core/job.js";
import { parseSchedulerName } from "../schedulers/detection.js";

export const DEFAULT_CONFIG_PATH = "hpc-monitor.yaml";

export type UserScope = "mine" | "all";

const zConfigFile = z
  .object({
    /** `auto` (or absent) means detect at startup. */
    scheduler: z.enum(["auto", "sge", "slurm", "pbs", "local"]).optional(),
    refresh_interval_seconds: z.number().positive().optional(),
    command_timeout_seconds: z.number().positive().optional(),
    user_filter: z.enum(["mine", "all"]).optional(),
    completed_limit: z.number().int().positive().optional(),
    sge: z.object({ parallel_environment: z.string().min(1).optional() }).strict().optional(),
    pbs: z.object({ job_history: z.boolean().optional() }).strict().optional(),
    local: z.object({ output_dir: z.string().min(1).optional() }).strict().optional()
  })
  .strict();

export type ConfigFile = z.infer<typeof zConfigFile>;

export interface MonitorConfig {
  /** null: run detection. */
  scheduler: SchedulerName | null;
  refreshIntervalSeconds: number;
  commandTimeoutSeconds: number;
  userFilter: UserScope;
  completedLimit: number;
  sge: { parallelEnvironment: string };
  pbs: { jobHistory: boolean };
  local: { outputDir: string | null };
}

export interface LoadConfigOptions {
  env?: Readonly<Record<string, string | undefined>>;
  /** Overrides `HPC_MONITOR_CONFIG`. */
  path?: string;
}

function positiveSeconds(name: string, raw: string): number {
  const n = Number(raw.trim());
  if (!raw.trim() || !Number.isFinite(n) || n <= 0) {
    throw new ConfigError(`${name} must be a positive number of seconds, got: ${raw}`);
  }
  return n;
}

function isNotFound(e: unknown): boolean {
  return e instanceof Error && "code" in e && e.code === "ENOENT";
}

async function readConfigFile(filePath: string, required: boolean): Promise<ConfigFile> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, "utf8");
  } catch (e) {
    if (!required && isNotFound(e)) return {};
    throw new ConfigError(`cannot read config ${filePath}: ${e instanceof Error ? e.message : String(e)}`);
  }

  let parsed: unknown;
  try {
    parsed = YAML.parse(raw);
  } catch (e) {
    throw new ConfigError(`invalid YAML in ${filePath}: ${e instanceof Error ? e.message : String(e)}`);
  }
  return parseConfigFile(parsed ?? {}, filePath);
}

export function parseConfigFile(value: unknown, source = "config"): ConfigFile {
  const result = zConfigFile.safeParse(value);
  if (!result.success) {
    const details = result.error.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`).join("; ");
    throw new ConfigError(`invalid config at ${source}: ${details}`);
  }
  return result.data;
}

/** Applies defaults and environment overrides to a validated file. */
export function resolveConfig(file: ConfigFile, env: Readonly<Record<string, string | undefined>> = {}): MonitorConfig {
  const schedulerEnv = env["HPC_SCHEDULER"]?.trim();
  const fileScheduler = file.scheduler && file.scheduler !== "auto" ? file.scheduler : null;
  const refreshEnv = env["HPC_MONITOR_REFRESH_INTERVAL"];
  const timeoutEnv = env["HPC_MONITOR_COMMAND_TIMEOUT"];

  return {
    scheduler: schedulerEnv ? parseSchedulerName(schedulerEnv) : fileScheduler,
    refreshIntervalSeconds:
      refreshEnv !== undefined
        ? positiveSeconds("HPC_MONITOR_REFRESH_INTERVAL", refreshEnv)
        : (file.refresh_interval_seconds ?? 10),
    commandTimeoutSeconds:
      timeoutEnv !== undefined
        ? positiveSeconds("HPC_MONITOR_COMMAND_TIMEOUT", timeoutEnv)
        : (file.command_timeout_seconds ?? 30),
    userFilter: file.user_filter ?? "mine",
    completedLimit: file.completed_limit ?? 100,
    sge: { parallelEnvironment: file.sge?.parallel_environment ?? "smp" },
    pbs: { jobHistory: file.pbs?.job_history ?? false },
    local: { outputDir: file.local?.output_dir ?? null }
  };
}

/**
 * Reads the YAML config (optional unless named explicitly) and layers the
 * `HPC_*` environment overrides on top.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<MonitorConfig> {
  const env = options.env ?? process.env;
  const explicit = options.path ?? env["HPC_MONITOR_CONFIG"];
  const file = await readConfigFile(explicit ?? DEFAULT_CONFIG_PATH, explicit !== undefined);
  return resolveConfig(file, env);
}
