import { ConfigError } from "../core/errors.js";
import { isSchedulerName, type SchedulerName } from "../core/job.js";
import type { CommandResult } from "../execution/commandRunner.js";

/** What detection needs from the host; tests swap in a scripted probe. */
export interface DetectionProbe {
  env: Readonly<Record<string, string | undefined>>;
  which(binary: string): Promise<string | null>;
  run(argv: string[], timeoutSeconds: number): Promise<CommandResult>;
}

const SGE_HELP_TIMEOUT_SECONDS = 5;

/** SGE's `qstat -help` announces itself; PBS and Torque ship a `qstat` too. */
async function qstatIsSge(probe: DetectionProbe): Promise<boolean> {
  try {
    const res = await probe.run(["qstat", "-help"], SGE_HELP_TIMEOUT_SECONDS);
    if (res.timedOut) return false;
    const output = res.stdout + res.stderr;
    return output.includes("SGE") || output.includes("Grid Engine");
  } catch {
    return false;
  }
}

export function parseSchedulerName(value: string): SchedulerName {
  const name = value.trim().toLowerCase();
  if (!isSchedulerName(name)) throw new ConfigError(`unknown scheduler: ${value}`);
  return name;
}

/**
 * Picks the scheduler once at startup: `HPC_SCHEDULER`, then SGE, Slurm, PBS,
 * and finally `local`.
 */
export async function detectScheduler(probe: DetectionProbe): Promise<SchedulerName> {
  const override = probe.env["HPC_SCHEDULER"];
  if (override) return parseSchedulerName(override);

  const qsub = await probe.which("qsub");
  if (qsub && (probe.env["SGE_ROOT"] || (await qstatIsSge(probe)))) return "sge";

  if ((await probe.which("sbatch")) && (await probe.which("squeue"))) return "slurm";

  if (qsub && probe.env["PBS_CONF_FILE"]) return "pbs";

  return "local";
}
