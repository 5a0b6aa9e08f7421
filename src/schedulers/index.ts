import type { SchedulerName } from "../core/job.js";
import type { Logger } from "../core/logger.js";
import type { CommandRunner } from "../execution/commandRunner.js";
import { LocalScheduler, type LocalLauncher } from "./local/localScheduler.js";
import { PbsScheduler } from "./pbs/pbsScheduler.js";
import { SgeScheduler } from "./sge/sgeScheduler.js";
import { SlurmScheduler } from "./slurm/slurmScheduler.js";
import type { Scheduler, SchedulerDeps } from "./types.js";

export interface CreateSchedulerOptions {
  runner: CommandRunner;
  logger: Logger;
  commandTimeoutSeconds: number;
  sge?: { parallelEnvironment?: string };
  /** PBS keeps finished jobs only when server job history is on. */
  pbs?: { jobHistory?: boolean };
  local?: { outputDir?: string | null; launcher?: LocalLauncher };
  now?: () => Date;
}

/** Whether the backend can answer questions about finished jobs. */
async function probeAccounting(name: SchedulerName, options: CreateSchedulerOptions): Promise<boolean> {
  switch (name) {
    case "sge":
      return (await options.runner.which("qacct")) !== null;
    case "slurm":
      return (await options.runner.which("sacct")) !== null;
    case "pbs":
      return options.pbs?.jobHistory ?? false;
    case "local":
      return false;
  }
}

export async function createScheduler(name: SchedulerName, options: CreateSchedulerOptions): Promise<Scheduler> {
  const accounting = await probeAccounting(name, options);
  const deps: SchedulerDeps = {
    runner: options.runner,
    logger: options.logger,
    commandTimeoutSeconds: options.commandTimeoutSeconds,
    accounting,
    now: options.now
  };
  options.logger.info(`using ${name} scheduler (accounting ${accounting ? "available" : "unavailable"})`);

  switch (name) {
    case "sge":
      return new SgeScheduler(deps, { parallelEnvironment: options.sge?.parallelEnvironment });
    case "slurm":
      return new SlurmScheduler(deps);
    case "pbs":
      return new PbsScheduler(deps);
    case "local":
      return new LocalScheduler(deps, { outputDir: options.local?.outputDir, launcher: options.local?.launcher });
  }
}

export type { Scheduler, SchedulerDeps, ActiveJobFilter, CompletedJobFilter, OutputStream } from "./types.js";
export { detectScheduler, parseSchedulerName, type DetectionProbe } from "./detection.js";
