#!/usr/bin/env node
import os from "os";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { loadConfig } from "./config/config.js";
import { createConsoleLogger } from "./core/logger.js";
import { LocalCommandRunner } from "./execution/commandRunner.js";
import { createMonitorServer } from "./mcp/monitorServer.js";
import { JobProvider } from "./monitor/jobProvider.js";
import { createScheduler, detectScheduler } from "./schedulers/index.js";

function currentUser(): string {
  return process.env.USER ?? os.userInfo().username;
}

async function main(): Promise<void> {
  const logger = createConsoleLogger("hpc-monitor");
  const config = await loadConfig();
  const runner = new LocalCommandRunner(config.commandTimeoutSeconds);

  const name =
    config.scheduler ??
    (await detectScheduler({
      env: process.env,
      which: (binary) => runner.which(binary),
      run: (argv, timeoutSeconds) => runner.run(argv, { timeoutSeconds })
    }));

  const scheduler = await createScheduler(name, {
    runner,
    logger: createConsoleLogger(`scheduler:${name}`),
    commandTimeoutSeconds: config.commandTimeoutSeconds,
    sge: { parallelEnvironment: config.sge.parallelEnvironment },
    pbs: { jobHistory: config.pbs.jobHistory },
    local: { outputDir: config.local.outputDir }
  });

  const user = currentUser();
  const provider = new JobProvider(scheduler, {
    currentUser: user,
    refreshIntervalSeconds: config.refreshIntervalSeconds,
    logger: createConsoleLogger("monitor"),
    filter: { userScope: config.userFilter }
  });

  const server = createMonitorServer({
    scheduler,
    provider,
    logger,
    currentUser: user,
    completedLimit: config.completedLimit
  });
  const transport = new StdioServerTransport();
  await server.connect(transport);

  provider.start();
  logger.info(`ready (${name}, refresh every ${config.refreshIntervalSeconds}s)`);

  const shutdown = (): void => {
    provider.stop();
    server.close().catch((err: unknown) => {
      logger.error(`close failed: ${err instanceof Error ? err.message : String(err)}`);
    });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);
}

main().catch((err) => {
  console.error(err);
  process.exitCode = 1;
});
