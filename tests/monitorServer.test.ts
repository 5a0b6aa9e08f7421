import { afterEach, describe, it, expect } from "vitest";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { CallToolResultSchema } from "@modelcontextprotocol/sdk/types.js";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { silentLogger } from "../src/core/logger.js";
import { createMonitorServer } from "../src/mcp/monitorServer.js";
import { JobProvider } from "../src/monitor/jobProvider.js";
import { SlurmScheduler } from "../src/schedulers/slurm/slurmScheduler.js";
import { FakeRunner, FIXED_NOW, schedulerDeps } from "./helpers/fakeRunner.js";

const SQUEUE = [
  "101|align|alice|RUNNING|gpu|2024-01-01T09:00:00|2024-01-01T10:00:00|1:30:00|8|16G|gres/gpu:2|node01|N/A|(null)",
  "102|sort|bob|PENDING|short|2024-01-01T11:00:00|N/A|0:00|1|4G|N/A|(null)|N/A|(null)",
  "103_4|sweep|alice|RUNNING|short|2024-01-01T11:00:00|2024-01-01T11:30:00|30:00|1|1G|N/A|node02|4|(null)"
].join("\n");

const SACCT_DONE =
  "500|fit|alice|COMPLETED|gpu|2024-01-01T08:00:00|2024-01-01T09:00:00|2024-01-01T10:00:00|01:00:00|1|4G|0:0|node01|cpu=1\n";

const SCONTROL_101 = [
  "JobId=101 JobName=align",
  "   UserId=alice(1000) GroupId=alice(1000)",
  "   JobState=RUNNING Reason=None Dependency=(null)",
  "   RunTime=01:30:00",
  "   SubmitTime=2024-01-01T09:00:00 StartTime=2024-01-01T10:00:00",
  "   Partition=gpu NodeList=node01 NumCPUs=8",
  "   StdOut=/home/alice/slurm-%j.out",
  "   StdErr=/home/alice/slurm-%j.err",
  ""
].join("\n");

interface Harness {
  runner: FakeRunner;
  provider: JobProvider;
  client: Client;
  server: McpServer;
}

let open: Harness | null = null;

async function connect(accounting = true): Promise<Harness> {
  const runner = new FakeRunner()
    .on(["scontrol", "show", "job", "101"], { stdout: SCONTROL_101 })
    .on(["squeue", "-h", "-j"], (argv) => ({ stdout: argv[3] === "101" ? "RUNNING\n" : "" }))
    .on(["squeue"], { stdout: SQUEUE })
    .on(["sacct"], (argv) => ({ stdout: argv.includes("-j") ? "" : SACCT_DONE }))
    .on(["scancel"], {});
  const scheduler = new SlurmScheduler(schedulerDeps(runner, { accounting }));
  const provider = new JobProvider(scheduler, {
    currentUser: "alice",
    refreshIntervalSeconds: 10,
    logger: silentLogger,
    now: () => FIXED_NOW
  });
  const server = createMonitorServer({
    scheduler,
    provider,
    logger: silentLogger,
    currentUser: "alice",
    completedLimit: 100
  });

  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await server.connect(serverTransport);
  const client = new Client({ name: "monitor-test-client", version: "0.0.0" });
  await client.connect(clientTransport);

  open = { runner, provider, client, server };
  return open;
}

async function callTool(client: Client, name: string, args: Record<string, unknown> = {}) {
  return client.request({ method: "tools/call", params: { name, arguments: args } }, CallToolResultSchema);
}

function textOf(result: Awaited<ReturnType<typeof callTool>>): string {
  const first = result.content[0];
  return first?.type === "text" ? first.text : "";
}

/** Error text whether the SDK reports the failure as a tool result or a protocol error. */
async function errorText(client: Client, name: string, args: Record<string, unknown>): Promise<string> {
  let result: Awaited<ReturnType<typeof callTool>>;
  try {
    result = await callTool(client, name, args);
  } catch (e) {
    return e instanceof Error ? e.message : String(e);
  }
  expect(result.isError).toBe(true);
  return textOf(result);
}

afterEach(async () => {
  if (!open) return;
  await open.provider.whenIdle();
  await open.client.close();
  await open.server.close();
  open = null;
});

describe("monitor server tools", () => {
  it("registers every tool", async () => {
    const { client } = await connect();
    const { tools } = await client.listTools();
    expect(tools.map((t) => t.name).sort()).toEqual([
      "job_cancel",
      "job_get",
      "job_script_preview",
      "job_status",
      "job_submit",
      "job_submit_array",
      "jobs_list_active",
      "jobs_list_completed",
      "monitor_refresh",
      "monitor_set_filter",
      "monitor_snapshot"
    ]);
  });

  it("lists the caller's active jobs as snake_case records", async () => {
    const { client } = await connect();
    const result = await callTool(client, "jobs_list_active");
    expect(textOf(result)).toBe("2 active jobs");
    expect(result.structuredContent?.["count"]).toBe(2);
    expect(result.structuredContent?.["jobs"]).toEqual([
      {
        job_id: "101",
        name: "align",
        user: "alice",
        status: "RUNNING",
        queue: "gpu",
        submit_time: new Date(2024, 0, 1, 9, 0, 0).toISOString(),
        start_time: new Date(2024, 0, 1, 10, 0, 0).toISOString(),
        end_time: null,
        runtime_seconds: 5400,
        runtime_display: "1h 30m",
        cpu: 8,
        memory: "16G",
        gpu: 2,
        resources_display: "8/16G/2GPU",
        exit_code: null,
        stdout_path: null,
        stderr_path: null,
        node: "node01",
        dependencies: null,
        array_task_id: null
      },
      expect.objectContaining({ job_id: "103.4", array_task_id: "4" })
    ]);
  });

  it("filters active jobs by scope and status", async () => {
    const { client } = await connect();
    const result = await callTool(client, "jobs_list_active", { user_scope: "all", statuses: ["PENDING"] });
    expect(textOf(result)).toBe("1 active job");
    expect(result.structuredContent?.["count"]).toBe(1);
  });

  it("lists completed jobs from accounting", async () => {
    const { client } = await connect();
    const result = await callTool(client, "jobs_list_completed", { user_scope: "all", since: "2023-12-30T00:00:00Z" });
    expect(textOf(result)).toBe("1 completed job");
    expect(result.structuredContent?.["jobs"]).toEqual([
      expect.objectContaining({ job_id: "500", status: "COMPLETED", exit_code: 0, runtime_seconds: 3600 })
    ]);
  });

  it("reports missing accounting as an error", async () => {
    const { client, runner } = await connect(false);
    const text = await errorText(client, "jobs_list_completed", {});
    expect(text).toContain("job accounting is not available for scheduler: slurm");
    expect(runner.callsTo("sacct")).toHaveLength(0);
  });

  it("reports unknown jobs on job_get", async () => {
    const { client } = await connect();
    expect(await errorText(client, "job_get", { job_id: "999" })).toContain("job not found: 999");
  });

  it("returns status, exit code and paths from one lookup", async () => {
    const { client, runner } = await connect();
    const before = runner.calls.length;
    const result = await callTool(client, "job_status", { job_id: "101" });
    expect(textOf(result)).toBe("101 RUNNING");
    expect(result.structuredContent).toEqual({
      job_id: "101",
      status: "RUNNING",
      exit_code: null,
      stdout_path: "/home/alice/slurm-101.out",
      stderr_path: "/home/alice/slurm-101.err"
    });
    expect(runner.calls.slice(before).map((c) => c.argv)).toEqual([["scontrol", "show", "job", "101"]]);
  });

  it("reports unknown ids on job_status", async () => {
    const { client } = await connect();
    const result = await callTool(client, "job_status", { job_id: "999" });
    expect(textOf(result)).toBe("999 UNKNOWN");
    expect(result.structuredContent).toEqual({
      job_id: "999",
      status: "UNKNOWN",
      exit_code: null,
      stdout_path: null,
      stderr_path: null
    });
  });

  it("cancels active jobs and refreshes the snapshot", async () => {
    const { client, runner, provider } = await connect();
    const done = await callTool(client, "job_cancel", { job_id: "101" });
    expect(done.structuredContent).toEqual({ job_id: "101", cancelled: true });
    expect(textOf(done)).toBe("Cancelled 101");

    await provider.whenIdle();
    expect(runner.callsTo("scancel").map((c) => c.argv)).toEqual([["scancel", "101"]]);
    expect(provider.snapshot().count).toBe(2);

    const missing = await callTool(client, "job_cancel", { job_id: "555" });
    expect(missing.structuredContent).toEqual({ job_id: "555", cancelled: false });
  });

  it("submits a job with scheduler arguments and refreshes", async () => {
    const { client, runner, provider } = await connect();
    runner.on(["sbatch"], { stdout: "4242\n" });

    const result = await callTool(client, "job_submit", {
      job: { name: "fit", command: "./fit.sh --epochs 3", workdir: "/scratch", scheduler_args: ["--qos=low"] }
    });
    expect(textOf(result)).toBe("Submitted 4242");
    expect(result.structuredContent).toEqual({ job_id: "4242", scheduler: "slurm", status: "PENDING", exit_code: null });
    expect(runner.callsTo("sbatch")[0]?.argv).toEqual(["sbatch", "--parsable", "--qos=low"]);

    await provider.whenIdle();
    expect(provider.snapshot().refreshedAt).toEqual(FIXED_NOW);
  });

  it("surfaces submission failures", async () => {
    const { client, runner } = await connect();
    runner.on(["sbatch"], { exitCode: 1, stderr: "invalid partition" });
    const text = await errorText(client, "job_submit", { job: { name: "fit", command: "true" } });
    expect(text).toContain("sbatch failed (exit 1): invalid partition");
  });

  it("submits arrays and rejects inverted ranges", async () => {
    const { client, runner } = await connect();
    runner.on(["sbatch"], { stdout: "800\n" });

    const result = await callTool(client, "job_submit_array", {
      job: { name: "sweep", command: "run" },
      start: 0,
      end: 2
    });
    expect(result.structuredContent).toEqual({ base_job_id: "800", scheduler: "slurm", task_ids: ["800.0", "800.1", "800.2"] });

    const text = await errorText(client, "job_submit_array", { job: { name: "sweep", command: "run" }, start: 5, end: 1 });
    expect(text).toContain("array end (1) is before start (5)");
    expect(runner.callsTo("sbatch")).toHaveLength(1);
  });

  it("previews scripts without submitting", async () => {
    const { client, runner } = await connect();
    const result = await callTool(client, "job_script_preview", {
      job: { name: "x", command: "true", cpu: 2 },
      array: { start: 1, end: 4 }
    });
    const script = String(result.structuredContent?.["script"]);
    expect(script).toContain("#SBATCH --cpus-per-task=2\n");
    expect(script).toContain("#SBATCH --array=1-4:1\n");
    expect(result.structuredContent?.["submit_command"]).toEqual(["sbatch", "--parsable"]);
    expect(runner.calls).toHaveLength(0);
  });
});

describe("monitor snapshot tools", () => {
  it("returns the empty snapshot before the first refresh", async () => {
    const { client } = await connect();
    const result = await callTool(client, "monitor_snapshot");
    expect(textOf(result)).toBe("0 my jobs");
    expect(result.structuredContent).toEqual({
      scheduler: "slurm",
      state: "idle",
      auto_refresh: true,
      summary: "0 my jobs",
      filter: { user_scope: "mine", statuses: null, queue: null },
      refreshed_at: null,
      error: null,
      count: 0,
      jobs: []
    });
  });

  it("refreshes on demand", async () => {
    const { client } = await connect();
    const result = await callTool(client, "monitor_refresh");
    expect(textOf(result)).toBe("2 my jobs");
    expect(result.structuredContent?.["refreshed"]).toBe(true);
    expect(result.structuredContent?.["snapshot"]).toEqual(
      expect.objectContaining({ count: 2, refreshed_at: FIXED_NOW.toISOString(), error: null })
    );
  });

  it("changes the filter and auto refresh", async () => {
    const { client, provider } = await connect();
    const result = await callTool(client, "monitor_set_filter", { user_scope: "all", auto_refresh: false });
    expect(textOf(result)).toBe("3 all jobs");
    expect(result.structuredContent?.["snapshot"]).toEqual(
      expect.objectContaining({
        auto_refresh: false,
        count: 3,
        filter: { user_scope: "all", statuses: null, queue: null }
      })
    );
    expect(provider.autoRefreshEnabled).toBe(false);
  });
});
