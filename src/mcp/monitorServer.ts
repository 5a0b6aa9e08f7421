import { ErrorCode, McpError } from "@modelcontextprotocol/sdk/types.js";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type * as z from "zod/v4";
import { AccountingNotAvailableError, JobNotFoundError, SubmissionError } from "../core/errors.js";
import type { ArrayJobResult, JobArraySpec, JobResult, JobSpec, SchedulerName } from "../core/job.js";
import { formatResources, formatRuntime, isComplete, type JobInfo } from "../core/jobInfo.js";
import type { JsonObject } from "../core/json.js";
import type { Logger } from "../core/logger.js";
import { describeSnapshot, type JobProvider, type JobSnapshot, type ProviderFilter } from "../monitor/jobProvider.js";
import type { CompletedJobFilter, Scheduler } from "../schedulers/types.js";
import {
  zArrayRange,
  zEmptyInput,
  zJobCancelOutput,
  zJobGetOutput,
  zJobIdInput,
  zJobListOutput,
  zJobScriptPreviewInput,
  zJobScriptPreviewOutput,
  zJobSpecInput,
  zJobStatusOutput,
  zJobSubmitArrayInput,
  zJobSubmitArrayOutput,
  zJobSubmitInput,
  zJobSubmitOutput,
  zJobsListActiveInput,
  zJobsListCompletedInput,
  zMonitorRefreshOutput,
  zMonitorSetFilterInput,
  zSnapshot
} from "./toolSchemas.js";

export interface MonitorServerDeps {
  scheduler: Scheduler;
  provider: JobProvider;
  logger: Logger;
  /** Username behind the `mine` scope. */
  currentUser: string;
  /** Default `limit` for completed-job listings. */
  completedLimit: number;
  version?: string;
}

function iso(d: Date | null): string | null {
  return d ? d.toISOString() : null;
}

export function toJobRecord(job: JobInfo): JsonObject {
  return {
    job_id: job.jobId,
    name: job.name,
    user: job.user,
    status: job.status,
    queue: job.queue,
    submit_time: iso(job.submitTime),
    start_time: iso(job.startTime),
    end_time: iso(job.endTime),
    runtime_seconds: job.runtimeSeconds,
    runtime_display: formatRuntime(job),
    cpu: job.cpu,
    memory: job.memory,
    gpu: job.gpu,
    resources_display: formatResources(job),
    exit_code: job.exitCode,
    stdout_path: job.stdoutPath,
    stderr_path: job.stderrPath,
    node: job.node,
    dependencies: job.dependencies ? [...job.dependencies] : null,
    array_task_id: job.arrayTaskId
  };
}

export function toJobSpec(input: z.infer<typeof zJobSpecInput>, scheduler: Scheduler): JobSpec {
  let schedulerArgs: Partial<Record<SchedulerName, string[]>> | undefined;
  if (input.scheduler_args) {
    schedulerArgs = {};
    schedulerArgs[scheduler.name] = input.scheduler_args;
  }
  return {
    name: input.name,
    command: input.command,
    cpu: input.cpu,
    memory: input.memory,
    gpu: input.gpu,
    timeLimitSeconds: input.time_limit_seconds,
    queue: input.queue,
    workdir: input.workdir,
    stdout: input.stdout,
    stderr: input.stderr,
    mergeOutput: input.merge_output,
    env: input.env,
    modules: input.modules,
    dependencies: input.dependencies,
    schedulerArgs
  };
}

function toArraySpec(job: JobSpec, range: z.infer<typeof zArrayRange>): JobArraySpec {
  if (range.end < range.start) {
    throw new McpError(ErrorCode.InvalidParams, `array end (${range.end}) is before start (${range.start})`);
  }
  return { job, start: range.start, end: range.end, step: range.step, maxConcurrent: range.max_concurrent };
}

function parseInstant(value: string | undefined, field: string): Date | undefined {
  if (value === undefined) return undefined;
  const d = new Date(value);
  if (Number.isNaN(d.getTime())) throw new McpError(ErrorCode.InvalidParams, `invalid ${field}: ${value}`);
  return d;
}

/** Maps domain errors onto MCP error codes; anything else propagates unchanged. */
function toMcpError(e: unknown): unknown {
  if (e instanceof JobNotFoundError) return new McpError(ErrorCode.InvalidParams, e.message);
  if (e instanceof AccountingNotAvailableError) return new McpError(ErrorCode.InvalidRequest, e.message);
  return e;
}

export function createMonitorServer(deps: MonitorServerDeps): McpServer {
  const mcp = new McpServer({
    name: "hpc-monitor",
    version: deps.version ?? "0.1.0"
  });

  const { scheduler, provider } = deps;

  function snapshotRecord(snapshot: JobSnapshot): JsonObject {
    return {
      scheduler: scheduler.name,
      state: provider.state,
      auto_refresh: provider.autoRefreshEnabled,
      summary: describeSnapshot(snapshot),
      filter: {
        user_scope: snapshot.filter.userScope,
        statuses: snapshot.filter.statuses ? [...snapshot.filter.statuses] : null,
        queue: snapshot.filter.queue
      },
      refreshed_at: iso(snapshot.refreshedAt),
      error: snapshot.error,
      count: snapshot.count,
      jobs: snapshot.jobs.map(toJobRecord)
    };
  }

  function scopeUser(scope: "mine" | "all", user: string | undefined): string | undefined {
    if (user !== undefined) return user;
    return scope === "mine" ? deps.currentUser : undefined;
  }

  mcp.registerTool(
    "jobs_list_active",
    {
      description: "List pending and running jobs straight from the scheduler.",
      inputSchema: zJobsListActiveInput,
      outputSchema: zJobListOutput
    },
    async (args) => {
      const jobs = await scheduler.listActiveJobs({
        user: scopeUser(args.user_scope, args.user),
        status: args.statuses ? new Set(args.statuses) : undefined,
        queue: args.queue
      });
      const structured: JsonObject = { scheduler: scheduler.name, count: jobs.length, jobs: jobs.map(toJobRecord) };
      return {
        content: [{ type: "text", text: `${jobs.length} active job${jobs.length === 1 ? "" : "s"}` }],
        structuredContent: structured
      };
    }
  );

  mcp.registerTool(
    "jobs_list_completed",
    {
      description: "List finished jobs from scheduler accounting, most recent first.",
      inputSchema: zJobsListCompletedInput,
      outputSchema: zJobListOutput
    },
    async (args) => {
      const filter: CompletedJobFilter = {
        user: scopeUser(args.user_scope, args.user),
        since: parseInstant(args.since, "since"),
        until: parseInstant(args.until, "until"),
        exitCode: args.exit_code,
        queue: args.queue,
        limit: args.limit ?? deps.completedLimit
      };
      try {
        const jobs = await scheduler.listCompletedJobs(filter);
        const structured: JsonObject = { scheduler: scheduler.name, count: jobs.length, jobs: jobs.map(toJobRecord) };
        return {
          content: [{ type: "text", text: `${jobs.length} completed job${jobs.length === 1 ? "" : "s"}` }],
          structuredContent: structured
        };
      } catch (e) {
        throw toMcpError(e);
      }
    }
  );

  mcp.registerTool(
    "job_get",
    {
      description: "Full details for one job, live or from accounting.",
      inputSchema: zJobIdInput,
      outputSchema: zJobGetOutput
    },
    async (args) => {
      try {
        const job = await scheduler.getJobDetails(args.job_id);
        return {
          content: [{ type: "text", text: `${job.jobId} ${job.status}` }],
          structuredContent: { job: toJobRecord(job) }
        };
      } catch (e) {
        throw toMcpError(e);
      }
    }
  );

  mcp.registerTool(
    "job_status",
    {
      description: "Status, exit code and output paths of one job. Unknown ids report UNKNOWN.",
      inputSchema: zJobIdInput,
      outputSchema: zJobStatusOutput
    },
    async (args) => {
      // One detail lookup answers all four fields.
      let job: JobInfo | null = null;
      try {
        job = await scheduler.getJobDetails(args.job_id);
      } catch (e) {
        if (!(e instanceof JobNotFoundError)) throw toMcpError(e);
      }
      const status = job?.status ?? "UNKNOWN";
      const structured: JsonObject = {
        job_id: args.job_id,
        status,
        exit_code: job && isComplete(job) ? job.exitCode : null,
        stdout_path: job?.stdoutPath ?? null,
        stderr_path: job?.stderrPath ?? null
      };
      return {
        content: [{ type: "text", text: `${args.job_id} ${status}` }],
        structuredContent: structured
      };
    }
  );

  mcp.registerTool(
    "job_cancel",
    {
      description: "Cancel a pending or running job. Returns cancelled=false for unknown or finished jobs.",
      inputSchema: zJobIdInput,
      outputSchema: zJobCancelOutput
    },
    async (args) => {
      const cancelled = await scheduler.cancel(args.job_id);
      if (cancelled) void provider.refreshNow();
      return {
        content: [{ type: "text", text: cancelled ? `Cancelled ${args.job_id}` : `${args.job_id} not cancelled` }],
        structuredContent: { job_id: args.job_id, cancelled }
      };
    }
  );

  mcp.registerTool(
    "job_submit",
    {
      description: "Submit a job to the active scheduler. Interactive jobs block until they exit.",
      inputSchema: zJobSubmitInput,
      outputSchema: zJobSubmitOutput
    },
    async (args) => {
      let result: JobResult;
      try {
        result = await scheduler.submit(toJobSpec(args.job, scheduler), args.interactive);
      } catch (e) {
        if (e instanceof SubmissionError) throw new McpError(ErrorCode.InvalidRequest, e.message);
        throw e;
      }
      deps.logger.info(`job_submit ${result.scheduler} ${result.jobId}`);
      if (!args.interactive) void provider.refreshNow();
      const structured: JsonObject = {
        job_id: result.jobId,
        scheduler: result.scheduler,
        status: result.status,
        exit_code: result.exitCode
      };
      return {
        content: [{ type: "text", text: `Submitted ${result.jobId}` }],
        structuredContent: structured
      };
    }
  );

  mcp.registerTool(
    "job_submit_array",
    {
      description: "Submit an array job; one task per index in start..end by step.",
      inputSchema: zJobSubmitArrayInput,
      outputSchema: zJobSubmitArrayOutput
    },
    async (args) => {
      const array = toArraySpec(toJobSpec(args.job, scheduler), args);
      let result: ArrayJobResult;
      try {
        result = await scheduler.submitArray(array);
      } catch (e) {
        if (e instanceof SubmissionError) throw new McpError(ErrorCode.InvalidRequest, e.message);
        throw e;
      }
      void provider.refreshNow();
      return {
        content: [{ type: "text", text: `Submitted array ${result.baseJobId} (${result.taskIds.length} tasks)` }],
        structuredContent: { base_job_id: result.baseJobId, scheduler: result.scheduler, task_ids: result.taskIds }
      };
    }
  );

  mcp.registerTool(
    "job_script_preview",
    {
      description: "Render the batch script and submit command without submitting.",
      inputSchema: zJobScriptPreviewInput,
      outputSchema: zJobScriptPreviewOutput
    },
    async (args) => {
      const job = toJobSpec(args.job, scheduler);
      const array = args.array ? toArraySpec(job, args.array) : undefined;
      const script = scheduler.generateScript(job, array);
      const submitCommand = scheduler.buildSubmitCommand(job, array);
      return {
        content: [{ type: "text", text: script }],
        structuredContent: { scheduler: scheduler.name, script, submit_command: submitCommand }
      };
    }
  );

  mcp.registerTool(
    "monitor_snapshot",
    {
      description: "The latest polled snapshot of active jobs under the monitor filter.",
      inputSchema: zEmptyInput,
      outputSchema: zSnapshot
    },
    async () => {
      const snapshot = provider.snapshot();
      return {
        content: [{ type: "text", text: describeSnapshot(snapshot) }],
        structuredContent: snapshotRecord(snapshot)
      };
    }
  );

  mcp.registerTool(
    "monitor_refresh",
    {
      description: "Refresh the snapshot now. refreshed=false when a refresh was already running.",
      inputSchema: zEmptyInput,
      outputSchema: zMonitorRefreshOutput
    },
    async () => {
      const refreshed = await provider.refreshNow();
      const snapshot = provider.snapshot();
      return {
        content: [{ type: "text", text: refreshed ? describeSnapshot(snapshot) : "refresh already in progress" }],
        structuredContent: { refreshed, snapshot: snapshotRecord(snapshot) }
      };
    }
  );

  mcp.registerTool(
    "monitor_set_filter",
    {
      description: "Change the monitor filter (user scope, statuses, queue) and refresh.",
      inputSchema: zMonitorSetFilterInput,
      outputSchema: zMonitorRefreshOutput
    },
    async (args) => {
      if (args.auto_refresh !== undefined) provider.setAutoRefresh(args.auto_refresh);

      const patch: Partial<ProviderFilter> = {};
      if (args.user_scope !== undefined) patch.userScope = args.user_scope;
      if (args.statuses !== undefined) patch.statuses = args.statuses;
      if (args.queue !== undefined) patch.queue = args.queue;

      const refreshed = await provider.setFilter(patch);
      const snapshot = provider.snapshot();
      return {
        content: [{ type: "text", text: describeSnapshot(snapshot) }],
        structuredContent: { refreshed, snapshot: snapshotRecord(snapshot) }
      };
    }
  );

  return mcp;
}
