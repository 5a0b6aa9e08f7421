import * as z from "zod/v4";

export const zJobId = z.string().min(1).max(256);

export const zJobStatus = z.enum(["PENDING", "RUNNING", "COMPLETED", "FAILED", "CANCELLED", "TIMEOUT", "UNKNOWN"]);

export const zSchedulerName = z.enum(["sge", "slurm", "pbs", "local"]);

export const zUserScope = z.enum(["mine", "all"]);

export const zJobRecord = z.object({
  job_id: z.string(),
  name: z.string(),
  user: z.string(),
  status: zJobStatus,
  queue: z.string().nullable(),
  submit_time: z.string().nullable(),
  start_time: z.string().nullable(),
  end_time: z.string().nullable(),
  runtime_seconds: z.number().nullable(),
  runtime_display: z.string(),
  cpu: z.number().nullable(),
  memory: z.string().nullable(),
  gpu: z.number().nullable(),
  resources_display: z.string(),
  exit_code: z.number().nullable(),
  stdout_path: z.string().nullable(),
  stderr_path: z.string().nullable(),
  node: z.string().nullable(),
  dependencies: z.array(z.string()).nullable(),
  array_task_id: z.string().nullable()
});

export const zJobSpecInput = z.object({
  name: z.string().min(1).max(256),
  command: z.string().min(1).max(1048576),
  cpu: z.number().int().min(1).optional(),
  memory: z
    .string()
    .regex(/^\d+(\.\d+)?\s*[KMGTP]?B?$/i, "memory must look like 512M or 16G")
    .optional(),
  gpu: z.number().int().min(0).optional(),
  time_limit_seconds: z.number().int().min(1).optional(),
  queue: z.string().min(1).optional(),
  workdir: z.string().min(1).optional(),
  stdout: z.string().min(1).optional(),
  stderr: z.string().min(1).optional(),
  merge_output: z.boolean().optional(),
  env: z.record(z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, "invalid environment variable name"), z.string()).optional(),
  modules: z.array(z.string().min(1)).optional(),
  dependencies: z.array(zJobId).optional(),
  /** Raw flags appended to the active scheduler's submit command. */
  scheduler_args: z.array(z.string()).optional()
});

export const zArrayRange = z.object({
  start: z.number().int().min(0),
  end: z.number().int().min(0),
  step: z.number().int().min(1).default(1),
  max_concurrent: z.number().int().min(1).optional()
});

export const zSnapshot = z.object({
  scheduler: zSchedulerName,
  state: z.enum(["idle", "refreshing"]),
  auto_refresh: z.boolean(),
  summary: z.string(),
  filter: z.object({
    user_scope: zUserScope,
    statuses: z.array(zJobStatus).nullable(),
    queue: z.string().nullable()
  }),
  refreshed_at: z.string().nullable(),
  error: z.string().nullable(),
  count: z.number().int(),
  jobs: z.array(zJobRecord)
});

export const zJobsListActiveInput = z.object({
  user_scope: zUserScope.default("mine"),
  /** Exact username; overrides `user_scope`. */
  user: z.string().min(1).optional(),
  statuses: z.array(zJobStatus).min(1).optional(),
  queue: z.string().min(1).optional()
});

export const zJobListOutput = z.object({
  scheduler: zSchedulerName,
  count: z.number().int(),
  jobs: z.array(zJobRecord)
});

export const zJobsListCompletedInput = z.object({
  user_scope: zUserScope.default("mine"),
  user: z.string().min(1).optional(),
  since: z.iso.datetime({ offset: true }).optional(),
  until: z.iso.datetime({ offset: true }).optional(),
  exit_code: z.number().int().optional(),
  queue: z.string().min(1).optional(),
  limit: z.number().int().min(1).max(10000).optional()
});

export const zJobIdInput = z.object({
  job_id: zJobId
});

export const zJobGetOutput = z.object({
  job: zJobRecord
});

export const zJobStatusOutput = z.object({
  job_id: z.string(),
  status: zJobStatus,
  exit_code: z.number().nullable(),
  stdout_path: z.string().nullable(),
  stderr_path: z.string().nullable()
});

export const zJobCancelOutput = z.object({
  job_id: z.string(),
  cancelled: z.boolean()
});

export const zJobSubmitInput = z.object({
  job: zJobSpecInput,
  interactive: z.boolean().default(false)
});

export const zJobSubmitOutput = z.object({
  job_id: z.string(),
  scheduler: zSchedulerName,
  status: zJobStatus,
  exit_code: z.number().nullable()
});

export const zJobSubmitArrayInput = zArrayRange.extend({
  job: zJobSpecInput
});

export const zJobSubmitArrayOutput = z.object({
  base_job_id: z.string(),
  scheduler: zSchedulerName,
  task_ids: z.array(z.string())
});

export const zJobScriptPreviewInput = z.object({
  job: zJobSpecInput,
  array: zArrayRange.optional()
});

export const zJobScriptPreviewOutput = z.object({
  scheduler: zSchedulerName,
  script: z.string(),
  submit_command: z.array(z.string())
});

export const zEmptyInput = z.object({});

export const zMonitorRefreshOutput = z.object({
  refreshed: z.boolean(),
  snapshot: zSnapshot
});

export const zMonitorSetFilterInput = z.object({
  user_scope: zUserScope.optional(),
  /** null clears the status filter back to the active partition. */
  statuses: z.array(zJobStatus).min(1).nullable().optional(),
  queue: z.string().min(1).nullable().optional(),
  auto_refresh: z.boolean().optional()
});
