export class SubmissionError extends Error {
  constructor(
    message: string,
    readonly stdout = "",
    readonly stderr = ""
  ) {
    super(message);
    this.name = "SubmissionError";
  }
}

export class JobNotFoundError extends Error {
  constructor(readonly jobId: string) {
    super(`job not found: ${jobId}`);
    this.name = "JobNotFoundError";
  }
}

export class AccountingNotAvailableError extends Error {
  constructor(readonly scheduler: string) {
    super(`job accounting is not available for scheduler: ${scheduler}`);
    this.name = "AccountingNotAvailableError";
  }
}

export class SchedulerQueryError extends Error {
  constructor(
    message: string,
    readonly argv: string[]
  ) {
    super(message);
    this.name = "SchedulerQueryError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}
