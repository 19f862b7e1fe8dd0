export type ErrorCategory =
  | "FeedError"
  | "ValuationError"
  | "SchedulingError"
  | "ExecutionFailure"
  | "ConfigError";

export abstract class PipelineError extends Error {
  abstract readonly category: ErrorCategory;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class MalformedFeedData extends PipelineError {
  readonly category = "FeedError" as const;

  constructor(readonly field: string, detail: string) {
    super(`Malformed feed data (${field}): ${detail}`);
  }
}

export class FeedUnavailable extends PipelineError {
  readonly category = "FeedError" as const;

  constructor(readonly source: string, cause: unknown) {
    super(`Feed ${source} unavailable: ${String(cause)}`);
  }
}

export class InsufficientHistory extends PipelineError {
  readonly category = "ValuationError" as const;

  constructor(readonly marketId: string, readonly have: number, readonly need: number) {
    super(`Insufficient history for ${marketId}: ${have}/${need} observations`);
  }
}

export class SchedulerSaturated extends PipelineError {
  readonly category = "SchedulingError" as const;

  constructor(readonly identity: string, readonly depth: number) {
    super(`Scheduler queue for ${identity} is full (depth ${depth})`);
  }
}

export class SigningError extends PipelineError {
  readonly category = "ExecutionFailure" as const;
}

export class ConfigError extends PipelineError {
  readonly category = "ConfigError" as const;
}

export class InsufficientAllowance extends PipelineError {
  readonly category = "ExecutionFailure" as const;

  constructor(readonly token: string, readonly spender: string, readonly allowance: bigint, readonly required: bigint) {
    super(`Allowance of ${token} for ${spender} is ${allowance}, below the ${required} required`);
  }
}
