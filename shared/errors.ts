export type RouterErrorCode =
  | "NO_ELIGIBLE_AGENT"
  | "DISPATCH_TIMEOUT"
  | "DISPATCH_FAILURE"
  | "TASK_FAILED"
  | "TASK_CANCELLED"
  | "INVALID_REQUEST"
  | "EXPERIMENT_NOT_ACTIVE"
  | "NOT_FOUND"
  | "RATE_LIMIT_EXCEEDED";

export abstract class RouterError extends Error {
  abstract readonly code: RouterErrorCode;

  constructor(message: string, options?: { readonly cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class NoEligibleAgentError extends RouterError {
  readonly code = "NO_ELIGIBLE_AGENT";

  constructor(readonly capabilities: readonly string[]) {
    super(`No suitable agents found for capabilities [${capabilities.join(", ")}]`);
  }
}

export class DispatchTimeoutError extends RouterError {
  readonly code = "DISPATCH_TIMEOUT";

  constructor(
    readonly agentId: string,
    readonly timeoutMs: number,
  ) {
    super(`Dispatch to agent ${agentId} timed out after ${timeoutMs}ms`);
  }
}

export class DispatchFailureError extends RouterError {
  readonly code = "DISPATCH_FAILURE";

  constructor(
    readonly agentId: string,
    message: string,
    options?: { readonly cause?: unknown },
  ) {
    super(`Dispatch to agent ${agentId} failed: ${message}`, options);
  }
}

export class TaskFailedError extends RouterError {
  readonly code = "TASK_FAILED";

  constructor(
    readonly taskId: string,
    cause: unknown,
  ) {
    super(`Task ${taskId} failed: ${describeError(cause)}`, { cause });
  }
}

export class TaskCancelledError extends RouterError {
  readonly code = "TASK_CANCELLED";

  constructor(readonly taskId: string) {
    super(`Task ${taskId} was cancelled`);
  }
}

export class InvalidRequestError extends RouterError {
  readonly code = "INVALID_REQUEST";
}

export class ExperimentNotActiveError extends RouterError {
  readonly code = "EXPERIMENT_NOT_ACTIVE";

  constructor(
    readonly experimentId: string,
    readonly status: string,
  ) {
    super(`Experiment ${experimentId} is not active (status: ${status})`);
  }
}

export class NotFoundError extends RouterError {
  readonly code = "NOT_FOUND";

  constructor(entity: string, id: string) {
    super(`${entity} ${id} not found`);
  }
}

export class RateLimitExceededError extends RouterError {
  readonly code = "RATE_LIMIT_EXCEEDED";

  constructor(
    readonly key: string,
    readonly retryAfterMs: number,
  ) {
    super(`Rate limit exceeded for ${key}, retry after ${retryAfterMs}ms`);
  }
}

export function isRetryableDispatchError(error: unknown): boolean {
  return error instanceof DispatchTimeoutError || error instanceof DispatchFailureError;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function errorCode(error: unknown): string {
  return error instanceof RouterError ? error.code : "INTERNAL_ERROR";
}
