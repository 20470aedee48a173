/**
 * Typed errors for the execution layer, sessions and pipeline.
 * Each carries a stable `code` so HTTP handlers and session messages can report it.
 */

export type ErrorCode =
  | "CONFIGURATION_ERROR"
  | "POOL_EXHAUSTED"
  | "RATE_LIMITED"
  | "TRANSIENT"
  | "NON_RETRYABLE"
  | "EXHAUSTED"
  | "FATAL_PHASE"
  | "NOT_FOUND"
  | "INVALID_STATE"
  | "VALIDATION_ERROR";

export abstract class PipelineError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigurationError extends PipelineError {
  readonly code = "CONFIGURATION_ERROR";
}

export class PoolExhaustedError extends PipelineError {
  readonly code = "POOL_EXHAUSTED";

  constructor(readonly service: string) {
    super(`All credentials for service '${service}' are disabled or rate-limited`);
  }
}

/** Service answered with a rate-limit / quota response. */
export class RateLimitedError extends PipelineError {
  readonly code = "RATE_LIMITED";
}

/** Timeout, network reset or server-side error; worth retrying. */
export class TransientError extends PipelineError {
  readonly code = "TRANSIENT";
}

/** Malformed request or a rejection that retrying cannot fix. */
export class NonRetryableError extends PipelineError {
  readonly code = "NON_RETRYABLE";

  constructor(
    message: string,
    readonly service?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class ExhaustedError extends PipelineError {
  readonly code = "EXHAUSTED";

  constructor(
    readonly service: string,
    readonly attempts: number,
    readonly lastCause: unknown
  ) {
    super(
      `Service '${service}' failed after ${attempts} attempts: ${describeError(lastCause)}`,
      { cause: lastCause }
    );
  }
}

export class FatalPhaseError extends PipelineError {
  readonly code = "FATAL_PHASE";

  constructor(
    readonly phase: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class SessionNotFoundError extends PipelineError {
  readonly code = "NOT_FOUND";

  constructor(readonly sessionId: string) {
    super(`Session not found: ${sessionId}`);
  }
}

export class InvalidSessionStateError extends PipelineError {
  readonly code = "INVALID_STATE";
}

export class ValidationError extends PipelineError {
  readonly code = "VALIDATION_ERROR";
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
