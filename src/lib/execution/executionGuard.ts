/**
 * ExecutionGuard: runs one logical outbound call with bounded retries,
 * credential rotation on rate limits and exponential backoff on transient failures.
 *
 * Backoff for attempt n is baseBackoffMs * 2^(n-1) (2s, 4s, 8s by default) and
 * follows every failed attempt that did not rotate to another credential.
 * Credential side effects are never rolled back. When requestsPerSecond names a
 * service, every attempt waits for that service's next request slot before it runs.
 */

// ─── src/lib/execution/executionGuard.ts ────────────────────────────────────

import type { CredentialPool } from "../credentials/credentialPool.js";
import type { Credential } from "../credentials/types.js";
import {
  ExhaustedError,
  NonRetryableError,
  PoolExhaustedError,
  TransientError,
  describeError,
} from "../errors.js";
import { createLogger } from "../../utils/log.js";
import { classifyFailure } from "./classifyFailure.js";
import { RequestThrottle } from "./requestThrottle.js";

const log = createLogger("ExecutionGuard");

export type CallOutcome = "success" | "rate_limited" | "transient" | "non_retryable" | "pool_exhausted";

/** One attempt of one logical call. Reported through onAttempt, never persisted. */
export interface CallAttempt {
  service: string;
  credentialId: string | null;
  attempt: number;
  outcome: CallOutcome;
  durationMs: number;
  error?: string;
  label?: string;
}

export type GuardedWork<T> = (credential: Credential, signal: AbortSignal) => Promise<T>;

export interface ExecutionGuardOptions {
  maxAttempts?: number;
  baseBackoffMs?: number;
  callTimeoutMs?: number;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
  /** Per-service request rate; a missing or zero entry leaves the service unthrottled. */
  requestsPerSecond?: Readonly<Partial<Record<string, number>>>;
  onAttempt?: (attempt: CallAttempt) => void;
}

export interface ExecuteOptions {
  /** Short description for logs, e.g. "analyze paper 3". */
  label?: string;
  maxAttempts?: number;
}

export const DEFAULT_MAX_ATTEMPTS = 3;
export const DEFAULT_BASE_BACKOFF_MS = 2000;
export const DEFAULT_CALL_TIMEOUT_MS = 45_000;

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Races work against a timer; on timeout the signal is aborted and a TransientError thrown. */
async function runWithTimeout<T>(
  work: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new TransientError(`Call timed out after ${timeoutMs}ms`));
    }, timeoutMs);
  });
  const running = Promise.resolve().then(() => work(controller.signal));
  // once the timer wins, a late rejection from the abandoned call must not go unhandled
  running.catch((err) => log.debug("call settled after timeout:", describeError(err)));
  try {
    return await Promise.race([running, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export class ExecutionGuard {
  private readonly maxAttempts: number;
  private readonly baseBackoffMs: number;
  private readonly callTimeoutMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly now: () => number;
  private readonly throttle: RequestThrottle;
  private readonly onAttempt?: (attempt: CallAttempt) => void;

  constructor(
    private readonly pool: CredentialPool,
    options: ExecutionGuardOptions = {}
  ) {
    this.maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
    this.baseBackoffMs = options.baseBackoffMs ?? DEFAULT_BASE_BACKOFF_MS;
    this.callTimeoutMs = options.callTimeoutMs ?? DEFAULT_CALL_TIMEOUT_MS;
    this.sleep = options.sleep ?? defaultSleep;
    this.now = options.now ?? Date.now;
    this.throttle = new RequestThrottle(options.requestsPerSecond ?? {}, { sleep: this.sleep, now: this.now });
    this.onAttempt = options.onAttempt;
  }

  backoffFor(attempt: number): number {
    return this.baseBackoffMs * 2 ** (attempt - 1);
  }

  async execute<T>(service: string, work: GuardedWork<T>, options: ExecuteOptions = {}): Promise<T> {
    const maxAttempts = Math.max(1, options.maxAttempts ?? this.maxAttempts);
    let lastCause: unknown;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const credential = this.trySelect(service);
      if (credential instanceof PoolExhaustedError) {
        lastCause = credential;
        this.report({ service, credentialId: null, attempt, outcome: "pool_exhausted", startedAt: this.now(), err: credential, label: options.label });
        await this.sleep(this.backoffFor(attempt));
        continue;
      }

      await this.throttle.acquire(service);
      const startedAt = this.now();
      try {
        const result = await runWithTimeout((signal) => work(credential, signal), this.callTimeoutMs);
        this.pool.recordSuccess(credential);
        this.report({ service, credentialId: credential.id, attempt, outcome: "success", startedAt, label: options.label });
        return result;
      } catch (err) {
        lastCause = err;
        const kind = classifyFailure(err);
        this.report({ service, credentialId: credential.id, attempt, outcome: kind, startedAt, err, label: options.label });

        if (kind === "non_retryable") {
          if (err instanceof NonRetryableError) throw err;
          throw new NonRetryableError(`Service '${service}' rejected the request: ${describeError(err)}`, service, { cause: err });
        }

        this.pool.recordFailure(credential, kind);
        if (kind === "rate_limited" && this.pool.hasAvailable(service, credential.id)) {
          log.debug(`${service}: rotating away from ${credential.id} without backoff`);
          continue;
        }
        await this.sleep(this.backoffFor(attempt));
      }
    }

    if (lastCause instanceof PoolExhaustedError) throw lastCause;
    log.warn(`${service}: exhausted ${maxAttempts} attempts${options.label ? ` (${options.label})` : ""}`);
    throw new ExhaustedError(service, maxAttempts, lastCause);
  }

  private trySelect(service: string): Credential | PoolExhaustedError {
    try {
      return this.pool.select(service);
    } catch (err) {
      if (err instanceof PoolExhaustedError) return err;
      throw err;
    }
  }

  private report(args: {
    service: string;
    credentialId: string | null;
    attempt: number;
    outcome: CallOutcome;
    startedAt: number;
    err?: unknown;
    label?: string;
  }): void {
    const attempt: CallAttempt = {
      service: args.service,
      credentialId: args.credentialId,
      attempt: args.attempt,
      outcome: args.outcome,
      durationMs: this.now() - args.startedAt,
      ...(args.err !== undefined && { error: describeError(args.err) }),
      ...(args.label ? { label: args.label } : {}),
    };
    if (attempt.outcome !== "success") {
      log.debug(`${attempt.service} attempt ${attempt.attempt} ${attempt.outcome}: ${attempt.error ?? ""}`);
    }
    this.onAttempt?.(attempt);
  }
}
