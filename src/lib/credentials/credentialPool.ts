/**
 * Per-service credential pools with health state.
 *
 * Selection is least-recently-used among credentials that are neither disabled
 * nor rate-limited, ties broken by insertion order. Every public method runs
 * synchronously, so selection and counter updates are atomic with respect to
 * other callers on the event loop: two concurrent callers never both receive
 * the same "unused" credential.
 *
 * Re-enable policy: a disabled credential comes back (error count reset) once
 * the cool-down window has elapsed since its last failure. Expired rate limits
 * are cleared the same way. Both are applied lazily on select/status.
 */

import { ConfigurationError, PoolExhaustedError } from "../errors.js";
import { createLogger } from "../../utils/log.js";
import type {
  Credential,
  CredentialPoolOptions,
  CredentialStatus,
  FailureKind,
  ServicePoolStatus,
} from "./types.js";

const log = createLogger("CredentialPool");

const DEFAULT_COOLDOWN_MINUTES = 60;
const DEFAULT_DISABLE_AFTER_ERRORS = 3;

interface PoolEntry {
  credential: Credential;
  /** -1 until first selection; otherwise a pool-wide increasing sequence. */
  lastUsedSeq: number;
}

export class CredentialPool {
  private readonly pools = new Map<string, PoolEntry[]>();
  private readonly cooldownMs: number;
  private readonly disableAfterErrors: number;
  private readonly now: () => number;
  private useSeq = 0;

  constructor(options: CredentialPoolOptions = {}) {
    this.cooldownMs = (options.cooldownMinutes ?? DEFAULT_COOLDOWN_MINUTES) * 60_000;
    this.disableAfterErrors = options.disableAfterErrors ?? DEFAULT_DISABLE_AFTER_ERRORS;
    this.now = options.now ?? Date.now;
  }

  /** Builds a pool for every service in the map. */
  static fromConfig(
    credentials: Partial<Record<string, string[]>>,
    options?: CredentialPoolOptions
  ): CredentialPool {
    const pool = new CredentialPool(options);
    for (const [service, secrets] of Object.entries(credentials)) {
      if (secrets) pool.load(service, secrets);
    }
    return pool;
  }

  load(service: string, secrets: readonly string[]): Credential[] {
    if (this.pools.has(service)) {
      throw new ConfigurationError(`Credentials for service '${service}' are already loaded`);
    }
    const usable = secrets.map((s) => s.trim()).filter((s) => s !== "");
    if (usable.length === 0) {
      throw new ConfigurationError(`No credentials configured for service '${service}'`);
    }
    const entries: PoolEntry[] = usable.map((secret, i) => ({
      credential: {
        id: `${service}#${i + 1}`,
        service,
        secret,
        usageCount: 0,
        consecutiveErrorCount: 0,
        rateLimitedUntil: null,
        disabled: false,
        lastUsedAt: null,
        lastFailureAt: null,
      },
      lastUsedSeq: -1,
    }));
    this.pools.set(service, entries);
    log.info(`Loaded ${entries.length} credential(s) for ${service}`);
    return entries.map((e) => ({ ...e.credential }));
  }

  services(): string[] {
    return [...this.pools.keys()];
  }

  select(service: string): Credential {
    const entries = this.entries(service);
    const now = this.now();
    let chosen: PoolEntry | undefined;
    for (const entry of entries) {
      this.refresh(entry.credential, now);
      if (!this.isAvailable(entry.credential, now)) continue;
      // strict < keeps the earlier-inserted credential on ties
      if (!chosen || entry.lastUsedSeq < chosen.lastUsedSeq) chosen = entry;
    }
    if (!chosen) throw new PoolExhaustedError(service);
    chosen.lastUsedSeq = this.useSeq++;
    chosen.credential.lastUsedAt = now;
    return { ...chosen.credential };
  }

  /** True when select would succeed, optionally ignoring one credential. No side effects on usage. */
  hasAvailable(service: string, excludeId?: string): boolean {
    const now = this.now();
    return this.entries(service).some((e) => {
      this.refresh(e.credential, now);
      return e.credential.id !== excludeId && this.isAvailable(e.credential, now);
    });
  }

  recordSuccess(credential: Pick<Credential, "service" | "id">): void {
    const c = this.find(credential);
    c.usageCount += 1;
    c.consecutiveErrorCount = 0;
  }

  recordFailure(credential: Pick<Credential, "service" | "id">, kind: FailureKind): void {
    const c = this.find(credential);
    const now = this.now();
    c.lastFailureAt = now;
    if (kind === "rate_limited") {
      c.rateLimitedUntil = now + this.cooldownMs;
      log.warn(`${c.id} rate-limited until ${new Date(c.rateLimitedUntil).toISOString()}`);
      return;
    }
    c.consecutiveErrorCount += 1;
    if (!c.disabled && c.consecutiveErrorCount >= this.disableAfterErrors) {
      c.disabled = true;
      log.warn(`${c.id} disabled after ${c.consecutiveErrorCount} consecutive errors`);
    }
  }

  /** Operator reset: re-enables one credential, or every credential of the service. */
  reset(service: string, credentialId?: string): void {
    for (const { credential: c } of this.entries(service)) {
      if (credentialId != null && c.id !== credentialId) continue;
      c.disabled = false;
      c.consecutiveErrorCount = 0;
      c.rateLimitedUntil = null;
    }
  }

  get(service: string, credentialId: string): Credential | undefined {
    const entry = this.pools.get(service)?.find((e) => e.credential.id === credentialId);
    return entry ? { ...entry.credential } : undefined;
  }

  status(service: string): ServicePoolStatus {
    const now = this.now();
    const credentials: CredentialStatus[] = this.entries(service).map(({ credential: c }) => {
      this.refresh(c, now);
      return {
        id: c.id,
        usageCount: c.usageCount,
        consecutiveErrorCount: c.consecutiveErrorCount,
        rateLimitedUntil: c.rateLimitedUntil != null ? new Date(c.rateLimitedUntil).toISOString() : null,
        disabled: c.disabled,
        lastUsedAt: c.lastUsedAt != null ? new Date(c.lastUsedAt).toISOString() : null,
        available: this.isAvailable(c, now),
      };
    });
    return {
      service,
      total: credentials.length,
      available: credentials.filter((c) => c.available).length,
      disabled: credentials.filter((c) => c.disabled).length,
      rateLimited: credentials.filter((c) => c.rateLimitedUntil != null).length,
      credentials,
    };
  }

  private entries(service: string): PoolEntry[] {
    const entries = this.pools.get(service);
    if (!entries) {
      throw new ConfigurationError(`No credentials configured for service '${service}'`);
    }
    return entries;
  }

  private find(ref: Pick<Credential, "service" | "id">): Credential {
    const entry = this.entries(ref.service).find((e) => e.credential.id === ref.id);
    if (!entry) {
      throw new ConfigurationError(`Unknown credential ${ref.id} for service '${ref.service}'`);
    }
    return entry.credential;
  }

  private isAvailable(c: Credential, now: number): boolean {
    return !c.disabled && (c.rateLimitedUntil == null || now >= c.rateLimitedUntil);
  }

  private refresh(c: Credential, now: number): void {
    if (c.rateLimitedUntil != null && now >= c.rateLimitedUntil) {
      c.rateLimitedUntil = null;
      log.info(`${c.id} rate limit expired, reactivating`);
    }
    if (c.disabled && c.lastFailureAt != null && now - c.lastFailureAt >= this.cooldownMs) {
      c.disabled = false;
      c.consecutiveErrorCount = 0;
      log.info(`${c.id} cool-down elapsed, re-enabled`);
    }
  }
}
