/**
 * Credential pool types. Secrets are opaque and never leave the pool in status snapshots.
 */

export type FailureKind = "rate_limited" | "transient";

export interface Credential {
  /** Stable id within its service, e.g. "llm#2". */
  id: string;
  service: string;
  secret: string;
  usageCount: number;
  consecutiveErrorCount: number;
  /** Epoch ms; null when not rate-limited. */
  rateLimitedUntil: number | null;
  disabled: boolean;
  lastUsedAt: number | null;
  lastFailureAt: number | null;
}

/** Read-only view of a credential for monitoring. */
export interface CredentialStatus {
  id: string;
  usageCount: number;
  consecutiveErrorCount: number;
  rateLimitedUntil: string | null;
  disabled: boolean;
  lastUsedAt: string | null;
  available: boolean;
}

export interface ServicePoolStatus {
  service: string;
  total: number;
  available: number;
  disabled: number;
  rateLimited: number;
  credentials: CredentialStatus[];
}

export interface CredentialPoolOptions {
  /** Cool-down for rate limits and for re-enabling disabled credentials. Default 60. */
  cooldownMinutes?: number;
  /** Consecutive transient failures before a credential is disabled. Default 3. */
  disableAfterErrors?: number;
  now?: () => number;
}
