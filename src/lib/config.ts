/**
 * Application config: built once at startup from the environment and passed
 * explicitly to the pool, guard, stores and collaborators.
 * Numeric values use clamped defaults; an unparseable value falls back to the default.
 */

import { z } from "zod";
import { parsePersistenceDriver, type PersistenceDriver } from "./persistence/driver.js";
import { ConfigurationError } from "./errors.js";

export type Env = Record<string, string | undefined>;

export const SERVICES = ["llm", "materials", "papers"] as const;
export type ServiceName = (typeof SERVICES)[number];

export interface RetryConfig {
  maxAttempts: number;
  baseBackoffMs: number;
  callTimeoutMs: number;
}

export interface LlmConfig {
  provider: "openai" | "anthropic";
  model: string;
  /** OpenAI-compatible endpoint (e.g. Groq). Ignored for anthropic. */
  baseURL?: string;
  maxTokens: number;
}

export interface AppConfig {
  persistenceDriver: PersistenceDriver;
  dataDir: string;
  databaseUrl?: string;
  retry: RetryConfig;
  cooldownMinutes: number;
  batchConcurrency: number;
  /** Service name → request rate applied by the guard; 0 disables throttling. */
  requestsPerSecond: Record<ServiceName, number>;
  llm: LlmConfig;
  endpoints: {
    papersBaseURL: string;
    materialsBaseURL: string;
  };
  /** Service name → ordered secrets. Loaded by loadCredentialConfig. */
  credentials: Partial<Record<ServiceName, string[]>>;
}

function parseIntEnv(env: Env, key: string, defaultVal: number, min: number, max: number): number {
  const raw = env[key];
  if (raw == null || raw === "") return defaultVal;
  const n = parseInt(raw, 10);
  if (Number.isNaN(n)) return defaultVal;
  return Math.max(min, Math.min(max, n));
}

function parseFloatEnv(env: Env, key: string, defaultVal: number, min: number, max: number): number {
  const raw = env[key];
  if (raw == null || raw === "") return defaultVal;
  const n = Number(raw);
  if (!Number.isFinite(n)) return defaultVal;
  return Math.max(min, Math.min(max, n));
}

const UrlSchema = z.string().url();

function parseUrlEnv(env: Env, key: string, defaultVal: string): string {
  const raw = env[key]?.trim();
  if (!raw) return defaultVal;
  const parsed = UrlSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`${key} is not a valid URL: ${raw}`);
  }
  return parsed.data.replace(/\/+$/, "");
}

/** Env var prefixes per service. Keys are read as PREFIX_API_KEY_1..N, then PREFIX_API_KEY. */
export const SERVICE_ENV_PREFIXES: Record<ServiceName, string[]> = {
  llm: ["LLM", "GROQ"],
  materials: ["MP"],
  papers: ["PAPERS"],
};

const MAX_KEYS_PER_SERVICE = 10;

/** Read from <PREFIX>_RPS, using the first prefix of each service. */
export const DEFAULT_REQUESTS_PER_SECOND: Record<ServiceName, number> = {
  llm: 10,
  materials: 5,
  papers: 0.33,
};

function loadRequestRates(env: Env): Record<ServiceName, number> {
  const out: Record<ServiceName, number> = { ...DEFAULT_REQUESTS_PER_SECOND };
  for (const service of SERVICES) {
    out[service] = parseFloatEnv(env, `${SERVICE_ENV_PREFIXES[service][0]}_RPS`, out[service], 0, 1000);
  }
  return out;
}

function isUsableSecret(value: string | undefined): value is string {
  if (value == null) return false;
  const v = value.trim();
  return v !== "" && !v.startsWith("your_");
}

/**
 * Reads numbered keys first (PREFIX_API_KEY_1, _2, …); falls back to the single
 * PREFIX_API_KEY. Placeholder values ("your_…") are ignored.
 */
export function loadCredentialConfig(env: Env): Partial<Record<ServiceName, string[]>> {
  const out: Partial<Record<ServiceName, string[]>> = {};
  for (const service of SERVICES) {
    for (const prefix of SERVICE_ENV_PREFIXES[service]) {
      const keys: string[] = [];
      for (let i = 1; i <= MAX_KEYS_PER_SERVICE; i++) {
        const v = env[`${prefix}_API_KEY_${i}`];
        if (isUsableSecret(v)) keys.push(v.trim());
      }
      if (keys.length === 0) {
        const single = env[`${prefix}_API_KEY`];
        if (isUsableSecret(single)) keys.push(single.trim());
      }
      if (keys.length > 0) {
        out[service] = keys;
        break;
      }
    }
  }
  return out;
}

export function loadAppConfig(env: Env = process.env): AppConfig {
  const provider = env.LLM_PROVIDER?.trim().toLowerCase() === "anthropic" ? "anthropic" : "openai";
  const defaultModel = provider === "anthropic" ? "claude-3-5-haiku-latest" : "llama-3.3-70b-versatile";
  const config: AppConfig = {
    persistenceDriver: parsePersistenceDriver(env.PERSISTENCE_DRIVER),
    dataDir: env.DATA_DIR?.trim() || ".data",
    databaseUrl: env.DATABASE_URL?.trim() || undefined,
    retry: {
      maxAttempts: parseIntEnv(env, "GUARD_MAX_ATTEMPTS", 3, 1, 10),
      baseBackoffMs: parseIntEnv(env, "GUARD_BASE_BACKOFF_MS", 2000, 0, 60_000),
      callTimeoutMs: parseIntEnv(env, "GUARD_CALL_TIMEOUT_MS", 45_000, 1000, 300_000),
    },
    cooldownMinutes: parseIntEnv(env, "CREDENTIAL_COOLDOWN_MINUTES", 60, 1, 24 * 60),
    batchConcurrency: parseIntEnv(env, "BATCH_CONCURRENCY", 3, 1, 16),
    requestsPerSecond: loadRequestRates(env),
    llm: {
      provider,
      model: env.LLM_MODEL?.trim() || defaultModel,
      baseURL:
        provider === "openai"
          ? parseUrlEnv(env, "LLM_BASE_URL", "https://api.groq.com/openai/v1")
          : undefined,
      maxTokens: parseIntEnv(env, "LLM_MAX_TOKENS", 1500, 64, 8192),
    },
    endpoints: {
      papersBaseURL: parseUrlEnv(env, "PAPERS_BASE_URL", "https://api.semanticscholar.org/graph/v1"),
      materialsBaseURL: parseUrlEnv(env, "MP_BASE_URL", "https://api.materialsproject.org"),
    },
    credentials: loadCredentialConfig(env),
  };
  if (config.persistenceDriver === "db" && !config.databaseUrl) {
    throw new ConfigurationError("DATABASE_URL is required when PERSISTENCE_DRIVER=db");
  }
  return Object.freeze(config);
}

/** Fails at startup when a service the pipeline needs has no credentials. */
export function requireCredentials(
  config: AppConfig,
  services: readonly ServiceName[] = SERVICES
): Record<ServiceName, string[]> {
  const missing = services.filter((s) => (config.credentials[s]?.length ?? 0) === 0);
  if (missing.length > 0) {
    const hints = missing.map((s) => `${s} (${SERVICE_ENV_PREFIXES[s][0]}_API_KEY_1)`).join(", ");
    throw new ConfigurationError(`No credentials configured for: ${hints}`);
  }
  const out: Record<ServiceName, string[]> = { llm: [], materials: [], papers: [] };
  for (const s of services) out[s] = [...(config.credentials[s] ?? [])];
  return out;
}
