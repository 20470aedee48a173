/**
 * Tests for ExecutionGuard: rotation, backoff, exhaustion, timeouts.
 * Sleep and clock are injected; no real waiting except the timeout case.
 */

import { describe, it, expect, beforeEach, vi } from "vitest";
import { CredentialPool } from "../../credentials/credentialPool.js";
import { ExecutionGuard, type CallAttempt } from "../executionGuard.js";
import {
  ExhaustedError,
  NonRetryableError,
  PoolExhaustedError,
  RateLimitedError,
  TransientError,
} from "../../errors.js";

function withStatus(status: number): Error {
  return Object.assign(new Error(`HTTP ${status}`), { status });
}

describe("ExecutionGuard", () => {
  let clock: number;
  let pool: CredentialPool;
  let sleeps: number[];
  let attempts: CallAttempt[];
  let guard: ExecutionGuard;

  beforeEach(() => {
    clock = 1_700_000_000_000;
    pool = new CredentialPool({ now: () => clock });
    sleeps = [];
    attempts = [];
    guard = new ExecutionGuard(pool, {
      sleep: async (ms) => {
        sleeps.push(ms);
        clock += ms;
      },
      now: () => clock,
      onAttempt: (a) => attempts.push(a),
    });
  });

  it("returns the first success and records it", async () => {
    pool.load("papers", ["test-secret"]);
    const result = await guard.execute("papers", async (c) => `ok:${c.secret}`);
    expect(result).toBe("ok:test-secret");
    expect(pool.get("papers", "papers#1")?.usageCount).toBe(1);
    expect(sleeps).toEqual([]);
    expect(attempts.map((a) => a.outcome)).toEqual(["success"]);
  });

  it("rotates to the next credential on a rate limit without sleeping", async () => {
    pool.load("llm", ["k1", "k2", "k3"]);
    const used: string[] = [];
    const result = await guard.execute("llm", async (c) => {
      used.push(c.id);
      if (c.id === "llm#1") throw withStatus(429);
      return c.id;
    });
    expect(result).toBe("llm#2");
    expect(used).toEqual(["llm#1", "llm#2"]);
    expect(sleeps).toEqual([]);
    expect(pool.status("llm").rateLimited).toBe(1);
  });

  it("backs off on a rate limit when no other credential is available", async () => {
    pool.load("llm", ["k1"]);
    const work = vi.fn(async () => {
      throw new RateLimitedError("quota");
    });
    await expect(guard.execute("llm", work)).rejects.toBeInstanceOf(PoolExhaustedError);
    // attempt 1 rate-limits the only key; attempts 2 and 3 find the pool exhausted
    expect(work).toHaveBeenCalledTimes(1);
    expect(sleeps).toEqual([2000, 4000, 8000]);
  });

  it("waits 2s + 4s + 8s against an always-timing-out credential, then gives up", async () => {
    pool.load("materials", ["only"]);
    const work = vi.fn(async () => {
      throw new TransientError("Call timed out after 45000ms");
    });
    const err = await guard.execute("materials", work).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ExhaustedError);
    expect(err).toMatchObject({ service: "materials", attempts: 3 });
    expect(work).toHaveBeenCalledTimes(3);
    expect(sleeps).toEqual([2000, 4000, 8000]);
    expect(sleeps.reduce((a, b) => a + b, 0)).toBe(14_000);
    expect(pool.get("materials", "materials#1")).toMatchObject({ disabled: true, consecutiveErrorCount: 3 });
  });

  it("recovers after a transient failure", async () => {
    pool.load("papers", ["a", "b"]);
    let calls = 0;
    const result = await guard.execute("papers", async (c) => {
      calls++;
      if (calls === 1) throw withStatus(503);
      return c.id;
    });
    expect(result).toBe("papers#2");
    expect(sleeps).toEqual([2000]);
    expect(pool.get("papers", "papers#1")?.consecutiveErrorCount).toBe(1);
    expect(pool.get("papers", "papers#2")?.usageCount).toBe(1);
  });

  it("propagates non-retryable failures immediately without touching the credential", async () => {
    pool.load("llm", ["k1", "k2"]);
    const work = vi.fn(async () => {
      throw withStatus(400);
    });
    const err = await guard.execute("llm", work).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(NonRetryableError);
    expect(err).toMatchObject({ service: "llm" });
    expect(work).toHaveBeenCalledTimes(1);
    expect(sleeps).toEqual([]);
    expect(pool.get("llm", "llm#1")).toMatchObject({ consecutiveErrorCount: 0, usageCount: 0, disabled: false });
  });

  it("surfaces PoolExhaustedError when every credential is disabled", async () => {
    pool.load("llm", ["k1", "k2", "k3"]);
    for (const id of ["llm#1", "llm#2", "llm#3"]) {
      for (let i = 0; i < 3; i++) pool.recordFailure({ service: "llm", id }, "transient");
    }
    const work = vi.fn(async () => "never");
    await expect(guard.execute("llm", work)).rejects.toThrow("All credentials for service 'llm' are disabled or rate-limited");
    expect(work).not.toHaveBeenCalled();
    expect(attempts.map((a) => a.outcome)).toEqual(["pool_exhausted", "pool_exhausted", "pool_exhausted"]);
  });

  it("respects a per-call maxAttempts", async () => {
    pool.load("papers", ["a"]);
    await expect(
      guard.execute("papers", async () => {
        throw withStatus(500);
      }, { maxAttempts: 1, label: "search" })
    ).rejects.toBeInstanceOf(ExhaustedError);
    expect(sleeps).toEqual([2000]);
    expect(attempts[0]).toMatchObject({ attempt: 1, outcome: "transient", label: "search", credentialId: "papers#1" });
  });

  it("aborts and classifies a call that exceeds the timeout", async () => {
    pool.load("papers", ["a"]);
    const timed = new ExecutionGuard(pool, { callTimeoutMs: 10, maxAttempts: 1, sleep: async () => {} });
    let aborted = false;
    const err = await timed
      .execute("papers", (_c, signal) => {
        return new Promise<string>((_resolve, reject) => {
          signal.addEventListener("abort", () => {
            aborted = true;
            reject(new Error("aborted by signal"));
          });
        });
      })
      .catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ExhaustedError);
    expect(err).toMatchObject({ message: "Service 'papers' failed after 1 attempts: Call timed out after 10ms" });
    expect(aborted).toBe(true);
  });

  describe("with a request rate", () => {
    let throttled: ExecutionGuard;

    beforeEach(() => {
      throttled = new ExecutionGuard(pool, {
        sleep: async (ms) => {
          sleeps.push(ms);
          clock += ms;
        },
        now: () => clock,
        requestsPerSecond: { papers: 2, llm: 4 },
      });
    });

    it("waits for the service's next slot before running the work", async () => {
      pool.load("papers", ["test-secret"]);
      const t0 = clock;
      const started: number[] = [];
      const work = async () => {
        started.push(clock);
        return "ok";
      };
      await throttled.execute("papers", work);
      await throttled.execute("papers", work);
      expect(started).toEqual([t0, t0 + 500]);
      expect(sleeps).toEqual([500]);
    });

    it("throttles the attempt that follows a rotation", async () => {
      pool.load("llm", ["k1", "k2"]);
      const t0 = clock;
      const started: Array<[string, number]> = [];
      const result = await throttled.execute("llm", async (c) => {
        started.push([c.id, clock]);
        if (c.id === "llm#1") throw withStatus(429);
        return c.id;
      });
      expect(result).toBe("llm#2");
      expect(started).toEqual([
        ["llm#1", t0],
        ["llm#2", t0 + 250],
      ]);
      expect(sleeps).toEqual([250]);
    });

    it("leaves services without a rate unthrottled", async () => {
      pool.load("materials", ["test-secret"]);
      await throttled.execute("materials", async () => "a");
      await throttled.execute("materials", async () => "b");
      expect(sleeps).toEqual([]);
    });
  });

  it("computes exponential backoff", () => {
    expect([1, 2, 3, 4].map((n) => guard.backoffFor(n))).toEqual([2000, 4000, 8000, 16000]);
  });
});
