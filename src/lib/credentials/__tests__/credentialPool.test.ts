/**
 * Tests for CredentialPool: LRU selection, rate limits, disable/re-enable, status.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { CredentialPool } from "../credentialPool.js";
import { ConfigurationError, PoolExhaustedError } from "../../errors.js";

const MINUTE = 60_000;

describe("CredentialPool", () => {
  let clock: number;
  let pool: CredentialPool;

  beforeEach(() => {
    clock = 1_700_000_000_000;
    pool = new CredentialPool({ now: () => clock });
    pool.load("llm", ["test-key-1", "test-key-2", "test-key-3"]);
  });

  describe("load", () => {
    it("assigns ids in insertion order", () => {
      const fresh = new CredentialPool();
      const loaded = fresh.load("papers", ["a", " b ", ""]);
      expect(loaded.map((c) => c.id)).toEqual(["papers#1", "papers#2"]);
      expect(loaded[1].secret).toBe("b");
    });

    it("rejects an empty secret list", () => {
      expect(() => new CredentialPool().load("papers", [])).toThrow(ConfigurationError);
    });

    it("rejects loading the same service twice", () => {
      expect(() => pool.load("llm", ["x"])).toThrow(ConfigurationError);
    });

    it("throws ConfigurationError for an unknown service", () => {
      expect(() => pool.select("materials")).toThrow(ConfigurationError);
    });
  });

  describe("select", () => {
    it("rotates least-recently-used, ties by insertion order", () => {
      const ids = [1, 2, 3, 4].map(() => pool.select("llm").id);
      expect(ids).toEqual(["llm#1", "llm#2", "llm#3", "llm#1"]);
    });

    it("skips rate-limited credentials until the cool-down expires", () => {
      pool.recordFailure({ service: "llm", id: "llm#1" }, "rate_limited");
      expect([1, 2, 3].map(() => pool.select("llm").id)).toEqual(["llm#2", "llm#3", "llm#2"]);

      clock += 60 * MINUTE;
      expect(pool.select("llm").id).toBe("llm#1");
      expect(pool.get("llm", "llm#1")?.rateLimitedUntil).toBeNull();
    });

    it("throws PoolExhaustedError when every credential is unavailable", () => {
      for (const id of ["llm#1", "llm#2", "llm#3"]) {
        pool.recordFailure({ service: "llm", id }, "rate_limited");
      }
      expect(() => pool.select("llm")).toThrow(PoolExhaustedError);
      expect(() => pool.select("llm")).toThrow("All credentials for service 'llm' are disabled or rate-limited");
    });

    it("returns a copy that does not alias pool state", () => {
      const c = pool.select("llm");
      c.disabled = true;
      expect(pool.get("llm", c.id)?.disabled).toBe(false);
    });
  });

  describe("recordFailure / recordSuccess", () => {
    it("disables after three consecutive transient errors", () => {
      const ref = { service: "llm", id: "llm#2" };
      pool.recordFailure(ref, "transient");
      pool.recordFailure(ref, "transient");
      expect(pool.get("llm", "llm#2")?.disabled).toBe(false);
      pool.recordFailure(ref, "transient");
      expect(pool.get("llm", "llm#2")).toMatchObject({ disabled: true, consecutiveErrorCount: 3 });
    });

    it("success resets the consecutive error count and counts usage", () => {
      const ref = { service: "llm", id: "llm#1" };
      pool.recordFailure(ref, "transient");
      pool.recordFailure(ref, "transient");
      pool.recordSuccess(ref);
      pool.recordFailure(ref, "transient");
      expect(pool.get("llm", "llm#1")).toMatchObject({ disabled: false, consecutiveErrorCount: 1, usageCount: 1 });
    });

    it("repeated rate limits restart the window from the latest one", () => {
      const single = new CredentialPool({ now: () => clock });
      single.load("papers", ["test-key"]);
      const ref = { service: "papers", id: "papers#1" };
      single.recordFailure(ref, "rate_limited");
      clock += 5 * MINUTE;
      single.recordFailure(ref, "rate_limited");
      const until = clock + 60 * MINUTE;
      expect(single.get("papers", "papers#1")?.rateLimitedUntil).toBe(until);

      clock = until - 1;
      expect(() => single.select("papers")).toThrow(PoolExhaustedError);
      clock = until;
      expect(single.select("papers").id).toBe("papers#1");
    });

    it("rate limits do not count toward disabling", () => {
      const ref = { service: "llm", id: "llm#1" };
      for (let i = 0; i < 5; i++) pool.recordFailure(ref, "rate_limited");
      expect(pool.get("llm", "llm#1")).toMatchObject({ disabled: false, consecutiveErrorCount: 0 });
    });

    it("re-enables a disabled credential once the cool-down since its last failure elapses", () => {
      const ref = { service: "llm", id: "llm#1" };
      for (let i = 0; i < 3; i++) pool.recordFailure(ref, "transient");
      clock += 59 * MINUTE;
      expect(pool.status("llm").disabled).toBe(1);
      clock += MINUTE;
      expect(pool.status("llm").disabled).toBe(0);
      expect(pool.get("llm", "llm#1")?.consecutiveErrorCount).toBe(0);
    });
  });

  describe("hasAvailable", () => {
    it("honours the excluded credential", () => {
      pool.recordFailure({ service: "llm", id: "llm#1" }, "rate_limited");
      pool.recordFailure({ service: "llm", id: "llm#2" }, "rate_limited");
      expect(pool.hasAvailable("llm")).toBe(true);
      expect(pool.hasAvailable("llm", "llm#3")).toBe(false);
    });
  });

  describe("reset", () => {
    it("re-enables one credential or the whole service", () => {
      for (const id of ["llm#1", "llm#2"]) {
        for (let i = 0; i < 3; i++) pool.recordFailure({ service: "llm", id }, "transient");
      }
      pool.reset("llm", "llm#1");
      expect(pool.status("llm").disabled).toBe(1);
      pool.reset("llm");
      expect(pool.status("llm").disabled).toBe(0);
    });
  });

  describe("status", () => {
    it("summarizes without exposing secrets", () => {
      pool.select("llm");
      pool.recordFailure({ service: "llm", id: "llm#3" }, "rate_limited");
      const status = pool.status("llm");
      expect(status).toMatchObject({ service: "llm", total: 3, available: 2, disabled: 0, rateLimited: 1 });
      expect(status.credentials[0].lastUsedAt).toBe(new Date(clock).toISOString());
      expect(status.credentials[2].rateLimitedUntil).toBe(new Date(clock + 60 * MINUTE).toISOString());
      expect(JSON.stringify(status)).not.toContain("test-key");
    });
  });

  it("fromConfig loads every service", () => {
    const p = CredentialPool.fromConfig({ llm: ["a"], papers: ["b", "c"] });
    expect(p.services()).toEqual(["llm", "papers"]);
    expect(p.status("papers").total).toBe(2);
  });
});
