import { describe, it, expect } from "vitest";
import { applyProgress, applyStatus, assertLaunchable, buildSession, newSessionId, sortNewestFirst } from "../sessionRules.js";
import { InvalidSessionStateError, ValidationError } from "../../errors.js";

const T0 = new Date("2025-03-04T05:06:07.089Z");
const T1 = new Date("2025-03-04T05:07:00.000Z");

describe("newSessionId", () => {
  it("encodes the UTC creation time and a hex suffix", () => {
    expect(newSessionId(T0)).toMatch(/^session_20250304_050607_089_[0-9a-f]{8}$/);
  });

  it("is unique within the same millisecond", () => {
    expect(newSessionId(T0)).not.toBe(newSessionId(T0));
  });
});

describe("buildSession", () => {
  it("starts pending at 0% in the Starting phase", () => {
    const s = buildSession("  perovskite solar cells ", { iterations: 2 }, T0);
    expect(s).toMatchObject({
      topic: "perovskite solar cells",
      params: { iterations: 2 },
      status: "pending",
      progress: 0,
      phase: "Starting",
      message: "Session created",
      createdAt: T0.toISOString(),
      completedAt: null,
      resultLocation: null,
    });
  });

  it("rejects an empty topic", () => {
    expect(() => buildSession("   ", {}, T0)).toThrow(ValidationError);
  });
});

describe("applyProgress", () => {
  const base = { ...buildSession("topic", {}, T0), status: "running" as const, progress: 40 };

  it("keeps progress monotonic by clamping to the stored value", () => {
    const { session, entry } = applyProgress(base, { progress: 20, phase: "PapersCollected", message: "late" }, T1);
    expect(session.progress).toBe(40);
    expect(session.phase).toBe("PapersCollected");
    expect(entry).toEqual({ sessionId: base.id, timestamp: T1.toISOString(), phase: "PapersCollected", message: "late" });
  });

  it("rejects values outside 0..100", () => {
    expect(() => applyProgress(base, { progress: 101, phase: "X", message: "" }, T1)).toThrow(ValidationError);
    expect(() => applyProgress(base, { progress: -1, phase: "X", message: "" }, T1)).toThrow(ValidationError);
    expect(() => applyProgress(base, { progress: Number.NaN, phase: "X", message: "" }, T1)).toThrow(ValidationError);
  });

  it("refuses updates once terminal", () => {
    const done = { ...base, status: "completed" as const };
    expect(() => applyProgress(done, { progress: 100, phase: "X", message: "" }, T1)).toThrow(InvalidSessionStateError);
  });
});

describe("applyStatus", () => {
  const pending = buildSession("topic", {}, T0);

  it("allows pending → running → completed and stamps completion", () => {
    const running = applyStatus(pending, "running", undefined, T0).session;
    expect(running.message).toBe("Status changed to running");
    const { session, entry } = applyStatus({ ...running, phase: "DiscoveriesFound" }, "completed", "done", T1);
    expect(session).toMatchObject({ status: "completed", progress: 100, completedAt: T1.toISOString(), message: "done" });
    expect(entry.phase).toBe("DiscoveriesFound");
  });

  it("keeps progress when failing", () => {
    const running = { ...applyStatus(pending, "running", undefined, T0).session, progress: 55 };
    const { session } = applyStatus(running, "failed", "boom", T1);
    expect(session).toMatchObject({ status: "failed", progress: 55, completedAt: T1.toISOString() });
  });

  it.each([
    ["pending", "completed"],
    ["pending", "failed"],
    ["running", "pending"],
    ["completed", "running"],
    ["failed", "failed"],
  ] as const)("rejects %s → %s", (from, to) => {
    expect(() => applyStatus({ ...pending, status: from }, to, undefined, T1)).toThrow(InvalidSessionStateError);
  });
});

describe("assertLaunchable", () => {
  const pending = { ...buildSession("topic", {}, T0), id: "session_x" };

  it("accepts a pending session", () => {
    expect(() => assertLaunchable(pending)).not.toThrow();
  });

  it.each(["running", "completed", "failed"] as const)("rejects a %s session", (status) => {
    expect(() => assertLaunchable({ ...pending, status })).toThrow(InvalidSessionStateError);
    expect(() => assertLaunchable({ ...pending, status })).toThrow(
      `Session session_x is ${status}; only pending sessions can be started`
    );
  });
});

describe("sortNewestFirst", () => {
  it("orders by createdAt descending, later insertion first on ties", () => {
    const a = { ...buildSession("a", {}, T0), id: "a" };
    const b = { ...buildSession("b", {}, T1), id: "b" };
    const c = { ...buildSession("c", {}, T0), id: "c" };
    expect(sortNewestFirst([a, b, c]).map((s) => s.id)).toEqual(["b", "c", "a"]);
  });
});
