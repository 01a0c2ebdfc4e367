import { describe, it, expect } from "vitest";
import { buildSyncWindow, describeWindow, isInWindow } from "./window.js";

describe("buildSyncWindow", () => {
  it("should span the default 7 days back and 28 days ahead", () => {
    const window = buildSyncWindow(new Date("2026-10-19T12:00:00Z"));

    expect(window.start.toISOString()).toBe("2026-10-12T12:00:00.000Z");
    expect(window.end.toISOString()).toBe("2026-11-16T12:00:00.000Z");
  });

  it("should accept custom sizes", () => {
    const window = buildSyncWindow(new Date("2026-10-19T00:00:00Z"), 0, 1);

    expect(describeWindow(window)).toBe("2026-10-19T00:00:00.000Z .. 2026-10-20T00:00:00.000Z");
  });

  it("should reject negative sizes", () => {
    expect(() => buildSyncWindow(new Date(), -1, 1)).toThrow(RangeError);
  });
});

describe("isInWindow", () => {
  const window = { start: new Date("2026-10-20T00:00:00Z"), end: new Date("2026-10-21T00:00:00Z") };

  it("should be half-open", () => {
    expect(isInWindow(new Date("2026-10-20T00:00:00Z"), window)).toBe(true);
    expect(isInWindow(new Date("2026-10-20T23:59:59Z"), window)).toBe(true);
    expect(isInWindow(new Date("2026-10-21T00:00:00Z"), window)).toBe(false);
    expect(isInWindow(new Date("2026-10-19T23:59:59Z"), window)).toBe(false);
  });
});
