import { describe, it, expect, beforeEach } from "vitest";
import { createIndex } from "../fm-index.js";
import { metrics } from "./metrics.js";

describe("metrics", () => {
  beforeEach(() => {
    metrics.reset();
  });

  it("should record builds with size", () => {
    const index = createIndex("banana", { name: "metrics-build" });
    index.insert("s");

    const recorded = metrics.getMetrics("metrics-build");
    expect(recorded?.buildTimeMs).toHaveLength(2);
    expect(recorded?.length).toBe(7);
    expect(recorded?.alphabetSize).toBe(5);
  });

  it("should record hits and misses", () => {
    const index = createIndex("banana", { name: "metrics-search" });
    index.search("ana");
    index.search("z");
    index.search("na");

    const recorded = metrics.getMetrics("metrics-search");
    expect(recorded?.hitCount).toBe(2);
    expect(recorded?.missCount).toBe(1);
    expect(recorded?.searchTimeMs).toHaveLength(3);
    expect(metrics.getHitRate("metrics-search")).toBeCloseTo(2 / 3);
  });

  it("should not record a rejected search", () => {
    const index = createIndex("banana", { name: "metrics-rejected" });
    expect(() => index.search("")).toThrow();
    expect(metrics.getMetrics("metrics-rejected")?.searchTimeMs).toHaveLength(0);
  });

  it("should skip indexes with metrics disabled", () => {
    const index = createIndex("banana", { name: "metrics-off", metrics: false });
    index.search("ana");
    expect(metrics.getMetrics("metrics-off")).toBeUndefined();
  });

  it("should keep the last 100 samples", () => {
    for (let i = 0; i < 120; i++) {
      metrics.recordSearchTime("metrics-window", i);
    }
    const samples = metrics.getMetrics("metrics-window")?.searchTimeMs ?? [];
    expect(samples).toHaveLength(100);
    expect(samples[0]).toBe(20);
    expect(metrics.getP95SearchTime("metrics-window")).toBe(114);
    expect([...metrics.getAllMetrics().keys()]).toEqual(["metrics-window"]);
  });

  it("should compute p95", () => {
    expect(metrics.getP95([])).toBe(0);
    expect(metrics.getP95(Array.from({ length: 20 }, (_, i) => i + 1))).toBe(19);
  });

  it("should reset one index", () => {
    metrics.recordHit("metrics-a");
    metrics.recordHit("metrics-b");
    metrics.reset("metrics-a");
    expect(metrics.getMetrics("metrics-a")).toBeUndefined();
    expect(metrics.getMetrics("metrics-b")?.hitCount).toBe(1);
  });
});
