import { describe, it, expect } from "vitest";
import { MetricsRecorder } from "./telemetry.js";
import { createLogger } from "./logger.js";

const log = createLogger("telemetry", { sink: () => {} });

describe("MetricsRecorder", () => {
  it("should keep one series per tag set", () => {
    const metrics = new MetricsRecorder({ log });
    metrics.counter("switchyard.task.compact", 1, { type: "remote" });
    metrics.counter("switchyard.task.compact", 1, { type: "local" });
    metrics.counter("switchyard.task.compact", 2, { type: "local" });

    expect(metrics.value("switchyard.task.compact", { type: "local" })).toBe(3);
    expect(metrics.value("switchyard.task.compact", { type: "remote" })).toBe(1);
    expect(metrics.value("switchyard.task.compact")).toBe(0);
  });

  it("should key series independently of tag order", () => {
    const metrics = new MetricsRecorder({ log });
    metrics.counter("calls", 1, { b: "2", a: "1" });
    metrics.counter("calls", 1, { a: "1", b: "2" });

    expect(metrics.snapshot()).toEqual({ "calls{a=1,b=2}": 2 });
  });

  it("should reject negative deltas even when disabled", () => {
    const metrics = new MetricsRecorder({ enabled: false, log });
    expect(() => metrics.counter("calls", -1)).toThrow(RangeError);
    metrics.counter("calls", 5);
    expect(metrics.snapshot()).toEqual({});
  });
});
