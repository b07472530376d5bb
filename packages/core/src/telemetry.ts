import type { MetricTags, Telemetry } from "@switchyard/types";
import { createLogger, type Logger } from "./logger.js";

export interface MetricsRecorderOptions {
  /** When false, counters are accepted and discarded. */
  enabled?: boolean;
  log?: Logger;
}

function seriesKey(name: string, tags: MetricTags): string {
  const parts = Object.keys(tags)
    .sort()
    .map((k) => `${k}=${tags[k]}`);
  return parts.length > 0 ? `${name}{${parts.join(",")}}` : name;
}

/**
 * In-process counter store. One series per name + tag set.
 */
export class MetricsRecorder implements Telemetry {
  private readonly series = new Map<string, number>();
  private readonly enabled: boolean;
  private readonly log: Logger;

  constructor(opts: MetricsRecorderOptions = {}) {
    this.enabled = opts.enabled ?? true;
    this.log = opts.log ?? createLogger("telemetry");
  }

  counter(name: string, delta: number, tags: MetricTags = {}): void {
    if (!Number.isInteger(delta) || delta < 0) {
      throw new RangeError(`counter ${name} requires a non-negative integer delta, got ${delta}`);
    }
    if (!this.enabled) return;

    const key = seriesKey(name, tags);
    this.series.set(key, (this.series.get(key) ?? 0) + delta);
    this.log.trace("counter", { name, delta, tags });
  }

  value(name: string, tags: MetricTags = {}): number {
    return this.series.get(seriesKey(name, tags)) ?? 0;
  }

  snapshot(): Record<string, number> {
    return Object.fromEntries(this.series);
  }
}
