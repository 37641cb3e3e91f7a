/**
 * In-process counters, gauges and a bounded duration sample, logged
 * periodically and exposed on /health.
 */
import { createLogger } from "../utils/logger.js";

const logger = createLogger("Metrics");

const MAX_SAMPLES = 500;

export class Metrics {
  private counters = new Map<string, number>();
  private gauges = new Map<string, number>();
  private samples = new Map<string, number[]>();
  private readonly startTime: number;

  constructor(private readonly now: () => number = Date.now) {
    this.startTime = now();
  }

  inc(name: string, delta = 1): void {
    this.counters.set(name, (this.counters.get(name) ?? 0) + delta);
  }

  getCounter(name: string): number {
    return this.counters.get(name) ?? 0;
  }

  gauge(name: string, value: number): void {
    this.gauges.set(name, value);
  }

  observe(name: string, value: number): void {
    const arr = this.samples.get(name) ?? [];
    arr.push(value);
    if (arr.length > MAX_SAMPLES) arr.shift();
    this.samples.set(name, arr);
  }

  /** Nearest-rank percentile over the retained samples; 0 when empty. */
  percentile(name: string, p: number): number {
    const arr = this.samples.get(name);
    if (!arr || arr.length === 0) return 0;
    const sorted = [...arr].sort((a, b) => a - b);
    const idx = Math.min(Math.ceil((p / 100) * sorted.length) - 1, sorted.length - 1);
    return sorted[Math.max(0, idx)];
  }

  snapshot(): Record<string, number> {
    const snap: Record<string, number> = { uptimeMs: this.now() - this.startTime };
    for (const [k, v] of this.counters) snap[`counter.${k}`] = v;
    for (const [k, v] of this.gauges) snap[`gauge.${k}`] = v;
    for (const k of this.samples.keys()) {
      snap[`hist.${k}.p50`] = this.percentile(k, 50);
      snap[`hist.${k}.p95`] = this.percentile(k, 95);
    }
    return snap;
  }

  log(): void {
    logger.info(this.snapshot(), "metrics");
  }
}
