import type { CacheStats } from "../cache/refreshCache.js";
import { createLogger } from "../utils/logger.js";

const logger = createLogger("Health");

/** Past this age the last-known-good snapshot is considered too old to trust. */
export const MAX_HEALTHY_AGE_MS = 10 * 60_000;

export interface HealthStatus {
  healthy: boolean;
  uptimeMs: number;
  uptimeHuman: string;
  memoryMB: number;
  cache: CacheStats;
  checks: Record<string, boolean>;
}

export class HealthMonitor {
  private readonly startTime: number;

  constructor(
    private readonly cacheStats: () => CacheStats,
    private readonly now: () => number = Date.now
  ) {
    this.startTime = now();
  }

  status(): HealthStatus {
    const uptimeMs = this.now() - this.startTime;
    const hours = Math.floor(uptimeMs / 3_600_000);
    const mins = Math.floor((uptimeMs % 3_600_000) / 60_000);
    const rss = process.memoryUsage().rss;
    const cache = this.cacheStats();

    const checks: Record<string, boolean> = {
      hasData: cache.state !== "EMPTY",
      dataRecent: cache.ageMs !== null && cache.ageMs < MAX_HEALTHY_AGE_MS,
      memoryOk: rss < 512 * 1024 * 1024,
    };
    const healthy = Object.values(checks).every(Boolean);

    if (!healthy) {
      logger.warn({ checks, lastError: cache.lastError }, "Unhealthy status");
    }

    return {
      healthy,
      uptimeMs,
      uptimeHuman: `${hours}h ${mins}m`,
      memoryMB: Math.round(rss / 1024 / 1024),
      cache,
      checks,
    };
  }
}
