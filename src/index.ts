import type http from "node:http";
import { loadConfig, loadEnv } from "./config/load.js";
import type { Config, Env } from "./config/schema.js";
import { EastmoneyDataSource } from "./feed/eastmoney.js";
import { describeError } from "./feed/errors.js";
import type { FundDataSource } from "./feed/types.js";
import { buildResultSet, type ResultSet } from "./cache/pipeline.js";
import { RefreshCache } from "./cache/refreshCache.js";
import { HealthMonitor } from "./monitoring/health.js";
import { Metrics } from "./monitoring/metrics.js";
import { ClientThrottle } from "./web/rateLimit.js";
import { startServer } from "./web/server.js";
import { createLogger, enableFileLog, setLogLevel } from "./utils/logger.js";

const logger = createLogger("Main");

const METRICS_LOG_INTERVAL_MS = 5 * 60_000;

export interface App {
  cache: RefreshCache;
  metrics: Metrics;
  health: HealthMonitor;
  throttle?: ClientThrottle;
  refresh: () => Promise<ResultSet>;
}

export function applyLogLevel(env: Env): void {
  setLogLevel(env.LOG_LEVEL ?? (env.DEBUG ? "debug" : "info"));
}

export function createDataSource(cfg: Config): FundDataSource {
  return new EastmoneyDataSource({ timeoutMs: cfg.upstream.timeoutMs, pageSize: cfg.upstream.pageSize });
}

/** Wires source → pipeline → cache plus monitoring; starts nothing. */
export function createApp(cfg: Config, source: FundDataSource = createDataSource(cfg)): App {
  const metrics = new Metrics();

  const refresh = (): Promise<ResultSet> =>
    buildResultSet(source, { filter: cfg.filter, upstream: cfg.upstream });

  const cache = new RefreshCache(refresh, {
    onRecompute: (outcome, durationMs) => {
      metrics.inc(`recompute_${outcome}`);
      metrics.observe("recompute_ms", durationMs);
    },
  });

  const health = new HealthMonitor(() => cache.stats());
  const throttle = cfg.rateLimit.enabled ? new ClientThrottle(cfg.rateLimit.windowMs) : undefined;

  return { cache, metrics, health, throttle, refresh };
}

export async function main(): Promise<http.Server> {
  const env = loadEnv();
  applyLogLevel(env);
  const cfg = loadConfig(env.CONFIG_FILE);
  if (cfg.logging.file) {
    enableFileLog({ file: cfg.logging.file, retentionDays: cfg.logging.retentionDays });
  }
  const app = createApp(cfg);

  logger.info({ port: env.PORT, debug: env.DEBUG, rateLimit: cfg.rateLimit.enabled }, "Starting LOF arbitrage service");

  // Warm-up; a failure here is not fatal, the first request retries.
  try {
    const rs = await app.cache.get();
    logger.info({ count: rs.count }, "Cache warmed");
  } catch (err) {
    logger.error(describeError(err), "Cache warm-up failed");
  }

  const server = await startServer(env.PORT, {
    cache: app.cache,
    health: app.health,
    metrics: app.metrics,
    throttle: app.throttle,
  });

  const ticker = setInterval(() => {
    const cache = app.cache.stats();
    app.metrics.gauge("cache_hits", cache.hits);
    app.metrics.gauge("cache_stale_served", cache.staleServed);
    app.metrics.gauge("memory_mb", Math.round(process.memoryUsage().rss / 1024 / 1024));
    if (app.throttle) {
      app.throttle.prune();
      app.metrics.gauge("throttled_clients", app.throttle.size());
    }
    app.metrics.log();
  }, METRICS_LOG_INTERVAL_MS);
  ticker.unref();

  let closing = false;
  const shutdown = (signal: string): void => {
    if (closing) return;
    closing = true;
    logger.info({ signal }, "Shutting down");
    clearInterval(ticker);
    app.metrics.log();
    server.close((err) => {
      if (err) logger.error({ err: String(err) }, "Error while closing server");
      process.exit(err ? 1 : 0);
    });
    server.closeAllConnections();
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));

  return server;
}
