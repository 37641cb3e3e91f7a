/**
 * HTTP surface.
 *
 * Endpoints:
 *   GET /        → HTML table of current candidates
 *   GET /lof     → JSON { status, update_time, count, data }
 *   GET /health  → health + cache state
 *
 * Both data routes read through RefreshCache.get(), so simultaneous
 * requests never cause more than one upstream round trip.
 */
import http from "node:http";
import type { RefreshCache } from "../cache/refreshCache.js";
import type { HealthMonitor } from "../monitoring/health.js";
import type { Metrics } from "../monitoring/metrics.js";
import { describeError } from "../feed/errors.js";
import { createLogger } from "../utils/logger.js";
import { presentError, presentResultSet } from "./present.js";
import type { ClientThrottle } from "./rateLimit.js";
import { renderErrorPage, renderHomePage } from "./render.js";

const logger = createLogger("Server");

const UNAVAILABLE = "data temporarily unavailable";

export interface ServerDeps {
  cache: RefreshCache;
  health: HealthMonitor;
  metrics: Metrics;
  /** Per-client limit on /lof; absent when disabled. */
  throttle?: ClientThrottle;
}

type Req = http.IncomingMessage;
type Res = http.ServerResponse;

function send(req: Req, res: Res, status: number, contentType: string, body: string, headers: Record<string, string> = {}): void {
  res.writeHead(status, {
    "Content-Type": contentType,
    "Content-Length": String(Buffer.byteLength(body)),
    "Cache-Control": "no-store",
    ...headers,
  });
  res.end(req.method === "HEAD" ? undefined : body);
}

function sendJson(req: Req, res: Res, status: number, payload: unknown, headers: Record<string, string> = {}): void {
  send(req, res, status, "application/json; charset=utf-8", JSON.stringify(payload), headers);
}

function sendHtml(req: Req, res: Res, status: number, html: string): void {
  send(req, res, status, "text/html; charset=utf-8", html);
}

async function handleLof(req: Req, res: Res, deps: ServerDeps): Promise<void> {
  if (deps.throttle) {
    const client = req.socket.remoteAddress ?? "unknown";
    const decision = deps.throttle.check(client);
    if (!decision.allowed) {
      const seconds = Math.ceil(decision.retryAfterMs / 1000);
      deps.metrics.inc("http_throttled");
      logger.warn({ client, retryAfterSeconds: seconds }, "Client over request limit");
      sendJson(
        req,
        res,
        429,
        { status: "error", message: `too many requests, retry in ${seconds}s`, retry_after_seconds: seconds },
        { "Retry-After": String(seconds) }
      );
      return;
    }
  }

  try {
    const rs = await deps.cache.get();
    sendJson(req, res, 200, presentResultSet(rs));
  } catch (err) {
    deps.metrics.inc("http_unavailable");
    logger.error({ route: "/lof", ...describeError(err) }, "No data to serve");
    sendJson(req, res, 503, presentError(UNAVAILABLE));
  }
}

async function handleHome(req: Req, res: Res, deps: ServerDeps): Promise<void> {
  try {
    const rs = await deps.cache.get();
    sendHtml(req, res, 200, renderHomePage(rs));
  } catch (err) {
    deps.metrics.inc("http_unavailable");
    logger.error({ route: "/", ...describeError(err) }, "No data to render");
    sendHtml(req, res, 503, renderErrorPage());
  }
}

function handleHealth(req: Req, res: Res, deps: ServerDeps): void {
  const status = deps.health.status();
  sendJson(req, res, status.healthy ? 200 : 503, { ...status, metrics: deps.metrics.snapshot() });
}

async function route(req: Req, res: Res, deps: ServerDeps): Promise<void> {
  const url = new URL(req.url ?? "/", "http://localhost");
  deps.metrics.inc("http_requests");

  if (req.method !== "GET" && req.method !== "HEAD") {
    sendJson(req, res, 405, { status: "error", message: "method not allowed" }, { Allow: "GET, HEAD" });
    return;
  }

  switch (url.pathname) {
    case "/lof":
      await handleLof(req, res, deps);
      return;
    case "/":
      await handleHome(req, res, deps);
      return;
    case "/health":
      handleHealth(req, res, deps);
      return;
    default:
      sendJson(req, res, 404, { status: "error", message: "not found" });
  }
}

export function createServer(deps: ServerDeps): http.Server {
  return http.createServer((req, res) => {
    route(req, res, deps).catch((err: unknown) => {
      logger.error({ err: String(err), url: req.url }, "Unhandled request error");
      if (!res.headersSent) sendJson(req, res, 500, { status: "error", message: "internal error" });
      else res.end();
    });
  });
}

/** Resolves once the server is listening. */
export function startServer(port: number, deps: ServerDeps, host = "0.0.0.0"): Promise<http.Server> {
  const server = createServer(deps);
  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, host, () => {
      server.off("error", reject);
      logger.info({ host, port }, "HTTP server listening");
      resolve(server);
    });
  });
}
