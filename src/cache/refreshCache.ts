import { CacheUnavailableError, describeError } from "../feed/errors.js";
import { createLogger } from "../utils/logger.js";
import { isStale } from "../utils/time.js";
import type { ResultSet } from "./pipeline.js";

const logger = createLogger("RefreshCache");

/** Upstream is hit at most once per this window, whatever the request rate. */
export const MIN_REFRESH_INTERVAL_MS = 30_000;

export type CacheState = "EMPTY" | "FRESH" | "STALE";

export interface RefreshCacheOptions {
  /** Test hook; the service always runs with MIN_REFRESH_INTERVAL_MS. */
  minIntervalMs?: number;
  now?: () => number;
  onRecompute?: (outcome: "success" | "failure", durationMs: number) => void;
}

export interface CacheStats {
  state: CacheState;
  ageMs: number | null;
  hits: number;
  staleServed: number;
  recomputes: number;
  failures: number;
  inFlight: boolean;
  lastError: string | null;
  lastErrorAt: number | null;
}

/**
 * Holds the last published ResultSet and refreshes it behind a minimum
 * interval.
 *
 *   EMPTY  → first caller recomputes and waits; concurrent cold callers share
 *            that same flight.
 *   FRESH  → snapshot returned as-is.
 *   STALE  → the first caller starts one recompute and waits for it; everyone
 *            else gets the previous snapshot immediately.
 *
 * A failed recompute keeps the previous snapshot and its timestamp. Only a
 * cold start with nothing cached surfaces the error (CacheUnavailableError).
 *
 * Node runs callbacks on one thread, so the snapshot swap is a single
 * assignment and `inFlight` is the single-flight guard.
 */
export class RefreshCache {
  private snapshot: ResultSet | null = null;
  private inFlight: Promise<ResultSet> | null = null;

  private readonly minIntervalMs: number;
  private readonly now: () => number;

  private hits = 0;
  private staleServed = 0;
  private recomputes = 0;
  private failures = 0;
  private lastError: string | null = null;
  private lastErrorAt: number | null = null;

  constructor(
    private readonly compute: () => Promise<ResultSet>,
    private readonly opts: RefreshCacheOptions = {}
  ) {
    this.minIntervalMs = opts.minIntervalMs ?? MIN_REFRESH_INTERVAL_MS;
    this.now = opts.now ?? Date.now;
  }

  state(): CacheState {
    if (!this.snapshot) return "EMPTY";
    return isStale(this.snapshot.computedAt, this.minIntervalMs, this.now()) ? "STALE" : "FRESH";
  }

  peek(): ResultSet | null {
    return this.snapshot;
  }

  async get(): Promise<ResultSet> {
    const current = this.snapshot;

    if (!current) {
      return this.inFlight ?? this.startRecompute();
    }

    if (this.state() === "FRESH") {
      this.hits++;
      logger.debug({ ageMs: this.now() - current.computedAt }, "Serving fresh snapshot");
      return current;
    }

    if (this.inFlight) {
      this.staleServed++;
      logger.debug("Recompute in flight, serving previous snapshot");
      return current;
    }

    return this.startRecompute();
  }

  stats(): CacheStats {
    return {
      state: this.state(),
      ageMs: this.snapshot ? this.now() - this.snapshot.computedAt : null,
      hits: this.hits,
      staleServed: this.staleServed,
      recomputes: this.recomputes,
      failures: this.failures,
      inFlight: this.inFlight !== null,
      lastError: this.lastError,
      lastErrorAt: this.lastErrorAt,
    };
  }

  /**
   * Resolves with the new snapshot, or with the previous one on failure.
   * Rejects only when there is no previous snapshot.
   */
  private startRecompute(): Promise<ResultSet> {
    const startedAt = this.now();
    this.recomputes++;
    logger.info({ state: this.state() }, "Recomputing fund snapshot");

    const flight = Promise.resolve()
      .then(() => this.compute())
      .then((next) => {
        this.snapshot = next;
        logger.info({ count: next.count, durationMs: this.now() - startedAt }, "Snapshot published");
        this.opts.onRecompute?.("success", this.now() - startedAt);
        return next;
      })
      .catch((err: unknown) => {
        this.failures++;
        this.lastError = err instanceof Error ? err.message : String(err);
        this.lastErrorAt = this.now();
        this.opts.onRecompute?.("failure", this.now() - startedAt);

        const previous = this.snapshot;
        if (!previous) {
          logger.error(describeError(err), "Recompute failed with nothing cached");
          throw new CacheUnavailableError(err);
        }
        logger.warn(
          { ...describeError(err), keptAgeMs: this.now() - previous.computedAt },
          "Recompute failed, keeping previous snapshot"
        );
        return previous;
      })
      .finally(() => {
        this.inFlight = null;
      });

    this.inFlight = flight;
    return flight;
  }
}
