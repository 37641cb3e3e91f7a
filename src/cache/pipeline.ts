import type { FilterConfig, UpstreamConfig } from "../config/schema.js";
import type { FundRecord } from "../arb/fundRecord.js";
import { joinFeeds, type JoinStats } from "../arb/join.js";
import { computeFundRecords } from "../arb/premium.js";
import { filterCandidates } from "../arb/filters.js";
import { UpstreamUnavailable } from "../feed/errors.js";
import type { FundDataSource } from "../feed/types.js";
import { createLogger } from "../utils/logger.js";
import { retry } from "../utils/retry.js";

const logger = createLogger("Pipeline");

export interface ResultStats extends JoinStats {
  invalidValuation: number;
  computed: number;
  candidates: number;
  durationMs: number;
}

/** One published snapshot. Frozen; replaced wholesale, never edited. */
export interface ResultSet {
  readonly records: readonly FundRecord[];
  readonly count: number;
  /** Epoch ms at which the fetch behind `records` started. */
  readonly computedAt: number;
  readonly stats: Readonly<ResultStats>;
}

export interface PipelineOptions {
  filter: FilterConfig;
  upstream: Pick<UpstreamConfig, "maxAttempts" | "valuationFallbackToNav">;
  now?: () => number;
  /** Base backoff between attempts; tests set 0. */
  retryDelayMs?: number;
}

function deepFreeze<T extends object>(records: T[]): readonly Readonly<T>[] {
  for (const r of records) Object.freeze(r);
  return Object.freeze(records);
}

/**
 * Full refresh: both feeds in parallel (each retried on UpstreamUnavailable),
 * then join → compute → filter. Any fetch or join failure propagates; the
 * cache decides what to do with it.
 */
export async function buildResultSet(source: FundDataSource, opts: PipelineOptions): Promise<ResultSet> {
  const now = opts.now ?? Date.now;
  const startedAt = now();

  const attempt = <T>(feed: string, fn: () => Promise<T>): Promise<T> =>
    retry(fn, {
      maxAttempts: opts.upstream.maxAttempts,
      initialDelayMs: opts.retryDelayMs ?? 500,
      jitter: (opts.retryDelayMs ?? 500) > 0,
      retryIf: (e) => e instanceof UpstreamUnavailable,
      onRetry: (n, err, delayMs) => logger.warn({ feed, attempt: n, delayMs, err: err.message }, "Retrying upstream fetch"),
    });

  const [quotes, status] = await Promise.all([
    attempt("quotes", () => source.fetchQuotes()),
    attempt("status", () => source.fetchStatus()),
  ]);
  logger.info({ quotes: quotes.length, status: status.length }, "Upstream rows fetched");

  const joined = joinFeeds(quotes, status, { valuationFallbackToNav: opts.upstream.valuationFallbackToNav });
  const { records, invalidValuation } = computeFundRecords(joined.funds);
  if (invalidValuation > 0) {
    logger.info({ invalidValuation }, "Funds without a usable valuation excluded");
  }

  const candidates = filterCandidates(records, opts.filter);
  if (candidates.length === 0) {
    logger.info({ computed: records.length }, "No candidates: no fund meets the filter right now");
  } else {
    logger.info({ candidates: candidates.length, computed: records.length }, "Candidates selected");
  }

  return Object.freeze({
    records: deepFreeze(candidates),
    count: candidates.length,
    computedAt: startedAt,
    stats: Object.freeze({
      ...joined.stats,
      invalidValuation,
      computed: records.length,
      candidates: candidates.length,
      durationMs: now() - startedAt,
    }),
  });
}
