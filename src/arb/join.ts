import { createLogger } from "../utils/logger.js";
import { JoinEmptyResult } from "../feed/errors.js";
import type { RawNumeric, RawQuoteRow, RawStatusRow } from "../feed/types.js";

const logger = createLogger("Join");

/** One fund after the inner join; numerics parsed, nothing derived yet. */
export interface JoinedFund {
  code: string;
  name: string;
  price: number;
  priorClose: number;
  tradedValue: number;
  turnoverRate: number | null;
  valuation: number | null;
  subscriptionStatus: string;
  redemptionStatus: string;
  limit: number | null;
  nav: number | null;
  navDate: string;
  fundType: string;
  feeRate: number | null;
  minPurchase: number | null;
  nextOpenDate: string;
}

export interface JoinStats {
  quotes: number;
  status: number;
  joined: number;
  unmatchedQuotes: number;
  unmatchedStatus: number;
  unparseable: number;
  duplicates: number;
  navFallbacks: number;
}

export interface JoinResult {
  funds: JoinedFund[];
  stats: JoinStats;
}

export interface JoinOptions {
  /** Use the status feed's NAV when a quote has no valuation estimate (QDII). */
  valuationFallbackToNav?: boolean;
}

const PLACEHOLDERS = new Set(["", "-", "--", "---"]);

/**
 * Lenient numeric parse for upstream cells. Accepts finite numbers and
 * numeric strings (a trailing `%` is dropped); anything else is null.
 */
export function parseNumeric(v: RawNumeric | undefined): number | null {
  if (v === null || v === undefined) return null;
  if (typeof v === "number") return Number.isFinite(v) ? v : null;

  const s = v.trim().replace(/%$/, "").replace(/,/g, "");
  if (PLACEHOLDERS.has(s)) return null;
  const n = Number(s);
  return Number.isFinite(n) ? n : null;
}

/** First row per code wins; the rest are counted. */
function indexByCode<T extends { code: string }>(rows: T[]): { byCode: Map<string, T>; duplicates: number } {
  const byCode = new Map<string, T>();
  let duplicates = 0;
  for (const row of rows) {
    const code = row.code.trim();
    if (!code) continue;
    if (byCode.has(code)) {
      duplicates++;
      continue;
    }
    byCode.set(code, row);
  }
  return { byCode, duplicates };
}

/**
 * Inner join of quotes and status on fund code.
 *
 * Rows present in only one feed are dropped silently (the feeds are refreshed
 * on different schedules upstream). A quote whose price or prior close will
 * not parse is dropped and counted under `unparseable`.
 *
 * Throws JoinEmptyResult when nothing survives.
 */
export function joinFeeds(quotes: RawQuoteRow[], status: RawStatusRow[], opts: JoinOptions = {}): JoinResult {
  const q = indexByCode(quotes);
  const s = indexByCode(status);

  const stats: JoinStats = {
    quotes: quotes.length,
    status: status.length,
    joined: 0,
    unmatchedQuotes: 0,
    unmatchedStatus: 0,
    unparseable: 0,
    duplicates: q.duplicates + s.duplicates,
    navFallbacks: 0,
  };

  const funds: JoinedFund[] = [];

  for (const [code, quote] of q.byCode) {
    const st = s.byCode.get(code);
    if (!st) {
      stats.unmatchedQuotes++;
      continue;
    }

    const price = parseNumeric(quote.price);
    const priorClose = parseNumeric(quote.priorClose);
    if (price === null || priorClose === null) {
      stats.unparseable++;
      logger.debug({ code, price: quote.price, priorClose: quote.priorClose }, "Unparseable quote dropped");
      continue;
    }

    const nav = parseNumeric(st.nav);
    let valuation = parseNumeric(quote.valuation);
    if (valuation === null && opts.valuationFallbackToNav && nav !== null) {
      valuation = nav;
      stats.navFallbacks++;
    }

    funds.push({
      code,
      name: st.name || quote.name,
      price,
      priorClose,
      tradedValue: parseNumeric(quote.tradedValue) ?? 0,
      turnoverRate: parseNumeric(quote.turnoverRate),
      valuation,
      subscriptionStatus: st.subscriptionStatus.trim(),
      redemptionStatus: st.redemptionStatus.trim(),
      limit: parseNumeric(st.limit),
      nav,
      navDate: st.navDate,
      fundType: st.fundType,
      feeRate: parseNumeric(st.feeRate),
      minPurchase: parseNumeric(st.minPurchase),
      nextOpenDate: st.nextOpenDate.trim(),
    });
  }

  for (const code of s.byCode.keys()) {
    if (!q.byCode.has(code)) stats.unmatchedStatus++;
  }
  stats.joined = funds.length;

  if (stats.duplicates > 0) {
    logger.warn({ duplicates: stats.duplicates }, "Duplicate fund codes in upstream feeds, first row kept");
  }
  logger.info(stats, "Feeds joined");

  if (funds.length === 0) {
    throw new JoinEmptyResult(quotes.length, status.length);
  }
  return { funds, stats };
}
