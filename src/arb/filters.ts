import type { FilterConfig } from "../config/schema.js";
import type { FundRecord } from "./fundRecord.js";

export type CandidateCriteria = FilterConfig;

/** Open means a non-empty status carrying none of the closed markers ("暂停申购", "封闭期"...). */
export function isOpenStatus(status: string, closedMarkers: readonly string[]): boolean {
  const s = status.trim();
  if (!s) return false;
  return !closedMarkers.some((m) => s.includes(m));
}

/** Liquidity floor. */
export function filterByTradedValue(records: FundRecord[], minTradedValue: number): FundRecord[] {
  return records.filter((r) => r.tradedValue >= minTradedValue);
}

/**
 * Premium or discount large enough to act on. Under "directional" a discount
 * is measured against `minDiscountRate`; otherwise both sides use
 * `minAbsPremiumRate`.
 */
export function passesPremiumThreshold(
  r: FundRecord,
  criteria: Pick<CandidateCriteria, "statusRule" | "minAbsPremiumRate" | "minDiscountRate">
): boolean {
  if (criteria.statusRule === "directional" && r.premiumRate < 0) {
    return -r.premiumRate >= criteria.minDiscountRate;
  }
  return Math.abs(r.premiumRate) >= criteria.minAbsPremiumRate;
}

/**
 * "both": subscription and redemption must both be open.
 * "directional": a premium needs subscription open (subscribe, sell on
 * exchange); a discount needs redemption open (buy on exchange, redeem).
 */
export function passesStatusRule(r: FundRecord, criteria: Pick<CandidateCriteria, "statusRule" | "closedStatusMarkers">): boolean {
  const subOpen = isOpenStatus(r.subscriptionStatus, criteria.closedStatusMarkers);
  const redeemOpen = isOpenStatus(r.redemptionStatus, criteria.closedStatusMarkers);

  if (criteria.statusRule === "both") return subOpen && redeemOpen;
  if (r.premiumRate > 0) return subOpen;
  if (r.premiumRate < 0) return redeemOpen;
  return subOpen && redeemOpen;
}

/** |premium| descending, code ascending on ties. Returns a new array. */
export function sortByAbsPremium(records: FundRecord[]): FundRecord[] {
  return [...records].sort((a, b) => {
    const diff = Math.abs(b.premiumRate) - Math.abs(a.premiumRate);
    if (diff !== 0) return diff;
    return a.code < b.code ? -1 : a.code > b.code ? 1 : 0;
  });
}

/** Arbitrage candidates, best first. */
export function filterCandidates(records: FundRecord[], criteria: CandidateCriteria): FundRecord[] {
  const kept = filterByTradedValue(records, criteria.minTradedValue).filter(
    (r) => passesPremiumThreshold(r, criteria) && passesStatusRule(r, criteria)
  );
  return sortByAbsPremium(kept);
}
