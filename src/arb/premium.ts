import type { FundRecord } from "./fundRecord.js";
import type { JoinedFund } from "./join.js";

/** (price − base) / base × 100, or null when base is unusable. */
export function percentChange(value: number, base: number | null): number | null {
  if (base === null || !Number.isFinite(base) || base === 0) return null;
  return ((value - base) / base) * 100;
}

export function premiumRate(price: number, valuation: number): number {
  return ((price - valuation) / valuation) * 100;
}

/**
 * Derives the metrics for one joined fund. Pure.
 *
 * Returns null (fund excluded) when the valuation is missing, zero or not
 * finite, so a bad estimate can never surface as a division error.
 */
export function computeFundRecord(f: JoinedFund): FundRecord | null {
  const { valuation } = f;
  if (valuation === null || !Number.isFinite(valuation) || valuation === 0) return null;

  const premium = premiumRate(f.price, valuation);

  return {
    code: f.code,
    name: f.name,
    premiumRate: premium,
    tradedValue: f.tradedValue,
    limit: f.limit,
    turnoverRate: f.turnoverRate,
    feeRate: f.feeRate,
    subscriptionStatus: f.subscriptionStatus,
    redemptionStatus: f.redemptionStatus,
    price: f.price,
    valuation,
    changePercent: percentChange(f.price, f.priorClose),
    fundType: f.fundType,
    navDate: f.navDate,
    nav: f.nav,
    netSpreadRate: Math.abs(premium) - (f.feeRate ?? 0),
    valuationDeviation: percentChange(valuation, f.nav),
    minPurchase: f.minPurchase,
    nextOpenDate: f.nextOpenDate,
  };
}

export interface ComputeResult {
  records: FundRecord[];
  invalidValuation: number;
}

export function computeFundRecords(funds: JoinedFund[]): ComputeResult {
  const records: FundRecord[] = [];
  let invalidValuation = 0;
  for (const f of funds) {
    const r = computeFundRecord(f);
    if (r) records.push(r);
    else invalidValuation++;
  }
  return { records, invalidValuation };
}
