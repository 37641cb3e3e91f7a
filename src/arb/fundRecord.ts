/** Derived per-fund view. Lives for one refresh cycle; values are full precision. */
export interface FundRecord {
  code: string;
  name: string;
  premiumRate: number;              // %, (price − valuation) / valuation × 100
  tradedValue: number;
  limit: number | null;
  turnoverRate: number | null;
  feeRate: number | null;
  subscriptionStatus: string;
  redemptionStatus: string;
  price: number;
  valuation: number;
  changePercent: number | null;     // %, vs prior close
  fundType: string;
  navDate: string;
  nav: number | null;
  netSpreadRate: number;            // |premium| − fee, %
  valuationDeviation: number | null; // %, estimate vs last NAV
  minPurchase: number | null;       // CNY
  nextOpenDate: string;
}

export function isPremium(r: FundRecord): boolean {
  return r.premiumRate > 0;
}

export function isDiscount(r: FundRecord): boolean {
  return r.premiumRate < 0;
}

export function fundSummary(r: FundRecord): string {
  const side = isPremium(r) ? "PREM" : isDiscount(r) ? "DISC" : "FLAT";
  return `[${side}] ${r.code} ${r.name}: ${r.premiumRate.toFixed(2)}%  px=${r.price} val=${r.valuation}  traded=${Math.round(r.tradedValue)}`;
}
