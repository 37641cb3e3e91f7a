import type { FundRecord } from "../arb/fundRecord.js";
import { roundNullable, roundTo } from "../arb/rounding.js";
import type { ResultSet } from "../cache/pipeline.js";
import { formatLocalTimestamp } from "../utils/time.js";

/** Wire shape of one fund in the /lof payload. */
export interface FundJson {
  code: string;
  name: string;
  premium_rate: number;
  traded_value: number;
  limit: number | null;
  turnover_rate: number | null;
  fee_rate: number | null;
  subscription_status: string;
  redemption_status: string;
  price: number;
  valuation: number;
  change_percent: number | null;
  fund_type: string;
  nav_date: string;
  nav: number | null;
  net_spread_rate: number;
  valuation_deviation: number | null;
  min_purchase: number | null;
  next_open_date: string;
}

export interface LofSuccessBody {
  status: "success";
  update_time: string;
  count: number;
  data: FundJson[];
}

export interface LofErrorBody {
  status: "error";
  message: string;
  update_time: null;
  count: 0;
  data: [];
}

/** Percentages go out at 2 dp; prices and the valuation keep 4 (the feed's own precision). */
export function presentFund(r: FundRecord): FundJson {
  return {
    code: r.code,
    name: r.name,
    premium_rate: roundTo(r.premiumRate),
    traded_value: r.tradedValue,
    limit: r.limit,
    turnover_rate: roundNullable(r.turnoverRate),
    fee_rate: roundNullable(r.feeRate),
    subscription_status: r.subscriptionStatus,
    redemption_status: r.redemptionStatus,
    price: roundTo(r.price, 4),
    valuation: roundTo(r.valuation, 4),
    change_percent: roundNullable(r.changePercent),
    fund_type: r.fundType,
    nav_date: r.navDate,
    nav: roundNullable(r.nav, 4),
    net_spread_rate: roundTo(r.netSpreadRate),
    valuation_deviation: roundNullable(r.valuationDeviation),
    min_purchase: r.minPurchase,
    next_open_date: r.nextOpenDate,
  };
}

export function presentResultSet(rs: ResultSet): LofSuccessBody {
  return {
    status: "success",
    update_time: formatLocalTimestamp(rs.computedAt),
    count: rs.count,
    data: rs.records.map(presentFund),
  };
}

export function presentError(message: string): LofErrorBody {
  return { status: "error", message, update_time: null, count: 0, data: [] };
}
