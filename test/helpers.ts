import type { FilterConfig } from "../src/config/schema.js";
import type { FundRecord } from "../src/arb/fundRecord.js";
import type { FundDataSource, RawQuoteRow, RawStatusRow } from "../src/feed/types.js";

export function quoteRow(overrides: Partial<RawQuoteRow> = {}): RawQuoteRow {
  return {
    code: "501000",
    name: "XX LOF",
    price: 1.052,
    priorClose: 1.049,
    tradedValue: 15_000_000,
    turnoverRate: 0.85,
    valuation: 1.039,
    ...overrides,
  };
}

export function statusRow(overrides: Partial<RawStatusRow> = {}): RawStatusRow {
  return {
    code: "501000",
    name: "XX LOF基金",
    subscriptionStatus: "开放",
    redemptionStatus: "开放",
    limit: 5_000_000,
    nav: 1.039,
    navDate: "2024-06-14",
    fundType: "股票型",
    feeRate: 0.15,
    minPurchase: 10,
    nextOpenDate: "",
    ...overrides,
  };
}

export function fundRecord(overrides: Partial<FundRecord> = {}): FundRecord {
  return {
    code: "501000",
    name: "XX LOF基金",
    premiumRate: 1.5,
    tradedValue: 10_000_000,
    limit: null,
    turnoverRate: 1,
    feeRate: 0.15,
    subscriptionStatus: "开放申购",
    redemptionStatus: "开放赎回",
    price: 1.015,
    valuation: 1,
    changePercent: 0.1,
    fundType: "股票型",
    navDate: "2024-06-14",
    nav: 1,
    netSpreadRate: 1.35,
    valuationDeviation: 0,
    minPurchase: 10,
    nextOpenDate: "",
    ...overrides,
  };
}

export const permissiveFilter: FilterConfig = {
  minAbsPremiumRate: 0,
  minDiscountRate: 0,
  minTradedValue: 0,
  statusRule: "both",
  closedStatusMarkers: ["暂停", "封闭"],
};

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (reason: unknown) => void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/** In-process stand-in for the upstream provider; counts calls per feed. */
export class FakeSource implements FundDataSource {
  quoteCalls = 0;
  statusCalls = 0;
  quotes: () => Promise<RawQuoteRow[]>;
  status: () => Promise<RawStatusRow[]>;

  constructor(quotes: RawQuoteRow[] = [quoteRow()], status: RawStatusRow[] = [statusRow()]) {
    this.quotes = async () => quotes;
    this.status = async () => status;
  }

  fetchQuotes(): Promise<RawQuoteRow[]> {
    this.quoteCalls++;
    return this.quotes();
  }

  fetchStatus(): Promise<RawStatusRow[]> {
    this.statusCalls++;
    return this.status();
  }
}

/** Manually advanced clock. */
export class FakeClock {
  constructor(public t = 1_700_000_000_000) {}
  now = (): number => this.t;
  advance(ms: number): void {
    this.t += ms;
  }
}
