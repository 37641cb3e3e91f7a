/** Upstream numerics arrive as numbers, numeric strings, or placeholders like "-". */
export type RawNumeric = number | string | null;

/** Feed A: exchange quote for one LOF, with the intraday valuation estimate attached. */
export interface RawQuoteRow {
  code: string;
  name: string;
  price: RawNumeric;
  priorClose: RawNumeric;
  tradedValue: RawNumeric;   // 成交额, CNY
  turnoverRate: RawNumeric;  // 换手率, %
  valuation: RawNumeric;     // 估值
}

/** Feed B: subscription/redemption status and last published NAV. */
export interface RawStatusRow {
  code: string;
  name: string;
  subscriptionStatus: string;
  redemptionStatus: string;
  limit: RawNumeric;         // 日累计限定金额
  nav: RawNumeric;
  navDate: string;
  fundType: string;
  feeRate: RawNumeric;       // 手续费, %
  minPurchase: RawNumeric;   // 购买起点
  nextOpenDate: string;
}

/** Both feeds behind one seam so the pipeline and tests can swap the provider. */
export interface FundDataSource {
  fetchQuotes(): Promise<RawQuoteRow[]>;
  fetchStatus(): Promise<RawStatusRow[]>;
}
