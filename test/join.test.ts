import { describe, it, expect } from "vitest";
import { joinFeeds, parseNumeric } from "../src/arb/join.js";
import { JoinEmptyResult } from "../src/feed/errors.js";
import { quoteRow, statusRow } from "./helpers.js";

describe("parseNumeric", () => {
  it("passes finite numbers through", () => {
    expect(parseNumeric(1.052)).toBe(1.052);
    expect(parseNumeric(0)).toBe(0);
  });

  it("parses numeric strings, percent suffixes and thousands separators", () => {
    expect(parseNumeric("1.0390")).toBe(1.039);
    expect(parseNumeric(" 0.15% ")).toBe(0.15);
    expect(parseNumeric("1,000,000")).toBe(1_000_000);
    expect(parseNumeric("1.00000000000E+11")).toBe(100_000_000_000);
  });

  it("maps placeholders and garbage to null", () => {
    for (const v of ["-", "---", "", "abc", null, undefined]) {
      expect(parseNumeric(v)).toBeNull();
    }
    expect(parseNumeric(Number.NaN)).toBeNull();
    expect(parseNumeric(Number.POSITIVE_INFINITY)).toBeNull();
  });
});

describe("joinFeeds", () => {
  it("merges quote and status fields for a shared code", () => {
    const { funds, stats } = joinFeeds([quoteRow()], [statusRow()]);
    expect(funds).toEqual([
      {
        code: "501000",
        name: "XX LOF基金",
        price: 1.052,
        priorClose: 1.049,
        tradedValue: 15_000_000,
        turnoverRate: 0.85,
        valuation: 1.039,
        subscriptionStatus: "开放",
        redemptionStatus: "开放",
        limit: 5_000_000,
        nav: 1.039,
        navDate: "2024-06-14",
        fundType: "股票型",
        feeRate: 0.15,
        minPurchase: 10,
        nextOpenDate: "",
      },
    ]);
    expect(stats.joined).toBe(1);
  });

  it("carries the purchase minimum and next open day from the status feed", () => {
    const { funds } = joinFeeds([quoteRow()], [statusRow({ minPurchase: "1,000", nextOpenDate: " 2024-07-01 " })]);
    expect(funds[0].minPurchase).toBe(1_000);
    expect(funds[0].nextOpenDate).toBe("2024-07-01");
  });

  it("drops rows present in only one feed without failing", () => {
    const quotes = [quoteRow(), quoteRow({ code: "160001" })];
    const status = [statusRow(), statusRow({ code: "162411" }), statusRow({ code: "163402" })];
    const { funds, stats } = joinFeeds(quotes, status);

    expect(funds.map((f) => f.code)).toEqual(["501000"]);
    expect(stats.unmatchedQuotes).toBe(1);
    expect(stats.unmatchedStatus).toBe(2);
  });

  it("drops and counts a quote whose price cannot be parsed", () => {
    const quotes = [quoteRow(), quoteRow({ code: "160001", price: "-" })];
    const status = [statusRow(), statusRow({ code: "160001" })];
    const { funds, stats } = joinFeeds(quotes, status);

    expect(funds.map((f) => f.code)).toEqual(["501000"]);
    expect(stats.unparseable).toBe(1);
  });

  it("treats a missing traded value as zero and optional numerics as null", () => {
    const { funds } = joinFeeds(
      [quoteRow({ tradedValue: "-", turnoverRate: "---" })],
      [statusRow({ limit: null, feeRate: "" })]
    );
    expect(funds[0].tradedValue).toBe(0);
    expect(funds[0].turnoverRate).toBeNull();
    expect(funds[0].limit).toBeNull();
    expect(funds[0].feeRate).toBeNull();
  });

  it("keeps the first row for a duplicated code", () => {
    const quotes = [quoteRow({ price: 1.1 }), quoteRow({ price: 9.9 })];
    const { funds, stats } = joinFeeds(quotes, [statusRow()]);
    expect(funds).toHaveLength(1);
    expect(funds[0].price).toBe(1.1);
    expect(stats.duplicates).toBe(1);
  });

  it("leaves a missing valuation null unless NAV fallback is on", () => {
    const quotes = [quoteRow({ valuation: "-" })];
    const status = [statusRow({ nav: "1.0200" })];

    expect(joinFeeds(quotes, status).funds[0].valuation).toBeNull();

    const withFallback = joinFeeds(quotes, status, { valuationFallbackToNav: true });
    expect(withFallback.funds[0].valuation).toBe(1.02);
    expect(withFallback.stats.navFallbacks).toBe(1);
  });

  it("falls back to the quote name when status has none", () => {
    const { funds } = joinFeeds([quoteRow({ name: "Quote Name" })], [statusRow({ name: "" })]);
    expect(funds[0].name).toBe("Quote Name");
  });

  it("throws JoinEmptyResult when no code overlaps", () => {
    expect(() => joinFeeds([quoteRow({ code: "1" })], [statusRow({ code: "2" })])).toThrow(JoinEmptyResult);
  });

  it("throws JoinEmptyResult when every matched row is unparseable", () => {
    expect(() => joinFeeds([quoteRow({ priorClose: "-" })], [statusRow()])).toThrow(JoinEmptyResult);
  });
});
