import { describe, it, expect } from "vitest";
import {
  EastmoneyDataSource,
  parseStatusTable,
  statusRowFromTuple,
  stripJsonp,
} from "../src/feed/eastmoney.js";
import { UpstreamSchemaError, UpstreamUnavailable } from "../src/feed/errors.js";
import { joinFeeds } from "../src/arb/join.js";

const STATUS_ROW = `["501000","XX LOF基金","股票型","1.0390","2024-06-14","开放申购","开放赎回","","10","5000000","","","0.15%"]`;
const STATUS_BODY = `var reData={datas:[${STATUS_ROW}],count:["1"],record:"1",pages:"1",curpage:"1"};`;

function clistPage(total: number, codes: string[]): string {
  return JSON.stringify({
    rc: 0,
    data: {
      total,
      diff: codes.map((code) => ({ f12: code, f14: `${code} LOF`, f2: 1.052, f3: 0.29, f6: 15_000_000, f8: 0.85, f18: 1.049 })),
    },
  });
}

const VALUATIONS = JSON.stringify({ Data: { list: [{ bzdm: "501000", gsz: "1.0390", gszzl: "0.12" }] }, ErrCode: 0 });

type Route = (url: URL) => Response;

/** In-process stand-in for the three Eastmoney endpoints. */
function fakeFetch(routes: { clist?: Route; valuation?: Route; status?: Route }) {
  const requested: URL[] = [];
  const impl = async (input: string | URL | Request): Promise<Response> => {
    const url = new URL(typeof input === "string" ? input : input instanceof URL ? input.href : input.url);
    requested.push(url);
    const route = url.pathname.includes("clist")
      ? routes.clist
      : url.pathname.includes("FundGuZhi")
        ? routes.valuation
        : url.pathname.includes("Fund_JJJZ")
          ? routes.status
          : undefined;
    return route ? route(url) : new Response("not found", { status: 404 });
  };
  return { impl, requested };
}

function source(fetchImpl: typeof fetch, pageSize = 100, timeoutMs = 1_000): EastmoneyDataSource {
  return new EastmoneyDataSource({ timeoutMs, pageSize, fetchImpl });
}

/** Never answers; settles only when the request signal aborts. */
function hangingFetch(_input: string | URL | Request, init?: RequestInit): Promise<Response> {
  return new Promise((_resolve, reject) => {
    const signal = init?.signal;
    if (!signal) return;
    signal.addEventListener("abort", () => reject(signal.reason), { once: true });
  });
}

describe("stripJsonp", () => {
  it("unwraps a callback", () => {
    expect(stripJsonp('jQuery1124_1({"a":1});')).toBe('{"a":1}');
  });

  it("passes plain JSON through", () => {
    expect(stripJsonp('  {"a":1}\n')).toBe('{"a":1}');
  });
});

describe("parseStatusTable", () => {
  it("extracts rows from the reData assignment", () => {
    const rows = parseStatusTable(STATUS_BODY).map(statusRowFromTuple);
    expect(rows).toEqual([
      {
        code: "501000",
        name: "XX LOF基金",
        fundType: "股票型",
        nav: "1.0390",
        navDate: "2024-06-14",
        subscriptionStatus: "开放申购",
        redemptionStatus: "开放赎回",
        nextOpenDate: "",
        minPurchase: "10",
        limit: "5000000",
        feeRate: "0.15%",
      },
    ]);
  });

  it("handles several rows and an empty table", () => {
    const two = `var reData={datas:[${STATUS_ROW},${STATUS_ROW.replace("501000", "160000")}],count:["2"]};`;
    expect(parseStatusTable(two).map((t) => t[0])).toEqual(["501000", "160000"]);
    expect(parseStatusTable("var reData={datas:[],count:[\"0\"]};")).toEqual([]);
  });

  it("rejects a body without datas", () => {
    expect(() => parseStatusTable("var reData={};")).toThrow(UpstreamSchemaError);
  });

  it("rejects rows that are too short", () => {
    expect(() => parseStatusTable('var reData={datas:[["501000","x"]]};')).toThrow(UpstreamSchemaError);
  });
});

describe("EastmoneyDataSource", () => {
  it("pages through clist and attaches valuations by code", async () => {
    const { impl, requested } = fakeFetch({
      clist: (url) =>
        new Response(url.searchParams.get("pn") === "1" ? clistPage(150, ["501000"]) : clistPage(150, ["160000"])),
      valuation: () => new Response(VALUATIONS),
    });

    const rows = await source(impl).fetchQuotes();

    expect(rows).toEqual([
      { code: "501000", name: "501000 LOF", price: 1.052, priorClose: 1.049, tradedValue: 15_000_000, turnoverRate: 0.85, valuation: "1.0390" },
      { code: "160000", name: "160000 LOF", price: 1.052, priorClose: 1.049, tradedValue: 15_000_000, turnoverRate: 0.85, valuation: null },
    ]);
    const pages = requested.filter((u) => u.pathname.includes("clist")).map((u) => u.searchParams.get("pn"));
    expect(pages.sort()).toEqual(["1", "2"]);
  });

  it("fetches a single page when total fits", async () => {
    const { impl, requested } = fakeFetch({
      clist: () => new Response(clistPage(1, ["501000"])),
      valuation: () => new Response(VALUATIONS),
    });

    await source(impl).fetchQuotes();
    expect(requested.filter((u) => u.pathname.includes("clist"))).toHaveLength(1);
  });

  it("reads the status table", async () => {
    const { impl, requested } = fakeFetch({ status: () => new Response(STATUS_BODY) });

    const rows = await source(impl).fetchStatus();
    expect(rows).toHaveLength(1);
    expect(rows[0].subscriptionStatus).toBe("开放申购");
    expect(requested[0].searchParams.get("js")).toBe("reData");
  });

  it("yields rows the join understands", async () => {
    const { impl } = fakeFetch({
      clist: () => new Response(clistPage(1, ["501000"])),
      valuation: () => new Response(VALUATIONS),
      status: () => new Response(STATUS_BODY),
    });
    const ds = source(impl);

    const { funds } = joinFeeds(await ds.fetchQuotes(), await ds.fetchStatus());
    expect(funds).toHaveLength(1);
    expect(funds[0].valuation).toBe(1.039);
    expect(funds[0].feeRate).toBe(0.15);
    expect(funds[0].limit).toBe(5_000_000);
    expect(funds[0].minPurchase).toBe(10);
    expect(funds[0].name).toBe("XX LOF基金");
  });

  it("maps a non-2xx answer to UpstreamUnavailable", async () => {
    const { impl } = fakeFetch({ status: () => new Response("busy", { status: 500 }) });

    const err = await source(impl).fetchStatus().then(
      () => null,
      (e: unknown) => e
    );
    expect(err).toBeInstanceOf(UpstreamUnavailable);
    expect(err instanceof UpstreamUnavailable && err.status).toBe(500);
    expect(err instanceof UpstreamUnavailable && err.feed).toBe("status");
  });

  it("maps a network failure to UpstreamUnavailable", async () => {
    const failing = async (): Promise<Response> => {
      throw new TypeError("fetch failed");
    };

    await expect(source(failing).fetchStatus()).rejects.toThrow("status feed unavailable: TypeError: fetch failed");
  });

  it("aborts a request that outlives timeoutMs", async () => {
    const err = await source(hangingFetch, 100, 20).fetchStatus().then(
      () => null,
      (e: unknown) => e
    );

    expect(err).toBeInstanceOf(UpstreamUnavailable);
    expect(err instanceof UpstreamUnavailable && err.feed).toBe("status");
    expect(err instanceof UpstreamUnavailable && err.message).toMatch(/^status feed unavailable: TimeoutError/);
  });

  it("times out the quotes feed the same way", async () => {
    await expect(source(hangingFetch, 100, 20).fetchQuotes()).rejects.toBeInstanceOf(UpstreamUnavailable);
  });

  it("maps an unexpected JSON shape to UpstreamSchemaError", async () => {
    const { impl } = fakeFetch({
      clist: () => new Response(JSON.stringify({ data: { total: "many", diff: [] } })),
      valuation: () => new Response(VALUATIONS),
    });

    const err = await source(impl).fetchQuotes().then(
      () => null,
      (e: unknown) => e
    );
    expect(err).toBeInstanceOf(UpstreamSchemaError);
    expect(err instanceof UpstreamSchemaError && err.feed).toBe("quotes");
  });

  it("treats a missing clist data block as a schema error", async () => {
    const { impl } = fakeFetch({
      clist: () => new Response(JSON.stringify({ rc: 0, data: null })),
      valuation: () => new Response(VALUATIONS),
    });

    await expect(source(impl).fetchQuotes()).rejects.toThrow("quotes feed returned an unexpected shape: clist returned no data block");
  });

  it("rejects a body that is not JSON", async () => {
    const { impl } = fakeFetch({
      clist: () => new Response("<html>maintenance</html>"),
      valuation: () => new Response(VALUATIONS),
    });

    await expect(source(impl).fetchQuotes()).rejects.toBeInstanceOf(UpstreamSchemaError);
  });
});
