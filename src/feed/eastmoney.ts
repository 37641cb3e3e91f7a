import type { ZodType } from "zod";
import { createLogger } from "../utils/logger.js";
import { type Feed, UpstreamSchemaError, UpstreamUnavailable } from "./errors.js";
import {
  type ClistItem,
  type ClistResponse,
  ClistResponseSchema,
  StatusTableSchema,
  type StatusTuple,
  type ValuationItem,
  ValuationResponseSchema,
} from "./schemas.js";
import type { FundDataSource, RawNumeric, RawQuoteRow, RawStatusRow } from "./types.js";

const logger = createLogger("Eastmoney");

const USER_AGENT = "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36";

export const CLIST_URL = "https://88.push2.eastmoney.com/api/qt/clist/get";
export const VALUATION_URL = "https://api.fund.eastmoney.com/FundGuZhi/GetFundGZList";
export const STATUS_URL = "https://fund.eastmoney.com/Data/Fund_JJJZ_Data.aspx";

/** Shenzhen and Shanghai LOF boards. */
const LOF_BOARDS = "b:MK0404,b:MK0405,b:MK0406,b:MK0407";
const MAX_PAGES = 20;

export interface EastmoneyOptions {
  timeoutMs: number;
  pageSize: number;
  fetchImpl?: typeof fetch;
}

/**
 * Eastmoney-backed implementation of both feeds.
 *
 * Quotes come from the push2 list API for the LOF boards, joined locally with
 * the FundGuZhi estimate list. Status comes from the Fund_JJJZ_Data table,
 * which is served as a JS assignment rather than JSON.
 *
 * Every request is bounded by `timeoutMs`. No retries here: the caller
 * decides the retry policy.
 */
export class EastmoneyDataSource implements FundDataSource {
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly opts: EastmoneyOptions) {
    this.fetchImpl = opts.fetchImpl ?? fetch;
  }

  /* ---- Feed A ---- */

  async fetchQuotes(): Promise<RawQuoteRow[]> {
    const [items, estimates] = await Promise.all([this.fetchClist(), this.fetchValuations()]);

    const valuationByCode = new Map<string, RawNumeric>();
    for (const e of estimates) {
      if (!valuationByCode.has(e.bzdm)) valuationByCode.set(e.bzdm, e.gsz);
    }

    const rows = items.map(
      (item): RawQuoteRow => ({
        code: item.f12,
        name: item.f14,
        price: item.f2,
        priorClose: item.f18,
        tradedValue: item.f6,
        turnoverRate: item.f8,
        valuation: valuationByCode.get(item.f12) ?? null,
      })
    );

    logger.debug({ quotes: rows.length, estimates: estimates.length }, "Quotes fetched");
    return rows;
  }

  /* ---- Feed B ---- */

  async fetchStatus(): Promise<RawStatusRow[]> {
    const url = new URL(STATUS_URL);
    url.searchParams.set("t", "8");
    url.searchParams.set("page", "1,50000");
    url.searchParams.set("js", "reData");
    url.searchParams.set("sort", "fcode,asc");

    const text = await this.getText("status", url, { Referer: "https://fund.eastmoney.com/" });
    const rows = parseStatusTable(text).map(statusRowFromTuple);

    logger.debug({ rows: rows.length }, "Status fetched");
    return rows;
  }

  /* ---- helpers ---- */

  private async fetchClist(): Promise<ClistItem[]> {
    const first = await this.fetchClistPage(1);
    if (!first.data) {
      throw new UpstreamSchemaError("quotes", "clist returned no data block");
    }

    const items = [...first.data.diff];
    const totalPages = Math.min(Math.ceil(first.data.total / this.opts.pageSize), MAX_PAGES);

    const rest: Promise<ClistResponse>[] = [];
    for (let page = 2; page <= totalPages; page++) rest.push(this.fetchClistPage(page));

    for (const page of await Promise.all(rest)) {
      if (page.data) items.push(...page.data.diff);
    }
    return items;
  }

  private fetchClistPage(page: number): Promise<ClistResponse> {
    const url = new URL(CLIST_URL);
    const params: Record<string, string> = {
      pn: String(page),
      pz: String(this.opts.pageSize),
      po: "1",
      np: "1",
      ut: "bd1d9ddb04089700cf9c27f6f7426281",
      fltt: "2",
      invt: "2",
      fid: "f3",
      fs: LOF_BOARDS,
      fields: "f12,f14,f2,f3,f6,f8,f18",
    };
    for (const [k, v] of Object.entries(params)) url.searchParams.set(k, v);

    return this.getJson("quotes", url, ClistResponseSchema, { Referer: "https://quote.eastmoney.com/" });
  }

  private async fetchValuations(): Promise<ValuationItem[]> {
    const url = new URL(VALUATION_URL);
    url.searchParams.set("type", "1");
    url.searchParams.set("sort", "3");
    url.searchParams.set("orderType", "desc");
    url.searchParams.set("canbuy", "0");
    url.searchParams.set("pageIndex", "1");
    url.searchParams.set("pageSize", "20000");

    const body = await this.getJson("valuation", url, ValuationResponseSchema, {
      Referer: "https://fund.eastmoney.com/",
    });
    return body.Data.list;
  }

  private async getJson<T>(
    feed: Feed,
    url: URL,
    schema: ZodType<T>,
    headers: Record<string, string>
  ): Promise<T> {
    const text = await this.getText(feed, url, headers);

    let body: unknown;
    try {
      body = JSON.parse(stripJsonp(text));
    } catch {
      throw new UpstreamSchemaError(feed, `body is not JSON (${text.slice(0, 60)})`);
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue ? `${issue.path.join(".") || "(root)"}: ${issue.message}` : "unknown";
      throw new UpstreamSchemaError(feed, where);
    }
    return parsed.data;
  }

  private async getText(feed: Feed, url: URL, headers: Record<string, string>): Promise<string> {
    let res: Response;
    try {
      res = await this.fetchImpl(url.toString(), {
        headers: { "User-Agent": USER_AGENT, ...headers },
        signal: AbortSignal.timeout(this.opts.timeoutMs),
      });
    } catch (err) {
      throw new UpstreamUnavailable(feed, String(err), { cause: err });
    }

    if (!res.ok) {
      throw new UpstreamUnavailable(feed, `HTTP ${res.status}`, { status: res.status });
    }

    try {
      return await res.text();
    } catch (err) {
      throw new UpstreamUnavailable(feed, `body read failed: ${String(err)}`, { cause: err });
    }
  }
}

/* ---------- payload parsing (exported for tests) ---------- */

/** `cb({...})` → `{...}`; plain JSON passes through. */
export function stripJsonp(text: string): string {
  const trimmed = text.trim();
  if (trimmed.startsWith("{") || trimmed.startsWith("[")) return trimmed;
  const match = /^[\w$.]*\(([\s\S]*)\)\s*;?$/.exec(trimmed);
  return match ? match[1] : trimmed;
}

/** Pulls the `datas:[[...]]` array out of `var reData={datas:[[...]],count:...}`. */
export function parseStatusTable(text: string): StatusTuple[] {
  const match = /datas\s*:\s*(\[\s*\]|\[[\s\S]*?\]\s*\])/.exec(text);
  if (!match) {
    throw new UpstreamSchemaError("status", "datas array not found");
  }

  let raw: unknown;
  try {
    raw = JSON.parse(match[1]);
  } catch {
    throw new UpstreamSchemaError("status", "datas array is not valid JSON");
  }

  const parsed = StatusTableSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new UpstreamSchemaError("status", issue ? `row ${issue.path.join(".")}: ${issue.message}` : "bad rows");
  }
  return parsed.data;
}

function cellText(v: string | number | null | undefined): string {
  return v === null || v === undefined ? "" : String(v).trim();
}

function numeric(v: string | number | null | undefined): RawNumeric {
  return v === undefined ? null : v;
}

export function statusRowFromTuple(t: StatusTuple): RawStatusRow {
  return {
    code: cellText(t[0]),
    name: cellText(t[1]),
    fundType: cellText(t[2]),
    nav: numeric(t[3]),
    navDate: cellText(t[4]),
    subscriptionStatus: cellText(t[5]),
    redemptionStatus: cellText(t[6]),
    nextOpenDate: cellText(t[7]),
    minPurchase: numeric(t[8]),
    limit: numeric(t[9]),
    feeRate: numeric(t[12]),
  };
}
