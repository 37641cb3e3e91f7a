import type { ResultSet } from "../cache/pipeline.js";
import { MIN_REFRESH_INTERVAL_MS } from "../cache/refreshCache.js";
import { formatLocalTimestamp } from "../utils/time.js";
import { type FundJson, presentFund } from "./present.js";

const ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(value: unknown): string {
  if (value === null || value === undefined) return "";
  return String(value).replace(/[&<>"']/g, (c) => ESCAPES[c] ?? c);
}

interface Column {
  key: keyof FundJson;
  label: string;
}

const COLUMNS: Column[] = [
  { key: "code", label: "基金代码" },
  { key: "name", label: "基金名称" },
  { key: "premium_rate", label: "溢价率(%)" },
  { key: "traded_value", label: "成交额" },
  { key: "limit", label: "限额" },
  { key: "turnover_rate", label: "换手率(%)" },
  { key: "fee_rate", label: "手续费(%)" },
  { key: "net_spread_rate", label: "扣费价差(%)" },
  { key: "subscription_status", label: "申购状态" },
  { key: "redemption_status", label: "赎回状态" },
  { key: "min_purchase", label: "购买起点" },
  { key: "next_open_date", label: "下一开放日" },
  { key: "price", label: "最新价" },
  { key: "valuation", label: "估值" },
  { key: "nav", label: "最新净值" },
  { key: "valuation_deviation", label: "估值偏离(%)" },
  { key: "change_percent", label: "涨跌幅(%)" },
  { key: "fund_type", label: "基金类型" },
  { key: "nav_date", label: "净值日期" },
];

const STYLE = `
  body { font-family: Arial, sans-serif; margin: 0; padding: 20px; line-height: 1.6; }
  h1, h2 { color: #333; }
  table { border-collapse: collapse; width: 100%; margin-top: 20px; }
  th, td { border: 1px solid #ddd; padding: 8px; text-align: left; }
  th { background-color: #f2f2f2; }
  tr:nth-child(even) { background-color: #f9f9f9; }
  td.pos { color: #c0392b; }
  td.neg { color: #27ae60; }
  code { background: #f5f5f5; padding: 2px 5px; border-radius: 3px; }
  .api-section { margin-bottom: 30px; padding: 15px; background: #f8f8f8; border-radius: 5px; }
`;

function page(title: string, body: string): string {
  return /*html*/ `<!doctype html>
<html lang="zh-cn">
<head>
<meta charset="utf-8">
<meta name="viewport" content="width=device-width, initial-scale=1">
<title>${escapeHtml(title)}</title>
<style>${STYLE}</style>
</head>
<body>
${body}
</body>
</html>
`;
}

function cell(row: FundJson, col: Column): string {
  const value = row[col.key];
  if (col.key === "premium_rate" && typeof value === "number") {
    const cls = value > 0 ? "pos" : value < 0 ? "neg" : "";
    return cls ? `<td class="${cls}">${escapeHtml(value)}</td>` : `<td>${escapeHtml(value)}</td>`;
  }
  return `<td>${escapeHtml(value)}</td>`;
}

export function renderTable(rows: FundJson[]): string {
  const head = COLUMNS.map((c) => `<th>${escapeHtml(c.label)}</th>`).join("");
  const body = rows.length
    ? rows.map((r) => `<tr>${COLUMNS.map((c) => cell(r, c)).join("")}</tr>`).join("\n")
    : `<tr><td colspan="${COLUMNS.length}">当前没有符合条件的基金</td></tr>`;
  return `<table>\n<thead><tr>${head}</tr></thead>\n<tbody>\n${body}\n</tbody>\n</table>`;
}

export function renderHomePage(rs: ResultSet): string {
  const intervalSec = MIN_REFRESH_INTERVAL_MS / 1000;
  const body = `
<h1>LOF套利分析工具</h1>
<div class="api-section">
  <h2>API</h2>
  <p>访问 <code>/lof</code> 获取 JSON 格式的数据</p>
  <p>数据最多每 ${intervalSec} 秒刷新一次</p>
  <p>示例: <a href="/lof">/lof</a></p>
</div>
<h2>数据预览</h2>
<p>上次更新时间: ${escapeHtml(formatLocalTimestamp(rs.computedAt))}，共 ${rs.count} 只基金</p>
${renderTable(rs.records.map(presentFund))}`;
  return page("LOF套利分析工具", body);
}

export function renderErrorPage(): string {
  return page(
    "LOF套利分析工具",
    `<h1>LOF套利分析工具</h1>\n<p>服务暂时不可用，请稍后再试</p>`
  );
}
