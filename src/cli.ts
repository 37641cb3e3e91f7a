#!/usr/bin/env node

import { applyLogLevel, createApp, main } from "./index.js";
import { loadConfig, loadEnv } from "./config/load.js";
import { fundSummary } from "./arb/fundRecord.js";
import { formatLocalTimestamp } from "./utils/time.js";

const VERSION = "1.0.0";
const cmd = process.argv[2];

async function runSnapshot(): Promise<void> {
  const env = loadEnv();
  applyLogLevel({ ...env, LOG_LEVEL: env.LOG_LEVEL ?? "warn" });
  const cfg = loadConfig(env.CONFIG_FILE);
  const app = createApp(cfg);

  const rs = await app.refresh();

  console.log(`\nLOF snapshot @ ${formatLocalTimestamp(rs.computedAt)}`);
  console.log(
    `   joined ${rs.stats.joined} / quotes ${rs.stats.quotes} / status ${rs.stats.status}` +
      `, valued ${rs.stats.computed}, candidates ${rs.count}\n`
  );
  for (const r of rs.records) console.log(`   ${fundSummary(r)}`);
  if (rs.count === 0) console.log("   (no fund meets the filter right now)");
  console.log("");
}

async function run(): Promise<void> {
  switch (cmd) {
    case "serve":
    case undefined:
      await main();
      break;

    case "snapshot":
      await runSnapshot();
      break;

    case "version":
      console.log(`lof-arb v${VERSION}`);
      break;

    case "help":
    default:
      console.log(`
lof-arb — LOF premium/discount snapshot service

Usage:
  lof-arb serve        Start the HTTP service (default)
  lof-arb snapshot     Fetch once and print the current candidates
  lof-arb version      Print version
  lof-arb help         Show this help

Environment Variables:
  PORT          Listening port (default 5000)
  DEBUG         true/1/t enables debug logging (default off)
  LOG_LEVEL     Explicit pino level, overrides DEBUG
  CONFIG_FILE   Path to config.json (default ./config.json)

Endpoints:
  GET /lof      JSON snapshot, refreshed at most every 30s
  GET /         HTML table
  GET /health   Health and cache state
`);
      break;
  }
}

run().catch((err) => {
  console.error("Fatal error:", err);
  process.exit(1);
});
