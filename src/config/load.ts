import * as fs from "fs";
import * as path from "path";
import { ZodError } from "zod";
import { createLogger } from "../utils/logger.js";
import { type Config, ConfigSchema, type Env, EnvSchema } from "./schema.js";

const logger = createLogger("Config");

/** Minimal `.env` reader; variables already set in the process win. */
export function readDotEnv(envPath: string, target: NodeJS.ProcessEnv = process.env): void {
  if (!fs.existsSync(envPath)) return;
  const contents = fs.readFileSync(envPath, "utf-8");
  for (const line of contents.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;
    const eqIdx = trimmed.indexOf("=");
    if (eqIdx === -1) continue;
    const key = trimmed.slice(0, eqIdx).trim();
    const value = trimmed.slice(eqIdx + 1).trim().replace(/^(["'])(.*)\1$/, "$2");
    if (key && target[key] === undefined) {
      target[key] = value;
    }
  }
}

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  if (source === process.env) readDotEnv(path.join(process.cwd(), ".env"));

  return EnvSchema.parse({
    PORT: source.PORT || undefined,
    DEBUG: source.DEBUG || undefined,
    LOG_LEVEL: source.LOG_LEVEL || undefined,
    CONFIG_FILE: source.CONFIG_FILE || undefined,
  });
}

export function parseConfig(raw: unknown, origin = "config"): Config {
  try {
    return ConfigSchema.parse(raw);
  } catch (e) {
    if (e instanceof ZodError) {
      const issues = e.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
      throw new Error(`Invalid ${origin}: ${issues}`);
    }
    throw e;
  }
}

/** A missing file means all defaults; a present but invalid one is fatal. */
export function loadConfig(configPath?: string): Config {
  const resolved = path.resolve(configPath ?? path.join(process.cwd(), "config.json"));
  if (!fs.existsSync(resolved)) {
    logger.warn({ path: resolved }, "Config file not found, using defaults");
    return parseConfig({});
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(resolved, "utf-8"));
  } catch (e) {
    throw new Error(`Config file is not valid JSON: ${resolved} (${String(e)})`);
  }

  const cfg = parseConfig(raw, resolved);
  logger.info({ path: resolved, filter: cfg.filter }, "Config loaded");
  return cfg;
}
