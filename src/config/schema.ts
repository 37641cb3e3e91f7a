import { z } from "zod";

/* ---------- Candidate filter ---------- */

export const StatusRuleSchema = z.enum(["both", "directional"]);
export type StatusRule = z.infer<typeof StatusRuleSchema>;

export const FilterConfigSchema = z.object({
  minAbsPremiumRate: z.number().min(0).default(0.8),   // %
  minDiscountRate: z.number().min(0).default(0.6),     // %, discount side under "directional"
  minTradedValue: z.number().min(0).default(5_000_000), // CNY
  statusRule: StatusRuleSchema.default("both"),
  closedStatusMarkers: z.array(z.string().min(1)).default(["暂停", "封闭"]),
});

export type FilterConfig = z.infer<typeof FilterConfigSchema>;

/* ---------- Upstream feeds ---------- */

export const UpstreamConfigSchema = z.object({
  timeoutMs: z.number().int().min(500).max(60_000).default(8_000),
  maxAttempts: z.number().int().min(1).max(5).default(2),
  pageSize: z.number().int().min(20).max(500).default(100),
  valuationFallbackToNav: z.boolean().default(false),
});

export type UpstreamConfig = z.infer<typeof UpstreamConfigSchema>;

/* ---------- Per-client throttle on /lof ---------- */

export const RateLimitConfigSchema = z.object({
  enabled: z.boolean().default(false),
  windowMs: z.number().int().min(1_000).default(30_000),
});

export type RateLimitConfig = z.infer<typeof RateLimitConfigSchema>;

/* ---------- Log file ---------- */

export const LoggingConfigSchema = z.object({
  file: z.string().min(1).optional(),                  // stdout only when unset
  retentionDays: z.number().int().min(1).max(366).default(7),
});

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

/* ---------- Main config schema ---------- */

export const ConfigSchema = z.object({
  filter: FilterConfigSchema.default({}),
  upstream: UpstreamConfigSchema.default({}),
  rateLimit: RateLimitConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
});

export type Config = z.infer<typeof ConfigSchema>;

/* ---------- Environment schema ---------- */

const truthy = (v: string): boolean => ["true", "1", "t"].includes(v.trim().toLowerCase());

export const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65_535).default(5000),
  DEBUG: z.string().transform(truthy).default("false"),
  LOG_LEVEL: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).optional(),
  CONFIG_FILE: z.string().min(1).default("./config.json"),
});

export type Env = z.infer<typeof EnvSchema>;
