export type Stage = "fetch" | "join" | "compute" | "filter" | "cache";
export type Feed = "quotes" | "valuation" | "status";

/** Base for every pipeline failure; `stage` says where it happened. */
export class LofError extends Error {
  constructor(
    message: string,
    readonly stage: Stage,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Network failure, timeout or non-2xx answer from an upstream feed. */
export class UpstreamUnavailable extends LofError {
  constructor(
    readonly feed: Feed,
    message: string,
    options?: { cause?: unknown; status?: number }
  ) {
    super(`${feed} feed unavailable: ${message}`, "fetch", options);
    this.status = options?.status;
  }

  readonly status: number | undefined;
}

/** The feed answered, but not in the row layout we expect. */
export class UpstreamSchemaError extends LofError {
  constructor(
    readonly feed: Feed,
    readonly detail: string
  ) {
    super(`${feed} feed returned an unexpected shape: ${detail}`, "fetch");
  }
}

/**
 * Quotes and status share no fund code. Distinct from a fetch failure:
 * both feeds answered, they just don't overlap.
 */
export class JoinEmptyResult extends LofError {
  constructor(
    readonly quoteCount: number,
    readonly statusCount: number
  ) {
    super(`join produced no funds (quotes=${quoteCount}, status=${statusCount})`, "join");
  }
}

/** Cold start failed and there is no previous snapshot to fall back to. */
export class CacheUnavailableError extends LofError {
  constructor(cause: unknown) {
    super("no fund data available yet", "cache", { cause });
  }
}

export function describeError(err: unknown): Record<string, unknown> {
  if (err instanceof UpstreamUnavailable) {
    return { stage: err.stage, feed: err.feed, status: err.status, err: err.message };
  }
  if (err instanceof UpstreamSchemaError) {
    return { stage: err.stage, feed: err.feed, err: err.message };
  }
  if (err instanceof LofError) return { stage: err.stage, err: err.message };
  return { stage: "unknown", err: String(err) };
}
