import pino from "pino";
import type { LevelWithSilent, Logger, TransportSingleOptions } from "pino";

/*
 * The root starts at "info" and every destination at "trace", so the logger
 * level alone decides what is written. The real level is applied by
 * setLogLevel once the environment has been validated.
 */
const streams = pino.multistream([{ level: "trace", stream: process.stdout }]);
const root = pino({ level: "info" }, streams);
const children = new Set<Logger>();

/** Named module logger, e.g. `createLogger("RefreshCache")`. */
export function createLogger(name: string): Logger {
  const child = root.child({ name });
  children.add(child);
  return child;
}

/**
 * Loggers are created at import time, before env is loaded, so the level
 * has to be pushed down to every existing child.
 */
export function setLogLevel(level: LevelWithSilent): void {
  root.level = level;
  for (const child of children) child.level = level;
}

export interface FileLogOptions {
  /** Path without extension; pino-roll appends the file number and `.log`. */
  file: string;
  retentionDays: number;
}

/** Daily-rotated file, keeping the last `retentionDays` files. */
export function fileTransport(opts: FileLogOptions): TransportSingleOptions {
  return {
    target: "pino-roll",
    options: {
      file: opts.file,
      extension: ".log",
      frequency: "daily",
      mkdir: true,
      limit: { count: opts.retentionDays },
    },
  };
}

/** Adds a rotating log file next to stdout. */
export function enableFileLog(opts: FileLogOptions): void {
  streams.add({ level: "trace", stream: pino.transport(fileTransport(opts)) });
  root.info({ file: opts.file, retentionDays: opts.retentionDays }, "File logging enabled");
}
