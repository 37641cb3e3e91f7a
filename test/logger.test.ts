import { afterEach, describe, it, expect, vi } from "vitest";
import { fileTransport } from "../src/utils/logger.js";

afterEach(() => {
  vi.unstubAllEnvs();
});

describe("logger", () => {
  it("starts at info whatever LOG_LEVEL holds", async () => {
    vi.stubEnv("LOG_LEVEL", "verbose");
    vi.resetModules();
    const fresh = await import("../src/utils/logger.js");

    expect(fresh.createLogger("Startup").level).toBe("info");
  });

  it("applies a level to loggers created before and after", async () => {
    vi.resetModules();
    const fresh = await import("../src/utils/logger.js");
    const early = fresh.createLogger("Early");

    fresh.setLogLevel("warn");

    expect(early.level).toBe("warn");
    expect(fresh.createLogger("Late").level).toBe("warn");
  });
});

describe("fileTransport", () => {
  it("rotates daily and keeps retentionDays files", () => {
    expect(fileTransport({ file: "logs/lof-arb", retentionDays: 7 })).toEqual({
      target: "pino-roll",
      options: {
        file: "logs/lof-arb",
        extension: ".log",
        frequency: "daily",
        mkdir: true,
        limit: { count: 7 },
      },
    });
  });
});
