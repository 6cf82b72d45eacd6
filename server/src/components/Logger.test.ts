import { afterEach, describe, expect, it } from "vitest";
import { PinoLogger, logger } from "./Logger.js";

describe("PinoLogger", () => {
  afterEach(() => {
    PinoLogger.setLogLevel("silent");
  });

  it("starts at the level given by LOG_LEVEL", () => {
    expect(PinoLogger.getCurrentLogLevel()).toBe("silent");
  });

  it("changes the level of the shared logger", () => {
    PinoLogger.setLogLevel("debug");

    expect(logger.level).toBe("debug");
    expect(PinoLogger.getCurrentLogLevel()).toBe("debug");
  });

  it("rejects unknown levels and keeps the current one", () => {
    expect(() => PinoLogger.setLogLevel("loud")).toThrow(
      "Invalid log level: loud. Valid levels: trace, debug, info, warn, error, fatal, silent",
    );
    expect(PinoLogger.getCurrentLogLevel()).toBe("silent");
  });
});
