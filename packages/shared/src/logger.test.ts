import { afterEach, beforeEach, describe, expect, type MockInstance, test, vi } from "vitest";
import { logger } from "./logger.js";

describe("logger", () => {
  let originalLogLevel: string | undefined;
  let originalLogFormat: string | undefined;
  let consoleErrorSpy: MockInstance<typeof console.error>;

  beforeEach(() => {
    originalLogLevel = process.env.LOG_LEVEL;
    originalLogFormat = process.env.LOG_FORMAT;
    consoleErrorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    if (originalLogLevel === undefined) {
      delete process.env.LOG_LEVEL;
    } else {
      process.env.LOG_LEVEL = originalLogLevel;
    }
    if (originalLogFormat === undefined) {
      delete process.env.LOG_FORMAT;
    } else {
      process.env.LOG_FORMAT = originalLogFormat;
    }
    consoleErrorSpy.mockRestore();
  });

  function lastJsonEntry(): Record<string, unknown> {
    const call = consoleErrorSpy.mock.calls.at(-1);
    return JSON.parse(String(call?.[0]));
  }

  describe("log levels", () => {
    test("logs info by default", () => {
      delete process.env.LOG_LEVEL;
      logger.info("test message");
      expect(consoleErrorSpy).toHaveBeenCalledTimes(1);
    });

    test("does not log debug when level is info", () => {
      process.env.LOG_LEVEL = "info";
      logger.debug("debug message");
      expect(consoleErrorSpy).not.toHaveBeenCalled();
    });

    test("logs debug when level is debug", () => {
      process.env.LOG_LEVEL = "debug";
      logger.debug("debug message");
      expect(consoleErrorSpy).toHaveBeenCalledTimes(1);
    });

    test("does not log warn when level is error", () => {
      process.env.LOG_LEVEL = "error";
      logger.warn("warn message");
      logger.error("error message");
      expect(consoleErrorSpy).toHaveBeenCalledTimes(1);
    });

    test("falls back to info for unknown levels", () => {
      process.env.LOG_LEVEL = "verbose";
      logger.debug("hidden");
      logger.info("shown");
      expect(consoleErrorSpy).toHaveBeenCalledTimes(1);
    });
  });

  describe("formats", () => {
    test("writes JSON entries when LOG_FORMAT is json", () => {
      process.env.LOG_LEVEL = "info";
      process.env.LOG_FORMAT = "json";
      logger.info("Imported todos", { count: 3 });

      const entry = lastJsonEntry();
      expect(entry.level).toBe("info");
      expect(entry.message).toBe("Imported todos");
      expect(entry.context).toEqual({ count: 3 });
    });

    test("omits empty context", () => {
      process.env.LOG_LEVEL = "info";
      process.env.LOG_FORMAT = "json";
      logger.info("bare");

      expect(lastJsonEntry()).not.toHaveProperty("context");
    });

    test("writes level-tagged text by default", () => {
      process.env.LOG_LEVEL = "info";
      delete process.env.LOG_FORMAT;
      logger.warn("careful", { id: 1 });

      expect(consoleErrorSpy).toHaveBeenCalledWith(
        "\x1b[33m[WARN ]\x1b[0m careful \x1b[33mid=1\x1b[0m",
      );
    });

    test("flattens errors and bigints in context", () => {
      process.env.LOG_LEVEL = "info";
      process.env.LOG_FORMAT = "json";
      logger.error("failed", { error: new TypeError("boom"), id: 5n });

      expect(lastJsonEntry().context).toEqual({
        error: { name: "TypeError", message: "boom" },
        id: "5",
      });
    });
  });

  describe("child loggers", () => {
    test("merge preset context, inner fields winning", () => {
      process.env.LOG_LEVEL = "info";
      process.env.LOG_FORMAT = "json";
      const child = logger
        .child({ service: "TodoManager", scope: "outer" })
        .child({ scope: "inner" });

      child.info("Created todo", { id: 7 });

      expect(lastJsonEntry().context).toEqual({
        service: "TodoManager",
        scope: "inner",
        id: 7,
      });
    });
  });
});
