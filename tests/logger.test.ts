/**
 * Test suite for Logger
 */

import { describe, it, expect, beforeEach, afterEach, jest } from "@jest/globals";
import { isLogLevel, Logger } from "../lib/logger";

describe("Logger", () => {
  let logger: Logger;

  beforeEach(() => {
    logger = new Logger("debug", false); // Disable console output for tests
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe("logging levels", () => {
    it("should log at debug level", () => {
      logger.debug("Debug message", { value: 42 });
      const entries = logger.getEntries();
      expect(entries).toHaveLength(1);
      expect(entries[0].level).toBe("debug");
      expect(entries[0].message).toBe("Debug message");
    });

    it("should log at every other level", () => {
      logger.info("Info message");
      logger.warn("Warning message");
      logger.error("Error message");
      expect(logger.getEntries().map((entry) => entry.level)).toEqual(["info", "warn", "error"]);
    });
  });

  describe("log levels filtering", () => {
    it("should only log at or above configured level", () => {
      const infoLogger = new Logger("info", false);
      infoLogger.debug("Debug message");
      infoLogger.info("Info message");
      infoLogger.warn("Warn message");

      const entries = infoLogger.getEntries();
      expect(entries).toHaveLength(2);
      expect(entries[0].level).toBe("info");
      expect(entries[1].level).toBe("warn");
      expect(infoLogger.isEnabled("debug")).toBe(false);
    });

    it("should change logging level dynamically", () => {
      logger.setLevel("warn");
      logger.debug("Debug");
      logger.info("Info");
      logger.warn("Warn");

      expect(logger.getLevel()).toBe("warn");
      expect(logger.getEntries()).toHaveLength(1);
    });
  });

  describe("context management", () => {
    it("should merge pushed context into entries", () => {
      logger.pushContext({ hint: "Array[Number]", phase: "compile" });
      logger.pushContext({ strategy: "sample" });
      logger.info("Message");

      expect(logger.getEntries()[0].context).toEqual({ hint: "Array[Number]", phase: "compile", strategy: "sample" });
    });

    it("should drop popped context keys", () => {
      logger.pushContext({ hint: "Number", phase: "compile", component: "CompilationCache" });
      logger.popContext(["phase", "component"]);
      logger.info("Message");

      expect(logger.getEntries()[0].context).toEqual({ hint: "Number" });
    });

    it("should clear all context", () => {
      logger.pushContext({ hint: "Number" });
      logger.clearContext();
      logger.info("Message");

      expect(logger.getEntries()[0].context).toBeUndefined();
    });
  });

  describe("data attachments", () => {
    it("should attach data to log entries", () => {
      logger.info("Message", { nodes: 3, key: "sample#0" });
      expect(logger.getEntries()[0].data).toEqual({ nodes: 3, key: "sample#0" });
    });

    it("should omit empty data", () => {
      logger.info("Message", {});
      expect(logger.getEntries()[0].data).toBeUndefined();
    });
  });

  describe("timers", () => {
    it("should log the measured duration", () => {
      const now = jest.spyOn(Date, "now");
      now.mockReturnValueOnce(1000).mockReturnValueOnce(1250);

      logger.startTimer("compile:0");
      const duration = logger.endTimer("compile:0", "Compiled specification", { nodes: 2 });

      expect(duration).toBe(250);
      expect(logger.getEntries()[0]).toMatchObject({
        level: "debug",
        message: "Compiled specification",
        data: { nodes: 2, duration: 250 },
      });
    });

    it("should warn about unknown timers", () => {
      expect(logger.endTimer("missing", "Done")).toBe(0);
      expect(logger.getEntries()[0]).toMatchObject({ level: "warn", message: 'Timer "missing" not found' });
    });
  });

  describe("console output", () => {
    it("should format context and data on one entry", () => {
      const printed = jest.spyOn(console, "log").mockImplementation(() => undefined);
      const loud = new Logger("info", true);
      loud.pushContext({ phase: "compile", component: "CompilationCache", strategy: "sample", hint: "Number" });
      loud.info("Compiled specification", { nodes: 1, duration: 3 });

      expect(printed).toHaveBeenCalledWith("[compile] <CompilationCache> (sample) Number: Compiled specification\n  nodes: 1, duration: 3ms");
    });
  });

  describe("entry filtering", () => {
    it("should filter entries by hint", () => {
      logger.pushContext({ hint: "Number" });
      logger.info("Message 1");
      logger.pushContext({ hint: "String" });
      logger.info("Message 2");

      const entries = logger.getEntriesForHint("Number");
      expect(entries).toHaveLength(1);
      expect(entries[0].message).toBe("Message 1");
    });

    it("should filter entries by level", () => {
      logger.debug("Debug");
      logger.info("Info");
      logger.warn("Warn");
      logger.error("Error");

      const warnAndAbove = logger.getEntriesAtLevel("warn");
      expect(warnAndAbove.map((entry) => entry.level)).toEqual(["warn", "error"]);
    });
  });
});

describe("isLogLevel", () => {
  it("should accept only known levels", () => {
    expect(isLogLevel("warn")).toBe(true);
    expect(isLogLevel("verbose")).toBe(false);
    expect(isLogLevel(3)).toBe(false);
  });
});
