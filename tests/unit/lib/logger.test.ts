/**
 * Unit tests for the runner's leveled logger
 */

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  formatLogEntry,
  Logger,
  LogLevel,
  parseLogLevel,
  type LogEntry,
} from "../../../src/lib/logger.js";

describe("Logger System", () => {
  let originalNodeEnvironment: string | undefined;
  let errorSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    originalNodeEnvironment = process.env.NODE_ENV;
    errorSpy = vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    if (originalNodeEnvironment === undefined) {
      delete process.env.NODE_ENV;
    } else {
      process.env.NODE_ENV = originalNodeEnvironment;
    }

    vi.restoreAllMocks();
  });

  describe("parseLogLevel", () => {
    it("should parse names case-insensitively", () => {
      expect(parseLogLevel("debug")).toBe(LogLevel.DEBUG);
      expect(parseLogLevel(" Warn ")).toBe(LogLevel.WARN);
      expect(parseLogLevel("ERROR")).toBe(LogLevel.ERROR);
      expect(parseLogLevel("silent")).toBe(LogLevel.SILENT);
    });

    it("should return undefined for unknown or missing names", () => {
      expect(parseLogLevel("info")).toBeUndefined();
      expect(parseLogLevel(undefined)).toBeUndefined();
    });
  });

  describe("Level Filtering", () => {
    it("should default to WARN", () => {
      const entries: LogEntry[] = [];
      const logger = new Logger({ sink: (entry) => entries.push(entry) });

      logger.debug("debug");
      logger.warn("warn");
      logger.error("error");

      expect(entries.map((entry) => entry.levelName)).toEqual(["WARN", "ERROR"]);
    });

    it("should write everything at DEBUG", () => {
      const entries: LogEntry[] = [];
      const logger = new Logger({ level: LogLevel.DEBUG, sink: (entry) => entries.push(entry) });

      logger.debug("debug");
      logger.warn("warn");

      expect(entries.map((entry) => entry.level)).toEqual([LogLevel.DEBUG, LogLevel.WARN]);
    });

    it("should write nothing when silent", () => {
      const sink = vi.fn();
      const logger = new Logger({ level: LogLevel.SILENT, sink });

      logger.error("error");

      expect(sink).not.toHaveBeenCalled();
      expect(logger.isEnabled(LogLevel.ERROR)).toBe(false);
    });
  });

  describe("Entries", () => {
    it("should carry message, context and component", () => {
      const entries: LogEntry[] = [];
      const logger = new Logger({
        level: LogLevel.DEBUG,
        component: "infra-run",
        sink: (entry) => entries.push(entry),
      });

      logger.error("Step failed", { stepIndex: 1 });

      expect(entries).toHaveLength(1);
      expect(entries[0]).toMatchObject({
        level: LogLevel.ERROR,
        levelName: "ERROR",
        message: "Step failed",
        context: { stepIndex: 1 },
        component: "infra-run",
      });
    });

    it("should omit an empty context", () => {
      const entries: LogEntry[] = [];
      const logger = new Logger({ sink: (entry) => entries.push(entry) });

      logger.warn("careful");

      expect(entries[0]).not.toHaveProperty("context");
      expect(entries[0]).not.toHaveProperty("component");
    });

    it("should merge child context under the entry's own context", () => {
      const entries: LogEntry[] = [];
      const logger = new Logger({
        level: LogLevel.DEBUG,
        component: "infra-run",
        sink: (entry) => entries.push(entry),
      });

      const child = logger.child({ target: "terraform-plan", stepIndex: 0 }, "dispatcher");
      child.debug("Running", { stepIndex: 1 });

      expect(entries[0]?.component).toBe("dispatcher");
      expect(entries[0]?.context).toEqual({ target: "terraform-plan", stepIndex: 1 });
    });

    it("should stack contexts and keep the component through nested children", () => {
      const entries: LogEntry[] = [];
      const logger = new Logger({
        level: LogLevel.DEBUG,
        component: "infra-run",
        sink: (entry) => entries.push(entry),
      });

      logger.child({ target: "clean" }).child({ attempt: 2 }).debug("Running");

      expect(entries[0]?.component).toBe("infra-run");
      expect(entries[0]?.context).toEqual({ target: "clean", attempt: 2 });
    });

    it("should keep the parent's level in children", () => {
      const sink = vi.fn();
      const logger = new Logger({ level: LogLevel.ERROR, sink });

      logger.child({ target: "clean" }).warn("ignored");

      expect(sink).not.toHaveBeenCalled();
    });
  });

  describe("formatLogEntry", () => {
    const entry: LogEntry = {
      timestamp: "2026-03-01T09:15:42.123Z",
      level: LogLevel.WARN,
      levelName: "WARN",
      message: "careful",
      component: "infra-run",
      context: { targets: 2 },
    };

    it("should render a pretty line", () => {
      expect(formatLogEntry(entry, "pretty")).toBe('09:15:42 WARN  [infra-run] careful {"targets":2}');
    });

    it("should render a pretty line without component or context", () => {
      expect(
        formatLogEntry(
          { timestamp: entry.timestamp, level: LogLevel.DEBUG, levelName: "DEBUG", message: "go" },
          "pretty",
        ),
      ).toBe("09:15:42 DEBUG go");
    });

    it("should render a JSON line", () => {
      expect(JSON.parse(formatLogEntry(entry, "json"))).toEqual(entry);
    });
  });

  describe("Default Sink", () => {
    it("should pretty-print to stderr outside production", () => {
      delete process.env.NODE_ENV;
      const logger = new Logger({ component: "infra-run" });

      logger.warn("careful");

      expect(errorSpy).toHaveBeenCalledTimes(1);
      expect(errorSpy).toHaveBeenCalledWith(expect.stringMatching(/^\d{2}:\d{2}:\d{2} WARN  \[infra-run\] careful$/));
    });

    it("should write JSON lines in production", () => {
      process.env.NODE_ENV = "production";
      const logger = new Logger({ component: "infra-run" });

      logger.child({ target: "clean" }).error("failed");

      const [line] = errorSpy.mock.calls[0] ?? [];
      expect(JSON.parse(String(line))).toMatchObject({
        level: LogLevel.ERROR,
        levelName: "ERROR",
        message: "failed",
        component: "infra-run",
        context: { target: "clean" },
      });
    });
  });
});
