import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { createLogger, fileSink, memorySink } from "../logger";

describe("createLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prefixes console lines and feeds every sink", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const sink = memorySink();
    const logger = createLogger({ sinks: [sink], debug: false });
    logger.info("hello");
    expect(log).toHaveBeenCalledWith("[colref] hello");
    expect(sink.lines).toEqual(["INFO - hello"]);
  });

  it("keeps quiet loggers off the console", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const sink = memorySink();
    createLogger({ quiet: true, sinks: [sink] }).warn("careful");
    expect(warn).not.toHaveBeenCalled();
    expect(sink.lines).toEqual(["WARNING - careful"]);
  });

  it("emits debug lines only when enabled", () => {
    const sink = memorySink();
    createLogger({ quiet: true, sinks: [sink], debug: false }).debug("hidden");
    createLogger({ quiet: true, sinks: [sink], debug: true }).debug("shown");
    expect(sink.lines).toEqual(["DEBUG - shown"]);
  });

  it("appends the stack of an error", () => {
    const sink = memorySink();
    const err = new Error("boom");
    err.stack = "Error: boom\n    at test";
    const logger = createLogger({ quiet: true, sinks: [sink] });
    logger.error("failed", err);
    logger.error("also failed", "plain");
    expect(sink.lines).toEqual(["ERROR - failed: Error: boom\n    at test", "ERROR - also failed: plain"]);
  });
});

describe("fileSink", () => {
  it("appends timestamped lines", () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "colref-"));
    const file = path.join(dir, "run.log");
    const sink = fileSink(file, () => new Date("2024-01-01T00:00:00.000Z"));
    sink.write("INFO", "hello");
    sink.write("ERROR", "bad");
    expect(fs.readFileSync(file, "utf8")).toBe("2024-01-01T00:00:00.000Z - INFO - hello\n2024-01-01T00:00:00.000Z - ERROR - bad\n");
    fs.rmSync(dir, { recursive: true, force: true });
  });
});
