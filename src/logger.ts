import * as fs from "fs";

const PREFIX = "[colref]";

export type LogLevel = "DEBUG" | "INFO" | "WARNING" | "ERROR";

export interface LogSink {
  write(level: LogLevel, message: string): void;
}

export interface Logger {
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string, err?: unknown): void;
  debug(msg: string): void;
}

export interface LoggerOptions {
  /** Extra destinations besides the console, e.g. the run's .log file. */
  sinks?: LogSink[];
  /** Emit debug lines. Defaults to the COLREF_DEBUG environment variable. */
  debug?: boolean;
  /** Suppress console output (sinks still receive every line). */
  quiet?: boolean;
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.stack || err.message : String(err);
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const sinks = options.sinks ?? [];
  const debugEnabled = options.debug ?? Boolean(process.env.COLREF_DEBUG);
  const quiet = options.quiet ?? false;

  const emit = (level: LogLevel, msg: string, toConsole: (line: string) => void) => {
    if (!quiet) { toConsole(`${PREFIX} ${msg}`); }
    for (const sink of sinks) { sink.write(level, msg); }
  };

  return {
    info: (msg) => emit("INFO", msg, console.log),
    warn: (msg) => emit("WARNING", msg, console.warn),
    error: (msg, err) => emit("ERROR", err === undefined ? msg : `${msg}: ${describeError(err)}`, console.error),
    debug: (msg) => { if (debugEnabled) { emit("DEBUG", msg, console.debug); } },
  };
}

/**
 * Appends "<timestamp> - <LEVEL> - <message>" lines to a file.
 */
export function fileSink(filePath: string, now: () => Date = () => new Date()): LogSink {
  return {
    write(level, message) {
      fs.appendFileSync(filePath, `${now().toISOString()} - ${level} - ${message}\n`, "utf8");
    },
  };
}

/** In-memory sink, handy for collecting a run's log lines. */
export function memorySink(lines: string[] = []): LogSink & { lines: string[] } {
  return {
    lines,
    write(level, message) { lines.push(`${level} - ${message}`); },
  };
}

export const logger = createLogger();
