// --- Logging ---
//
// Line-oriented logger on stderr. stdout belongs to CLI output and the MCP
// stdio transport, so nothing here ever writes to it.

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const MARKERS: Record<LogLevel, string> = {
  debug: "\x1b[90m.\x1b[0m",
  info: "\x1b[90m>\x1b[0m",
  warn: "\x1b[33m!\x1b[0m",
  error: "\x1b[31mx\x1b[0m",
};

export interface Logger {
  debug(msg: string, extra?: Record<string, unknown>): void;
  info(msg: string, extra?: Record<string, unknown>): void;
  warn(msg: string, extra?: Record<string, unknown>): void;
  error(msg: string, extra?: Record<string, unknown>): void;
  child(scope: string): Logger;
}

type Sink = (line: string) => void;

let minLevel: number = LEVEL_ORDER.info;
let sink: Sink = (line) => {
  process.stderr.write(line + "\n");
};

export function setLogLevel(level: LogLevel): void {
  minLevel = LEVEL_ORDER[level];
}

/** Redirect output (tests capture lines this way). Returns the previous sink. */
export function setLogSink(next: Sink): Sink {
  const prev = sink;
  sink = next;
  return prev;
}

class ScopedLogger implements Logger {
  constructor(private readonly scope: string) {}

  debug(msg: string, extra?: Record<string, unknown>): void {
    this.write("debug", msg, extra);
  }

  info(msg: string, extra?: Record<string, unknown>): void {
    this.write("info", msg, extra);
  }

  warn(msg: string, extra?: Record<string, unknown>): void {
    this.write("warn", msg, extra);
  }

  error(msg: string, extra?: Record<string, unknown>): void {
    this.write("error", msg, extra);
  }

  child(scope: string): Logger {
    return new ScopedLogger(`${this.scope}.${scope}`);
  }

  private write(level: LogLevel, msg: string, extra?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < minLevel) return;
    const ts = new Date().toISOString().slice(11, 19);
    const tail = extra && Object.keys(extra).length > 0 ? ` ${JSON.stringify(extra)}` : "";
    sink(`${ts} ${MARKERS[level]} ${this.scope}: ${msg}${tail}`);
  }
}

export function createLogger(scope: string): Logger {
  return new ScopedLogger(scope);
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  child: () => silentLogger,
};
