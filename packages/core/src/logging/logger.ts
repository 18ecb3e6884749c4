import type { LogFormat, LogLevel } from "../config/types.js";

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export type LogEntry = {
  level: LogLevel;
  subsystem: string;
  message: string;
  data?: Record<string, unknown>;
  ts: string;
};

export type LogOutput = (entry: LogEntry) => void;

export class Logger {
  private subsystem: string;
  private level: LogLevel;
  private output: LogOutput;
  private bindings: Record<string, unknown>;

  constructor(
    subsystem: string,
    level: LogLevel = "info",
    output?: LogOutput,
    bindings: Record<string, unknown> = {},
  ) {
    this.subsystem = subsystem;
    this.level = level;
    this.output = output ?? prettyOutput;
    this.bindings = bindings;
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log("debug", message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log("info", message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log("warn", message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log("error", message, data);
  }

  child(subsystem: string, bindings?: Record<string, unknown>): Logger {
    return new Logger(`${this.subsystem}:${subsystem}`, this.level, this.output, {
      ...this.bindings,
      ...bindings,
    });
  }

  /** Same subsystem, extra fields merged into every entry's data. */
  with(bindings: Record<string, unknown>): Logger {
    return new Logger(this.subsystem, this.level, this.output, { ...this.bindings, ...bindings });
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[this.level];
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (!this.isEnabled(level) || level === "silent") return;
    const hasBindings = Object.keys(this.bindings).length > 0;
    this.output({
      level,
      subsystem: this.subsystem,
      message,
      data: hasBindings ? { ...this.bindings, ...data } : data,
      ts: new Date().toISOString(),
    });
  }
}

export function prettyOutput(entry: LogEntry): void {
  const prefix = `[${entry.ts}] [${entry.level.toUpperCase()}] [${entry.subsystem}]`;
  const msg = entry.data ? `${entry.message} ${safeStringify(entry.data)}` : entry.message;
  if (entry.level === "error") {
    console.error(`${prefix} ${msg}`);
  } else if (entry.level === "warn") {
    console.warn(`${prefix} ${msg}`);
  } else {
    console.log(`${prefix} ${msg}`);
  }
}

export function jsonOutput(entry: LogEntry): void {
  const line = safeStringify(entry);
  if (entry.level === "error" || entry.level === "warn") {
    console.error(line);
  } else {
    console.log(line);
  }
}

export function outputForFormat(format: LogFormat): LogOutput {
  return format === "json" ? jsonOutput : prettyOutput;
}

function safeStringify(value: unknown): string {
  try {
    return JSON.stringify(value);
  } catch {
    return String(value);
  }
}

export function createLogger(subsystem: string, level?: LogLevel, output?: LogOutput): Logger {
  return new Logger(subsystem, level, output);
}

/** Logger that drops everything; the default when a caller supplies none. */
export function silentLogger(): Logger {
  return new Logger("toolgate", "silent", () => undefined);
}
