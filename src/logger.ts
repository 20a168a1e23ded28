// src/logger.ts
import { inspect } from "node:util";

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

type Meta = Record<string, unknown>;

export interface LogEntry {
  ts: number;
  level: LogLevel;
  scope?: string;
  message: string;
  meta?: Meta;
}

export interface Logger {
  child(scope: string): Logger;
  log(level: LogLevel, message: string, meta?: Meta): void;
  debug(message: string, meta?: Meta): void;
  info(message: string, meta?: Meta): void;
  warn(message: string, meta?: Meta): void;
  error(message: string, meta?: Meta): void;
  isLevelEnabled(level: LogLevel): boolean;
}

export type LogSink = (entry: LogEntry) => void;

export interface LoggerOptions {
  scope?: string;
  /** Receives every entry regardless of level. */
  sink?: LogSink;
  /** Human-readable copy of entries at or above `minLevel`. */
  echo?: {
    minLevel?: LogLevel;
    writer?: LogSink;
  };
  clock?: () => number;
}

// State shared by a logger and all of its children.
interface Outputs {
  sink?: LogSink;
  echoFrom?: LogLevel;
  echo: LogSink;
  clock: () => number;
}

export function levelAtOrAbove(threshold: LogLevel, level: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(threshold);
}

export function parseLogLevel(
  raw: string | undefined,
  fallback: LogLevel = "info",
): LogLevel {
  const wanted = raw?.trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === wanted) ?? fallback;
}

function echoDisabled(env: NodeJS.ProcessEnv = process.env): boolean {
  const flag = env.CELLSYNC_DISABLE_LOG_ECHO?.trim().toLowerCase();
  return !!flag && flag !== "0" && flag !== "false";
}

function formatMeta(meta: Meta): string {
  try {
    return JSON.stringify(meta);
  } catch {
    return inspect(meta, { depth: 4, breakLength: Infinity });
  }
}

export function formatEntry({ level, scope, message, meta }: LogEntry): string {
  const parts = [level.toUpperCase().padEnd(5)];
  if (scope) parts.push(`[${scope}]`);
  parts.push(message);
  if (meta) parts.push(formatMeta(meta));
  return parts.join(" ");
}

// stdout belongs to remote output, so the echo writes to stderr.
const stderrEcho: LogSink = (entry) => {
  if (echoDisabled()) return;
  process.stderr.write(`${formatEntry(entry)}\n`);
};

export class StructuredLogger implements Logger {
  private readonly outputs: Outputs;
  private readonly scope?: string;

  constructor(options: LoggerOptions = {}) {
    this.scope = options.scope;
    this.outputs = {
      sink: options.sink,
      echoFrom: options.echo?.minLevel,
      echo: options.echo?.writer ?? stderrEcho,
      clock: options.clock ?? Date.now,
    };
  }

  child(scope: string): Logger {
    const { sink, echoFrom, echo, clock } = this.outputs;
    return new StructuredLogger({
      scope: this.scope ? `${this.scope}.${scope}` : scope,
      sink,
      echo: echoFrom ? { minLevel: echoFrom, writer: echo } : undefined,
      clock,
    });
  }

  log(level: LogLevel, message: string, meta?: Meta): void {
    const { sink, echoFrom, echo, clock } = this.outputs;
    const entry: LogEntry = {
      ts: clock(),
      level,
      scope: this.scope,
      message,
      meta: meta && Object.keys(meta).length > 0 ? meta : undefined,
    };
    sink?.(entry);
    if (echoFrom && levelAtOrAbove(echoFrom, level)) echo(entry);
  }

  debug(message: string, meta?: Meta): void {
    this.log("debug", message, meta);
  }

  info(message: string, meta?: Meta): void {
    this.log("info", message, meta);
  }

  warn(message: string, meta?: Meta): void {
    this.log("warn", message, meta);
  }

  error(message: string, meta?: Meta): void {
    this.log("error", message, meta);
  }

  isLevelEnabled(level: LogLevel): boolean {
    const { sink, echoFrom } = this.outputs;
    return !!sink || (!!echoFrom && levelAtOrAbove(echoFrom, level));
  }
}

/** Discards everything; stands in where no logger was passed. */
export class NullLogger implements Logger {
  child(): Logger {
    return this;
  }
  log(): void {}
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
  isLevelEnabled(): boolean {
    return false;
  }
}

/** Echo-only logger used by the command line. */
export class ConsoleLogger extends StructuredLogger {
  constructor(minLevel: LogLevel = "info") {
    super({ echo: { minLevel } });
  }
}

export function childOrNull(logger: Logger | undefined, scope: string): Logger {
  return logger?.child(scope) ?? new NullLogger();
}

export function errorMeta(err: unknown): Meta {
  return err instanceof Error
    ? { error: err.message, name: err.name }
    : { error: String(err) };
}
