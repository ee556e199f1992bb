/**
 * Structured logging for build and batch diagnostics.
 *
 * Emits one JSON line per entry with `ts`, `level`, `msg` and any extra
 * fields. Writes to stdout unless a sink is supplied.
 */

import { settings, type LogLevel } from '@pointdex/config';

export type LogFields = Record<string, string | number | boolean | null>;

export interface Logger {
  readonly level: LogLevel;
  debug(msg: string, fields?: LogFields): void;
  info(msg: string, fields?: LogFields): void;
  warn(msg: string, fields?: LogFields): void;
  error(msg: string, fields?: LogFields): void;
}

/** Receives one serialized line, without the trailing newline. */
export type LogSink = (line: string) => void;

export interface LoggerOptions {
  readonly level?: LogLevel;
  readonly sink?: LogSink;
  /** Fields merged into every entry. */
  readonly base?: LogFields;
}

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const stdoutSink: LogSink = (line) => {
  process.stdout.write(line + '\n');
};

export function createLogger(options: LoggerOptions = {}): Logger {
  const level = options.level ?? settings.logLevel;
  const sink = options.sink ?? stdoutSink;
  const base = options.base ?? {};
  const threshold = SEVERITY[level];

  const emit = (entryLevel: Exclude<LogLevel, 'silent'>, msg: string, fields?: LogFields): void => {
    if (SEVERITY[entryLevel] < threshold) return;
    const entry = {
      ts: new Date().toISOString(),
      level: entryLevel,
      msg,
      ...base,
      ...fields,
    };
    sink(JSON.stringify(entry));
  };

  return {
    level,
    debug: (msg, fields) => emit('debug', msg, fields),
    info: (msg, fields) => emit('info', msg, fields),
    warn: (msg, fields) => emit('warn', msg, fields),
    error: (msg, fields) => emit('error', msg, fields),
  };
}

/** Process-wide logger at the configured level. */
export const logger: Logger = createLogger({ base: { component: 'kdtree' } });
