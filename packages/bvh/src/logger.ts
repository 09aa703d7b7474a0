/**
 * Structured logging for tree internals.
 *
 * Emits one JSON line per event with ts, level, scope, msg and any extra
 * fields. Writes to stdout unless a `write` sink is supplied.
 */

import type { LogLevel } from '@dynbvh/config';

export type LogFields = Record<string, unknown>;

export interface Logger {
  readonly level: LogLevel;
  debug(msg: string, fields?: LogFields): void;
  info(msg: string, fields?: LogFields): void;
  warn(msg: string, fields?: LogFields): void;
  error(msg: string, fields?: LogFields): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  write?: (line: string) => void;
}

const RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function stdoutWrite(line: string): void {
  process.stdout.write(line);
}

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const level = options.level ?? 'warn';
  const write = options.write ?? stdoutWrite;
  const threshold = RANK[level];

  const emit = (at: Exclude<LogLevel, 'silent'>, msg: string, fields?: LogFields): void => {
    if (RANK[at] < threshold) return;
    const entry = {
      ts: new Date().toISOString(),
      level: at,
      scope,
      msg,
      ...fields,
    };
    write(JSON.stringify(entry) + '\n');
  };

  return {
    level,
    debug: (msg, fields) => emit('debug', msg, fields),
    info: (msg, fields) => emit('info', msg, fields),
    warn: (msg, fields) => emit('warn', msg, fields),
    error: (msg, fields) => emit('error', msg, fields),
  };
}
