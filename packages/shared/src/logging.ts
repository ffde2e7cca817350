import {
  LogContext,
  type Context,
  type LogLevel,
  type LogSink,
} from '@rocicorp/logger';
import type {Argv} from 'yargs';
import * as v from './valita.ts';

const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
const LOG_FORMATS = ['text', 'json'] as const;

export const logConfigShape = {
  logLevel: v
    .union(
      v.literal('debug'),
      v.literal('info'),
      v.literal('warn'),
      v.literal('error'),
    )
    .default('info'),
  logFormat: v.union(v.literal('text'), v.literal('json')).default('text'),
};

export function logOptions<T>(argv: Argv<T>) {
  return argv
    .option('log-level', {
      describe: 'Minimum level of log lines to emit.',
      choices: LOG_LEVELS,
      default: 'info',
    })
    .option('log-format', {
      describe:
        'Use "text" for developer-friendly console logging and "json" for ' +
        'consumption by structured-logging services.',
      choices: LOG_FORMATS,
      default: 'text',
    });
}

export type LogConfig = {
  logLevel: LogLevel;
  logFormat: 'text' | 'json';
};

/**
 * Log lines are written to stderr so that stdout stays free for the
 * results of command line tools.
 */
export const consoleTextLogSink: LogSink = {
  log(level: LogLevel, context: Context | undefined, ...args: unknown[]) {
    console.error(
      level.toUpperCase(),
      ...Object.entries(context ?? {}).map(([k, v]) =>
        v === undefined ? k : `${k}=${stringify(v)}`,
      ),
      ...args.map(stringify),
    );
  },
};

export const consoleJsonLogSink: LogSink = {
  log(level: LogLevel, context: Context | undefined, ...args: unknown[]) {
    console.error(
      JSON.stringify({
        level: level.toUpperCase(),
        ...context,
        message: args.map(stringify).join(' '),
      }),
    );
  },
};

export function getLogSink({logFormat}: Pick<LogConfig, 'logFormat'>): LogSink {
  return logFormat === 'json' ? consoleJsonLogSink : consoleTextLogSink;
}

export function createLogContext(
  config: LogConfig,
  context: Context,
  sink: LogSink = getLogSink(config),
): LogContext {
  return new LogContext(config.logLevel, {...context}, sink);
}

function stringify(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  if (value instanceof Error) {
    return value.stack ?? value.message;
  }
  if (typeof value === 'bigint') {
    return `${value}n`;
  }
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}
