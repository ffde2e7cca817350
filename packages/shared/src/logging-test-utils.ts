import {
  LogContext,
  type Context,
  type LogLevel,
  type LogSink,
} from '@rocicorp/logger';

export class TestLogSink implements LogSink {
  messages: [LogLevel, Context | undefined, unknown[]][] = [];

  log(level: LogLevel, context: Context | undefined, ...args: unknown[]): void {
    this.messages.push([level, context, args]);
  }
}

export class SilentLogSink implements LogSink {
  log(_level: LogLevel, _context: Context | undefined, ..._args: unknown[]) {}
}

export function createSilentLogContext(): LogContext {
  return new LogContext('error', undefined, new SilentLogSink());
}

export function createTestLogContext(
  level: LogLevel = 'debug',
): [LogContext, TestLogSink] {
  const sink = new TestLogSink();
  return [new LogContext(level, undefined, sink), sink];
}
