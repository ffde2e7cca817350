import {afterEach, describe, expect, test, vi} from 'vitest';
import {
  consoleJsonLogSink,
  consoleTextLogSink,
  createLogContext,
  getLogSink,
} from './logging.ts';
import {TestLogSink} from './logging-test-utils.ts';

describe('logging', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  test('json sink writes one object per line to stderr', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    consoleJsonLogSink.log('warn', {worker: 'w'}, 'a', {b: 1});
    expect(spy).toHaveBeenCalledWith(
      JSON.stringify({level: 'WARN', worker: 'w', message: 'a {"b":1}'}),
    );
  });

  test('text sink prefixes level and context', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => {});
    consoleTextLogSink.log('info', {worker: 'w', n: 2}, 'msg', 42n);
    expect(spy).toHaveBeenCalledWith('INFO', 'worker=w', 'n=2', 'msg', '42n');
  });

  test('getLogSink', () => {
    expect(getLogSink({logFormat: 'json'})).toBe(consoleJsonLogSink);
    expect(getLogSink({logFormat: 'text'})).toBe(consoleTextLogSink);
  });

  test('createLogContext filters by level', () => {
    const sink = new TestLogSink();
    const lc = createLogContext(
      {logLevel: 'warn', logFormat: 'text'},
      {worker: 'w'},
      sink,
    );
    expect(lc.info).toBeUndefined();
    lc.warn?.('careful');
    expect(sink.messages).toEqual([['warn', {worker: 'w'}, ['careful']]]);
  });
});
