import {afterEach, describe, expect, test, vi} from 'vitest';
import {parseCountDistinctConfig} from './config.ts';

describe('parseCountDistinctConfig', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  test('defaults', () => {
    expect(parseCountDistinctConfig([])).toEqual({
      errorRate: 0.01,
      seed: 0,
      delimiter: '\t',
      logLevel: 'info',
      logFormat: 'text',
    });
  });

  test('flags', () => {
    expect(
      parseCountDistinctConfig([
        '--error-rate',
        '0.05',
        '--seed',
        '3',
        '--delimiter',
        ',',
        '--log-level',
        'debug',
      ]),
    ).toEqual({
      errorRate: 0.05,
      seed: 3,
      delimiter: ',',
      logLevel: 'debug',
      logFormat: 'text',
    });
  });

  test('column options by alias and by name', () => {
    const config = parseCountDistinctConfig(['-f', '1', '--group-by=0']);
    expect(config.field).toBe(1);
    expect(config.groupBy).toBe(0);

    const short = parseCountDistinctConfig(['-g', '2', '-e', '0.1']);
    expect(short.groupBy).toBe(2);
    expect(short.errorRate).toBe(0.1);
    expect(short.field).toBeUndefined();
  });

  test('column options from env', () => {
    vi.stubEnv('CARDINALITY_FIELD', '2');
    vi.stubEnv('CARDINALITY_GROUP_BY', '0');
    const config = parseCountDistinctConfig([]);
    expect(config.field).toBe(2);
    expect(config.groupBy).toBe(0);
  });

  test('env, overridden by flags', () => {
    vi.stubEnv('CARDINALITY_ERROR_RATE', '0.02');
    vi.stubEnv('CARDINALITY_SEED', '7');
    vi.stubEnv('CARDINALITY_LOG_FORMAT', 'json');
    expect(parseCountDistinctConfig(['--seed', '9'])).toEqual({
      errorRate: 0.02,
      seed: 9,
      delimiter: '\t',
      logLevel: 'info',
      logFormat: 'json',
    });
  });

  test.each([
    [['--field', '-1']],
    [['--field', '1.5']],
    [['--log-level', 'loud']],
    [['--error-rate=abc']],
    [['stray']],
  ])('rejects invalid arguments %o', argv => {
    expect(() => parseCountDistinctConfig(argv)).toThrow(TypeError);
  });

  test('rejects unknown options', () => {
    expect(() => parseCountDistinctConfig(['--nope'])).toThrow(
      'Unknown argument: nope',
    );
  });
});
