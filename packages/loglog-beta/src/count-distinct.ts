import type {LogContext} from '@rocicorp/logger';
import {CardinalityTracker} from './cardinality-tracker.ts';
import type {CountDistinctConfig} from './config.ts';
import {xxhash64Hasher} from './hash.ts';
import {standardError} from './precision.ts';

export type GroupCount = {
  estimate: number;
  lines: number;
};

export type CountDistinctResult = {
  estimate: number;
  lines: number;
  skipped: number;
  precision: number;
  standardError: number;
  groups?: Record<string, GroupCount>;
};

const ALL = '';

/**
 * Estimates the number of distinct lines (or distinct values of one column)
 * in `lines`. Empty lines, and lines lacking one of the configured columns,
 * are skipped.
 */
export async function countDistinct(
  lc: LogContext,
  config: Pick<
    CountDistinctConfig,
    'errorRate' | 'seed' | 'field' | 'groupBy' | 'delimiter'
  >,
  lines: AsyncIterable<string> | Iterable<string>,
): Promise<CountDistinctResult> {
  const {errorRate, seed, field, groupBy, delimiter} = config;
  const tracker = new CardinalityTracker(lc, {
    errorRate,
    hasher: xxhash64Hasher(seed),
  });

  let n = 0;
  let skipped = 0;
  for await (const line of lines) {
    n++;
    if (line === '') {
      skipped++;
      continue;
    }
    const columns =
      field === undefined && groupBy === undefined
        ? undefined
        : line.split(delimiter);
    const value = field === undefined ? line : columns?.[field];
    const key = groupBy === undefined ? ALL : columns?.[groupBy];
    if (value === undefined || key === undefined) {
      lc.debug?.(`skipping line ${n}: missing column`);
      skipped++;
      continue;
    }
    tracker.observe(key, value);
  }

  const counted = n - skipped;
  lc.info?.(`counted ${counted} lines, skipped ${skipped}`);

  const result: CountDistinctResult = {
    estimate: tracker.estimateTotal(),
    lines: counted,
    skipped,
    precision: tracker.precision,
    standardError: standardError(tracker.precision),
  };
  if (groupBy !== undefined) {
    const groups: Record<string, GroupCount> = {};
    for (const key of tracker.keys().sort()) {
      const {cardinality, observations} = tracker.estimate(key);
      groups[key] = {estimate: cardinality, lines: observations};
    }
    result.groups = groups;
  }
  return result;
}
