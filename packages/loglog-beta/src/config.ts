import yargs, {type Argv} from 'yargs';
import {DEFAULT_SEED} from './hash.ts';
import {logConfigShape, logOptions} from '../../shared/src/logging.ts';
import {
  parseOptions,
  type ParseOptionsArgs,
} from '../../shared/src/options.ts';
import * as v from '../../shared/src/valita.ts';

/** Environment variables named CARDINALITY_<OPTION> supply option values. */
export const ENV_PREFIX = 'CARDINALITY';

export function countDistinctOptions<T>(argv: Argv<T>) {
  return logOptions(
    argv
      .option('error-rate', {
        alias: 'e',
        describe:
          'Target standard error of the estimate, between 0 and 1. ' +
          'Smaller values use more memory: 0.01 needs 2^14 registers.',
        type: 'number',
        default: 0.01,
      })
      .option('seed', {
        describe:
          'Seed of the XXH64 hash (uint32). Estimates for identical input ' +
          'are reproducible for a fixed seed.',
        type: 'number',
        default: DEFAULT_SEED,
      })
      .option('field', {
        alias: 'f',
        describe:
          'Zero-based column whose values are counted. By default the ' +
          'whole line is counted.',
        type: 'number',
      })
      .option('group-by', {
        alias: 'g',
        describe: 'Zero-based column to group counts by.',
        type: 'number',
      })
      .option('delimiter', {
        alias: 'd',
        describe: 'Column delimiter used by --field and --group-by.',
        type: 'string',
        default: '\t',
      }),
  );
}

const number = v
  .number()
  .assert(n => !Number.isNaN(n), 'must be a number');

const columnIndex = v
  .number()
  .assert(n => Number.isInteger(n) && n >= 0, 'must be a column index');

export const countDistinctConfigSchema = v.object({
  errorRate: number,
  seed: number,
  field: columnIndex.optional(),
  groupBy: columnIndex.optional(),
  delimiter: v.string(),
  ...logConfigShape,
});

export type CountDistinctConfig = v.Infer<typeof countDistinctConfigSchema>;

export function countDistinctYargs(args: readonly string[]) {
  return countDistinctOptions(yargs(args))
    .scriptName('count-distinct')
    .usage(
      '$0 [options] < input\n\n' +
        'Estimates the number of distinct lines, or distinct values of one ' +
        'column, read from stdin.',
    )
    .env(ENV_PREFIX)
    .strict()
    .version(false)
    .help()
    .alias('h', 'help');
}

/**
 * Parses count-distinct options from `args`, falling back to CARDINALITY_*
 * environment variables and then to defaults.
 *
 * @throws TypeError on unknown options or invalid values, unless
 *   `exitProcess` is set.
 */
export function parseCountDistinctConfig(
  args: readonly string[],
  options: ParseOptionsArgs = {},
): CountDistinctConfig {
  return parseOptions(
    countDistinctYargs(args),
    countDistinctConfigSchema,
    options,
  );
}
