import type {Argv} from 'yargs';
import * as v from './valita.ts';

export type ParseOptionsArgs = {
  /**
   * When true, yargs handles `--help` and parse failures itself by printing
   * usage and exiting. Otherwise failures are thrown as {@link TypeError}s.
   */
  exitProcess?: boolean | undefined;
};

/**
 * Parses the command line held by `argv` and validates the camelCased
 * arguments against `schema`. Keys the schema does not name (aliases,
 * kebab-case duplicates, `$0`) are stripped.
 *
 * yargs handles flags, aliases, environment variables and type coercion;
 * valita handles everything yargs cannot express, such as integer ranges.
 */
export function parseOptions<T, R>(
  argv: Argv<T>,
  schema: v.Type<R>,
  {exitProcess = false}: ParseOptionsArgs = {},
): R {
  const args = (
    exitProcess
      ? argv
      : argv.exitProcess(false).fail((msg, err) => {
          throw err ?? new TypeError(msg);
        })
  ).parseSync();
  if (args._.length > 0) {
    throw new TypeError(`Unexpected argument: ${args._.join(' ')}`);
  }
  return v.parse(args, schema, 'strip');
}
