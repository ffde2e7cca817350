import * as v from '@badrap/valita';

export * from '@badrap/valita';

export type ParseOptionsMode = 'passthrough' | 'strict' | 'strip';

/**
 * Parses `value` against `schema`, throwing a {@link TypeError} carrying
 * valita's description of the first issue found.
 */
export function parse<T>(
  value: unknown,
  schema: v.Type<T>,
  mode: ParseOptionsMode = 'strict',
): T {
  const res = schema.try(value, {mode});
  if (res.ok) {
    return res.value;
  }
  throw new TypeError(res.message);
}
