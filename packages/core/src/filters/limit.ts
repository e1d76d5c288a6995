// Result limiting for lazy approach streams
import { LimitSchema } from '@neoscope/shared';
import { InvalidCriteriaError } from './errors.js';

/**
 * Yield at most `n` values from `source`. A limit of 0 or undefined yields
 * everything. The source is never pulled past the n-th value and is closed
 * once the limit is reached.
 *
 * @throws {InvalidCriteriaError} When `n` is negative or not an integer
 */
export function limit<T>(
  source: Iterable<T>,
  n?: number,
): Generator<T, void, undefined> {
  const parsed = LimitSchema.safeParse(n);
  if (!parsed.success) {
    throw new InvalidCriteriaError(
      `Invalid result limit: ${String(n)}`,
      parsed.error.errors,
    );
  }
  return take(source, parsed.data ?? 0);
}

function* take<T>(
  source: Iterable<T>,
  n: number,
): Generator<T, void, undefined> {
  if (n === 0) {
    yield* source;
    return;
  }

  let count = 0;
  for (const value of source) {
    yield value;
    count += 1;
    if (count >= n) return;
  }
}
