import { isArray, isString } from "lodash";
import { bytesSource, Family, listSource, Source, textSource } from ".";

/**
 * Throws if [offset, offset + count) is not inside an input of the given length
 */

export function checkRange(length: number, offset: number, count: number) {
  if (offset < 0 || count < 0 || offset + count > length)
    throw new RangeError(
      `Subrange [${offset}, ${offset + count}) falls outside of input of length ${length}`
    );
}

/**
 * Returns the offset of the first element from offset on that does not
 * satisfy the predicate
 */

export function spanEnd<E>(
  input: ArrayLike<E>,
  offset: number,
  predicate: (element: E) => boolean
) {
  let end = offset;
  while (end < input.length && predicate(input[end])) end++;
  return end;
}

/**
 * Picks the source adapter matching the runtime shape of an input
 */

export function sourceOf(input: unknown): Source<Family> {
  if (isString(input)) return textSource;
  if (input instanceof Uint8Array) return bytesSource;
  if (isArray(input)) return listSource<unknown>();
  throw new Error(
    `No input source for ${Object.prototype.toString.call(input)}, pass one with the source option`
  );
}
