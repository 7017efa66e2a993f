import { isEqual } from "lodash";
import { checkRange, ListFamily, Source, spanEnd } from ".";

/**
 * Creates a source over arrays. Elements are compared structurally.
 * `undefined` cannot be used as an element, since it marks the end of the buffer.
 */

export function listSource<T>(): Source<ListFamily<T>> {
  return {
    length(input) {
      return input.length;
    },

    elementAt(input, offset) {
      return offset >= 0 && offset < input.length ? input[offset] : undefined;
    },

    isEmptyChunk(_, chunk) {
      return chunk.length === 0;
    },

    append(input, chunk) {
      return [...input, ...chunk];
    },

    subrange(input, offset, count) {
      checkRange(input.length, offset, count);
      return input.slice(offset, offset + count);
    },

    spanPrefix(input, offset, predicate) {
      const end = spanEnd(input, offset, predicate);
      return [input.slice(offset, end), end];
    },

    emptyChunk() {
      return [];
    },

    chunkLength(chunk) {
      return chunk.length;
    },

    concatChunks(left, right) {
      return [...left, ...right];
    },

    chunksEqual(left, right) {
      return isEqual(left, right);
    },

    splitChunk(chunk, count) {
      return [chunk.slice(0, count), chunk.slice(count)];
    },

    elementsEqual(left, right) {
      return isEqual(left, right);
    },

    describeElement(element) {
      return JSON.stringify(element);
    },

    describeChunk(chunk) {
      return JSON.stringify(chunk);
    }
  };
}
