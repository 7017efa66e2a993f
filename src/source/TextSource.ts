import { checkRange, Source, spanEnd, TextFamily } from ".";

export const textSource: Source<TextFamily> = {
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
    return input + chunk;
  },

  subrange(input, offset, count) {
    checkRange(input.length, offset, count);
    return input.substring(offset, offset + count);
  },

  spanPrefix(input, offset, predicate) {
    const end = spanEnd(input, offset, predicate);
    return [input.substring(offset, end), end];
  },

  emptyChunk() {
    return "";
  },

  chunkLength(chunk) {
    return chunk.length;
  },

  concatChunks(left, right) {
    return left + right;
  },

  chunksEqual(left, right) {
    return left === right;
  },

  splitChunk(chunk, count) {
    return [chunk.substring(0, count), chunk.substring(count)];
  },

  elementsEqual(left, right) {
    return left === right;
  },

  describeElement(element) {
    return JSON.stringify(element);
  },

  describeChunk(chunk) {
    return JSON.stringify(chunk);
  }
};
