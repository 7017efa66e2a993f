import { BytesFamily, checkRange, Source, spanEnd } from ".";

export function concatBytes(chunks: Uint8Array[]): Uint8Array {
  let totalSize = 0;
  for (const chunk of chunks) totalSize += chunk.length;
  const result = new Uint8Array(totalSize);
  let offset = 0;
  for (const chunk of chunks) {
    result.set(chunk, offset);
    offset += chunk.length;
  }
  return result;
}

function hex(byte: number) {
  return `0x${byte.toString(16).padStart(2, "0")}`;
}

export const bytesSource: Source<BytesFamily> = {
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
    return concatBytes([input, chunk]);
  },

  subrange(input, offset, count) {
    checkRange(input.length, offset, count);
    return input.subarray(offset, offset + count);
  },

  spanPrefix(input, offset, predicate) {
    const end = spanEnd(input, offset, predicate);
    return [input.subarray(offset, end), end];
  },

  emptyChunk() {
    return new Uint8Array(0);
  },

  chunkLength(chunk) {
    return chunk.length;
  },

  concatChunks(left, right) {
    return concatBytes([left, right]);
  },

  chunksEqual(left, right) {
    if (left.length !== right.length) return false;
    for (let i = 0; i < left.length; i++) if (left[i] !== right[i]) return false;
    return true;
  },

  splitChunk(chunk, count) {
    return [chunk.subarray(0, count), chunk.subarray(count)];
  },

  elementsEqual(left, right) {
    return left === right;
  },

  describeElement(element) {
    return hex(element);
  },

  describeChunk(chunk) {
    return `<${Array.from(chunk, hex).join(" ")}>`;
  }
};
