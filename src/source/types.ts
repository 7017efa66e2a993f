/**
 * A family names the three types an input representation works with: the
 * accumulated buffer, the chunks it is fed with and the elements it holds.
 */

export interface Family {
  input: unknown;
  chunk: unknown;
  element: unknown;
}

export type Input<F extends Family> = F["input"];
export type Chunk<F extends Family> = F["chunk"];
export type Element<F extends Family> = F["element"];

export interface TextFamily extends Family {
  input: string;
  chunk: string;
  element: string;
}

export interface BytesFamily extends Family {
  input: Uint8Array;
  chunk: Uint8Array;
  element: number;
}

export interface ListFamily<T> extends Family {
  input: ReadonlyArray<T>;
  chunk: ReadonlyArray<T>;
  element: T;
}

/**
 * Element access and chunk extraction for one input representation.
 * Implementations never mutate their arguments.
 */

export interface Source<F extends Family> {
  length(input: Input<F>): number;

  elementAt(input: Input<F>, offset: number): Element<F> | undefined;

  isEmptyChunk(input: Input<F>, chunk: Chunk<F>): boolean;

  append(input: Input<F>, chunk: Chunk<F>): Input<F>;

  /**
   * Throws a RangeError when [offset, offset + count) is not inside the input
   */
  subrange(input: Input<F>, offset: number, count: number): Chunk<F>;

  /**
   * Scans from offset while the predicate holds. Stops at the end of the
   * buffer, which is not necessarily the end of the input.
   */
  spanPrefix(
    input: Input<F>,
    offset: number,
    predicate: (element: Element<F>) => boolean
  ): [Chunk<F>, number];

  emptyChunk(): Chunk<F>;

  chunkLength(chunk: Chunk<F>): number;

  concatChunks(left: Chunk<F>, right: Chunk<F>): Chunk<F>;

  chunksEqual(left: Chunk<F>, right: Chunk<F>): boolean;

  splitChunk(chunk: Chunk<F>, count: number): [Chunk<F>, Chunk<F>];

  elementsEqual(left: Element<F>, right: Element<F>): boolean;

  describeElement(element: Element<F>): string;

  describeChunk(chunk: Chunk<F>): string;
}
