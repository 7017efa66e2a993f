import { Chunk, Family, Input, Source } from "../source";
import {
  ErrorType,
  FinalResult,
  More,
  Result,
  ResultType
} from "../result";
import { Options, Parser } from "../parser";

/**
 * A possibly effectful producer of the next chunk. An empty chunk signals
 * that no more data will arrive.
 */

export type Feeder<F extends Family> = () => Chunk<F> | Promise<Chunk<F>>;

export type SyncFeeder<F extends Family> = () => Chunk<F>;

/**
 * Runs a parser once against an initial input
 */

export function run<F extends Family, V>(
  parser: Parser<F, V>,
  input: Input<F>,
  options: Options<F>
): Result<F, V> {
  const { source } = options;
  return parser._run<V>(
    input,
    0,
    More.MayArriveMore,
    (buffer, offset, _, error) => ({
      type: ResultType.Failed,
      error,
      buffer,
      offset
    }),
    (buffer, offset, _, value) => ({
      type: ResultType.Done,
      rest: source.subrange(buffer, offset, source.length(buffer) - offset),
      value
    }),
    options
  );
}

/**
 * Runs a parser against an input that will not grow. A suspension is resumed
 * once with an empty chunk, the parse fails if it still asks for more.
 */

export function runOnly<F extends Family, V>(
  parser: Parser<F, V>,
  input: Input<F>,
  options: Options<F>
): FinalResult<F, V> {
  const { source } = options;
  const result = run(parser, input, options);
  if (result.type !== ResultType.Suspended) return result;
  const settled = result.resume(source.emptyChunk());
  if (settled.type !== ResultType.Suspended) return settled;
  return {
    type: ResultType.Failed,
    error: { type: ErrorType.IncompleteAtEOF },
    buffer: input,
    offset: source.length(input)
  };
}

export async function runFeed<F extends Family, V>(
  feeder: Feeder<F>,
  parser: Parser<F, V>,
  input: Input<F>,
  options: Options<F>
): Promise<FinalResult<F, V>> {
  let result = run(parser, input, options);
  while (result.type === ResultType.Suspended)
    result = result.resume(await feeder());
  return result;
}

export function runFeedSync<F extends Family, V>(
  feeder: SyncFeeder<F>,
  parser: Parser<F, V>,
  input: Input<F>,
  options: Options<F>
): FinalResult<F, V> {
  let result = run(parser, input, options);
  while (result.type === ResultType.Suspended) result = result.resume(feeder());
  return result;
}

async function* iterate<T>(chunks: Iterable<T> | AsyncIterable<T>) {
  yield* chunks;
}

/**
 * Turns an iterable of chunks (a Node.js readable stream, for instance) into a
 * feeder. Empty chunks are skipped, the end of the iterable is signalled
 * with an empty chunk.
 */

export function feederOf<F extends Family>(
  source: Source<F>,
  chunks: Iterable<Chunk<F>> | AsyncIterable<Chunk<F>>
): Feeder<F> {
  const iterator = iterate(chunks);
  let ended = false;
  return async () => {
    while (!ended) {
      const next = await iterator.next();
      if (next.done) ended = true;
      else if (source.chunkLength(next.value) !== 0) return next.value;
    }
    return source.emptyChunk();
  };
}
