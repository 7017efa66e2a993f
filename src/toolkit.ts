import {
  bytesSource,
  Chunk,
  Element,
  Family,
  Input,
  listSource,
  Source,
  textSource
} from "./source";
import { FinalResult, ResultType } from "./result";
import {
  alternative,
  anyElement,
  element,
  elements,
  endOfInput,
  fail,
  many,
  optional,
  Options,
  Parser,
  pure,
  repeat,
  rule,
  satisfy,
  sequence,
  skip,
  skipAll,
  skipWhile,
  some,
  take,
  takeAll,
  takeWhile
} from "./parser";
import {
  buildOptions,
  Feeder,
  feederOf,
  run,
  runFeed,
  runFeedSync,
  runOnly,
  SyncFeeder
} from "./driver";
import { Report } from "./report";

export type RunOptions<F extends Family> = Partial<Omit<Options<F>, "source">>;

/**
 * Binds the combinators and the drivers to one input representation, so that
 * grammars can be written without spelling out the family at every call.
 */

export function createToolkit<F extends Family>(source: Source<F>) {
  const options = (partial?: RunOptions<F>) => buildOptions(source, partial);

  return {
    source,

    // Primitives

    pure: <V>(value: V) => pure<F, V>(value),
    fail: (message: string) => fail<F>(message),
    anyElement: () => anyElement<F>(),
    element: (expected: Element<F>) => element<F>(expected),
    satisfy: (
      predicate: (element: Element<F>) => boolean,
      description?: string
    ) => satisfy<F>(predicate, description),
    elements: (expected: Chunk<F>) => elements<F>(expected),
    take: (count: number) => take<F>(count),
    takeWhile: (predicate: (element: Element<F>) => boolean) =>
      takeWhile<F>(predicate),
    takeAll: () => takeAll<F>(),
    skip: (count: number) => skip<F>(count),
    skipWhile: (predicate: (element: Element<F>) => boolean) =>
      skipWhile<F>(predicate),
    skipAll: () => skipAll<F>(),
    endOfInput: () => endOfInput<F>(),
    rule: <V>(identity?: string) => rule<F, V>(identity),

    // Combinators

    sequence,
    alternative,
    optional,
    many,
    some,
    repeat,

    // Drivers

    parse: <V>(parser: Parser<F, V>, input: Input<F>, partial?: RunOptions<F>) =>
      run(parser, input, options(partial)),

    parseOnly: <V>(
      parser: Parser<F, V>,
      input: Input<F>,
      partial?: RunOptions<F>
    ) => runOnly(parser, input, options(partial)),

    parseFeed: <V>(
      feeder: Feeder<F>,
      parser: Parser<F, V>,
      input: Input<F>,
      partial?: RunOptions<F>
    ) => runFeed(feeder, parser, input, options(partial)),

    parseFeedSync: <V>(
      feeder: SyncFeeder<F>,
      parser: Parser<F, V>,
      input: Input<F>,
      partial?: RunOptions<F>
    ) => runFeedSync(feeder, parser, input, options(partial)),

    feederOf: (chunks: Iterable<Chunk<F>> | AsyncIterable<Chunk<F>>) =>
      feederOf(source, chunks),

    test: <V>(parser: Parser<F, V>, input: Input<F>, partial?: RunOptions<F>) =>
      runOnly(parser, input, options(partial)).type === ResultType.Done,

    value<V>(
      parser: Parser<F, V>,
      input: Input<F>,
      partial?: RunOptions<F>
    ): V | undefined {
      const result = runOnly(parser, input, options(partial));
      return result.type === ResultType.Done ? result.value : undefined;
    },

    report: <V>(result: FinalResult<F, V>) => new Report<F, V>(result, source)
  };
}

export const text = createToolkit(textSource);

export const bytes = createToolkit(bytesSource);

export function list<T>() {
  return createToolkit(listSource<T>());
}
