import {
  BytesFamily,
  Family,
  Input,
  ListFamily,
  Source,
  TextFamily
} from "../source";
import { FinalResult, Result } from "../result";
import { Options, Parser } from "../parser";
import {
  Feeder,
  resolveOptions,
  run,
  runFeed,
  runFeedSync,
  runOnly,
  SyncFeeder
} from ".";

export type ExplicitOptions<F extends Family> = Partial<Options<F>> & {
  source: Source<F>;
};

/**
 * Runs a parser once from the start of the input. The result is suspended
 * when the parser needs more data than the input holds.
 */

export function parse<V>(
  parser: Parser<TextFamily, V>,
  input: string,
  options?: Partial<Options<TextFamily>>
): Result<TextFamily, V>;
export function parse<V>(
  parser: Parser<BytesFamily, V>,
  input: Uint8Array,
  options?: Partial<Options<BytesFamily>>
): Result<BytesFamily, V>;
export function parse<T, V>(
  parser: Parser<ListFamily<T>, V>,
  input: ReadonlyArray<T>,
  options?: Partial<Options<ListFamily<T>>>
): Result<ListFamily<T>, V>;
export function parse<F extends Family, V>(
  parser: Parser<F, V>,
  input: Input<F>,
  options: ExplicitOptions<F>
): Result<F, V>;
export function parse(
  parser: Parser<Family, unknown>,
  input: unknown,
  options?: Partial<Options<Family>>
): Result<Family, unknown> {
  return run(parser, input, resolveOptions(input, options));
}

/**
 * Runs a parser against an input that will not grow
 */

export function parseOnly<V>(
  parser: Parser<TextFamily, V>,
  input: string,
  options?: Partial<Options<TextFamily>>
): FinalResult<TextFamily, V>;
export function parseOnly<V>(
  parser: Parser<BytesFamily, V>,
  input: Uint8Array,
  options?: Partial<Options<BytesFamily>>
): FinalResult<BytesFamily, V>;
export function parseOnly<T, V>(
  parser: Parser<ListFamily<T>, V>,
  input: ReadonlyArray<T>,
  options?: Partial<Options<ListFamily<T>>>
): FinalResult<ListFamily<T>, V>;
export function parseOnly<F extends Family, V>(
  parser: Parser<F, V>,
  input: Input<F>,
  options: ExplicitOptions<F>
): FinalResult<F, V>;
export function parseOnly(
  parser: Parser<Family, unknown>,
  input: unknown,
  options?: Partial<Options<Family>>
): FinalResult<Family, unknown> {
  return runOnly(parser, input, resolveOptions(input, options));
}

/**
 * Runs a parser, calling the feeder each time it needs more data
 */

export function parseFeed<V>(
  feeder: Feeder<TextFamily>,
  parser: Parser<TextFamily, V>,
  input: string,
  options?: Partial<Options<TextFamily>>
): Promise<FinalResult<TextFamily, V>>;
export function parseFeed<V>(
  feeder: Feeder<BytesFamily>,
  parser: Parser<BytesFamily, V>,
  input: Uint8Array,
  options?: Partial<Options<BytesFamily>>
): Promise<FinalResult<BytesFamily, V>>;
export function parseFeed<T, V>(
  feeder: Feeder<ListFamily<T>>,
  parser: Parser<ListFamily<T>, V>,
  input: ReadonlyArray<T>,
  options?: Partial<Options<ListFamily<T>>>
): Promise<FinalResult<ListFamily<T>, V>>;
export function parseFeed<F extends Family, V>(
  feeder: Feeder<F>,
  parser: Parser<F, V>,
  input: Input<F>,
  options: ExplicitOptions<F>
): Promise<FinalResult<F, V>>;
export function parseFeed(
  feeder: Feeder<Family>,
  parser: Parser<Family, unknown>,
  input: unknown,
  options?: Partial<Options<Family>>
): Promise<FinalResult<Family, unknown>> {
  return runFeed(feeder, parser, input, resolveOptions(input, options));
}

export function parseFeedSync<V>(
  feeder: SyncFeeder<TextFamily>,
  parser: Parser<TextFamily, V>,
  input: string,
  options?: Partial<Options<TextFamily>>
): FinalResult<TextFamily, V>;
export function parseFeedSync<V>(
  feeder: SyncFeeder<BytesFamily>,
  parser: Parser<BytesFamily, V>,
  input: Uint8Array,
  options?: Partial<Options<BytesFamily>>
): FinalResult<BytesFamily, V>;
export function parseFeedSync<T, V>(
  feeder: SyncFeeder<ListFamily<T>>,
  parser: Parser<ListFamily<T>, V>,
  input: ReadonlyArray<T>,
  options?: Partial<Options<ListFamily<T>>>
): FinalResult<ListFamily<T>, V>;
export function parseFeedSync<F extends Family, V>(
  feeder: SyncFeeder<F>,
  parser: Parser<F, V>,
  input: Input<F>,
  options: ExplicitOptions<F>
): FinalResult<F, V>;
export function parseFeedSync(
  feeder: SyncFeeder<Family>,
  parser: Parser<Family, unknown>,
  input: unknown,
  options?: Partial<Options<Family>>
): FinalResult<Family, unknown> {
  return runFeedSync(feeder, parser, input, resolveOptions(input, options));
}
