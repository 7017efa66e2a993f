import { Chunk, Element, Family } from "../source";
import { Range } from "../utility";
import {
  AlternativeParser,
  AnyElementTerminal,
  ElementsTerminal,
  ElementTerminal,
  EndOfInputParser,
  FailParser,
  OptionalParser,
  Parser,
  PureParser,
  RepeatParser,
  RepetitionParser,
  RuleParser,
  SatisfyTerminal,
  SequenceParser,
  SkipAllParser,
  SkipParser,
  SkipWhileParser,
  TakeAllParser,
  TakeParser,
  TakeWhileParser
} from ".";

export function pure<F extends Family, V>(value: V): Parser<F, V> {
  return new PureParser<F, V>(value);
}

export function fail<F extends Family>(message: string): Parser<F, never> {
  return new FailParser<F>(message);
}

export function anyElement<F extends Family>(): Parser<F, Element<F>> {
  return new AnyElementTerminal<F>();
}

export function element<F extends Family>(
  expected: Element<F>
): Parser<F, undefined> {
  return new ElementTerminal<F>(expected);
}

export function satisfy<F extends Family>(
  predicate: (element: Element<F>) => boolean,
  description?: string
): Parser<F, Element<F>> {
  return new SatisfyTerminal<F>(predicate, description ?? null);
}

export function elements<F extends Family>(
  expected: Chunk<F>
): Parser<F, undefined> {
  return new ElementsTerminal<F>(expected);
}

export function take<F extends Family>(count: number): Parser<F, Chunk<F>> {
  return new TakeParser<F>(count);
}

export function takeWhile<F extends Family>(
  predicate: (element: Element<F>) => boolean
): Parser<F, Chunk<F>> {
  return new TakeWhileParser<F>(predicate);
}

export function takeAll<F extends Family>(): Parser<F, Chunk<F>> {
  return new TakeAllParser<F>();
}

export function skip<F extends Family>(count: number): Parser<F, undefined> {
  return new SkipParser<F>(count);
}

export function skipWhile<F extends Family>(
  predicate: (element: Element<F>) => boolean
): Parser<F, undefined> {
  return new SkipWhileParser<F>(predicate);
}

export function skipAll<F extends Family>(): Parser<F, undefined> {
  return new SkipAllParser<F>();
}

export function endOfInput<F extends Family>(): Parser<F, undefined> {
  return new EndOfInputParser<F>();
}

/**
 * Runs the parsers one after the other and collects their values
 */

export function sequence<F extends Family, A>(a: Parser<F, A>): Parser<F, [A]>;
export function sequence<F extends Family, A, B>(
  a: Parser<F, A>,
  b: Parser<F, B>
): Parser<F, [A, B]>;
export function sequence<F extends Family, A, B, C>(
  a: Parser<F, A>,
  b: Parser<F, B>,
  c: Parser<F, C>
): Parser<F, [A, B, C]>;
export function sequence<F extends Family, A, B, C, D>(
  a: Parser<F, A>,
  b: Parser<F, B>,
  c: Parser<F, C>,
  d: Parser<F, D>
): Parser<F, [A, B, C, D]>;
export function sequence<F extends Family, A, B, C, D, E>(
  a: Parser<F, A>,
  b: Parser<F, B>,
  c: Parser<F, C>,
  d: Parser<F, D>,
  e: Parser<F, E>
): Parser<F, [A, B, C, D, E]>;
export function sequence<F extends Family>(
  ...parsers: Array<Parser<F, unknown>>
): Parser<F, unknown[]>;
export function sequence<F extends Family>(
  ...parsers: Array<Parser<F, unknown>>
): Parser<F, unknown[]> {
  return new SequenceParser<F>(parsers);
}

/**
 * Tries the parsers in order, backtracking to the same offset after each failure
 */

export function alternative<F extends Family, V>(
  ...parsers: Array<Parser<F, V>>
): Parser<F, V> {
  return new AlternativeParser<F, V>(parsers);
}

export function optional<F extends Family, V>(
  parser: Parser<F, V>
): Parser<F, V | undefined> {
  return new OptionalParser<F, V>(parser);
}

export function many<F extends Family, V>(
  parser: Parser<F, V>
): Parser<F, V[]> {
  return new RepetitionParser<F, V>(parser, 0);
}

export function some<F extends Family, V>(
  parser: Parser<F, V>
): Parser<F, V[]> {
  return new RepetitionParser<F, V>(parser, 1);
}

export function repeat<F extends Family, V>(
  range: Range,
  parser: Parser<F, V>
): Parser<F, V[]> {
  return new RepeatParser<F, V>(range, parser);
}

/**
 * Creates a rule with an undefined child parser, to be set later
 * (used to write recursive grammars)
 */

export function rule<F extends Family, V>(identity?: string) {
  return new RuleParser<F, V>(null, identity ?? null);
}
