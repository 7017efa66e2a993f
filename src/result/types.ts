import { Chunk, Element, Family, Input } from "../source";
import { Range } from "../utility";

/**
 * Whether the feeder may still supply chunks
 */

export enum More {
  MayArriveMore = "MAY_ARRIVE_MORE",
  NoMoreWillArrive = "NO_MORE_WILL_ARRIVE"
}

// Errors

export enum ErrorType {
  NotEnoughInput = "NOT_ENOUGH_INPUT",
  ElementMismatch = "ELEMENT_MISMATCH",
  SequenceMismatch = "SEQUENCE_MISMATCH",
  PredicateFailed = "PREDICATE_FAILED",
  IncompleteAtEOF = "INCOMPLETE_AT_EOF",
  RangeUnmet = "RANGE_UNMET",
  Semantic = "SEMANTIC"
}

export type ParseError<F extends Family> =
  | NotEnoughInputError
  | ElementMismatchError<F>
  | SequenceMismatchError<F>
  | PredicateFailedError
  | IncompleteAtEOFError
  | RangeUnmetError
  | SemanticError;

export interface NotEnoughInputError {
  type: ErrorType.NotEnoughInput;
  count: number;
}

export interface ElementMismatchError<F extends Family> {
  type: ErrorType.ElementMismatch;
  expected: Element<F>;
  actual: Element<F>;
}

export interface SequenceMismatchError<F extends Family> {
  type: ErrorType.SequenceMismatch;
  expected: Chunk<F>;
  actual: Chunk<F>;
}

export interface PredicateFailedError {
  type: ErrorType.PredicateFailed;
  description: string | null;
}

export interface IncompleteAtEOFError {
  type: ErrorType.IncompleteAtEOF;
}

export interface RangeUnmetError {
  type: ErrorType.RangeUnmet;
  range: Range;
  matched: number;
}

export interface SemanticError {
  type: ErrorType.Semantic;
  message: string;
}

// Results

export enum ResultType {
  Failed = "FAILED",
  Done = "DONE",
  Suspended = "SUSPENDED"
}

export type Result<F extends Family, V> =
  | FailedResult<F>
  | DoneResult<F, V>
  | SuspendedResult<F, V>;

/**
 * A result that no longer waits for input
 */

export type FinalResult<F extends Family, V> = FailedResult<F> | DoneResult<F, V>;

export interface FailedResult<F extends Family> {
  type: ResultType.Failed;
  error: ParseError<F>;
  buffer: Input<F>;
  offset: number;
}

export interface DoneResult<F extends Family, V> {
  type: ResultType.Done;
  rest: Chunk<F>;
  value: V;
}

export interface SuspendedResult<F extends Family, V> {
  type: ResultType.Suspended;

  /**
   * Continues the parse with the next chunk, an empty one meaning that no
   * more data will arrive. Can only be called once.
   */
  resume(chunk: Chunk<F>): Result<F, V>;
}
