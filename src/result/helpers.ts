import { Chunk, Family, Source } from "../source";
import { describeRange } from "../utility";
import { ErrorType, ParseError, Result, ResultType, SuspendedResult } from ".";

/**
 * Builds a suspended result whose resume function can only be called once
 */

export function suspend<F extends Family, V>(
  resume: (chunk: Chunk<F>) => Result<F, V>
): SuspendedResult<F, V> {
  let resumed = false;
  return {
    type: ResultType.Suspended,
    resume(chunk) {
      if (resumed) throw new Error("Suspended parse has already been resumed");
      resumed = true;
      return resume(chunk);
    }
  };
}

/**
 * Maps the value of a result, including the results of later resumptions
 */

export function mapResult<F extends Family, V, W>(
  result: Result<F, V>,
  callback: (value: V) => W
): Result<F, W> {
  switch (result.type) {
    case ResultType.Failed:
      return result;
    case ResultType.Done:
      return { ...result, value: callback(result.value) };
    case ResultType.Suspended:
      return suspend(chunk => mapResult(result.resume(chunk), callback));
  }
}

/**
 * Stringifies a parse error
 */

export function errorMessage<F extends Family>(
  error: ParseError<F>,
  source: Source<F>
) {
  switch (error.type) {
    case ErrorType.NotEnoughInput:
      return `NotEnough: missing ${error.count} element(s)`;
    case ErrorType.ElementMismatch:
      return `Expected ${source.describeElement(
        error.expected
      )} but received ${source.describeElement(error.actual)}`;
    case ErrorType.SequenceMismatch:
      return `Expected ${source.describeChunk(
        error.expected
      )} but received ${source.describeChunk(error.actual)}`;
    case ErrorType.PredicateFailed:
      return error.description === null
        ? "Predicate failed"
        : `Predicate failed: expected ${error.description}`;
    case ErrorType.IncompleteAtEOF:
      return "Input ended while the parser still needed data";
    case ErrorType.RangeUnmet:
      return `Expected ${describeRange(error.range)} but matched ${
        error.matched
      } time(s)`;
    case ErrorType.Semantic:
      return error.message;
  }
}
