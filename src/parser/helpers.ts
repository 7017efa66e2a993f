import { Family, Input } from "../source";
import { More, ParseError, Result, ResultType, suspend } from "../result";
import { Failure, Options, Parser, Success } from ".";

/**
 * Asks the feeder for the next chunk. An empty chunk means that no more data
 * will arrive, anything else is appended to the buffer.
 */

export function refill<F extends Family, R>(
  buffer: Input<F>,
  options: Options<F>,
  next: (buffer: Input<F>, more: More) => Result<F, R>
): Result<F, R> {
  return suspend(chunk =>
    options.source.isEmptyChunk(buffer, chunk)
      ? next(buffer, More.NoMoreWillArrive)
      : next(options.source.append(buffer, chunk), More.MayArriveMore)
  );
}

/**
 * Runs a parser, suspending first if the offset sits at the end of the buffer
 * while more data may arrive
 */

export function resume<F extends Family, V, R>(
  parser: Parser<F, V>,
  buffer: Input<F>,
  offset: number,
  more: More,
  failure: Failure<F, R>,
  success: Success<F, V, R>,
  options: Options<F>
): Result<F, R> {
  if (
    more === More.NoMoreWillArrive ||
    offset < options.source.length(buffer)
  )
    return parser._run(buffer, offset, more, failure, success, options);
  return refill(buffer, options, (buffer, more) =>
    parser._run(buffer, offset, more, failure, success, options)
  );
}

// Attempts

export enum AttemptType {
  Matched = "MATCHED",
  Missed = "MISSED"
}

export type Attempt<F extends Family, V> =
  | MatchedAttempt<F, V>
  | MissedAttempt<F>;

export interface MatchedAttempt<F extends Family, V> {
  type: AttemptType.Matched;
  buffer: Input<F>;
  from: number;
  to: number;
  more: More;
  value: V;
}

export interface MissedAttempt<F extends Family> {
  type: AttemptType.Missed;
  buffer: Input<F>;
  from: number;
  more: More;
  error: ParseError<F>;
}

/**
 * Runs a parser once and settles with the outcome instead of continuing.
 * Both continuations return right away, so the caller's stack unwinds.
 */

export function attempt<F extends Family, V>(
  parser: Parser<F, V>,
  buffer: Input<F>,
  from: number,
  more: More,
  options: Options<F>
): Result<F, Attempt<F, V>> {
  const settled = (value: Attempt<F, V>): Result<F, Attempt<F, V>> => ({
    type: ResultType.Done,
    rest: options.source.emptyChunk(),
    value
  });
  return resume(
    parser,
    buffer,
    from,
    more,
    (buffer, _, more, error) =>
      settled({ type: AttemptType.Missed, buffer, from, more, error }),
    (buffer, to, more, value) =>
      settled({ type: AttemptType.Matched, buffer, from, to, more, value }),
    options
  );
}

export type Step<F extends Family, S, R> =
  | { next: Result<F, S> }
  | { done: Result<F, R> };

/**
 * Loops over settled results. A suspension is passed on to the caller and the
 * loop picks up again once it is resumed.
 */

export function trampoline<F extends Family, S, R>(
  result: Result<F, S>,
  step: (value: S) => Step<F, S, R>
): Result<F, R> {
  let current = result;
  while (current.type === ResultType.Done) {
    const outcome = step(current.value);
    if ("done" in outcome) return outcome.done;
    current = outcome.next;
  }
  if (current.type === ResultType.Failed) return current;
  const suspended = current;
  return suspend(chunk => trampoline(suspended.resume(chunk), step));
}
