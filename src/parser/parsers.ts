import { Chunk, Element, Family, Input } from "../source";
import { ErrorType, More, Result } from "../result";
import { canStop, decrement, Range, shouldStop } from "../utility";
import {
  attempt,
  Attempt,
  AttemptType,
  Failure,
  Options,
  refill,
  resume,
  Success,
  trampoline,
  TraceEventType
} from ".";

/**
 * Abstract base class for all parsers.
 *
 * A parser is run against the buffer accumulated so far, an offset into it and
 * a flag telling whether more data may arrive. It never returns its own outcome
 * directly: it calls the failure or the success continuation, or suspends
 * until the driver supplies the next chunk.
 */

export abstract class Parser<F extends Family, V> {
  abstract _run<R>(
    buffer: Input<F>,
    offset: number,
    more: More,
    failure: Failure<F, R>,
    success: Success<F, V, R>,
    options: Options<F>
  ): Result<F, R>;

  map<W>(callback: (value: V) => W): Parser<F, W> {
    return new MapParser<F, V, W>(this, callback);
  }

  chain<W>(next: (value: V) => Parser<F, W>): Parser<F, W> {
    return new ChainParser<F, V, W>(this, next);
  }

  then<W>(next: Parser<F, W>): Parser<F, W> {
    return new ChainParser<F, V, W>(this, () => next);
  }

  before<W>(next: Parser<F, W>): Parser<F, V> {
    return new ChainParser<F, V, V>(this, value => next.map(() => value));
  }

  or<W>(other: Parser<F, W>): Parser<F, V | W> {
    return new AlternativeParser<F, V | W>([this, other]);
  }

  named(identity: string): Parser<F, V> {
    return new RuleParser<F, V>(this, identity);
  }
}

// PureParser

export class PureParser<F extends Family, V> extends Parser<F, V> {
  readonly value: V;

  constructor(value: V) {
    super();
    this.value = value;
  }

  _run<R>(
    buffer: Input<F>,
    offset: number,
    more: More,
    _: Failure<F, R>,
    success: Success<F, V, R>
  ) {
    return success(buffer, offset, more, this.value);
  }
}

// FailParser

export class FailParser<F extends Family> extends Parser<F, never> {
  readonly message: string;

  constructor(message: string) {
    super();
    this.message = message;
  }

  _run<R>(buffer: Input<F>, offset: number, more: More, failure: Failure<F, R>) {
    return failure(buffer, offset, more, {
      type: ErrorType.Semantic,
      message: this.message
    });
  }
}

// MapParser

export class MapParser<F extends Family, V, W> extends Parser<F, W> {
  readonly parser: Parser<F, V>;
  readonly callback: (value: V) => W;

  constructor(parser: Parser<F, V>, callback: (value: V) => W) {
    super();
    this.parser = parser;
    this.callback = callback;
  }

  _run<R>(
    buffer: Input<F>,
    offset: number,
    more: More,
    failure: Failure<F, R>,
    success: Success<F, W, R>,
    options: Options<F>
  ) {
    return this.parser._run(
      buffer,
      offset,
      more,
      failure,
      (buffer, offset, more, value) =>
        success(buffer, offset, more, this.callback(value)),
      options
    );
  }
}

// ChainParser

export class ChainParser<F extends Family, V, W> extends Parser<F, W> {
  readonly parser: Parser<F, V>;
  readonly next: (value: V) => Parser<F, W>;

  constructor(parser: Parser<F, V>, next: (value: V) => Parser<F, W>) {
    super();
    this.parser = parser;
    this.next = next;
  }

  _run<R>(
    buffer: Input<F>,
    offset: number,
    more: More,
    failure: Failure<F, R>,
    success: Success<F, W, R>,
    options: Options<F>
  ) {
    return this.parser._run(
      buffer,
      offset,
      more,
      failure,
      (buffer, offset, more, value) =>
        resume(
          this.next(value),
          buffer,
          offset,
          more,
          failure,
          success,
          options
        ),
      options
    );
  }
}

// SequenceParser

export class SequenceParser<F extends Family> extends Parser<F, unknown[]> {
  readonly parsers: Array<Parser<F, unknown>>;

  constructor(parsers: Array<Parser<F, unknown>>) {
    super();
    this.parsers = parsers;
  }

  _run<R>(
    buffer: Input<F>,
    offset: number,
    more: More,
    failure: Failure<F, R>,
    success: Success<F, unknown[], R>,
    options: Options<F>
  ) {
    const values: unknown[] = [];
    const step = (
      index: number,
      buffer: Input<F>,
      offset: number,
      more: More
    ): Result<F, R> => {
      if (index === this.parsers.length)
        return success(buffer, offset, more, values);
      const next: Success<F, unknown, R> = (buffer, offset, more, value) => {
        values.push(value);
        return step(index + 1, buffer, offset, more);
      };
      return index === 0
        ? this.parsers[index]._run(buffer, offset, more, failure, next, options)
        : resume(
            this.parsers[index],
            buffer,
            offset,
            more,
            failure,
            next,
            options
          );
    };
    return step(0, buffer, offset, more);
  }
}

// AlternativeParser

export class AlternativeParser<F extends Family, V> extends Parser<F, V> {
  readonly parsers: Array<Parser<F, V>>;

  constructor(parsers: Array<Parser<F, V>>) {
    super();
    if (parsers.length === 0)
      throw new Error("An alternative needs at least one parser");
    this.parsers = parsers;
  }

  /**
   * Every branch restarts at the saved offset. It sees the buffer as the failed
   * branch left it, so chunks fed in the meantime are not lost.
   */

  _run<R>(
    buffer: Input<F>,
    offset: number,
    more: More,
    failure: Failure<F, R>,
    success: Success<F, V, R>,
    options: Options<F>
  ) {
    const attempt = (index: number, buffer: Input<F>, more: More): Result<F, R> =>
      this.parsers[index]._run(
        buffer,
        offset,
        more,
        index === this.parsers.length - 1
          ? failure
          : (buffer, _, more) => attempt(index + 1, buffer, more),
        success,
        options
      );
    return attempt(0, buffer, more);
  }
}

// RuleParser

export class RuleParser<F extends Family, V> extends Parser<F, V> {
  parser: Parser<F, V> | null;
  readonly identity: string | null;

  constructor(parser: Parser<F, V> | null, identity: string | null) {
    super();
    this.parser = parser;
    this.identity = identity;
  }

  _run<R>(
    buffer: Input<F>,
    offset: number,
    more: More,
    failure: Failure<F, R>,
    success: Success<F, V, R>,
    options: Options<F>
  ) {
    const { parser } = this;
    if (!parser)
      throw new Error(
        `Cannot run rule ${
          this.identity === null ? "" : `"${this.identity}" `
        }with undefined child parser`
      );
    if (!options.trace || this.identity === null)
      return parser._run(buffer, offset, more, failure, success, options);
    const rule = this.identity;
    options.tracer({ type: TraceEventType.Enter, rule, offset });
    return parser._run(
      buffer,
      offset,
      more,
      (buffer, to, more, error) => {
        options.tracer({ type: TraceEventType.Fail, rule, offset, error });
        return failure(buffer, to, more, error);
      },
      (buffer, to, more, value) => {
        options.tracer({ type: TraceEventType.Match, rule, offset, to, value });
        return success(buffer, to, more, value);
      },
      options
    );
  }
}

// AnyElementTerminal

export class AnyElementTerminal<F extends Family> extends Parser<
  F,
  Element<F>
> {
  _run<R>(
    buffer: Input<F>,
    offset: number,
    more: More,
    failure: Failure<F, R>,
    success: Success<F, Element<F>, R>,
    options: Options<F>
  ): Result<F, R> {
    const { source } = options;
    const element = source.elementAt(buffer, offset);
    if (element !== undefined)
      return success(buffer, offset + 1, more, element);
    if (more === More.NoMoreWillArrive || offset < source.length(buffer))
      return failure(buffer, offset, more, {
        type: ErrorType.NotEnoughInput,
        count: 1
      });
    return refill(buffer, options, (buffer, more) =>
      this._run(buffer, offset, more, failure, success, options)
    );
  }
}

// ElementTerminal

export class ElementTerminal<F extends Family> extends Parser<F, undefined> {
  readonly expected: Element<F>;

  constructor(expected: Element<F>) {
    super();
    this.expected = expected;
  }

  _run<R>(
    buffer: Input<F>,
    offset: number,
    more: More,
    failure: Failure<F, R>,
    success: Success<F, undefined, R>,
    options: Options<F>
  ): Result<F, R> {
    const { source } = options;
    const element = source.elementAt(buffer, offset);
    if (element !== undefined)
      return source.elementsEqual(this.expected, element)
        ? success(buffer, offset + 1, more, undefined)
        : failure(buffer, offset, more, {
            type: ErrorType.ElementMismatch,
            expected: this.expected,
            actual: element
          });
    if (more === More.NoMoreWillArrive || offset < source.length(buffer))
      return failure(buffer, offset, more, {
        type: ErrorType.NotEnoughInput,
        count: 1
      });
    return refill(buffer, options, (buffer, more) =>
      this._run(buffer, offset, more, failure, success, options)
    );
  }
}

// SatisfyTerminal

export class SatisfyTerminal<F extends Family> extends Parser<F, Element<F>> {
  readonly predicate: (element: Element<F>) => boolean;
  readonly description: string | null;

  constructor(
    predicate: (element: Element<F>) => boolean,
    description: string | null
  ) {
    super();
    this.predicate = predicate;
    this.description = description;
  }

  _run<R>(
    buffer: Input<F>,
    offset: number,
    more: More,
    failure: Failure<F, R>,
    success: Success<F, Element<F>, R>,
    options: Options<F>
  ): Result<F, R> {
    const { source } = options;
    const element = source.elementAt(buffer, offset);
    if (element !== undefined)
      return this.predicate(element)
        ? success(buffer, offset + 1, more, element)
        : failure(buffer, offset, more, {
            type: ErrorType.PredicateFailed,
            description: this.description
          });
    if (more === More.NoMoreWillArrive || offset < source.length(buffer))
      return failure(buffer, offset, more, {
        type: ErrorType.NotEnoughInput,
        count: 1
      });
    return refill(buffer, options, (buffer, more) =>
      this._run(buffer, offset, more, failure, success, options)
    );
  }
}

// ElementsTerminal

export class ElementsTerminal<F extends Family> extends Parser<F, undefined> {
  readonly expected: Chunk<F>;

  constructor(expected: Chunk<F>) {
    super();
    this.expected = expected;
  }

  /**
   * When the buffer ends inside the literal, the available prefix is matched
   * and the remainder is matched once more data has arrived.
   */

  _run<R>(
    buffer: Input<F>,
    offset: number,
    more: More,
    failure: Failure<F, R>,
    success: Success<F, undefined, R>,
    options: Options<F>
  ): Result<F, R> {
    const { source } = options;
    const expectedLength = source.chunkLength(this.expected);
    const available = source.length(buffer) - offset;
    if (available >= expectedLength) {
      const actual = source.subrange(buffer, offset, expectedLength);
      return source.chunksEqual(actual, this.expected)
        ? success(buffer, offset + expectedLength, more, undefined)
        : failure(buffer, offset, more, {
            type: ErrorType.SequenceMismatch,
            expected: this.expected,
            actual
          });
    }
    if (available === 0)
      return more === More.NoMoreWillArrive
        ? failure(buffer, offset, more, {
            type: ErrorType.NotEnoughInput,
            count: expectedLength
          })
        : refill(buffer, options, (buffer, more) =>
            this._run(buffer, offset, more, failure, success, options)
          );
    const actual = source.subrange(buffer, offset, available);
    const [head, tail] = source.splitChunk(this.expected, available);
    if (!source.chunksEqual(actual, head))
      return failure(buffer, offset, more, {
        type: ErrorType.SequenceMismatch,
        expected: head,
        actual
      });
    return resume(
      new ElementsTerminal<F>(tail),
      buffer,
      offset + available,
      more,
      failure,
      success,
      options
    );
  }
}

function checkCount(count: number) {
  if (!Number.isInteger(count) || count < 0)
    throw new RangeError(`Invalid element count ${count}`);
}

// TakeParser

export class TakeParser<F extends Family> extends Parser<F, Chunk<F>> {
  readonly count: number;

  constructor(count: number) {
    super();
    checkCount(count);
    this.count = count;
  }

  _run<R>(
    buffer: Input<F>,
    offset: number,
    more: More,
    failure: Failure<F, R>,
    success: Success<F, Chunk<F>, R>,
    options: Options<F>
  ): Result<F, R> {
    const { source } = options;
    const available = source.length(buffer) - offset;
    if (this.count <= available)
      return success(
        buffer,
        offset + this.count,
        more,
        source.subrange(buffer, offset, this.count)
      );
    if (more === More.NoMoreWillArrive)
      return failure(buffer, offset, more, {
        type: ErrorType.NotEnoughInput,
        count: this.count - available
      });
    if (available === 0)
      return refill(buffer, options, (buffer, more) =>
        this._run(buffer, offset, more, failure, success, options)
      );
    const head = source.subrange(buffer, offset, available);
    return resume(
      new TakeParser<F>(this.count - available),
      buffer,
      offset + available,
      more,
      failure,
      (buffer, offset, more, tail) =>
        success(buffer, offset, more, source.concatChunks(head, tail)),
      options
    );
  }
}

// SkipParser

export class SkipParser<F extends Family> extends Parser<F, undefined> {
  readonly count: number;

  constructor(count: number) {
    super();
    checkCount(count);
    this.count = count;
  }

  _run<R>(
    buffer: Input<F>,
    offset: number,
    more: More,
    failure: Failure<F, R>,
    success: Success<F, undefined, R>,
    options: Options<F>
  ): Result<F, R> {
    const available = options.source.length(buffer) - offset;
    if (this.count <= available)
      return success(buffer, offset + this.count, more, undefined);
    if (more === More.NoMoreWillArrive)
      return failure(buffer, offset, more, {
        type: ErrorType.NotEnoughInput,
        count: this.count - available
      });
    if (available === 0)
      return refill(buffer, options, (buffer, more) =>
        this._run(buffer, offset, more, failure, success, options)
      );
    return resume(
      new SkipParser<F>(this.count - available),
      buffer,
      offset + available,
      more,
      failure,
      success,
      options
    );
  }
}

// TakeWhileParser

export class TakeWhileParser<F extends Family> extends Parser<F, Chunk<F>> {
  readonly predicate: (element: Element<F>) => boolean;

  constructor(predicate: (element: Element<F>) => boolean) {
    super();
    this.predicate = predicate;
  }

  _run<R>(
    buffer: Input<F>,
    offset: number,
    more: More,
    failure: Failure<F, R>,
    success: Success<F, Chunk<F>, R>,
    options: Options<F>
  ): Result<F, R> {
    const { source } = options;
    if (offset >= source.length(buffer))
      return more === More.NoMoreWillArrive
        ? success(buffer, offset, more, source.emptyChunk())
        : refill(buffer, options, (buffer, more) =>
            this._run(buffer, offset, more, failure, success, options)
          );
    const [head, end] = source.spanPrefix(buffer, offset, this.predicate);
    if (end < source.length(buffer)) return success(buffer, end, more, head);
    return this._run(
      buffer,
      end,
      more,
      failure,
      (buffer, offset, more, tail) =>
        success(buffer, offset, more, source.concatChunks(head, tail)),
      options
    );
  }
}

// SkipWhileParser

export class SkipWhileParser<F extends Family> extends Parser<F, undefined> {
  readonly predicate: (element: Element<F>) => boolean;

  constructor(predicate: (element: Element<F>) => boolean) {
    super();
    this.predicate = predicate;
  }

  _run<R>(
    buffer: Input<F>,
    offset: number,
    more: More,
    failure: Failure<F, R>,
    success: Success<F, undefined, R>,
    options: Options<F>
  ): Result<F, R> {
    const { source } = options;
    if (offset >= source.length(buffer))
      return more === More.NoMoreWillArrive
        ? success(buffer, offset, more, undefined)
        : refill(buffer, options, (buffer, more) =>
            this._run(buffer, offset, more, failure, success, options)
          );
    const [, end] = source.spanPrefix(buffer, offset, this.predicate);
    if (end < source.length(buffer))
      return success(buffer, end, more, undefined);
    return this._run(buffer, end, more, failure, success, options);
  }
}

// TakeAllParser

export class TakeAllParser<F extends Family> extends Parser<F, Chunk<F>> {
  _run<R>(
    buffer: Input<F>,
    offset: number,
    more: More,
    failure: Failure<F, R>,
    success: Success<F, Chunk<F>, R>,
    options: Options<F>
  ): Result<F, R> {
    const { source } = options;
    if (more === More.NoMoreWillArrive) {
      const length = source.length(buffer);
      return success(
        buffer,
        length,
        more,
        source.subrange(buffer, offset, length - offset)
      );
    }
    return refill(buffer, options, (buffer, more) =>
      this._run(buffer, offset, more, failure, success, options)
    );
  }
}

// SkipAllParser

export class SkipAllParser<F extends Family> extends Parser<F, undefined> {
  _run<R>(
    buffer: Input<F>,
    offset: number,
    more: More,
    failure: Failure<F, R>,
    success: Success<F, undefined, R>,
    options: Options<F>
  ): Result<F, R> {
    if (more === More.NoMoreWillArrive)
      return success(
        buffer,
        options.source.length(buffer),
        more,
        undefined
      );
    return refill(buffer, options, (buffer, more) =>
      this._run(buffer, offset, more, failure, success, options)
    );
  }
}

// EndOfInputParser

export class EndOfInputParser<F extends Family> extends Parser<F, undefined> {
  _run<R>(
    buffer: Input<F>,
    offset: number,
    more: More,
    failure: Failure<F, R>,
    success: Success<F, undefined, R>,
    options: Options<F>
  ): Result<F, R> {
    if (offset < options.source.length(buffer))
      return failure(buffer, offset, more, {
        type: ErrorType.PredicateFailed,
        description: "end of input"
      });
    if (more === More.NoMoreWillArrive)
      return success(buffer, offset, more, undefined);
    return refill(buffer, options, (buffer, more) =>
      this._run(buffer, offset, more, failure, success, options)
    );
  }
}

// OptionalParser

export class OptionalParser<F extends Family, V> extends Parser<
  F,
  V | undefined
> {
  readonly parser: Parser<F, V>;

  constructor(parser: Parser<F, V>) {
    super();
    this.parser = parser;
  }

  _run<R>(
    buffer: Input<F>,
    offset: number,
    more: More,
    _: Failure<F, R>,
    success: Success<F, V | undefined, R>,
    options: Options<F>
  ) {
    return this.parser._run(
      buffer,
      offset,
      more,
      (buffer, __, more) => success(buffer, offset, more, undefined),
      success,
      options
    );
  }
}

// RepetitionParser

export class RepetitionParser<F extends Family, V> extends Parser<F, V[]> {
  readonly parser: Parser<F, V>;
  readonly min: number;

  constructor(parser: Parser<F, V>, min: number) {
    super();
    this.parser = parser;
    this.min = min;
  }

  /**
   * Stops at the first failure, or after a success that consumed nothing
   */

  _run<R>(
    buffer: Input<F>,
    offset: number,
    more: More,
    failure: Failure<F, R>,
    success: Success<F, V[], R>,
    options: Options<F>
  ) {
    const values: V[] = [];
    return trampoline<F, Attempt<F, V>, R>(
      attempt(this.parser, buffer, offset, more, options),
      outcome => {
        if (outcome.type === AttemptType.Missed)
          return {
            done:
              values.length < this.min
                ? failure(
                    outcome.buffer,
                    outcome.from,
                    outcome.more,
                    outcome.error
                  )
                : success(outcome.buffer, outcome.from, outcome.more, values)
          };
        values.push(outcome.value);
        if (outcome.to === outcome.from)
          return {
            done: success(outcome.buffer, outcome.to, outcome.more, values)
          };
        return {
          next: attempt(
            this.parser,
            outcome.buffer,
            outcome.to,
            outcome.more,
            options
          )
        };
      }
    );
  }
}

// RepeatParser

export class RepeatParser<F extends Family, V> extends Parser<F, V[]> {
  readonly range: Range;
  readonly parser: Parser<F, V>;

  constructor(range: Range, parser: Parser<F, V>) {
    super();
    this.range = range;
    this.parser = parser;
  }

  _run<R>(
    buffer: Input<F>,
    offset: number,
    more: More,
    failure: Failure<F, R>,
    success: Success<F, V[], R>,
    options: Options<F>
  ) {
    const values: V[] = [];
    let range = this.range;
    if (shouldStop(range)) return success(buffer, offset, more, values);
    return trampoline<F, Attempt<F, V>, R>(
      attempt(this.parser, buffer, offset, more, options),
      outcome => {
        if (outcome.type === AttemptType.Missed)
          return {
            done: canStop(range)
              ? success(outcome.buffer, outcome.from, outcome.more, values)
              : failure(outcome.buffer, outcome.from, outcome.more, {
                  type: ErrorType.RangeUnmet,
                  range: this.range,
                  matched: values.length
                })
          };
        values.push(outcome.value);
        range = decrement(range);
        if (shouldStop(range))
          return {
            done: success(outcome.buffer, outcome.to, outcome.more, values)
          };
        return {
          next: attempt(
            this.parser,
            outcome.buffer,
            outcome.to,
            outcome.more,
            options
          )
        };
      }
    );
  }
}
