import { Chunk, Family, TextFamily } from "../source";
import { ErrorType, More, Result, ResultType } from "../result";
import { between, exactly, twice } from "../utility";
import { bytes, list, text } from "../toolkit";
import {
  consoleTracer,
  Failure,
  Options,
  Parser,
  refill,
  Success,
  TraceEventType
} from ".";
import { parseOnly } from "../driver";

function resumed<F extends Family, V>(result: Result<F, V>, chunk: Chunk<F>) {
  if (result.type !== ResultType.Suspended)
    throw new Error(`Expected a suspension but got ${result.type}`);
  return result.resume(chunk);
}

function feed(chunks: string[]) {
  return () => chunks.shift() ?? "";
}

const isDigit = (char: string) => char >= "0" && char <= "9";

test("A composite parser should work over bytes", () => {
  const parser = bytes.sequence(
    bytes.take(2),
    bytes.element(0x20),
    bytes.elements(Buffer.from("abc")),
    bytes.anyElement()
  );
  const result = bytes.parseOnly(parser, Buffer.from("xx abctest"));
  if (result.type !== ResultType.Done) throw new Error("Expected a success");
  const [first, space, abc, last] = result.value;
  expect(Buffer.from(first).toString()).toBe("xx");
  expect(space).toBeUndefined();
  expect(abc).toBeUndefined();
  expect(last).toBe(116);
  expect(Buffer.from(result.rest).toString()).toBe("est");
});

test("take should fail when the input ends too early", () => {
  expect(text.parseOnly(text.take(5), "abc")).toEqual({
    type: ResultType.Failed,
    error: { type: ErrorType.NotEnoughInput, count: 2 },
    buffer: "abc",
    offset: 3
  });
  expect(() => text.take(-1)).toThrow(new RangeError("Invalid element count -1"));
});

test("take should collect elements across chunks", () => {
  const result = text.parseFeedSync(feed(["b", "cd", "ef"]), text.take(4), "a");
  expect(result).toEqual({ type: ResultType.Done, rest: "", value: "abcd" });
});

test("elements should match across a chunk boundary", () => {
  const parser = text.elements("abc");
  const suspended = text.parse(parser, "ab");
  expect(suspended.type).toBe(ResultType.Suspended);
  expect(resumed(suspended, "cdef")).toEqual({
    type: ResultType.Done,
    rest: "def",
    value: undefined
  });
  expect(text.parseOnly(parser, "abcdef")).toEqual({
    type: ResultType.Done,
    rest: "def",
    value: undefined
  });
});

test("elements should report the mismatching part", () => {
  expect(text.parseOnly(text.elements("abc"), "abd")).toEqual({
    type: ResultType.Failed,
    error: { type: ErrorType.SequenceMismatch, expected: "abc", actual: "abd" },
    buffer: "abd",
    offset: 0
  });
  expect(text.parseOnly(text.elements("abc"), "xb")).toEqual({
    type: ResultType.Failed,
    error: { type: ErrorType.SequenceMismatch, expected: "ab", actual: "xb" },
    buffer: "xb",
    offset: 0
  });
});

test("Parsing should not depend on how the input is chunked", () => {
  const input = "GET /index.html HTTP/1.1";
  const request = text.sequence(
    text.elements("GET"),
    text.skip(1),
    text.takeWhile(char => char !== " ")
  );
  const whole = text.parseOnly(request, input);
  expect(whole).toEqual({
    type: ResultType.Done,
    rest: " HTTP/1.1",
    value: [undefined, undefined, "/index.html"]
  });
  for (let first = 0; first <= input.length; first++)
    for (let second = first; second <= input.length; second++) {
      const chunks = [
        input.slice(first, second),
        input.slice(second)
      ].filter(chunk => chunk.length > 0);
      const result = text.parseFeedSync(
        feed(chunks),
        request,
        input.slice(0, first)
      );
      if (result.type !== ResultType.Done)
        throw new Error(`Failed with a split at ${first} and ${second}`);
      expect(result.value).toEqual([undefined, undefined, "/index.html"]);
      expect(result.rest + chunks.join("")).toBe(" HTTP/1.1");
    }
});

test("takeWhile should stop on the first element that does not satisfy the predicate", () => {
  const parser = text.sequence(text.takeWhile(isDigit), text.anyElement());
  expect(text.value(parser, "123a45")).toEqual(["123", "a"]);
  expect(text.parseFeedSync(feed(["3a4"]), parser, "12")).toEqual({
    type: ResultType.Done,
    rest: "4",
    value: ["123", "a"]
  });
  expect(text.parseOnly(parser, "123")).toEqual({
    type: ResultType.Failed,
    error: { type: ErrorType.NotEnoughInput, count: 1 },
    buffer: "123",
    offset: 3
  });
});

test("skipWhile, skip and skipAll should consume without a value", () => {
  const parser = text.sequence(
    text.skipWhile(char => char === " "),
    text.skip(2),
    text.takeWhile(isDigit),
    text.skipAll()
  );
  expect(text.parseOnly(parser, "   ab12cd")).toEqual({
    type: ResultType.Done,
    rest: "",
    value: [undefined, undefined, "12", undefined]
  });
});

test("takeAll should wait for the end of the input", () => {
  const parser = text.takeAll();
  expect(text.parse(parser, "ab").type).toBe(ResultType.Suspended);
  expect(text.parseFeedSync(feed(["cd", "e"]), parser, "ab")).toEqual({
    type: ResultType.Done,
    rest: "",
    value: "abcde"
  });
});

test("many should return an empty array when its parser fails right away", () => {
  expect(
    text.value(text.sequence(text.many(text.element("x")), text.takeAll()), "abc")
  ).toEqual([[], "abc"]);
  expect(
    text.value(text.sequence(text.many(text.fail("nope")), text.takeAll()), "abc")
  ).toEqual([[], "abc"]);
});

test("many and some should stop on a success that consumed nothing", () => {
  expect(text.value(text.many(text.pure(1)), "abc")).toEqual([1]);
  expect(text.value(text.some(text.satisfy(isDigit)), "12a")).toEqual([
    "1",
    "2"
  ]);
  expect(text.parseOnly(text.some(text.satisfy(isDigit, "a digit")), "a")).toEqual({
    type: ResultType.Failed,
    error: { type: ErrorType.PredicateFailed, description: "a digit" },
    buffer: "a",
    offset: 0
  });
});

test("optional should restore the offset when its parser fails", () => {
  const parser = text.sequence(text.optional(text.elements("abd")), text.takeAll());
  expect(text.value(parser, "abcdef")).toEqual([undefined, "abcdef"]);
  expect(
    text.value(text.optional(text.take(2)).map(value => value ?? "none"), "a")
  ).toBe("none");
});

test("repeat should respect its range", () => {
  const letter = text.satisfy(char => /[a-z]/.test(char));
  const parser = text.sequence(text.repeat(exactly(twice), letter), text.takeAll());
  expect(text.value(parser, "ab1")).toEqual([["a", "b"], "1"]);
  expect(text.value(parser, "abc")).toEqual([["a", "b"], "c"]);
  expect(text.parseOnly(text.repeat(exactly(3), letter), "ab1")).toEqual({
    type: ResultType.Failed,
    error: { type: ErrorType.RangeUnmet, range: exactly(3), matched: 2 },
    buffer: "ab1",
    offset: 2
  });
  expect(text.value(text.repeat(between(0, 2), letter), "1")).toEqual([]);
  expect(text.value(text.repeat(between(1, 2), letter), "abc")).toEqual([
    "a",
    "b"
  ]);
});

test("Repetitions should not grow the stack with the number of matches", () => {
  const digit = text.satisfy(isDigit);
  const digits = "1".repeat(100000);

  const many = text.parseOnly(text.many(digit), digits);
  if (many.type !== ResultType.Done) throw new Error("Expected a success");
  expect(many.value).toHaveLength(100000);
  expect(many.rest).toBe("");

  expect(text.value(text.some(digit), digits)).toHaveLength(100000);

  const repeated = text.parseOnly(
    text.repeat(between(0, 100000), digit),
    `${digits}a`
  );
  if (repeated.type !== ResultType.Done)
    throw new Error("Expected a success");
  expect(repeated.value).toHaveLength(100000);
  expect(repeated.rest).toBe("a");

  expect(text.parseOnly(text.repeat(exactly(100001), digit), digits)).toEqual({
    type: ResultType.Failed,
    error: {
      type: ErrorType.RangeUnmet,
      range: exactly(100001),
      matched: 100000
    },
    buffer: digits,
    offset: 100000
  });
});

test("Repetitions should keep their values across chunks", () => {
  const chunks = Array.from({ length: 100 }, () => "1".repeat(1000));
  const result = text.parseFeedSync(
    feed(chunks),
    text.many(text.satisfy(isDigit)),
    ""
  );
  if (result.type !== ResultType.Done) throw new Error("Expected a success");
  expect(result.value).toHaveLength(100000);
  expect(chunks).toEqual([]);
});

test("alternative should backtrack with the data fed in the meantime", () => {
  const parser = text.alternative(
    text.elements("abd").map(() => 1),
    text.elements("abc").map(() => 2)
  );
  expect(text.parseFeedSync(feed(["c"]), parser, "ab")).toEqual({
    type: ResultType.Done,
    rest: "",
    value: 2
  });
  expect(text.parseOnly(text.element("x").or(text.element("y")), "z")).toEqual({
    type: ResultType.Failed,
    error: { type: ErrorType.ElementMismatch, expected: "y", actual: "z" },
    buffer: "z",
    offset: 0
  });
  expect(() => text.alternative()).toThrow(
    "An alternative needs at least one parser"
  );
});

test("chain, then and before should sequence parsers", () => {
  const length = text.satisfy(isDigit).map(Number);
  const sized = length.chain(count => text.take(count));
  expect(text.parseOnly(sized, "3abcd")).toEqual({
    type: ResultType.Done,
    rest: "d",
    value: "abc"
  });
  const quoted = text
    .element('"')
    .then(text.takeWhile(char => char !== '"'))
    .before(text.element('"'));
  expect(text.value(quoted, '"hi" there')).toBe("hi");
});

test("Rules should allow recursive grammars", () => {
  const nested = text.rule<number>("nested");
  nested.parser = text.alternative(
    text
      .element("(")
      .then(nested)
      .before(text.element(")"))
      .map(depth => depth + 1),
    text.pure(0)
  );
  expect(text.value(nested, "((()))")).toBe(3);
  expect(text.parseFeedSync(feed(["(", "))", ")"]), nested, "((")).toEqual({
    type: ResultType.Done,
    rest: "",
    value: 3
  });
  expect(() => text.parseOnly(text.rule("empty"), "x")).toThrow(
    'Cannot run rule "empty" with undefined child parser'
  );
});

test("endOfInput should only succeed once the input is over", () => {
  const parser = text.take(2).before(text.endOfInput());
  expect(text.value(parser, "ab")).toBe("ab");
  expect(text.parseOnly(parser, "abc")).toEqual({
    type: ResultType.Failed,
    error: { type: ErrorType.PredicateFailed, description: "end of input" },
    buffer: "abc",
    offset: 2
  });
});

test("List inputs should be parsed element by element", () => {
  const tokens = list<string>();
  const binding = tokens.sequence(
    tokens.element("let"),
    tokens.anyElement(),
    tokens.element("=")
  );
  expect(tokens.parseOnly(binding, ["let", "x", "=", "1"])).toEqual({
    type: ResultType.Done,
    rest: ["1"],
    value: [undefined, "x", undefined]
  });
  expect(parseOnly(binding, ["let", "x", "=", "1"]).type).toBe(ResultType.Done);
});

test("Named parsers should emit trace events", () => {
  const tracer = jest.fn();
  const word = text.takeWhile(char => char !== " ").named("word");
  text.parseOnly(word, "hi there", { trace: true, tracer });
  expect(tracer).toHaveBeenCalledTimes(2);
  expect(tracer).toHaveBeenNthCalledWith(1, {
    type: TraceEventType.Enter,
    rule: "word",
    offset: 0
  });
  expect(tracer).toHaveBeenNthCalledWith(2, {
    type: TraceEventType.Match,
    rule: "word",
    offset: 0,
    to: 2,
    value: "hi"
  });

  tracer.mockClear();
  text.parseOnly(text.element("x").named("x"), "y", { trace: true, tracer });
  expect(tracer).toHaveBeenNthCalledWith(2, {
    type: TraceEventType.Fail,
    rule: "x",
    offset: 0,
    error: { type: ErrorType.ElementMismatch, expected: "x", actual: "y" }
  });

  tracer.mockClear();
  text.parseOnly(word, "hi there", { tracer });
  expect(tracer).not.toHaveBeenCalled();
});

test("consoleTracer should log one line per event", () => {
  const log = jest.spyOn(console, "log").mockImplementation(() => undefined);
  text.parseOnly(text.take(1).named("one"), "a", { trace: true });
  expect(log).toHaveBeenNthCalledWith(1, "Entered", '"one"', "at 0");
  expect(log).toHaveBeenNthCalledWith(2, "Matched", '"one"', "from 0 to 1");
  consoleTracer({
    type: TraceEventType.Fail,
    rule: "one",
    offset: 4,
    error: { type: ErrorType.IncompleteAtEOF }
  });
  expect(log).toHaveBeenNthCalledWith(3, "Failed", '"one"', "at 4");
  log.mockRestore();
});

class Stubborn extends Parser<TextFamily, undefined> {
  _run<R>(
    buffer: string,
    offset: number,
    _: More,
    __: Failure<TextFamily, R>,
    success: Success<TextFamily, undefined, R>,
    options: Options<TextFamily>
  ): Result<TextFamily, R> {
    return refill(buffer, options, buffer =>
      refill(buffer, options, buffer =>
        success(buffer, offset, More.NoMoreWillArrive, undefined)
      )
    );
  }
}

test("A parser that keeps asking for data past the end should be incomplete", () => {
  expect(text.parseOnly(new Stubborn(), "abc")).toEqual({
    type: ResultType.Failed,
    error: { type: ErrorType.IncompleteAtEOF },
    buffer: "abc",
    offset: 3
  });
});

test("A suspension should not be resumed twice", () => {
  const result = text.parse(text.take(5), "abc");
  expect(resumed(result, "de")).toEqual({
    type: ResultType.Done,
    rest: "",
    value: "abcde"
  });
  expect(() => resumed(result, "de")).toThrow(
    "Suspended parse has already been resumed"
  );
});
