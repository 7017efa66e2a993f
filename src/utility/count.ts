// Repetition counts

export enum CountType {
  Never = "NEVER",
  Once = "ONCE",
  Twice = "TWICE",
  Other = "OTHER"
}

export type Count =
  | Readonly<{ type: CountType.Never }>
  | Readonly<{ type: CountType.Once }>
  | Readonly<{ type: CountType.Twice }>
  | Readonly<{ type: CountType.Other; n: number }>;

export const never: Count = { type: CountType.Never };
export const once: Count = { type: CountType.Once };
export const twice: Count = { type: CountType.Twice };

/**
 * Converts a number to a count, negative numbers being clamped to never
 */

export function countOf(n: number): Count {
  if (!Number.isInteger(n))
    throw new RangeError(`Invalid repetition count ${n}`);
  if (n <= 0) return never;
  if (n === 1) return once;
  if (n === 2) return twice;
  return { type: CountType.Other, n };
}

export function countValue(count: Count) {
  switch (count.type) {
    case CountType.Never:
      return 0;
    case CountType.Once:
      return 1;
    case CountType.Twice:
      return 2;
    case CountType.Other:
      return Math.max(count.n, 0);
  }
}

/**
 * Saturates at never
 */

export function predecessor(count: Count) {
  return countOf(Math.max(countValue(count) - 1, 0));
}

export function successor(count: Count) {
  return countOf(countValue(count) + 1);
}

export function describeCount(count: Count) {
  switch (count.type) {
    case CountType.Never:
      return "never";
    case CountType.Once:
      return "once";
    case CountType.Twice:
      return "twice";
    case CountType.Other:
      return `${count.n} times`;
  }
}

// Repetition ranges

export enum RangeType {
  Exactly = "EXACTLY",
  Between = "BETWEEN"
}

export type Range =
  | Readonly<{ type: RangeType.Exactly; count: Count }>
  | Readonly<{ type: RangeType.Between; min: Count; max: Count }>;

function castCount(count: Count | number) {
  return countOf(typeof count === "number" ? count : countValue(count));
}

export function exactly(count: Count | number): Range {
  return { type: RangeType.Exactly, count: castCount(count) };
}

export function between(min: Count | number, max: Count | number): Range {
  const [from, to] = [castCount(min), castCount(max)];
  if (countValue(from) > countValue(to))
    throw new RangeError(
      `Invalid repetition range [${countValue(from)}, ${countValue(to)}]`
    );
  return { type: RangeType.Between, min: from, max: to };
}

/**
 * True when no more repetition is allowed
 */

export function shouldStop(range: Range) {
  return range.type === RangeType.Exactly
    ? countValue(range.count) === 0
    : countValue(range.max) === 0;
}

/**
 * True when the lower bound is already satisfied
 */

export function canStop(range: Range) {
  return range.type === RangeType.Exactly
    ? countValue(range.count) === 0
    : countValue(range.min) === 0;
}

export function decrement(range: Range): Range {
  return range.type === RangeType.Exactly
    ? { type: RangeType.Exactly, count: predecessor(range.count) }
    : {
        type: RangeType.Between,
        min: predecessor(range.min),
        max: predecessor(range.max)
      };
}

export function describeRange(range: Range) {
  return range.type === RangeType.Exactly
    ? `exactly ${describeCount(range.count)}`
    : `between ${describeCount(range.min)} and ${describeCount(range.max)}`;
}
