import { Family, Input, Source } from "../source";
import { More, ParseError, Result } from "../result";

export type Failure<F extends Family, R> = (
  buffer: Input<F>,
  offset: number,
  more: More,
  error: ParseError<F>
) => Result<F, R>;

export type Success<F extends Family, V, R> = (
  buffer: Input<F>,
  offset: number,
  more: More,
  value: V
) => Result<F, R>;

export interface Options<F extends Family> {
  source: Source<F>;
  tracer: Tracer;
  trace: boolean;
}

// Trace events

export enum TraceEventType {
  Enter = "ENTER",
  Match = "MATCH",
  Fail = "FAIL"
}

export type TraceEvent = EnterEvent | MatchEvent | FailEvent;

export interface EnterEvent extends TraceCommon {
  type: TraceEventType.Enter;
}

export interface MatchEvent extends TraceCommon {
  type: TraceEventType.Match;
  to: number;
  value: unknown;
}

export interface FailEvent extends TraceCommon {
  type: TraceEventType.Fail;
  error: ParseError<Family>;
}

export interface TraceCommon {
  rule: string;
  offset: number;
}

export type Tracer = (event: TraceEvent) => void;
