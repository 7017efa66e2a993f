import { codeFrameColumns } from "@babel/code-frame";
import lineColumn from "line-column";
import { isString } from "lodash";
import { Family, Source } from "../source";
import { errorMessage, FinalResult, ResultType } from "../result";

/**
 * class Report
 *
 * Stores the final result of a run along with the source it was read with.
 */

export class Report<F extends Family, V> {
  readonly result: FinalResult<F, V>;
  readonly source: Source<F>;

  constructor(result: FinalResult<F, V>, source: Source<F>) {
    this.result = result;
    this.source = source;
  }

  get success() {
    return this.result.type === ResultType.Done;
  }

  /**
   * Renders a failure. Text inputs get a line and column and a code frame,
   * other inputs only the offset.
   */

  log() {
    const { result } = this;
    if (result.type === ResultType.Done) return "";
    const message = `Failure: ${errorMessage(result.error, this.source)}`;
    const { buffer, offset } = result;
    if (!isString(buffer)) return `(${offset}) ${message}`;

    const overflow = offset >= buffer.length;
    const position = lineColumn(buffer).fromIndex(
      overflow ? buffer.length - 1 : offset
    );
    if (!position) return `(${offset}) ${message}`;
    const column = position.col + (overflow ? 1 : 0);

    return [
      `(${position.line}:${column}) ${message}`,
      codeFrameColumns(buffer, { start: { line: position.line, column } })
    ].join("\n");
  }
}
