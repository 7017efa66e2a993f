import { TraceEventType, Tracer } from ".";

/**
 * A generic predefined tracer to quickly debug a grammar
 * @param event
 */

export const consoleTracer: Tracer = event => {
  let adjective = "";
  let complement = "";
  switch (event.type) {
    case TraceEventType.Enter:
      adjective = "Entered";
      complement = `at ${event.offset}`;
      break;
    case TraceEventType.Match:
      adjective = "Matched";
      complement = `from ${event.offset} to ${event.to}`;
      break;
    case TraceEventType.Fail:
      adjective = "Failed";
      complement = `at ${event.offset}`;
      break;
  }
  console.log(adjective, `"${event.rule}"`, complement);
};
