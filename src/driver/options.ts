import { Family, Source, sourceOf } from "../source";
import { consoleTracer, Options } from "../parser";

export function defaultOptions(): Omit<Options<Family>, "source"> {
  return {
    tracer: consoleTracer,
    trace: false
  };
}

/**
 * Merges partial options over the defaults, entries set to undefined keep
 * their default
 */

export function buildOptions<F extends Family>(
  source: Source<F>,
  partialOptions?: Partial<Options<F>>
): Options<F> {
  const defaults = defaultOptions();
  return {
    source: partialOptions?.source ?? source,
    tracer: partialOptions?.tracer ?? defaults.tracer,
    trace: partialOptions?.trace ?? defaults.trace
  };
}

/**
 * Builds the options of a run, picking the source from the input when none is given
 */

export function resolveOptions(
  input: unknown,
  partialOptions?: Partial<Options<Family>>
): Options<Family> {
  return buildOptions(partialOptions?.source ?? sourceOf(input), partialOptions);
}
