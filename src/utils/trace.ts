export type TraceFn = (tag: string, message: string) => void;

export const noTrace: TraceFn = () => {};

// "[TAG] message" lines, or nothing when disabled
export function makeTracer(enabled: boolean, sink: (line: string) => void = consoleSink): TraceFn {
  if (!enabled) return noTrace;
  return (tag, message) => sink(`[${tag}] ${message}`);
}

function consoleSink(line: string): void {
  // eslint-disable-next-line no-console
  console.log(line);
}
