/**
 * Pick a high-resolution timer.
 * Prefers performance.now() when available, falls back to Date.now().
 */
export const clockFrom = (perf: { now(): number } | undefined): (() => number) =>
  perf && typeof perf.now === 'function' ? () => perf.now() : () => Date.now();

export const nowMs = clockFrom(
  typeof globalThis !== 'undefined' ? globalThis.performance : undefined
);

/** Convert milliseconds to nanoseconds for the instrumentation hook */
export const toNs = (ms: number) => Math.round(ms * 1_000_000);
