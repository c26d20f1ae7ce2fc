export interface FineClockSource {
  readonly timeOrigin?: number;
  now?: () => number;
}

/** Uncached check: the source must report a finite epoch origin and a finite offset. */
export function probeFineGrainedClock(
  source: FineClockSource | undefined = globalThis.performance
): boolean {
  if (!source || typeof source.now !== "function") return false;
  return Number.isFinite(source.timeOrigin) && Number.isFinite(source.now());
}

/** Runs `compute` on the first call only; later calls return the cached result. */
export function once<T>(compute: () => T): () => T {
  let cached: { value: T } | undefined;
  return () => {
    if (!cached) {
      cached = { value: compute() };
    }
    return cached.value;
  };
}

/** Sub-second clock availability, probed on first use and cached for the process. */
export const hasFineGrainedClock: () => boolean = once(() => probeFineGrainedClock());
