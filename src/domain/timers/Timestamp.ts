export const MICROS_PER_SECOND = 1_000_000;

/** Wall-clock time split like `gettimeofday`: whole seconds plus microseconds. */
export interface PreciseTimestamp {
  readonly seconds: number;
  readonly microseconds: number;
}

/** Whole seconds since the epoch (coarse clock) or a precise pair (fine-grained clock). */
export type Timestamp = number | PreciseTimestamp;

export function isPreciseTimestamp(value: Timestamp): value is PreciseTimestamp {
  return typeof value !== "number";
}

export function fromEpochMicros(epochMicros: number): PreciseTimestamp {
  const seconds = Math.floor(epochMicros / MICROS_PER_SECOND);
  return { seconds, microseconds: epochMicros - seconds * MICROS_PER_SECOND };
}

function split(value: Timestamp): PreciseTimestamp {
  return isPreciseTimestamp(value) ? value : { seconds: value, microseconds: 0 };
}

/**
 * Seconds between two timestamps. Works in whole microseconds so a borrow
 * across the second boundary gives the exact decimal interval.
 */
export function intervalSeconds(from: Timestamp, to: Timestamp): number {
  if (!isPreciseTimestamp(from) && !isPreciseTimestamp(to)) {
    return to - from;
  }
  const a = split(from);
  const b = split(to);
  const micros = (b.seconds - a.seconds) * MICROS_PER_SECOND + (b.microseconds - a.microseconds);
  return micros / MICROS_PER_SECOND;
}

export function copyTimestamp(value: Timestamp | undefined): Timestamp | undefined {
  return value === undefined || !isPreciseTimestamp(value) ? value : { ...value };
}
