import { vsprintf } from "sprintf-js";
import { hasFineGrainedClock } from "../../runtime/hires";

export type HmsParts = [hours: number, minutes: number, seconds: number];

/** Splits seconds into whole hours, whole minutes and the (possibly fractional) rest. */
export function separateIntoHMS(totalSeconds: number): HmsParts {
  let seconds = totalSeconds;
  const hours = Math.floor(seconds / 3600);
  seconds -= hours * 3600;
  const minutes = Math.floor(seconds / 60);
  seconds -= minutes * 60;
  return [hours, minutes, seconds];
}

/**
 * sprintf template for hours, minutes and seconds. Fractional specs print six
 * decimals (`00:00:00.000000`), whole ones `00:00:00`. Defaults to whether a
 * fine-grained clock is available.
 */
export function defaultFormatSpec(fractional: boolean = hasFineGrainedClock()): string {
  // width 9 = 2 digits + dot + 6 decimals
  return "%02d:%02d:" + (fractional ? "%09.6f" : "%02d");
}

export function renderHMS(template: string, parts: HmsParts): string {
  return vsprintf(template, parts);
}

export function formatHMS(totalSeconds: number): string;
export function formatHMS(hours: number, minutes: number, seconds: number): string;
export function formatHMS(first: number, minutes?: number, seconds?: number): string {
  const parts: HmsParts =
    minutes === undefined || seconds === undefined ? separateIntoHMS(first) : [first, minutes, seconds];
  return renderHMS(defaultFormatSpec(!Number.isInteger(parts[2])), parts);
}

/** Default number rendering: 15 significant digits, no trailing float noise. */
export function formatSeconds(value: number): string {
  return String(Number(value.toPrecision(15)));
}
