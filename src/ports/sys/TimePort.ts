import type { Timestamp } from "../../domain/timers/Timestamp";

export interface TimePort {
  /** Whether `now(true)` can return sub-second values. */
  supportsFineGrainedClock(): boolean;
  now(fineGrained: boolean): Timestamp;
}
