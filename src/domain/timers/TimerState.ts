import type { Timestamp } from "./Timestamp";

export type TimerStateValue = "UNSTARTED" | "RUNNING" | "STOPPED";

export function timerState(startedAt: Timestamp | undefined, stoppedAt: Timestamp | undefined): TimerStateValue {
  if (startedAt === undefined) return "UNSTARTED";
  return stoppedAt === undefined ? "RUNNING" : "STOPPED";
}
