export { Timer, type TimerFormat, type TimerOptions } from "./app/Timer";
export { NotStartedError, TimerError, UnknownFormatError } from "./domain/timers/errors";
export {
  defaultFormatSpec,
  formatHMS,
  separateIntoHMS,
  type HmsParts,
} from "./domain/timers/hms";
export type { CustomFormat, MethodFormat, NamedFormat } from "./domain/timers/StringFormat";
export type { PreciseTimestamp, Timestamp } from "./domain/timers/Timestamp";
export type { TimerStateValue } from "./domain/timers/TimerState";
export { hasFineGrainedClock, probeFineGrainedClock } from "./runtime/hires";
export { NodeTime } from "./adapters/sys/NodeTime";
export { ConsoleLogger } from "./adapters/sys/ConsoleLogger";
export type { LoggerPort } from "./ports/sys/LoggerPort";
export type { TimePort } from "./ports/sys/TimePort";
export { readTimerEnv, type TimerEnv } from "./env";
