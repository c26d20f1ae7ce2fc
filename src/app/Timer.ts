import { sprintf } from "sprintf-js";
import { ConsoleLogger } from "../adapters/sys/ConsoleLogger";
import { NodeTime } from "../adapters/sys/NodeTime";
import { NotStartedError } from "../domain/timers/errors";
import {
  defaultFormatSpec,
  formatSeconds,
  renderHMS,
  separateIntoHMS,
  type HmsParts,
} from "../domain/timers/hms";
import {
  isStringFormatName,
  resolveStringFormat,
  type NamedFormat,
  type StringFormatOption,
} from "../domain/timers/StringFormat";
import { copyTimestamp, intervalSeconds, type Timestamp } from "../domain/timers/Timestamp";
import { timerState, type TimerStateValue } from "../domain/timers/TimerState";
import { TIMER_ENV, type TimerEnv } from "../env";
import type { LoggerPort } from "../ports/sys/LoggerPort";
import type { TimePort } from "../ports/sys/TimePort";

export type TimerFormat = StringFormatOption<Timer>;

export interface TimerOptions {
  /** Start the clock on construction. Defaults to true. */
  start?: boolean;
  /** Use the fine-grained clock when the runtime has one. Defaults to `TIMER_HIRES`, else true. */
  hires?: boolean;
  /** sprintf template for `hms()`, filled with hours, minutes and seconds. */
  hms?: string;
  /** Default format for `toDisplayString()`. Defaults to `"short"`. */
  string?: TimerFormat;
  /** @deprecated Use `hms` (or `string`). */
  format?: string;
  time?: TimePort;
  logger?: LoggerPort;
  env?: TimerEnv;
}

/**
 * Stopwatch. Starts on construction unless `start: false` is given.
 *
 * In string contexts (template literals, `String(timer)`) it renders as
 * `toDisplayString()`; in numeric ones (`+timer`, `Number(timer)`) it is the
 * elapsed seconds, so `+a + +b` sums two timers.
 */
export class Timer {
  readonly usesFineGrainedClock: boolean;
  readonly hmsFormat: string;
  readonly stringFormat: TimerFormat;

  private readonly time: TimePort;
  private readonly logger: LoggerPort;
  private started?: Timestamp;
  private stopped?: Timestamp;

  constructor(options: TimerOptions = {}) {
    const env = options.env ?? TIMER_ENV;
    this.time = options.time ?? new NodeTime();
    this.logger = options.logger ?? new ConsoleLogger();

    const requested = options.hires ?? env.hires ?? true;
    this.usesFineGrainedClock = requested && this.time.supportsFineGrainedClock();
    if (options.hires === true && !this.usesFineGrainedClock) {
      this.logger.debug("Fine-grained clock unavailable; timing in whole seconds");
    }

    if (options.format) {
      this.logger.warn("Timer option 'format' is deprecated. Use 'hms' (or 'string')", { option: "format" });
    }
    this.hmsFormat = options.hms || options.format || env.hms || defaultFormatSpec(this.usesFineGrainedClock);
    this.stringFormat = options.string ?? this.envStringFormat(env.string) ?? "short";

    if (options.start ?? true) {
      this.start();
    }
  }

  /** Recorded start time; a copy, so editing it does not move the timer. */
  get startedAt(): Timestamp | undefined {
    return copyTimestamp(this.started);
  }

  get stoppedAt(): Timestamp | undefined {
    return copyTimestamp(this.stopped);
  }

  get state(): TimerStateValue {
    return timerState(this.started, this.stopped);
  }

  /** Current time in this timer's resolution. */
  now(): Timestamp {
    return this.time.now(this.usesFineGrainedClock);
  }

  start(): this {
    this.stopped = undefined;
    this.started = this.now();
    return this;
  }

  restart(): this {
    return this.start();
  }

  /**
   * Records the stop time (once; later calls keep the first one) and returns
   * the elapsed seconds. Throws without recording anything if never started.
   */
  stop(): number {
    if (this.started === undefined) {
      throw new NotStartedError();
    }
    if (this.stopped === undefined) {
      this.stopped = this.now();
    }
    return this.elapsed();
  }

  /** Seconds since `start()`, up to the stop time when stopped. */
  elapsed(): number {
    if (this.started === undefined) {
      throw new NotStartedError();
    }
    return intervalSeconds(this.started, this.stopped ?? this.now());
  }

  hmsParts(): HmsParts {
    return separateIntoHMS(this.elapsed());
  }

  hms(format?: string): string {
    return renderHMS(format || this.hmsFormat, this.hmsParts());
  }

  /**
   * Renders the elapsed time. `format` is a custom function, a method name
   * (`"elapsed"`, `"hms"`) or one of:
   * - `short`: `123s (00:02:03)`
   * - `rps`: `4.743616s (0.211/s)`
   * - `human`: `6 hours 4 minutes 12 seconds`
   * - `full`: `2 seconds (0 hours 0 minutes 2 seconds)`
   */
  toDisplayString(format?: TimerFormat | string): string {
    // an empty name means the configured default, as in hms()
    const resolved = resolveStringFormat<Timer>(format || this.stringFormat);
    if (resolved.kind === "custom") {
      const value = resolved.render(this);
      return typeof value === "number" ? formatSeconds(value) : value;
    }
    if (resolved.kind === "method") {
      return resolved.method === "hms" ? this.hms() : formatSeconds(this.elapsed());
    }

    // one sample so every part of the output agrees while still running
    return this.renderNamed(resolved.kind, this.elapsed());
  }

  toString(): string {
    return this.toDisplayString();
  }

  valueOf(): number {
    return this.elapsed();
  }

  [Symbol.toPrimitive](hint: string): string | number {
    return hint === "number" ? this.elapsed() : this.toDisplayString();
  }

  private renderNamed(kind: NamedFormat, seconds: number): string {
    switch (kind) {
      case "short":
        return `${formatSeconds(seconds)}s (${renderHMS(this.hmsFormat, separateIntoHMS(seconds))})`;
      case "rps": {
        const fixed = sprintf("%.6f", seconds);
        const rate = Number(fixed) === 0 ? "??" : sprintf("%.3f", 1 / Number(fixed));
        return `${fixed}s (${rate}/s)`;
      }
      case "human":
        return humanize(seconds);
      case "full":
        return `${formatSeconds(seconds)} seconds (${humanize(seconds)})`;
    }
  }

  private envStringFormat(name: string | undefined): TimerFormat | undefined {
    if (name === undefined) return undefined;
    if (isStringFormatName(name)) return name;
    this.logger.warn(`Ignoring unknown TIMER_STRING_FORMAT "${name}"`, { format: name });
    return undefined;
  }
}

function humanize(seconds: number): string {
  const [h, m, s] = separateIntoHMS(seconds);
  return sprintf("%d hours %d minutes %s seconds", h, m, formatSeconds(s));
}
