/**
 * Base class for stopwatch errors.
 */
export abstract class TimerError extends Error {
  abstract readonly code: string;

  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

export class NotStartedError extends TimerError {
  readonly code = "NOT_STARTED";

  constructor() {
    super("Timer never started");
  }
}

export class UnknownFormatError extends TimerError {
  readonly code = "UNKNOWN_FORMAT";

  constructor(public readonly format: string) {
    super(`Unknown format: ${format}`);
  }
}
