/** Diagnostics a timer emits; neither level ever interrupts timing. */
export interface LoggerPort {
  debug(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
}
