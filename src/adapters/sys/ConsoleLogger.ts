import type { LoggerPort } from "../../ports/sys/LoggerPort";

export function formatLogLine(scope: string, message: string, meta?: Record<string, unknown>): string {
  const line = `[${scope}] ${message}`;
  return meta && Object.keys(meta).length ? `${line} ${JSON.stringify(meta)}` : line;
}

/** Writes timer diagnostics to the console, tagged with a scope such as `timer`. */
export class ConsoleLogger implements LoggerPort {
  constructor(private readonly scope = "timer") {}

  debug(message: string, meta?: Record<string, unknown>): void {
    console.debug(formatLogLine(this.scope, message, meta));
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    console.warn(formatLogLine(this.scope, message, meta));
  }
}
