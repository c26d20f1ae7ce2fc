import fs from 'fs';
import path from 'path';
import { parse } from 'dotenv';

export interface TimerEnv {
  hires?: boolean;
  string?: string;
  hms?: string;
}

/**
 * Parses a `.env` file without copying it into `process.env`; the host
 * application's environment is left as it was.
 */
export function loadDotenvFile(file: string = path.resolve(process.cwd(), '.env')): Record<string, string> {
  if (!fs.existsSync(file)) return {};
  return parse(fs.readFileSync(file, 'utf8'));
}

function parseFlag(value: string | undefined): boolean | undefined {
  if (value === 'true') return true;
  if (value === 'false') return false;
  return undefined;
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function readTimerEnv(env: NodeJS.ProcessEnv = process.env): TimerEnv {
  return {
    hires: parseFlag(env.TIMER_HIRES),
    string: nonEmpty(env.TIMER_STRING_FORMAT),
    // templates keep their surrounding whitespace
    hms: env.TIMER_HMS_FORMAT || undefined,
  };
}

// process.env wins over .env, as with dotenv's own loader
export const TIMER_ENV: TimerEnv = readTimerEnv({ ...loadDotenvFile(), ...process.env });
