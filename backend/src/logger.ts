import { pino } from 'pino';
import { z } from 'zod';

export const logLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);
export type LogLevel = z.infer<typeof logLevelSchema>;

/** Level used before settings load; an unknown value is rejected later by `loadSettings`. */
export function levelFromEnv(raw: string | undefined): LogLevel {
  const parsed = logLevelSchema.safeParse(raw);
  return parsed.success ? parsed.data : 'info';
}

export const logger = pino({ level: levelFromEnv(process.env.LOG_LEVEL) });
