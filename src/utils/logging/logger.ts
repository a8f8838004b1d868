/**
 * Application logger
 *
 * Operational messages (retries, MCP connections, server lifecycle) go to
 * stderr through pino so they never mix with chat output on stdout.
 */

import pino from 'pino';
import { z } from 'zod';

const LevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);
export type LogLevel = z.infer<typeof LevelSchema>;

export interface LoggerOptions {
  /** Defaults to LOG_LEVEL, or 'silent' under NODE_ENV=test */
  level?: LogLevel;

  /** Logger name shown with each record */
  name?: string;

  /** Human-readable output through pino-pretty (default: stderr is a TTY) */
  pretty?: boolean;
}

export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  if (env.NODE_ENV === 'test') {
    return 'silent';
  }
  return LevelSchema.catch('info').parse(env.LOG_LEVEL?.toLowerCase());
}

export function createLogger(options: LoggerOptions = {}): pino.Logger {
  const { level = resolveLogLevel(), name = 'ponder', pretty = Boolean(process.stderr.isTTY) } = options;

  if (pretty && level !== 'silent') {
    return pino({
      name,
      level,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss',
          ignore: 'pid,hostname',
          destination: 2,
        },
      },
    });
  }

  return pino({ name, level }, pino.destination(2));
}

/** Shared process-wide logger */
export const logger = createLogger();
