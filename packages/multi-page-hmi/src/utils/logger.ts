/**
 * Logger utility
 */

import pino from 'pino';
import { z } from 'zod';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export const LoggingConfigSchema = z.object({
  level: z.enum(LOG_LEVELS).default('info'),
  pretty: z.boolean().default(false),
  file: z.string().min(1).optional(),
});

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

export interface LoggerOptions extends Partial<LoggingConfig> {
  name?: string;
}

export type Logger = pino.Logger;

/**
 * Create a logger instance
 *
 * `pretty` routes through the pino-pretty transport, `file` writes
 * newline delimited JSON to the given path. Otherwise JSON goes to stdout.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const config = LoggingConfigSchema.parse(options);
  const base = { name: options.name ?? 'multi-page-hmi', level: config.level };

  if (config.pretty) {
    return pino({
      ...base,
      transport: {
        target: 'pino-pretty',
        options: { colorize: true, destination: config.file ?? 1 },
      },
    });
  }

  if (config.file) {
    return pino(base, pino.destination({ dest: config.file, sync: true, mkdir: true }));
  }

  return pino(base);
}
