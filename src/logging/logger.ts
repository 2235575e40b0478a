/**
 * Logger Factory
 * Structured pino loggers with trace/correlation bindings
 */

import { pino, type Logger, type LevelWithSilent } from 'pino';

export type { Logger };

export type LogLevel = LevelWithSilent;

export interface LoggerConfig {
  /** Component name, bound to every line as `component` */
  name?: string;
  /** Defaults to LOG_LEVEL, then `info` */
  level?: LogLevel;
  /** Extra bindings included in every line */
  base?: Record<string, unknown>;
}

const LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

export function resolveLogLevel(value: string | undefined): LogLevel {
  const normalized = value?.toLowerCase();
  return LEVELS.find((level) => level === normalized) ?? 'info';
}

/**
 * Create a pino logger instance
 */
export function createLogger(config: LoggerConfig = {}): Logger {
  return pino({
    level: config.level ?? resolveLogLevel(process.env.LOG_LEVEL),
    base: {
      service: 'planwire',
      ...(config.name ? { component: config.name } : {}),
      ...config.base,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

/**
 * Create a child logger with additional context
 */
export function createChildLogger(parent: Logger, bindings: Record<string, unknown>): Logger {
  return parent.child(bindings);
}
