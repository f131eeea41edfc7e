import { getConfig, useDefaultConfig, type LogLevel } from '../config/index.js';
import { ConfigurationError } from '../core/errors.js';

type LogContext = Record<string, unknown>;

type LoggerFn = (message: string, context?: LogContext) => void;

type EmitLevel = Exclude<LogLevel, 'silent'>;

const LEVEL_RANK: Record<LogLevel, number> = {
  silent: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
};

/**
 * Level from the configuration. An invalid level in the environment never
 * fails the caller: the defaults are cached and a warning is logged once.
 */
function configuredLevel(): LogLevel {
  try {
    return getConfig().logLevel;
  } catch (error) {
    if (!(error instanceof ConfigurationError)) throw error;
    const fallback = useDefaultConfig();
    logWarning(`[config] ${error.message}; using log level "${fallback.logLevel}"`);
    return fallback.logLevel;
  }
}

export function isLevelEnabled(level: EmitLevel): boolean {
  return LEVEL_RANK[level] <= LEVEL_RANK[configuredLevel()];
}

const emit = (level: EmitLevel, message: string, context?: LogContext): void => {
  if (!isLevelEnabled(level)) return;
  // Callers may reserve stdout for rendered INI text; logs stay on stderr.
  const logger = level === 'warn' ? console.warn : console.error;
  if (context && Object.keys(context).length > 0) {
    logger(message, context);
    return;
  }
  logger(message);
};

export const logWarning: LoggerFn = (message, context) => emit('warn', message, context);
export const logError: LoggerFn = (message, context) => emit('error', message, context);
export const logDebug: LoggerFn = (message, context) => emit('debug', message, context);
