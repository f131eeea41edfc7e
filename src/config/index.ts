/**
 * @fileoverview Runtime configuration
 *
 * Configuration is read from the environment and validated with zod:
 * - `INI_ROUNDTRIP_LOG_LEVEL`: `silent` | `error` | `warn` | `info` | `debug` (default `warn`)
 */

import { z } from 'zod';
import { ConfigurationError } from '../core/errors.js';

export const LOG_LEVELS = ['silent', 'error', 'warn', 'info', 'debug'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export const LOG_LEVEL_ENV = 'INI_ROUNDTRIP_LOG_LEVEL';

const ConfigSchema = z.object({
  logLevel: z.enum(LOG_LEVELS).default('warn'),
});

export type IniRoundtripConfig = Readonly<z.infer<typeof ConfigSchema>>;

export const DEFAULT_CONFIG: IniRoundtripConfig = Object.freeze(ConfigSchema.parse({}));

/**
 * Build a validated configuration from environment variables.
 * Empty variables count as unset.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): IniRoundtripConfig {
  const rawLevel = env[LOG_LEVEL_ENV]?.trim().toLowerCase();
  const parsed = ConfigSchema.safeParse({
    logLevel: rawLevel && rawLevel.length > 0 ? rawLevel : undefined,
  });
  if (!parsed.success) {
    throw new ConfigurationError(
      LOG_LEVEL_ENV,
      `expected one of ${LOG_LEVELS.join(', ')}, got "${env[LOG_LEVEL_ENV] ?? ''}"`,
    );
  }
  return Object.freeze(parsed.data);
}

let cachedConfig: IniRoundtripConfig | null = null;

/**
 * Cached configuration from `process.env`.
 *
 * @throws ConfigurationError when the environment is invalid and no fallback
 * has been cached with {@link useDefaultConfig}
 */
export function getConfig(): IniRoundtripConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig(process.env);
  }
  return cachedConfig;
}

/** Cache the defaults in place of an invalid environment until the next reset. */
export function useDefaultConfig(): IniRoundtripConfig {
  cachedConfig = DEFAULT_CONFIG;
  return cachedConfig;
}

export function resetConfig(): void {
  cachedConfig = null;
}
