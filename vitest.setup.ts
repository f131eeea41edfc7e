/**
 * Vitest setup for ini-roundtrip
 *
 * Tests run with logging off unless a test stubs INI_ROUNDTRIP_LOG_LEVEL
 * itself. Tests that change the level must call `resetConfig()` so the cached
 * configuration is read again.
 */

import { afterEach } from 'vitest';
import { LOG_LEVEL_ENV, resetConfig } from './src/config/index.js';

if (!process.env[LOG_LEVEL_ENV]) {
  process.env[LOG_LEVEL_ENV] = 'silent';
}

afterEach(() => {
  resetConfig();
});
