/**
 * CLI Configuration
 *
 * Imported before anything that creates a logger, so `.env` in the
 * working directory is applied to LOG_LEVEL and NODE_ENV too.
 */

import { loadDotenv, parseSettings, type RelpackSettings } from '@relpack/core';

loadDotenv(process.cwd());

export function loadSettings(env: NodeJS.ProcessEnv = process.env): RelpackSettings {
  return parseSettings(env);
}
