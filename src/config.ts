/**
 * Configuration loader
 */

import { config as loadEnv } from 'dotenv';
import type { MacroFactorClientConfig } from './api/client.js';
import { ConfigError } from './errors.js';

// Load .env file
loadEnv();

export function isDebugEnabled(): boolean {
  const value = process.env.MACROFACTOR_DEBUG;
  return value === '1' || value === 'true';
}

const ENV_HINT = 'Set it in the environment or in a .env file (see .env.example).';

export function loadConfig(): MacroFactorClientConfig {
  const apiKey = process.env.MACROFACTOR_API_KEY;
  const projectId = process.env.MACROFACTOR_PROJECT_ID;

  if (!apiKey) {
    throw new ConfigError(`MACROFACTOR_API_KEY environment variable is required. ${ENV_HINT}`);
  }

  if (!projectId) {
    throw new ConfigError(`MACROFACTOR_PROJECT_ID environment variable is required. ${ENV_HINT}`);
  }

  return {
    apiKey,
    projectId,
    searchUrl:
      process.env.MACROFACTOR_SEARCH_URL ??
      `https://us-central1-${projectId}.cloudfunctions.net/searchFoods`,
    iosBundleId: process.env.MACROFACTOR_IOS_BUNDLE_ID || undefined,
    debug: isDebugEnabled(),
  };
}
