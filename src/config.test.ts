/**
 * Tests for Configuration
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

// Store original env
const originalEnv = process.env;

// Mock dotenv
vi.mock('dotenv', () => ({
  config: vi.fn(),
}));

describe('Configuration', () => {
  beforeEach(() => {
    // Reset modules before each test
    vi.resetModules();
    // Create a fresh copy of process.env without any MacroFactor settings
    process.env = { ...originalEnv };
    for (const key of Object.keys(process.env)) {
      if (key.startsWith('MACROFACTOR_')) delete process.env[key];
    }
  });

  afterEach(() => {
    // Restore original env
    process.env = originalEnv;
    vi.clearAllMocks();
  });

  describe('loadConfig', () => {
    it('should load the API key and project', async () => {
      process.env.MACROFACTOR_API_KEY = 'test-api-key';
      process.env.MACROFACTOR_PROJECT_ID = 'test-project';

      const { loadConfig } = await import('./config.js');

      expect(loadConfig()).toEqual({
        apiKey: 'test-api-key',
        projectId: 'test-project',
        searchUrl: 'https://us-central1-test-project.cloudfunctions.net/searchFoods',
        iosBundleId: undefined,
        debug: false,
      });
    });

    it('should honour search URL and bundle id overrides', async () => {
      process.env.MACROFACTOR_API_KEY = 'test-api-key';
      process.env.MACROFACTOR_PROJECT_ID = 'test-project';
      process.env.MACROFACTOR_SEARCH_URL = 'https://search.test/searchFoods';
      process.env.MACROFACTOR_IOS_BUNDLE_ID = 'com.example.app';

      const { loadConfig } = await import('./config.js');
      const config = loadConfig();

      expect(config.searchUrl).toBe('https://search.test/searchFoods');
      expect(config.iosBundleId).toBe('com.example.app');
    });

    it('should throw error when MACROFACTOR_API_KEY is missing', async () => {
      process.env.MACROFACTOR_PROJECT_ID = 'test-project';

      const { loadConfig } = await import('./config.js');

      expect(() => loadConfig()).toThrow(
        'MACROFACTOR_API_KEY environment variable is required. Set it in the environment or in a .env file (see .env.example).'
      );
    });

    it('should throw error when MACROFACTOR_PROJECT_ID is missing', async () => {
      process.env.MACROFACTOR_API_KEY = 'test-api-key';

      const { loadConfig } = await import('./config.js');

      expect(() => loadConfig()).toThrow('MACROFACTOR_PROJECT_ID environment variable is required');
    });

    it('should call dotenv config on import', async () => {
      const dotenv = await import('dotenv');

      await import('./config.js');

      expect(dotenv.config).toHaveBeenCalled();
    });
  });

  describe('isDebugEnabled', () => {
    it('should accept 1 and true', async () => {
      const { isDebugEnabled } = await import('./config.js');

      process.env.MACROFACTOR_DEBUG = '1';
      expect(isDebugEnabled()).toBe(true);
      process.env.MACROFACTOR_DEBUG = 'true';
      expect(isDebugEnabled()).toBe(true);
      process.env.MACROFACTOR_DEBUG = 'yes';
      expect(isDebugEnabled()).toBe(false);
    });
  });
});
