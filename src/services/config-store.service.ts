/**
 * Config Store
 * Persists the refresh token and the last food search in a single JSON file.
 * Writes go through a temp file and a rename so readers never see a partial file.
 */

import {
  existsSync,
  mkdirSync,
  readFileSync,
  renameSync,
  rmSync,
  writeFileSync,
} from 'node:fs';
import { homedir } from 'node:os';
import { dirname, join } from 'node:path';
import { z } from 'zod';
import { SearchFoodResultSchema } from '../api/types.js';
import { NotLoggedInError } from '../errors.js';

const APP_DIR_NAME = 'macrofactor-cli';
const CONFIG_FILE_NAME = 'config.json';

export const SearchCacheSchema = z.object({
  query: z.string(),
  savedAt: z.string(),
  results: z.array(SearchFoodResultSchema),
});
export type SearchCache = z.infer<typeof SearchCacheSchema>;

export const StoredConfigSchema = z.object({
  refreshToken: z.string().min(1),
  lastSearch: SearchCacheSchema.optional(),
});
export type StoredConfig = z.infer<typeof StoredConfigSchema>;

export type LoadResult =
  | { status: 'configured'; config: StoredConfig }
  | { status: 'not-configured'; reason: string };

/**
 * Per-user config directory by platform convention:
 * $XDG_CONFIG_HOME or ~/.config on Linux, ~/Library/Application Support on macOS, %APPDATA% on Windows.
 */
export function defaultConfigDir(
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform,
  home: string = homedir()
): string {
  if (env.MACROFACTOR_CONFIG_DIR) {
    return env.MACROFACTOR_CONFIG_DIR;
  }

  let base: string;
  if (platform === 'win32') {
    base = env.APPDATA ?? join(home, 'AppData', 'Roaming');
  } else if (platform === 'darwin') {
    base = join(home, 'Library', 'Application Support');
  } else {
    base = env.XDG_CONFIG_HOME ?? join(home, '.config');
  }
  return join(base, APP_DIR_NAME);
}

export function defaultConfigPath(): string {
  return join(defaultConfigDir(), CONFIG_FILE_NAME);
}

export class ConfigStore {
  constructor(readonly path: string = defaultConfigPath()) {}

  load(): LoadResult {
    if (!existsSync(this.path)) {
      return { status: 'not-configured', reason: `No config file at ${this.path}` };
    }

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(this.path, 'utf-8'));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return { status: 'not-configured', reason: `Unreadable config file: ${message}` };
    }

    const parsed = StoredConfigSchema.safeParse(raw);
    if (!parsed.success) {
      return { status: 'not-configured', reason: 'Invalid config file' };
    }
    return { status: 'configured', config: parsed.data };
  }

  /**
   * Replace the whole file atomically
   */
  save(config: StoredConfig): void {
    const dir = dirname(this.path);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true, mode: 0o700 });
    }

    const tempPath = `${this.path}.${process.pid}.${Date.now()}.tmp`;
    try {
      writeFileSync(tempPath, `${JSON.stringify(config, null, 2)}\n`, { mode: 0o600 });
      renameSync(tempPath, this.path);
    } catch (error) {
      rmSync(tempPath, { force: true });
      throw error;
    }
  }

  private requireConfig(): StoredConfig {
    const loaded = this.load();
    if (loaded.status !== 'configured') {
      throw new NotLoggedInError();
    }
    return loaded.config;
  }

  /**
   * Store a (possibly rotated) refresh token, keeping the search cache
   */
  saveCredentials(refreshToken: string): void {
    const current = this.load();
    const lastSearch = current.status === 'configured' ? current.config.lastSearch : undefined;
    this.save({ refreshToken, ...(lastSearch && { lastSearch }) });
  }

  saveSearchCache(cache: SearchCache): void {
    const config = this.requireConfig();
    this.save({ ...config, lastSearch: cache });
  }
}
