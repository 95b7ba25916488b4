/**
 * Services - Main Export
 */

export { AuthService } from './auth.service.js';
export {
  ConfigStore,
  defaultConfigDir,
  defaultConfigPath,
  type LoadResult,
  type SearchCache,
  type StoredConfig,
} from './config-store.service.js';
export {
  MacroFactorService,
  type LogFoodOptions,
  type LogSearchedFoodOptions,
  type LoggedEntry,
} from './macrofactor.service.js';
