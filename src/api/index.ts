/**
 * MacroFactor API Client - Main Export
 */

export { MacroFactorClient, type MacroFactorClientConfig } from './client.js';
export { ProfileAPI } from './profile.js';
export { NutritionAPI, type NutritionSource } from './nutrition.js';
export { FoodLogAPI } from './food-log.js';
export { WeightAPI } from './weight.js';
export { StepsAPI } from './steps.js';
export {
  SearchAPI,
  DEFAULT_SEARCH_LIMIT,
  HUNDRED_GRAM_SERVING,
  scaleNutrition,
  defaultServing,
} from './search.js';
export * from './firestore.js';
export * from './types.js';
