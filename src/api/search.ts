/**
 * MacroFactor Food Search API
 */

import type { MacroFactorClient } from './client.js';
import {
  SearchResponseSchema,
  parseResponse,
  type FoodServing,
  type Macros,
  type SearchFoodResult,
  type Session,
} from './types.js';

export const DEFAULT_SEARCH_LIMIT = 20;

/** Serving used when a food carries none of its own */
export const HUNDRED_GRAM_SERVING: FoodServing = { description: '100g', amount: 1, gramWeight: 100 };

export class SearchAPI {
  constructor(private readonly client: MacroFactorClient) {}

  async search(query: string, session: Session, limit = DEFAULT_SEARCH_LIMIT): Promise<SearchFoodResult[]> {
    const params = new URLSearchParams({ query, limit: String(limit) });
    const response = await this.client.searchRequest<unknown>(params, session.accessToken);
    return parseResponse(SearchResponseSchema, response, 'food search').hits;
  }
}

/**
 * Macros for `quantity` servings of a food whose values are given per 100 g
 */
export function scaleNutrition(food: SearchFoodResult, serving: FoodServing, quantity = 1): Macros {
  const scale = (serving.gramWeight / 100) * quantity;
  return {
    calories: food.caloriesPer100g * scale,
    protein: food.proteinPer100g * scale,
    carbs: food.carbsPer100g * scale,
    fat: food.fatPer100g * scale,
  };
}

/**
 * The serving a search result is displayed and logged with by default
 */
export function defaultServing(food: SearchFoodResult): FoodServing {
  return food.defaultServing ?? food.servings[0] ?? HUNDRED_GRAM_SERVING;
}
