/**
 * MacroFactor Service
 * High-level layer over the API client; every call obtains a session first.
 */

import {
  MacroFactorClient,
  ProfileAPI,
  NutritionAPI,
  FoodLogAPI,
  WeightAPI,
  StepsAPI,
  SearchAPI,
  scaleNutrition,
  type MacroFactorClientConfig,
  type FoodEntry,
  type FoodServing,
  type Goals,
  type Macros,
  type NutritionSummary,
  type Profile,
  type SearchFoodResult,
  type StepEntry,
  type WeightEntry,
} from '../api/index.js';
import { AuthService } from './auth.service.js';
import type { ConfigStore, LoadResult } from './config-store.service.js';

export interface LogFoodOptions extends Macros {
  date: string;
  name: string;
  loggedAt: Date;
}

export interface LogSearchedFoodOptions {
  date: string;
  food: SearchFoodResult;
  serving: FoodServing;
  quantity: number;
  loggedAt: Date;
}

export interface LoggedEntry {
  entryId: string;
  macros: Macros;
}

export class MacroFactorService {
  private readonly client: MacroFactorClient;
  private readonly auth: AuthService;
  private readonly profile: ProfileAPI;
  private readonly nutrition: NutritionAPI;
  private readonly foodLog: FoodLogAPI;
  private readonly weight: WeightAPI;
  private readonly steps: StepsAPI;
  private readonly search: SearchAPI;

  constructor(config: MacroFactorClientConfig, store: ConfigStore, state: LoadResult) {
    this.client = new MacroFactorClient(config);
    this.auth = new AuthService(this.client, store, state);
    this.profile = new ProfileAPI(this.client);
    this.nutrition = new NutritionAPI(this.client);
    this.foodLog = new FoodLogAPI(this.client);
    this.weight = new WeightAPI(this.client);
    this.steps = new StepsAPI(this.client);
    this.search = new SearchAPI(this.client);
  }

  async login(email: string, password: string): Promise<void> {
    await this.auth.login(email, password);
  }

  // ============ Reads ============

  async getProfile(): Promise<Profile> {
    return this.profile.get(await this.auth.getSession());
  }

  async getGoals(): Promise<Goals> {
    return this.profile.getGoals(await this.auth.getSession());
  }

  async getNutrition(start: string, end: string): Promise<NutritionSummary[]> {
    return this.nutrition.list(await this.auth.getSession(), start, end);
  }

  async getFoodLog(date: string): Promise<FoodEntry[]> {
    return this.foodLog.list(await this.auth.getSession(), date);
  }

  async getWeightEntries(start: string, end: string): Promise<WeightEntry[]> {
    return this.weight.list(await this.auth.getSession(), start, end);
  }

  async getSteps(start: string, end: string): Promise<StepEntry[]> {
    return this.steps.list(await this.auth.getSession(), start, end);
  }

  async searchFoods(query: string): Promise<SearchFoodResult[]> {
    return this.search.search(query, await this.auth.getSession());
  }

  // ============ Writes ============

  /**
   * Quick-add an entry from manually supplied macros
   */
  async logFood(options: LogFoodOptions): Promise<LoggedEntry> {
    const macros: Macros = {
      calories: options.calories,
      protein: options.protein,
      carbs: options.carbs,
      fat: options.fat,
    };
    const entryId = await this.foodLog.add(await this.auth.getSession(), options.date, {
      name: options.name,
      loggedAt: options.loggedAt,
      ...macros,
    });
    return { entryId, macros };
  }

  /**
   * Log a food from search results, scaled to the chosen serving and quantity
   */
  async logSearchedFood(options: LogSearchedFoodOptions): Promise<LoggedEntry> {
    const { food, serving, quantity } = options;
    const macros = scaleNutrition(food, serving, quantity);
    const entryId = await this.foodLog.add(await this.auth.getSession(), options.date, {
      name: food.name,
      brand: food.brand,
      loggedAt: options.loggedAt,
      weightGrams: serving.gramWeight * quantity,
      foodId: food.foodId,
      serving: serving.description,
      quantity,
      ...macros,
    });
    return { entryId, macros };
  }

  async logWeight(date: string, weight: number, bodyFat?: number): Promise<void> {
    await this.weight.put(await this.auth.getSession(), date, weight, bodyFat);
  }

  async logNutrition(date: string, totals: Macros): Promise<void> {
    await this.nutrition.put(await this.auth.getSession(), date, totals, 'manual');
  }

  async deleteFoodEntry(date: string, entryId: string): Promise<void> {
    await this.foodLog.delete(await this.auth.getSession(), date, entryId);
  }

  async deleteWeightEntry(date: string): Promise<void> {
    await this.weight.delete(await this.auth.getSession(), date);
  }

  /**
   * Recompute the day's nutrition summary from its food log
   */
  async syncDay(date: string): Promise<Macros> {
    const session = await this.auth.getSession();
    const entries = await this.foodLog.list(session, date);
    const totals = entries.reduce<Macros>(
      (sum, entry) => ({
        calories: sum.calories + (entry.calories ?? 0),
        protein: sum.protein + (entry.protein ?? 0),
        carbs: sum.carbs + (entry.carbs ?? 0),
        fat: sum.fat + (entry.fat ?? 0),
      }),
      { calories: 0, protein: 0, carbs: 0, fat: 0 }
    );
    await this.nutrition.put(session, date, totals, 'sync');
    return totals;
  }
}
