/**
 * MacroFactor API Types
 * Zod schemas for every payload that crosses the wire, plus the inferred types.
 */

import { z } from 'zod';
import { ApiError } from '../errors.js';

// Auth types

export const SignInResponseSchema = z.object({
  localId: z.string(),
  idToken: z.string(),
  refreshToken: z.string().min(1),
  expiresIn: z.string(),
  email: z.string().optional(),
});
export type SignInResponse = z.infer<typeof SignInResponseSchema>;

export const RefreshResponseSchema = z.object({
  id_token: z.string(),
  refresh_token: z.string().min(1),
  user_id: z.string(),
  expires_in: z.string(),
});
export type RefreshResponse = z.infer<typeof RefreshResponseSchema>;

export const FirebaseErrorSchema = z.object({
  error: z.object({
    code: z.number().optional(),
    message: z.string(),
    status: z.string().optional(),
  }),
});

export interface Session {
  accessToken: string;
  userId: string;
  expiresAt: number;
}

// Profile and goals

export type Profile = Record<string, unknown>;

export const GoalsSchema = z.object({
  tdee: z.number().optional(),
  programStyle: z.string().optional(),
  programType: z.string().optional(),
  calories: z.array(z.number()).default([]),
  protein: z.array(z.number()).default([]),
  carbs: z.array(z.number()).default([]),
  fat: z.array(z.number()).default([]),
});
export type Goals = z.infer<typeof GoalsSchema>;

// Daily data

export const NutritionSummarySchema = z.object({
  date: z.string(),
  calories: z.number().optional(),
  protein: z.number().optional(),
  carbs: z.number().optional(),
  fat: z.number().optional(),
  sugar: z.number().optional(),
  fiber: z.number().optional(),
  source: z.string().optional(),
});
export type NutritionSummary = z.infer<typeof NutritionSummarySchema>;

// Some clients store the time of day as numeric strings
const TimePartSchema = z.union([z.number(), z.string()]).pipe(z.coerce.number().int());

export const FoodEntrySchema = z.object({
  entryId: z.string(),
  name: z.string().optional(),
  brand: z.string().optional(),
  hour: TimePartSchema.optional(),
  minute: TimePartSchema.optional(),
  calories: z.number().optional(),
  protein: z.number().optional(),
  carbs: z.number().optional(),
  fat: z.number().optional(),
  weightGrams: z.number().optional(),
  foodId: z.string().optional(),
  serving: z.string().optional(),
  quantity: z.number().optional(),
  loggedAt: z.string().optional(),
});
export type FoodEntry = z.infer<typeof FoodEntrySchema>;

export const WeightEntrySchema = z.object({
  date: z.string(),
  weight: z.number(),
  bodyFat: z.number().optional(),
});
export type WeightEntry = z.infer<typeof WeightEntrySchema>;

export const StepEntrySchema = z.object({
  date: z.string(),
  steps: z.number(),
});
export type StepEntry = z.infer<typeof StepEntrySchema>;

// Food search

export const FoodServingSchema = z.object({
  description: z.string(),
  amount: z.number(),
  gramWeight: z.number().nonnegative(),
});
export type FoodServing = z.infer<typeof FoodServingSchema>;

export const SearchFoodResultSchema = z.object({
  foodId: z.string(),
  name: z.string(),
  brand: z.string().optional(),
  branded: z.boolean().default(false),
  caloriesPer100g: z.number(),
  proteinPer100g: z.number(),
  carbsPer100g: z.number(),
  fatPer100g: z.number(),
  servings: z.array(FoodServingSchema).default([]),
  defaultServing: FoodServingSchema.optional(),
});
export type SearchFoodResult = z.infer<typeof SearchFoodResultSchema>;

export const SearchResponseSchema = z.object({
  hits: z.array(SearchFoodResultSchema),
});

// Write payloads

export interface Macros {
  calories: number;
  protein: number;
  carbs: number;
  fat: number;
}

export interface NewFoodEntry extends Macros {
  name: string;
  brand?: string;
  loggedAt: Date;
  weightGrams?: number;
  foodId?: string;
  serving?: string;
  quantity?: number;
}

/**
 * Validate a decoded payload, turning schema mismatches into ApiError
 */
export function parseResponse<T extends z.ZodTypeAny>(
  schema: T,
  data: unknown,
  what: string
): z.output<T> {
  const result = schema.safeParse(data);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new ApiError(
      `Unexpected response shape for ${what}${where}: ${issue?.message ?? 'invalid'}`
    );
  }
  return result.data;
}
