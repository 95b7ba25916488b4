/**
 * MacroFactor Food Log API
 * One document per day at users/{uid}/food/{date}; each entry is a map field keyed by its entry id.
 */

import { randomUUID } from 'node:crypto';
import type { MacroFactorClient } from './client.js';
import {
  decodeFields,
  encodeFields,
  quoteFieldPath,
  type FirestoreDocument,
} from './firestore.js';
import {
  FoodEntrySchema,
  parseResponse,
  type FoodEntry,
  type NewFoodEntry,
  type Session,
} from './types.js';

function sortKey(entry: FoodEntry): number {
  return (entry.hour ?? 0) * 60 + (entry.minute ?? 0);
}

export class FoodLogAPI {
  constructor(private readonly client: MacroFactorClient) {}

  private path(session: Session, date: string): string {
    return `users/${encodeURIComponent(session.userId)}/food/${date}`;
  }

  /**
   * Entries for a day, ordered by time of day
   */
  async list(session: Session, date: string): Promise<FoodEntry[]> {
    const [doc] = await this.client.batchGet([this.path(session, date)], session.accessToken);
    if (!doc) return [];

    const entries = Object.entries(decodeFields(doc.fields)).map(([entryId, value]) =>
      parseResponse(
        FoodEntrySchema,
        typeof value === 'object' && value !== null && !Array.isArray(value)
          ? { ...value, entryId }
          : value,
        `food entry ${entryId}`
      )
    );
    return entries.sort((a, b) => sortKey(a) - sortKey(b));
  }

  /**
   * Add an entry to the day's document, creating the document if needed.
   * Returns the new entry id.
   */
  async add(session: Session, date: string, entry: NewFoodEntry): Promise<string> {
    const entryId = randomUUID();
    const fields = encodeFields({
      [entryId]: {
        name: entry.name,
        brand: entry.brand,
        hour: entry.loggedAt.getHours(),
        minute: entry.loggedAt.getMinutes(),
        calories: entry.calories,
        protein: entry.protein,
        carbs: entry.carbs,
        fat: entry.fat,
        weightGrams: entry.weightGrams,
        foodId: entry.foodId,
        serving: entry.serving,
        quantity: entry.quantity,
        loggedAt: entry.loggedAt,
      },
    });
    const params = new URLSearchParams({ 'updateMask.fieldPaths': quoteFieldPath(entryId) });

    await this.client.request<FirestoreDocument>(
      `/${this.path(session, date)}?${params.toString()}`,
      session.accessToken,
      { method: 'PATCH', body: JSON.stringify({ fields }) }
    );
    return entryId;
  }

  /**
   * Remove one entry. The masked field is absent from the body, which deletes it.
   */
  async delete(session: Session, date: string, entryId: string): Promise<void> {
    const params = new URLSearchParams({
      'updateMask.fieldPaths': quoteFieldPath(entryId),
      'currentDocument.exists': 'true',
    });

    await this.client.request<FirestoreDocument>(
      `/${this.path(session, date)}?${params.toString()}`,
      session.accessToken,
      { method: 'PATCH', body: JSON.stringify({ fields: {} }) }
    );
  }
}
