/**
 * MacroFactor Nutrition API
 * Daily nutrition summaries live at users/{uid}/nutrition/{date}.
 */

import { eachDate } from '../dates.js';
import type { MacroFactorClient } from './client.js';
import { decodeFields, documentId, encodeFields, type FirestoreDocument } from './firestore.js';
import {
  NutritionSummarySchema,
  parseResponse,
  type Macros,
  type NutritionSummary,
  type Session,
} from './types.js';

export type NutritionSource = 'manual' | 'sync';

export class NutritionAPI {
  constructor(private readonly client: MacroFactorClient) {}

  private path(session: Session, date: string): string {
    return `users/${encodeURIComponent(session.userId)}/nutrition/${date}`;
  }

  /**
   * Summaries for each day in the range that has one
   */
  async list(session: Session, start: string, end: string): Promise<NutritionSummary[]> {
    const docs = await this.client.batchGet(
      eachDate(start, end).map((date) => this.path(session, date)),
      session.accessToken
    );

    return docs.map((doc) =>
      parseResponse(
        NutritionSummarySchema,
        { ...decodeFields(doc.fields), date: documentId(doc.name) },
        'nutrition summary'
      )
    );
  }

  /**
   * Write the day's totals, leaving other fields (sugar, fiber) in place
   */
  async put(session: Session, date: string, totals: Macros, source: NutritionSource): Promise<void> {
    const fields = encodeFields({
      calories: totals.calories,
      protein: totals.protein,
      carbs: totals.carbs,
      fat: totals.fat,
      source,
    });
    const params = new URLSearchParams();
    for (const key of Object.keys(fields)) {
      params.append('updateMask.fieldPaths', key);
    }

    await this.client.request<FirestoreDocument>(
      `/${this.path(session, date)}?${params.toString()}`,
      session.accessToken,
      { method: 'PATCH', body: JSON.stringify({ fields }) }
    );
  }
}
