/**
 * MacroFactor Weight API
 * Scale entries live at users/{uid}/scale/{date}, one per day.
 */

import { eachDate } from '../dates.js';
import type { MacroFactorClient } from './client.js';
import { decodeFields, documentId, encodeFields, type FirestoreDocument } from './firestore.js';
import { WeightEntrySchema, parseResponse, type Session, type WeightEntry } from './types.js';

export class WeightAPI {
  constructor(private readonly client: MacroFactorClient) {}

  private path(session: Session, date: string): string {
    return `users/${encodeURIComponent(session.userId)}/scale/${date}`;
  }

  async list(session: Session, start: string, end: string): Promise<WeightEntry[]> {
    const docs = await this.client.batchGet(
      eachDate(start, end).map((date) => this.path(session, date)),
      session.accessToken
    );

    return docs.map((doc) =>
      parseResponse(
        WeightEntrySchema,
        { ...decodeFields(doc.fields), date: documentId(doc.name) },
        'weight entry'
      )
    );
  }

  /**
   * Replace the day's entry
   */
  async put(session: Session, date: string, weight: number, bodyFat?: number): Promise<void> {
    await this.client.request<FirestoreDocument>(`/${this.path(session, date)}`, session.accessToken, {
      method: 'PATCH',
      body: JSON.stringify({ fields: encodeFields({ weight, bodyFat }) }),
    });
  }

  async delete(session: Session, date: string): Promise<void> {
    await this.client.request<Record<string, never>>(`/${this.path(session, date)}`, session.accessToken, {
      method: 'DELETE',
    });
  }
}
