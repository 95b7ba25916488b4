/**
 * MacroFactor Steps API
 */

import { eachDate } from '../dates.js';
import type { MacroFactorClient } from './client.js';
import { decodeFields, documentId } from './firestore.js';
import { StepEntrySchema, parseResponse, type Session, type StepEntry } from './types.js';

export class StepsAPI {
  constructor(private readonly client: MacroFactorClient) {}

  async list(session: Session, start: string, end: string): Promise<StepEntry[]> {
    const userId = encodeURIComponent(session.userId);
    const docs = await this.client.batchGet(
      eachDate(start, end).map((date) => `users/${userId}/steps/${date}`),
      session.accessToken
    );

    return docs.map((doc) =>
      parseResponse(StepEntrySchema, { ...decodeFields(doc.fields), date: documentId(doc.name) }, 'step entry')
    );
  }
}
