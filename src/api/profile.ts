/**
 * MacroFactor Profile API
 * The user document holds the profile; its `planner` map holds the goals.
 */

import type { MacroFactorClient } from './client.js';
import { decodeFields, type FirestoreDocument } from './firestore.js';
import { GoalsSchema, parseResponse, type Goals, type Profile, type Session } from './types.js';

export class ProfileAPI {
  constructor(private readonly client: MacroFactorClient) {}

  async get(session: Session): Promise<Profile> {
    const doc = await this.client.request<FirestoreDocument>(
      `/users/${encodeURIComponent(session.userId)}`,
      session.accessToken
    );
    return decodeFields(doc.fields);
  }

  /**
   * Current calorie and macro targets, one value per weekday starting Monday
   */
  async getGoals(session: Session): Promise<Goals> {
    const profile = await this.get(session);
    return parseResponse(GoalsSchema, profile.planner ?? {}, 'goals');
  }
}
