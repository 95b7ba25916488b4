/**
 * Tests for MacroFactorService
 *
 * Exercises the service against the real API classes with fetch mocked
 * at the network level and a config store in a temp directory.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { MacroFactorService } from './macrofactor.service.js';
import { ConfigStore } from './config-store.service.js';
import type { SearchFoodResult } from '../api/types.js';
import { NotLoggedInError } from '../errors.js';

vi.mock('node:crypto', () => ({
  randomUUID: vi.fn(() => 'entry-1'),
}));

// Mock global fetch
const mockFetch = vi.fn();
global.fetch = mockFetch;

const DB_PATH = 'projects/test-project/databases/(default)/documents';
const DOCUMENTS = `https://firestore.googleapis.com/v1/${DB_PATH}`;

const config = {
  apiKey: 'test-api-key',
  projectId: 'test-project',
  searchUrl: 'https://search.test/searchFoods',
};

function okResponse(body: unknown) {
  return { ok: true, status: 200, statusText: 'OK', json: () => Promise.resolve(body) };
}

function refreshResponse(refreshToken = 'refresh-1') {
  return okResponse({
    id_token: 'access-1',
    refresh_token: refreshToken,
    user_id: 'user-1',
    expires_in: '3600',
  });
}

const egg: SearchFoodResult = {
  foodId: 'food-egg',
  name: 'Egg, whole',
  branded: false,
  caloriesPer100g: 140,
  proteinPer100g: 12,
  carbsPer100g: 1,
  fatPer100g: 10,
  servings: [{ description: '1 large', amount: 1, gramWeight: 50 }],
  defaultServing: { description: '1 large', amount: 1, gramWeight: 50 },
};

describe('MacroFactorService', () => {
  let dir: string;
  let store: ConfigStore;

  const createService = () => new MacroFactorService(config, store, store.load());

  beforeEach(() => {
    mockFetch.mockReset();
    dir = mkdtempSync(join(tmpdir(), 'macrofactor-service-'));
    store = new ConfigStore(join(dir, 'config.json'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  describe('when logged out', () => {
    it('should fail every read before any network call', async () => {
      const service = createService();

      await expect(service.getProfile()).rejects.toBeInstanceOf(NotLoggedInError);
      await expect(service.getWeightEntries('2025-01-08', '2025-01-15')).rejects.toBeInstanceOf(
        NotLoggedInError
      );
      expect(mockFetch).not.toHaveBeenCalled();
    });

    it('should log in and persist the refresh token without the old cache', async () => {
      store.save({ refreshToken: 'old', lastSearch: { query: 'egg', savedAt: 'x', results: [egg] } });
      mockFetch.mockResolvedValueOnce(
        okResponse({ localId: 'user-1', idToken: 'id', refreshToken: 'refresh-new', expiresIn: '3600' })
      );

      await createService().login('cook@example.com', 'test-password');

      expect(store.load()).toEqual({ status: 'configured', config: { refreshToken: 'refresh-new' } });
    });
  });

  describe('when logged in', () => {
    beforeEach(() => {
      store.save({ refreshToken: 'refresh-1' });
    });

    it('should persist a rotated refresh token', async () => {
      mockFetch
        .mockResolvedValueOnce(refreshResponse('refresh-2'))
        .mockResolvedValueOnce(okResponse([]));

      const entries = await createService().getSteps('2025-01-15', '2025-01-15');

      expect(entries).toEqual([]);
      expect(store.load()).toEqual({ status: 'configured', config: { refreshToken: 'refresh-2' } });
    });

    it('should read the food log with the refreshed token', async () => {
      mockFetch.mockResolvedValueOnce(refreshResponse()).mockResolvedValueOnce(
        okResponse([
          {
            found: {
              name: `${DB_PATH}/users/user-1/food/2025-01-15`,
              fields: {
                'entry-9': {
                  mapValue: {
                    fields: { name: { stringValue: 'Banana' }, calories: { integerValue: '105' } },
                  },
                },
              },
            },
          },
        ])
      );

      const entries = await createService().getFoodLog('2025-01-15');

      expect(entries).toEqual([{ entryId: 'entry-9', name: 'Banana', calories: 105 }]);
      const [url, init] = mockFetch.mock.calls[1];
      expect(url).toBe(`${DOCUMENTS}:batchGet`);
      expect(init.headers.Authorization).toBe('Bearer access-1');
    });

    it('should log a searched food scaled to serving and quantity', async () => {
      mockFetch.mockResolvedValueOnce(refreshResponse()).mockResolvedValueOnce(okResponse({}));
      const loggedAt = new Date(2025, 0, 15, 8, 0);

      const logged = await createService().logSearchedFood({
        date: '2025-01-15',
        food: egg,
        serving: egg.servings[0],
        quantity: 2,
        loggedAt,
      });

      expect(logged).toEqual({
        entryId: 'entry-1',
        macros: { calories: 140, protein: 12, carbs: 1, fat: 10 },
      });
      const [url, init] = mockFetch.mock.calls[1];
      expect(url).toBe(`${DOCUMENTS}/users/user-1/food/2025-01-15?updateMask.fieldPaths=%60entry-1%60`);
      expect(JSON.parse(init.body).fields['entry-1'].mapValue.fields).toEqual({
        name: { stringValue: 'Egg, whole' },
        hour: { integerValue: '8' },
        minute: { integerValue: '0' },
        calories: { integerValue: '140' },
        protein: { integerValue: '12' },
        carbs: { integerValue: '1' },
        fat: { integerValue: '10' },
        weightGrams: { integerValue: '100' },
        foodId: { stringValue: 'food-egg' },
        serving: { stringValue: '1 large' },
        quantity: { integerValue: '2' },
        loggedAt: { timestampValue: loggedAt.toISOString() },
      });
    });

    it('should sync the day from its food log', async () => {
      mockFetch
        .mockResolvedValueOnce(refreshResponse())
        .mockResolvedValueOnce(
          okResponse([
            {
              found: {
                name: `${DB_PATH}/users/user-1/food/2025-01-15`,
                fields: {
                  a: {
                    mapValue: {
                      fields: {
                        calories: { doubleValue: 155.5 },
                        protein: { integerValue: '13' },
                        fat: { integerValue: '10' },
                      },
                    },
                  },
                  b: {
                    mapValue: {
                      fields: {
                        calories: { integerValue: '120' },
                        protein: { integerValue: '4' },
                        carbs: { integerValue: '20' },
                      },
                    },
                  },
                },
              },
            },
          ])
        )
        .mockResolvedValueOnce(okResponse({}));

      const totals = await createService().syncDay('2025-01-15');

      expect(totals).toEqual({ calories: 275.5, protein: 17, carbs: 20, fat: 10 });
      expect(mockFetch).toHaveBeenCalledTimes(3);
      const [url, init] = mockFetch.mock.calls[2];
      expect(url).toMatch(new RegExp(`^${DOCUMENTS.replace(/[().]/g, '\\$&')}/users/user-1/nutrition/2025-01-15\\?`));
      expect(init.method).toBe('PATCH');
      expect(JSON.parse(init.body).fields).toEqual({
        calories: { doubleValue: 275.5 },
        protein: { integerValue: '17' },
        carbs: { integerValue: '20' },
        fat: { integerValue: '10' },
        source: { stringValue: 'sync' },
      });
    });

    it('should delete a weight entry', async () => {
      mockFetch.mockResolvedValueOnce(refreshResponse()).mockResolvedValueOnce(okResponse({}));

      await createService().deleteWeightEntry('2025-01-15');

      expect(mockFetch.mock.calls[1][0]).toBe(`${DOCUMENTS}/users/user-1/scale/2025-01-15`);
      expect(mockFetch.mock.calls[1][1].method).toBe('DELETE');
    });
  });
});
