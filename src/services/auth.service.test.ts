/**
 * Tests for AuthService
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { AuthService } from './auth.service.js';
import type { ConfigStore, LoadResult } from './config-store.service.js';
import type { MacroFactorClient } from '../api/client.js';
import type { RefreshResponse } from '../api/types.js';
import { AuthError, NotLoggedInError } from '../errors.js';

const createMockClient = () => ({
  signInWithPassword: vi.fn(),
  refreshToken: vi.fn(),
});

const createMockStore = () => ({
  save: vi.fn(),
  saveCredentials: vi.fn(),
});

const configured: LoadResult = { status: 'configured', config: { refreshToken: 'refresh-1' } };

function refreshed(overrides: Partial<RefreshResponse> = {}): RefreshResponse {
  return {
    id_token: 'access-1',
    refresh_token: 'refresh-1',
    user_id: 'user-1',
    expires_in: '3600',
    ...overrides,
  };
}

describe('AuthService', () => {
  let mockClient: ReturnType<typeof createMockClient>;
  let mockStore: ReturnType<typeof createMockStore>;

  const createService = (state: LoadResult) =>
    new AuthService(
      mockClient as unknown as MacroFactorClient,
      mockStore as unknown as ConfigStore,
      state
    );

  beforeEach(() => {
    mockClient = createMockClient();
    mockStore = createMockStore();
  });

  describe('login', () => {
    it('should store only the new refresh token', async () => {
      mockClient.signInWithPassword.mockResolvedValueOnce({
        localId: 'user-1',
        idToken: 'id-token',
        refreshToken: 'refresh-new',
        expiresIn: '3600',
      });
      const service = createService({ status: 'not-configured', reason: 'No config file' });

      await service.login('cook@example.com', 'test-password');

      expect(mockClient.signInWithPassword).toHaveBeenCalledWith('cook@example.com', 'test-password');
      expect(mockStore.save).toHaveBeenCalledWith({ refreshToken: 'refresh-new' });
    });

    it('should not touch the store when sign-in fails', async () => {
      mockClient.signInWithPassword.mockRejectedValueOnce(new AuthError('Login failed: INVALID_PASSWORD'));
      const service = createService({ status: 'not-configured', reason: 'No config file' });

      await expect(service.login('cook@example.com', 'wrong')).rejects.toThrow('INVALID_PASSWORD');
      expect(mockStore.save).not.toHaveBeenCalled();
    });
  });

  describe('getSession', () => {
    it('should fail without a network call when not logged in', async () => {
      const service = createService({ status: 'not-configured', reason: 'No config file' });

      await expect(service.getSession()).rejects.toBeInstanceOf(NotLoggedInError);
      expect(mockClient.refreshToken).not.toHaveBeenCalled();
    });

    it('should exchange the stored refresh token', async () => {
      mockClient.refreshToken.mockResolvedValueOnce(refreshed());
      const service = createService(configured);

      const session = await service.getSession(1_000);

      expect(mockClient.refreshToken).toHaveBeenCalledWith('refresh-1');
      expect(session).toEqual({ accessToken: 'access-1', userId: 'user-1', expiresAt: 3_601_000 });
      expect(mockStore.saveCredentials).not.toHaveBeenCalled();
    });

    it('should persist a rotated refresh token', async () => {
      mockClient.refreshToken
        .mockResolvedValueOnce(refreshed({ refresh_token: 'refresh-2', expires_in: '60' }))
        .mockResolvedValueOnce(refreshed({ refresh_token: 'refresh-2', id_token: 'access-2' }));
      const service = createService(configured);

      await service.getSession(0);
      const second = await service.getSession(0);

      expect(mockStore.saveCredentials).toHaveBeenCalledTimes(1);
      expect(mockStore.saveCredentials).toHaveBeenCalledWith('refresh-2');
      expect(mockClient.refreshToken).toHaveBeenNthCalledWith(2, 'refresh-2');
      expect(second.accessToken).toBe('access-2');
    });

    it('should reuse a session that is not close to expiry', async () => {
      mockClient.refreshToken.mockResolvedValueOnce(refreshed());
      const service = createService(configured);

      const first = await service.getSession(0);
      const second = await service.getSession(60_000);

      expect(second).toBe(first);
      expect(mockClient.refreshToken).toHaveBeenCalledTimes(1);
    });

    it('should propagate a revoked token', async () => {
      mockClient.refreshToken.mockRejectedValueOnce(new AuthError('Session expired or revoked (TOKEN_EXPIRED)'));
      const service = createService(configured);

      await expect(service.getSession()).rejects.toBeInstanceOf(AuthError);
    });
  });
});
