jest.mock('@microsoft/microsoft-graph-client', () => ({
  Client: {
    init: jest.fn(() => ({ api: jest.fn() }))
  }
}));

import { Client } from '@microsoft/microsoft-graph-client';
import { AzureConfig } from '../config/types';
import { AUDIT_SCOPES, GraphSessionService } from './graph-session.service';
import { logger } from '../utils/logger';

describe('GraphSessionService', () => {
  const azureConfig: AzureConfig = {
    tenantId: 'test-tenant',
    clientId: 'test-client',
    clientSecret: 'test-secret',
    authorityHost: 'https://login.microsoftonline.com',
    authMode: 'app-only'
  };

  const createProvider = () => ({
    authMode: 'app-only' as const,
    getAccessToken: jest.fn().mockResolvedValue('test-token'),
    clearCache: jest.fn().mockResolvedValue(undefined)
  });

  const flushPromises = () => new Promise(resolve => setImmediate(resolve));

  it('should acquire a token up front and return a session', async () => {
    const provider = createProvider();
    const createTokenProvider = jest.fn(() => provider);
    const service = new GraphSessionService(azureConfig, { createTokenProvider });

    const result = await service.establishSession();

    expect(result.ok).toBe(true);
    expect(createTokenProvider).toHaveBeenCalledWith(azureConfig, [...AUDIT_SCOPES], expect.any(Function));
    expect(provider.getAccessToken).toHaveBeenCalledTimes(1);
    expect(Client.init).toHaveBeenCalledWith({
      authProvider: expect.any(Function),
      defaultVersion: 'v1.0',
      debugLogging: false
    });
    if (result.ok) {
      expect(result.value.authMode).toBe('app-only');
      expect(result.value.scopes).toEqual(['User.Read.All', 'UserAuthenticationMethod.Read.All']);
    }
  });

  it('should hand tokens to the Graph client through the auth provider', async () => {
    const provider = createProvider();
    const service = new GraphSessionService(azureConfig, { createTokenProvider: () => provider });
    await service.establishSession();

    const options = jest.mocked(Client.init).mock.calls[0][0];
    const done = jest.fn();
    options.authProvider?.(done);
    await flushPromises();

    expect(done).toHaveBeenCalledWith(null, 'test-token');
  });

  it('should pass token failures to the Graph client', async () => {
    const provider = createProvider();
    const service = new GraphSessionService(azureConfig, { createTokenProvider: () => provider });
    await service.establishSession();

    provider.getAccessToken.mockRejectedValueOnce(new Error('token expired'));
    const options = jest.mocked(Client.init).mock.calls[0][0];
    const done = jest.fn();
    options.authProvider?.(done);
    await flushPromises();

    expect(done).toHaveBeenCalledWith(new Error('token expired'), null);
  });

  it('should fail with an AuthenticationError when sign-in is rejected', async () => {
    const provider = createProvider();
    provider.getAccessToken.mockRejectedValue(new Error('AADSTS7000215: Invalid client secret provided.'));
    const service = new GraphSessionService(azureConfig, { createTokenProvider: () => provider });

    const result = await service.establishSession();

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.name).toBe('AuthenticationError');
      expect(result.error.code).toBe('AUTH_ERROR');
      expect(result.error.message).toBe(
        'Failed to authenticate to Microsoft Graph (app-only) for tenant test-tenant: AADSTS7000215: Invalid client secret provided.'
      );
    }
    expect(Client.init).not.toHaveBeenCalled();
  });

  it('should fail without tenant or client id', async () => {
    const createTokenProvider = jest.fn();
    const service = new GraphSessionService({ ...azureConfig, tenantId: '' }, { createTokenProvider });

    const result = await service.establishSession();

    expect(result.ok).toBe(false);
    expect(createTokenProvider).not.toHaveBeenCalled();
  });

  it('should release the session only once', async () => {
    const provider = createProvider();
    const service = new GraphSessionService(azureConfig, { createTokenProvider: () => provider });
    const result = await service.establishSession();
    if (!result.ok) {
      throw result.error;
    }

    await result.value.release();
    await result.value.release();

    expect(provider.clearCache).toHaveBeenCalledTimes(1);
  });

  it('should log but not throw when release fails', async () => {
    const provider = createProvider();
    provider.clearCache.mockRejectedValue(new Error('cache locked'));
    const service = new GraphSessionService(azureConfig, { createTokenProvider: () => provider });
    const result = await service.establishSession();
    if (!result.ok) {
      throw result.error;
    }

    await expect(result.value.release()).resolves.toBeUndefined();
    expect(logger.child({}).warn).toHaveBeenCalledWith('Failed to release Microsoft Graph session: cache locked');
  });

  it('should show the device code prompt through the configured handler', async () => {
    const onDeviceCode = jest.fn();
    const createTokenProvider = jest.fn(() => createProvider());
    const service = new GraphSessionService({ ...azureConfig, authMode: 'delegated' }, { onDeviceCode, createTokenProvider });

    await service.establishSession();

    expect(createTokenProvider).toHaveBeenCalledWith(expect.anything(), expect.anything(), onDeviceCode);
  });
});
