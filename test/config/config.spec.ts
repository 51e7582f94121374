import { describe, it, expect } from 'vitest';
import { ConfigError, loadGatewayConfig } from '../../src/config/config.js';
import { UpstreamAuthScheme } from '../../src/types/enums.js';

describe('loadGatewayConfig', () => {
  it('applies defaults to an empty environment', () => {
    const config = loadGatewayConfig({});

    expect(config).toEqual({
      port: 8000,
      basePath: '/api',
      upstream: {
        baseUrl: 'http://localhost/base/odata/standard.odata',
        authScheme: UpstreamAuthScheme.Basic,
        probePath: '',
        timeoutMs: 30000,
        authTimeoutMs: 15000,
        serviceCredentials: undefined,
      },
      sessions: { ttlSeconds: 3600, maxActive: 10 },
      resourceMappingPath: 'config/resources.json',
      shutdownTimeoutMs: 10000,
      assistant: undefined,
    });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('normalizes the base path and the upstream URL', () => {
    expect(loadGatewayConfig({ GATEWAY_BASE_PATH: 'gateway/' }).basePath).toBe('/gateway');
    expect(loadGatewayConfig({ GATEWAY_BASE_PATH: '/' }).basePath).toBe('/');
    expect(loadGatewayConfig({ UPSTREAM_BASE_URL: 'http://erp.local/odata/' }).upstream.baseUrl)
      .toBe('http://erp.local/odata');
  });

  it('reads the auth scheme case-insensitively', () => {
    expect(loadGatewayConfig({ UPSTREAM_AUTH_SCHEME: 'IBSession' }).upstream.authScheme)
      .toBe(UpstreamAuthScheme.IBSession);
    expect(() => loadGatewayConfig({ UPSTREAM_AUTH_SCHEME: 'ntlm' })).toThrow(ConfigError);
  });

  it('rejects invalid numbers', () => {
    expect(() => loadGatewayConfig({ SESSION_TTL: 'abc' })).toThrow('SESSION_TTL must be an integer >= 1, got "abc"');
    expect(() => loadGatewayConfig({ MAX_ACTIVE_SESSIONS: '0' })).toThrow(ConfigError);
    expect(() => loadGatewayConfig({ UPSTREAM_TIMEOUT_MS: '1.5' })).toThrow(ConfigError);
  });

  it('rejects an invalid upstream URL', () => {
    expect(() => loadGatewayConfig({ UPSTREAM_BASE_URL: 'not a url' })).toThrow(ConfigError);
  });

  it('reads service credentials for the configured scheme', () => {
    expect(loadGatewayConfig({ UPSTREAM_USERNAME: 'svc', UPSTREAM_PASSWORD: 'test-secret' }).upstream.serviceCredentials)
      .toEqual({ kind: 'basic', username: 'svc', password: 'test-secret' });

    expect(loadGatewayConfig({ UPSTREAM_AUTH_SCHEME: 'token', UPSTREAM_TOKEN: 'test-token' }).upstream.serviceCredentials)
      .toEqual({ kind: 'token', token: 'test-token' });

    expect(loadGatewayConfig({ UPSTREAM_AUTH_SCHEME: 'token', UPSTREAM_USERNAME: 'svc' }).upstream.serviceCredentials)
      .toBeUndefined();
  });

  it('enables the assistant only with a token', () => {
    const config = loadGatewayConfig({ ONEC_AI_TOKEN: 'test-token', ONEC_AI_TIMEOUT: '5', MAX_ACTIVE_SESSIONS: '3' });

    expect(config.assistant).toEqual({
      baseUrl: 'https://code.1c.ai',
      token: 'test-token',
      timeoutMs: 5000,
      uiLanguage: 'russian',
      programmingLanguage: '',
      scriptLanguage: '',
      maxActiveConversations: 3,
      conversationTtlSeconds: 3600,
    });
  });
});
