import { describe, it, expect } from 'vitest';
import { GatewayDispatcher, parseResourcePath } from '../../../src/gateway/core/GatewayDispatcher.js';
import { BackendConnector } from '../../../src/gateway/core/BackendConnector.js';
import { RequestTranslator } from '../../../src/gateway/core/RequestTranslator.js';
import { SessionPool } from '../../../src/gateway/core/SessionPool.js';
import { parseResourceMapping } from '../../../src/config/resourceMapping.js';
import { UnknownResourceError } from '../../../src/types/errors.js';
import type { GatewayHttpRequest, UpstreamCredentials } from '../../../src/types/gateway.types.js';
import { FakeTransport } from '../../helpers/fakeTransport.js';

const mapping = parseResourceMapping({
  resources: {
    items: {
      entity: 'Catalog.Items',
      keyFormat: 'string',
      operations: ['read', 'list', 'create'],
      fields: {
        id: { native: 'Ref', type: 'string', readOnly: true },
        name: { native: 'Name', type: 'string' },
      },
    },
  },
});

function setup(options: { basePath?: string; serviceCredentials?: UpstreamCredentials } = {}) {
  const transport = new FakeTransport();
  const pool = new SessionPool(transport, { ttlSeconds: 60, maxActive: 10, authTimeoutMs: 1000 });
  const connector = new BackendConnector(transport, pool, { timeoutMs: 1000 });
  const dispatcher = new GatewayDispatcher(new RequestTranslator(mapping), connector, {
    basePath: options.basePath ?? '/api',
    serviceCredentials: options.serviceCredentials,
  });
  return { transport, pool, dispatcher };
}

function request(overrides: Partial<GatewayHttpRequest> = {}): GatewayHttpRequest {
  return {
    method: 'GET',
    path: '/items/42',
    query: [],
    headers: { authorization: 'Bearer test-token' },
    body: undefined,
    requestId: 'req-1',
    ...overrides,
  };
}

describe('parseResourcePath', () => {
  it('accepts a collection or an entity path', () => {
    expect(parseResourcePath('/items')).toEqual({ resource: 'items' });
    expect(parseResourcePath('/items/42')).toEqual({ resource: 'items', id: '42' });
    expect(parseResourcePath('items/a%20b')).toEqual({ resource: 'items', id: 'a b' });
  });

  it('rejects other shapes', () => {
    expect(() => parseResourcePath('/')).toThrow('No resource named in path');
    expect(() => parseResourcePath('/items/')).toThrow('No resource at path "/items/"');
    expect(() => parseResourcePath('/items/1/lines')).toThrow(UnknownResourceError);
    expect(() => parseResourcePath('/items/%E0%A4%A')).toThrow('Malformed path "/items/%E0%A4%A"');
  });
});

describe('GatewayDispatcher', () => {
  it('forwards bearer tokens and returns the translated entity', async () => {
    const { transport, pool, dispatcher } = setup();
    transport.executeImpl = async () => ({ Ref: '42', Name: 'Widget' });

    const response = await dispatcher.handle(request());

    expect(response).toEqual({ status: 200, headers: {}, body: { id: '42', name: 'Widget' } });
    expect(transport.authenticateCalls).toEqual([{ kind: 'token', token: 'test-token' }]);
    expect(pool.getLeasedSessionCount()).toBe(0);
  });

  it('uses the service account without an Authorization header', async () => {
    const service: UpstreamCredentials = { kind: 'basic', username: 'svc', password: 'test-secret' };
    const { transport, dispatcher } = setup({ serviceCredentials: service });
    transport.executeImpl = async () => [];

    const response = await dispatcher.handle(request({ path: '/items', headers: {} }));

    expect(response.status).toBe(200);
    expect(transport.authenticateCalls).toEqual([service]);
  });

  it('prefixes Location with the base path', async () => {
    const { transport, dispatcher } = setup({ basePath: '/' });
    transport.executeImpl = async () => ({ Ref: 'a/b' });

    const response = await dispatcher.handle(request({ method: 'POST', path: '/items', body: { name: 'A' } }));

    expect(response.status).toBe(201);
    expect(response.headers).toEqual({ Location: '/items/a%2Fb' });
  });

  it('answers a malformed Authorization header with a challenge', async () => {
    const { transport, dispatcher } = setup();

    const response = await dispatcher.handle(request({ headers: { authorization: 'Basic' } }));

    expect(response).toEqual({
      status: 401,
      headers: { 'WWW-Authenticate': 'Basic realm="1C gateway", charset="UTF-8"' },
      body: { error: { kind: 'AuthenticationError', message: 'Malformed Authorization header' }, requestId: 'req-1' },
    });
    expect(transport.authenticateCalls).toHaveLength(0);
  });

  it('treats unsupported methods as unknown routes', async () => {
    const { dispatcher } = setup();

    const response = await dispatcher.handle(request({ method: 'OPTIONS' }));

    expect(response.status).toBe(404);
    expect(response.body).toEqual({
      error: { kind: 'UnknownResourceError', message: 'Method OPTIONS is not supported' },
      requestId: 'req-1',
    });
  });

  it('hides unexpected failures behind an internal error', async () => {
    const { transport, dispatcher } = setup();
    transport.executeImpl = () => Promise.reject(new Error('socket hang up'));

    const response = await dispatcher.handle(request());

    expect(response.status).toBe(500);
    expect(response.body).toEqual({
      error: { kind: 'InternalError', message: 'Internal gateway error' },
      requestId: 'req-1',
    });
  });

  it('reports a request cancelled before it reached the upstream', async () => {
    const { transport, dispatcher } = setup();
    const controller = new AbortController();
    controller.abort();

    const response = await dispatcher.handle(request({ signal: controller.signal }));

    expect(response.status).toBe(499);
    expect(transport.executeCalls).toHaveLength(0);
  });
});
