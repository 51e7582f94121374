import { describe, it, expect } from 'vitest';
import { BackendConnector } from '../../../src/gateway/core/BackendConnector.js';
import { SessionPool } from '../../../src/gateway/core/SessionPool.js';
import { InvalidationReason, KeyFormat, OperationKind } from '../../../src/types/enums.js';
import {
  AuthenticationError,
  InternalError,
  RequestCancelledError,
  SessionExpiredSignal,
  UnknownResourceError,
  UpstreamProtocolError,
  UpstreamTimeoutError,
} from '../../../src/types/errors.js';
import type { NativeCall, UpstreamCredentials } from '../../../src/types/gateway.types.js';
import { FakeTransport, untilAborted } from '../../helpers/fakeTransport.js';

const credentials: UpstreamCredentials = { kind: 'basic', username: 'clerk', password: 'test-secret' };

const readCall: NativeCall = {
  operation: OperationKind.Read,
  resource: 'items',
  entity: 'Catalog.Items',
  key: '42',
  keyFormat: KeyFormat.String,
  filters: [],
};

function setup(timeoutMs = 1000) {
  const transport = new FakeTransport();
  const pool = new SessionPool(transport, { ttlSeconds: 60, maxActive: 10, authTimeoutMs: 1000 });
  const connector = new BackendConnector(transport, pool, { timeoutMs });
  return { transport, pool, connector };
}

describe('BackendConnector', () => {
  it('executes a native call on the leased session', async () => {
    const { transport, connector } = setup();
    transport.executeImpl = async () => ({ Ref: '42', Name: 'Widget' });

    const response = await connector.withSession(credentials, {}, (lease) => connector.execute(lease, readCall));

    expect(response).toEqual({ call: readCall, payload: { Ref: '42', Name: 'Widget' } });
    expect(transport.executeCalls).toEqual([{ auth: FakeTransport.handle(1), call: readCall }]);
  });

  it('releases the lease when the call fails', async () => {
    const { transport, pool, connector } = setup();
    transport.executeImpl = () => Promise.reject(new UnknownResourceError('Entity not found'));

    await expect(
      connector.withSession(credentials, {}, (lease) => connector.execute(lease, readCall))
    ).rejects.toBeInstanceOf(UnknownResourceError);

    const session = pool.peek(credentials);
    expect(session?.leases).toBe(0);
    expect(session?.isActive).toBe(true);
  });

  it('times out, releases the lease once and invalidates the session', async () => {
    const { transport, pool, connector } = setup(20);
    transport.executeImpl = (_auth, _call, signal) => untilAborted(signal);

    const lease = await connector.acquire(credentials);
    const session = lease.session;
    const error = await connector.execute(lease, readCall).catch((caught: unknown) => caught);
    await connector.release(lease);

    expect(error).toBeInstanceOf(UpstreamTimeoutError);
    expect(error).toMatchObject({ message: 'read Catalog.Items exceeded 20 ms', status: 504 });
    expect(session.leases).toBe(0);
    expect(session.invalidationReason).toBe(InvalidationReason.Expired);
    expect(transport.logoutCalls).toEqual([FakeTransport.handle(1)]);
    expect(pool.peek(credentials)).toBeUndefined();
  });

  it('turns a cancelled request into a cancellation and drops the session', async () => {
    const { transport, connector } = setup();
    const controller = new AbortController();
    transport.executeImpl = (_auth, _call, signal) => {
      controller.abort();
      return untilAborted(signal);
    };

    const lease = await connector.acquire(credentials);
    await expect(connector.execute(lease, readCall, { signal: controller.signal }))
      .rejects.toBeInstanceOf(RequestCancelledError);

    expect(lease.session.invalidationReason).toBe(InvalidationReason.Cancelled);
  });

  it('re-authenticates once when the upstream reports an expired session', async () => {
    const { transport, pool, connector } = setup();
    let calls = 0;
    transport.executeImpl = async () => {
      calls++;
      if (calls === 1) {
        throw new SessionExpiredSignal('HTTP 401');
      }
      return { Ref: '42' };
    };

    const lease = await connector.acquire(credentials);
    const response = await connector.execute(lease, readCall);
    await connector.release(lease);

    expect(response.payload).toEqual({ Ref: '42' });
    expect(transport.authenticateCalls).toHaveLength(2);
    expect(transport.executeCalls.map((entry) => entry.auth)).toEqual([
      FakeTransport.handle(1),
      FakeTransport.handle(2),
    ]);
    expect(transport.logoutCalls).toEqual([FakeTransport.handle(1)]);
    expect(pool.peek(credentials)?.leases).toBe(0);
  });

  it('reports a second expiry as an authentication failure', async () => {
    const { transport, pool, connector } = setup();
    transport.executeImpl = () => Promise.reject(new SessionExpiredSignal('HTTP 401: denied'));

    const error = await connector
      .withSession(credentials, {}, (lease) => connector.execute(lease, readCall))
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(AuthenticationError);
    expect(error).toMatchObject({
      message: 'Upstream rejected the session again after re-authentication',
      diagnostic: 'HTTP 401: denied',
    });
    expect(transport.executeCalls).toHaveLength(2);
    expect(transport.authenticateCalls).toHaveLength(2);
    expect(pool.getActiveSessionCount()).toBe(0);
    expect(pool.getLeasedSessionCount()).toBe(0);
  });

  it('refuses to run on a released lease', async () => {
    const { connector } = setup();

    const lease = await connector.acquire(credentials);
    await connector.release(lease);

    await expect(connector.execute(lease, readCall)).rejects.toBeInstanceOf(InternalError);
  });

  it('rejects payloads that are not records', async () => {
    const { transport, connector } = setup();
    transport.executeImpl = async () => JSON.parse('[1, 2]');

    await expect(
      connector.withSession(credentials, {}, (lease) => connector.execute(lease, readCall))
    ).rejects.toBeInstanceOf(UpstreamProtocolError);
  });

  it('logs out every session on shutdown', async () => {
    const { transport, connector } = setup();

    await connector.withSession(credentials, {}, (lease) => connector.execute(lease, readCall));
    await connector.shutdown();

    expect(transport.logoutCalls).toEqual([FakeTransport.handle(1)]);
  });
});
