import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { CallScope } from '../../../src/gateway/core/CallScope.js';
import { RequestCancelledError, UpstreamTimeoutError } from '../../../src/types/errors.js';
import { deferred } from '../../helpers/fakeTransport.js';

describe('CallScope', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('passes through a result that arrives before the deadline', async () => {
    const scope = new CallScope(1000);

    await expect(scope.race(Promise.resolve('ok'))).resolves.toBe('ok');
    expect(scope.isAborted).toBe(false);
    scope.dispose();
  });

  it('rejects with a timeout once the deadline passes', async () => {
    const scope = new CallScope(1000, undefined, 'Read items');
    const pending = deferred<string>();

    const raced = expect(scope.race(pending.promise)).rejects.toThrow('Read items exceeded 1000 ms');
    await vi.advanceTimersByTimeAsync(1000);
    await raced;

    expect(scope.isTimedOut).toBe(true);
    expect(scope.signal.aborted).toBe(true);
    expect(scope.translate(new Error('socket closed'))).toBeInstanceOf(UpstreamTimeoutError);
  });

  it('follows the parent signal', async () => {
    const parent = new AbortController();
    const scope = new CallScope(1000, parent.signal);
    const pending = deferred<string>();

    const raced = expect(scope.race(pending.promise)).rejects.toBeInstanceOf(RequestCancelledError);
    parent.abort();
    await raced;

    expect(scope.isCancelled).toBe(true);
    expect(scope.isTimedOut).toBe(false);
  });

  it('starts aborted under an aborted parent', async () => {
    const parent = new AbortController();
    parent.abort();
    const scope = new CallScope(1000, parent.signal);

    await expect(scope.race(Promise.resolve(1))).rejects.toThrow('Upstream call was cancelled');
  });

  it('leaves errors alone while not aborted', () => {
    const scope = new CallScope(1000);
    const error = new Error('boom');

    expect(scope.translate(error)).toBe(error);
    scope.dispose();
  });

  it('stops the timer and the parent listener on dispose', async () => {
    const parent = new AbortController();
    const scope = new CallScope(1000, parent.signal);
    scope.dispose();

    await vi.advanceTimersByTimeAsync(2000);
    parent.abort();

    expect(scope.isAborted).toBe(false);
  });

  it('has no deadline without a timeout', async () => {
    const scope = new CallScope();

    await vi.advanceTimersByTimeAsync(60_000);
    expect(scope.isAborted).toBe(false);
  });
});
