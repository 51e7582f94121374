import { UpstreamAuthScheme } from '../../src/types/enums.js';
import type { UpstreamAuthHandle } from '../../src/gateway/auth/IAuthStrategy.js';
import type { IUpstreamTransport } from '../../src/gateway/transport/IUpstreamTransport.js';
import type { NativeCall, NativeResponse, UpstreamCredentials } from '../../src/types/gateway.types.js';

type AuthenticateImpl = (credentials: UpstreamCredentials, signal: AbortSignal) => Promise<UpstreamAuthHandle>;
type ExecuteImpl = (auth: UpstreamAuthHandle, call: NativeCall, signal: AbortSignal) => Promise<NativeResponse['payload']>;

/**
 * In-process upstream that records every call
 */
export class FakeTransport implements IUpstreamTransport {
  readonly name = 'fake';

  authenticateCalls: UpstreamCredentials[] = [];
  executeCalls: { auth: UpstreamAuthHandle; call: NativeCall }[] = [];
  logoutCalls: UpstreamAuthHandle[] = [];

  authenticateImpl?: AuthenticateImpl;
  executeImpl: ExecuteImpl = async () => null;

  authenticate(credentials: UpstreamCredentials, signal: AbortSignal): Promise<UpstreamAuthHandle> {
    this.authenticateCalls.push(credentials);
    if (this.authenticateImpl) {
      return this.authenticateImpl(credentials, signal);
    }
    return Promise.resolve(FakeTransport.handle(this.authenticateCalls.length));
  }

  execute(auth: UpstreamAuthHandle, call: NativeCall, signal: AbortSignal): Promise<NativeResponse['payload']> {
    this.executeCalls.push({ auth, call });
    return this.executeImpl(auth, call, signal);
  }

  async logout(auth: UpstreamAuthHandle): Promise<void> {
    this.logoutCalls.push(auth);
  }

  /**
   * Handle of the n-th handshake
   */
  static handle(n: number): UpstreamAuthHandle {
    return { scheme: UpstreamAuthScheme.Basic, headers: { 'X-Session': `s${n}` } };
  }
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (error: unknown) => void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/**
 * Promise that rejects once the signal aborts and never resolves otherwise
 */
export function untilAborted<T>(signal: AbortSignal): Promise<T> {
  return new Promise<T>((_, reject) => {
    if (signal.aborted) {
      reject(new Error('aborted'));
      return;
    }
    signal.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
  });
}

/**
 * Run `fn` and return what it throws
 */
export async function captureError(fn: () => unknown): Promise<unknown> {
  try {
    await fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
}
