import { InvalidationReason } from '../../types/enums.js';
import {
  AuthenticationError,
  InternalError,
  SessionExpiredSignal,
  UpstreamProtocolError,
} from '../../types/errors.js';
import type {
  CallOptions,
  NativeCall,
  NativeRecord,
  NativeResponse,
  UpstreamCredentials,
} from '../../types/gateway.types.js';
import type { IUpstreamTransport } from '../transport/IUpstreamTransport.js';
import { SessionPool } from './SessionPool.js';
import type { SessionLease } from './UpstreamSession.js';
import { CallScope } from './CallScope.js';
import { createLogger } from '../../logger/index.js';

export interface BackendConnectorOptions {
  /** Default deadline for execute when the caller gives none */
  timeoutMs: number;
}

function isNativeRecord(value: unknown): value is NativeRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Executes native calls against the upstream on pooled sessions
 */
export class BackendConnector {
  private logger = createLogger('BackendConnector');

  constructor(
    private transport: IUpstreamTransport,
    private pool: SessionPool,
    private options: BackendConnectorOptions,
  ) {}

  acquire(credentials: UpstreamCredentials, options: CallOptions = {}): Promise<SessionLease> {
    return this.pool.acquire(credentials, options);
  }

  release(lease: SessionLease): Promise<void> {
    return this.pool.release(lease);
  }

  /**
   * Run `fn` with a leased session; the lease is released on every exit path
   */
  async withSession<T>(
    credentials: UpstreamCredentials,
    options: CallOptions,
    fn: (lease: SessionLease) => Promise<T>
  ): Promise<T> {
    const lease = await this.acquire(credentials, options);
    try {
      return await fn(lease);
    } finally {
      await this.release(lease);
    }
  }

  /**
   * Forward a native call. An upstream session expiry triggers one
   * re-authentication and one retry; a second expiry is an AuthenticationError.
   */
  async execute(lease: SessionLease, call: NativeCall, options: CallOptions = {}): Promise<NativeResponse> {
    try {
      return await this.executeOnce(lease, call, options);
    } catch (error) {
      if (!(error instanceof SessionExpiredSignal)) {
        throw error;
      }

      this.logger.info(
        { sessionId: lease.session.id, entity: call.entity, operation: call.operation },
        'Upstream session expired, re-authenticating once'
      );
      await this.pool.renew(lease, options);

      try {
        return await this.executeOnce(lease, call, options);
      } catch (retryError) {
        if (retryError instanceof SessionExpiredSignal) {
          this.pool.invalidate(lease.session, InvalidationReason.AuthExpired);
          throw new AuthenticationError('Upstream rejected the session again after re-authentication', {
            diagnostic: retryError.diagnostic,
          });
        }
        throw retryError;
      }
    }
  }

  async shutdown(): Promise<void> {
    await this.pool.removeAllSessions();
  }

  private async executeOnce(lease: SessionLease, call: NativeCall, options: CallOptions): Promise<NativeResponse> {
    if (lease.released) {
      throw new InternalError('Native call attempted on a released session lease');
    }

    const session = lease.session;
    const scope = new CallScope(options.timeoutMs ?? this.options.timeoutMs, options.signal, `${call.operation} ${call.entity}`);
    const startedAt = Date.now();
    try {
      const payload = await scope.race(this.transport.execute(session.auth, call, scope.signal));
      this.assertPayloadShape(call, payload);
      this.pool.touch(session);

      this.logger.debug(
        { sessionId: session.id, entity: call.entity, operation: call.operation, durationMs: Date.now() - startedAt },
        'Upstream call completed'
      );
      return { call, payload };
    } catch (error) {
      if (scope.isAborted) {
        // The upstream may still be processing; nothing is known about the session's state
        this.pool.invalidate(session, scope.isTimedOut ? InvalidationReason.Expired : InvalidationReason.Cancelled);
        this.logger.warn(
          { sessionId: session.id, entity: call.entity, timedOut: scope.isTimedOut },
          'Upstream call abandoned, session invalidated'
        );
      }
      throw scope.translate(error);
    } finally {
      scope.dispose();
    }
  }

  private assertPayloadShape(call: NativeCall, payload: unknown): void {
    const valid = payload === null
      || isNativeRecord(payload)
      || (Array.isArray(payload) && payload.every(isNativeRecord));
    if (!valid) {
      throw new UpstreamProtocolError(`Upstream returned an unexpected payload for ${call.entity}`, {
        diagnostic: typeof payload,
      });
    }
  }
}
