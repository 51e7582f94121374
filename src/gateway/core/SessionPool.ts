import { InvalidationReason, SessionStatus } from '../../types/enums.js';
import {
  RequestCancelledError,
  UpstreamTimeoutError,
  UpstreamUnavailableError,
} from '../../types/errors.js';
import type { CallOptions, UpstreamCredentials } from '../../types/gateway.types.js';
import type { IUpstreamTransport } from '../transport/IUpstreamTransport.js';
import type { UpstreamAuthHandle } from '../auth/IAuthStrategy.js';
import { SessionLease, UpstreamSession } from './UpstreamSession.js';
import { CallScope } from './CallScope.js';
import { AuthUtils } from '../../utils/AuthUtils.js';
import { SESSION_CLEANUP_INTERVAL_MS } from '../../config/sessionConfig.js';
import { createLogger } from '../../logger/index.js';

export interface SessionPoolOptions {
  ttlSeconds: number;
  maxActive: number;
  /** Deadline for handshakes and logouts */
  authTimeoutMs: number;
}

/**
 * Single in-flight handshake for one credential key
 */
interface PendingHandshake {
  promise: Promise<UpstreamSession>;
  controller: AbortController;
  waiters: number;
  state: { settled: boolean; timedOut: boolean };
}

/**
 * Owns every upstream session
 *
 * At most one live session per credential key. Concurrent acquisitions for a
 * key share one handshake and receive the same session.
 */
export class SessionPool {
  private sessions: Map<string, UpstreamSession> = new Map();
  private pending: Map<string, PendingHandshake> = new Map();
  // Ended sessions still held by requests; logged out when their last lease returns
  private draining: Set<UpstreamSession> = new Set();
  private cleanupTimer?: NodeJS.Timeout;
  private closed = false;

  private logger = createLogger('SessionPool');

  constructor(
    private transport: IUpstreamTransport,
    private options: SessionPoolOptions,
  ) {}

  private get ttlMs(): number {
    return this.options.ttlSeconds * 1000;
  }

  /**
   * Lease the live session for these credentials, authenticating if needed
   */
  async acquire(credentials: UpstreamCredentials, options: CallOptions = {}): Promise<SessionLease> {
    const session = await this.obtainSession(credentials, options);
    return this.lease(session, credentials);
  }

  /**
   * Return a lease. A second release of the same lease is ignored.
   */
  async release(lease: SessionLease): Promise<void> {
    if (lease.released) {
      this.logger.warn({ sessionId: lease.session.id }, 'Session lease released twice, ignoring');
      return;
    }
    lease.markReleased();
    await this.dropLease(lease.session);
  }

  /**
   * Replace the session behind a lease after the upstream rejected it
   */
  async renew(lease: SessionLease, options: CallOptions = {}): Promise<void> {
    const stale = lease.session;
    this.invalidate(stale, InvalidationReason.AuthExpired);

    const fresh = await this.obtainSession(lease.credentials, options);
    fresh.retain();
    fresh.markUsed();
    lease.rebind(fresh);
    await this.dropLease(stale);

    this.logger.info(
      { staleSessionId: stale.id, sessionId: fresh.id, key: AuthUtils.formatKeyForLog(fresh.credentialKey) },
      'Session renewed after upstream expiry'
    );
  }

  /**
   * Take a session out of service. Holders keep using it until they release.
   */
  invalidate(session: UpstreamSession, reason: InvalidationReason): void {
    this.endSession(session, SessionStatus.Invalidated, reason);
  }

  /**
   * Record a successful call on a session
   */
  touch(session: UpstreamSession): void {
    if (session.isActive) {
      session.markUsed();
    }
  }

  /**
   * Check and cleanup expired sessions
   */
  async cleanupExpiredSessions(): Promise<number> {
    const now = Date.now();
    const expired: UpstreamSession[] = [];

    for (const session of this.sessions.values()) {
      if (session.leases === 0 && !session.isReusable(now, this.ttlMs)) {
        expired.push(session);
      }
    }

    for (const session of expired) {
      this.endSession(session, SessionStatus.Expired, InvalidationReason.Expired);
    }

    if (expired.length > 0) {
      this.logger.info({ count: expired.length }, 'Cleaned up expired sessions');
    }
    return expired.length;
  }

  /**
   * Start periodic cleanup timer
   */
  startCleanupTimer(intervalMs: number = SESSION_CLEANUP_INTERVAL_MS): void {
    this.stopCleanupTimer();
    this.cleanupTimer = setInterval(() => {
      this.cleanupExpiredSessions().catch(error => {
        this.logger.error({ error }, 'Session cleanup error');
      });
    }, intervalMs);
    this.cleanupTimer.unref();
  }

  stopCleanupTimer(): void {
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = undefined;
    }
  }

  /**
   * Refuse new acquisitions and log out every session
   */
  async removeAllSessions(): Promise<void> {
    this.closed = true;
    this.stopCleanupTimer();

    for (const pending of this.pending.values()) {
      pending.controller.abort();
    }

    const sessions = [...this.sessions.values(), ...this.draining];
    this.sessions.clear();
    this.draining.clear();

    const results = await Promise.allSettled(
      sessions.map(async (session) => {
        session.end(SessionStatus.Invalidated, InvalidationReason.Shutdown);
        await this.logout(session.auth);
      })
    );
    const failed = results.filter((result) => result.status === 'rejected').length;
    this.logger.info({ count: sessions.length, failed }, 'All upstream sessions removed');
  }

  getActiveSessionCount(): number {
    return this.sessions.size;
  }

  getLeasedSessionCount(): number {
    let count = 0;
    for (const session of this.sessions.values()) {
      if (session.leases > 0) count++;
    }
    return count + this.draining.size;
  }

  getPendingHandshakeCount(): number {
    return this.pending.size;
  }

  /**
   * Live session for a credential key, if any
   */
  peek(credentials: UpstreamCredentials): UpstreamSession | undefined {
    return this.sessions.get(AuthUtils.credentialKey(credentials));
  }

  private lease(session: UpstreamSession, credentials: UpstreamCredentials): SessionLease {
    session.retain();
    session.markUsed();
    return new SessionLease(session, credentials);
  }

  private async obtainSession(credentials: UpstreamCredentials, options: CallOptions): Promise<UpstreamSession> {
    if (this.closed) {
      throw new UpstreamUnavailableError('Gateway is shutting down');
    }

    const key = AuthUtils.credentialKey(credentials);
    const existing = this.sessions.get(key);
    if (existing) {
      if (existing.isReusable(Date.now(), this.ttlMs)) {
        return existing;
      }
      this.endSession(existing, SessionStatus.Expired, InvalidationReason.Expired);
    }

    const scope = new CallScope(options.timeoutMs, options.signal, 'Upstream authentication');
    const inFlight = this.pending.get(key);
    // An abandoned handshake is already being torn down; start over rather than inherit its failure
    const pending = inFlight && !inFlight.controller.signal.aborted
      ? inFlight
      : this.startHandshake(key, credentials);
    pending.waiters++;
    try {
      return await scope.race(pending.promise);
    } finally {
      pending.waiters--;
      if (scope.isAborted && pending.waiters === 0 && !pending.state.settled) {
        this.logger.debug({ key: AuthUtils.formatKeyForLog(key) }, 'All callers abandoned handshake, aborting it');
        pending.controller.abort();
      }
      scope.dispose();
    }
  }

  private startHandshake(key: string, credentials: UpstreamCredentials): PendingHandshake {
    const controller = new AbortController();
    const state = { settled: false, timedOut: false };
    const timer = setTimeout(() => {
      state.timedOut = true;
      controller.abort();
    }, this.options.authTimeoutMs);

    const promise = (async (): Promise<UpstreamSession> => {
      let auth: UpstreamAuthHandle;
      try {
        auth = await this.transport.authenticate(credentials, controller.signal);
      } catch (error) {
        if (controller.signal.aborted) {
          throw state.timedOut
            ? new UpstreamTimeoutError(`Upstream authentication exceeded ${this.options.authTimeoutMs} ms`)
            : new RequestCancelledError('Upstream authentication was abandoned');
        }
        throw error;
      } finally {
        clearTimeout(timer);
        state.settled = true;
        if (this.pending.get(key)?.state === state) {
          this.pending.delete(key);
        }
      }

      if (controller.signal.aborted || this.closed) {
        // Completed after every caller left; never pooled
        this.logoutInBackground(auth, 'abandoned handshake');
        throw state.timedOut
          ? new UpstreamTimeoutError(`Upstream authentication exceeded ${this.options.authTimeoutMs} ms`)
          : new RequestCancelledError('Upstream authentication was abandoned');
      }

      const session = new UpstreamSession(key, auth);
      this.evictIfFull();
      this.sessions.set(key, session);
      this.logger.info(
        { sessionId: session.id, key: AuthUtils.formatKeyForLog(key), scheme: auth.scheme },
        'Upstream session created'
      );
      return session;
    })();

    const pending: PendingHandshake = { promise, controller, waiters: 0, state };
    if (!state.settled) {
      this.pending.set(key, pending);
    }
    return pending;
  }

  /**
   * Make room for a new session by ending the least recently used idle one
   */
  private evictIfFull(): void {
    if (this.sessions.size < this.options.maxActive) {
      return;
    }

    let oldest: UpstreamSession | undefined;
    for (const session of this.sessions.values()) {
      if (session.leases > 0) continue;
      if (!oldest || session.lastUsed.getTime() < oldest.lastUsed.getTime()) {
        oldest = session;
      }
    }

    if (!oldest) {
      this.logger.warn(
        { size: this.sessions.size, maxActive: this.options.maxActive },
        'Session pool is full and every session is leased, exceeding limit'
      );
      return;
    }

    this.endSession(oldest, SessionStatus.Invalidated, InvalidationReason.Evicted);
    this.logger.info({ sessionId: oldest.id }, 'Evicted least recently used session');
  }

  private endSession(
    session: UpstreamSession,
    status: SessionStatus.Expired | SessionStatus.Invalidated,
    reason: InvalidationReason
  ): void {
    if (!session.end(status, reason)) {
      return;
    }
    if (this.sessions.get(session.credentialKey) === session) {
      this.sessions.delete(session.credentialKey);
    }

    this.logger.debug({ sessionId: session.id, status, reason, leases: session.leases }, 'Session ended');

    if (session.leases === 0) {
      this.logoutInBackground(session.auth, reason);
    } else {
      this.draining.add(session);
    }
  }

  private async dropLease(session: UpstreamSession): Promise<void> {
    const remaining = session.releaseLease();
    if (remaining === 0 && this.draining.delete(session)) {
      await this.logout(session.auth).catch(error => {
        this.logger.warn({ error, sessionId: session.id }, 'Upstream logout failed');
      });
    }
  }

  private async logout(auth: UpstreamAuthHandle): Promise<void> {
    const scope = new CallScope(this.options.authTimeoutMs, undefined, 'Upstream logout');
    try {
      await scope.race(this.transport.logout(auth, scope.signal));
    } catch (error) {
      throw scope.translate(error);
    } finally {
      scope.dispose();
    }
  }

  private logoutInBackground(auth: UpstreamAuthHandle, reason: string): void {
    this.logout(auth).catch(error => {
      this.logger.warn({ error, reason }, 'Upstream logout failed');
    });
  }
}
