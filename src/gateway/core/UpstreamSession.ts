import { InvalidationReason, SessionStatus } from '../../types/enums.js';
import type { UpstreamAuthHandle } from '../auth/IAuthStrategy.js';
import type { UpstreamCredentials } from '../../types/gateway.types.js';

/**
 * Authenticated connection to the upstream
 *
 * Requests only read a session. Every state change goes through the
 * SessionPool that created it.
 */
export class UpstreamSession {
  private static nextId = 1;

  readonly id: string;
  readonly credentialKey: string;
  readonly auth: UpstreamAuthHandle;
  readonly createdAt: Date;

  private _lastUsed: Date;
  private _status: SessionStatus = SessionStatus.Active;
  private _invalidationReason?: InvalidationReason;
  private _leases = 0;

  constructor(credentialKey: string, auth: UpstreamAuthHandle, now: Date = new Date()) {
    this.id = String(UpstreamSession.nextId++);
    this.credentialKey = credentialKey;
    this.auth = auth;
    this.createdAt = now;
    this._lastUsed = now;
  }

  get lastUsed(): Date {
    return this._lastUsed;
  }

  get status(): SessionStatus {
    return this._status;
  }

  get invalidationReason(): InvalidationReason | undefined {
    return this._invalidationReason;
  }

  /**
   * Number of requests currently holding this session
   */
  get leases(): number {
    return this._leases;
  }

  get isActive(): boolean {
    return this._status === SessionStatus.Active;
  }

  /**
   * Whether an active session may be handed out again at `now`
   */
  isReusable(now: number, ttlMs: number): boolean {
    if (!this.isActive) {
      return false;
    }
    if (this.auth.expiresAt !== undefined && now >= this.auth.expiresAt) {
      return false;
    }
    return now - this._lastUsed.getTime() <= ttlMs;
  }

  /** @internal SessionPool only */
  markUsed(now: Date = new Date()): void {
    this._lastUsed = now;
  }

  /** @internal SessionPool only */
  retain(): void {
    this._leases++;
  }

  /** @internal SessionPool only */
  releaseLease(): number {
    if (this._leases === 0) {
      throw new Error(`Session ${this.id} has no outstanding leases`);
    }
    return --this._leases;
  }

  /** @internal SessionPool only */
  end(status: SessionStatus.Expired | SessionStatus.Invalidated, reason: InvalidationReason): boolean {
    if (!this.isActive) {
      return false;
    }
    this._status = status;
    this._invalidationReason = reason;
    return true;
  }
}

/**
 * A request's claim on a shared session
 *
 * Returned by acquire; handed back exactly once through release.
 */
export class SessionLease {
  private _released = false;

  constructor(
    private _session: UpstreamSession,
    readonly credentials: UpstreamCredentials
  ) {}

  get session(): UpstreamSession {
    return this._session;
  }

  get released(): boolean {
    return this._released;
  }

  /** @internal SessionPool only */
  rebind(session: UpstreamSession): void {
    this._session = session;
  }

  /** @internal SessionPool only */
  markReleased(): void {
    this._released = true;
  }
}
