import type { UpstreamAuthScheme } from '../../types/enums.js';
import type { UpstreamCredentials } from '../../types/gateway.types.js';

/**
 * Result of an upstream authentication handshake
 *
 * Opaque to everything but the transport that sends it.
 */
export interface UpstreamAuthHandle {
  readonly scheme: UpstreamAuthScheme;

  /**
   * Headers attached to every native call made under this session
   */
  readonly headers: Readonly<Record<string, string>>;

  /**
   * Absolute expiry (Unix timestamp, milliseconds), when the upstream states one
   */
  readonly expiresAt?: number;
}

/**
 * Authentication strategy interface
 *
 * One implementation per upstream authentication scheme.
 */
export interface IAuthStrategy {
  readonly scheme: UpstreamAuthScheme;

  /**
   * Perform the handshake for a credential set
   *
   * @throws AuthenticationError when the upstream rejects the credentials
   */
  authenticate(credentials: UpstreamCredentials, signal: AbortSignal): Promise<UpstreamAuthHandle>;

  /**
   * End the upstream session (optional)
   *
   * Only schemes with server-side sessions implement this.
   */
  logout?(handle: UpstreamAuthHandle, signal: AbortSignal): Promise<void>;
}
