import { createHash } from 'crypto';
import { AuthenticationError } from '../types/errors.js';
import type { UpstreamCredentials } from '../types/gateway.types.js';

/**
 * Credential handling shared by the dispatcher and the session pool
 */
export class AuthUtils {
  /**
   * Stable digest identifying a credential set; secrets are not recoverable from it
   */
  static credentialKey(credentials: UpstreamCredentials): string {
    const material = credentials.kind === 'basic'
      ? JSON.stringify(['basic', credentials.username, credentials.password])
      : JSON.stringify(['token', credentials.token]);
    return createHash('sha256').update(material).digest('hex');
  }

  /**
   * Format credential key (for log display)
   */
  static formatKeyForLog(key: string): string {
    if (!key || key.length < 8) return '***';
    return `***${key.slice(-8)}`;
  }

  /**
   * Parse an inbound Authorization header into forwardable credentials
   *
   * @returns undefined when the header is absent
   * @throws AuthenticationError when the header is present but unusable
   */
  static parseAuthorizationHeader(header: string | undefined): UpstreamCredentials | undefined {
    if (header === undefined || header.trim() === '') {
      return undefined;
    }

    const match = /^(\S+)\s+(.+)$/.exec(header.trim());
    if (!match) {
      throw new AuthenticationError('Malformed Authorization header');
    }
    const [, scheme, value] = match;

    switch (scheme.toLowerCase()) {
      case 'basic': {
        const decoded = Buffer.from(value.trim(), 'base64').toString('utf8');
        const separator = decoded.indexOf(':');
        if (separator <= 0) {
          throw new AuthenticationError('Malformed Basic credentials');
        }
        return {
          kind: 'basic',
          username: decoded.slice(0, separator),
          password: decoded.slice(separator + 1),
        };
      }
      case 'bearer':
        return { kind: 'token', token: value.trim() };
      default:
        throw new AuthenticationError(`Unsupported authorization scheme "${scheme}"`);
    }
  }

  static encodeBasic(username: string, password: string): string {
    return 'Basic ' + Buffer.from(`${username}:${password}`, 'utf8').toString('base64');
  }
}
