import { UpstreamAuthScheme } from '../../types/enums.js';
import { AuthenticationError } from '../../types/errors.js';
import type { UpstreamCredentials } from '../../types/gateway.types.js';
import type { UpstreamAuthHandle } from './IAuthStrategy.js';
import { ProbeAuthStrategy } from './ProbeAuthStrategy.js';

/**
 * Static Authorization token
 *
 * A token that already carries a scheme ("Bearer …", "Token …") is sent
 * as-is; a bare one is sent as a Bearer token.
 */
export class TokenAuthStrategy extends ProbeAuthStrategy {
  readonly scheme = UpstreamAuthScheme.Token;

  async authenticate(credentials: UpstreamCredentials, signal: AbortSignal): Promise<UpstreamAuthHandle> {
    if (credentials.kind !== 'token') {
      throw new AuthenticationError('Upstream authentication scheme "token" needs a bearer token');
    }
    const token = credentials.token.trim();
    const headers = { Authorization: token.includes(' ') ? token : `Bearer ${token}` };
    await this.probe(headers, signal);
    return { scheme: this.scheme, headers };
  }
}
