import { UpstreamAuthScheme } from '../../types/enums.js';
import type { UpstreamCredentials } from '../../types/gateway.types.js';
import { AuthUtils } from '../../utils/AuthUtils.js';
import type { UpstreamAuthHandle } from './IAuthStrategy.js';
import { ProbeAuthStrategy } from './ProbeAuthStrategy.js';

/**
 * HTTP Basic on every call; the handshake only checks the credentials
 */
export class BasicAuthStrategy extends ProbeAuthStrategy {
  readonly scheme = UpstreamAuthScheme.Basic;

  async authenticate(credentials: UpstreamCredentials, signal: AbortSignal): Promise<UpstreamAuthHandle> {
    const { username, password } = this.requireBasic(credentials);
    const headers = { Authorization: AuthUtils.encodeBasic(username, password) };
    await this.probe(headers, signal);
    return { scheme: this.scheme, headers };
  }
}
