import { UpstreamAuthScheme } from '../../types/enums.js';
import { UpstreamProtocolError } from '../../types/errors.js';
import type { UpstreamCredentials } from '../../types/gateway.types.js';
import { AuthUtils } from '../../utils/AuthUtils.js';
import { upstreamRequest, upstreamStatusError } from '../transport/upstreamHttp.js';
import type { UpstreamAuthHandle } from './IAuthStrategy.js';
import { ProbeAuthStrategy } from './ProbeAuthStrategy.js';

const COOKIE_NAME = 'ibsession';

/**
 * 1C infobase session
 *
 * The probe carries Basic credentials and `IBSession: start`; the upstream
 * answers with an `ibsession` cookie that authenticates later calls.
 * `IBSession: finish` ends the session on the server.
 */
export class IBSessionAuthStrategy extends ProbeAuthStrategy {
  readonly scheme = UpstreamAuthScheme.IBSession;

  async authenticate(credentials: UpstreamCredentials, signal: AbortSignal): Promise<UpstreamAuthHandle> {
    const { username, password } = this.requireBasic(credentials);
    const response = await this.probe(
      { Authorization: AuthUtils.encodeBasic(username, password), IBSession: 'start' },
      signal
    );

    const sessionId = IBSessionAuthStrategy.readSessionCookie(response.headers);
    if (!sessionId) {
      throw new UpstreamProtocolError('Upstream did not open an infobase session', {
        diagnostic: `set-cookie: ${response.headers.get('set-cookie') ?? '<none>'}`,
      });
    }
    return { scheme: this.scheme, headers: { Cookie: `${COOKIE_NAME}=${sessionId}` } };
  }

  async logout(handle: UpstreamAuthHandle, signal: AbortSignal): Promise<void> {
    const response = await upstreamRequest({
      method: 'GET',
      url: this.probeUrl,
      headers: { Accept: 'application/json', ...handle.headers, IBSession: 'finish' },
      signal,
    });
    // 401 means the server already dropped the session
    if (!response.ok && response.status !== 401) {
      throw upstreamStatusError(response.status, response.raw, 'auth');
    }
  }

  static readSessionCookie(headers: Headers): string | undefined {
    for (const cookie of headers.getSetCookie()) {
      const [pair] = cookie.split(';');
      const separator = pair.indexOf('=');
      if (separator > 0 && pair.slice(0, separator).trim().toLowerCase() === COOKIE_NAME) {
        const value = pair.slice(separator + 1).trim();
        if (value) return value;
      }
    }
    return undefined;
  }
}
