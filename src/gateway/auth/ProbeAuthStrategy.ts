import type { UpstreamAuthScheme } from '../../types/enums.js';
import { AuthenticationError } from '../../types/errors.js';
import type { UpstreamCredentials } from '../../types/gateway.types.js';
import { upstreamRequest, upstreamStatusError, type UpstreamHttpResponse } from '../transport/upstreamHttp.js';
import type { IAuthStrategy, UpstreamAuthHandle } from './IAuthStrategy.js';

export interface ProbeAuthConfig {
  /** Upstream root, without trailing slash */
  baseUrl: string;
  /** Resource requested to verify credentials; empty means the service root */
  probePath: string;
}

/**
 * Base for strategies that verify credentials with one upstream request
 */
export abstract class ProbeAuthStrategy implements IAuthStrategy {
  abstract readonly scheme: UpstreamAuthScheme;

  constructor(protected readonly config: ProbeAuthConfig) {}

  abstract authenticate(credentials: UpstreamCredentials, signal: AbortSignal): Promise<UpstreamAuthHandle>;

  protected get probeUrl(): string {
    const path = this.config.probePath.replace(/^\/+/, '');
    return `${this.config.baseUrl}/${path}${path.includes('?') ? '&' : '?'}$format=json`;
  }

  /**
   * Send the probe request; any non-2xx answer fails the handshake
   */
  protected async probe(headers: Record<string, string>, signal: AbortSignal): Promise<UpstreamHttpResponse> {
    const response = await upstreamRequest({
      method: 'GET',
      url: this.probeUrl,
      headers: { Accept: 'application/json', ...headers },
      signal,
    });
    if (!response.ok) {
      throw upstreamStatusError(response.status, response.raw, 'auth');
    }
    return response;
  }

  protected requireBasic(credentials: UpstreamCredentials): { username: string; password: string } {
    if (credentials.kind !== 'basic') {
      throw new AuthenticationError(`Upstream authentication scheme "${this.scheme}" needs a username and password`);
    }
    return credentials;
  }
}
