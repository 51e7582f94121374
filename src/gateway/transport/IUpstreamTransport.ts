import type { UpstreamAuthHandle } from '../auth/IAuthStrategy.js';
import type { NativeCall, NativeResponse, UpstreamCredentials } from '../../types/gateway.types.js';

/**
 * Native protocol seam between the connector and the upstream system
 *
 * Implementations throw gateway errors (or SessionExpiredSignal when the
 * upstream no longer accepts the session) and must stop work once the signal
 * aborts.
 */
export interface IUpstreamTransport {
  readonly name: string;

  authenticate(credentials: UpstreamCredentials, signal: AbortSignal): Promise<UpstreamAuthHandle>;

  execute(auth: UpstreamAuthHandle, call: NativeCall, signal: AbortSignal): Promise<NativeResponse['payload']>;

  logout(auth: UpstreamAuthHandle, signal: AbortSignal): Promise<void>;
}
