/**
 * Upstream HTTP Utility
 *
 * Thin fetch wrapper shared by the OData transport and the auth strategies.
 */

import {
  AuthenticationError,
  SchemaMismatchError,
  SessionExpiredSignal,
  UnknownResourceError,
  UpstreamProtocolError,
  UpstreamUnavailableError,
} from '../../types/errors.js';

export interface UpstreamHttpRequest {
  method: string;
  url: string;
  headers: Record<string, string>;
  body?: string;
  signal: AbortSignal;
}

export interface UpstreamHttpResponse {
  status: number;
  ok: boolean;
  raw: string;
  headers: Headers;
}

/**
 * Whether a failed status happened during the handshake or a native call
 */
export type UpstreamPhase = 'auth' | 'call';

/**
 * Perform an upstream HTTP request
 *
 * Errors raised after the signal aborted are rethrown untouched so the
 * caller's scope can report them as a timeout or cancellation.
 *
 * @throws UpstreamUnavailableError on connection failures
 */
export async function upstreamRequest(request: UpstreamHttpRequest): Promise<UpstreamHttpResponse> {
  try {
    const response = await fetch(request.url, {
      method: request.method,
      headers: request.headers,
      body: request.body,
      signal: request.signal,
      redirect: 'manual',
    });
    // The body arrives after the headers; a reset while reading it is a connection failure too
    const raw = await response.text();
    return {
      status: response.status,
      ok: response.ok,
      raw,
      headers: response.headers,
    };
  } catch (error) {
    if (request.signal.aborted) {
      throw error;
    }
    const message = error instanceof Error ? error.message : 'Unknown fetch error';
    throw new UpstreamUnavailableError('Upstream is unreachable', {
      diagnostic: `${request.method} ${request.url}: ${message}`,
      cause: error,
    });
  }
}

/**
 * Parse a JSON response body
 *
 * @throws UpstreamProtocolError when the body is not JSON
 */
export function parseUpstreamJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new UpstreamProtocolError('Upstream returned a body that is not valid JSON', {
      diagnostic: raw,
      cause: error,
    });
  }
}

/**
 * Map a non-2xx upstream status onto the gateway error taxonomy
 */
export function upstreamStatusError(status: number, raw: string, phase: UpstreamPhase): Error {
  const details = { diagnostic: `HTTP ${status}: ${raw}` };

  if (status === 401) {
    return phase === 'auth'
      ? new AuthenticationError('Upstream rejected the credentials', details)
      : new SessionExpiredSignal(details.diagnostic);
  }
  if (status === 403) {
    return new AuthenticationError(
      phase === 'auth' ? 'Upstream rejected the credentials' : 'Upstream denied access to the entity',
      details
    );
  }
  if (status === 404 && phase === 'call') {
    return new UnknownResourceError('Entity not found', details);
  }
  if (status === 400 || status === 409 || status === 422) {
    return new SchemaMismatchError('Upstream rejected the request data', undefined, details);
  }
  if (status === 502 || status === 503 || status === 504) {
    return new UpstreamUnavailableError(`Upstream is unavailable (HTTP ${status})`, details);
  }
  return new UpstreamProtocolError(`Upstream answered HTTP ${status}`, details);
}
