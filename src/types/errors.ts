/**
 * Gateway error taxonomy
 *
 * Every failure the gateway reports to a client is one of these kinds. The
 * dispatcher is the only place that turns them into HTTP responses.
 */

export type GatewayErrorKind =
  | 'AuthenticationError'
  | 'UnknownResourceError'
  | 'SchemaMismatchError'
  | 'UpstreamTimeoutError'
  | 'UpstreamUnavailableError'
  | 'UpstreamProtocolError'
  | 'RequestCancelledError'
  | 'InternalError';

export const ERROR_STATUS: Readonly<Record<GatewayErrorKind, number>> = {
  AuthenticationError: 401,
  UnknownResourceError: 404,
  SchemaMismatchError: 400,
  UpstreamTimeoutError: 504,
  UpstreamUnavailableError: 503,
  UpstreamProtocolError: 502,
  RequestCancelledError: 499,
  InternalError: 500,
};

export interface GatewayErrorDetails {
  /** Raw upstream payload; logged, never sent to clients */
  diagnostic?: string;
  cause?: unknown;
}

export abstract class GatewayError extends Error {
  abstract readonly kind: GatewayErrorKind;
  public readonly diagnostic?: string;

  constructor(message: string, details: GatewayErrorDetails = {}) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.diagnostic = details.diagnostic;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  get status(): number {
    return ERROR_STATUS[this.kind];
  }
}

export class AuthenticationError extends GatewayError {
  readonly kind = 'AuthenticationError';
  name = 'AuthenticationError';
}

export class UnknownResourceError extends GatewayError {
  readonly kind = 'UnknownResourceError';
  name = 'UnknownResourceError';
}

export class SchemaMismatchError extends GatewayError {
  readonly kind = 'SchemaMismatchError';
  name = 'SchemaMismatchError';

  /**
   * Dotted path of the offending field, when there is one
   */
  public readonly field?: string;

  constructor(message: string, field?: string, details?: GatewayErrorDetails) {
    super(message, details);
    this.field = field;
  }
}

export class UpstreamTimeoutError extends GatewayError {
  readonly kind = 'UpstreamTimeoutError';
  name = 'UpstreamTimeoutError';
}

export class UpstreamUnavailableError extends GatewayError {
  readonly kind = 'UpstreamUnavailableError';
  name = 'UpstreamUnavailableError';
}

export class UpstreamProtocolError extends GatewayError {
  readonly kind = 'UpstreamProtocolError';
  name = 'UpstreamProtocolError';
}

export class RequestCancelledError extends GatewayError {
  readonly kind = 'RequestCancelledError';
  name = 'RequestCancelledError';
}

export class InternalError extends GatewayError {
  readonly kind = 'InternalError';
  name = 'InternalError';

  /**
   * Wrap anything that is not already a gateway error
   */
  static from(error: unknown): GatewayError {
    if (error instanceof GatewayError) {
      return error;
    }
    return new InternalError('Internal gateway error', {
      cause: error,
      diagnostic: error instanceof Error ? error.message : String(error),
    });
  }
}

/**
 * Raised by a transport when the upstream reports that the session it was
 * handed is no longer authenticated. Never leaves the connector.
 */
export class SessionExpiredSignal extends Error {
  constructor(public readonly diagnostic?: string) {
    super('Upstream session expired');
    this.name = 'SessionExpiredSignal';
  }
}

/**
 * Client-facing error body
 */
export type ErrorBody = {
  error: {
    kind: GatewayErrorKind;
    message: string;
    field?: string;
  };
  requestId: string;
};

export function toErrorBody(error: GatewayError, requestId: string): ErrorBody {
  const body: ErrorBody = {
    error: {
      kind: error.kind,
      message: error.message,
    },
    requestId,
  };
  if (error instanceof SchemaMismatchError && error.field !== undefined) {
    body.error.field = error.field;
  }
  return body;
}
