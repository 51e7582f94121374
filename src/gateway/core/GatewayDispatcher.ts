import {
  AuthenticationError,
  GatewayError,
  InternalError,
  UnknownResourceError,
  toErrorBody,
} from '../../types/errors.js';
import type {
  CallOptions,
  GatewayHttpRequest,
  GatewayHttpResponse,
  HttpMethod,
  RequestEnvelope,
  ResourceReference,
  UpstreamCredentials,
} from '../../types/gateway.types.js';
import { RequestTranslator } from './RequestTranslator.js';
import { BackendConnector } from './BackendConnector.js';
import { AuthUtils } from '../../utils/AuthUtils.js';
import { truncateDiagnostic } from '../../utils/truncateResponse.js';
import { DIAGNOSTIC_LOG_MAX_LENGTH } from '../../config/sessionConfig.js';
import { createLogger, type Logger } from '../../logger/index.js';

const HTTP_METHODS: readonly HttpMethod[] = ['GET', 'POST', 'PUT', 'PATCH', 'DELETE'];

export interface GatewayDispatcherOptions {
  /** Mount path of the gateway, prefixed to Location headers */
  basePath: string;
  /** Used when a request carries no Authorization header */
  serviceCredentials?: UpstreamCredentials;
  /** Per-call deadline */
  timeoutMs?: number;
}

/**
 * Split a mount-relative path into a resource reference
 *
 * `/items` and `/items/42` are the only accepted shapes.
 */
export function parseResourcePath(path: string): ResourceReference {
  const trimmed = path.startsWith('/') ? path.slice(1) : path;
  if (trimmed === '') {
    throw new UnknownResourceError('No resource named in path');
  }

  const segments = trimmed.split('/');
  if (segments.length > 2 || segments.some((segment) => segment === '')) {
    throw new UnknownResourceError(`No resource at path "${path}"`);
  }

  let decoded: string[];
  try {
    decoded = segments.map((segment) => decodeURIComponent(segment));
  } catch {
    throw new UnknownResourceError(`Malformed path "${path}"`);
  }

  const [resource, id] = decoded;
  return Object.freeze(id === undefined ? { resource } : { resource, id });
}

function toHttpMethod(method: string): HttpMethod | undefined {
  const upper = method.toUpperCase();
  return HTTP_METHODS.find((candidate) => candidate === upper);
}

/**
 * Turns one inbound HTTP request into one upstream call
 *
 * Translate, acquire a session, execute, translate back, release. The lease
 * is released on every exit path and every failure becomes an error response.
 */
export class GatewayDispatcher {
  private logger = createLogger('GatewayDispatcher');

  constructor(
    private translator: RequestTranslator,
    private connector: BackendConnector,
    private options: GatewayDispatcherOptions,
  ) {}

  async handle(request: GatewayHttpRequest): Promise<GatewayHttpResponse> {
    const logger = this.logger.child({ requestId: request.requestId });
    const startedAt = Date.now();

    try {
      const envelope = this.toEnvelope(request);
      const call = this.translator.toNativeCall(envelope);
      const credentials = this.resolveCredentials(request.headers.authorization);

      const options: CallOptions = { signal: request.signal, timeoutMs: this.options.timeoutMs };
      const native = await this.connector.withSession(credentials, options, (lease) =>
        this.connector.execute(lease, call, options)
      );

      const response = this.translator.toResponseEnvelope(native);
      if (response.headers.Location) {
        response.headers.Location = this.withBasePath(response.headers.Location);
      }

      logger.info(
        {
          method: envelope.method,
          resource: envelope.reference.resource,
          operation: call.operation,
          status: response.status,
          durationMs: Date.now() - startedAt,
        },
        'Gateway request completed'
      );
      return response;
    } catch (error) {
      return this.toErrorResponse(error, request, logger, Date.now() - startedAt);
    }
  }

  private toEnvelope(request: GatewayHttpRequest): RequestEnvelope {
    const method = toHttpMethod(request.method);
    if (!method) {
      throw new UnknownResourceError(`Method ${request.method} is not supported`);
    }
    return {
      method,
      reference: parseResourcePath(request.path),
      query: request.query,
      body: request.body,
      requestId: request.requestId,
    };
  }

  private resolveCredentials(header: string | undefined): UpstreamCredentials {
    const forwarded = AuthUtils.parseAuthorizationHeader(header);
    if (forwarded) {
      return forwarded;
    }
    if (this.options.serviceCredentials) {
      return this.options.serviceCredentials;
    }
    throw new AuthenticationError('Credentials required');
  }

  private withBasePath(location: string): string {
    return this.options.basePath === '/' ? location : `${this.options.basePath}${location}`;
  }

  private toErrorResponse(
    error: unknown,
    request: GatewayHttpRequest,
    logger: Logger,
    durationMs: number
  ): GatewayHttpResponse {
    const gatewayError: GatewayError = InternalError.from(error);
    const context = {
      method: request.method,
      path: request.path,
      kind: gatewayError.kind,
      status: gatewayError.status,
      durationMs,
      diagnostic: gatewayError.diagnostic
        ? truncateDiagnostic(gatewayError.diagnostic, DIAGNOSTIC_LOG_MAX_LENGTH)
        : undefined,
    };

    if (gatewayError.status >= 500) {
      logger.error({ ...context, error: gatewayError.cause ?? error }, gatewayError.message);
    } else {
      logger.warn(context, gatewayError.message);
    }

    const headers: Record<string, string> = {};
    if (gatewayError.status === 401) {
      headers['WWW-Authenticate'] = 'Basic realm="1C gateway", charset="UTF-8"';
    }
    return {
      status: gatewayError.status,
      headers,
      body: toErrorBody(gatewayError, request.requestId),
    };
  }
}
