import { FieldType, KeyFormat, OperationKind } from './enums.js';

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

/**
 * Ordered, case-preserving query parameters; duplicates are kept
 */
export type QueryParams = ReadonlyArray<readonly [string, string]>;

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

/**
 * Credential set forwarded to the upstream
 */
export type UpstreamCredentials =
  | { kind: 'basic'; username: string; password: string }
  | { kind: 'token'; token: string };

/**
 * Target entity in the upstream, parsed from the request path
 */
export interface ResourceReference {
  readonly resource: string;
  readonly id?: string;
}

export interface RequestEnvelope {
  readonly method: HttpMethod;
  readonly reference: ResourceReference;
  readonly query: QueryParams;
  readonly body: unknown;
  readonly requestId: string;
}

export interface ResponseEnvelope {
  status: number;
  headers: Record<string, string>;
  body: JsonValue | null;
}

export type NativeRecord = Record<string, unknown>;

/**
 * Equality filter on a native field
 */
export interface NativeFilter {
  readonly field: string;
  readonly type: FieldType;
  readonly value: string | number | boolean;
}

export interface NativeCall {
  readonly operation: OperationKind;
  readonly resource: string;
  readonly entity: string;
  readonly key?: string;
  readonly keyFormat: KeyFormat;
  readonly filters: readonly NativeFilter[];
  readonly top?: number;
  readonly skip?: number;
  readonly payload?: NativeRecord;
}

export interface NativeResponse {
  readonly call: NativeCall;
  readonly payload: NativeRecord | NativeRecord[] | null;
}

/**
 * What the external HTTP layer hands to the dispatcher
 */
export interface GatewayHttpRequest {
  method: string;
  path: string;
  query: QueryParams;
  headers: Record<string, string | undefined>;
  body: unknown;
  requestId: string;
  signal?: AbortSignal;
}

export interface GatewayHttpResponse {
  status: number;
  headers: Record<string, string>;
  body: JsonValue | null;
}

/**
 * Per-call timing and cancellation
 */
export interface CallOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
}
