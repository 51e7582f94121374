import { KeyFormat, OperationKind } from '../../types/enums.js';
import {
  SchemaMismatchError,
  UnknownResourceError,
  UpstreamProtocolError,
} from '../../types/errors.js';
import type {
  JsonObject,
  NativeCall,
  NativeFilter,
  NativeRecord,
  NativeResponse,
  RequestEnvelope,
  ResponseEnvelope,
} from '../../types/gateway.types.js';
import {
  findResource,
  type ResourceMapping,
  type ResourceMappingEntry,
} from '../../config/resourceMapping.js';
import {
  checkRequestValue,
  coerceQueryValue,
  coerceResponseValue,
  GUID_PATTERN,
  isPlainObject,
} from './fieldCoercion.js';

const PAGING_PARAMS = { limit: 'top', offset: 'skip' } as const;

function isPagingParam(name: string): name is keyof typeof PAGING_PARAMS {
  return name === 'limit' || name === 'offset';
}

/**
 * Maps REST requests onto native calls and native results back onto REST
 * responses, driven by the resource mapping table. Holds no state besides
 * the (frozen) table and performs no I/O.
 */
export class RequestTranslator {
  constructor(private readonly mapping: ResourceMapping) {}

  toNativeCall(envelope: RequestEnvelope): NativeCall {
    const { resource, id } = envelope.reference;
    const entry = findResource(this.mapping, resource);
    if (!entry) {
      throw new UnknownResourceError(`Unknown resource "${resource}"`);
    }

    const operation = this.resolveOperation(envelope);
    if (!entry.operations.has(operation)) {
      throw new UnknownResourceError(`Operation "${operation}" is not available on resource "${resource}"`);
    }

    const call: {
      -readonly [K in keyof NativeCall]: NativeCall[K];
    } = {
      operation,
      resource,
      entity: entry.entity,
      keyFormat: entry.keyFormat,
      filters: [],
    };

    if (id !== undefined) {
      call.key = this.checkKey(entry, id);
    }

    if (operation === OperationKind.List) {
      Object.assign(call, this.translateQuery(entry, envelope.query));
    } else if (envelope.query.length > 0) {
      throw new SchemaMismatchError(
        `Query parameters are only accepted when listing "${resource}"`,
        envelope.query[0][0]
      );
    }

    if (operation === OperationKind.Create || operation === OperationKind.Update) {
      const partial = envelope.method === 'PATCH';
      call.payload = this.translateBody(entry, envelope.body, !partial);
    } else if (!this.isEmptyBody(envelope.body)) {
      throw new SchemaMismatchError(`A request body is not accepted for ${operation} operations`);
    }

    return call;
  }

  toResponseEnvelope(response: NativeResponse): ResponseEnvelope {
    const { call, payload } = response;
    const entry = findResource(this.mapping, call.resource);
    if (!entry) {
      throw new UnknownResourceError(`Unknown resource "${call.resource}"`);
    }

    switch (call.operation) {
      case OperationKind.Delete:
        return { status: 204, headers: {}, body: null };

      case OperationKind.List: {
        if (!Array.isArray(payload)) {
          throw new UpstreamProtocolError(`Upstream returned a non-list result for ${call.entity}`);
        }
        return {
          status: 200,
          headers: {},
          body: payload.map((record) => this.fromNativeRecord(entry, call, record)),
        };
      }

      case OperationKind.Read:
      case OperationKind.Update: {
        if (payload === null && call.operation === OperationKind.Update) {
          return { status: 204, headers: {}, body: null };
        }
        return { status: 200, headers: {}, body: this.requireRecord(entry, call, payload) };
      }

      case OperationKind.Create: {
        if (payload === null) {
          return { status: 201, headers: {}, body: null };
        }
        const body = this.requireRecord(entry, call, payload);
        const headers: Record<string, string> = {};
        const keyValue = entry.key !== undefined ? body[entry.key] : undefined;
        if (typeof keyValue === 'string' || typeof keyValue === 'number') {
          headers.Location = `/${encodeURIComponent(call.resource)}/${encodeURIComponent(String(keyValue))}`;
        }
        return { status: 201, headers, body };
      }
    }
  }

  private resolveOperation(envelope: RequestEnvelope): OperationKind {
    const hasId = envelope.reference.id !== undefined;
    switch (envelope.method) {
      case 'GET':
        return hasId ? OperationKind.Read : OperationKind.List;
      case 'POST':
        if (!hasId) return OperationKind.Create;
        break;
      case 'PUT':
      case 'PATCH':
        if (hasId) return OperationKind.Update;
        break;
      case 'DELETE':
        if (hasId) return OperationKind.Delete;
        break;
    }
    throw new UnknownResourceError(
      `${envelope.method} is not supported on ${hasId ? 'an entity' : 'a collection'} of "${envelope.reference.resource}"`
    );
  }

  private checkKey(entry: ResourceMappingEntry, id: string): string {
    const field = entry.key ?? 'id';
    switch (entry.keyFormat) {
      case KeyFormat.Guid:
        if (!GUID_PATTERN.test(id)) {
          throw new SchemaMismatchError(`Key "${id}" is not a valid GUID`, field);
        }
        break;
      case KeyFormat.Number:
        if (!/^-?\d+(?:\.\d+)?$/.test(id)) {
          throw new SchemaMismatchError(`Key "${id}" is not a number`, field);
        }
        break;
      case KeyFormat.String:
        if (id === '') {
          throw new SchemaMismatchError('Key must not be empty', field);
        }
        break;
    }
    return id;
  }

  private translateQuery(
    entry: ResourceMappingEntry,
    query: RequestEnvelope['query']
  ): { filters: NativeFilter[]; top?: number; skip?: number } {
    const filters: NativeFilter[] = [];
    const paging: { top?: number; skip?: number } = {};

    for (const [name, raw] of query) {
      if (isPagingParam(name)) {
        const target = PAGING_PARAMS[name];
        if (paging[target] !== undefined) {
          throw new SchemaMismatchError(`Query parameter "${name}" given more than once`, name);
        }
        if (!/^\d+$/.test(raw)) {
          throw new SchemaMismatchError(`Query parameter "${name}" must be a non-negative integer`, name);
        }
        paging[target] = Number(raw);
        continue;
      }

      const field = Object.hasOwn(entry.fields, name) ? entry.fields[name] : undefined;
      if (!field) {
        throw new SchemaMismatchError(`Unknown query parameter "${name}"`, name);
      }
      const coerced = coerceQueryValue(field.type, raw);
      if (!coerced.ok) {
        throw new SchemaMismatchError(`Query parameter "${name}": ${coerced.reason}`, name);
      }
      filters.push({ field: field.native, type: field.type, value: coerced.value });
    }

    return { filters, ...paging };
  }

  private translateBody(entry: ResourceMappingEntry, body: unknown, complete: boolean): NativeRecord {
    if (!isPlainObject(body)) {
      throw new SchemaMismatchError('Request body must be a JSON object');
    }

    const payload: NativeRecord = {};
    for (const [name, value] of Object.entries(body)) {
      const field = Object.hasOwn(entry.fields, name) ? entry.fields[name] : undefined;
      if (!field) {
        throw new SchemaMismatchError(`Unknown field "${name}"`, name);
      }
      if (field.readOnly) {
        throw new SchemaMismatchError(`Field "${name}" is read-only`, name);
      }
      if (value === null && field.required) {
        throw new SchemaMismatchError(`Field "${name}" must not be null`, name);
      }
      const checked = checkRequestValue(field.type, value);
      if (!checked.ok) {
        throw new SchemaMismatchError(`Field "${name}": ${checked.reason}`, name);
      }
      payload[field.native] = checked.value;
    }

    if (complete) {
      for (const [name, field] of Object.entries(entry.fields)) {
        if (field.required && !field.readOnly && !Object.hasOwn(body, name)) {
          throw new SchemaMismatchError(`Missing required field "${name}"`, name);
        }
      }
    }

    return payload;
  }

  private isEmptyBody(body: unknown): boolean {
    return body === undefined || body === null || (isPlainObject(body) && Object.keys(body).length === 0);
  }

  private requireRecord(entry: ResourceMappingEntry, call: NativeCall, payload: NativeResponse['payload']): JsonObject {
    if (payload === null || Array.isArray(payload)) {
      throw new UpstreamProtocolError(`Upstream returned no single record for ${call.entity}`);
    }
    return this.fromNativeRecord(entry, call, payload);
  }

  private fromNativeRecord(entry: ResourceMappingEntry, call: NativeCall, record: NativeRecord): JsonObject {
    const result: JsonObject = {};
    for (const [nativeName, value] of Object.entries(record)) {
      const restName = Object.hasOwn(entry.nativeToRest, nativeName) ? entry.nativeToRest[nativeName] : undefined;
      if (restName === undefined) {
        continue;
      }
      const field = entry.fields[restName];
      const coerced = coerceResponseValue(field.type, value);
      if (!coerced.ok) {
        throw new UpstreamProtocolError(
          `Upstream value for "${restName}" of ${call.entity} does not match its declared type`,
          { diagnostic: `${nativeName}: ${coerced.reason}` }
        );
      }
      result[restName] = coerced.value;
    }
    return result;
  }
}
