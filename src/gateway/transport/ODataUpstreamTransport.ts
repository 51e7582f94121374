import { FieldType, KeyFormat, OperationKind } from '../../types/enums.js';
import { UpstreamProtocolError } from '../../types/errors.js';
import type {
  NativeCall,
  NativeFilter,
  NativeRecord,
  NativeResponse,
  UpstreamCredentials,
} from '../../types/gateway.types.js';
import type { IAuthStrategy, UpstreamAuthHandle } from '../auth/IAuthStrategy.js';
import { GUID_PATTERN, isPlainObject } from '../core/fieldCoercion.js';
import type { IUpstreamTransport } from './IUpstreamTransport.js';
import { parseUpstreamJson, upstreamRequest, upstreamStatusError } from './upstreamHttp.js';
import { createLogger } from '../../logger/index.js';

const HTTP_METHODS: Record<OperationKind, string> = {
  [OperationKind.Read]: 'GET',
  [OperationKind.List]: 'GET',
  [OperationKind.Create]: 'POST',
  [OperationKind.Update]: 'PATCH',
  [OperationKind.Delete]: 'DELETE',
};

function quote(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

/**
 * "Catalog.Items" -> "Catalog_Items"
 */
export function entitySetName(entity: string): string {
  return entity.replace(/\./g, '_');
}

export function keyLiteral(key: string, format: KeyFormat): string {
  switch (format) {
    case KeyFormat.Guid:
      return `guid'${key}'`;
    case KeyFormat.Number:
      return key;
    case KeyFormat.String:
      return quote(key);
  }
}

export function filterLiteral(filter: NativeFilter): string {
  const { value } = filter;
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  if (filter.type === FieldType.DateTime) {
    return `datetime${quote(value)}`;
  }
  // Reference fields ("Counterparty_Key", "Ref_Key") compare against GUID literals
  if (filter.field.endsWith('_Key') && GUID_PATTERN.test(value)) {
    return `guid'${value}'`;
  }
  return quote(value);
}

/**
 * Build the request URL for a native call, relative to the OData root
 */
export function buildODataUrl(baseUrl: string, call: NativeCall): string {
  let path = entitySetName(call.entity);
  if (call.key !== undefined) {
    path += `(${encodeURIComponent(keyLiteral(call.key, call.keyFormat))})`;
  }

  const params = ['$format=json'];
  if (call.operation === OperationKind.List) {
    if (call.filters.length > 0) {
      const filter = call.filters.map((item) => `${item.field} eq ${filterLiteral(item)}`).join(' and ');
      params.push(`$filter=${encodeURIComponent(filter)}`);
    }
    if (call.top !== undefined) params.push(`$top=${call.top}`);
    if (call.skip !== undefined) params.push(`$skip=${call.skip}`);
  }

  return `${baseUrl}/${path}?${params.join('&')}`;
}

export interface ODataTransportConfig {
  /** OData root, e.g. http://host/base/odata/standard.odata */
  baseUrl: string;
}

/**
 * 1C standard OData interface over HTTP
 */
export class ODataUpstreamTransport implements IUpstreamTransport {
  readonly name = 'odata';

  private logger = createLogger('ODataUpstreamTransport');

  constructor(
    private config: ODataTransportConfig,
    private strategy: IAuthStrategy,
  ) {}

  authenticate(credentials: UpstreamCredentials, signal: AbortSignal): Promise<UpstreamAuthHandle> {
    return this.strategy.authenticate(credentials, signal);
  }

  async logout(auth: UpstreamAuthHandle, signal: AbortSignal): Promise<void> {
    if (this.strategy.logout) {
      await this.strategy.logout(auth, signal);
    }
  }

  async execute(auth: UpstreamAuthHandle, call: NativeCall, signal: AbortSignal): Promise<NativeResponse['payload']> {
    const method = HTTP_METHODS[call.operation];
    const url = buildODataUrl(this.config.baseUrl, call);
    const headers: Record<string, string> = { Accept: 'application/json', ...auth.headers };

    let body: string | undefined;
    if (call.payload !== undefined) {
      headers['Content-Type'] = 'application/json';
      body = JSON.stringify(call.payload);
    }

    this.logger.trace({ method, url }, 'Sending native call');
    const response = await upstreamRequest({ method, url, headers, body, signal });

    if (!response.ok) {
      throw upstreamStatusError(response.status, response.raw, 'call');
    }
    if (call.operation === OperationKind.Delete || response.status === 204 || response.raw.trim() === '') {
      return null;
    }

    const data = parseUpstreamJson(response.raw);
    if (call.operation === OperationKind.List) {
      return this.readCollection(call, data, response.raw);
    }
    if (!isPlainObject(data)) {
      throw new UpstreamProtocolError(`Upstream returned an unexpected payload for ${call.entity}`, {
        diagnostic: response.raw,
      });
    }
    return data;
  }

  private readCollection(call: NativeCall, data: unknown, raw: string): NativeRecord[] {
    const value = isPlainObject(data) ? data.value : undefined;
    if (!Array.isArray(value)) {
      throw new UpstreamProtocolError(`Upstream returned no collection for ${call.entity}`, { diagnostic: raw });
    }

    const records: NativeRecord[] = [];
    for (const item of value) {
      if (!isPlainObject(item)) {
        throw new UpstreamProtocolError(`Upstream collection for ${call.entity} holds a non-record item`, {
          diagnostic: raw,
        });
      }
      records.push(item);
    }
    return records;
  }
}
