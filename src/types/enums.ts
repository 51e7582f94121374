/**
 * Native operation kinds the translator produces
 */
export enum OperationKind {
  Read = 'read',      // Single entity by key
  List = 'list',      // Entity collection (read without key)
  Create = 'create',
  Update = 'update',
  Delete = 'delete',
}

export enum SessionStatus {
  Active = 'active',
  Expired = 'expired',          // Idle longer than SESSION_TTL
  Invalidated = 'invalidated',  // Upstream rejected it, or its state is unknown after cancellation
}

export enum UpstreamAuthScheme {
  Basic = 'basic',          // HTTP Basic on every call
  IBSession = 'ibsession',  // 1C "IBSession: start" cookie session
  Token = 'token',          // Static Authorization token
}

/**
 * Declared type of a mapped field
 */
export enum FieldType {
  String = 'string',
  Number = 'number',
  Integer = 'integer',
  Boolean = 'boolean',
  DateTime = 'datetime',
  Object = 'object',
  Array = 'array',
}

/**
 * How an entity key is rendered in the native address
 */
export enum KeyFormat {
  Guid = 'guid',      // guid'…'
  String = 'string',  // '…' with quotes doubled
  Number = 'number',  // bare numeric literal
}

export enum InvalidationReason {
  AuthExpired = 'AUTH_EXPIRED',
  Cancelled = 'CANCELLED',
  Evicted = 'EVICTED',
  Expired = 'EXPIRED',
  Shutdown = 'SHUTDOWN',
}
