import { readFileSync } from 'fs';
import { resolve } from 'path';
import { z } from 'zod';
import { FieldType, KeyFormat, OperationKind } from '../types/enums.js';
import { createLogger } from '../logger/index.js';

const logger = createLogger('ResourceMapping');

const NAME_PATTERN = /^[A-Za-z0-9_-]+$/;

const fieldSchema = z.object({
  native: z.string().min(1),
  type: z.nativeEnum(FieldType),
  required: z.boolean().default(false),
  readOnly: z.boolean().default(false),
});

const resourceSchema = z
  .object({
    entity: z.string().min(1),
    keyFormat: z.nativeEnum(KeyFormat).default(KeyFormat.Guid),
    key: z.string().regex(NAME_PATTERN).optional(),
    operations: z.array(z.nativeEnum(OperationKind)).min(1),
    fields: z.record(z.string().regex(NAME_PATTERN), fieldSchema),
  })
  .superRefine((resource, ctx) => {
    const seen = new Set<string>();
    for (const [name, field] of Object.entries(resource.fields)) {
      if (seen.has(field.native)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['fields', name, 'native'],
          message: `native field "${field.native}" is mapped more than once`,
        });
      }
      seen.add(field.native);
    }
    if (resource.key !== undefined && !Object.hasOwn(resource.fields, resource.key)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['key'],
        message: `key field "${resource.key}" is not declared in fields`,
      });
    }
  });

const mappingSchema = z.object({
  resources: z.record(z.string().regex(NAME_PATTERN), resourceSchema),
});

export type FieldMapping = Readonly<z.infer<typeof fieldSchema>>;

export interface ResourceMappingEntry {
  readonly entity: string;
  readonly keyFormat: KeyFormat;
  /** REST field holding the entity key, if any */
  readonly key?: string;
  readonly operations: ReadonlySet<OperationKind>;
  readonly fields: Readonly<Record<string, FieldMapping>>;
  /** native field name -> REST field name */
  readonly nativeToRest: Readonly<Record<string, string>>;
}

/**
 * Immutable resource-to-entity table
 */
export interface ResourceMapping {
  readonly resources: Readonly<Record<string, ResourceMappingEntry>>;
}

export class ResourceMappingError extends Error {
  constructor(message: string, public readonly issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ResourceMappingError';
  }
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
  }
  return value;
}

/**
 * ReadonlySet that refuses mutation at runtime as well
 */
function frozenSet<T>(values: Iterable<T>): ReadonlySet<T> {
  const set = new Set(values);
  const reject = (): never => {
    throw new TypeError('Resource mapping is immutable');
  };
  set.add = reject;
  set.delete = reject;
  set.clear = reject;
  return Object.freeze(set);
}

/**
 * Validate a raw mapping document and build the frozen lookup structure
 */
export function parseResourceMapping(raw: unknown): ResourceMapping {
  const result = mappingSchema.safeParse(raw);
  if (!result.success) {
    throw new ResourceMappingError(
      'Invalid resource mapping',
      result.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
    );
  }

  const resources: Record<string, ResourceMappingEntry> = {};
  for (const [name, entry] of Object.entries(result.data.resources)) {
    const nativeToRest: Record<string, string> = {};
    for (const [restName, field] of Object.entries(entry.fields)) {
      nativeToRest[field.native] = restName;
    }
    resources[name] = {
      entity: entry.entity,
      keyFormat: entry.keyFormat,
      key: entry.key ?? (Object.hasOwn(entry.fields, 'id') ? 'id' : undefined),
      operations: frozenSet(entry.operations),
      fields: deepFreeze(entry.fields),
      nativeToRest: deepFreeze(nativeToRest),
    };
  }

  return deepFreeze({ resources });
}

/**
 * Read the mapping file once at startup
 */
export function loadResourceMapping(path: string): ResourceMapping {
  const absolutePath = resolve(process.cwd(), path);
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(absolutePath, 'utf8'));
  } catch (error) {
    throw new ResourceMappingError(
      `Cannot read resource mapping from ${absolutePath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const mapping = parseResourceMapping(raw);
  logger.info(
    { path: absolutePath, resources: Object.keys(mapping.resources) },
    'Resource mapping loaded'
  );
  return mapping;
}

export function findResource(mapping: ResourceMapping, name: string): ResourceMappingEntry | undefined {
  return Object.hasOwn(mapping.resources, name) ? mapping.resources[name] : undefined;
}
