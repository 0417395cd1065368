import { z } from 'zod';
import { isJSONObject } from './contract.ts';
import type { ApiKind, JSONObject } from './contract.ts';

/**
 * Runtime handle for a resource (or resource list) type.
 * TypeScript erases `T`, so every gateway call takes one of these
 * to know how to read the response body and how to name the type in errors.
 */
export interface ResourceType<T> {
  /** Fallback name for diagnostics when no kind is registered */
  readonly typeName: string;
  fromJson(raw: JSONObject): T;
}

export function resourceType<T>(typeName: string, fromJson: (raw: JSONObject) => T): ResourceType<T> {
  return { typeName, fromJson };
}

export function resourceTypeFromSchema<T>(typeName: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): ResourceType<T> {
  return { typeName, fromJson: raw => schema.parse(raw) };
}

export const apiStatusSchema = z.object({
  apiVersion: z.string().optional(),
  kind: z.string().optional(),
  metadata: z.object({
    resourceVersion: z.string().nullish(),
    continue: z.string().nullish(),
  }).passthrough().nullish(),
  status: z.enum(['Success', 'Failure']).nullish(),
  message: z.string().nullish(),
  reason: z.string().nullish(),
  details: z.object({
    name: z.string().nullish(),
    group: z.string().nullish(),
    kind: z.string().nullish(),
    uid: z.string().nullish(),
    causes: z.array(z.object({
      reason: z.string().nullish(),
      message: z.string().nullish(),
      field: z.string().nullish(),
    })).nullish(),
    retryAfterSeconds: z.number().nullish(),
  }).passthrough().nullish(),
  code: z.number().nullish(),
}).passthrough();

export type ApiStatus = z.infer<typeof apiStatusSchema>;

export const ApiStatusType = resourceTypeFromSchema('ApiStatus', apiStatusSchema);

/**
 * Never throws. A Status with some ill-typed fields still yields the string
 * fields that can be read; an object with neither `reason` nor `message` gives null.
 */
export function readApiStatus(raw: unknown): ApiStatus | null {
  const result = apiStatusSchema.safeParse(raw);
  if (result.success) return result.data;
  if (!isJSONObject(raw)) return null;

  const reason = stringField(raw, 'reason');
  const message = stringField(raw, 'message');
  if (reason === undefined && message === undefined) return null;
  return {
    kind: stringField(raw, 'kind'),
    apiVersion: stringField(raw, 'apiVersion'),
    reason,
    message,
  };
}

function stringField(raw: JSONObject, key: string): string | undefined {
  const value = raw[key];
  return typeof value === 'string' ? value : undefined;
}

/**
 * Explicit map from type identifiers to the kind/apiVersion they declare.
 * Populated at startup; only consulted to make error messages readable.
 */
export class KindRegistry {
  #kinds = new Map<string, ApiKind>();
  #listItemKinds = new Map<string, ApiKind>();

  register(type: ResourceType<unknown>, kind: ApiKind): this {
    this.#kinds.set(type.typeName, kind);
    return this;
  }

  /** Lists are described by what they hold, so they get their own table. */
  registerList(listType: ResourceType<unknown>, itemKind: ApiKind): this {
    this.#listItemKinds.set(listType.typeName, itemKind);
    return this;
  }

  kindOf(type: ResourceType<unknown>): ApiKind | null {
    return this.#kinds.get(type.typeName) ?? null;
  }

  listItemKindOf(listType: ResourceType<unknown>): ApiKind | null {
    return this.#listItemKinds.get(listType.typeName) ?? null;
  }

  /** e.g. `Pod (v1) resource`, or the bare type name when unregistered */
  describeResource(type: ResourceType<unknown>): string {
    const kind = this.kindOf(type);
    return kind ? `${kind.kind} (${kind.apiVersion}) resource` : type.typeName;
  }

  /** e.g. `Pod (v1) resources` for a list type, or its bare type name */
  describeResources(listType: ResourceType<unknown>): string {
    const kind = this.listItemKindOf(listType);
    return kind ? `${kind.kind} (${kind.apiVersion}) resources` : listType.typeName;
  }
}

export const defaultRegistry = new KindRegistry()
  .register(ApiStatusType, { kind: 'Status', apiVersion: 'v1' });
