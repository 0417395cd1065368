// The API contract that every transport and the resource gateway expect

import type { ReadableStream } from 'node:stream/web';

export type HttpMethods =
  | "GET"
  | "POST"
  | "DELETE"
  | "PUT"
  | "PATCH";

export interface RequestOptions {
  method: HttpMethods;
  path: string;
  querystring?: URLSearchParams;
  abortSignal?: AbortSignal;

  contentType?: string;
  bodyRaw?: Uint8Array;

  accept?: string;
}

/** The parts of an HTTP response the gateway reads.
 * Satisfied by the Response objects from fetch(). */
export interface RestResponse {
  readonly status: number;
  readonly headers: { get(name: string): string | null };
  readonly body: ReadableStream<Uint8Array> | null;
}

export interface RestClient {
  performRequest(opts: RequestOptions): Promise<RestResponse>;
}

// Structures that JSON can encode directly
export type JSONPrimitive = string | number | boolean | null | undefined;
export type JSONValue = JSONPrimitive | JSONObject | JSONArray;
export type JSONObject = {[key: string]: JSONValue};
export type JSONArray = JSONValue[];

export function isJSONObject(value: unknown): value is JSONObject {
  return value != null && typeof value === 'object' && !Array.isArray(value);
}

// Constraint for when these fields will surely be present
export type ApiKind = {
  apiVersion: string;
  kind: string;
}

// Types seen in a resource watch stream
export type WatchEvent<T,U> = WatchEventObject<T> | WatchEventError<U> | WatchEventBookmark;
export type WatchEventObject<T> = {
  'type': "ADDED" | "MODIFIED" | "DELETED";
  'object': T;
};
export type WatchEventError<U> = {
  'type': "ERROR";
  'object': U;
};
export type WatchEventBookmark = {
  'type': "BOOKMARK";
  'object': { metadata: { resourceVersion: string }};
};
