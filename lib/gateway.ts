import { ReadableStream } from 'node:stream/web';
import type { ReadableStreamDefaultReader } from 'node:stream/web';
import { TextDecoder } from 'node:util';
import { isJSONObject } from './contract.ts';
import type { JSONObject, RequestOptions, RestClient, RestResponse, WatchEvent } from './contract.ts';
import { ClientError, ProtocolError, StreamProtocolError, isAbortError } from './errors.ts';
import { JsonPatchDocument, JsonPatchMediaType, MergePatchMediaType, RawJsonPatch } from './json-patch.ts';
import type { MergePatch } from './json-patch.ts';
import { LineDecoder, charsetFromContentType } from './line-decoder.ts';
import { ApiStatusType, defaultRegistry, readApiStatus } from './resource-types.ts';
import type { ApiStatus, KindRegistry, ResourceType } from './resource-types.ts';
import { JsonParsingTransformer, WatchEventTransformer } from './stream-transformers.ts';

const isVerbose = process.argv.includes('--verbose');

/** Where to send a request; the gateway picks the method and headers. */
export type ResourceRequest = Pick<RequestOptions, 'path' | 'querystring' | 'abortSignal'>;

/**
 * Typed access to resources through any RestClient.
 *
 * Every non-success response becomes a ClientError carrying the HTTP status,
 * the remote Status payload (when the body is one) and a description of the
 * resource type involved. Nothing is retried here; each call stands alone.
 */
export class ResourceGateway {
  constructor(
    public readonly client: RestClient,
    public readonly registry: KindRegistry = defaultRegistry,
  ) {}

  /** Fetches one resource, or null when the API reports it as NotFound. */
  async getOne<T>(type: ResourceType<T>, request: ResourceRequest): Promise<T | null> {
    const resp = await this.client.performRequest({
      ...request,
      method: 'GET',
      accept: 'application/json',
    });
    if (isSuccess(resp.status)) {
      return readTyped(resp, type);
    }

    const status = await readStatus(resp);
    // A 404 is only "absent" when the Status says the resource itself was NotFound
    if (resp.status === 404 && status?.reason === 'NotFound') {
      return null;
    }
    throw clientError('retrieve', this.registry.describeResource(type), resp.status, status);
  }

  async getList<TList>(listType: ResourceType<TList>, request: ResourceRequest): Promise<TList> {
    return this.#exchange(listType, this.registry.describeResources(listType), 'list', {
      ...request,
      method: 'GET',
    });
  }

  async create<T>(type: ResourceType<T>, body: T, request: ResourceRequest): Promise<T> {
    return this.#exchange(type, this.registry.describeResource(type), 'create', {
      ...request,
      method: 'POST',
      contentType: 'application/json',
      bodyRaw: encodeJson(body),
    });
  }

  /** Full replacement (PUT) of an existing resource. */
  async replace<T>(type: ResourceType<T>, body: T, request: ResourceRequest): Promise<T> {
    return this.#exchange(type, this.registry.describeResource(type), 'replace', {
      ...request,
      method: 'PUT',
      contentType: 'application/json',
      bodyRaw: encodeJson(body),
    });
  }

  /** Deletes a resource. The API answers with either the resource or a Status. */
  async delete<T>(type: ResourceType<T>, request: ResourceRequest): Promise<T | ApiStatus> {
    const resp = await this.client.performRequest({
      ...request,
      method: 'DELETE',
      accept: 'application/json',
    });
    if (!isSuccess(resp.status)) {
      throw clientError('delete', this.registry.describeResource(type), resp.status, await readStatus(resp));
    }
    const raw = await readJsonObject(resp);
    return raw.kind === 'Status'
      ? deserialize(ApiStatusType, raw)
      : deserialize(type, raw);
  }

  /** JSON-Patch with paths and values checked against the resource type. */
  async patch<T>(type: ResourceType<T>, mutator: (patch: JsonPatchDocument<T>) => void, request: ResourceRequest): Promise<T> {
    const patch = new JsonPatchDocument<T>();
    mutator(patch);
    return this.#sendJsonPatch(type, patch, request);
  }

  /** JSON-Patch over plain JSON Pointer strings. */
  async patchRaw<T>(type: ResourceType<T>, mutator: (patch: RawJsonPatch) => void, request: ResourceRequest): Promise<T> {
    const patch = new RawJsonPatch();
    mutator(patch);
    return this.#sendJsonPatch(type, patch, request);
  }

  async mergePatch<T>(type: ResourceType<T>, body: MergePatch<T>, request: ResourceRequest): Promise<T> {
    return this.#exchange(type, this.registry.describeResource(type), 'patch', {
      ...request,
      method: 'PATCH',
      contentType: MergePatchMediaType,
      bodyRaw: encodeJson(body),
    });
  }

  /**
   * Opens a streaming GET and yields its body as text lines.
   * Aborting `request.abortSignal` ends the stream without an error.
   */
  async observeLines(request: ResourceRequest, opts: {
    description?: string;
  }={}): Promise<ReadableStream<string>> {
    const signal = request.abortSignal;
    let resp: RestResponse;
    try {
      resp = await this.client.performRequest({
        ...request,
        method: 'GET',
        accept: 'application/json',
      });
    } catch (err) {
      if (isAbortError(err) && signal?.aborted) return closedStream();
      throw err;
    }

    if (!isSuccess(resp.status)) {
      throw clientError('watch', opts.description ?? request.path, resp.status, await readStatus(resp));
    }

    const contentType = resp.headers.get('content-type');
    if (!contentType) {
      await discardBody(resp.body, 'missing content-type');
      throw new StreamProtocolError(`Response is missing 'Content-Type' header.`);
    }

    let decoder: LineDecoder;
    try {
      decoder = new LineDecoder(charsetFromContentType(contentType) ?? 'utf-8');
    } catch (err) {
      await discardBody(resp.body, err);
      throw err;
    }

    if (!resp.body) return closedStream();
    isVerbose && console.error('streaming', request.path, `(${decoder.encoding})`);
    return readLines(resp.body, decoder, signal);
  }

  /** Watches a collection, yielding typed change events in wire order. */
  async observeEvents<T>(type: ResourceType<T>, request: ResourceRequest): Promise<ReadableStream<WatchEvent<T, ApiStatus>>> {
    const querystring = new URLSearchParams(request.querystring);
    querystring.set('watch', '1');

    const lines = await this.observeLines({ ...request, querystring }, {
      description: this.registry.describeResource(type),
    });
    return lines
      .pipeThrough(new JsonParsingTransformer())
      .pipeThrough(new WatchEventTransformer(
        raw => type.fromJson(raw),
        raw => ApiStatusType.fromJson(raw)));
  }

  async #sendJsonPatch<T>(type: ResourceType<T>, patch: JsonPatchDocument<T> | RawJsonPatch, request: ResourceRequest): Promise<T> {
    patch.validate();
    return this.#exchange(type, this.registry.describeResource(type), 'patch', {
      ...request,
      method: 'PATCH',
      contentType: JsonPatchMediaType,
      bodyRaw: encodeJson(patch.operations),
    });
  }

  async #exchange<T>(type: ResourceType<T>, description: string, action: string, opts: RequestOptions): Promise<T> {
    const resp = await this.client.performRequest({
      accept: 'application/json',
      ...opts,
    });
    if (isSuccess(resp.status)) {
      return readTyped(resp, type);
    }
    throw clientError(action, description, resp.status, await readStatus(resp));
  }
}

function isSuccess(status: number) {
  return status >= 200 && status < 300;
}

function clientError(action: string, description: string, httpCode: number, status: ApiStatus | null) {
  const detail = status?.message ? `: ${status.message}` : '';
  return new ClientError(
    `Failed to ${action} ${description} (HTTP status ${httpCode})${detail}`,
    httpCode, status, description);
}

function encodeJson(value: unknown): Uint8Array {
  return new TextEncoder().encode(JSON.stringify(value));
}

async function readBodyText(resp: RestResponse): Promise<string> {
  if (!resp.body) return '';
  const contentType = resp.headers.get('content-type');
  const charset = (contentType ? charsetFromContentType(contentType) : null) ?? 'utf-8';
  let decoder: TextDecoder;
  try {
    decoder = new TextDecoder(charset);
  } catch (err) {
    await discardBody(resp.body, err);
    throw new ProtocolError(`Unsupported response charset ${JSON.stringify(charset)}`, { cause: err });
  }
  let text = '';
  for await (const chunk of resp.body) {
    text += decoder.decode(chunk, { stream: true });
  }
  return text + decoder.decode();
}

async function readJsonObject(resp: RestResponse): Promise<JSONObject> {
  const text = await readBodyText(resp);
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new ProtocolError(`Response body wasn't JSON: ${text.slice(0, 256)}`, { cause: err });
  }
  if (!isJSONObject(parsed)) throw new ProtocolError(
    `Response body wasn't a JSON object: ${text.slice(0, 256)}`);
  return parsed;
}

function deserialize<T>(type: ResourceType<T>, raw: JSONObject): T {
  try {
    return type.fromJson(raw);
  } catch (err) {
    throw new ProtocolError(`Response body didn't match ${type.typeName}`, { cause: err });
  }
}

async function readTyped<T>(resp: RestResponse, type: ResourceType<T>): Promise<T> {
  return deserialize(type, await readJsonObject(resp));
}

/** Reads an error body as a Status. Never throws: the status code is reported regardless. */
async function readStatus(resp: RestResponse): Promise<ApiStatus | null> {
  let text: string;
  try {
    text = await readBodyText(resp);
  } catch (err) {
    isVerbose && console.error(`WARN: couldn't read HTTP ${resp.status} response body:`, err);
    return null;
  }
  try {
    return readApiStatus(JSON.parse(text));
  } catch {
    isVerbose && console.error(`WARN: HTTP ${resp.status} response body wasn't JSON:`, text.slice(0, 256));
    return null;
  }
}

const Aborted = Symbol('aborted');

/**
 * Pull-based line stream over a response body.
 * Only one read is ever outstanding; the body is released on every way out.
 */
function readLines(body: ReadableStream<Uint8Array>, decoder: LineDecoder, signal?: AbortSignal): ReadableStream<string> {
  const reader = body.getReader();
  // set once the consumer has cancelled; nothing may reach the controller after that
  let detached = false;

  let onAbort: (() => void) | undefined;
  const aborted = new Promise<typeof Aborted>(resolve => {
    if (!signal) return;
    onAbort = () => resolve(Aborted);
    signal.addEventListener('abort', onAbort, { once: true });
  });
  const stopListening = () => {
    if (signal && onAbort) signal.removeEventListener('abort', onAbort);
  };

  return new ReadableStream<string>({
    async pull(controller) {
      try {
        // pull is not called again unless something is enqueued,
        // so keep reading until a whole line turns up
        for (;;) {
          const next = signal?.aborted ? Aborted : await Promise.race([reader.read(), aborted]);
          if (detached) return;

          if (next === Aborted) {
            stopListening();
            await discard(reader, signal?.reason);
            isVerbose && console.error('stream aborted by caller');
            if (!detached) controller.close();
            return;
          }

          if (next.done) {
            stopListening();
            for (const line of decoder.flush()) {
              controller.enqueue(line);
            }
            controller.close();
            return;
          }

          const lines = decoder.decode(next.value);
          if (lines.length === 0) continue;
          for (const line of lines) {
            controller.enqueue(line);
          }
          return;
        }
      } catch (err) {
        stopListening();
        await discard(reader, err);
        if (detached) return;
        if (isAbortError(err) && signal?.aborted) {
          controller.close();
        } else {
          controller.error(err);
        }
      }
    },
    async cancel(reason) {
      detached = true;
      stopListening();
      await discard(reader, reason);
    },
  });
}

async function discard(reader: ReadableStreamDefaultReader<Uint8Array>, reason: unknown) {
  try {
    await reader.cancel(reason);
  } catch (err) {
    // an errored body rejects here with the error that is already being reported
    isVerbose && console.error('WARN: failed to release response body:', err);
  }
}

async function discardBody(body: ReadableStream<Uint8Array> | null, reason: unknown) {
  if (!body) return;
  await discard(body.getReader(), reason);
}

function closedStream<T>(): ReadableStream<T> {
  return new ReadableStream<T>({
    start(controller) {
      controller.close();
    },
  });
}
