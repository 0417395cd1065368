import { TransformStream } from 'node:stream/web';
import type { TransformStreamDefaultController } from 'node:stream/web';
import { isJSONObject } from './contract.ts';
import type { JSONObject, WatchEvent } from './contract.ts';
import { StreamProtocolError } from './errors.ts';

function parseJsonLine(line: string, controller: TransformStreamDefaultController<JSONObject>) {
  if (!line.startsWith('{')) {
    throw new StreamProtocolError(`JSON line doesn't start with {: `+line.slice(0, 256));
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch (err) {
    throw new StreamProtocolError(`Unparseable JSON line: `+line.slice(0, 256), { cause: err });
  }
  if (!isJSONObject(parsed)) {
    throw new StreamProtocolError(`JSON line wasn't an object: `+line.slice(0, 256));
  }
  controller.enqueue(parsed);
}

/** Parses individual JSON objects from individual strings, 1:1 */
export class JsonParsingTransformer extends TransformStream<string, JSONObject> {
  constructor() {
    super({ transform: parseJsonLine });
  }
}


class WatchEventReader<T,U> {
  objValidator: (val: JSONObject) => T;
  errValidator: (val: JSONObject) => U;
  constructor(objValidator: (val: JSONObject) => T, errValidator: (val: JSONObject) => U) {
    this.objValidator = objValidator;
    this.errValidator = errValidator;
  }
  processObject(raw: JSONObject, controller: TransformStreamDefaultController<WatchEvent<T,U>>) {
    const {type, object} = raw;
    if (typeof type !== 'string') {
      throw new StreamProtocolError(`Watch record 'type' field was ${typeof type}`);
    }
    if (object == null) {
      throw new StreamProtocolError(`Watch record 'object' field was null`);
    }
    if (typeof object !== 'object') {
      throw new StreamProtocolError(`Watch record 'object' field was ${typeof object}`);
    }
    if (Array.isArray(object)) {
      throw new StreamProtocolError(`Watch record 'object' field was Array`);
    }

    switch (type) {
      case 'ERROR':
        controller.enqueue({type, object: validate(type, this.errValidator, object)});
        break;
      case 'ADDED':
      case 'MODIFIED':
      case 'DELETED':
        controller.enqueue({type, object: validate(type, this.objValidator, object)});
        break;
      case 'BOOKMARK':
        if (isJSONObject(object.metadata)) {
          if (typeof object.metadata.resourceVersion === 'string') {
            controller.enqueue({type, object: {
              metadata: { resourceVersion: object.metadata.resourceVersion },
            }});
            break;
          }
        }
        throw new StreamProtocolError(`BOOKMARK event wasn't recognizable: ${JSON.stringify(object).slice(0, 256)}`);
      default:
        throw new StreamProtocolError(`Watch record got unknown event type ${type}`);
    }
  }
}

function validate<V>(type: string, validator: (val: JSONObject) => V, object: JSONObject): V {
  try {
    return validator(object);
  } catch (err) {
    throw new StreamProtocolError(`Watch ${type} event didn't match the expected type`, { cause: err });
  }
}

/** Validates JSON objects belonging to a watch stream */
export class WatchEventTransformer<T,U> extends TransformStream<JSONObject, WatchEvent<T,U>> {
  constructor(objValidator: (val: JSONObject) => T, errValidator: (val: JSONObject) => U) {
    const reader = new WatchEventReader(objValidator, errValidator);
    super({ transform: reader.processObject.bind(reader) });
  }
}
