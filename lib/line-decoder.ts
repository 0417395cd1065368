import { TextDecoder } from 'node:util';
import { StreamProtocolError } from './errors.ts';

const CR = 13;
const LF = 10;

/**
 * Reassembles text lines from byte chunks that arrive with arbitrary boundaries.
 * LF, CR and CRLF each end one line, including a CRLF split between two chunks.
 * One instance belongs to one response body and is thrown away with it.
 */
export class LineDecoder {
  readonly #decoder: TextDecoder;
  readonly #maxLineLength: number;
  #pending = '';
  // the previous chunk ended on CR, so a leading LF is part of that terminator
  #afterCR = false;

  constructor(encoding = 'utf-8', {
    maxLineLength = 5*1024*1024,
  }={}) {
    try {
      this.#decoder = new TextDecoder(encoding);
    } catch (err) {
      throw new StreamProtocolError(`Unsupported response charset ${JSON.stringify(encoding)}`, { cause: err });
    }
    this.#maxLineLength = maxLineLength;
  }

  get encoding(): string {
    return this.#decoder.encoding;
  }

  decode(chunk: Uint8Array): string[] {
    return this.#scan(this.#decoder.decode(chunk, { stream: true }));
  }

  /** Call once the byte stream has ended; returns the unterminated last line, if any. */
  flush(): string[] {
    const lines = this.#scan(this.#decoder.decode());
    if (this.#pending.length > 0) {
      lines.push(this.#pending);
      this.#pending = '';
    }
    this.#afterCR = false;
    return lines;
  }

  #scan(text: string): string[] {
    const lines = new Array<string>();
    let start = 0;
    for (let idx = 0; idx < text.length; idx++) {
      const char = text.charCodeAt(idx);
      if (char === LF && this.#afterCR) {
        this.#afterCR = false;
        start = idx + 1;
        continue;
      }
      this.#afterCR = false;
      if (char !== CR && char !== LF) continue;

      lines.push(this.#checkLength(this.#pending + text.slice(start, idx)));
      this.#pending = '';
      this.#afterCR = char === CR;
      start = idx + 1;
    }
    this.#pending = this.#checkLength(this.#pending + text.slice(start));
    return lines;
  }

  #checkLength(line: string): string {
    if (line.length > this.#maxLineLength) throw new StreamProtocolError(
      `Received a single streamed line longer than ${this.#maxLineLength} characters, giving up`);
    return line;
  }
}

/** Pulls the charset parameter out of a Content-Type header value. */
export function charsetFromContentType(contentType: string): string | null {
  for (const param of contentType.split(';').slice(1)) {
    const eq = param.indexOf('=');
    if (eq < 0) continue;
    if (param.slice(0, eq).trim().toLowerCase() !== 'charset') continue;
    const value = param.slice(eq + 1).trim().replace(/^"(.*)"$/, '$1');
    return value || null;
  }
  return null;
}
