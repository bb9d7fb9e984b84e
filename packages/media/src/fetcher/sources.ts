/**
 * Content sources
 *
 * Each source knows how to copy the leading bytes of one kind of storage
 * reference into a local file.
 */

import { createReadStream } from 'node:fs';
import { isAbsolute } from 'node:path';
import { Readable } from 'node:stream';
import { fileURLToPath } from 'node:url';
import { fetch, type Dispatcher } from 'undici';
import { writeHead } from './writeHead.js';

export interface ContentSource {
  readonly name: string;
  canHandle(reference: string): boolean;
  /**
   * Copy up to maxBytes leading bytes of `reference` into `destination`.
   * Returns the number of bytes written; throws when the content cannot be read.
   */
  readHead(reference: string, destination: string, maxBytes: number): Promise<number>;
}

export interface HttpRangeSourceOptions {
  timeout?: number;
  headers?: Record<string, string>;
  dispatcher?: Dispatcher;
}

/**
 * Ranged GET over http(s). Servers that ignore Range still only get read
 * up to maxBytes.
 */
export class HttpRangeSource implements ContentSource {
  readonly name = 'http';
  private readonly timeout: number;
  private readonly headers: Record<string, string>;
  private readonly dispatcher?: Dispatcher;

  constructor(options: HttpRangeSourceOptions = {}) {
    this.timeout = options.timeout ?? 30000;
    this.headers = options.headers ?? {};
    this.dispatcher = options.dispatcher;
  }

  canHandle(reference: string): boolean {
    return /^https?:\/\//i.test(reference);
  }

  async readHead(reference: string, destination: string, maxBytes: number): Promise<number> {
    const response = await fetch(reference, {
      headers: { ...this.headers, Range: `bytes=0-${maxBytes - 1}` },
      signal: AbortSignal.timeout(this.timeout),
      dispatcher: this.dispatcher,
    });

    if (response.status !== 200 && response.status !== 206) {
      await response.body?.cancel();
      throw new Error(`HTTP ${response.status}`);
    }
    if (!response.body) {
      throw new Error('No response body');
    }

    return writeHead(Readable.fromWeb(response.body), destination, maxBytes);
  }
}

/**
 * Absolute paths and file:// URLs
 */
export class LocalFileSource implements ContentSource {
  readonly name = 'file';

  canHandle(reference: string): boolean {
    return reference.startsWith('file://') || isAbsolute(reference);
  }

  async readHead(reference: string, destination: string, maxBytes: number): Promise<number> {
    const path = reference.startsWith('file://') ? fileURLToPath(reference) : reference;
    return writeHead(createReadStream(path, { start: 0, end: maxBytes - 1 }), destination, maxBytes);
  }
}
