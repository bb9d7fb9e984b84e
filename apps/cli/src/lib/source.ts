/**
 * Analyze sources
 *
 * Builds the file record for a path or URL given on the command line.
 */

import { stat } from 'node:fs/promises';
import { basename, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { fetch, type Dispatcher } from 'undici';
import { ValidationError, type FileRecord } from '@mediapeek/core';

export interface SourceOptions {
  /** Known size in bytes; skips the stat / HEAD request */
  size?: number;
  dispatcher?: Dispatcher;
  timeout?: number;
}

function isUrl(source: string): boolean {
  return /^https?:\/\//i.test(source);
}

function nameFromUrl(url: URL): string {
  const last = url.pathname.split('/').filter(Boolean).pop() ?? '';
  try {
    return decodeURIComponent(last);
  } catch {
    return last;
  }
}

async function remoteSize(url: string, options: SourceOptions): Promise<number> {
  const response = await fetch(url, {
    method: 'HEAD',
    signal: AbortSignal.timeout(options.timeout ?? 15000),
    dispatcher: options.dispatcher,
  });
  const length = Number.parseInt(response.headers.get('content-length') ?? '', 10);
  return response.ok && Number.isFinite(length) && length > 0 ? length : 0;
}

/**
 * Local paths are resolved against the working directory; URLs are sized
 * with a HEAD request (0 when the server does not say).
 */
export async function recordForSource(source: string, options: SourceOptions = {}): Promise<FileRecord> {
  const trimmed = source.trim();
  if (!trimmed) {
    throw new ValidationError('source', 'must not be empty');
  }

  if (isUrl(trimmed)) {
    let url: URL;
    try {
      url = new URL(trimmed);
    } catch {
      throw new ValidationError('source', `not a valid URL: ${trimmed}`);
    }
    return {
      key: url.href,
      fileName: nameFromUrl(url) || url.hostname,
      sizeBytes: options.size ?? await remoteSize(url.href, options),
      storageReference: url.href,
    };
  }

  const path = trimmed.startsWith('file://') ? fileURLToPath(trimmed) : resolve(trimmed);
  const sizeBytes = options.size ?? (await stat(path)).size;
  return {
    key: path,
    fileName: basename(path),
    sizeBytes,
    storageReference: path,
  };
}
