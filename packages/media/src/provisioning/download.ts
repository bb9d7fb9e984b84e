/**
 * Binary download
 *
 * Streams a URL to disk with undici's fetch. Redirects are followed
 * (release assets are served from a CDN behind a redirect).
 */

import { createWriteStream } from 'node:fs';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { fetch, type Dispatcher } from 'undici';

export interface DownloadOptions {
  /** Overall wall-clock limit for the transfer */
  timeout?: number;
  dispatcher?: Dispatcher;
}

export type BinaryDownloader = (url: string, destination: string, options?: DownloadOptions) => Promise<void>;

/**
 * Download `url` into `destination`. Throws on non-2xx or transfer errors.
 */
export const downloadToFile: BinaryDownloader = async (url, destination, options = {}) => {
  const { timeout = 120000, dispatcher } = options;

  const response = await fetch(url, {
    signal: AbortSignal.timeout(timeout),
    dispatcher,
  });

  if (!response.ok) {
    await response.body?.cancel();
    throw new Error(`HTTP ${response.status}`);
  }

  if (!response.body) {
    throw new Error('No response body');
  }

  await pipeline(Readable.fromWeb(response.body), createWriteStream(destination, { mode: 0o700 }));
};
