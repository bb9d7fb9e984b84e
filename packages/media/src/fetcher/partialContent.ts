/**
 * Partial Content Fetcher
 *
 * Pulls only the leading bytes of a file (container and stream headers
 * live there for the formats we care about) into a private temp file.
 * The temp file exists only for the duration of withHead().
 */

import { tmpdir } from 'node:os';
import { FetchFailedError, err, ok, type Result } from '@mediapeek/core';
import { createLogger, createTempPath, removeFile, type Logger } from '@mediapeek/utils';
import { HttpRangeSource, LocalFileSource, type ContentSource } from './sources.js';

export const DEFAULT_HEAD_BYTES = 2 * 1024 * 1024;

/** Anything smaller cannot hold a usable container header */
export const MIN_HEAD_BYTES = 1024;

export interface HeadFile {
  readonly path: string;
  readonly bytes: number;
  /** True when the head is as large as the limit, i.e. the file likely continues */
  readonly truncated: boolean;
}

export interface PartialContentFetcherOptions {
  sources?: ContentSource[];
  maxBytes?: number;
  minBytes?: number;
  tempDir?: string;
  logger?: Logger;
}

export interface HeadOptions {
  maxBytes?: number;
}

export class PartialContentFetcher {
  private readonly sources: ContentSource[];
  private readonly maxBytes: number;
  private readonly minBytes: number;
  private readonly tempDir: string;
  private readonly logger: Logger;

  constructor(options: PartialContentFetcherOptions = {}) {
    this.sources = options.sources ?? [new HttpRangeSource(), new LocalFileSource()];
    this.maxBytes = options.maxBytes ?? DEFAULT_HEAD_BYTES;
    this.minBytes = options.minBytes ?? MIN_HEAD_BYTES;
    this.tempDir = options.tempDir ?? tmpdir();
    this.logger = options.logger ?? createLogger({ component: 'partial-fetcher' });
  }

  /**
   * Add a source ahead of the built-in ones
   */
  register(source: ContentSource): void {
    this.sources.unshift(source);
  }

  /**
   * Fetch the head of `reference`, run `fn` against it, and delete the temp
   * file whatever happens. Failures to obtain the head come back as a value;
   * anything `fn` throws is rethrown after cleanup.
   */
  async withHead<T>(
    reference: string,
    fn: (head: HeadFile) => Promise<T>,
    options: HeadOptions = {}
  ): Promise<Result<T, FetchFailedError>> {
    const maxBytes = options.maxBytes ?? this.maxBytes;
    const source = this.sources.find(s => s.canHandle(reference));
    if (!source) {
      return err(new FetchFailedError(reference, 'no content source for this reference'));
    }

    const path = createTempPath('mediapeek-head', '.part', this.tempDir);

    try {
      let bytes: number;
      try {
        bytes = await source.readHead(reference, path, maxBytes);
      } catch (error) {
        this.logger.debug({ source: source.name, err: error }, 'Head fetch failed');
        return err(new FetchFailedError(
          reference,
          error instanceof Error ? error.message : String(error),
          error
        ));
      }

      if (bytes < this.minBytes) {
        return err(new FetchFailedError(reference, `only ${bytes} bytes available`));
      }

      this.logger.debug({ source: source.name, bytes }, 'Fetched content head');
      return ok(await fn({ path, bytes, truncated: bytes >= maxBytes }));
    } finally {
      await removeFile(path);
    }
  }
}
