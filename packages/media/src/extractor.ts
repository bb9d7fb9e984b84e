/**
 * Media Info Service
 *
 * The request boundary of the extraction pipeline:
 *
 *   record lookup → media gate → provisioner → head fetch → ffprobe → parse
 *
 * Every failure after the lookup is absorbed according to FAILURE_POLICY and
 * ends in filename heuristics. Only a missing record (or an unusable key)
 * reaches the caller as an error value. Results, a missing record included,
 * are cached per key for the cache TTL.
 */

import {
  NotFoundError,
  ValidationError,
  err,
  ok,
  type FallbackCode,
  type FileRecord,
  type FileRecordSource,
  type ProbeError,
  type Result,
} from '@mediapeek/core';
import { createLogger, type Logger } from '@mediapeek/utils';
import { TtlCache } from './cache.js';
import type { PartialContentFetcher } from './fetcher/partialContent.js';
import { inferMediaInfo } from './heuristics.js';
import { isMediaFile } from './mediaTypes.js';
import { FFProbe, DEFAULT_PROBE_TIMEOUT_MS } from './probes/ffprobe.js';
import type { ProbeProvisioner } from './provisioning/provisioner.js';
import type { HeuristicMediaInfo, MediaInfo, ProbedMediaInfo } from './types.js';

export interface MediaProbe {
  probe(filePath: string, sizeBytes: number, truncated?: boolean): Promise<Result<ProbedMediaInfo, ProbeError>>;
}

export type HeadFetcher = Pick<PartialContentFetcher, 'withHead'>;

export interface ExtractedMediaInfo {
  readonly record: FileRecord;
  readonly info: MediaInfo;
}

export type MediaInfoResult = Result<ExtractedMediaInfo, NotFoundError | ValidationError>;

export interface MediaInfoServiceOptions {
  records: FileRecordSource;
  provisioner: ProbeProvisioner;
  fetcher: HeadFetcher;
  /** Result cache; one with the default TTL is created when omitted */
  cache?: TtlCache<MediaInfoResult>;
  headBytes?: number;
  probeTimeoutMs?: number;
  /** Builds the probe for a resolved ffprobe command */
  createProbe?: (command: string) => MediaProbe;
  logger?: Logger;
}

/** Why a file was described from its name alone */
type FallbackReason = 'not-media' | 'ffprobe-unavailable' | FallbackCode | 'unexpected-error';

export class MediaInfoService {
  private readonly records: FileRecordSource;
  private readonly provisioner: ProbeProvisioner;
  private readonly fetcher: HeadFetcher;
  private readonly cache: TtlCache<MediaInfoResult>;
  private readonly headBytes?: number;
  private readonly createProbe: (command: string) => MediaProbe;
  private readonly logger: Logger;

  constructor(options: MediaInfoServiceOptions) {
    this.records = options.records;
    this.provisioner = options.provisioner;
    this.fetcher = options.fetcher;
    this.cache = options.cache ?? new TtlCache<MediaInfoResult>();
    this.headBytes = options.headBytes;
    const timeout = options.probeTimeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS;
    this.createProbe = options.createProbe ?? (command => new FFProbe(command, { timeout }));
    this.logger = options.logger ?? createLogger({ component: 'media-info' });
  }

  /**
   * Media info for a stored file. Concurrent requests for one key share a
   * single extraction. Rejects only if the record store itself fails.
   */
  async getMediaInfo(fileKey: string): Promise<MediaInfoResult> {
    const key = fileKey.trim();
    if (!key) {
      return err(new ValidationError('fileKey', 'must not be empty'));
    }
    return this.cache.getOrCompute(key, () => this.extract(key));
  }

  /**
   * Drop a cached result so the next request extracts again
   */
  invalidate(fileKey: string): boolean {
    return this.cache.delete(fileKey.trim());
  }

  /**
   * Describe a record without the lookup or the cache
   */
  async describe(record: FileRecord): Promise<MediaInfo> {
    try {
      return await this.probeOrFallback(record);
    } catch (error) {
      this.logger.error({ key: record.key, err: error }, 'Unexpected extraction error');
      return this.fallback(record, 'unexpected-error');
    }
  }

  private async extract(key: string): Promise<MediaInfoResult> {
    const startedAt = Date.now();
    const record = await this.records.findByKey(key);
    if (!record) {
      this.logger.info({ key }, 'File record not found');
      return err(new NotFoundError('File', key));
    }

    const info = await this.describe(record);
    this.logger.info(
      { key, provenance: info.provenance, durationMs: Date.now() - startedAt },
      'Media info extracted'
    );
    return ok({ record, info });
  }

  private async probeOrFallback(record: FileRecord): Promise<MediaInfo> {
    if (!isMediaFile(record.fileName, record.mimeType)) {
      return this.fallback(record, 'not-media');
    }

    await this.provisioner.ensure();
    const command = this.provisioner.commandPath();
    if (!command) {
      return this.fallback(record, 'ffprobe-unavailable');
    }

    const probe = this.createProbe(command);
    const fetched = await this.fetcher.withHead(
      record.storageReference,
      head => probe.probe(head.path, record.sizeBytes, head.truncated),
      { maxBytes: this.headBytes }
    );
    const probed = fetched.ok ? fetched.value : fetched;
    if (probed.ok) {
      return probed.value;
    }

    // fallback() only takes FallbackCode, so FAILURE_POLICY is checked here
    const error = probed.error;
    this.logger.warn(
      { key: record.key, code: error.code, details: error.details },
      'Probe path failed, falling back to filename heuristics'
    );
    return this.fallback(record, error.code);
  }

  private fallback(record: FileRecord, reason: FallbackReason): HeuristicMediaInfo {
    this.logger.debug({ key: record.key, reason }, 'Using filename heuristics');
    return inferMediaInfo({
      fileName: record.fileName,
      sizeBytes: record.sizeBytes,
      mimeType: record.mimeType,
    });
  }
}
