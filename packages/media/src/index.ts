/**
 * @mediapeek/media
 *
 * Media information extraction.
 *
 * Responsibilities:
 * - Provision ffprobe (system binary or a downloaded static build)
 * - Fetch a bounded head of the content into a temp file
 * - Probe it and normalize the output into MediaInfo
 * - Fall back to filename heuristics when any of that fails
 * - Cache results per file key and render them for chat or terminal
 */

// Model
export {
  known,
  unavailable,
  truncateChapters,
  REQUIRES_PROBE,
  NOT_REPORTED,
  UNKNOWN_LANGUAGE,
  UNKNOWN_CODEC,
  UNKNOWN_FORMAT,
  MAX_DISPLAY_CHAPTERS,
  EMPTY_CHAPTERS,
  type Availability,
  type Known,
  type Unavailable,
  type UnavailableReason,
  type RequiresProbe,
  type Resolution,
  type VideoInfo,
  type AudioTrack,
  type SubtitleTrack,
  type Chapter,
  type ChapterList,
  type MediaInfo,
  type ProbedMediaInfo,
  type HeuristicMediaInfo,
  type Provenance,
} from './types.js';

// Provisioning
export {
  FFprobeProvisioner,
  type FFprobeProvisionerOptions,
  type ProbeProvisioner,
  type ProvisionState,
} from './provisioning/provisioner.js';
export { downloadToFile, type BinaryDownloader, type DownloadOptions } from './provisioning/download.js';

// Partial content
export {
  PartialContentFetcher,
  DEFAULT_HEAD_BYTES,
  MIN_HEAD_BYTES,
  type HeadFile,
  type HeadOptions,
  type PartialContentFetcherOptions,
} from './fetcher/partialContent.js';
export {
  HttpRangeSource,
  LocalFileSource,
  type ContentSource,
  type HttpRangeSourceOptions,
} from './fetcher/sources.js';
export { writeHead } from './fetcher/writeHead.js';

// Probing
export { FFProbe, DEFAULT_PROBE_TIMEOUT_MS, type FFProbeOptions } from './probes/ffprobe.js';
export {
  parseProbeOutput,
  parseFrameRate,
  formatContainerName,
  toMediaInfo,
  ffprobeOutputSchema,
  type FFProbeOutput,
} from './probes/parseProbeOutput.js';

// Heuristics
export { inferMediaInfo, tokenizeFileName, type HeuristicInput } from './heuristics.js';
export { lookupContainer, isMediaFile, type MediaKind, type ContainerGuess } from './mediaTypes.js';
export { LANGUAGES, describeLanguage, matchLanguageTag, matchLanguageToken, type Language } from './languages.js';

// Cache
export { TtlCache, DEFAULT_CACHE_TTL_MS, type CacheEntry, type TtlCacheOptions } from './cache.js';

// Pipeline
export {
  MediaInfoService,
  type MediaInfoServiceOptions,
  type MediaInfoResult,
  type ExtractedMediaInfo,
  type MediaProbe,
  type HeadFetcher,
} from './extractor.js';

// Presentation
export {
  renderMediaInfo,
  renderNotFound,
  renderExtractionFailed,
  escapeHtml,
  PROBE_HINT,
  type ReportStyle,
  type RenderOptions,
} from './formatter.js';
