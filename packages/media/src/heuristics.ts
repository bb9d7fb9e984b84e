/**
 * Filename Heuristics
 *
 * Best-effort metadata when ffprobe is missing or could not read the content.
 * Only states what the name, extension, mime type and record size justify;
 * everything else is marked as requiring a probe.
 */

import { lookupContainer } from './mediaTypes.js';
import { matchLanguageToken } from './languages.js';
import {
  EMPTY_CHAPTERS,
  REQUIRES_PROBE,
  UNKNOWN_CODEC,
  UNKNOWN_FORMAT,
  known,
  type AudioTrack,
  type HeuristicMediaInfo,
  type Resolution,
  type VideoInfo,
} from './types.js';

export interface HeuristicInput {
  fileName: string;
  sizeBytes: number;
  mimeType?: string;
}

/**
 * Resolution tokens, highest first: the first match wins
 */
const RESOLUTION_TOKENS: ReadonlyArray<{ tokens: readonly string[]; resolution: Resolution }> = [
  { tokens: ['2160p', '4k', 'uhd'], resolution: { width: 3840, height: 2160 } },
  { tokens: ['1440p'], resolution: { width: 2560, height: 1440 } },
  { tokens: ['1080p', '1080i'], resolution: { width: 1920, height: 1080 } },
  { tokens: ['720p'], resolution: { width: 1280, height: 720 } },
  { tokens: ['576p'], resolution: { width: 720, height: 576 } },
  { tokens: ['480p'], resolution: { width: 854, height: 480 } },
  { tokens: ['360p'], resolution: { width: 640, height: 360 } },
];

const VIDEO_CODEC_TOKENS: ReadonlyArray<{ tokens: readonly string[]; codec: string }> = [
  { tokens: ['x265', 'h265', 'hevc'], codec: 'hevc' },
  { tokens: ['x264', 'h264', 'avc'], codec: 'h264' },
  { tokens: ['av1'], codec: 'av1' },
  { tokens: ['vp9'], codec: 'vp9' },
  { tokens: ['xvid', 'divx'], codec: 'mpeg4' },
];

/**
 * Split a file name into lower-case tokens on anything that isn't a letter or digit
 */
export function tokenizeFileName(fileName: string): string[] {
  return fileName
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter(token => token.length > 0);
}

function findResolution(tokens: ReadonlySet<string>): Resolution | null {
  for (const entry of RESOLUTION_TOKENS) {
    if (entry.tokens.some(token => tokens.has(token))) {
      return entry.resolution;
    }
  }
  return null;
}

function findVideoCodec(tokens: ReadonlySet<string>): string | null {
  for (const entry of VIDEO_CODEC_TOKENS) {
    if (entry.tokens.some(token => tokens.has(token))) {
      return entry.codec;
    }
  }
  return null;
}

/**
 * One track per language named in the file, in the order they appear
 */
function findAudioTracks(tokens: readonly string[]): AudioTrack[] {
  const seen = new Set<string>();
  const tracks: AudioTrack[] = [];

  for (const token of tokens) {
    const language = matchLanguageToken(token);
    if (!language || seen.has(language.code)) {
      continue;
    }
    seen.add(language.code);
    tracks.push({
      language: language.name,
      codec: UNKNOWN_CODEC,
      channels: REQUIRES_PROBE,
    });
  }

  return tracks;
}

/**
 * Derive a heuristic MediaInfo. Deterministic and total: never throws.
 */
export function inferMediaInfo(input: HeuristicInput): HeuristicMediaInfo {
  const fileName = typeof input.fileName === 'string' ? input.fileName : '';
  const sizeBytes = Number.isFinite(input.sizeBytes) && input.sizeBytes > 0 ? Math.floor(input.sizeBytes) : 0;

  const tokens = tokenizeFileName(fileName);
  const tokenSet = new Set(tokens);

  const container = lookupContainer(fileName, input.mimeType);
  const resolution = findResolution(tokenSet);
  const codec = findVideoCodec(tokenSet);

  let video: VideoInfo | null = null;
  if (container?.kind === 'video' || resolution !== null || (container === null && codec !== null)) {
    video = {
      codec: codec ? known(codec) : REQUIRES_PROBE,
      resolution: resolution ? known(resolution) : REQUIRES_PROBE,
      frameRate: REQUIRES_PROBE,
    };
  }

  return {
    provenance: 'heuristic',
    containerFormat: container?.format ?? UNKNOWN_FORMAT,
    sizeBytes,
    duration: REQUIRES_PROBE,
    bitrateKbps: REQUIRES_PROBE,
    video,
    audioTracks: findAudioTracks(tokens),
    subtitleTracks: [],
    chapters: EMPTY_CHAPTERS,
  };
}
