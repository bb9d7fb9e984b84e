/**
 * ffprobe JSON parsing
 *
 * Validates the untrusted subprocess output and normalizes it into a probed
 * MediaInfo. Stream and chapter order is kept exactly as the tool reports it.
 */

import { z } from 'zod';
import { ProbeError, err, ok, type Result } from '@mediapeek/core';
import {
  NOT_REPORTED,
  UNKNOWN_CODEC,
  UNKNOWN_FORMAT,
  UNKNOWN_LANGUAGE,
  known,
  truncateChapters,
  type Availability,
  type AudioTrack,
  type Chapter,
  type ProbedMediaInfo,
  type SubtitleTrack,
  type VideoInfo,
} from '../types.js';

// ffprobe prints most numbers as strings, but not all of them
const numeric = z.union([z.string(), z.number()]);

const tagsSchema = z.record(z.string(), z.string());

const streamSchema = z.object({
  index: z.number().optional(),
  codec_name: z.string().optional(),
  codec_type: z.string().optional(),
  width: z.number().optional(),
  height: z.number().optional(),
  r_frame_rate: z.string().optional(),
  avg_frame_rate: z.string().optional(),
  channels: z.number().optional(),
  disposition: z.record(z.string(), z.number()).optional(),
  tags: tagsSchema.optional(),
});

const chapterSchema = z.object({
  id: z.number().optional(),
  start_time: numeric.optional(),
  end_time: numeric.optional(),
  tags: tagsSchema.optional(),
});

export const ffprobeOutputSchema = z.object({
  format: z.object({
    format_name: z.string().optional(),
    format_long_name: z.string().optional(),
    duration: numeric.optional(),
    size: numeric.optional(),
    bit_rate: numeric.optional(),
    tags: tagsSchema.optional(),
  }),
  streams: z.array(streamSchema).default([]),
  chapters: z.array(chapterSchema).default([]),
});

export type FFProbeOutput = z.infer<typeof ffprobeOutputSchema>;
type FFProbeStream = FFProbeOutput['streams'][number];

function toNumber(value: string | number | undefined): number | null {
  if (value === undefined) return null;
  const n = typeof value === 'number' ? value : Number.parseFloat(value);
  return Number.isFinite(n) ? n : null;
}

function positive(value: number | null | undefined): Availability<number> {
  return value !== null && value !== undefined && value > 0 ? known(value) : NOT_REPORTED;
}

/**
 * "24000/1001" → 23.98; "0/0" and garbage → null
 */
export function parseFrameRate(rate: string | undefined): number | null {
  if (!rate) return null;
  const [numText, denText = '1'] = rate.split('/');
  const num = Number.parseFloat(numText ?? '');
  const den = Number.parseFloat(denText);
  if (!Number.isFinite(num) || !Number.isFinite(den) || den === 0 || num <= 0) {
    return null;
  }
  return Math.round((num / den) * 100) / 100;
}

/**
 * "matroska,webm" → "MATROSKA/WEBM"
 */
export function formatContainerName(formatName: string | undefined): string {
  const parts = (formatName ?? '')
    .split(',')
    .map(part => part.trim().toUpperCase())
    .filter(part => part.length > 0);
  return parts.length > 0 ? parts.join('/') : UNKNOWN_FORMAT;
}

function languageOf(stream: { tags?: Record<string, string> }): string {
  const tag = stream.tags?.['language']?.trim();
  return tag ? tag : UNKNOWN_LANGUAGE;
}

function titleOf(stream: { tags?: Record<string, string> }): string | undefined {
  const title = stream.tags?.['title']?.trim();
  return title ? title : undefined;
}

function parseVideo(streams: readonly FFProbeStream[]): VideoInfo | null {
  // Cover art shows up as a video stream with the attached_pic disposition
  const stream = streams.find(s => s.codec_type === 'video' && s.disposition?.['attached_pic'] !== 1);
  if (!stream) {
    return null;
  }

  const { width, height } = stream;
  return {
    codec: stream.codec_name ? known(stream.codec_name) : NOT_REPORTED,
    resolution: width && height && width > 0 && height > 0 ? known({ width, height }) : NOT_REPORTED,
    frameRate: positive(parseFrameRate(stream.r_frame_rate) ?? parseFrameRate(stream.avg_frame_rate)),
  };
}

function parseAudio(streams: readonly FFProbeStream[]): AudioTrack[] {
  return streams
    .filter(s => s.codec_type === 'audio')
    .map(s => ({
      language: languageOf(s),
      codec: s.codec_name ?? UNKNOWN_CODEC,
      channels: positive(s.channels),
      title: titleOf(s),
    }));
}

function parseSubtitles(streams: readonly FFProbeStream[]): SubtitleTrack[] {
  return streams
    .filter(s => s.codec_type === 'subtitle')
    .map(s => ({
      language: languageOf(s),
      codec: s.codec_name ?? UNKNOWN_CODEC,
      title: titleOf(s),
    }));
}

function parseChapters(chapters: FFProbeOutput['chapters']): Chapter[] {
  return chapters.map((c, i) => ({
    title: titleOf(c) ?? `Chapter ${i + 1}`,
    startSeconds: Math.max(0, toNumber(c.start_time) ?? 0),
  }));
}

/**
 * Overall bitrate in kbps. When ffprobe only saw a truncated head its
 * bit_rate describes that slice, so the rate is taken from the full size
 * over the duration instead.
 */
function overallBitrate(
  output: FFProbeOutput,
  sizeBytes: number,
  duration: Availability<number>,
  truncated: boolean
): Availability<number> {
  if (!truncated) {
    const bitRate = toNumber(output.format.bit_rate);
    return positive(bitRate === null ? null : Math.floor(bitRate / 1000));
  }
  if (!duration.available || sizeBytes <= 0) {
    return NOT_REPORTED;
  }
  return positive(Math.floor((sizeBytes * 8) / duration.value / 1000));
}

/**
 * Normalize already-validated ffprobe output. `truncated` says whether the
 * probed file was only the head of a larger one.
 */
export function toMediaInfo(output: FFProbeOutput, sizeBytes: number, truncated = false): ProbedMediaInfo {
  const duration = positive(toNumber(output.format.duration));

  return {
    provenance: 'probed',
    containerFormat: formatContainerName(output.format.format_name),
    sizeBytes,
    duration,
    bitrateKbps: overallBitrate(output, sizeBytes, duration, truncated),
    video: parseVideo(output.streams),
    audioTracks: parseAudio(output.streams),
    subtitleTracks: parseSubtitles(output.streams),
    chapters: truncateChapters(parseChapters(output.chapters)),
  };
}

/**
 * Parse raw ffprobe stdout. Any unexpected structure is a ProbeError value.
 */
export function parseProbeOutput(
  stdout: string,
  sizeBytes: number,
  truncated = false
): Result<ProbedMediaInfo, ProbeError> {
  let json: unknown;
  try {
    json = JSON.parse(stdout);
  } catch {
    return err(new ProbeError('malformed-output', 'ffprobe output is not valid JSON', {
      preview: stdout.substring(0, 200),
    }));
  }

  const parsed = ffprobeOutputSchema.safeParse(json);
  if (!parsed.success) {
    return err(new ProbeError('malformed-output', 'ffprobe output has an unexpected shape', {
      issues: parsed.error.issues.slice(0, 5).map(issue => `${issue.path.join('.')}: ${issue.message}`),
    }));
  }

  return ok(toMediaInfo(parsed.data, sizeBytes, truncated));
}
