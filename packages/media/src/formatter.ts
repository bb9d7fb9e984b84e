/**
 * Media info report
 *
 * Pure rendering of a MediaInfo for chat (Telegram HTML) or a terminal
 * (plain). Values the heuristics could not establish are printed with a
 * hint instead of being left out.
 */

import { formatBytes, formatDuration, formatTimecode } from '@mediapeek/utils';
import { describeLanguage } from './languages.js';
import {
  UNKNOWN_CODEC,
  UNKNOWN_LANGUAGE,
  type AudioTrack,
  type Availability,
  type MediaInfo,
  type SubtitleTrack,
  type UnavailableReason,
  type VideoInfo,
} from './types.js';

export type ReportStyle = 'html' | 'plain';

export interface RenderOptions {
  style?: ReportStyle;
}

export const PROBE_HINT = 'Not Available — richer analysis requires ffprobe';

interface Markup {
  bold(text: string): string;
  code(text: string): string;
  italic(text: string): string;
  escape(text: string): string;
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;');
}

const MARKUP: Record<ReportStyle, Markup> = {
  html: {
    bold: text => `<b>${text}</b>`,
    code: text => `<code>${text}</code>`,
    italic: text => `<i>${text}</i>`,
    escape: escapeHtml,
  },
  plain: {
    bold: text => text,
    code: text => text,
    italic: text => text,
    escape: text => text,
  },
};

function missing(reason: UnavailableReason): string {
  return reason === 'requires-probe' ? PROBE_HINT : 'Unknown';
}

function show<T>(field: Availability<T>, format: (value: T) => string): string {
  return field.available ? format(field.value) : missing(field.reason);
}

function codecName(codec: string): string {
  return codec === UNKNOWN_CODEC ? UNKNOWN_CODEC : codec.toUpperCase();
}

/**
 * "Hindi (hin)" for codes, "Hindi" for names, "Unknown language" for und
 */
function languageLabel(tag: string): string {
  const name = describeLanguage(tag);
  if (tag === UNKNOWN_LANGUAGE || name.toLowerCase() === tag.toLowerCase()) {
    return name;
  }
  return `${name} (${tag})`;
}

function videoLines(video: VideoInfo, m: Markup): string[] {
  return [
    `🎬 ${m.bold('Video')}`,
    `   • Codec: ${m.escape(show(video.codec, codecName))}`,
    `   • Resolution: ${show(video.resolution, r => `${r.width}x${r.height}`)}`,
    `   • Frame Rate: ${show(video.frameRate, fps => `${fps} fps`)}`,
  ];
}

function audioLine(track: AudioTrack, index: number, m: Markup): string {
  const parts = [
    languageLabel(track.language),
    codecName(track.codec),
    track.channels.available ? `${track.channels.value}ch` : `channels ${missing(track.channels.reason)}`,
  ];
  const title = track.title ? ` [${track.title}]` : '';
  return `   ${index + 1}. ${m.escape(parts.join(' · ') + title)}`;
}

function subtitleLine(track: SubtitleTrack, index: number, m: Markup): string {
  const title = track.title ? ` [${track.title}]` : '';
  return `   ${index + 1}. ${m.escape(`${languageLabel(track.language)} (${track.codec})${title}`)}`;
}

/**
 * Render the full report for one file
 */
export function renderMediaInfo(info: MediaInfo, displayName: string, options: RenderOptions = {}): string {
  const m = MARKUP[options.style ?? 'html'];
  const heuristic = info.provenance === 'heuristic';
  const lines: string[] = [];

  lines.push(`📋 ${m.bold('Media Information')}`);
  lines.push('');
  lines.push(`📁 ${m.bold('File:')} ${m.code(m.escape(displayName))}`);
  lines.push(`📦 ${m.bold('Format:')} ${m.escape(info.containerFormat)}`);
  lines.push(`📏 ${m.bold('Size:')} ${formatBytes(info.sizeBytes)}`);
  lines.push(`⏱ ${m.bold('Duration:')} ${show(info.duration, formatDuration)}`);
  lines.push(`🔗 ${m.bold('Bitrate:')} ${show(info.bitrateKbps, kbps => `${kbps} kbps`)}`);

  if (info.video) {
    lines.push('');
    lines.push(...videoLines(info.video, m));
  }

  lines.push('');
  if (info.audioTracks.length > 0) {
    lines.push(`🔊 ${m.bold('Audio Tracks:')} ${info.audioTracks.length}`);
    info.audioTracks.forEach((track, i) => lines.push(audioLine(track, i, m)));
  } else {
    lines.push(`🔊 ${m.bold('Audio Tracks:')} ${heuristic ? PROBE_HINT : 'None'}`);
  }

  if (info.subtitleTracks.length > 0) {
    lines.push(`💬 ${m.bold('Subtitles:')} ${info.subtitleTracks.length}`);
    info.subtitleTracks.forEach((track, i) => lines.push(subtitleLine(track, i, m)));
  } else if (heuristic) {
    lines.push(`💬 ${m.bold('Subtitles:')} ${PROBE_HINT}`);
  }

  if (info.chapters.total > 0) {
    lines.push(`📑 ${m.bold('Chapters:')} ${info.chapters.total}`);
    for (const chapter of info.chapters.entries) {
      lines.push(`   • ${formatTimecode(chapter.startSeconds)} ${m.escape(chapter.title)}`);
    }
    const remaining = info.chapters.total - info.chapters.entries.length;
    if (remaining > 0) {
      lines.push(`   • ...and ${remaining} more`);
    }
  } else if (heuristic) {
    lines.push(`📑 ${m.bold('Chapters:')} ${PROBE_HINT}`);
  }

  if (heuristic) {
    lines.push('');
    lines.push(m.italic('ℹ️ Estimated from the file name. Install ffprobe for a full analysis.'));
  }

  return lines.join('\n');
}

export function renderNotFound(fileKey: string, style: ReportStyle = 'html'): string {
  const m = MARKUP[style];
  return [
    `❌ ${m.bold('File not found')}`,
    '',
    `No file is stored under ${m.code(m.escape(fileKey))}. It may have expired.`,
  ].join('\n');
}

export function renderExtractionFailed(displayName: string, style: ReportStyle = 'html'): string {
  const m = MARKUP[style];
  return [
    `❌ ${m.bold('Could not extract media information')}`,
    '',
    `📁 File: ${m.code(m.escape(displayName))}`,
    m.italic('Please try again later.'),
  ].join('\n');
}
