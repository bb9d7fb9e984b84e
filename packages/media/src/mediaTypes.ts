/**
 * Known media containers
 *
 * Extension and mime lookups shared by the heuristics and the
 * "should we probe this at all" gate.
 */

import { getExtension } from '@mediapeek/utils';

export type MediaKind = 'video' | 'audio';

interface ContainerEntry {
  readonly extension: string;
  readonly format: string;
  readonly kind: MediaKind;
  readonly mimeTypes: readonly string[];
}

const CONTAINERS: readonly ContainerEntry[] = [
  { extension: 'mkv', format: 'MATROSKA/MKV', kind: 'video', mimeTypes: ['video/x-matroska'] },
  { extension: 'mp4', format: 'MPEG-4/MP4', kind: 'video', mimeTypes: ['video/mp4'] },
  { extension: 'm4v', format: 'MPEG-4/M4V', kind: 'video', mimeTypes: ['video/x-m4v'] },
  { extension: 'mov', format: 'QUICKTIME/MOV', kind: 'video', mimeTypes: ['video/quicktime'] },
  { extension: 'avi', format: 'AVI', kind: 'video', mimeTypes: ['video/x-msvideo', 'video/avi'] },
  { extension: 'wmv', format: 'ASF/WMV', kind: 'video', mimeTypes: ['video/x-ms-wmv'] },
  { extension: 'flv', format: 'FLV', kind: 'video', mimeTypes: ['video/x-flv'] },
  { extension: 'webm', format: 'WEBM', kind: 'video', mimeTypes: ['video/webm'] },
  { extension: '3gp', format: '3GPP/3GP', kind: 'video', mimeTypes: ['video/3gpp'] },
  { extension: 'ts', format: 'MPEG-TS/TS', kind: 'video', mimeTypes: ['video/mp2t'] },
  { extension: 'mp3', format: 'MP3', kind: 'audio', mimeTypes: ['audio/mpeg', 'audio/mp3'] },
  { extension: 'flac', format: 'FLAC', kind: 'audio', mimeTypes: ['audio/flac', 'audio/x-flac'] },
  { extension: 'aac', format: 'AAC', kind: 'audio', mimeTypes: ['audio/aac'] },
  { extension: 'ogg', format: 'OGG', kind: 'audio', mimeTypes: ['audio/ogg'] },
  { extension: 'wma', format: 'ASF/WMA', kind: 'audio', mimeTypes: ['audio/x-ms-wma'] },
  { extension: 'wav', format: 'WAV', kind: 'audio', mimeTypes: ['audio/wav', 'audio/x-wav'] },
  { extension: 'm4a', format: 'MPEG-4/M4A', kind: 'audio', mimeTypes: ['audio/mp4', 'audio/x-m4a'] },
  { extension: 'opus', format: 'OPUS', kind: 'audio', mimeTypes: ['audio/opus'] },
];

const BY_EXTENSION = new Map(CONTAINERS.map(entry => [entry.extension, entry]));

const BY_MIME = new Map(
  CONTAINERS.flatMap(entry => entry.mimeTypes.map(mime => [mime, entry] as const))
);

export interface ContainerGuess {
  format: string;
  kind: MediaKind;
}

/**
 * Guess the container from the file name first, then the mime hint
 */
export function lookupContainer(fileName: string, mimeType?: string): ContainerGuess | null {
  const entry =
    BY_EXTENSION.get(getExtension(fileName)) ??
    (mimeType ? BY_MIME.get(mimeType.trim().toLowerCase()) : undefined);

  return entry ? { format: entry.format, kind: entry.kind } : null;
}

/**
 * Whether a file is worth probing / offering a media info button for
 */
export function isMediaFile(fileName: string, mimeType?: string): boolean {
  if (BY_EXTENSION.has(getExtension(fileName))) {
    return true;
  }
  const mime = mimeType?.trim().toLowerCase() ?? '';
  return mime.startsWith('video/') || mime.startsWith('audio/');
}
