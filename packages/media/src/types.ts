/**
 * Media Types
 *
 * One model for both probed and filename-derived results. Which values can be
 * trusted is stated per field through Availability rather than guessed from
 * the code path that produced the object.
 */

export type UnavailableReason =
  /** Heuristic mode: only inspecting the content could tell */
  | 'requires-probe'
  /** The probe ran but the tool did not report it (e.g. truncated head) */
  | 'not-reported';

export interface Unavailable {
  readonly available: false;
  readonly reason: UnavailableReason;
}

export interface Known<T> {
  readonly available: true;
  readonly value: T;
}

export type Availability<T> = Known<T> | Unavailable;

export type RequiresProbe = Unavailable & { readonly reason: 'requires-probe' };

export function known<T>(value: T): Known<T> {
  return { available: true, value };
}

export function unavailable(reason: UnavailableReason): Unavailable {
  return { available: false, reason };
}

export const REQUIRES_PROBE: RequiresProbe = {
  available: false,
  reason: 'requires-probe',
};

export const NOT_REPORTED: Unavailable = {
  available: false,
  reason: 'not-reported',
};

/** ISO 639-2 "undetermined"; used whenever a track carries no language tag */
export const UNKNOWN_LANGUAGE = 'und';

export const UNKNOWN_CODEC = 'Unknown';

export const UNKNOWN_FORMAT = 'Unknown';

export interface Resolution {
  readonly width: number;
  readonly height: number;
}

export interface VideoInfo {
  readonly codec: Availability<string>;
  readonly resolution: Availability<Resolution>;
  /** Frames per second, rounded to two decimals */
  readonly frameRate: Availability<number>;
}

export interface AudioTrack {
  readonly language: string;
  readonly codec: string;
  readonly channels: Availability<number>;
  readonly title?: string;
}

export interface SubtitleTrack {
  readonly language: string;
  readonly codec: string;
  readonly title?: string;
}

export interface Chapter {
  readonly title: string;
  readonly startSeconds: number;
}

export interface ChapterList {
  /** Leading chapters kept for display, in tool order */
  readonly entries: readonly Chapter[];
  /** True number of chapters reported */
  readonly total: number;
}

export const MAX_DISPLAY_CHAPTERS = 5;

interface MediaInfoFields {
  readonly containerFormat: string;
  /** Always from the file record, never from the (truncated) head */
  readonly sizeBytes: number;
  readonly video: VideoInfo | null;
  readonly audioTracks: readonly AudioTrack[];
  readonly subtitleTracks: readonly SubtitleTrack[];
  readonly chapters: ChapterList;
}

export interface ProbedMediaInfo extends MediaInfoFields {
  readonly provenance: 'probed';
  /** Seconds */
  readonly duration: Availability<number>;
  readonly bitrateKbps: Availability<number>;
}

export interface HeuristicMediaInfo extends MediaInfoFields {
  readonly provenance: 'heuristic';
  readonly duration: RequiresProbe;
  readonly bitrateKbps: RequiresProbe;
}

export type MediaInfo = ProbedMediaInfo | HeuristicMediaInfo;

export type Provenance = MediaInfo['provenance'];

export const EMPTY_CHAPTERS: ChapterList = { entries: [], total: 0 };

/**
 * Keep the first MAX_DISPLAY_CHAPTERS chapters and the real count
 */
export function truncateChapters(chapters: readonly Chapter[], limit: number = MAX_DISPLAY_CHAPTERS): ChapterList {
  return {
    entries: chapters.slice(0, limit),
    total: chapters.length,
  };
}
