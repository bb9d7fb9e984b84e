import { describe, expect, it } from 'vitest';
import {
  PROBE_HINT,
  escapeHtml,
  renderExtractionFailed,
  renderMediaInfo,
  renderNotFound,
} from './formatter.js';
import { inferMediaInfo } from './heuristics.js';
import {
  NOT_REPORTED,
  known,
  truncateChapters,
  type ProbedMediaInfo,
} from './types.js';

const GIB = 1024 * 1024 * 1024;

function probedFixture(overrides: Partial<ProbedMediaInfo> = {}): ProbedMediaInfo {
  const chapters = Array.from({ length: 20 }, (_, i) => ({
    title: `Chapter ${i + 1}`,
    startSeconds: i * 300,
  }));

  return {
    provenance: 'probed',
    containerFormat: 'MATROSKA/WEBM',
    sizeBytes: GIB,
    duration: known(8143.5),
    bitrateKbps: known(4500),
    video: {
      codec: known('h264'),
      resolution: known({ width: 1280, height: 720 }),
      frameRate: known(23.98),
    },
    audioTracks: [
      { language: 'hin', codec: 'aac', channels: known(6), title: 'Hindi 5.1' },
      { language: 'eng', codec: 'ac3', channels: known(2) },
    ],
    subtitleTracks: [{ language: 'eng', codec: 'subrip' }],
    chapters: truncateChapters(chapters),
    ...overrides,
  };
}

describe('renderMediaInfo', () => {
  it('renders a heuristic report with a hint for every unknown field', () => {
    const info = inferMediaInfo({ fileName: 'The.Avengers.2012.720p.Hindi.English.mkv', sizeBytes: GIB });

    expect(renderMediaInfo(info, 'The.Avengers.2012.720p.Hindi.English.mkv')).toBe([
      '📋 <b>Media Information</b>',
      '',
      '📁 <b>File:</b> <code>The.Avengers.2012.720p.Hindi.English.mkv</code>',
      '📦 <b>Format:</b> MATROSKA/MKV',
      '📏 <b>Size:</b> 1.0 GB',
      `⏱ <b>Duration:</b> ${PROBE_HINT}`,
      `🔗 <b>Bitrate:</b> ${PROBE_HINT}`,
      '',
      '🎬 <b>Video</b>',
      `   • Codec: ${PROBE_HINT}`,
      '   • Resolution: 1280x720',
      `   • Frame Rate: ${PROBE_HINT}`,
      '',
      '🔊 <b>Audio Tracks:</b> 2',
      `   1. Hindi · Unknown · channels ${PROBE_HINT}`,
      `   2. English · Unknown · channels ${PROBE_HINT}`,
      `💬 <b>Subtitles:</b> ${PROBE_HINT}`,
      `📑 <b>Chapters:</b> ${PROBE_HINT}`,
      '',
      '<i>ℹ️ Estimated from the file name. Install ffprobe for a full analysis.</i>',
    ].join('\n'));
  });

  it('renders probed values and names tracks by language', () => {
    const lines = renderMediaInfo(probedFixture(), 'movie.mkv').split('\n');

    expect(lines).toContain('📦 <b>Format:</b> MATROSKA/WEBM');
    expect(lines).toContain('⏱ <b>Duration:</b> 2h 15m 43s');
    expect(lines).toContain('🔗 <b>Bitrate:</b> 4500 kbps');
    expect(lines).toContain('   • Codec: H264');
    expect(lines).toContain('   • Frame Rate: 23.98 fps');
    expect(lines).toContain('   1. Hindi (hin) · AAC · 6ch [Hindi 5.1]');
    expect(lines).toContain('   2. English (eng) · AC3 · 2ch');
    expect(lines).toContain('💬 <b>Subtitles:</b> 1');
    expect(lines).toContain('   1. English (eng) (subrip)');
    expect(lines.some(line => line.startsWith('<i>'))).toBe(false);
  });

  it('lists five of twenty chapters and counts the rest', () => {
    const lines = renderMediaInfo(probedFixture(), 'movie.mkv').split('\n');
    const chapterLines = lines.filter(line => /^ {3}• \d{2}:\d{2}:\d{2} /.test(line));

    expect(lines).toContain('📑 <b>Chapters:</b> 20');
    expect(chapterLines).toEqual([
      '   • 00:00:00 Chapter 1',
      '   • 00:05:00 Chapter 2',
      '   • 00:10:00 Chapter 3',
      '   • 00:15:00 Chapter 4',
      '   • 00:20:00 Chapter 5',
    ]);
    expect(lines).toContain('   • ...and 15 more');
  });

  it('shows fields the probe did not report as Unknown', () => {
    const info = probedFixture({ duration: NOT_REPORTED, bitrateKbps: NOT_REPORTED });
    const lines = renderMediaInfo(info, 'movie.mkv').split('\n');

    expect(lines).toContain('⏱ <b>Duration:</b> Unknown');
    expect(lines).toContain('🔗 <b>Bitrate:</b> Unknown');
  });

  it('says None for a probed file without audio and omits empty sections', () => {
    const info = probedFixture({ audioTracks: [], subtitleTracks: [], chapters: truncateChapters([]) });
    const lines = renderMediaInfo(info, 'silent.mp4').split('\n');

    expect(lines).toContain('🔊 <b>Audio Tracks:</b> None');
    expect(lines.some(line => line.includes('Subtitles'))).toBe(false);
    expect(lines.some(line => line.includes('Chapters'))).toBe(false);
  });

  it('escapes the display name', () => {
    const lines = renderMediaInfo(probedFixture(), 'Tom & Jerry <Uncut>.mkv').split('\n');
    expect(lines).toContain('📁 <b>File:</b> <code>Tom &amp; Jerry &lt;Uncut&gt;.mkv</code>');
  });

  it('renders without markup in plain style', () => {
    const lines = renderMediaInfo(probedFixture(), 'a<b>.mkv', { style: 'plain' }).split('\n');

    expect(lines[0]).toBe('📋 Media Information');
    expect(lines).toContain('📁 File: a<b>.mkv');
    expect(lines).toContain('🔗 Bitrate: 4500 kbps');
  });
});

describe('failure messages', () => {
  it('names the missing key', () => {
    expect(renderNotFound('AgAD<x>')).toBe(
      '❌ <b>File not found</b>\n\nNo file is stored under <code>AgAD&lt;x&gt;</code>. It may have expired.'
    );
  });

  it('distinguishes extraction failures from missing files', () => {
    expect(renderExtractionFailed('movie.mkv', 'plain')).toBe(
      '❌ Could not extract media information\n\n📁 File: movie.mkv\nPlease try again later.'
    );
  });

  it('escapes markup characters', () => {
    expect(escapeHtml('<a & b>')).toBe('&lt;a &amp; b&gt;');
  });
});
