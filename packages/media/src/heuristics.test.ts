import { describe, expect, it } from 'vitest';
import { inferMediaInfo, tokenizeFileName } from './heuristics.js';
import { REQUIRES_PROBE, known } from './types.js';

describe('inferMediaInfo', () => {
  it('reads container, resolution and languages from the name', () => {
    const info = inferMediaInfo({ fileName: 'The.Avengers.2012.720p.Hindi.English.mkv', sizeBytes: 1_400_000_000 });

    expect(info.provenance).toBe('heuristic');
    expect(info.containerFormat).toBe('MATROSKA/MKV');
    expect(info.sizeBytes).toBe(1_400_000_000);
    expect(info.video?.resolution).toEqual(known({ width: 1280, height: 720 }));
    expect(info.video?.codec).toEqual(REQUIRES_PROBE);
    expect(info.audioTracks).toEqual([
      { language: 'Hindi', codec: 'Unknown', channels: REQUIRES_PROBE },
      { language: 'English', codec: 'Unknown', channels: REQUIRES_PROBE },
    ]);
    expect(info.duration).toEqual({ available: false, reason: 'requires-probe' });
    expect(info.bitrateKbps).toEqual({ available: false, reason: 'requires-probe' });
    expect(info.subtitleTracks).toEqual([]);
    expect(info.chapters).toEqual({ entries: [], total: 0 });
  });

  it('picks up codec tokens and the highest resolution', () => {
    const info = inferMediaInfo({ fileName: 'Show S01E01 [2160p 1080p] x265 HEVC.mp4', sizeBytes: 10 });

    expect(info.containerFormat).toBe('MPEG-4/MP4');
    expect(info.video).toEqual({
      codec: known('hevc'),
      resolution: known({ width: 3840, height: 2160 }),
      frameRate: REQUIRES_PROBE,
    });
  });

  it('names each language once, in order of first appearance', () => {
    const info = inferMediaInfo({ fileName: 'film.tam.tel.hin.tamil.mkv', sizeBytes: 1 });
    expect(info.audioTracks.map(track => track.language)).toEqual(['Tamil', 'Telugu', 'Hindi']);
  });

  it('does not turn title words into audio tracks', () => {
    const names = [
      'Peter.Pan.2003.720p.mkv',
      'Ben.Hur.1959.1080p.mkv',
      'Mission.Ind.2020.mkv',
      'Movie.Per.Mar.mkv',
    ];
    for (const fileName of names) {
      expect(inferMediaInfo({ fileName, sizeBytes: 1 }).audioTracks).toEqual([]);
    }
  });

  it('still reads those languages when they are spelled out', () => {
    const info = inferMediaInfo({ fileName: 'Film.2020.Punjabi.Bengali.mkv', sizeBytes: 1 });
    expect(info.audioTracks.map(track => track.language)).toEqual(['Punjabi', 'Bengali']);
  });

  it('has no video block for audio containers', () => {
    const info = inferMediaInfo({ fileName: 'Album - Track 01.flac', sizeBytes: 30_000_000 });

    expect(info.containerFormat).toBe('FLAC');
    expect(info.video).toBeNull();
  });

  it('falls back to the mime type when the extension is unknown', () => {
    const info = inferMediaInfo({ fileName: 'upload', sizeBytes: 5, mimeType: 'video/x-matroska' });
    expect(info.containerFormat).toBe('MATROSKA/MKV');
    expect(info.video).not.toBeNull();
  });

  it('is total on empty input', () => {
    const info = inferMediaInfo({ fileName: '', sizeBytes: 0 });

    expect(info).toEqual({
      provenance: 'heuristic',
      containerFormat: 'Unknown',
      sizeBytes: 0,
      duration: REQUIRES_PROBE,
      bitrateKbps: REQUIRES_PROBE,
      video: null,
      audioTracks: [],
      subtitleTracks: [],
      chapters: { entries: [], total: 0 },
    });
  });

  it('clamps sizes that are not usable', () => {
    expect(inferMediaInfo({ fileName: 'a.mkv', sizeBytes: -5 }).sizeBytes).toBe(0);
    expect(inferMediaInfo({ fileName: 'a.mkv', sizeBytes: Number.NaN }).sizeBytes).toBe(0);
    expect(inferMediaInfo({ fileName: 'a.mkv', sizeBytes: 10.7 }).sizeBytes).toBe(10);
  });

  it('is deterministic', () => {
    const input = { fileName: 'Movie.2019.1080p.WEB-DL.Hindi.x264.mkv', sizeBytes: 123 };
    expect(inferMediaInfo(input)).toEqual(inferMediaInfo(input));
  });
});

describe('tokenizeFileName', () => {
  it('splits on anything that is not a letter or digit', () => {
    expect(tokenizeFileName('Movie.2019_1080p-WEB [Hindi+Eng].mkv')).toEqual([
      'movie', '2019', '1080p', 'web', 'hindi', 'eng', 'mkv',
    ]);
  });
});
