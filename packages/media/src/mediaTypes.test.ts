import { describe, expect, it } from 'vitest';
import { describeLanguage, matchLanguageTag, matchLanguageToken } from './languages.js';
import { isMediaFile, lookupContainer } from './mediaTypes.js';

describe('isMediaFile', () => {
  it.each(['a.mp4', 'a.MKV', 'b.avi', 'c.mov', 'd.webm', 'e.3gp', 'f.ts', 'g.mp3', 'h.flac', 'i.opus'])(
    'accepts %s',
    (name) => {
      expect(isMediaFile(name)).toBe(true);
    }
  );

  it('accepts unknown extensions with a video or audio mime type', () => {
    expect(isMediaFile('stream.bin', 'video/mp4')).toBe(true);
    expect(isMediaFile('voice', 'audio/ogg')).toBe(true);
  });

  it('rejects documents and archives', () => {
    expect(isMediaFile('notes.pdf', 'application/pdf')).toBe(false);
    expect(isMediaFile('movie.mkv.zip')).toBe(false);
    expect(isMediaFile('')).toBe(false);
  });
});

describe('lookupContainer', () => {
  it('prefers the extension over the mime type', () => {
    expect(lookupContainer('clip.mkv', 'video/mp4')).toEqual({ format: 'MATROSKA/MKV', kind: 'video' });
  });

  it('uses the mime type when the extension is unknown', () => {
    expect(lookupContainer('clip', ' Audio/MPEG ')).toEqual({ format: 'MP3', kind: 'audio' });
    expect(lookupContainer('clip', 'application/octet-stream')).toBeNull();
  });
});

describe('languages', () => {
  it('matches names and codes case-insensitively', () => {
    expect(matchLanguageToken('HINDI')?.code).toBe('hin');
    expect(matchLanguageToken('fra')?.name).toBe('French');
    expect(matchLanguageToken('movie')).toBeUndefined();
  });

  it('does not read codes that double as words as file name languages', () => {
    for (const word of ['pan', 'ben', 'mar', 'ind', 'per']) {
      expect(matchLanguageToken(word)).toBeUndefined();
    }
  });

  it('matches stream language tags by code or alias', () => {
    expect(matchLanguageTag('pan')?.name).toBe('Punjabi');
    expect(matchLanguageTag('BEN')?.name).toBe('Bengali');
    expect(matchLanguageTag('deu')?.name).toBe('German');
    expect(matchLanguageTag('movie')).toBeUndefined();
  });

  it('describes stream language tags', () => {
    expect(describeLanguage('hin')).toBe('Hindi');
    expect(describeLanguage('per')).toBe('Persian');
    expect(describeLanguage('und')).toBe('Unknown language');
    expect(describeLanguage('')).toBe('Unknown language');
    expect(describeLanguage('xyz')).toBe('xyz');
  });
});
