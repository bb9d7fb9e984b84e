import { describe, expect, it } from 'vitest';
import { formatBytes } from './bytes.js';
import { getExtension } from './path.js';
import { formatDuration, formatTimecode } from './time.js';

describe('formatDuration', () => {
  it('formats hours, minutes and seconds', () => {
    expect(formatDuration(8130.5)).toBe('2h 15m 30s');
  });

  it('drops the hour part under an hour', () => {
    expect(formatDuration(125)).toBe('2m 5s');
  });

  it('formats bare seconds', () => {
    expect(formatDuration(42.9)).toBe('42s');
  });

  it('clamps negative input', () => {
    expect(formatDuration(-3)).toBe('0s');
  });
});

describe('formatTimecode', () => {
  it('pads every component', () => {
    expect(formatTimecode(3725.7)).toBe('01:02:05');
  });

  it('formats zero', () => {
    expect(formatTimecode(0)).toBe('00:00:00');
  });
});

describe('formatBytes', () => {
  it('keeps small values in bytes', () => {
    expect(formatBytes(512)).toBe('512.0 B');
  });

  it('scales by 1024', () => {
    expect(formatBytes(1536)).toBe('1.5 KB');
    expect(formatBytes(2 * 1024 * 1024 * 1024)).toBe('2.0 GB');
  });

  it('handles zero', () => {
    expect(formatBytes(0)).toBe('0.0 B');
  });
});

describe('path utilities', () => {
  it('lowercases extensions without the dot', () => {
    expect(getExtension('The.Avengers.2012.720p.MKV')).toBe('mkv');
    expect(getExtension('README')).toBe('');
  });
});
