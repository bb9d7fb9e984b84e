import { readFileSync } from 'node:fs';
import { describe, expect, it, vi } from 'vitest';
import type { CommandResult, CommandRunner } from '@mediapeek/utils';
import { FFProbe } from './ffprobe.js';

const fixture = readFileSync(new URL('./fixtures/avengers-720p.json', import.meta.url), 'utf8');

function completed(overrides: Partial<CommandResult> = {}): CommandResult {
  return { exitCode: 0, stdout: '', stderr: '', duration: 40, timedOut: false, ...overrides };
}

describe('FFProbe', () => {
  it('asks for format, streams and chapters as JSON', () => {
    expect(FFProbe.buildArgs('/tmp/head.part')).toEqual([
      '-v', 'quiet',
      '-print_format', 'json',
      '-show_format',
      '-show_streams',
      '-show_chapters',
      '/tmp/head.part',
    ]);
  });

  it('runs the configured binary with its timeout and parses stdout', async () => {
    const runner = vi.fn<CommandRunner>(async () => completed({ stdout: fixture }));
    const probe = new FFProbe('/opt/bin/ffprobe', { timeout: 1500, runner });

    const result = await probe.probe('/tmp/head.part', 42);

    expect(runner).toHaveBeenCalledWith('/opt/bin/ffprobe', FFProbe.buildArgs('/tmp/head.part'), { timeout: 1500 });
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.value.containerFormat).toBe('MATROSKA/WEBM');
      expect(result.value.sizeBytes).toBe(42);
    }
  });

  it('passes truncation through to the bitrate', async () => {
    const runner = vi.fn<CommandRunner>(async () => completed({ stdout: fixture }));
    const result = await new FFProbe('ffprobe', { runner }).probe('/tmp/head.part', 1_500_000_000, true);

    expect(result.ok && result.value.bitrateKbps).toEqual({ available: true, value: 1398 });
  });

  it('reports a timeout', async () => {
    const runner = vi.fn<CommandRunner>(async () => completed({ exitCode: -1, timedOut: true }));
    const result = await new FFProbe('ffprobe', { timeout: 10, runner }).probe('/tmp/x', 1);

    expect(!result.ok && result.error.reason).toBe('timeout');
    expect(!result.ok && result.error.message).toBe('Probe failed (timeout): ffprobe did not finish within 10ms');
  });

  it('reports a non-zero exit with the start of stderr', async () => {
    const runner = vi.fn<CommandRunner>(async () => completed({ exitCode: 1, stderr: 'moov atom not found' }));
    const result = await new FFProbe('ffprobe', { runner }).probe('/tmp/x', 1);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.reason).toBe('exit-code');
    expect(result.error.details).toMatchObject({ exitCode: 1, stderr: 'moov atom not found' });
  });

  it('reports a binary that cannot be started', async () => {
    const runner = vi.fn<CommandRunner>(async () => {
      throw new Error('spawn ffprobe ENOENT');
    });
    const result = await new FFProbe('ffprobe', { runner }).probe('/tmp/x', 1);

    expect(!result.ok && result.error.reason).toBe('spawn');
  });

  it('reports unparseable output', async () => {
    const runner = vi.fn<CommandRunner>(async () => completed({ stdout: '{"format": 3}' }));
    const result = await new FFProbe('ffprobe', { runner }).probe('/tmp/x', 1);

    expect(!result.ok && result.error.reason).toBe('malformed-output');
  });
});
