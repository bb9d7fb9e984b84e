import { describe, expect, it, vi } from 'vitest';
import { getPlatformKey } from '@mediapeek/core';
import type { ProbeProvisioner, ProvisionState } from '@mediapeek/media';
import type { CliConfig } from '../config/index.js';
import { runDiagnostics } from './doctor.js';

const baseConfig: CliConfig = {
  mediaInfoEnabled: true,
  ffprobeInstallDir: '/tmp/mediapeek-bin',
  ffprobeAutoInstall: true,
  headBytes: 2097152,
  probeTimeoutMs: 30000,
  configFile: '/tmp/mediapeek-config.json',
};

function provisioner(command: string | null): ProbeProvisioner {
  const state: ProvisionState = command ? 'system' : 'unavailable';
  return {
    ensure: vi.fn(async (): Promise<ProvisionState> => state),
    commandPath: () => command,
    getState: () => state,
  };
}

describe('runDiagnostics', () => {
  it('passes on a supported platform with ffprobe installed', async () => {
    const checks = await runDiagnostics(baseConfig, {
      platform: getPlatformKey('linux', 'x86_64'),
      provisioner: provisioner('ffprobe'),
    });

    expect(checks).toEqual([
      { status: 'pass', label: 'Media info', detail: 'enabled' },
      { status: 'pass', label: 'ffprobe', detail: 'system (ffprobe)' },
      { status: 'pass', label: 'Platform', detail: 'linux-x64 has a static ffprobe build' },
      { status: 'pass', label: 'The.Avengers.2012.720p.Hindi.English.mkv', detail: 'gets a Media Info button' },
      { status: 'pass', label: 'Episode.S01E01.1080p.x265.mp4', detail: 'gets a Media Info button' },
      { status: 'pass', label: 'Podcast - Episode 12.mp3', detail: 'gets a Media Info button' },
      { status: 'warn', label: 'subtitles.srt', detail: 'no button' },
      { status: 'warn', label: 'release-notes.pdf', detail: 'no button' },
    ]);
  });

  it('fails when there is neither ffprobe nor a build for the platform', async () => {
    const checks = await runDiagnostics(baseConfig, {
      platform: getPlatformKey('win32', 'x64'),
      provisioner: provisioner(null),
    });

    expect(checks[1]).toEqual({
      status: 'warn',
      label: 'ffprobe',
      detail: 'not found; reports will be estimated from file names',
    });
    expect(checks[2]).toEqual({
      status: 'fail',
      label: 'Platform',
      detail: 'win32-x64 has no static ffprobe build; install ffprobe yourself',
    });
  });

  it('offers no buttons when media info is disabled', async () => {
    const checks = await runDiagnostics({ ...baseConfig, mediaInfoEnabled: false }, {
      platform: getPlatformKey('darwin', 'arm64'),
      provisioner: provisioner('/opt/homebrew/bin/ffprobe'),
    });

    expect(checks[0]).toEqual({ status: 'warn', label: 'Media info', detail: 'disabled by MEDIA_INFO_ENABLED' });
    expect(checks.slice(3).every(check => check.detail === 'no button')).toBe(true);
  });
});
