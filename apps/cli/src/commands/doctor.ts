/**
 * Doctor Command
 *
 * Explains what the media info feature will do on this machine without
 * downloading anything.
 */

import {
  formatPlatformKey,
  getPlatformKey,
  resolveDownloadUrl,
  type PlatformKey,
} from '@mediapeek/core';
import { FFprobeProvisioner, isMediaFile, type ProbeProvisioner } from '@mediapeek/media';
import { createLogger } from '@mediapeek/utils';
import type { CliConfig } from '../config/index.js';
import { printCheck, printHeader, type CheckStatus } from '../lib/output.js';

export const SAMPLE_FILE_NAMES = [
  'The.Avengers.2012.720p.Hindi.English.mkv',
  'Episode.S01E01.1080p.x265.mp4',
  'Podcast - Episode 12.mp3',
  'subtitles.srt',
  'release-notes.pdf',
] as const;

export interface Check {
  status: CheckStatus;
  label: string;
  detail: string;
}

export interface DoctorDeps {
  platform?: PlatformKey;
  provisioner?: ProbeProvisioner;
}

export async function runDiagnostics(config: CliConfig, deps: DoctorDeps = {}): Promise<Check[]> {
  const platform = deps.platform ?? getPlatformKey();
  const provisioner = deps.provisioner ?? new FFprobeProvisioner({
    overridePath: config.ffprobePath,
    installDir: config.ffprobeInstallDir,
    autoInstall: false,
    platform,
    logger: createLogger({ app: 'cli', component: 'doctor' }),
  });

  const checks: Check[] = [];

  checks.push(config.mediaInfoEnabled
    ? { status: 'pass', label: 'Media info', detail: 'enabled' }
    : { status: 'warn', label: 'Media info', detail: 'disabled by MEDIA_INFO_ENABLED' });

  const state = await provisioner.ensure();
  const command = provisioner.commandPath();
  checks.push(command
    ? { status: 'pass', label: 'ffprobe', detail: `${state} (${command})` }
    : { status: 'warn', label: 'ffprobe', detail: 'not found; reports will be estimated from file names' });

  const url = resolveDownloadUrl(platform);
  const platformName = formatPlatformKey(platform);
  if (url.ok) {
    checks.push({ status: 'pass', label: 'Platform', detail: `${platformName} has a static ffprobe build` });
  } else {
    checks.push({
      status: command ? 'warn' : 'fail',
      label: 'Platform',
      detail: `${platformName} has no static ffprobe build; install ffprobe yourself`,
    });
  }

  for (const name of SAMPLE_FILE_NAMES) {
    const eligible = config.mediaInfoEnabled && isMediaFile(name);
    checks.push({
      status: eligible ? 'pass' : 'warn',
      label: name,
      detail: eligible ? 'gets a Media Info button' : 'no button',
    });
  }

  return checks;
}

export async function doctorCommand(config: CliConfig): Promise<void> {
  const checks = await runDiagnostics(config);

  printHeader('mediapeek doctor');
  for (const check of checks) {
    printCheck(check.status, check.label, check.detail);
  }

  if (checks.some(check => check.status === 'fail')) {
    process.exitCode = 1;
  }
}
