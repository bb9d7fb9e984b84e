/**
 * Binary Configuration
 *
 * Where the ffprobe executable comes from.
 *
 * Priority order:
 * 1. Explicit path (FFPROBE_PATH)
 * 2. System PATH
 * 3. Previously downloaded copy in the install folder
 * 4. Fresh download of a static build for this platform
 */

import { resolve, join } from 'node:path';
import { UnsupportedPlatformError } from '../errors/index.js';
import { err, ok, type Result } from '../result.js';

export type OsFamily = 'linux' | 'darwin' | 'win32' | (string & {});
export type CpuArch = 'x64' | 'arm64' | (string & {});

export interface PlatformKey {
  readonly os: OsFamily;
  readonly arch: CpuArch;
}

const STATIC_BUILD_BASE = 'https://github.com/eugeneware/ffmpeg-static/releases/download/b6.0';

/**
 * Statically linked ffprobe builds, keyed by `${os}-${arch}`
 */
export const FFPROBE_DOWNLOAD_URLS: Readonly<Record<string, string>> = {
  'linux-x64': `${STATIC_BUILD_BASE}/ffprobe-linux-x64`,
  'linux-arm64': `${STATIC_BUILD_BASE}/ffprobe-linux-arm64`,
  'darwin-x64': `${STATIC_BUILD_BASE}/ffprobe-darwin-x64`,
  'darwin-arm64': `${STATIC_BUILD_BASE}/ffprobe-darwin-arm64`,
};

/**
 * Normalize os/arch names reported by different runtimes
 */
export function getPlatformKey(
  platform: string = process.platform,
  arch: string = process.arch
): PlatformKey {
  const a = arch.toLowerCase();
  let normalizedArch: CpuArch;
  if (a === 'x64' || a === 'x86_64' || a === 'amd64') {
    normalizedArch = 'x64';
  } else if (a === 'arm64' || a === 'aarch64') {
    normalizedArch = 'arm64';
  } else {
    normalizedArch = a;
  }

  return Object.freeze({ os: platform.toLowerCase(), arch: normalizedArch });
}

export function formatPlatformKey(key: PlatformKey): string {
  return `${key.os}-${key.arch}`;
}

/**
 * Look up the static build for a platform
 */
export function resolveDownloadUrl(
  key: PlatformKey,
  table: Readonly<Record<string, string>> = FFPROBE_DOWNLOAD_URLS
): Result<string, UnsupportedPlatformError> {
  const id = formatPlatformKey(key);
  const url = table[id];
  return url ? ok(url) : err(new UnsupportedPlatformError(id));
}

/**
 * Get executable extension for an OS
 */
export function getExeExt(os: OsFamily = process.platform): string {
  return os === 'win32' ? '.exe' : '';
}

/**
 * Default folder for downloaded binaries: ./bin under the working directory
 */
export function getDefaultInstallDir(cwd: string = process.cwd()): string {
  return resolve(cwd, 'bin');
}

/**
 * Full path of the downloaded ffprobe inside an install folder
 */
export function getInstalledBinaryPath(installDir: string, os: OsFamily = process.platform): string {
  return join(installDir, `ffprobe${getExeExt(os)}`);
}
