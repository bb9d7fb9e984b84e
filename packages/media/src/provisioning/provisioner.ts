/**
 * FFprobe Provisioner
 *
 * Finds a working ffprobe or installs a static build for this platform.
 * Built explicitly and passed to whoever needs it; there is no module-level
 * instance.
 *
 * State only moves forward: once ffprobe is found it stays found for the
 * life of the process. A failed attempt is not remembered forever; ensure()
 * tries again after the retry cool-down.
 */

import { rename } from 'node:fs/promises';
import {
  DownloadFailedError,
  MediaPeekError,
  err,
  formatPlatformKey,
  getDefaultInstallDir,
  getInstalledBinaryPath,
  getPlatformKey,
  ok,
  resolveDownloadUrl,
  FFPROBE_DOWNLOAD_URLS,
  type PlatformKey,
  type Result,
} from '@mediapeek/core';
import {
  checkCommandAvailable,
  createLogger,
  createTempPath,
  ensureDir,
  makeExecutable,
  pathExists,
  removeFile,
  type Logger,
} from '@mediapeek/utils';
import { downloadToFile, type BinaryDownloader } from './download.js';

export type ProvisionState = 'unavailable' | 'system' | 'downloaded';

export interface ProbeProvisioner {
  ensure(): Promise<ProvisionState>;
  commandPath(): string | null;
  getState(): ProvisionState;
}

export interface FFprobeProvisionerOptions {
  /** Explicit binary (FFPROBE_PATH); checked before anything else */
  overridePath?: string;
  /** Name looked up on PATH */
  systemCommand?: string;
  /** Where downloaded binaries go */
  installDir?: string;
  /** Set to false to never download */
  autoInstall?: boolean;
  platform?: PlatformKey;
  downloadUrls?: Readonly<Record<string, string>>;
  versionCheckTimeout?: number;
  downloadTimeout?: number;
  retryCooldownMs?: number;
  /** Runs `<command> -version`; injectable for tests */
  checkAvailable?: (command: string, timeout: number) => Promise<boolean>;
  downloader?: BinaryDownloader;
  now?: () => number;
  logger?: Logger;
}

interface Acquired {
  state: Exclude<ProvisionState, 'unavailable'>;
  command: string;
}

export class FFprobeProvisioner implements ProbeProvisioner {
  private state: ProvisionState = 'unavailable';
  private command: string | null = null;
  private inFlight: Promise<ProvisionState> | null = null;
  private lastFailureAt: number | null = null;

  private readonly platform: PlatformKey;
  private readonly installDir: string;
  private readonly installedPath: string;
  private readonly systemCommand: string;
  private readonly overridePath?: string;
  private readonly autoInstall: boolean;
  private readonly downloadUrls: Readonly<Record<string, string>>;
  private readonly versionCheckTimeout: number;
  private readonly downloadTimeout: number;
  private readonly retryCooldownMs: number;
  private readonly checkAvailable: (command: string, timeout: number) => Promise<boolean>;
  private readonly downloader: BinaryDownloader;
  private readonly now: () => number;
  private readonly logger: Logger;

  constructor(options: FFprobeProvisionerOptions = {}) {
    this.platform = options.platform ?? getPlatformKey();
    this.installDir = options.installDir ?? getDefaultInstallDir();
    this.installedPath = getInstalledBinaryPath(this.installDir, this.platform.os);
    this.systemCommand = options.systemCommand ?? 'ffprobe';
    this.overridePath = options.overridePath;
    this.autoInstall = options.autoInstall ?? true;
    this.downloadUrls = options.downloadUrls ?? FFPROBE_DOWNLOAD_URLS;
    this.versionCheckTimeout = options.versionCheckTimeout ?? 5000;
    this.downloadTimeout = options.downloadTimeout ?? 120000;
    this.retryCooldownMs = options.retryCooldownMs ?? 10 * 60 * 1000;
    this.checkAvailable = options.checkAvailable
      ?? ((command, timeout) => checkCommandAvailable(command, ['-version'], { timeout }));
    this.downloader = options.downloader ?? downloadToFile;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? createLogger({ component: 'ffprobe-provisioner' });
  }

  getState(): ProvisionState {
    return this.state;
  }

  getPlatform(): PlatformKey {
    return this.platform;
  }

  getInstallPath(): string {
    return this.installedPath;
  }

  /**
   * Path or command name to run, or null while unavailable
   */
  commandPath(): string | null {
    return this.command;
  }

  /**
   * Make ffprobe available if at all possible. Never rejects.
   * Concurrent callers share a single attempt.
   */
  async ensure(): Promise<ProvisionState> {
    if (this.state !== 'unavailable') {
      return this.state;
    }
    if (this.inFlight) {
      return this.inFlight;
    }
    if (this.lastFailureAt !== null && this.now() - this.lastFailureAt < this.retryCooldownMs) {
      return this.state;
    }

    this.inFlight = this.acquire().finally(() => {
      this.inFlight = null;
    });
    return this.inFlight;
  }

  private async acquire(): Promise<ProvisionState> {
    let outcome: Result<Acquired, MediaPeekError>;
    try {
      outcome = await this.locateOrInstall();
    } catch (error) {
      outcome = err(new DownloadFailedError(
        this.downloadUrls[formatPlatformKey(this.platform)] ?? 'n/a',
        error instanceof Error ? error.message : String(error),
        error
      ));
    }

    if (!outcome.ok) {
      this.lastFailureAt = this.now();
      this.logger.warn(
        { code: outcome.error.code, details: outcome.error.details },
        'ffprobe unavailable, media info will use filename heuristics'
      );
      return this.state;
    }

    this.state = outcome.value.state;
    this.command = outcome.value.command;
    this.lastFailureAt = null;
    this.logger.info({ state: this.state, command: this.command }, 'ffprobe is available');
    return this.state;
  }

  private async locateOrInstall(): Promise<Result<Acquired, MediaPeekError>> {
    if (this.overridePath) {
      if (await this.checkAvailable(this.overridePath, this.versionCheckTimeout)) {
        return ok({ state: 'system', command: this.overridePath });
      }
      this.logger.warn({ path: this.overridePath }, 'Configured ffprobe path does not run');
    }

    if (await this.checkAvailable(this.systemCommand, this.versionCheckTimeout)) {
      return ok({ state: 'system', command: this.systemCommand });
    }

    // Left behind by an earlier run
    if (await pathExists(this.installedPath)
      && await this.checkAvailable(this.installedPath, this.versionCheckTimeout)) {
      return ok({ state: 'downloaded', command: this.installedPath });
    }

    if (!this.autoInstall) {
      return err(new DownloadFailedError('n/a', 'ffprobe not found and auto-install is disabled'));
    }

    const url = resolveDownloadUrl(this.platform, this.downloadUrls);
    if (!url.ok) {
      return url;
    }

    const installed = await this.install(url.value);
    if (!installed.ok) {
      return installed;
    }
    return ok({ state: 'downloaded', command: this.installedPath });
  }

  /**
   * Download to a temporary name, mark executable, move into place, and
   * only then trust it if it actually runs.
   */
  private async install(url: string): Promise<Result<void, DownloadFailedError>> {
    this.logger.info({ url, platform: formatPlatformKey(this.platform) }, 'Downloading ffprobe');

    await ensureDir(this.installDir);
    const tempPath = createTempPath('ffprobe-download', '.part', this.installDir);

    try {
      await this.downloader(url, tempPath, { timeout: this.downloadTimeout });
      await makeExecutable(tempPath);
      await rename(tempPath, this.installedPath);
    } catch (error) {
      await removeFile(tempPath);
      return err(new DownloadFailedError(url, error instanceof Error ? error.message : String(error), error));
    }

    if (!(await this.checkAvailable(this.installedPath, this.versionCheckTimeout))) {
      await removeFile(this.installedPath);
      return err(new DownloadFailedError(url, 'downloaded binary failed the version check'));
    }

    this.logger.info({ path: this.installedPath }, 'ffprobe installed');
    return ok(undefined);
  }
}
