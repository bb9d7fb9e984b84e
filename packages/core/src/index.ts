/**
 * @mediapeek/core
 *
 * Core package containing:
 * - Error taxonomy and the failure policy table
 * - Result values
 * - Binary/platform configuration
 * - Shared file record types
 */

// Errors
export {
  MediaPeekError,
  UnsupportedPlatformError,
  DownloadFailedError,
  ProbeError,
  FetchFailedError,
  NotFoundError,
  ValidationError,
  FAILURE_POLICY,
  failureAction,
  type ErrorCode,
  type FailureAction,
  type FallbackCode,
  type ProbeFailureReason,
} from './errors/index.js';

// Results
export { ok, err, type Result } from './result.js';

// Types
export type { FileRecord, FileRecordSource } from './types/fileRecord.js';

// Binary Configuration
export {
  FFPROBE_DOWNLOAD_URLS,
  getPlatformKey,
  formatPlatformKey,
  resolveDownloadUrl,
  getExeExt,
  getDefaultInstallDir,
  getInstalledBinaryPath,
  type PlatformKey,
  type OsFamily,
  type CpuArch,
} from './config/binaries.js';
