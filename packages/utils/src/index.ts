/**
 * @mediapeek/utils
 *
 * Shared utilities package containing:
 * - Command execution wrapper
 * - File operations
 * - Path, time and size formatting
 * - Logger
 */

// Command execution
export {
  executeCommand,
  checkCommandAvailable,
  type CommandResult,
  type CommandOptions,
  type CommandRunner,
} from './command.js';

// File operations
export {
  ensureDir,
  removeFile,
  pathExists,
  makeExecutable,
  createTempPath,
} from './file.js';

// Path utilities
export { getExtension } from './path.js';

// Time utilities
export {
  formatDuration,
  formatTimecode,
} from './time.js';

// Size formatting
export { formatBytes } from './bytes.js';

// Logger
export { logger, createLogger, createRootLogger, type Logger, type RootLoggerOptions } from './logger.js';
