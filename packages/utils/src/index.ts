/**
 * @tinythis/utils
 * 
 * Shared utilities package containing:
 * - Command execution wrapper
 * - File operations
 * - Path utilities
 * - Time helpers
 * - Logger
 */

// Command execution
export { executeCommand, type CommandResult, type CommandOptions } from './command.js';

// File operations
export {
  safeStat,
  getFileSizeBytes,
  removeFileIfExists,
  removeFileIfExistsSync,
  isErrnoException,
} from './file.js';

// Path utilities
export {
  getExtension,
  normalizePathKey,
  parsePastedPaths,
} from './path.js';

// Time utilities
export {
  settlesWithin,
  formatDuration,
  parseTimecodeUs,
} from './time.js';

// Logger
export { logger, createLogger, setLogLevel, type Logger } from './logger.js';
