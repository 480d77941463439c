/**
 * Utility exports
 */

// Command runner
export { CommandError, type CommandResult, type CommandRunner, runCommand } from "./exec";
// Error helpers
export { getErrorMessage } from "./errors";
// Formatting utilities
export { formatBytes, formatDuration, parseSize } from "./format";
export type { LogLevel } from "./logger";
// Logger
export {
  debug,
  error,
  getLogLevel,
  info,
  isLogLevel,
  logger,
  setLogColors,
  setLogLevel,
  warn,
} from "./logger";
// Naming utilities
export {
  CYCLE_NAME_PATTERN,
  formatWallClock,
  generateCycleName,
  isValidCycleName,
  parseCycleName,
} from "./naming";
// Path utilities
export {
  ensureTrailingSep,
  expandHome,
  isNodeError,
  isNotFoundError,
  isPathWithinDir,
} from "./path";
