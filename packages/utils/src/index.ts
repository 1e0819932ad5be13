/**
 * @crateflow/utils
 *
 * Common utilities for crateflow packages.
 * This is the foundational package with NO dependencies on other crateflow packages.
 *
 * @package @crateflow/utils
 */

// Shell-free command execution (cargo invocations carry registry tokens)
export {
  safeExecResult,
  type SafeExecOptions,
  type SafeExecResult
} from './safe-exec.js';

// Real-path helpers
export {
  normalizedTmpdir,
  normalizePath
} from './path-helpers.js';

export { writeFileAtomic } from './atomic-write.js';

export {
  logDebug,
  logWarning,
  logError,
  type LogCategory
} from './logger.js';

// Test helpers (used by every package's vitest suites)
export { createTempTestDir, writeFileTree } from './test-helpers.js';
