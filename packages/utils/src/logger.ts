/**
 * Structured logging for crateflow
 *
 * Debug and warning logs are only output when CRATEFLOW_DEBUG=1 is set.
 * This gives visibility into discovery and checkpoint decisions without
 * cluttering publish output.
 */

export type LogCategory =
  | 'workspace'
  | 'graph'
  | 'checkpoint'
  | 'publish'
  | 'config'
  | 'exec'
  | 'cli';

function isDebugEnabled(): boolean {
  return process.env.CRATEFLOW_DEBUG === '1';
}

function writeError(error: Error): void {
  console.error(`Error: ${error.message}`);
  if (error.stack) {
    console.error(error.stack);
  }
}

/**
 * Log a debug message
 * Only outputs when CRATEFLOW_DEBUG=1
 *
 * @example
 * ```typescript
 * logDebug('workspace', 'Resolved members', { count: directories.length });
 * ```
 */
export function logDebug(category: LogCategory, message: string, metadata?: Record<string, unknown>): void {
  if (isDebugEnabled()) {
    const timestamp = new Date().toISOString();
    console.error(`[${timestamp}] [DEBUG] [${category}] ${message}`);
    if (metadata) {
      console.error(JSON.stringify(metadata, null, 2));
    }
  }
}

/**
 * Log a warning (non-critical error)
 * Only outputs when CRATEFLOW_DEBUG=1
 */
export function logWarning(category: LogCategory, message: string, error?: Error): void {
  if (isDebugEnabled()) {
    const timestamp = new Date().toISOString();
    console.error(`[${timestamp}] [WARN] [${category}] ${message}`);
    if (error) {
      writeError(error);
    }
  }
}

/**
 * Log an error (critical failure)
 * Always outputs, even without CRATEFLOW_DEBUG
 */
export function logError(category: LogCategory, message: string, error?: Error): void {
  const timestamp = new Date().toISOString();
  console.error(`[${timestamp}] [ERROR] [${category}] ${message}`);
  if (error) {
    writeError(error);
  }
}
