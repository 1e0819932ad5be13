/**
 * Tests for debug-gated logging
 */

import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';

import { logDebug, logWarning, logError } from '../src/logger.js';

describe('logger', () => {
  let errorSpy: MockInstance<typeof console.error>;

  beforeEach(() => {
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    delete process.env.CRATEFLOW_DEBUG;
  });

  it('should stay silent for debug and warning without CRATEFLOW_DEBUG', () => {
    logDebug('graph', 'Built graph');
    logWarning('checkpoint', 'Checkpoint missing');

    expect(errorSpy).not.toHaveBeenCalled();
  });

  it('should print debug message and metadata when CRATEFLOW_DEBUG=1', () => {
    process.env.CRATEFLOW_DEBUG = '1';

    logDebug('graph', 'Built graph', { nodes: 3 });

    expect(errorSpy).toHaveBeenCalledTimes(2);
    expect(String(errorSpy.mock.calls[0][0])).toMatch(/\[DEBUG\] \[graph\] Built graph$/);
    expect(errorSpy.mock.calls[1][0]).toBe(JSON.stringify({ nodes: 3 }, null, 2));
  });

  it('should print warning with error message when CRATEFLOW_DEBUG=1', () => {
    process.env.CRATEFLOW_DEBUG = '1';
    const error = new Error('boom');
    error.stack = undefined;

    logWarning('publish', 'Search failed', error);

    expect(errorSpy).toHaveBeenCalledTimes(2);
    expect(String(errorSpy.mock.calls[0][0])).toMatch(/\[WARN\] \[publish\] Search failed$/);
    expect(errorSpy.mock.calls[1][0]).toBe('Error: boom');
  });

  it('should always print errors', () => {
    logError('config', 'Invalid config');

    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(String(errorSpy.mock.calls[0][0])).toMatch(/\[ERROR\] \[config\] Invalid config$/);
  });
});
