/**
 * Global Vitest Setup
 *
 * Runs before each test to ensure clean environment and prevent test pollution.
 */

import { beforeEach } from 'vitest';

beforeEach(() => {
  // Debug logging leaks between tests through process.env
  delete process.env.CRATEFLOW_DEBUG;
});
