#!/usr/bin/env node
/**
 * crateflow CLI Entry Point
 *
 * Main executable for the crateflow command-line tool.
 */

import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

import { createProgram } from './program.js';

// Read version from package.json at runtime (one level up from both src/ and dist/)
const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packageJsonPath = join(__dirname, '../package.json');

function readVersion(path: string): string | undefined {
  const packageJson: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  if (typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson &&
      typeof packageJson.version === 'string') {
    return packageJson.version;
  }
  return undefined;
}

let version = '0.3.0'; // Fallback version
try {
  version = readVersion(packageJsonPath) ?? version;
} catch (error) {
  const errorMessage = error instanceof Error ? error.message : String(error);
  console.warn(`Warning: Could not read package.json version (${errorMessage}), using fallback`);
}

await createProgram(version).parseAsync();
