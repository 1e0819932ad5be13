/**
 * Configuration Loader
 *
 * Loads and validates crateflow configuration from YAML files.
 */

import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';

import { parse as parseYaml } from 'yaml';

import { safeValidateConfig, type CrateflowConfig } from './schema.js';

/**
 * Configuration file name
 *
 * Only YAML format is supported.
 */
export const CONFIG_FILE_NAME = 'crateflow.config.yaml';

/**
 * Error thrown when a configuration file exists but cannot be used
 */
export class ConfigLoadError extends Error {
  public readonly configPath: string;
  public readonly issues: string[];

  constructor(configPath: string, message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}\n  - ${issues.join('\n  - ')}` : message);
    this.name = 'ConfigLoadError';
    this.configPath = configPath;
    this.issues = issues;
  }
}

/**
 * Load configuration from a file path
 *
 * @param configPath - Path to config file (must be .yaml)
 * @returns Loaded and validated configuration with defaults applied
 * @throws ConfigLoadError if the file cannot be read, parsed or validated
 */
export async function loadConfigFromFile(configPath: string): Promise<CrateflowConfig> {
  const absolutePath = resolve(configPath);

  if (!absolutePath.endsWith('.yaml')) {
    throw new ConfigLoadError(
      absolutePath,
      `Unsupported config file format: ${absolutePath}\n` +
      `Only .yaml format is supported.\n` +
      `Please use ${CONFIG_FILE_NAME}`
    );
  }

  let raw: unknown;
  try {
    raw = parseYaml(readFileSync(absolutePath, 'utf-8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigLoadError(absolutePath, `Failed to read ${absolutePath}: ${reason}`);
  }

  // An empty file parses to null; treat it as "all defaults"
  const result = safeValidateConfig(raw ?? {});
  if (!result.success) {
    throw new ConfigLoadError(absolutePath, `Invalid configuration in ${absolutePath}`, result.errors);
  }

  return result.data;
}

/**
 * Find and load configuration from a workspace root
 *
 * @param cwd - Directory to search (default: process.cwd())
 * @returns Loaded configuration, or undefined when no config file exists
 * @throws ConfigLoadError when the file exists but is invalid
 */
export async function findAndLoadConfig(
  cwd: string = process.cwd()
): Promise<CrateflowConfig | undefined> {
  const configPath = resolve(cwd, CONFIG_FILE_NAME);

  if (!existsSync(configPath)) {
    return undefined;
  }

  return loadConfigFromFile(configPath);
}
