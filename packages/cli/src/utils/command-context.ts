/**
 * Command Context
 *
 * Resolves the workspace root and configuration shared by every command.
 */

import { defaultConfig, findAndLoadConfig, type CrateflowConfig } from '@crateflow/config';
import { findWorkspaceRoot, type ManifestSource } from '@crateflow/core';
import { logDebug } from '@crateflow/utils';
import type { Command, OptionValues } from 'commander';

import { CargoManifestSource } from '../cargo/manifest-reader.js';

export interface CommandContext {
  /** Real workspace root */
  root: string;
  config: CrateflowConfig;
  source: ManifestSource;
}

/**
 * Read a string option, ignoring values of any other type
 */
export function stringOption(values: OptionValues, key: string): string | undefined {
  const value: unknown = values[key];
  return typeof value === 'string' ? value : undefined;
}

/**
 * Read a boolean flag (absent means false)
 */
export function flagOption(values: OptionValues, key: string): boolean {
  return values[key] === true;
}

/**
 * Locate the workspace and load `crateflow.config.yaml` from its root
 *
 * `--workspace-root` (a global option) sets where the upward search starts;
 * the current directory is used otherwise.
 *
 * @throws ConfigurationError MISSING_WORKSPACE when no workspace is found
 * @throws ConfigLoadError when the config file exists but is invalid
 */
export async function loadCommandContext(
  command: Command,
  source: ManifestSource = new CargoManifestSource()
): Promise<CommandContext> {
  const startDir = stringOption(command.optsWithGlobals(), 'workspaceRoot') ?? process.cwd();
  const root = await findWorkspaceRoot(startDir, source);
  const config = (await findAndLoadConfig(root)) ?? defaultConfig();

  logDebug('config', 'Loaded configuration', { root, config });

  return { root, config, source };
}
