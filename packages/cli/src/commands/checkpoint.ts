/**
 * Checkpoint Command
 *
 * Inspect or discard the checkpoint left by an interrupted publish run.
 */

import { existsSync } from 'node:fs';

import { FileCheckpointStore } from '@crateflow/core';
import chalk from 'chalk';
import type { Command, OptionValues } from 'commander';

import { flagOption, loadCommandContext } from '../utils/command-context.js';
import { EXIT_SUCCESS, reportCommandError } from '../utils/error-reporter.js';
import { outputYamlResult } from '../utils/yaml-output.js';

async function openStore(command: Command): Promise<FileCheckpointStore> {
  const context = await loadCommandContext(command);
  return new FileCheckpointStore(context.root, context.config.checkpoint.file);
}

async function showCheckpoint(options: OptionValues, command: Command): Promise<void> {
  const store = await openStore(command);
  const exists = existsSync(store.location);
  const checkpoint = await store.load();

  if (flagOption(options, 'yaml')) {
    await outputYamlResult({ location: store.location, exists, ...checkpoint });
    return;
  }

  if (!exists) {
    console.log(chalk.gray(`No checkpoint at ${store.location}`));
    return;
  }

  console.log(chalk.blue(`Checkpoint: ${store.location}`));
  console.log(`Plan fingerprint: ${checkpoint.planFingerprint ?? 'none'}`);
  console.log(`Updated: ${checkpoint.updatedAt}`);
  console.log(`Completed (${checkpoint.completed.length}):`);
  for (const entry of checkpoint.completed) {
    console.log(`  ✓ ${entry.name} ${entry.version} ${chalk.gray(entry.completedAt)}`);
  }
}

async function clearCheckpoint(command: Command): Promise<void> {
  const store = await openStore(command);
  const existed = existsSync(store.location);
  await store.clear();
  console.log(existed ? chalk.green(`✓ Removed ${store.location}`) : chalk.gray(`No checkpoint at ${store.location}`));
}

export function checkpointCommand(program: Command): void {
  const checkpoint = program
    .command('checkpoint')
    .description('Inspect or clear the publish checkpoint');

  checkpoint
    .command('show')
    .description('Show packages recorded as published by an interrupted run')
    .option('--yaml', 'Output YAML only (no human-friendly display)')
    .action(async (options: OptionValues, command: Command) => {
      let exitCode = EXIT_SUCCESS;
      try {
        await showCheckpoint(options, command);
      } catch (error) {
        exitCode = reportCommandError(error);
      }
      process.exit(exitCode);
    });

  checkpoint
    .command('clear')
    .description('Delete the checkpoint so the next run starts from the beginning')
    .action(async (_options: OptionValues, command: Command) => {
      let exitCode = EXIT_SUCCESS;
      try {
        await clearCheckpoint(command);
      } catch (error) {
        exitCode = reportCommandError(error);
      }
      process.exit(exitCode);
    });
}
