/**
 * crateflow command-line program
 *
 * Builds the commander program; `bin.ts` parses process arguments with it.
 *
 * @package @crateflow/cli
 */

import { Command } from 'commander';

import { checkpointCommand } from './commands/checkpoint.js';
import { infoCommand } from './commands/info.js';
import { listCommand } from './commands/list.js';
import { publishCommand } from './commands/publish.js';

/**
 * Options every command reads through `optsWithGlobals()`
 */
export function addGlobalOptions(program: Command): Command {
  return program.option(
    '-w, --workspace-root <dir>',
    'Directory to search upward from for the workspace root (default: cwd)',
  );
}

export function createProgram(version: string): Command {
  const program = new Command();

  program
    .name('crateflow')
    .description('Publish Cargo workspace crates in dependency order, resumably')
    .version(version);
  addGlobalOptions(program);

  infoCommand(program);         // crateflow
  listCommand(program);         // crateflow list
  publishCommand(program);      // crateflow publish
  checkpointCommand(program);   // crateflow checkpoint show|clear

  return program;
}

export { CargoManifestSource } from './cargo/manifest-reader.js';
export { cargoPublish, cargoIsPublished } from './cargo/cargo-publish.js';
