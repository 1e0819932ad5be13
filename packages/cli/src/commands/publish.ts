/**
 * Publish Command
 *
 * Publish every workspace crate in dependency order, resumably.
 */

import {
  FileCheckpointStore,
  loadPublishPlan,
  runPublishPlan,
  type PackageOutcome,
  type PackageRecord,
  type PublishReport,
  type SkipReason,
} from '@crateflow/core';
import chalk from 'chalk';
import type { Command, OptionValues } from 'commander';

import { cargoIsPublished, cargoPublish } from '../cargo/cargo-publish.js';
import { loadCommandContext } from '../utils/command-context.js';
import { EXIT_PUBLISH_FAILED, EXIT_SUCCESS, reportCommandError } from '../utils/error-reporter.js';
import { resolvePublishSettings } from '../utils/publish-settings.js';
import { printDiscoveryWarnings } from '../utils/workspace-output.js';

const SKIP_LABELS: Record<SkipReason, string> = {
  'not-publishable': 'publish = false',
  'checkpointed': 'already done (checkpoint)',
  'already-published': 'already on the registry',
};

function printStart(record: PackageRecord, dryRun: boolean): void {
  const verb = dryRun ? 'Verifying' : 'Publishing';
  console.log(chalk.blue(`📦 ${verb} ${record.name} v${record.version}...`));
}

function printComplete(record: PackageRecord, outcome: PackageOutcome): void {
  console.log(chalk.green(`   ✓ ${record.name} (${outcome.durationSecs}s)`));
}

function printSkipped(record: PackageRecord, reason: SkipReason): void {
  console.log(chalk.gray(`   ↷ ${record.name} skipped: ${SKIP_LABELS[reason]}`));
}

/**
 * Print the end-of-run summary and return the exit code
 */
function reportOutcome(report: PublishReport, checkpointLocation: string): number {
  console.log('');

  if (report.failed !== undefined) {
    console.error(chalk.red(`❌ ${report.failed.error.message}`));
    console.error(chalk.gray(`   Published before the failure: ${report.published.join(', ') || 'none'}`));
    if (!report.dryRun) {
      console.error(chalk.gray(`   Progress saved to ${checkpointLocation}`));
      console.error(chalk.yellow(`   Use --resume to continue from ${report.failed.name}`));
    }
    return EXIT_PUBLISH_FAILED;
  }

  const verb = report.dryRun ? 'Verified' : 'Published';
  console.log(chalk.green(`✅ ${verb} ${report.published.length} package(s), skipped ${report.skipped.length}`));
  return EXIT_SUCCESS;
}

export function publishCommand(program: Command): void {
  program
    .command('publish')
    .description('Publish workspace crates in dependency order')
    .option('--dry-run', 'Run cargo publish --dry-run for each crate; no checkpoint is written')
    .option('--skip-published', 'Skip crates whose version is already on the registry')
    .option('--resume', 'Continue from the checkpoint left by an interrupted run')
    .option('--token <token>', 'Registry token passed to cargo publish')
    .option('--registry <name>', 'Alternate registry name')
    .option('--publish-interval <secs>', 'Seconds to wait between publishes')
    .action(async (options: OptionValues, command: Command) => {
      let exitCode = EXIT_SUCCESS;

      try {
        const context = await loadCommandContext(command);
        const settings = resolvePublishSettings(options, context.config);
        const { workspace, plan } = await loadPublishPlan(context.root, context.source, {
          includeDevDependencies: context.config.publish.includeDevDependencies,
        });

        printDiscoveryWarnings(workspace);

        const checkpointStore = new FileCheckpointStore(workspace.root, settings.checkpointFile);

        if (settings.dryRun) {
          console.log(chalk.yellow('Dry run: crates are verified, nothing is uploaded.'));
        }

        const report = await runPublishPlan(plan, {
          publish: cargoPublish,
          isPublished: cargoIsPublished,
          checkpointStore,
          resume: settings.resume,
          strictCheckpoint: settings.strictCheckpoint,
          skipPublished: settings.skipPublished,
          dryRun: settings.dryRun,
          intervalMs: settings.intervalMs,
          token: settings.token,
          registry: settings.registry,
          onPackageStart: printStart,
          onPackageComplete: printComplete,
          onPackageSkipped: printSkipped,
        });
        exitCode = reportOutcome(report, checkpointStore.location);
      } catch (error) {
        exitCode = reportCommandError(error);
      }

      process.exit(exitCode);
    });
}
