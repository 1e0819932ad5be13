/**
 * List Command
 *
 * Show workspace packages in publish order.
 */

import { loadPublishPlan } from '@crateflow/core';
import chalk from 'chalk';
import type { Command, OptionValues } from 'commander';

import { flagOption, loadCommandContext } from '../utils/command-context.js';
import { EXIT_SUCCESS, reportCommandError } from '../utils/error-reporter.js';
import { formatPlanLine, planToYamlResult, printDiscoveryWarnings } from '../utils/workspace-output.js';
import { outputYamlResult } from '../utils/yaml-output.js';

export function listCommand(program: Command): void {
  program
    .command('list')
    .description('List workspace packages in publish order')
    .option('--yaml', 'Output YAML only (no human-friendly display)')
    .action(async (options: OptionValues, command: Command) => {
      let exitCode = EXIT_SUCCESS;

      try {
        const context = await loadCommandContext(command);
        const { workspace, plan } = await loadPublishPlan(context.root, context.source, {
          includeDevDependencies: context.config.publish.includeDevDependencies,
        });

        printDiscoveryWarnings(workspace);

        if (flagOption(options, 'yaml')) {
          await outputYamlResult(planToYamlResult(workspace, plan));
        } else {
          plan.packages.forEach((record, index) => {
            console.log(formatPlanLine(index, record));
            if (record.workspaceDependencies.length > 0) {
              console.log(chalk.gray(`     depends on: ${record.workspaceDependencies.join(', ')}`));
            }
          });
        }
      } catch (error) {
        exitCode = reportCommandError(error);
      }

      process.exit(exitCode);
    });
}
