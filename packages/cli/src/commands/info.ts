/**
 * Info Command
 *
 * Default action: summarize the workspace and its publish order.
 */

import { loadPublishPlan } from '@crateflow/core';
import chalk from 'chalk';
import type { Command } from 'commander';

import { loadCommandContext } from '../utils/command-context.js';
import { EXIT_SUCCESS, reportCommandError } from '../utils/error-reporter.js';
import { formatPlanLine, printDiscoveryWarnings } from '../utils/workspace-output.js';

export function infoCommand(program: Command): void {
  program.action(async (_options: unknown, command: Command) => {
    let exitCode = EXIT_SUCCESS;

    try {
      const context = await loadCommandContext(command);
      const { workspace, plan } = await loadPublishPlan(context.root, context.source, {
        includeDevDependencies: context.config.publish.includeDevDependencies,
      });

      printDiscoveryWarnings(workspace);

      const publishable = plan.packages.filter(record => record.publishable).length;

      console.log(chalk.blue(`Workspace: ${workspace.root}`));
      console.log(`Packages: ${plan.packages.length} (${publishable} publishable)`);
      console.log('');
      console.log(chalk.bold('Publish order:'));
      plan.packages.forEach((record, index) => {
        console.log(formatPlanLine(index, record));
      });
    } catch (error) {
      exitCode = reportCommandError(error);
    }

    process.exit(exitCode);
  });
}
