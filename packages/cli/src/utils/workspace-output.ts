/**
 * Human-readable workspace output shared by commands
 */

import type { DiscoveredWorkspace, PackageRecord, PublishPlan } from '@crateflow/core';
import chalk from 'chalk';

/**
 * Print discovery warnings to stderr (stdout may carry YAML)
 */
export function printDiscoveryWarnings(workspace: DiscoveredWorkspace): void {
  for (const warning of workspace.warnings) {
    console.error(chalk.yellow(`⚠️  ${warning.message}`));
  }
}

/**
 * One numbered line of the publish order
 *
 * @example
 * formatPlanLine(0, utils); // '  1. utils 0.1.0'
 */
export function formatPlanLine(index: number, record: PackageRecord): string {
  const suffix = record.publishable ? '' : chalk.gray(' (not publishable)');
  return `  ${index + 1}. ${record.name} ${record.version}${suffix}`;
}

/**
 * Structured view of a plan for `--yaml` output
 */
export function planToYamlResult(workspace: DiscoveredWorkspace, plan: PublishPlan) {
  return {
    root: workspace.root,
    fingerprint: plan.fingerprint,
    packages: plan.packages.map(record => ({
      name: record.name,
      version: record.version,
      path: record.path,
      publishable: record.publishable,
      dependencies: [...record.workspaceDependencies],
    })),
    warnings: workspace.warnings.map(warning => ({ code: warning.code, message: warning.message })),
  };
}
