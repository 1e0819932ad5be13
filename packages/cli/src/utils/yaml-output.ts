/**
 * YAML Output Utilities
 *
 * Machine-readable output for `--yaml` modes. Keeps stdout pure YAML so it
 * can be piped; progress and warnings go to stderr.
 *
 * @package @crateflow/cli
 */

import { stringify as stringifyYaml } from 'yaml';

/**
 * Render a result as a YAML document with `---` separators
 */
export function formatYamlDocument(result: unknown): string {
  const yaml = stringifyYaml(result);
  return `---\n${yaml}${yaml.endsWith('\n') ? '' : '\n'}---\n`;
}

/**
 * Output a result as YAML to stdout
 *
 * Waits for stdout to drain before returning so a following
 * `process.exit()` does not truncate the document.
 *
 * @example
 * ```typescript
 * await outputYamlResult({ root, packages });
 * process.exit(0);
 * ```
 */
export async function outputYamlResult(result: unknown): Promise<void> {
  // Let pending stderr writes land first
  await new Promise(resolve => setTimeout(resolve, 10));

  const flushed = process.stdout.write(formatYamlDocument(result));

  if (!flushed) {
    await new Promise<void>(resolve => {
      process.stdout.once('drain', resolve);
    });
  }
}
