import { existsSync } from 'node:fs';
import { rm } from 'node:fs/promises';
import { join } from 'node:path';

import { createTempTestDir, writeFileTree } from '@crateflow/utils';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { parse as parseYaml } from 'yaml';

import { checkpointCommand } from '../../src/commands/checkpoint.js';
import { errorText, loggedText, runCommand, setupCommanderTest, type CommanderTestEnv } from '../helpers/commander-test-setup.js';
import { writeChainWorkspace } from '../helpers/workspace-fixture.js';

const CHECKPOINT_FILE = 'target/crateflow-checkpoint.yaml';

function checkpointYaml(root: string): string {
  return [
    'version: 1',
    `workspaceRoot: ${root}`,
    'planFingerprint: 0123456789abcdef',
    'completed:',
    '  - name: utils',
    '    version: 0.1.0',
    '    completedAt: 2026-01-15T10:00:00.000Z',
    'updatedAt: 2026-01-15T10:00:00.000Z',
    '',
  ].join('\n');
}

describe('checkpoint command', () => {
  let env: CommanderTestEnv;
  let testDir: string;

  beforeEach(async () => {
    testDir = await createTempTestDir();
    await writeChainWorkspace(testDir);
    env = setupCommanderTest();
    checkpointCommand(env.program);
  });

  afterEach(async () => {
    env.cleanup();
    await rm(testDir, { recursive: true, force: true });
  });

  describe('show', () => {
    it('should report when there is no checkpoint', async () => {
      const code = await runCommand(env, ['-w', testDir, 'checkpoint', 'show']);

      expect(code).toBe(0);
      expect(loggedText(env)).toContain(`No checkpoint at ${join(testDir, CHECKPOINT_FILE)}`);
    });

    it('should list completed crates', async () => {
      await writeFileTree(testDir, { [CHECKPOINT_FILE]: checkpointYaml(testDir) });

      const code = await runCommand(env, ['-w', testDir, 'checkpoint', 'show']);

      expect(code).toBe(0);
      expect(env.capturedLog[1]).toBe('Plan fingerprint: 0123456789abcdef');
      expect(env.capturedLog[2]).toBe('Updated: 2026-01-15T10:00:00.000Z');
      expect(env.capturedLog[3]).toBe('Completed (1):');
      expect(env.capturedLog[4]).toContain('✓ utils 0.1.0');
    });

    it('should output the checkpoint as YAML', async () => {
      await writeFileTree(testDir, { [CHECKPOINT_FILE]: checkpointYaml(testDir) });

      await runCommand(env, ['-w', testDir, 'checkpoint', 'show', '--yaml']);

      const document: unknown = parseYaml(env.capturedStdout.join('').replace(/^---\n/, '').replace(/---\n$/, ''));
      expect(document).toMatchObject({
        location: join(testDir, CHECKPOINT_FILE),
        exists: true,
        workspaceRoot: testDir,
        completed: [{ name: 'utils', version: '0.1.0' }],
      });
    });

    it('should exit 2 for a corrupt checkpoint', async () => {
      await writeFileTree(testDir, { [CHECKPOINT_FILE]: 'version: 7\ncompleted: nope\n' });

      const code = await runCommand(env, ['-w', testDir, 'checkpoint', 'show']);

      expect(code).toBe(2);
      expect(errorText(env)).toContain(`Checkpoint ${join(testDir, CHECKPOINT_FILE)} is unreadable`);
    });
  });

  describe('clear', () => {
    it('should delete the checkpoint file', async () => {
      await writeFileTree(testDir, { [CHECKPOINT_FILE]: checkpointYaml(testDir) });

      const code = await runCommand(env, ['-w', testDir, 'checkpoint', 'clear']);

      expect(code).toBe(0);
      expect(existsSync(join(testDir, CHECKPOINT_FILE))).toBe(false);
      expect(loggedText(env)).toContain(`✓ Removed ${join(testDir, CHECKPOINT_FILE)}`);
    });

    it('should succeed when there is nothing to clear', async () => {
      const code = await runCommand(env, ['-w', testDir, 'checkpoint', 'clear']);

      expect(code).toBe(0);
      expect(loggedText(env)).toContain('No checkpoint at');
    });

    it('should honor a checkpoint path from crateflow.config.yaml', async () => {
      await writeFileTree(testDir, {
        'crateflow.config.yaml': 'checkpoint:\n  file: .crateflow/progress.yaml\n',
        '.crateflow/progress.yaml': checkpointYaml(testDir),
      });

      await runCommand(env, ['-w', testDir, 'checkpoint', 'clear']);

      expect(existsSync(join(testDir, '.crateflow/progress.yaml'))).toBe(false);
    });
  });
});
