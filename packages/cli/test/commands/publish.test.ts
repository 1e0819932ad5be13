import { existsSync } from 'node:fs';
import { readFile, rm } from 'node:fs/promises';
import { join } from 'node:path';

import type { PublishRequest } from '@crateflow/core';
import { createTempTestDir, writeFileTree } from '@crateflow/utils';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { parse as parseYaml } from 'yaml';

import { cargoIsPublished, cargoPublish } from '../../src/cargo/cargo-publish.js';
import { publishCommand } from '../../src/commands/publish.js';
import { errorText, loggedText, runCommand, setupCommanderTest, type CommanderTestEnv } from '../helpers/commander-test-setup.js';
import { writeChainWorkspace } from '../helpers/workspace-fixture.js';

vi.mock('../../src/cargo/cargo-publish.js', () => ({
  cargoPublish: vi.fn(),
  cargoIsPublished: vi.fn(),
}));

function publishedNames(): string[] {
  return vi.mocked(cargoPublish).mock.calls.map(([request]) => request.name);
}

function failOn(name: string) {
  return async (request: PublishRequest): Promise<void> => {
    if (request.name === name) {
      throw new Error('registry rejected the upload');
    }
  };
}

describe('publish command', () => {
  let env: CommanderTestEnv;
  let testDir: string;
  let checkpointPath: string;

  beforeEach(async () => {
    testDir = await createTempTestDir();
    checkpointPath = join(testDir, 'target/crateflow-checkpoint.yaml');
    await writeChainWorkspace(testDir);

    vi.mocked(cargoPublish).mockReset().mockResolvedValue(undefined);
    vi.mocked(cargoIsPublished).mockReset().mockResolvedValue(false);

    env = setupCommanderTest();
    publishCommand(env.program);
  });

  afterEach(async () => {
    env.cleanup();
    await rm(testDir, { recursive: true, force: true });
  });

  async function readCompleted(): Promise<string[]> {
    const checkpoint: unknown = parseYaml(await readFile(checkpointPath, 'utf8'));
    if (typeof checkpoint !== 'object' || checkpoint === null || !('completed' in checkpoint) ||
        !Array.isArray(checkpoint.completed)) {
      throw new Error('checkpoint has no completed list');
    }
    return checkpoint.completed.map((entry: { name: string }) => entry.name);
  }

  /** A second program sharing the spies, for a follow-up invocation */
  function nextRun(): CommanderTestEnv {
    const next = setupCommanderTest();
    publishCommand(next.program);
    return next;
  }

  it('should publish every crate in dependency order', async () => {
    const code = await runCommand(env, ['-w', testDir, 'publish']);

    expect(code).toBe(0);
    expect(publishedNames()).toEqual(['utils', 'core', 'app']);
    expect(cargoPublish).toHaveBeenCalledWith(expect.objectContaining({
      name: 'core',
      version: '0.1.0',
      path: join(testDir, 'crates/core'),
      dryRun: false,
    }));
    expect(loggedText(env)).toContain('✅ Published 3 package(s), skipped 0');
    expect(existsSync(checkpointPath)).toBe(false);
  });

  it('should pass the token and registry to cargo', async () => {
    await runCommand(env, ['-w', testDir, 'publish', '--token', 'test-secret', '--registry', 'internal']);

    expect(cargoPublish).toHaveBeenCalledWith(expect.objectContaining({
      name: 'utils',
      token: 'test-secret',
      registry: 'internal',
    }));
  });

  it('should stop at the first failure and keep progress in the checkpoint', async () => {
    vi.mocked(cargoPublish).mockImplementation(failOn('core'));

    const code = await runCommand(env, ['-w', testDir, 'publish']);

    expect(code).toBe(1);
    expect(publishedNames()).toEqual(['utils', 'core']);
    expect(errorText(env)).toContain('❌ Failed to publish core: registry rejected the upload');
    expect(errorText(env)).toContain('Use --resume to continue from core');
    expect(await readCompleted()).toEqual(['utils']);
  });

  it('should resume after the last published crate', async () => {
    vi.mocked(cargoPublish).mockImplementation(failOn('core'));
    await runCommand(env, ['-w', testDir, 'publish']);

    vi.mocked(cargoPublish).mockReset().mockResolvedValue(undefined);
    const resumed = nextRun();
    const code = await runCommand(resumed, ['-w', testDir, 'publish', '--resume']);

    expect(code).toBe(0);
    expect(publishedNames()).toEqual(['core', 'app']);
    expect(loggedText(resumed)).toContain('↷ utils skipped: already done (checkpoint)');
    expect(loggedText(resumed)).toContain('✅ Published 2 package(s), skipped 1');
    expect(existsSync(checkpointPath)).toBe(false);
  });

  it('should refuse to resume when the plan changed', async () => {
    vi.mocked(cargoPublish).mockImplementation(failOn('core'));
    await runCommand(env, ['-w', testDir, 'publish']);

    await writeFileTree(testDir, {
      'crates/app/Cargo.toml': '[package]\nname = "app"\nversion = "0.3.0"\n\n[dependencies]\ncore = { path = "../core" }\n',
    });
    vi.mocked(cargoPublish).mockClear();
    const resumed = nextRun();
    const code = await runCommand(resumed, ['-w', testDir, 'publish', '--resume']);

    expect(code).toBe(2);
    expect(cargoPublish).not.toHaveBeenCalled();
    expect(errorText(resumed)).toContain('publish plan changed since the checkpoint was written');
    expect(errorText(resumed)).toContain('crateflow checkpoint clear');
  });

  it('should resume with nothing checkpointed when no checkpoint exists', async () => {
    const code = await runCommand(env, ['-w', testDir, 'publish', '--resume']);

    expect(code).toBe(0);
    expect(publishedNames()).toEqual(['utils', 'core', 'app']);
  });

  it('should verify without writing a checkpoint in dry-run mode', async () => {
    vi.mocked(cargoPublish).mockImplementation(failOn('app'));

    const code = await runCommand(env, ['-w', testDir, 'publish', '--dry-run']);

    expect(code).toBe(1);
    expect(cargoPublish).toHaveBeenCalledWith(expect.objectContaining({ name: 'utils', dryRun: true }));
    expect(errorText(env)).not.toContain('--resume');
    expect(existsSync(checkpointPath)).toBe(false);
  });

  it('should report verified crates after a successful dry run', async () => {
    await runCommand(env, ['-w', testDir, 'publish', '--dry-run']);

    expect(loggedText(env)).toContain('📦 Verifying utils v0.1.0...');
    expect(loggedText(env)).toContain('✅ Verified 3 package(s), skipped 0');
  });

  it('should skip crates already on the registry', async () => {
    vi.mocked(cargoIsPublished).mockImplementation(async (name: string) => name === 'utils');

    const code = await runCommand(env, ['-w', testDir, 'publish', '--skip-published']);

    expect(code).toBe(0);
    expect(publishedNames()).toEqual(['core', 'app']);
    expect(cargoIsPublished).toHaveBeenCalledWith('utils', '0.1.0', undefined);
    expect(loggedText(env)).toContain('↷ utils skipped: already on the registry');
  });

  it('should read defaults from crateflow.config.yaml', async () => {
    await writeFileTree(testDir, {
      'crateflow.config.yaml': 'publish:\n  skipPublished: true\n  registry: internal\n',
    });
    vi.mocked(cargoIsPublished).mockResolvedValue(true);

    const code = await runCommand(env, ['-w', testDir, 'publish']);

    expect(code).toBe(0);
    expect(cargoPublish).not.toHaveBeenCalled();
    expect(cargoIsPublished).toHaveBeenCalledWith('app', '0.2.0', 'internal');
  });

  it('should exit 2 for an invalid config file', async () => {
    await writeFileTree(testDir, { 'crateflow.config.yaml': 'publish:\n  intervalSecs: -1\n' });

    const code = await runCommand(env, ['-w', testDir, 'publish']);

    expect(code).toBe(2);
    expect(cargoPublish).not.toHaveBeenCalled();
  });

  it('should exit 2 for an invalid publish interval', async () => {
    const code = await runCommand(env, ['-w', testDir, 'publish', '--publish-interval', 'soon']);

    expect(code).toBe(2);
    expect(errorText(env)).toContain('--publish-interval must be a whole number of seconds (got "soon")');
    expect(cargoPublish).not.toHaveBeenCalled();
  });
});
