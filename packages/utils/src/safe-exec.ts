import { spawnSync, type SpawnSyncOptions } from 'node:child_process';

import which from 'which';

/**
 * Options for safe command execution
 */
export interface SafeExecOptions {
  /** Character encoding for output (default: undefined = Buffer) */
  encoding?: BufferEncoding;
  /** Standard I/O configuration */
  stdio?: 'pipe' | 'ignore' | Array<'pipe' | 'ignore' | 'inherit'>;
  /** Environment variables (process.env is inherited when omitted) */
  env?: NodeJS.ProcessEnv;
  /** Working directory */
  cwd?: string;
  /** Maximum output buffer size in bytes */
  maxBuffer?: number;
  /** Timeout in milliseconds */
  timeout?: number;
}

/**
 * Result of a safe command execution
 */
export interface SafeExecResult {
  /** Exit code (0 = success, -1 = failed to spawn) */
  status: number;
  /** Standard output */
  stdout: Buffer | string;
  /** Standard error */
  stderr: Buffer | string;
  /** Error object if command failed to spawn */
  error?: Error;
}

/**
 * Windows needs a shell for .cmd/.bat/.ps1 shims (rustup installs cargo.exe,
 * but wrappers such as cross or cargo-binstall may be .cmd scripts).
 */
function shouldUseShell(commandPath: string): boolean {
  if (process.platform !== 'win32') {
    return false;
  }

  const lowerPath = commandPath.toLowerCase();
  return lowerPath.endsWith('.cmd') || lowerPath.endsWith('.bat') || lowerPath.endsWith('.ps1');
}

function toSpawnOptions(options: SafeExecOptions, useShell: boolean): SpawnSyncOptions {
  return {
    shell: useShell,
    stdio: options.stdio ?? 'pipe',
    env: options.env,
    cwd: options.cwd,
    maxBuffer: options.maxBuffer,
    timeout: options.timeout,
    encoding: options.encoding,
  };
}

/**
 * Run a command and return its detailed result (doesn't throw)
 *
 * Use this when a non-zero exit code carries information, e.g. `cargo publish`
 * reporting that a version is already uploaded.
 *
 * @example
 * const result = safeExecResult('cargo', ['publish'], { cwd: crateDir, encoding: 'utf8' });
 * if (result.status !== 0) {
 *   console.error(result.stderr.toString());
 * }
 */
export function safeExecResult(
  command: string,
  args: string[] = [],
  options: SafeExecOptions = {},
): SafeExecResult {
  try {
    const commandPath = which.sync(command);
    const useShell = shouldUseShell(commandPath);

    const result = spawnSync(useShell ? command : commandPath, args, toSpawnOptions(options, useShell));

    return {
      status: result.status ?? -1,
      stdout: result.stdout ?? Buffer.from(''),
      stderr: result.stderr ?? Buffer.from(''),
      error: result.error,
    };
  } catch (error) {
    // which.sync throws if command not found
    return {
      status: -1,
      stdout: Buffer.from(''),
      stderr: Buffer.from(''),
      error: error instanceof Error ? error : new Error(String(error)),
    };
  }
}
