import { spawn } from 'child_process';
import type { Git } from '@quickpush/core';

/**
 * Builds the execCommand used by LocalGitModule.
 *
 * Spawn failures (e.g. git missing from PATH) resolve with exit code 1 and
 * the error text as stderr, so callers only ever see ExecResult.
 */
export function createExecCommand(defaultCwd: () => string = () => process.cwd()): Git.ExecCommand {
  return (command: string, args: string[], options?: Git.ExecOptions) => {
    return new Promise<Git.ExecResult>((resolve) => {
      const proc = spawn(command, args, {
        cwd: options?.cwd || defaultCwd(),
        env: { ...process.env, ...options?.env },
        stdio: options?.stdio === 'inherit' ? 'inherit' : 'pipe',
      });

      let stdout = '';
      let stderr = '';

      proc.stdout?.on('data', (data: Buffer) => { stdout += data.toString(); });
      proc.stderr?.on('data', (data: Buffer) => { stderr += data.toString(); });

      proc.on('close', (code: number | null) => {
        resolve({ exitCode: code ?? 1, stdout, stderr });
      });

      proc.on('error', (error: Error) => {
        resolve({ exitCode: 1, stdout, stderr: error.message });
      });
    });
  };
}
