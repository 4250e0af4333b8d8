import { Command } from 'commander';
import { readFileSync } from 'fs';
import * as path from 'path';
import { registerPushCommand } from './commands/push';

/**
 * Reads the CLI version from the package manifest next to src/ or dist/
 *
 * @throws Error if the manifest is unreadable or has no string version
 */
export function readPackageVersion(packageJsonPath: string = path.join(__dirname, '..', 'package.json')): string {
  const manifest: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
  if (typeof manifest === 'object' && manifest !== null && 'version' in manifest && typeof manifest.version === 'string') {
    return manifest.version;
  }
  throw new Error(`No version field in ${packageJsonPath}`);
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('quickpush')
    .description('Stage all changes, commit them and push to the upstream branch')
    .version(readPackageVersion());

  registerPushCommand(program);

  return program;
}
