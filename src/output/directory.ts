import { existsSync, statSync } from 'fs';
import { mkdir } from 'fs/promises';
import { resolve } from 'path';
import type { Prompter } from '../utils/prompt.js';

/**
 * Directory for generated files: `preset` if given, else asked for
 * (blank means the current directory), else the current directory.
 * The directory is created when missing.
 */
export async function resolveOutputDirectory(prompter?: Prompter, preset?: string): Promise<string> {
  let directory = preset;
  if (!directory && prompter) {
    directory = await prompter.ask('Output directory (press Enter for current directory): ');
  }
  const resolved = resolve(directory || process.cwd());
  await mkdir(resolved, { recursive: true });
  return resolved;
}

/**
 * An `-o` target naming a directory rather than a file
 */
export function isDirectoryTarget(target: string): boolean {
  if (target.endsWith('/')) return true;
  return existsSync(target) && statSync(target).isDirectory();
}
