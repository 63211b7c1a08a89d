import { glob } from 'glob';
import { readFile } from 'node:fs/promises';
import { resolve } from 'node:path';

export interface DiscoverOptions {
  cwd: string;
  ignore: string[];
}

/**
 * Check if a string contains glob pattern characters
 */
export function isGlobPattern(path: string): boolean {
  return /[*?[\]{}]/.test(path);
}

/**
 * Expand patterns into a sorted, de-duplicated list of file paths.
 * Plain paths are kept as given.
 */
export async function discoverFiles(patterns: string[], options: DiscoverOptions): Promise<string[]> {
  const found = new Set<string>();

  for (const pattern of patterns) {
    if (!isGlobPattern(pattern)) {
      found.add(pattern);
      continue;
    }
    const matches = await glob(pattern, {
      cwd: options.cwd,
      ignore: options.ignore,
      nodir: true,
    });
    for (const match of matches) found.add(match);
  }

  return [...found].sort();
}

export function readStylesheetFile(file: string, cwd: string): Promise<string> {
  return readFile(resolve(cwd, file), 'utf-8');
}
