import { statSync } from 'node:fs';
import { resolve } from 'node:path';

export type ExistsCheck = (path: string) => boolean;

/** Regular-file check; a directory carrying a sentinel's name does not count. */
export const fileExists: ExistsCheck = (path) => statSync(path, { throwIfNoEntry: false })?.isFile() ?? false;

export function resolveSentinels(dataDir: string, names: readonly string[]): string[] {
  return names.map((name) => resolve(dataDir, name));
}

/**
 * True iff every sentinel exists. Content and timestamps are never looked at,
 * so a stale cache stays valid until someone removes it.
 */
export function cachesReady(paths: readonly string[], exists: ExistsCheck = fileExists): boolean {
  return paths.length > 0 && paths.every((path) => exists(path));
}

export function missingSentinels(paths: readonly string[], exists: ExistsCheck = fileExists): string[] {
  return paths.filter((path) => !exists(path));
}
