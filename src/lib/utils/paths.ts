import { resolve } from 'node:path';

/** Expand a leading `~` against the given home directory */
export function expandHome(path: string, homeDir: string): string {
  if (path === '~') return homeDir;
  if (path.startsWith('~/')) return resolve(homeDir, path.slice(2));
  return path;
}
