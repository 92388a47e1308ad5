import { chmodSync, renameSync, rmSync, statSync, writeFileSync } from 'node:fs';
import { debug } from './debug.js';

/** Write via a temp file + rename, keeping the original file mode */
export function writeFileAtomic(path: string, content: string): void {
  const mode = statSync(path).mode & 0o777;
  const tmp = `${path}.tmp`;
  try {
    writeFileSync(tmp, content, { mode });
    chmodSync(tmp, mode); // umask may have narrowed it
    renameSync(tmp, path);
  } catch (err) {
    try {
      rmSync(tmp, { force: true });
    } catch (cleanupErr) {
      debug('fs', `could not remove ${tmp}`, cleanupErr);
    }
    throw err;
  }
}
