import { existsSync, readdirSync, readFileSync, statSync } from 'fs';
import { join, relative, sep, posix } from 'path';
import type { ScriptSource } from '../shared/types/dependencyGraph';
import { SqlDirectoryError } from './errors';

const SQL_FILE = /\.sql$/i;

function scanRecursive(root: string, currentPath: string, found: string[]): void {
  const entries = readdirSync(currentPath, { withFileTypes: true });

  for (const entry of entries) {
    const fullPath = join(currentPath, entry.name);
    if (entry.isDirectory()) {
      scanRecursive(root, fullPath, found);
    } else if (entry.isFile() && SQL_FILE.test(entry.name)) {
      found.push(relative(root, fullPath));
    }
  }
}

/**
 * Convert a relative path to forward slashes for cross-platform report lines
 */
function toPosixPath(relativePath: string): string {
  return relativePath.split(sep).join(posix.sep);
}

/**
 * Finds every *.sql file under `root` and reads it. Paths are relative to
 * `root` and sorted so reports come out in a stable order.
 */
export function discoverScripts(root: string): ScriptSource[] {
  if (!existsSync(root)) {
    throw new SqlDirectoryError(root, 'not found');
  }
  if (!statSync(root).isDirectory()) {
    throw new SqlDirectoryError(root, 'is not a directory');
  }

  const found: string[] = [];
  scanRecursive(root, root, found);

  return found
    .map(relativePath => ({
      path: toPosixPath(relativePath),
      sql: readFileSync(join(root, relativePath), 'utf-8'),
    }))
    .sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));
}
