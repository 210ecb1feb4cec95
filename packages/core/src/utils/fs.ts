/**
 * Synchronous file system helpers shared by the store modules
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

export function isFile(filePath: string): boolean {
  return fs.existsSync(filePath) && fs.statSync(filePath).isFile();
}

export function isDirectory(dirPath: string): boolean {
  return fs.existsSync(dirPath) && fs.statSync(dirPath).isDirectory();
}

/**
 * Read a text file, treating a missing file as empty
 */
export function readTextOrEmpty(filePath: string): string {
  if (!fs.existsSync(filePath)) {
    return '';
  }
  return fs.readFileSync(filePath, 'utf-8');
}

/**
 * Write a file, creating its parent directories first
 */
export function writeFileWithParents(filePath: string, content: Buffer | string): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, content);
}

/**
 * List every regular file below `root` as `/`-separated relative names, sorted
 */
export function listFilesRecursive(root: string): string[] {
  const results: string[] = [];

  const walk = (dir: string, prefix: string): void => {
    for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
      const name = prefix ? `${prefix}/${entry.name}` : entry.name;
      if (entry.isDirectory()) {
        walk(path.join(dir, entry.name), name);
      } else if (entry.isFile()) {
        results.push(name);
      }
    }
  };

  walk(root, '');
  return results.sort();
}

/**
 * Convert a working-directory-relative path to the `/`-separated form stored in the index
 */
export function toStoredName(relativePath: string): string {
  return relativePath.split(path.sep).join('/');
}

/**
 * Resolve a stored name back to an absolute path under `root`
 */
export function fromStoredName(root: string, name: string): string {
  return path.join(root, ...name.split('/'));
}
