/**
 * Path Utilities Module
 *
 * Document paths are stored relative to the watch root with forward slashes.
 * They keep the name as it is on disk so they can be opened again; Unicode
 * normalization is left to the document identifier.
 */

import * as path from 'node:path';
import * as os from 'node:os';

/**
 * Resolve to an absolute path without a trailing separator
 *
 * @example
 * ```typescript
 * normalizePath('./docs/')
 * // => '/home/dev/project/docs'
 * ```
 */
export function normalizePath(inputPath: string): string {
  let normalized = path.normalize(path.resolve(inputPath));

  if (normalized.length > 1 && normalized.endsWith(path.sep)) {
    normalized = normalized.slice(0, -1);
  }

  // 'C:' -> 'C:\'
  if (process.platform === 'win32' && /^[A-Za-z]:$/.test(normalized)) {
    normalized = normalized + path.sep;
  }

  return normalized;
}

/**
 * Relative path of `absolutePath` under `basePath`, forward-slash separated
 *
 * @example
 * ```typescript
 * toRelativePath('/root/docs/guide/intro.md', '/root/docs')
 * // => 'guide/intro.md'
 * ```
 */
export function toRelativePath(absolutePath: string, basePath: string): string {
  const relativePath = path.relative(normalizePath(basePath), normalizePath(absolutePath));
  return relativePath.replace(/\\/g, '/');
}

/**
 * Expand a leading `~` to the home directory
 */
export function expandTilde(inputPath: string): string {
  if (inputPath === '~' || inputPath.startsWith('~/') || inputPath.startsWith('~\\')) {
    return path.join(os.homedir(), inputPath.slice(1));
  }
  return inputPath;
}

/**
 * Lowercased extension including the dot (`'.md'`), or `''`
 */
export function getExtension(filePath: string): string {
  return path.extname(filePath).toLowerCase();
}

/**
 * Whether any directory segment of a relative path is an excluded folder name
 *
 * @example
 * ```typescript
 * isInExcludedFolder('node_modules/pkg/README.md', ['node_modules'])
 * // => true
 * ```
 */
export function isInExcludedFolder(relativePath: string, excludeFolders: readonly string[]): boolean {
  const segments = relativePath.split('/');
  segments.pop();
  return segments.some((segment) => excludeFolders.includes(segment));
}
