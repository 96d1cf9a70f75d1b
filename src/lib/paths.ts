/**
 * Path Utilities
 *
 * Expansion of user-supplied paths before they reach the canonicalizer.
 * Nothing here touches `.` or `..`: a component may be a symlink, and only
 * the canonicalizer can tell.
 */

import { homedir } from 'node:os';

/**
 * Join a directory and a path below it by concatenation.
 */
function prefixPath(dir: string, rest: string): string {
  const tail = rest.replace(/^\/+/, '');
  if (tail === '') return dir;
  return dir.endsWith('/') ? `${dir}${tail}` : `${dir}/${tail}`;
}

/**
 * Expand `~` and `$VAR` references in a path, and with `basePath` make a
 * relative result absolute.
 *
 * @param inputPath - Path that may contain ~ or environment variables
 * @param basePath - Directory to prefix relative paths with; relative
 *                   paths are left relative without one
 */
export function expandPath(inputPath: string, basePath?: string): string {
  let expanded = inputPath;

  if (expanded === '~' || expanded.startsWith('~/')) {
    expanded = prefixPath(homedir(), expanded.slice(1));
  }

  // a `$` that names no set variable is part of the file name
  expanded = expanded.replace(
    /\$([A-Za-z_][A-Za-z0-9_]*)/g,
    (match: string, varName: string) => process.env[varName] ?? match
  );

  if (basePath !== undefined && !expanded.startsWith('/')) {
    expanded = prefixPath(basePath, expanded);
  }

  return expanded;
}
