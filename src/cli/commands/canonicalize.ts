/**
 * Canonicalize Command Handler
 *
 * Prints the symlink-free form of a path, resolving links on the host
 * filesystem.
 */

import { canonicalizePath } from '../../canonicalize/canonicalize.js';
import { createFsLinkResolver } from '../../canonicalize/links.js';
import { expandPath } from '../../lib/paths.js';
import { createOutput, handleError } from '../output.js';

/**
 * Options for the canonicalize command
 */
export interface CanonicalizeCommandOptions {
  json?: boolean;
  /** Directory to resolve a relative path against */
  base?: string;
}

export async function canonicalizeCommand(
  path: string,
  options: CanonicalizeCommandOptions
): Promise<void> {
  const output = createOutput('canonicalize', options);

  try {
    const expanded = expandPath(path, options.base);
    const canonical = canonicalizePath(expanded, createFsLinkResolver());

    output.canonicalPath(path, canonical);
    output.flush();
    process.exit(0);
  } catch (error) {
    handleError(output, error);
  }
}
