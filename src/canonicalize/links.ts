/**
 * Link Resolvers
 *
 * The canonicalizer asks a resolver about one path prefix at a time. A
 * resolver answers with one of three outcomes; it never throws.
 */

import { lstatSync, readlinkSync } from 'node:fs';

/**
 * Answer for one path prefix
 */
export type LinkResolution =
  | { kind: 'not-link' }
  | { kind: 'link'; target: string }
  | { kind: 'error'; error: Error };

/**
 * Tells whether `path` is a symbolic link and, if so, where it points
 */
export type LinkResolver = (path: string) => LinkResolution;

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Resolver backed by the host filesystem (lstat + readlink).
 *
 * A prefix that cannot be stat'ed, a missing one included, is a failure.
 */
export function createFsLinkResolver(): LinkResolver {
  return (path: string): LinkResolution => {
    try {
      if (!lstatSync(path).isSymbolicLink()) {
        return { kind: 'not-link' };
      }
      return { kind: 'link', target: readlinkSync(path, 'utf-8') };
    } catch (error) {
      return { kind: 'error', error: toError(error) };
    }
  };
}

/**
 * In-memory resolver over a table of link path -> target.
 *
 * Paths not in the table are plain entries. When `existing` is given, a
 * path that is neither a link nor listed there fails with ENOENT.
 */
export function createMapLinkResolver(
  links: Readonly<Record<string, string>>,
  existing?: Iterable<string>
): LinkResolver {
  const table = new Map(Object.entries(links));
  const known = existing === undefined ? undefined : new Set(existing);

  return (path: string): LinkResolution => {
    const target = table.get(path);
    if (target !== undefined) {
      return { kind: 'link', target };
    }
    if (known && !known.has(path)) {
      const error: NodeJS.ErrnoException = new Error(
        `ENOENT: no such file or directory, lstat '${path}'`
      );
      error.code = 'ENOENT';
      return { kind: 'error', error };
    }
    return { kind: 'not-link' };
  };
}
