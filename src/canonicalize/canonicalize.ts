/**
 * Path Canonicalization
 *
 * Resolves a path to an equivalent without symbolic links, `.`/`..`
 * components or repeated separators, asking a LinkResolver about each
 * prefix in turn. Nothing touches the filesystem except through the
 * resolver.
 */

import { SystemError } from '../core/errors.js';
import { logger } from '../lib/logger.js';
import type { LinkResolver } from './links.js';

const SEPARATOR = '/';

/**
 * Leading form of a path: `/x` is absolute, `//x` additionally keeps the
 * POSIX implementation-defined double slash. Three or more leading slashes
 * collapse to one.
 */
interface PathRoot {
  beginSlash: boolean;
  beginDoubleSlash: boolean;
}

function classifyRoot(path: string): PathRoot {
  if (!path.startsWith(SEPARATOR)) {
    return { beginSlash: false, beginDoubleSlash: false };
  }
  return {
    beginSlash: true,
    beginDoubleSlash: path[1] === SEPARATOR && path[2] !== SEPARATOR,
  };
}

/**
 * Split on the separator, dropping the empty components produced by
 * leading, trailing or repeated separators.
 */
function splitComponents(path: string): string[] {
  return path.split(SEPARATOR).filter((component) => component !== '');
}

function formatPath(components: readonly string[], root: PathRoot): string {
  let prefix = '';
  if (root.beginSlash) prefix += SEPARATOR;
  if (root.beginDoubleSlash) prefix += SEPARATOR;
  return prefix + components.join(SEPARATOR);
}

/**
 * Canonicalize `path`.
 *
 * Relative paths stay relative and keep a leading run of `..`, since there
 * is nothing behind them to resolve against. A path that collapses
 * completely yields the empty string.
 *
 * Each symlink prefix may be expanded once per call; meeting the same
 * prefix string a second time is a loop.
 *
 * @throws SystemError SYMLINK_LOOP on a loop, RESOLVER_FAILED when the
 *         resolver reports a failure (with that failure as `cause`)
 */
export function canonicalizePath(path: string, resolve: LinkResolver): string {
  const cycle = new Set<string>();
  let root = classifyRoot(path);
  const components = splitComponents(path);
  let i = 0;

  while (i < components.length) {
    const component = components[i];

    // skip '.'s unless it's the last one remaining
    if (component === '.' && (root.beginSlash || components.length > 1)) {
      components.splice(i, 1);
      continue;
    }

    if (component === '..') {
      if (!root.beginSlash && (i === 0 || components[i - 1] === '..')) {
        i++;
        continue;
      }

      components.splice(i, 1);
      if (i !== 0) {
        components.splice(i - 1, 1);
        i--;
      }
      continue;
    }

    const currentPath = formatPath(components.slice(0, i + 1), root);
    const resolution = resolve(currentPath);

    switch (resolution.kind) {
      case 'not-link':
        i++;
        break;

      case 'error':
        throw new SystemError(
          `Failed to canonicalize path '${path}': ${resolution.error.message}`,
          'RESOLVER_FAILED',
          resolution.error,
          currentPath
        );

      case 'link': {
        if (cycle.has(currentPath)) {
          throw new SystemError(
            `Failed to canonicalize path '${path}': too many levels of symbolic links`,
            'SYMLINK_LOOP',
            undefined,
            currentPath
          );
        }
        cycle.add(currentPath);

        const target = resolution.target;
        logger.debug(`${currentPath} -> ${target}`);
        if (target.startsWith(SEPARATOR)) {
          // an absolute target replaces everything up to and including
          // the current component
          components.splice(0, i + 1);
          root = classifyRoot(target);
          i = 0;
        } else {
          components.splice(i, 1);
        }

        components.splice(i, 0, ...splitComponents(target));
        break;
      }
    }
  }

  return formatPath(components, root);
}
