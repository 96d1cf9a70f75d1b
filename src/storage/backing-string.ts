/**
 * Backing store specifiers
 *
 * A disk's backing files are addressed as `<target>` or
 * `<target>[<index>]`, e.g. `vda[1]` for the second image in the chain of
 * disk `vda`. Index 0 is the top image.
 */

import { ValidationError } from '../core/errors.js';

export interface BackingStoreRef {
  target: string;
  index: number;
}

const INDEX_SUFFIX = /^(\d+)\]$/;

/**
 * Split a backing store specifier into target and chain index.
 *
 * @returns The parsed reference, or null when the bracketed suffix is not
 *          exactly `<digits>]`
 */
export function parseBackingStoreStr(str: string): BackingStoreRef | null {
  const bracket = str.indexOf('[');
  if (bracket === -1) {
    return { target: str, index: 0 };
  }

  const match = INDEX_SUFFIX.exec(str.slice(bracket + 1));
  const digits = match?.[1];
  if (digits === undefined) return null;

  const index = Number(digits);
  // Indexes are unsigned 32-bit values
  if (!Number.isSafeInteger(index) || index > 0xffffffff) return null;

  return { target: str.slice(0, bracket), index };
}

/**
 * Resolve the chain index a user asked for on disk `diskTarget`.
 *
 * A missing or unparsable name, or an explicit index 0, selects the top
 * image (0).
 *
 * @throws ValidationError (TARGET_MISMATCH) when a non-zero index is given
 *         for a different disk
 */
export function parseChainIndex(
  diskTarget: string | undefined,
  name: string | undefined
): number {
  if (name === undefined || diskTarget === undefined) return 0;

  const ref = parseBackingStoreStr(name);
  if (!ref || ref.index === 0) return 0;

  if (ref.target !== diskTarget) {
    throw new ValidationError(
      `requested target '${ref.target}' does not match target '${diskTarget}'`,
      'TARGET_MISMATCH',
      `Use '${diskTarget}[${ref.index}]' to address a backing image of this disk.`
    );
  }

  return ref.index;
}
