/**
 * HTTP cookies passed to network disks (RFC 6265 section 4.1.1 grammar).
 */

import { ValidationError } from '../core/errors.js';
import type { NetCookie } from './types.js';

// Control bytes 0x01-0x1F, space, double quote, comma, semicolon, backslash
// eslint-disable-next-line no-control-regex
const VALUE_INVALID_CHARS = /[\x01-\x1f ",;\\]/;

// Cookie names additionally cannot contain separators
const NAME_INVALID_CHARS = /[()<>@:/[\]?={}]/;

export function copyCookies(cookies: readonly Readonly<NetCookie>[]): NetCookie[] {
  return cookies.map((cookie) => ({ name: cookie.name, value: cookie.value }));
}

/**
 * Check one cookie's name and value.
 *
 * The value may be wrapped in one pair of double quotes; the content
 * between them is what gets checked.
 *
 * @throws ValidationError (INVALID_COOKIE)
 */
export function validateCookie(cookie: Readonly<NetCookie>): void {
  if (cookie.name === '') {
    throw new ValidationError('cookie name must not be empty', 'INVALID_COOKIE');
  }

  if (VALUE_INVALID_CHARS.test(cookie.name) || NAME_INVALID_CHARS.test(cookie.name)) {
    throw new ValidationError(
      `cookie name '${cookie.name}' contains invalid characters`,
      'INVALID_COOKIE'
    );
  }

  let content = cookie.value;
  if (content.startsWith('"')) {
    if (!content.endsWith('"')) {
      throw new ValidationError(
        `value of cookie '${cookie.name}' contains invalid characters`,
        'INVALID_COOKIE'
      );
    }
    content = content.slice(1, -1);
  }

  if (VALUE_INVALID_CHARS.test(content)) {
    throw new ValidationError(
      `value of cookie '${cookie.name}' contains invalid characters`,
      'INVALID_COOKIE'
    );
  }
}

/**
 * Check every cookie of a node and reject repeated names (case-sensitive).
 *
 * @throws ValidationError (INVALID_COOKIE or DUPLICATE_COOKIE)
 */
export function validateCookies(cookies: readonly Readonly<NetCookie>[]): void {
  const seen = new Set<string>();

  for (const cookie of cookies) {
    validateCookie(cookie);

    if (seen.has(cookie.name)) {
      throw new ValidationError(`duplicate cookie '${cookie.name}'`, 'DUPLICATE_COOKIE');
    }
    seen.add(cookie.name);
  }
}
