/**
 * Authentication definitions for network disks (iSCSI CHAP, Ceph).
 */

import type { DocumentNode } from '../document/node.js';
import { escapeMarkup, type IndentedBuffer } from '../document/buffer.js';
import { ValidationError, type ValidationErrorCode } from '../core/errors.js';
import { AUTH_TYPES, enumFromString } from './enums.js';
import type { AuthDef, SecretLookup } from './types.js';

const UUID_PATTERN =
  /^[0-9a-f]{8}-?[0-9a-f]{4}-?[0-9a-f]{4}-?[0-9a-f]{4}-?[0-9a-f]{12}$/i;

export function copySecretLookup(src: Readonly<SecretLookup>): SecretLookup {
  return { ...src };
}

export function copyAuthDef(src: Readonly<AuthDef>): AuthDef {
  return {
    username: src.username,
    secretType: src.secretType,
    authType: src.authType,
    secret: copySecretLookup(src.secret),
  };
}

/**
 * Read the `uuid`/`usage` pair of a secret element. Exactly one must be set.
 */
export function parseSecretLookup(
  node: DocumentNode,
  errorCode: ValidationErrorCode = 'INVALID_AUTH'
): SecretLookup {
  const uuid = node.attr('uuid');
  const usage = node.attr('usage');

  if (uuid !== undefined && usage !== undefined) {
    throw new ValidationError(
      'either secret uuid or usage expected, not both',
      errorCode
    );
  }

  if (uuid !== undefined) {
    if (!UUID_PATTERN.test(uuid)) {
      throw new ValidationError(`invalid secret uuid '${uuid}'`, errorCode);
    }
    return { type: 'uuid', uuid };
  }

  if (usage !== undefined) {
    return { type: 'usage', usage };
  }

  throw new ValidationError('missing secret uuid or usage attribute', errorCode);
}

/**
 * Parse an auth element.
 *
 * @throws ValidationError (INVALID_AUTH) naming the first missing or bad field
 */
export function parseAuthDef(node: DocumentNode): AuthDef {
  const username = node.attr('username');
  if (username === undefined) {
    throw new ValidationError('missing username for auth', 'INVALID_AUTH');
  }

  let authType: AuthDef['authType'] = 'none';
  const rawType = node.attr('type');
  if (rawType !== undefined) {
    const parsed = enumFromString(AUTH_TYPES, rawType);
    if (parsed === undefined) {
      throw new ValidationError(`unknown auth type '${rawType}'`, 'INVALID_AUTH');
    }
    authType = parsed;
  }

  const secretNode = node.child('secret');
  if (!secretNode) {
    throw new ValidationError('missing secret element in auth', 'INVALID_AUTH');
  }

  return {
    username,
    // Kept as a plain string: only the disk definition checks it against
    // the protocol (iscsi wants chap, rbd wants ceph)
    secretType: secretNode.attr('type'),
    authType,
    secret: parseSecretLookup(secretNode),
  };
}

/**
 * Emit a secret element, e.g. `<secret type='iscsi' usage='lun1'/>`.
 */
export function formatSecretLookup(
  buf: IndentedBuffer,
  secretType: string | undefined,
  secret: SecretLookup
): void {
  if (secret.type === 'none') return;

  let line = '<secret';
  if (secretType !== undefined) {
    line += ` type='${escapeMarkup(secretType)}'`;
  }
  if (secret.type === 'uuid') {
    line += ` uuid='${escapeMarkup(secret.uuid)}'`;
  } else {
    line += ` usage='${escapeMarkup(secret.usage)}'`;
  }
  buf.addLine(`${line}/>`);
}

export function formatAuthDef(buf: IndentedBuffer, auth: AuthDef): void {
  if (auth.authType === 'none') {
    buf.addEscaped("<auth username='%s'>", auth.username);
  } else {
    buf.addEscaped(`<auth type='${auth.authType}' username='%s'>`, auth.username);
  }

  buf.adjustIndent(2);
  formatSecretLookup(buf, auth.secretType, auth.secret);
  buf.adjustIndent(-2);
  buf.addLine('</auth>');
}
