/**
 * Persistent reservation (PR) settings of shared SCSI disks.
 */

import type { DocumentNode } from '../document/node.js';
import type { IndentedBuffer } from '../document/buffer.js';
import { ValidationError } from '../core/errors.js';
import type { PRDef } from './types.js';

export function copyPRDef(src: Readonly<PRDef>): PRDef {
  return {
    managed: src.managed,
    path: src.path,
    managerAlias: src.managerAlias,
  };
}

/**
 * Parse a reservations element.
 *
 * `managed` must be yes or no. An unmanaged reservation, or one that gives
 * any source attribute, must give all of type (unix), path and mode (client).
 *
 * @throws ValidationError (INVALID_RESERVATION)
 */
export function parsePRDef(node: DocumentNode): PRDef {
  const managed = node.attr('managed');
  if (managed === undefined) {
    throw new ValidationError(
      'missing managed attribute for reservations',
      'INVALID_RESERVATION'
    );
  }
  if (managed !== 'yes' && managed !== 'no') {
    throw new ValidationError(
      `invalid value for 'managed': ${managed}`,
      'INVALID_RESERVATION'
    );
  }

  const source = node.child('source');
  const type = source?.attr('type');
  const path = source?.attr('path');
  const mode = source?.attr('mode');

  if (managed === 'no' || type !== undefined || path !== undefined || mode !== undefined) {
    if (type === undefined) {
      throw new ValidationError(
        'missing connection type for reservations',
        'INVALID_RESERVATION'
      );
    }
    if (path === undefined) {
      throw new ValidationError('missing path for reservations', 'INVALID_RESERVATION');
    }
    if (mode === undefined) {
      throw new ValidationError(
        'missing connection mode for reservations',
        'INVALID_RESERVATION'
      );
    }
  }

  if (type !== undefined && type !== 'unix') {
    throw new ValidationError(
      `unsupported connection type for reservations: ${type}`,
      'INVALID_RESERVATION'
    );
  }

  if (mode !== undefined && mode !== 'client') {
    throw new ValidationError(
      `unsupported connection mode for reservations: ${mode}`,
      'INVALID_RESERVATION'
    );
  }

  return { managed, path };
}

/**
 * Emit a reservations element. The source path of a managed reservation is
 * generated at runtime, so it is left out of migratable output.
 */
export function formatPRDef(buf: IndentedBuffer, pr: PRDef, migratable: boolean): void {
  const open = `<reservations managed='${pr.managed}'`;

  if (pr.path !== undefined && (pr.managed === 'no' || !migratable)) {
    buf.addLine(`${open}>`);
    buf.adjustIndent(2);
    buf.addEscaped("<source type='unix' path='%s' mode='client'/>", pr.path);
    buf.adjustIndent(-2);
    buf.addLine('</reservations>');
  } else {
    buf.addLine(`${open}/>`);
  }
}

export function isPRDefEqual(
  a: Readonly<PRDef> | undefined,
  b: Readonly<PRDef> | undefined
): boolean {
  if (!a && !b) return true;
  if (!a || !b) return false;
  return a.managed === b.managed && a.path === b.path;
}

export function isPRDefManaged(pr: Readonly<PRDef> | undefined): boolean {
  return pr?.managed === 'yes';
}
