/**
 * Classification Predicates
 *
 * Pure questions about a storage source: what kind of storage it really
 * is, whether it is empty, local or relative, and whether two sources
 * address the same location.
 */

import type { StorageType } from './enums.js';
import { isNVMeDefEqual } from './nvme.js';
import type { SharedStorageSource } from './types.js';

/**
 * Type of the source after pool indirection.
 *
 * A `volume` source reports the type of the underlying storage once the
 * pool volume has been translated; until then it stays `volume`.
 */
export function getActualType(src: SharedStorageSource): StorageType {
  if (src.type === 'volume' && src.srcpool && src.srcpool.actualType !== 'none') {
    return src.srcpool.actualType;
  }
  return src.type;
}

/**
 * Whether the source is accessed through `path` on the host.
 *
 * NVMe disks are local but not reachable through a path, so they are not
 * counted here.
 */
export function isLocalStorage(src: SharedStorageSource): boolean {
  switch (getActualType(src)) {
    case 'file':
    case 'block':
    case 'dir':
      return true;
    case 'network':
    case 'volume':
    case 'nvme':
    case 'none':
      return false;
  }
}

/**
 * Whether the source is a locally accessible block device (including
 * host-mapped iSCSI volumes).
 */
export function isBlockLocal(src: SharedStorageSource): boolean {
  return getActualType(src) === 'block';
}

/**
 * Whether the guest disk has no host storage behind it (e.g. an empty
 * cdrom drive).
 */
export function isEmpty(src: SharedStorageSource): boolean {
  if (isLocalStorage(src) && src.path === undefined) return true;
  if (src.type === 'none') return true;
  if (src.type === 'network' && src.protocol === 'none') return true;
  return false;
}

/**
 * Whether a local source's path is relative. Always false for storage
 * addressed any other way.
 */
export function isRelative(src: SharedStorageSource): boolean {
  if (src.path === undefined) return false;

  switch (getActualType(src)) {
    case 'file':
    case 'block':
    case 'dir':
      return !src.path.startsWith('/');
    case 'network':
    case 'volume':
    case 'nvme':
    case 'none':
      return false;
  }
}

/**
 * Whether two sources point at the same storage. Only addressing fields
 * are compared; encryption, permissions and the like are ignored.
 */
export function isSameLocation(a: SharedStorageSource, b: SharedStorageSource): boolean {
  // there are several ways to spell an empty source
  if (isEmpty(a) && isEmpty(b)) return true;

  if (getActualType(a) !== getActualType(b)) return false;

  if (a.path !== b.path || a.volume !== b.volume || a.snapshot !== b.snapshot) {
    return false;
  }

  if (a.type === 'network') {
    if (a.protocol !== b.protocol || a.hosts.length !== b.hosts.length) return false;

    for (let i = 0; i < a.hosts.length; i++) {
      const ha = a.hosts[i];
      const hb = b.hosts[i];
      if (!ha || !hb) return false;
      if (
        ha.transport !== hb.transport ||
        ha.port !== hb.port ||
        ha.name !== hb.name ||
        ha.socket !== hb.socket
      ) {
        return false;
      }
    }
  }

  if (a.type === 'nvme' && !isNVMeDefEqual(a.nvme, b.nvme)) return false;

  return true;
}

/**
 * Whether the node is an eligible chain element. Chain walks stop at the
 * first node for which this is false.
 */
export function isBacking(
  src: SharedStorageSource | undefined
): src is SharedStorageSource {
  return src !== undefined && src.type !== 'none';
}

/**
 * Whether the node has a real backing image directly below it. Only the
 * immediate link is checked.
 */
export function hasBacking(src: SharedStorageSource | undefined): boolean {
  return isBacking(src) && src.backingStore !== undefined && src.backingStore.type !== 'none';
}

/**
 * Whether a raw backing string names a file rather than a protocol URI.
 *
 * Anything with a colon before the first slash (`nbd:`, `rbd:`) is taken
 * as a protocol; a relative file name containing ':' can be written as
 * `./name`.
 */
export function isFileBackingString(backing: string | undefined): boolean {
  if (backing === undefined) return false;

  const colon = backing.indexOf(':');
  const slash = backing.indexOf('/');
  if (colon !== -1 && (slash === -1 || colon < slash)) return false;
  return true;
}

export function isRelativeBackingString(backing: string): boolean {
  if (backing.startsWith('/')) return false;
  return isFileBackingString(backing);
}
