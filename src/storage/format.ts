/**
 * Markup output for a storage source and its backing chain.
 */

import { escapeMarkup, type IndentedBuffer } from '../document/buffer.js';
import { formatAuthDef } from './auth.js';
import { formatPCIAddress } from './nvme.js';
import { isBacking } from './predicates.js';
import { formatPRDef } from './reservation.js';
import type { Initiator, SharedStorageSource } from './types.js';

export function formatInitiator(buf: IndentedBuffer, initiator: Readonly<Initiator>): void {
  if (initiator.iqn === undefined) return;

  buf.addLine('<initiator>');
  buf.adjustIndent(2);
  buf.addEscaped("<iqn name='%s'/>", initiator.iqn);
  buf.adjustIndent(-2);
  buf.addLine('</initiator>');
}

/**
 * Emit the backing path exactly as the parent image recorded it.
 */
export function formatRelPath(buf: IndentedBuffer, src: SharedStorageSource): void {
  buf.addEscaped('<relPath>%s</relPath>', src.relPath);
}

/**
 * Attribute naming where the data lives, by storage type.
 */
function locationAttribute(src: SharedStorageSource): string | undefined {
  switch (src.type) {
    case 'file':
      return 'file';
    case 'block':
      return 'dev';
    case 'dir':
      return 'dir';
    case 'network':
      return 'name';
    case 'volume':
    case 'nvme':
    case 'none':
      return undefined;
  }
}

function formatSourceBody(
  buf: IndentedBuffer,
  src: SharedStorageSource,
  migratable: boolean
): void {
  const attribute = locationAttribute(src);
  let open = '<source';
  if (src.type === 'network') open += ` protocol='${src.protocol}'`;
  if (attribute !== undefined && src.path !== undefined) {
    open += ` ${attribute}='${escapeMarkup(src.path)}'`;
  }
  if (src.type === 'volume' && src.srcpool) {
    if (src.srcpool.pool !== undefined) open += ` pool='${escapeMarkup(src.srcpool.pool)}'`;
    if (src.srcpool.volume !== undefined) open += ` volume='${escapeMarkup(src.srcpool.volume)}'`;
    if (src.srcpool.mode !== 'default') open += ` mode='${src.srcpool.mode}'`;
  }

  const hasChildren =
    src.hosts.length > 0 ||
    src.auth !== undefined ||
    src.pr !== undefined ||
    src.initiator.iqn !== undefined ||
    src.nvme !== undefined;

  buf.addLine(`${open}${hasChildren ? '>' : '/>'}`);
  if (!hasChildren) return;

  buf.adjustIndent(2);
  for (const host of src.hosts) {
    if (host.transport === 'unix') {
      buf.addEscaped("<host transport='unix' socket='%s'/>", host.socket);
    } else {
      const transport = host.transport === 'tcp' ? '' : ` transport='${host.transport}'`;
      const port = host.port === 0 ? '' : ` port='${host.port}'`;
      buf.addEscaped(`<host${transport} name='%s'${port}/>`, host.name ?? '');
    }
  }
  if (src.nvme) {
    buf.addLine(
      `<address type='pci' addr='${formatPCIAddress(src.nvme.pciAddress)}' namespace='${src.nvme.namespace}'/>`
    );
  }
  if (src.auth) formatAuthDef(buf, src.auth);
  if (src.pr) formatPRDef(buf, src.pr, migratable);
  formatInitiator(buf, src.initiator);
  buf.adjustIndent(-2);
  buf.addLine('</source>');
}

/**
 * Emit `src` followed by its chain as nested `<backingStore>` elements.
 * The chain ends with an empty `<backingStore/>` once a node without a
 * backing image is reached.
 */
export function formatStorageSource(
  buf: IndentedBuffer,
  src: SharedStorageSource,
  migratable: boolean = false
): void {
  buf.addLine(`<format type='${src.format}'/>`);
  formatSourceBody(buf, src, migratable);
  formatRelPath(buf, src);

  const backing = src.backingStore;
  if (!isBacking(backing)) {
    buf.addLine('<backingStore/>');
    return;
  }

  buf.addLine(`<backingStore type='${backing.type}' index='${backing.id}'>`);
  buf.adjustIndent(2);
  formatStorageSource(buf, backing, migratable);
  buf.adjustIndent(-2);
  buf.addLine('</backingStore>');
}
