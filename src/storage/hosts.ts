/**
 * Network hosts and per-protocol default ports.
 */

import type { NetProtocol } from './enums.js';
import type { NetHost, StorageSource } from './types.js';

export function copyNetHosts(hosts: readonly Readonly<NetHost>[]): NetHost[] {
  return hosts.map((host) => ({
    transport: host.transport,
    name: host.name,
    port: host.port,
    socket: host.socket,
  }));
}

/**
 * Well-known port of a network protocol; 0 when the protocol has none
 * (rbd and nfs pick their own).
 */
export function networkDefaultPort(protocol: NetProtocol): number {
  switch (protocol) {
    case 'http':
      return 80;
    case 'https':
      return 443;
    case 'ftp':
      return 21;
    case 'ftps':
      return 990;
    case 'tftp':
      return 69;
    case 'sheepdog':
      return 7000;
    case 'nbd':
      return 10809;
    case 'ssh':
      return 22;
    case 'iscsi':
      return 3260;
    case 'gluster':
      return 24007;
    case 'vxhs':
      return 9999;
    case 'rbd':
    case 'nfs':
    case 'none':
      return 0;
  }
}

/**
 * Fill in the protocol's default port on every TCP host that has none.
 *
 * @returns Number of hosts that were changed
 */
export function assignDefaultPorts(src: StorageSource): number {
  let assigned = 0;
  for (const host of src.hosts) {
    if (host.transport === 'tcp' && host.port === 0) {
      host.port = networkDefaultPort(src.protocol);
      assigned++;
    }
  }
  return assigned;
}
