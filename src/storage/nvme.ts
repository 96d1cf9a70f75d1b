/**
 * NVMe namespace sources.
 */

import type { NVMeDef, PCIAddress } from './types.js';

export function copyNVMeDef(src: Readonly<NVMeDef>): NVMeDef {
  return {
    namespace: src.namespace,
    managed: src.managed,
    pciAddress: { ...src.pciAddress },
  };
}

export function isPCIAddressEqual(a: Readonly<PCIAddress>, b: Readonly<PCIAddress>): boolean {
  return (
    a.domain === b.domain &&
    a.bus === b.bus &&
    a.slot === b.slot &&
    a.function === b.function
  );
}

export function isNVMeDefEqual(
  a: Readonly<NVMeDef> | undefined,
  b: Readonly<NVMeDef> | undefined
): boolean {
  if (!a && !b) return true;
  if (!a || !b) return false;

  return (
    a.namespace === b.namespace &&
    a.managed === b.managed &&
    isPCIAddressEqual(a.pciAddress, b.pciAddress)
  );
}

/**
 * Format a PCI address the usual way, e.g. `0000:01:00.0`.
 */
export function formatPCIAddress(addr: Readonly<PCIAddress>): string {
  const hex = (value: number, width: number) => value.toString(16).padStart(width, '0');
  return `${hex(addr.domain, 4)}:${hex(addr.bus, 2)}:${hex(addr.slot, 2)}.${addr.function.toString(16)}`;
}
