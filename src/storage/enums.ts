/**
 * String tables for the storage source enumerations.
 *
 * Each table is the single source of both the union type and the
 * string parser used when reading configuration.
 */

export const STORAGE_TYPES = [
  'none',
  'file',
  'block',
  'dir',
  'network',
  'volume',
  'nvme',
] as const;

export type StorageType = (typeof STORAGE_TYPES)[number];

export const STORAGE_FILE_FORMATS = [
  'none',
  'raw',
  'dir',
  'bochs',
  'cloop',
  'dmg',
  'iso',
  'vpc',
  'vdi',
  // Not direct file formats, but used for various drivers
  'fat',
  'vhd',
  'ploop',
  // Formats with backing file below here
  'cow',
  'qcow',
  'qcow2',
  'qed',
  'vmdk',
] as const;

export type StorageFileFormat = (typeof STORAGE_FILE_FORMATS)[number];

export const STORAGE_FILE_FEATURES = ['lazy_refcounts'] as const;

export type StorageFileFeature = (typeof STORAGE_FILE_FEATURES)[number];

export const NET_PROTOCOLS = [
  'none',
  'nbd',
  'rbd',
  'sheepdog',
  'gluster',
  'iscsi',
  'http',
  'https',
  'ftp',
  'ftps',
  'tftp',
  'ssh',
  'vxhs',
  'nfs',
] as const;

export type NetProtocol = (typeof NET_PROTOCOLS)[number];

export const NET_HOST_TRANSPORTS = ['tcp', 'unix', 'rdma'] as const;

export type NetHostTransport = (typeof NET_HOST_TRANSPORTS)[number];

export const POOL_MODES = ['default', 'host', 'direct'] as const;

export type PoolMode = (typeof POOL_MODES)[number];

export const AUTH_TYPES = ['none', 'chap', 'ceph'] as const;

export type AuthType = (typeof AUTH_TYPES)[number];

export const TRISTATE_BOOLS = ['absent', 'yes', 'no'] as const;

/**
 * Three-valued flag where `absent` is distinct from an explicit `no`
 */
export type TristateBool = (typeof TRISTATE_BOOLS)[number];

/**
 * Look up a string in one of the tables above.
 *
 * @returns The matching member, or undefined when the string is not listed
 */
export function enumFromString<T extends string>(
  table: readonly T[],
  value: string | undefined
): T | undefined {
  if (value === undefined) return undefined;
  return table.find((member) => member === value);
}

/**
 * Whether a backing image format can itself reference a backing file.
 */
export function formatHasBacking(format: StorageFileFormat): boolean {
  return STORAGE_FILE_FORMATS.indexOf(format) >= STORAGE_FILE_FORMATS.indexOf('cow');
}
