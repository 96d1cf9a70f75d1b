/**
 * Storage Source Types
 *
 * The in-memory model of one disk's storage source and its backing chain.
 * Every sub-structure hanging off a StorageSource is owned by that node;
 * copies never share sub-objects with their original.
 */

import type {
  AuthType,
  NetHostTransport,
  NetProtocol,
  PoolMode,
  StorageFileFeature,
  StorageFileFormat,
  StorageType,
  TristateBool,
} from './enums.js';

// =============================================================================
// Owned sub-structures
// =============================================================================

/**
 * Network host of a `network` source
 */
export interface NetHost {
  transport: NetHostTransport;
  /** Host name or address (tcp, rdma) */
  name?: string;
  /** 0 means "not given"; see assignDefaultPorts() */
  port: number;
  /** Socket path (unix) */
  socket?: string;
}

/**
 * Reference to a secret, either by UUID or by usage string
 */
export type SecretLookup =
  | { type: 'none' }
  | { type: 'uuid'; uuid: string }
  | { type: 'usage'; usage: string };

export interface AuthDef {
  username: string;
  /** Expected secret usage for the disk style, e.g. "iscsi" or "ceph" */
  secretType?: string;
  authType: AuthType;
  secret: SecretLookup;
}

/**
 * Persistent reservation settings
 */
export interface PRDef {
  managed: TristateBool;
  /** Connection socket path; mode is always "client" */
  path?: string;
  /** Alias of the managing helper, filled in at runtime */
  managerAlias?: string;
}

export interface PCIAddress {
  domain: number;
  bus: number;
  slot: number;
  function: number;
}

export interface NVMeDef {
  namespace: number;
  managed: TristateBool;
  pciAddress: PCIAddress;
}

export interface NetCookie {
  name: string;
  value: string;
}

export interface SecurityLabel {
  /** Security driver model, e.g. "selinux" or "dac" */
  model?: string;
  label?: string;
  labelskip: boolean;
  norelabel: boolean;
}

export interface Perms {
  mode: number;
  uid: number;
  gid: number;
  label?: string;
}

export interface Timestamp {
  sec: number;
  nsec: number;
}

export interface Timestamps {
  atime: Timestamp;
  btime: Timestamp;
  ctime: Timestamp;
  mtime: Timestamp;
}

/**
 * Byte range of the image actually exposed to the guest
 */
export interface Slice {
  offset: number;
  size: number;
  nodeName?: string;
}

/**
 * Storage pool volume reference of a `volume` source
 */
export interface PoolDef {
  pool?: string;
  volume?: string;
  volType: number;
  poolType: number;
  /** Concrete type once the volume has been translated; `none` until then */
  actualType: StorageType;
  mode: PoolMode;
}

export interface EncryptionSecret {
  /** Secret purpose, e.g. "passphrase" */
  type: string;
  lookup: SecretLookup;
}

export interface EncryptionDef {
  format: 'default' | 'qcow' | 'luks';
  secrets: EncryptionSecret[];
}

export interface Initiator {
  iqn?: string;
}

// =============================================================================
// StorageSource
// =============================================================================

/**
 * One node of a disk's backing chain.
 *
 * Optional fields left undefined are the zero state. `backingStore` is an
 * exclusive owning link: a chain is singly linked and never shares nodes.
 */
export interface StorageSource {
  id: number;
  type: StorageType;
  protocol: NetProtocol;
  format: StorageFileFormat;

  capacity: number;
  allocation: number;
  hasAllocation: boolean;
  physical: number;

  path?: string;
  volume?: string;
  relPath?: string;
  snapshot?: string;
  configFile?: string;
  query?: string;

  backingStoreRaw?: string;
  backingStoreRawFormat: StorageFileFormat;
  backingStore?: StorageSource;

  hosts: NetHost[];
  auth?: AuthDef;
  encryption?: EncryptionDef;
  perms?: Perms;
  timestamps?: Timestamps;
  seclabels: SecurityLabel[];
  pr?: PRDef;
  nvme?: NVMeDef;
  cookies: NetCookie[];
  slice?: Slice;
  initiator: Initiator;
  srcpool?: PoolDef;
  features?: Set<StorageFileFeature>;

  readonly: boolean;
  shared: boolean;
  detected: boolean;
  haveTLS: TristateBool;
  tlsFromConfig: boolean;
  sslVerify: TristateBool;
  readahead: number;
  timeout: number;
  metadataCacheMaxSize: number;

  compat?: string;
  nodeFormat?: string;
  nodeStorage?: string;
  tlsAlias?: string;
  tlsCertdir?: string;

  sshUser?: string;
  sshHostKeyCheckDisabled: boolean;
  nfsUser?: string;
  nfsGroup?: string;
  nfsUid: number;
  nfsGid: number;
}

/**
 * Recursively read-only view of a value.
 */
export type DeepReadonly<T> = T extends Set<infer U>
  ? ReadonlySet<DeepReadonly<U>>
  : T extends ReadonlyArray<infer U>
    ? ReadonlyArray<DeepReadonly<U>>
    : T extends object
      ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
      : T;

/**
 * Handle to a node that may be referenced from several places at once.
 *
 * It has no mutating surface; obtain a private node with
 * copyStorageSource() before changing anything.
 */
export type SharedStorageSource = DeepReadonly<StorageSource>;
