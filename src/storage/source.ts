/**
 * Storage Source Lifecycle
 *
 * Creation, deep copy, clearing and chain-element setup for StorageSource
 * nodes. A node reachable from more than one place is handed out as a
 * frozen SharedStorageSource; anything that needs to change it works on a
 * private copy.
 */

import { SystemError } from '../core/errors.js';
import { copyAuthDef, copySecretLookup } from './auth.js';
import { copyCookies } from './cookies.js';
import { copyNetHosts } from './hosts.js';
import { copyNVMeDef } from './nvme.js';
import { isBacking } from './predicates.js';
import { copyPRDef, isPRDefManaged } from './reservation.js';
import type {
  DeepReadonly,
  EncryptionDef,
  Perms,
  PoolDef,
  SecurityLabel,
  SharedStorageSource,
  Slice,
  StorageSource,
  Timestamps,
} from './types.js';

/**
 * Create an empty node.
 *
 * Every field is listed so that clearStorageSource() can reset a node by
 * assigning this value over it.
 */
export function createStorageSource(): StorageSource {
  return {
    id: 0,
    type: 'none',
    protocol: 'none',
    format: 'none',
    capacity: 0,
    allocation: 0,
    hasAllocation: false,
    physical: 0,
    path: undefined,
    volume: undefined,
    relPath: undefined,
    snapshot: undefined,
    configFile: undefined,
    query: undefined,
    backingStoreRaw: undefined,
    backingStoreRawFormat: 'none',
    backingStore: undefined,
    hosts: [],
    auth: undefined,
    encryption: undefined,
    perms: undefined,
    timestamps: undefined,
    seclabels: [],
    pr: undefined,
    nvme: undefined,
    cookies: [],
    slice: undefined,
    initiator: {},
    srcpool: undefined,
    features: undefined,
    readonly: false,
    shared: false,
    detected: false,
    haveTLS: 'absent',
    tlsFromConfig: false,
    sslVerify: 'absent',
    readahead: 0,
    timeout: 0,
    metadataCacheMaxSize: 0,
    compat: undefined,
    nodeFormat: undefined,
    nodeStorage: undefined,
    tlsAlias: undefined,
    tlsCertdir: undefined,
    sshUser: undefined,
    sshHostKeyCheckDisabled: false,
    nfsUser: undefined,
    nfsGroup: undefined,
    nfsUid: 0,
    nfsGid: 0,
  };
}

// =============================================================================
// Sub-structure copies
// =============================================================================

function copySecurityLabels(labels: readonly Readonly<SecurityLabel>[]): SecurityLabel[] {
  return labels.map((label) => ({
    model: label.model,
    label: label.label,
    labelskip: label.labelskip,
    norelabel: label.norelabel,
  }));
}

function copyPerms(src: Readonly<Perms>): Perms {
  return { mode: src.mode, uid: src.uid, gid: src.gid, label: src.label };
}

function copyTimestamps(src: DeepReadonly<Timestamps>): Timestamps {
  return {
    atime: { ...src.atime },
    btime: { ...src.btime },
    ctime: { ...src.ctime },
    mtime: { ...src.mtime },
  };
}

function copySlice(src: Readonly<Slice>): Slice {
  return { offset: src.offset, size: src.size, nodeName: src.nodeName };
}

function copyPoolDef(src: Readonly<PoolDef>): PoolDef {
  return {
    pool: src.pool,
    volume: src.volume,
    volType: src.volType,
    poolType: src.poolType,
    actualType: src.actualType,
    mode: src.mode,
  };
}

function copyEncryption(src: DeepReadonly<EncryptionDef>): EncryptionDef {
  return {
    format: src.format,
    secrets: src.secrets.map((secret) => ({
      type: secret.type,
      lookup: copySecretLookup(secret.lookup),
    })),
  };
}

// =============================================================================
// Copy
// =============================================================================

function copyNode(
  src: SharedStorageSource,
  backingChain: boolean,
  visited: Set<SharedStorageSource>
): StorageSource {
  if (visited.has(src)) {
    throw new SystemError(
      'backing chain refers back to one of its own elements',
      'CHAIN_LOOP',
      undefined,
      src.path
    );
  }
  visited.add(src);

  const def = createStorageSource();

  def.id = src.id;
  def.type = src.type;
  def.protocol = src.protocol;
  def.format = src.format;
  def.capacity = src.capacity;
  def.allocation = src.allocation;
  def.hasAllocation = src.hasAllocation;
  def.physical = src.physical;
  def.readonly = src.readonly;
  def.shared = src.shared;
  def.detected = src.detected;
  def.haveTLS = src.haveTLS;
  def.tlsFromConfig = src.tlsFromConfig;
  def.sslVerify = src.sslVerify;
  def.readahead = src.readahead;
  def.timeout = src.timeout;
  def.metadataCacheMaxSize = src.metadataCacheMaxSize;

  def.path = src.path;
  def.volume = src.volume;
  def.relPath = src.relPath;
  def.backingStoreRaw = src.backingStoreRaw;
  def.backingStoreRawFormat = src.backingStoreRawFormat;
  def.snapshot = src.snapshot;
  def.configFile = src.configFile;
  def.query = src.query;
  def.compat = src.compat;
  def.nodeFormat = src.nodeFormat;
  def.nodeStorage = src.nodeStorage;
  def.tlsAlias = src.tlsAlias;
  def.tlsCertdir = src.tlsCertdir;

  if (src.slice) def.slice = copySlice(src.slice);
  def.hosts = copyNetHosts(src.hosts);
  def.cookies = copyCookies(src.cookies);
  if (src.srcpool) def.srcpool = copyPoolDef(src.srcpool);
  if (src.features) def.features = new Set(src.features);
  if (src.encryption) def.encryption = copyEncryption(src.encryption);
  if (src.perms) def.perms = copyPerms(src.perms);
  if (src.timestamps) def.timestamps = copyTimestamps(src.timestamps);
  def.seclabels = copySecurityLabels(src.seclabels);
  if (src.auth) def.auth = copyAuthDef(src.auth);
  if (src.pr) def.pr = copyPRDef(src.pr);
  if (src.nvme) def.nvme = copyNVMeDef(src.nvme);
  def.initiator = { ...src.initiator };

  if (backingChain && src.backingStore) {
    def.backingStore = copyNode(src.backingStore, true, visited);
  }

  // ssh config passthrough for libguestfs
  def.sshHostKeyCheckDisabled = src.sshHostKeyCheckDisabled;
  def.sshUser = src.sshUser;

  def.nfsUser = src.nfsUser;
  def.nfsGroup = src.nfsGroup;
  def.nfsUid = src.nfsUid;
  def.nfsGid = src.nfsGid;

  return def;
}

/**
 * Deep-copy a node, and with `backingChain` its whole chain.
 *
 * The result shares nothing with `src`. Without `backingChain` the copy has
 * no backing store.
 *
 * @throws SystemError (CHAIN_LOOP) when the chain below `src` loops; no
 *         partial copy is returned
 */
export function copyStorageSource(
  src: SharedStorageSource,
  backingChain: boolean
): StorageSource {
  return copyNode(src, backingChain, new Set());
}

function freezeNode(node: StorageSource): void {
  for (const host of node.hosts) Object.freeze(host);
  for (const cookie of node.cookies) Object.freeze(cookie);
  for (const label of node.seclabels) Object.freeze(label);
  Object.freeze(node.hosts);
  Object.freeze(node.cookies);
  Object.freeze(node.seclabels);
  Object.freeze(node.initiator);

  if (node.auth) {
    Object.freeze(node.auth.secret);
    Object.freeze(node.auth);
  }
  if (node.encryption) {
    for (const secret of node.encryption.secrets) {
      Object.freeze(secret.lookup);
      Object.freeze(secret);
    }
    Object.freeze(node.encryption.secrets);
    Object.freeze(node.encryption);
  }
  if (node.timestamps) {
    Object.freeze(node.timestamps.atime);
    Object.freeze(node.timestamps.btime);
    Object.freeze(node.timestamps.ctime);
    Object.freeze(node.timestamps.mtime);
    Object.freeze(node.timestamps);
  }
  if (node.nvme) {
    Object.freeze(node.nvme.pciAddress);
    Object.freeze(node.nvme);
  }
  if (node.perms) Object.freeze(node.perms);
  if (node.pr) Object.freeze(node.pr);
  if (node.slice) Object.freeze(node.slice);
  if (node.srcpool) Object.freeze(node.srcpool);
  if (node.backingStore) freezeNode(node.backingStore);

  Object.freeze(node);
}

/**
 * Produce an immutable handle that may be referenced from several
 * configuration snapshots at once.
 *
 * The handle is a frozen deep copy of the whole chain; later changes to
 * `src` do not show through it.
 */
export function shareStorageSource(src: SharedStorageSource): SharedStorageSource {
  const copy = copyStorageSource(src, true);
  freezeNode(copy);
  return copy;
}

// =============================================================================
// Clear
// =============================================================================

/**
 * Drop everything describing the backing store of `src`: the relative
 * path, the raw backing string and the chain below it.
 */
export function clearBackingStore(src: StorageSource | undefined): void {
  if (!src) return;

  src.relPath = undefined;
  src.backingStoreRaw = undefined;

  // detach before recursing so a looped chain still terminates
  const backing = src.backingStore;
  src.backingStore = undefined;
  clearStorageSource(backing);
}

/**
 * Release every sub-object of `src`, the backing chain included, and
 * return the node to the state createStorageSource() gives. Calling it
 * again is a no-op.
 */
export function clearStorageSource(src: StorageSource | undefined): void {
  if (!src) return;

  clearBackingStore(src);
  Object.assign(src, createStorageSource());
}

// =============================================================================
// Chain helpers
// =============================================================================

/**
 * Prepare a backing chain element that was discovered (e.g. by probing an
 * image's header) rather than configured.
 *
 * With `transferLabels`, security labels of `old` are copied over unless
 * `newElem` already has some; otherwise the default image label applies.
 * The shared and readonly flags always follow `old`.
 */
export function initChainElement(
  newElem: StorageSource,
  old: SharedStorageSource,
  transferLabels: boolean
): void {
  if (transferLabels && newElem.seclabels.length === 0) {
    newElem.seclabels = copySecurityLabels(old.seclabels);
  }

  newElem.shared = old.shared;
  newElem.readonly = old.readonly;
}

/**
 * Walk the chain from `src` down, stopping at the first `none` node.
 */
export function* iterateChain(
  src: SharedStorageSource | undefined
): Generator<SharedStorageSource> {
  let node = src;
  while (isBacking(node)) {
    yield node;
    node = node.backingStore;
  }
}

/**
 * Chain element at `index` hops below `src`, if there is one.
 */
export function getChainElement(
  src: SharedStorageSource | undefined,
  index: number
): SharedStorageSource | undefined {
  let hops = 0;
  for (const node of iterateChain(src)) {
    if (hops === index) return node;
    hops++;
  }
  return undefined;
}

export function getSecurityLabel(
  src: SharedStorageSource,
  model: string
): Readonly<SecurityLabel> | undefined {
  return src.seclabels.find((label) => label.model === model);
}

/**
 * Whether any element of the chain uses a managed reservation helper.
 */
export function chainHasManagedPR(src: SharedStorageSource | undefined): boolean {
  for (const node of iterateChain(src)) {
    if (isPRDefManaged(node.pr)) return true;
  }
  return false;
}

export function chainHasNVMe(src: SharedStorageSource | undefined): boolean {
  for (const node of iterateChain(src)) {
    if (node.type === 'nvme') return true;
  }
  return false;
}
