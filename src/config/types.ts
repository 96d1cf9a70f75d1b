/**
 * Configuration Types for disk-source
 *
 * These types describe the YAML disk description and the resolved result
 * ready for inspection.
 */

import type { StorageSource } from '../storage/types.js';

// =============================================================================
// YAML Input Types
// =============================================================================

/**
 * Root object parsed from a disk description file
 */
export interface DiskConfig {
  /** Guest device name, e.g. "vda" */
  target: string;
  /** Top image of the disk */
  source: SourceConfig;
}

/**
 * One storage source; `backing_store` nests the next chain element
 */
export interface SourceConfig {
  type: string;
  /** Chain index; defaults to the depth in the chain */
  index?: number;
  protocol?: string;
  format?: string;
  /** File/device path, or the image name of network storage */
  path?: string;
  volume?: string;
  snapshot?: string;
  query?: string;
  config_file?: string;
  /** Path as written in the parent image's header */
  rel_path?: string;

  capacity?: number;
  allocation?: number;
  physical?: number;

  readonly?: boolean;
  shared?: boolean;
  tls?: boolean;
  ssl_verify?: boolean;
  readahead?: number;
  timeout?: number;

  hosts?: HostConfig[];
  /** Passed to the auth parser as-is */
  auth?: Record<string, unknown>;
  /** Passed to the reservations parser as-is */
  reservations?: Record<string, unknown>;
  encryption?: EncryptionConfig;
  nvme?: NVMeConfig;
  cookies?: Array<{ name: string; value: string }>;
  slice?: { offset: number; size: number };
  seclabels?: SeclabelConfig[];
  perms?: PermsConfig;
  initiator?: { iqn: string };
  pool?: PoolConfig;

  backing_format?: string;
  backing_store?: SourceConfig;
}

export interface HostConfig {
  transport?: string;
  name?: string;
  port?: number;
  socket?: string;
}

export interface EncryptionConfig {
  format?: 'default' | 'qcow' | 'luks';
  secrets?: Array<Record<string, unknown>>;
}

export interface NVMeConfig {
  namespace: number;
  managed?: 'yes' | 'no';
  address: {
    domain?: number;
    bus: number;
    slot: number;
    function: number;
  };
}

export interface SeclabelConfig {
  model: string;
  label?: string;
  /** Default: true */
  relabel?: boolean;
}

export interface PermsConfig {
  mode?: number;
  owner?: number;
  group?: number;
  label?: string;
}

export interface PoolConfig {
  pool: string;
  volume: string;
  mode?: string;
  /** Set once the volume has been translated to concrete storage */
  actual_type?: string;
}

// =============================================================================
// Resolved Types
// =============================================================================

/**
 * Disk description with its chain built and validated
 */
export interface ResolvedDisk {
  target: string;
  /** Top of the backing chain */
  source: StorageSource;
  /** Absolute path to the YAML file */
  configPath: string;
  /** Non-fatal findings, e.g. a backing store under a format without one */
  warnings: string[];
}
