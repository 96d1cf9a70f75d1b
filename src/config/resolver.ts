/**
 * Configuration Resolver
 *
 * Turns a validated disk description into a StorageSource chain: applies
 * defaults, parses auth and reservation settings, checks cookies and
 * labels, and assigns default ports.
 */

import { resolve } from 'node:path';

import { documentNode } from '../document/node.js';
import { ValidationError } from '../core/errors.js';
import { logger } from '../lib/logger.js';
import { parseAuthDef, parseSecretLookup } from '../storage/auth.js';
import { validateCookies } from '../storage/cookies.js';
import {
  NET_HOST_TRANSPORTS,
  NET_PROTOCOLS,
  POOL_MODES,
  STORAGE_FILE_FORMATS,
  STORAGE_TYPES,
  enumFromString,
  formatHasBacking,
  type TristateBool,
} from '../storage/enums.js';
import { assignDefaultPorts } from '../storage/hosts.js';
import { parsePRDef } from '../storage/reservation.js';
import { createStorageSource } from '../storage/source.js';
import type { NetHost, SecurityLabel, StorageSource } from '../storage/types.js';
import type { DiskConfig, ResolvedDisk, SourceConfig } from './types.js';

function toTristate(value: boolean | undefined): TristateBool {
  if (value === undefined) return 'absent';
  return value ? 'yes' : 'no';
}

function resolveHosts(hosts: SourceConfig['hosts']): NetHost[] {
  return (hosts ?? []).map((host) => ({
    transport: enumFromString(NET_HOST_TRANSPORTS, host.transport) ?? 'tcp',
    name: host.name,
    port: host.port ?? 0,
    socket: host.socket,
  }));
}

function resolveSeclabels(
  seclabels: SourceConfig['seclabels'],
  where: string
): SecurityLabel[] {
  const seen = new Set<string>();
  return (seclabels ?? []).map((entry) => {
    if (seen.has(entry.model)) {
      throw new ValidationError(
        `${where}: duplicate security label for model '${entry.model}'`,
        'DUPLICATE_SECLABEL'
      );
    }
    seen.add(entry.model);

    return {
      model: entry.model,
      label: entry.label,
      labelskip: false,
      norelabel: entry.relabel === false,
    };
  });
}

/**
 * Build one chain element, recursing into `backing_store`.
 *
 * @param where - Location of the element for messages, e.g. "vda[1]"
 */
function resolveSource(
  config: SourceConfig,
  depth: number,
  target: string,
  warnings: string[]
): StorageSource {
  const where = depth === 0 ? target : `${target}[${depth}]`;
  const src = createStorageSource();

  // the schema restricts these to the listed values
  src.type = enumFromString(STORAGE_TYPES, config.type) ?? 'none';
  src.protocol = enumFromString(NET_PROTOCOLS, config.protocol) ?? 'none';
  src.format = enumFromString(STORAGE_FILE_FORMATS, config.format) ?? 'none';
  src.backingStoreRawFormat = enumFromString(STORAGE_FILE_FORMATS, config.backing_format) ?? 'none';

  src.id = config.index ?? depth;
  src.path = config.path;
  src.volume = config.volume;
  src.snapshot = config.snapshot;
  src.query = config.query;
  src.configFile = config.config_file;
  src.relPath = config.rel_path;

  src.capacity = config.capacity ?? 0;
  src.physical = config.physical ?? 0;
  if (config.allocation !== undefined) {
    src.allocation = config.allocation;
    src.hasAllocation = true;
  }

  src.readonly = config.readonly ?? false;
  src.shared = config.shared ?? false;
  src.haveTLS = toTristate(config.tls);
  src.sslVerify = toTristate(config.ssl_verify);
  src.readahead = config.readahead ?? 0;
  src.timeout = config.timeout ?? 0;

  src.hosts = resolveHosts(config.hosts);
  const assigned = assignDefaultPorts(src);
  if (assigned > 0) {
    logger.debug(`${where}: assigned default ${src.protocol} port to ${assigned} host(s)`);
  }

  if (config.auth) {
    src.auth = parseAuthDef(documentNode(config.auth));
  }

  if (config.reservations) {
    src.pr = parsePRDef(documentNode(config.reservations));
  }

  if (config.encryption) {
    src.encryption = {
      format: config.encryption.format ?? 'default',
      secrets: (config.encryption.secrets ?? []).map((secret) => {
        const node = documentNode(secret);
        return {
          type: node.attr('type') ?? 'passphrase',
          lookup: parseSecretLookup(node, 'INVALID_ENCRYPTION'),
        };
      }),
    };
  }

  if (config.nvme) {
    src.nvme = {
      namespace: config.nvme.namespace,
      managed: config.nvme.managed ?? 'absent',
      pciAddress: {
        domain: config.nvme.address.domain ?? 0,
        bus: config.nvme.address.bus,
        slot: config.nvme.address.slot,
        function: config.nvme.address.function,
      },
    };
  }

  src.cookies = (config.cookies ?? []).map((cookie) => ({
    name: cookie.name,
    value: cookie.value,
  }));
  validateCookies(src.cookies);

  if (config.slice) {
    src.slice = { offset: config.slice.offset, size: config.slice.size };
  }

  src.seclabels = resolveSeclabels(config.seclabels, where);

  if (config.perms) {
    src.perms = {
      mode: config.perms.mode ?? 0o600,
      uid: config.perms.owner ?? 0,
      gid: config.perms.group ?? 0,
      label: config.perms.label,
    };
  }

  if (config.initiator) {
    src.initiator = { iqn: config.initiator.iqn };
  }

  if (config.pool) {
    src.srcpool = {
      pool: config.pool.pool,
      volume: config.pool.volume,
      volType: 0,
      poolType: 0,
      actualType: enumFromString(STORAGE_TYPES, config.pool.actual_type) ?? 'none',
      mode: enumFromString(POOL_MODES, config.pool.mode) ?? 'default',
    };
  }

  if (config.backing_store) {
    if (!formatHasBacking(src.format)) {
      warnings.push(
        `${where}: format '${src.format}' does not reference a backing file, but a backing store is given`
      );
    }
    src.backingStore = resolveSource(config.backing_store, depth + 1, target, warnings);
  }

  return src;
}

/**
 * Resolve a validated disk description into its chain.
 *
 * @param config - Validated disk description
 * @param configPath - Path to the YAML file
 * @returns The chain plus any non-fatal warnings
 * @throws ValidationError for bad auth, reservation, cookie or label data
 */
export function resolveConfig(config: DiskConfig, configPath: string): ResolvedDisk {
  const warnings: string[] = [];
  const source = resolveSource(config.source, 0, config.target, warnings);

  return {
    target: config.target,
    source,
    configPath: resolve(configPath),
    warnings,
  };
}
