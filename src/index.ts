/**
 * disk-source
 *
 * Storage source model for virtual machine disks: backing chains, path
 * canonicalization, backing store names and device keys.
 */

export * from './storage/index.js';
export * from './canonicalize/index.js';
export * from './udev/index.js';
export * from './config/index.js';
export * from './core/errors.js';
export { IndentedBuffer, escapeMarkup } from './document/buffer.js';
export { documentNode, type DocumentNode } from './document/node.js';
export { Logger, logger, setLogger, configureLogger } from './lib/logger.js';
