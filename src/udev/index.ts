/**
 * udev Helper Module
 *
 * Exports the helper executor and the device key lookups.
 */

export * from './executor.js';
export * from './keys.js';
export * from './verbose.js';
