/**
 * Storage Source Module
 *
 * Exports the storage source model, its lifecycle and its helpers.
 */

export * from './types.js';
export * from './enums.js';
export * from './source.js';
export * from './predicates.js';
export * from './backing-string.js';
export * from './cookies.js';
export * from './auth.js';
export * from './reservation.js';
export * from './nvme.js';
export * from './hosts.js';
export * from './format.js';
