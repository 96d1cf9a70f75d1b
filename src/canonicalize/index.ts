/**
 * Canonicalization Module
 */

export * from './canonicalize.js';
export * from './links.js';
