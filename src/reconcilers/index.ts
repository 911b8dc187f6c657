/**
 * Reconcilers module - apply operations per NetBox object type
 *
 * Each operation takes the reconciliation context, resolves what it
 * depends on through it, calls NetBox and writes the outcome back.
 *
 * @module reconcilers
 */

export * as interfaces from './interfaces/index.js';
export * as ipAddresses from './ip-addresses/index.js';
export * as prefixes from './prefixes/index.js';
export * as vlans from './vlans/index.js';
export * as cables from './cables/index.js';
export * from './types.js';
