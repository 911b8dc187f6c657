/**
 * netbox-sync library entrypoint
 *
 * The CLI lives in ./cli.ts; this module exposes the building blocks for
 * driving a reconciliation from code.
 */

export * from './api/index.js';
export * from './models/index.js';
export * from './context/index.js';
export * from './config/index.js';
export { DependencyError, DuplicateEntityError } from './errors/index.js';
export * from './inventory/index.js';
export * from './sync/index.js';
export * as reconcilers from './reconcilers/index.js';
export type { ApplyOutcome, SkipReason } from './reconcilers/types.js';
