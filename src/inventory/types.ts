/**
 * Desired inventory types
 */

import type { EntityStore } from '../context/store.js';
import type { ValidationIssue } from './errors.js';

/** Current supported API version for inventory files */
export const SUPPORTED_API_VERSION = 'netbox-sync/v1';

/**
 * Desired state read from an inventory file. Nothing in it is
 * materialized: it describes what NetBox should hold, not what it holds.
 */
export interface InventorySnapshot {
  /** File the snapshot was read from */
  source: string;
  /** Entities by kind and identity */
  store: EntityStore;
  /** Non-fatal issues found while loading */
  warnings: ValidationIssue[];
}

export interface InventoryLoadOptions {
  /** Directory relative paths resolve against (default: process.cwd()) */
  basePath?: string;
}
