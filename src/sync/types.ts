/**
 * Sync plan types
 */

import type { AttrsOf, EntityKind, IdsOf } from '../models/types.js';
import type { SkipReason } from '../reconcilers/types.js';

export type IntentAction = 'create' | 'update' | 'delete';

interface IntentOf<K extends EntityKind> {
  /** Unique within a plan: `<action>:<kind>:<uniqueId>` */
  id: string;
  action: IntentAction;
  kind: K;
  ids: IdsOf<K>;
  /** Desired attributes (create) or full candidate attributes (update) */
  attrs: AttrsOf<K>;
  /** Intents that must apply first */
  dependsOn: string[];
  /** Attribute keys that change (update only) */
  changes?: string[];
  /** Human label */
  description: string;
}

/**
 * One entity-level change
 */
export type SyncIntent = { [K in EntityKind]: IntentOf<K> }[EntityKind];

/**
 * A desired site or device NetBox does not have. Neither is created by
 * this tool, so nothing below it is planned.
 */
export interface MissingEntry {
  kind: 'site' | 'device';
  name: string;
  message: string;
}

export interface SyncPlan {
  intents: SyncIntent[];
  missing: MissingEntry[];
}

export interface DiffOptions {
  /**
   * Delete interfaces, IP addresses and cables that NetBox holds for the
   * listed devices but the inventory does not (default: true)
   */
  prune?: boolean;
}

// =============================================================================
// Apply
// =============================================================================

export type RecordStatus = 'applied' | 'unchanged' | 'skipped' | 'failed' | 'planned';

/** Runner-level skip: a dependency did not apply */
export type RecordSkipReason = SkipReason | 'dependency-not-applied';

export interface ApplyRecord {
  intent: SyncIntent;
  status: RecordStatus;
  reason?: RecordSkipReason;
  message?: string;
  /** Set for `failed` */
  error?: Error;
}

export interface ApplySummary {
  created: number;
  updated: number;
  deleted: number;
  unchanged: number;
  skipped: number;
  failed: number;
  planned: number;
}

export interface ApplyOptions {
  /** Record every intent as planned without calling NetBox */
  dryRun?: boolean;
}

export interface ApplyResult {
  records: ApplyRecord[];
  summary: ApplySummary;
  dryRun: boolean;
}
