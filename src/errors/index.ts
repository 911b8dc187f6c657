/**
 * Error types raised by the reconciler
 *
 * Expected business-rule conflicts (VLAN id collision, endpoint already
 * cabled, protected management address) are NOT errors: they come back
 * as `skipped` outcomes. What is thrown here means either the caller
 * ordered operations wrongly or the run's inputs are invalid.
 */

import type { EntityKind } from '../models/types.js';

/**
 * A referenced entity is missing from the context, or exists but has no
 * remote identifier yet. Indicates intents were applied out of
 * dependency order.
 */
export class DependencyError extends Error {
  constructor(
    message: string,
    public readonly dependency: { kind: EntityKind; uid: string }
  ) {
    super(message);
    this.name = 'DependencyError';
  }
}

/**
 * A second entity with an identity already registered in the context
 */
export class DuplicateEntityError extends Error {
  constructor(
    public readonly kind: EntityKind,
    public readonly uid: string
  ) {
    super(`Duplicate ${kind} "${uid}" in reconciliation context`);
    this.name = 'DuplicateEntityError';
  }
}
