/**
 * Shared types for the apply operations
 */

/**
 * Why an operation did not reach the remote system. None of these is
 * an error: the run continues, and intents that depend on the skipped
 * one are not attempted.
 */
export type SkipReason =
  /** NetBox rejected the VLAN (usually the vid is taken in that site) */
  | 'vlan-conflict'
  /** NetBox rejected the cable */
  | 'cable-conflict'
  /** One cable endpoint already reports something connected */
  | 'already-connected'
  /** A cable endpoint is neither in the context nor in NetBox */
  | 'endpoint-unresolved'
  /** Interface carries the device's management address */
  | 'protected-management-interface'
  /** Address is the device's management address */
  | 'protected-management-ip'
  /** The context already holds a created entity with this identity */
  | 'already-exists';

/**
 * Result of one create/update/delete
 */
export type ApplyOutcome<T> =
  | { status: 'applied'; entity: T }
  | { status: 'unchanged'; entity: T }
  | { status: 'skipped'; reason: SkipReason; message: string; entity?: T };

export function applied<T>(entity: T): ApplyOutcome<T> {
  return { status: 'applied', entity };
}

export function unchanged<T>(entity: T): ApplyOutcome<T> {
  return { status: 'unchanged', entity };
}

export function skipped<T>(reason: SkipReason, message: string, entity?: T): ApplyOutcome<T> {
  return entity === undefined
    ? { status: 'skipped', reason, message }
    : { status: 'skipped', reason, message, entity };
}

/**
 * Marker NetBox uses for an interface-to-interface cable termination
 */
export const INTERFACE_TERMINATION = 'dcim.interface';
