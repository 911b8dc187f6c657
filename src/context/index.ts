/**
 * Reconciliation context module
 */

export { EntityStore } from './store.js';
export { ReconciliationContext, type ContextOptions, type Resolved } from './context.js';
export {
  deviceFromRemote,
  interfaceFromRemote,
  interfaceAttrsFromRemote,
  ipAddressFromRemote,
  prefixFromRemote,
  vlanFromRemote,
  cableEndpoints,
} from './mapping.js';
export { KeyedLock } from './locks.js';
