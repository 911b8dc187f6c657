export { diffInventories, intentId } from './diff.js';
export { applyPlan, applyIntent, summarize } from './runner.js';
export { loadRemoteInventory, type RemoteLoadResult } from './remote.js';
export type * from './types.js';
