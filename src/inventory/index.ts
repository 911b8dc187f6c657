export { loadInventory, parseInventory } from './loader.js';
export { InventoryError } from './errors.js';
export type { InventoryIssueCode, ValidationIssue, ValidationSeverity } from './errors.js';
export { SUPPORTED_API_VERSION } from './types.js';
export type { InventorySnapshot, InventoryLoadOptions } from './types.js';
