/**
 * Interface reconciliation
 */

export { translateInterfaceAttrs, resolveVlanRemoteId } from './translate.js';
export { createInterface, updateInterface, deleteInterface } from './apply.js';
