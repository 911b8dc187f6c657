/**
 * Command exports
 */

export { diffCommand, type DiffOptions, type DiffResult } from './diff.js';
export { syncCommand, type SyncOptions, type SyncCommandResult } from './sync.js';
export { openSession, type Session, type SessionOptions } from './session.js';
