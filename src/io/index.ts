/**
 * IO module - filesystem abstraction and the durable state store
 */

export { RealFileSystem, createRealFileSystem } from './real-file-system';
export { MemoryFileSystem } from './memory-file-system';

export {
  StateStore,
  validateWorkflowId,
  generateWorkflowId,
  createInitialState,
} from './state-store';
export type { InitialStateOptions } from './state-store';

export {
  ENTRY_STATE,
  openScope,
  directoryScope,
  isArchiveScope,
  detectArchiveLayout,
  extractHashFromFilename,
  verifyArchiveHash,
  createScopeError,
} from './workflow-scope';
export type {
  WorkflowScope,
  ScopeKind,
  ScopeError,
  ScopeErrorCode,
  CheckedOutFile,
  OpenScopeOptions,
} from './workflow-scope';
