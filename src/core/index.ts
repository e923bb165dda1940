export { Store, isBusyError, isCorruptionError, type StoreOptions } from './store.js';
export { migrate, readSchemaVersion, SCHEMA_VERSION, MIGRATIONS } from './migrations.js';
export { IssueGraph, type IssueGraphOptions, type DeleteOptions } from './issue-graph.js';
export { Milestones } from './milestones.js';
export { SessionManager, runningTimer } from './session-manager.js';
export { recoverStore, type RecoveryReport, type RecoveryAction } from './recovery.js';
export { buildContextSummary, type ContextSummary, type SummarySources } from './summary.js';
export * from './graph.js';
export * from './errors.js';
export * from '../types/index.js';
