export type {
  Checkpoint,
  CheckpointDocument,
  CheckpointStatus,
  JobKey,
  ProgressSnapshot,
} from './checkpoint.js';
export { CHECKPOINT_STATUSES, SEGMENTS_EXHAUSTED } from './checkpoint.js';
export type { StoreFailure, StoreFailureKind, StoreResult } from './store-failure.js';
export * from './errors.js';
