export * from '@reindexer/contracts';

export {
  type Sleeper,
  type ProgressCallback,
  type TaskMonitorOptions,
  IDLE_SNAPSHOT,
  TaskMonitor,
  realSleep,
} from './task-monitor.js';
export {
  isJobComplete,
  jobKeyOf,
  jobKeysEqual,
  nextSegment,
  planSegments,
  segmentPosition,
} from './segment-planner.js';
export {
  type CheckpointStoreOptions,
  type ProcessIdentity,
  CheckpointStore,
  DEFAULT_CHECKPOINT_COLLECTION,
  fromCheckpointDocument,
  isCheckpointActive,
  toCheckpointDocument,
} from './checkpoint-store.js';
export {
  type DestinationSettings,
  type MigrationCallbacks,
  type MigrationCoordinatorOptions,
  type MigrationEvent,
  type MigrationOutcome,
  type MigrationPhase,
  type SegmentPosition,
  BULK_LOAD_SETTINGS,
  MigrationCoordinator,
  WRITE_BLOCK_SETTINGS,
  assertPhaseTransition,
  canTransitionPhase,
} from './coordinator.js';
export {
  type ConfirmFn,
  type PrepareJobOptions,
  type PreparedJob,
  prepareJob,
} from './prepare-job.js';
export {
  type IndexSettings,
  type MigrateOptions,
  type SearchStore,
  type StoreDocument,
  type TaskStatusData,
  DEFAULT_MIGRATE_OPTIONS,
  done,
  expectOk,
  fail,
  ok,
} from './store.js';
export {
  type ReindexerConfig,
  type ReindexerConfigOverrides,
  type StoreAuth,
  loadReindexerConfig,
} from './config.js';
export {
  type PipelineLogEvent,
  type PipelineLogLevel,
  type PipelineLogger,
  type PipelineMetrics,
  noopLogger,
  noopMetrics,
} from './observability.js';
export {
  type CreateReindexerOptions,
  type MigrationRequest,
  type MigrationRunResult,
  type Reindexer,
  createReindexer,
} from './pipeline.js';
export { HttpSearchStore, type HttpSearchStoreOptions, classifyStatus } from './adapters/store/http.js';
export { createPinoPipelineLogger, type PinoPipelineLoggerOptions } from './adapters/logging/pino.js';
export { PromptAbortedError, promptConfirm } from './confirm.js';

export {
  type LoadEnvOptions,
  type LoadEnvSummary,
  loadEnvFiles,
  loadEnvFilesWithSummary,
} from '@reindexer/shared-infrastructure';
