import type { Checkpoint } from '@reindexer/contracts';

import { HttpSearchStore } from './adapters/store/http.js';
import { CheckpointStore } from './checkpoint-store.js';
import {
  type ReindexerConfig,
  type ReindexerConfigOverrides,
  loadReindexerConfig,
} from './config.js';
import {
  type MigrationCallbacks,
  MigrationCoordinator,
  type MigrationOutcome,
} from './coordinator.js';
import {
  type PipelineLogger,
  type PipelineMetrics,
  noopLogger,
  noopMetrics,
} from './observability.js';
import { type ConfirmFn, prepareJob } from './prepare-job.js';
import type { SearchStore } from './store.js';
import type { Sleeper } from './task-monitor.js';

export interface CreateReindexerOptions {
  /** Fully resolved config; when absent it is loaded from env plus `overrides`. */
  config?: ReindexerConfig;
  overrides?: ReindexerConfigOverrides;
  store?: SearchStore;
  fetchImplementation?: typeof fetch;
  logger?: PipelineLogger;
  metrics?: PipelineMetrics;
  sleep?: Sleeper;
  now?: () => Date;
}

export interface MigrationRequest {
  sourcePattern: string;
  destination: string;
  resume?: boolean;
  autoConfirm?: boolean;
  dryRun?: boolean;
  confirm: ConfirmFn;
  signal?: AbortSignal;
  callbacks?: MigrationCallbacks;
}

export type MigrationRunResult =
  | { kind: 'nothing-to-do'; sourcePattern: string }
  | { kind: 'declined'; checkpoint: Checkpoint; resumed: boolean }
  | { kind: 'dry-run'; checkpoint: Checkpoint; resumed: boolean }
  | { kind: 'finished'; resumed: boolean; outcome: MigrationOutcome };

export interface Reindexer {
  config: ReindexerConfig;
  store: SearchStore;
  checkpoints: CheckpointStore;
  logger: PipelineLogger;
  metrics: PipelineMetrics;
  migrate(request: MigrationRequest): Promise<MigrationRunResult>;
  listCheckpoints(): Promise<Checkpoint[]>;
}

export function createReindexer(options: CreateReindexerOptions = {}): Reindexer {
  const config = options.config ?? loadReindexerConfig(options.overrides);
  const logger = options.logger ?? noopLogger;
  const metrics = options.metrics ?? noopMetrics;
  const store =
    options.store ??
    new HttpSearchStore({
      hosts: config.hosts,
      auth: config.auth,
      timeoutMs: config.requestTimeoutMs,
      fetchImplementation: options.fetchImplementation,
    });
  const checkpoints = new CheckpointStore(store, {
    collection: config.checkpointCollection,
    logger,
    now: options.now,
  });

  return {
    config,
    store,
    checkpoints,
    logger,
    metrics,
    async migrate(request) {
      const prepared = await prepareJob({
        store,
        checkpoints,
        sourcePattern: request.sourcePattern,
        destination: request.destination,
        resume: request.resume,
        autoConfirm: request.autoConfirm,
        dryRun: request.dryRun,
        confirm: request.confirm,
        staleAfterMs: config.staleAfterMs,
        logger,
        now: options.now,
      });
      if (prepared.kind !== 'ready') return prepared;

      const coordinator = new MigrationCoordinator({
        store,
        checkpoints,
        checkpoint: prepared.checkpoint,
        pollIntervalMs: config.pollIntervalMs,
        settleDelayMs: config.settleDelayMs,
        stallPolls: config.stallPolls,
        readOnlySource: config.readOnlySource,
        readOnlyDestination: config.readOnlyDestination,
        destinationSettings: config.destination,
        sleep: options.sleep,
        signal: request.signal,
        logger,
        metrics,
        callbacks: request.callbacks,
      });
      const outcome = await coordinator.runToCompletion();
      return { kind: 'finished', resumed: prepared.resumed, outcome };
    },
    async listCheckpoints() {
      return checkpoints.list();
    },
  };
}
