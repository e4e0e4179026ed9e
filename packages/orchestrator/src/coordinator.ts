import {
  type Checkpoint,
  type CheckpointStatus,
  MigrationInterruptedError,
  type ProgressSnapshot,
  SEGMENTS_EXHAUSTED,
} from '@reindexer/contracts';

import type { CheckpointStore } from './checkpoint-store.js';
import {
  type PipelineLogger,
  type PipelineMetrics,
  noopLogger,
  noopMetrics,
} from './observability.js';
import { isJobComplete, nextSegment, segmentPosition } from './segment-planner.js';
import { DEFAULT_MIGRATE_OPTIONS, type IndexSettings, type SearchStore, expectOk } from './store.js';
import { type Sleeper, TaskMonitor, realSleep } from './task-monitor.js';

export type MigrationPhase =
  | 'not-started'
  | 'running-segment'
  | 'between-segments'
  | 'complete'
  | 'crashed'
  | 'interrupted';

const PHASE_TRANSITIONS: Record<MigrationPhase, readonly MigrationPhase[]> = {
  'not-started': ['running-segment', 'between-segments', 'crashed', 'interrupted'],
  'running-segment': ['between-segments', 'crashed', 'interrupted'],
  'between-segments': ['running-segment', 'complete', 'crashed', 'interrupted'],
  complete: [],
  crashed: [],
  interrupted: [],
};

export function canTransitionPhase(from: MigrationPhase, to: MigrationPhase): boolean {
  if (from === to) return true;
  return PHASE_TRANSITIONS[from].includes(to);
}

export function assertPhaseTransition(from: MigrationPhase, to: MigrationPhase): void {
  if (!canTransitionPhase(from, to)) {
    throw new Error(`Invalid migration phase transition: ${from} -> ${to}`);
  }
}

export interface SegmentPosition {
  segment: string;
  index: number;
  total: number;
}

export type MigrationEvent =
  | { type: 'phase'; phase: MigrationPhase }
  | (SegmentPosition & {
      type: 'segment-start';
      taskHandle: string;
      reopened: boolean;
      sourceDocuments: number | null;
    })
  | (SegmentPosition & { type: 'progress'; snapshot: ProgressSnapshot })
  | (SegmentPosition & { type: 'segment-finished'; snapshot: ProgressSnapshot })
  | { type: 'finalize'; destination: string };

export interface MigrationCallbacks {
  onEvent?: (event: MigrationEvent) => void;
}

export interface DestinationSettings {
  replicas: number;
  refreshInterval: string;
}

export const BULK_LOAD_SETTINGS: IndexSettings = {
  refresh_interval: '-1',
  number_of_replicas: 0,
};

export const WRITE_BLOCK_SETTINGS: IndexSettings = { 'index.blocks.write': true };

export interface MigrationCoordinatorOptions {
  store: SearchStore;
  checkpoints: CheckpointStore;
  checkpoint: Checkpoint;
  pollIntervalMs: number;
  /** Pause between opening a closed segment and migrating it. */
  settleDelayMs: number;
  stallPolls?: number;
  readOnlySource?: boolean;
  readOnlyDestination?: boolean;
  destinationSettings?: DestinationSettings;
  sleep?: Sleeper;
  signal?: AbortSignal;
  logger?: PipelineLogger;
  metrics?: PipelineMetrics;
  callbacks?: MigrationCallbacks;
  clock?: () => number;
}

export type MigrationOutcome =
  | {
      status: 'complete';
      checkpointId: string;
      segments: string[];
      destination: string;
      documentCount: number | null;
      durationMs: number;
    }
  | { status: 'interrupted'; checkpoint: Checkpoint };

const DEFAULT_DESTINATION_SETTINGS: DestinationSettings = { replicas: 1, refreshInterval: '1s' };

const formatProgress = (snapshot: ProgressSnapshot): string => {
  const total = snapshot.totalItems > 0 ? `/${snapshot.totalItems}` : '';
  return `${snapshot.itemsDone}${total} documents after ${Math.round(snapshot.elapsedSeconds)}s`;
};

/**
 * Drives one migration job segment by segment, persisting the checkpoint on
 * every transition and poll so a later run with the same job key can resume.
 */
export class MigrationCoordinator {
  private checkpointState: Checkpoint;
  private phaseState: MigrationPhase = 'not-started';
  // opened by this run but not yet recorded as reopenOnFinish
  private unrecordedOpen: string | null = null;

  private readonly store: SearchStore;
  private readonly checkpoints: CheckpointStore;
  private readonly monitor: TaskMonitor;
  private readonly settleDelayMs: number;
  private readonly readOnlySource: boolean;
  private readonly readOnlyDestination: boolean;
  private readonly destinationSettings: DestinationSettings;
  private readonly sleep: Sleeper;
  private readonly signal?: AbortSignal;
  private readonly logger: PipelineLogger;
  private readonly metrics: PipelineMetrics;
  private readonly callbacks: MigrationCallbacks;
  private readonly clock: () => number;

  constructor(options: MigrationCoordinatorOptions) {
    this.store = options.store;
    this.checkpoints = options.checkpoints;
    this.checkpointState = { ...options.checkpoint };
    this.settleDelayMs = options.settleDelayMs;
    this.readOnlySource = options.readOnlySource ?? false;
    this.readOnlyDestination = options.readOnlyDestination ?? false;
    this.destinationSettings = options.destinationSettings ?? DEFAULT_DESTINATION_SETTINGS;
    this.sleep = options.sleep ?? realSleep;
    this.signal = options.signal;
    this.logger = options.logger ?? noopLogger;
    this.metrics = options.metrics ?? noopMetrics;
    this.callbacks = options.callbacks ?? {};
    this.clock = options.clock ?? Date.now;
    this.monitor = new TaskMonitor(options.store, {
      pollIntervalMs: options.pollIntervalMs,
      sleep: this.sleep,
      signal: options.signal,
      stallPolls: options.stallPolls,
    });
  }

  get checkpoint(): Checkpoint {
    return { ...this.checkpointState };
  }

  get phase(): MigrationPhase {
    return this.phaseState;
  }

  async runToCompletion(): Promise<MigrationOutcome> {
    const startedAt = this.clock();
    try {
      const resumed = this.checkpointState.currentSegment !== '';
      await this.persist({
        status: 'OK',
        message: resumed
          ? `resuming at ${this.describeCurrentSegment()}`
          : `starting migration into ${this.checkpointState.destination}`,
      });
      await this.prepareDestination();

      let taskRunning = this.checkpointState.currentTaskHandle !== '';
      this.transition(taskRunning ? 'running-segment' : 'between-segments');

      while (!isJobComplete(this.checkpointState, taskRunning)) {
        this.throwIfAborted();
        if (this.checkpointState.currentTaskHandle !== '') {
          await this.waitForCurrentTask();
          taskRunning = false;
        }
        if (isJobComplete(this.checkpointState, taskRunning)) break;

        const started = await this.startNextSegment();
        if (!started) break;
        taskRunning = true;
      }

      const documentCount = await this.finalize();
      const durationMs = Math.max(this.clock() - startedAt, 0);
      this.metrics.timing('migration.duration', durationMs, {
        destination: this.checkpointState.destination,
      });
      return {
        status: 'complete',
        checkpointId: this.checkpointState.id,
        segments: [...this.checkpointState.sourceSegments],
        destination: this.checkpointState.destination,
        documentCount,
        durationMs,
      };
    } catch (error) {
      await this.closeUnrecordedOpen();
      if (error instanceof MigrationInterruptedError) {
        await this.recordTermination('INTERRUPTED', error.message);
        this.transition('interrupted');
        return { status: 'interrupted', checkpoint: this.checkpoint };
      }
      const message = error instanceof Error ? error.message : String(error);
      await this.recordTermination('CRASHED', message || 'unknown failure');
      this.transition('crashed');
      throw error;
    }
  }

  private async prepareDestination(): Promise<void> {
    const destination = this.checkpointState.destination;
    const exists = expectOk(await this.store.exists(destination), `check destination ${destination}`);
    if (!exists) {
      expectOk(
        await this.store.create(destination, BULK_LOAD_SETTINGS),
        `create destination ${destination}`,
      );
      this.log('info', 'destination.created', { destination });
      return;
    }
    expectOk(
      await this.store.putSettings(destination, BULK_LOAD_SETTINGS),
      `apply bulk-load settings to ${destination}`,
    );
  }

  private async waitForCurrentTask(): Promise<void> {
    const segment = this.checkpointState.currentSegment;
    const taskHandle = this.checkpointState.currentTaskHandle;
    const position = this.position();
    const waitStartedAt = this.clock();

    const final = await this.monitor.waitUntilFinished(taskHandle, async (snapshot) => {
      this.emit({ type: 'progress', ...position, snapshot });
      if (!snapshot.isRunning) return;
      await this.persist({
        status: 'OK',
        message: `migrating ${this.describeCurrentSegment()}: ${formatProgress(snapshot)}`,
      });
    });

    await this.persist({
      currentTaskHandle: '',
      status: 'OK',
      message: `finished ${this.describeCurrentSegment()}`,
    });
    this.metrics.timing('segment.duration', Math.max(this.clock() - waitStartedAt, 0), { segment });
    this.metrics.increment('segment.migrated', 1, { segment });
    this.log('info', 'segment.finished', { taskHandle, itemsDone: final.itemsDone }, segment);
    this.transition('between-segments');
    this.emit({ type: 'segment-finished', ...position, snapshot: final });
  }

  private async startNextSegment(): Promise<boolean> {
    this.throwIfAborted();
    if (this.checkpointState.reopenOnFinish) {
      await this.closeSegment(this.checkpointState.currentSegment);
    }

    const segment = nextSegment(this.checkpointState);
    if (segment === '') return false;

    let reopened = false;
    let sourceDocuments: number | null = null;
    const sourceCount = await this.store.count(segment);
    this.throwIfAborted();
    if (!sourceCount.ok && sourceCount.failure.kind === 'closed') {
      expectOk(await this.store.open(segment), `open segment ${segment}`);
      reopened = true;
      this.unrecordedOpen = segment;
      this.log('info', 'segment.opened', { settleDelayMs: this.settleDelayMs }, segment);
      // the store opens asynchronously and a migrate issued too early copies nothing
      await this.sleep(this.settleDelayMs, this.signal);
    } else {
      sourceDocuments = expectOk(sourceCount, `count segment ${segment}`);
    }

    if (this.readOnlySource) {
      expectOk(
        await this.store.putSettings(segment, WRITE_BLOCK_SETTINGS),
        `mark segment ${segment} read-only`,
      );
    }

    const destination = this.checkpointState.destination;
    this.throwIfAborted();
    const taskHandle = expectOk(
      await this.store.migrateAsync(segment, destination, DEFAULT_MIGRATE_OPTIONS),
      `migrate ${segment} into ${destination}`,
    );

    await this.persist({
      currentSegment: segment,
      currentTaskHandle: taskHandle,
      reopenOnFinish: reopened,
      status: 'OK',
      message: `started migrating ${segment} into ${destination} (task ${taskHandle})`,
    });
    this.unrecordedOpen = null;
    this.log('info', 'segment.started', { taskHandle, reopened, sourceDocuments }, segment);
    this.transition('running-segment');
    this.emit({
      type: 'segment-start',
      ...this.position(),
      taskHandle,
      reopened,
      sourceDocuments,
    });
    return true;
  }

  private async closeSegment(segment: string): Promise<void> {
    expectOk(await this.store.close(segment), `close segment ${segment}`);
    this.checkpointState = { ...this.checkpointState, reopenOnFinish: false };
    this.log('info', 'segment.closed', {}, segment);
  }

  /**
   * A segment opened before its migrate was recorded would be left open, since
   * a resume sees the checkpoint of the previous segment.
   */
  private async closeUnrecordedOpen(): Promise<void> {
    const segment = this.unrecordedOpen;
    if (segment === null) return;
    this.unrecordedOpen = null;
    const closed = await this.store.close(segment);
    if (closed.ok) {
      this.log('info', 'segment.closed', {}, segment);
      return;
    }
    this.log('error', 'segment.close_failed', { error: closed.failure.message }, segment);
  }

  private throwIfAborted(): void {
    if (this.signal?.aborted) throw new MigrationInterruptedError();
  }

  private async finalize(): Promise<number | null> {
    const { currentSegment, destination } = this.checkpointState;
    if (this.checkpointState.reopenOnFinish && currentSegment !== SEGMENTS_EXHAUSTED) {
      await this.closeSegment(currentSegment);
    }

    await this.persist({
      currentSegment: SEGMENTS_EXHAUSTED,
      currentTaskHandle: '',
      reopenOnFinish: false,
      status: 'OK',
      message: `all segments migrated; finalizing ${destination}`,
    });
    this.emit({ type: 'finalize', destination });

    expectOk(await this.store.forceMerge(destination), `force merge ${destination}`);
    expectOk(
      await this.store.putSettings(destination, {
        refresh_interval: this.destinationSettings.refreshInterval,
        number_of_replicas: this.destinationSettings.replicas,
      }),
      `restore settings on ${destination}`,
    );
    if (this.readOnlyDestination) {
      expectOk(
        await this.store.putSettings(destination, WRITE_BLOCK_SETTINGS),
        `mark destination ${destination} read-only`,
      );
    }

    const count = await this.store.count(destination);
    await this.checkpoints.delete(this.checkpointState.id);
    this.transition('complete');
    this.log('info', 'migration.complete', { destination });
    return count.ok ? count.value : null;
  }

  private async persist(changes: Partial<Checkpoint>): Promise<void> {
    this.checkpointState = await this.checkpoints.save({ ...this.checkpointState, ...changes });
  }

  private async recordTermination(status: CheckpointStatus, message: string): Promise<void> {
    try {
      await this.persist({ status, message });
    } catch (persistError) {
      this.log('error', 'checkpoint.status.persist_failed', {
        status,
        error: persistError instanceof Error ? persistError.message : String(persistError),
      });
    }
  }

  private transition(next: MigrationPhase): void {
    if (this.phaseState === next) return;
    assertPhaseTransition(this.phaseState, next);
    this.phaseState = next;
    this.emit({ type: 'phase', phase: next });
  }

  private position(): SegmentPosition {
    const { index, total } = segmentPosition(this.checkpointState);
    return { segment: this.checkpointState.currentSegment, index, total };
  }

  private describeCurrentSegment(): string {
    const { segment, index, total } = this.position();
    if (segment === SEGMENTS_EXHAUSTED) return 'finalization';
    return `${segment} (${index}/${total})`;
  }

  private emit(event: MigrationEvent): void {
    this.callbacks.onEvent?.(event);
  }

  private log(
    level: 'info' | 'warn' | 'error',
    message: string,
    detail: Record<string, unknown>,
    segment?: string,
  ): void {
    this.logger.log({ level, message, jobId: this.checkpointState.id, segment, detail });
  }
}
