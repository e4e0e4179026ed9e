import { setTimeout as delay } from 'node:timers/promises';

import {
  MigrationInterruptedError,
  type ProgressSnapshot,
  TaskStalledError,
} from '@reindexer/contracts';

import { type SearchStore, expectOk } from './store.js';

export type Sleeper = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Default sleeper. An aborted signal surfaces as `MigrationInterruptedError`.
 */
export const realSleep: Sleeper = async (ms, signal) => {
  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    if (signal?.aborted) throw new MigrationInterruptedError(undefined, { cause: error });
    throw error;
  }
};

export const IDLE_SNAPSHOT: ProgressSnapshot = {
  isRunning: false,
  elapsedSeconds: 0,
  totalItems: 0,
  itemsDone: 0,
};

export interface TaskMonitorOptions {
  pollIntervalMs: number;
  sleep?: Sleeper;
  signal?: AbortSignal;
  /**
   * Raise `TaskStalledError` after this many consecutive running polls with no
   * change in `itemsDone`. `0` waits forever.
   */
  stallPolls?: number;
}

export type ProgressCallback = (snapshot: ProgressSnapshot) => void | Promise<void>;

const NANOS_PER_SECOND = 1_000_000_000;

export class TaskMonitor {
  private readonly pollIntervalMs: number;
  private readonly sleep: Sleeper;
  private readonly signal?: AbortSignal;
  private readonly stallPolls: number;

  constructor(
    private readonly store: SearchStore,
    options: TaskMonitorOptions,
  ) {
    this.pollIntervalMs = options.pollIntervalMs;
    this.sleep = options.sleep ?? realSleep;
    this.signal = options.signal;
    this.stallPolls = options.stallPolls ?? 0;
  }

  async poll(taskHandle: string): Promise<ProgressSnapshot> {
    if (taskHandle === '') return { ...IDLE_SNAPSHOT };

    const result = await this.store.taskStatus(taskHandle);
    // the store forgets finished tasks; absence means done
    if (!result.ok && result.failure.kind === 'not-found') return { ...IDLE_SNAPSHOT };

    const status = expectOk(result, `task status ${taskHandle}`);
    return {
      isRunning: !status.completed,
      elapsedSeconds: status.runningTimeInNanos / NANOS_PER_SECOND,
      totalItems: status.total,
      itemsDone: status.created + status.updated + status.deleted,
    };
  }

  /**
   * Poll until the task is no longer running. `onProgress` sees every snapshot,
   * including the final one, which is also returned.
   */
  async waitUntilFinished(
    taskHandle: string,
    onProgress: ProgressCallback,
  ): Promise<ProgressSnapshot> {
    let lastDone = -1;
    let unchangedPolls = 0;

    for (;;) {
      this.throwIfAborted();
      const snapshot = await this.poll(taskHandle);
      await onProgress(snapshot);
      if (!snapshot.isRunning) return snapshot;

      if (snapshot.itemsDone === lastDone) {
        unchangedPolls += 1;
      } else {
        lastDone = snapshot.itemsDone;
        unchangedPolls = 0;
      }
      if (this.stallPolls > 0 && unchangedPolls >= this.stallPolls) {
        throw new TaskStalledError(
          `Task ${taskHandle} made no progress across ${unchangedPolls} polls (${snapshot.itemsDone}/${snapshot.totalItems} items)`,
          taskHandle,
        );
      }

      await this.sleep(this.pollIntervalMs, this.signal);
    }
  }

  private throwIfAborted(): void {
    if (this.signal?.aborted) throw new MigrationInterruptedError();
  }
}
