export type CheckpointStatus = 'OK' | 'CRASHED' | 'INTERRUPTED';

export const CHECKPOINT_STATUSES = ['OK', 'CRASHED', 'INTERRUPTED'] as const satisfies readonly CheckpointStatus[];

/** `currentSegment` value once every segment has been migrated and only finalization remains. */
export const SEGMENTS_EXHAUSTED = '<exhausted>';

export interface JobKey {
  /** Sorted, de-duplicated. */
  segments: string[];
  destination: string;
}

export interface Checkpoint {
  id: string;
  sourceSegments: string[];
  destination: string;
  currentSegment: string;
  currentTaskHandle: string;
  reopenOnFinish: boolean;
  host: string;
  processId: number;
  status: CheckpointStatus;
  message: string;
  lastUpdate: string;
}

/** Shape of the persisted document; field names are stable on disk. */
export interface CheckpointDocument {
  id: string;
  source_segments: string[];
  destination: string;
  current_segment: string;
  current_task_handle: string;
  reopen_on_finish: boolean;
  host: string;
  process_id: number;
  status: CheckpointStatus;
  message: string;
  last_update: string;
}

export interface ProgressSnapshot {
  isRunning: boolean;
  elapsedSeconds: number;
  totalItems: number;
  itemsDone: number;
}
