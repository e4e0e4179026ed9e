import {
  type Checkpoint,
  CheckpointCorruptionError,
  type JobKey,
  SEGMENTS_EXHAUSTED,
} from '@reindexer/contracts';

// Plain code-unit comparison; locale-aware sorting would make the order host-dependent.
const compareNames = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

export function planSegments(names: Iterable<string>): string[] {
  return [...new Set(names)].sort(compareNames);
}

export function jobKeyOf(segments: Iterable<string>, destination: string): JobKey {
  return { segments: planSegments(segments), destination };
}

export function jobKeysEqual(a: JobKey, b: JobKey): boolean {
  if (a.destination !== b.destination) return false;
  const left = planSegments(a.segments);
  const right = planSegments(b.segments);
  return left.length === right.length && left.every((segment, idx) => segment === right[idx]);
}

type PlannerView = Pick<Checkpoint, 'id' | 'sourceSegments' | 'currentSegment'>;

function positionOf(checkpoint: PlannerView, ordered: string[]): number {
  const idx = ordered.indexOf(checkpoint.currentSegment);
  if (idx === -1) {
    throw new CheckpointCorruptionError(
      `Checkpoint ${checkpoint.id} points at segment "${checkpoint.currentSegment}" which is not one of its source segments`,
    );
  }
  return idx;
}

/**
 * Segment to migrate after the checkpoint's current one, or `''` when none remain.
 */
export function nextSegment(checkpoint: PlannerView): string {
  const ordered = planSegments(checkpoint.sourceSegments);
  if (checkpoint.currentSegment === '') return ordered[0] ?? '';
  if (checkpoint.currentSegment === SEGMENTS_EXHAUSTED) return '';
  return ordered[positionOf(checkpoint, ordered) + 1] ?? '';
}

export function isJobComplete(checkpoint: PlannerView, currentTaskRunning: boolean): boolean {
  return !currentTaskRunning && nextSegment(checkpoint) === '';
}

/**
 * 1-based position of the current segment, for progress lines. `index` is 0
 * before the first segment starts and `total` once all are done.
 */
export function segmentPosition(checkpoint: PlannerView): { index: number; total: number } {
  const ordered = planSegments(checkpoint.sourceSegments);
  if (checkpoint.currentSegment === '') return { index: 0, total: ordered.length };
  if (checkpoint.currentSegment === SEGMENTS_EXHAUSTED) {
    return { index: ordered.length, total: ordered.length };
  }
  return { index: positionOf(checkpoint, ordered) + 1, total: ordered.length };
}
