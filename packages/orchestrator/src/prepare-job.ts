import { type Checkpoint, JobAlreadyExistsError } from '@reindexer/contracts';

import { type CheckpointStore, isCheckpointActive } from './checkpoint-store.js';
import { type PipelineLogger, noopLogger } from './observability.js';
import { jobKeyOf, nextSegment } from './segment-planner.js';
import { type SearchStore, expectOk } from './store.js';

/** Yes/no decision supplied by the caller, e.g. an interactive prompt. */
export type ConfirmFn = (question: string) => Promise<boolean>;

export interface PrepareJobOptions {
  store: SearchStore;
  checkpoints: CheckpointStore;
  sourcePattern: string;
  destination: string;
  resume?: boolean;
  autoConfirm?: boolean;
  dryRun?: boolean;
  confirm: ConfirmFn;
  staleAfterMs?: number;
  logger?: PipelineLogger;
  now?: () => Date;
}

export type PreparedJob =
  | { kind: 'nothing-to-do'; sourcePattern: string }
  | { kind: 'declined'; checkpoint: Checkpoint; resumed: boolean }
  | { kind: 'dry-run'; checkpoint: Checkpoint; resumed: boolean }
  | { kind: 'ready'; checkpoint: Checkpoint; resumed: boolean };

const DEFAULT_STALE_AFTER_MS = 5 * 60_000;

/**
 * Resolve the segments behind `sourcePattern` and decide whether this run
 * starts a new job, resumes an existing one, or must not proceed. Nothing is
 * written before the decision is made.
 */
export async function prepareJob(options: PrepareJobOptions): Promise<PreparedJob> {
  const { store, checkpoints, sourcePattern, destination } = options;
  const logger = options.logger ?? noopLogger;
  const now = options.now ?? (() => new Date());

  if (!options.dryRun) {
    await checkpoints.ensureBackingStorage();
  }

  const matched = expectOk(await store.listMatching(sourcePattern), `list ${sourcePattern}`);
  const segments = matched.filter((name) => name !== destination && name !== checkpoints.collection);
  if (segments.length === 0) {
    return { kind: 'nothing-to-do', sourcePattern };
  }

  const jobKey = jobKeyOf(segments, destination);
  const existing = await checkpoints.findMatching(jobKey);

  if (existing && !options.resume) {
    throw new JobAlreadyExistsError(
      `A job migrating ${jobKey.segments.length} segment(s) into ${destination} already exists ` +
        `(checkpoint ${existing.id}, status ${existing.status}, last update ${existing.lastUpdate} ` +
        `by ${existing.host}:${existing.processId}). Re-run with --resume to continue it.`,
      existing.id,
    );
  }

  let checkpoint: Checkpoint;
  const resumed = existing !== null;
  if (existing) {
    if (isCheckpointActive(existing, now(), options.staleAfterMs ?? DEFAULT_STALE_AFTER_MS)) {
      logger.log({
        level: 'warn',
        message: 'checkpoint.possibly_active',
        jobId: existing.id,
        detail: { host: existing.host, processId: existing.processId, lastUpdate: existing.lastUpdate },
      });
    }
    checkpoint = existing;
  } else {
    if (options.resume) {
      logger.log({
        level: 'warn',
        message: 'checkpoint.resume_missing',
        detail: { sourcePattern, destination },
      });
    }
    checkpoint = checkpoints.draft(jobKey);
  }

  if (options.dryRun) {
    return { kind: 'dry-run', checkpoint, resumed };
  }

  if (!options.autoConfirm) {
    const question = resumed
      ? `Resume migration into ${destination} at ${describeResumePoint(checkpoint)}?`
      : `Migrate ${jobKey.segments.length} segment(s) matching "${sourcePattern}" into ${destination}?`;
    if (!(await options.confirm(question))) {
      return { kind: 'declined', checkpoint, resumed };
    }
  }

  return { kind: 'ready', checkpoint, resumed };
}

function describeResumePoint(checkpoint: Checkpoint): string {
  if (checkpoint.currentTaskHandle !== '') {
    return `${checkpoint.currentSegment} (task ${checkpoint.currentTaskHandle} still tracked)`;
  }
  const upcoming = nextSegment(checkpoint);
  return upcoming === '' ? 'finalization' : upcoming;
}
