import { randomUUID } from 'node:crypto';
import { hostname } from 'node:os';
import { z } from 'zod';

import {
  BackingStoreUnavailableError,
  CHECKPOINT_STATUSES,
  type Checkpoint,
  type CheckpointDocument,
  type JobKey,
  type StoreFailure,
  WriteRejectedError,
} from '@reindexer/contracts';

import { type PipelineLogger, noopLogger } from './observability.js';
import { jobKeyOf, jobKeysEqual } from './segment-planner.js';
import type { SearchStore, StoreDocument } from './store.js';

export const DEFAULT_CHECKPOINT_COLLECTION = '.reindexer-checkpoints';

const CHECKPOINT_COLLECTION_SETTINGS = {
  number_of_shards: 1,
  auto_expand_replicas: '0-1',
};

const CheckpointDocumentSchema = z.object({
  id: z.string().min(1),
  source_segments: z.array(z.string().min(1)).min(1),
  destination: z.string().min(1),
  current_segment: z.string(),
  current_task_handle: z.string(),
  reopen_on_finish: z.boolean(),
  host: z.string(),
  process_id: z.number().int(),
  status: z.enum(CHECKPOINT_STATUSES),
  message: z.string(),
  last_update: z.string(),
});

export interface ProcessIdentity {
  host: string;
  processId: number;
}

export interface CheckpointStoreOptions {
  collection?: string;
  logger?: PipelineLogger;
  /** Evaluated on every save. */
  identity?: () => ProcessIdentity;
  now?: () => Date;
  newId?: () => string;
}

const currentProcessIdentity = (): ProcessIdentity => ({
  host: hostname(),
  processId: process.pid,
});

export function toCheckpointDocument(checkpoint: Checkpoint): CheckpointDocument {
  return {
    id: checkpoint.id,
    source_segments: [...checkpoint.sourceSegments],
    destination: checkpoint.destination,
    current_segment: checkpoint.currentSegment,
    current_task_handle: checkpoint.currentTaskHandle,
    reopen_on_finish: checkpoint.reopenOnFinish,
    host: checkpoint.host,
    process_id: checkpoint.processId,
    status: checkpoint.status,
    message: checkpoint.message,
    last_update: checkpoint.lastUpdate,
  };
}

export function fromCheckpointDocument(doc: CheckpointDocument): Checkpoint {
  return {
    id: doc.id,
    sourceSegments: jobKeyOf(doc.source_segments, doc.destination).segments,
    destination: doc.destination,
    currentSegment: doc.current_segment,
    currentTaskHandle: doc.current_task_handle,
    reopenOnFinish: doc.reopen_on_finish,
    host: doc.host,
    processId: doc.process_id,
    status: doc.status,
    message: doc.message,
    lastUpdate: doc.last_update,
  };
}

/**
 * True when the checkpoint looks owned by a live process: status OK and
 * written within `staleAfterMs`.
 */
export function isCheckpointActive(checkpoint: Checkpoint, now: Date, staleAfterMs: number): boolean {
  if (checkpoint.status !== 'OK') return false;
  const updatedAt = Date.parse(checkpoint.lastUpdate);
  if (Number.isNaN(updatedAt)) return false;
  return now.getTime() - updatedAt < staleAfterMs;
}

/**
 * Checkpoint persistence on top of the search store's document API. One
 * document per job, keyed by checkpoint id.
 */
export class CheckpointStore {
  readonly collection: string;
  private readonly logger: PipelineLogger;
  private readonly identity: () => ProcessIdentity;
  private readonly now: () => Date;
  private readonly newId: () => string;

  constructor(
    private readonly store: SearchStore,
    options: CheckpointStoreOptions = {},
  ) {
    this.collection = options.collection ?? DEFAULT_CHECKPOINT_COLLECTION;
    this.logger = options.logger ?? noopLogger;
    this.identity = options.identity ?? currentProcessIdentity;
    this.now = options.now ?? (() => new Date());
    this.newId = options.newId ?? randomUUID;
  }

  /**
   * A fresh, unsaved checkpoint for a job that has not started yet.
   */
  draft(jobKey: JobKey): Checkpoint {
    const { host, processId } = this.identity();
    return {
      id: this.newId(),
      sourceSegments: [...jobKey.segments],
      destination: jobKey.destination,
      currentSegment: '',
      currentTaskHandle: '',
      reopenOnFinish: false,
      host,
      processId,
      status: 'OK',
      message: 'created',
      lastUpdate: this.now().toISOString(),
    };
  }

  async ensureBackingStorage(): Promise<void> {
    const exists = await this.store.exists(this.collection);
    if (!exists.ok) throw this.unavailable('check checkpoint collection', exists.failure);
    if (exists.value) return;

    const created = await this.store.create(this.collection, CHECKPOINT_COLLECTION_SETTINGS);
    if (created.ok) {
      this.logger.log({
        level: 'info',
        message: 'checkpoint.collection.created',
        detail: { collection: this.collection },
      });
      return;
    }

    // another process may have created it between the two calls
    const recheck = await this.store.exists(this.collection);
    if (recheck.ok && recheck.value) return;
    throw this.unavailable('create checkpoint collection', created.failure);
  }

  async list(): Promise<Checkpoint[]> {
    const result = await this.store.getAll(this.collection);
    if (!result.ok) {
      if (result.failure.kind === 'not-found') return [];
      throw this.unavailable('read checkpoints', result.failure);
    }

    const checkpoints: Checkpoint[] = [];
    for (const raw of result.value) {
      const parsed = CheckpointDocumentSchema.safeParse(raw);
      if (!parsed.success) {
        this.logger.log({
          level: 'warn',
          message: 'checkpoint.document.invalid',
          detail: { collection: this.collection, issues: parsed.error.issues.length },
        });
        continue;
      }
      checkpoints.push(fromCheckpointDocument(parsed.data));
    }
    return checkpoints;
  }

  async findMatching(jobKey: JobKey): Promise<Checkpoint | null> {
    const checkpoints = await this.list();
    return (
      checkpoints.find((checkpoint) =>
        jobKeysEqual(jobKeyOf(checkpoint.sourceSegments, checkpoint.destination), jobKey),
      ) ?? null
    );
  }

  async load(id: string): Promise<Checkpoint | null> {
    const checkpoints = await this.list();
    return checkpoints.find((checkpoint) => checkpoint.id === id) ?? null;
  }

  /**
   * Upsert by id. Returns the checkpoint as written, with refreshed
   * `lastUpdate`, `host` and `processId`.
   */
  async save(checkpoint: Checkpoint): Promise<Checkpoint> {
    const { host, processId } = this.identity();
    const record: Checkpoint = {
      ...checkpoint,
      sourceSegments: [...checkpoint.sourceSegments],
      host,
      processId,
      lastUpdate: this.now().toISOString(),
    };

    const document: StoreDocument = { ...toCheckpointDocument(record) };
    const result = await this.store.put(this.collection, record.id, document);
    if (!result.ok) {
      if (result.failure.kind === 'rejected') {
        throw new WriteRejectedError(
          `Checkpoint ${record.id} rejected by ${this.collection}: ${result.failure.message}`,
        );
      }
      throw this.unavailable(`write checkpoint ${record.id}`, result.failure);
    }
    return record;
  }

  async delete(id: string): Promise<void> {
    const result = await this.store.delete(this.collection, id);
    if (result.ok || result.failure.kind === 'not-found') return;
    throw this.unavailable(`delete checkpoint ${id}`, result.failure);
  }

  private unavailable(action: string, failure: StoreFailure): BackingStoreUnavailableError {
    return new BackingStoreUnavailableError(
      `Unable to ${action} in ${this.collection} (${failure.kind}): ${failure.message}`,
    );
  }
}
