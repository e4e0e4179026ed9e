import {
  StoreOperationError,
  type StoreFailure,
  type StoreFailureKind,
  type StoreResult,
} from '@reindexer/contracts';

export type IndexSettings = Record<string, unknown>;

export interface MigrateOptions {
  /** Keep the newer document when a segment is re-run over existing data. */
  versionType: 'external' | 'internal';
  /** `proceed` skips conflicting writes instead of aborting the whole operation. */
  conflicts: 'proceed' | 'abort';
}

export const DEFAULT_MIGRATE_OPTIONS: MigrateOptions = {
  versionType: 'external',
  conflicts: 'proceed',
};

/** Raw task progress as reported by the store. */
export interface TaskStatusData {
  completed: boolean;
  runningTimeInNanos: number;
  total: number;
  created: number;
  updated: number;
  deleted: number;
}

export type StoreDocument = Record<string, unknown>;

/**
 * Capabilities the coordinator needs from the remote search store. Failures are
 * returned as tagged results so callers can branch on `failure.kind`.
 */
export interface SearchStore {
  exists(name: string): Promise<StoreResult<boolean>>;
  isOpen(name: string): Promise<StoreResult<boolean>>;
  open(name: string): Promise<StoreResult<void>>;
  close(name: string): Promise<StoreResult<void>>;
  create(name: string, settings: IndexSettings): Promise<StoreResult<void>>;
  putSettings(name: string, settings: IndexSettings): Promise<StoreResult<void>>;
  count(name: string): Promise<StoreResult<number>>;
  forceMerge(name: string): Promise<StoreResult<void>>;
  migrateAsync(
    source: string,
    destination: string,
    options: MigrateOptions,
  ): Promise<StoreResult<string>>;
  taskStatus(handle: string): Promise<StoreResult<TaskStatusData>>;
  /** Matching names, sorted, closed collections included. */
  listMatching(pattern: string): Promise<StoreResult<string[]>>;
  getAll(collection: string): Promise<StoreResult<StoreDocument[]>>;
  put(collection: string, id: string, document: StoreDocument): Promise<StoreResult<void>>;
  delete(collection: string, id: string): Promise<StoreResult<void>>;
}

export function ok<T>(value: T): StoreResult<T> {
  return { ok: true, value };
}

export function done(): StoreResult<void> {
  return { ok: true, value: undefined };
}

export function fail<T = never>(
  kind: StoreFailureKind,
  message: string,
  status?: number,
): StoreResult<T> {
  const failure: StoreFailure = status === undefined ? { kind, message } : { kind, message, status };
  return { ok: false, failure };
}

/**
 * Unwrap a result or raise a `StoreOperationError` naming the action that failed.
 */
export function expectOk<T>(result: StoreResult<T>, action: string): T {
  if (result.ok) return result.value;
  const { kind, message, status } = result.failure;
  throw new StoreOperationError(`${action} failed (${kind}): ${message}`, kind, status);
}
