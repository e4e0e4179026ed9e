// Failure kinds a search store reports instead of throwing transport errors.
export type StoreFailureKind = 'closed' | 'not-found' | 'rejected' | 'unavailable';

export interface StoreFailure {
  kind: StoreFailureKind;
  message: string;
  status?: number;
}

export type StoreResult<T> = { ok: true; value: T } | { ok: false; failure: StoreFailure };
