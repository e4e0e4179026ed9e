import type { StoreFailureKind } from './store-failure.js';

export class ReindexerError extends Error {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = this.constructor.name;
    }
}

export class ConfigurationError extends ReindexerError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
    }
}

export class BackingStoreUnavailableError extends ReindexerError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
    }
}

export class WriteRejectedError extends ReindexerError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
    }
}

/**
 * Raised when a persisted checkpoint references a segment that is not part of
 * its own segment set. Never recovered from.
 */
export class CheckpointCorruptionError extends ReindexerError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
    }
}

export class StoreOperationError extends ReindexerError {
    readonly kind: StoreFailureKind;
    readonly status?: number;

    constructor(message: string, kind: StoreFailureKind, status?: number, options?: ErrorOptions) {
        super(message, options);
        this.kind = kind;
        this.status = status;
    }
}

export class JobAlreadyExistsError extends ReindexerError {
    readonly checkpointId: string;

    constructor(message: string, checkpointId: string, options?: ErrorOptions) {
        super(message, options);
        this.checkpointId = checkpointId;
    }
}

export class MigrationInterruptedError extends ReindexerError {
    constructor(message = 'Migration interrupted by user', options?: ErrorOptions) {
        super(message, options);
    }
}

export class TaskStalledError extends ReindexerError {
    readonly taskHandle: string;

    constructor(message: string, taskHandle: string, options?: ErrorOptions) {
        super(message, options);
        this.taskHandle = taskHandle;
    }
}
