export type PipelineLogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * One structured log line from the migration core. `message` is a dotted event
 * name such as `segment.started`.
 */
export interface PipelineLogEvent {
  level: PipelineLogLevel;
  message: string;
  /** Checkpoint id of the job the event belongs to. */
  jobId?: string;
  /** Source segment being migrated, when the event concerns one. */
  segment?: string;
  detail?: Record<string, unknown>;
}

export interface PipelineLogger {
  log: (event: PipelineLogEvent) => void;
}

export interface PipelineMetrics {
  timing: (metric: string, durationMs: number, tags?: Record<string, string>) => void;
  increment: (metric: string, value?: number, tags?: Record<string, string>) => void;
}

export const noopLogger: PipelineLogger = {
  log: () => {
    /* noop */
  },
};

export const noopMetrics: PipelineMetrics = {
  timing: () => {
    /* noop */
  },
  increment: () => {
    /* noop */
  },
};
