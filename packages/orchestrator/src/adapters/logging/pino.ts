// Pino-backed PipelineLogger.
// - JSON lines on stderr so stdout stays free for command output.
// - Pretty printing in development only.

import pino from 'pino';

import type { PipelineLogEvent, PipelineLogger } from '../../observability.js';

export interface PinoPipelineLoggerOptions {
  level?: string;
  /** Use an existing pino instance instead of building one. */
  instance?: pino.Logger;
  bindings?: Record<string, unknown>;
}

function createRootLogger(level: string): pino.Logger {
  if (process.env.NODE_ENV === 'development') {
    return pino({
      level,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          destination: 2,
        },
      },
    });
  }
  return pino({ level }, pino.destination(2));
}

export function createPinoPipelineLogger(options: PinoPipelineLoggerOptions = {}): PipelineLogger {
  const root = options.instance ?? createRootLogger(options.level ?? process.env.LOG_LEVEL ?? 'info');
  const instance = options.bindings ? root.child(options.bindings) : root;

  return {
    log(event: PipelineLogEvent) {
      const fields: Record<string, unknown> = { ...(event.detail ?? {}) };
      if (event.jobId) fields.jobId = event.jobId;
      if (event.segment) fields.segment = event.segment;
      instance[event.level](fields, event.message);
    },
  };
}
