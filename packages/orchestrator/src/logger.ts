import pc from 'picocolors';

import type { PipelineLogEvent, PipelineLogger } from './observability.js';

type LogLevel = 'info' | 'warn' | 'error' | 'step' | 'success';

export type LogEvent = {
  level: LogLevel;
  message: string;
  details?: Record<string, unknown> | undefined;
  timestamp: string;
};

export type Logger = {
  info: (message: string, details?: Record<string, unknown>) => void;
  warn: (message: string, details?: Record<string, unknown>) => void;
  error: (message: string, details?: Record<string, unknown>) => void;
  step: (message: string, details?: Record<string, unknown>) => void;
  success: (message: string, details?: Record<string, unknown>) => void;
  events: () => LogEvent[];
  flush: (final?: Record<string, unknown>) => void;
};

type LoggerOptions = {
  json?: boolean;
  now?: () => Date;
};

function formatMessage(level: LogLevel, message: string): string {
  switch (level) {
    case 'info':
      return `${pc.cyan('ℹ')} ${message}`;
    case 'warn':
      return `${pc.yellow('⚠')} ${pc.yellow(message)}`;
    case 'error':
      return `${pc.red('✖')} ${pc.red(message)}`;
    case 'success':
      return `${pc.green('✔')} ${message}`;
    default:
      return `${pc.dim('•')} ${message}`;
  }
}

/**
 * Console logger for the CLI. In `json` mode nothing is printed until
 * `flush`, which writes a single JSON document with every event.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const { json = false, now = () => new Date() } = options;
  const events: LogEvent[] = [];

  const push = (level: LogLevel, message: string, details?: Record<string, unknown>) => {
    const event: LogEvent = {
      level,
      message,
      details,
      timestamp: now().toISOString(),
    };
    events.push(event);
    if (!json) {
      if (details && Object.keys(details).length > 0) {
        console.log(formatMessage(level, message), details);
      } else {
        console.log(formatMessage(level, message));
      }
    }
  };

  return {
    info: (message, details) => push('info', message, details),
    warn: (message, details) => push('warn', message, details),
    error: (message, details) => push('error', message, details),
    step: (message, details) => push('step', message, details),
    success: (message, details) => push('success', message, details),
    events: () => events,
    flush: final => {
      if (json) {
        const payload = { events, result: final ?? null };
        console.log(JSON.stringify(payload, null, 2));
      }
    },
  };
}

/**
 * Forward pipeline warnings and errors to the console logger so the user sees
 * them next to the progress output. Lower levels are dropped.
 */
export function consolePipelineLogger(logger: Logger): PipelineLogger {
  return {
    log(event: PipelineLogEvent) {
      if (event.level !== 'warn' && event.level !== 'error') return;
      const details: Record<string, unknown> = { ...(event.detail ?? {}) };
      if (event.segment) details.segment = event.segment;
      logger[event.level](event.message, details);
    },
  };
}

/** Fan one event out to several loggers. */
export function combinePipelineLoggers(...loggers: PipelineLogger[]): PipelineLogger {
  return {
    log(event) {
      for (const target of loggers) target.log(event);
    },
  };
}
