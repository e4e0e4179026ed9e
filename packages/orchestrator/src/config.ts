import { z } from 'zod';

import { ConfigurationError } from '@reindexer/contracts';
import { readBool, readInt, readList, readString } from '@reindexer/shared-infrastructure';

import { DEFAULT_CHECKPOINT_COLLECTION } from './checkpoint-store.js';

export type StoreAuth =
  | { type: 'none' }
  | { type: 'basic'; username: string; password: string }
  | { type: 'api-key'; apiKey: string };

export interface ReindexerConfig {
  hosts: string[];
  auth: StoreAuth;
  requestTimeoutMs: number;
  checkpointCollection: string;
  pollIntervalMs: number;
  settleDelayMs: number;
  stallPolls: number;
  staleAfterMs: number;
  readOnlySource: boolean;
  readOnlyDestination: boolean;
  destination: {
    replicas: number;
    refreshInterval: string;
  };
}

/** Values given on the command line; anything left undefined falls back to the environment. */
export interface ReindexerConfigOverrides {
  hosts?: string[];
  checkpointCollection?: string;
  pollIntervalMs?: number;
  settleDelayMs?: number;
  stallPolls?: number;
  readOnlySource?: boolean;
  readOnlyDestination?: boolean;
}

const ConfigSchema = z
  .object({
    hosts: z
      .array(z.url({ protocol: /^https?$/ }))
      .min(1, 'at least one store host is required (REINDEXER_HOSTS or --hosts)'),
    username: z.string().optional(),
    password: z.string().optional(),
    apiKey: z.string().optional(),
    requestTimeoutMs: z.number().int().positive(),
    checkpointCollection: z.string().min(1),
    pollIntervalMs: z.number().int().positive(),
    settleDelayMs: z.number().int().nonnegative(),
    stallPolls: z.number().int().nonnegative(),
    staleAfterMs: z.number().int().positive(),
    readOnlySource: z.boolean(),
    readOnlyDestination: z.boolean(),
    destinationReplicas: z.number().int().nonnegative(),
    destinationRefreshInterval: z.string().min(1),
  })
  .superRefine((value, ctx) => {
    if (Boolean(value.username) !== Boolean(value.password)) {
      ctx.addIssue({
        code: 'custom',
        path: ['username'],
        message: 'REINDEXER_USERNAME and REINDEXER_PASSWORD must be set together',
      });
    }
    if (value.apiKey && value.username) {
      ctx.addIssue({
        code: 'custom',
        path: ['apiKey'],
        message: 'use either REINDEXER_API_KEY or username/password, not both',
      });
    }
  });

export function loadReindexerConfig(overrides: ReindexerConfigOverrides = {}): ReindexerConfig {
  const parsed = ConfigSchema.safeParse({
    hosts: overrides.hosts ?? readList('REINDEXER_HOSTS'),
    username: readString('REINDEXER_USERNAME'),
    password: readString('REINDEXER_PASSWORD'),
    apiKey: readString('REINDEXER_API_KEY'),
    requestTimeoutMs: readInt('REINDEXER_REQUEST_TIMEOUT_MS', 30_000),
    checkpointCollection:
      overrides.checkpointCollection ??
      readString('REINDEXER_CHECKPOINT_INDEX', DEFAULT_CHECKPOINT_COLLECTION),
    pollIntervalMs: overrides.pollIntervalMs ?? readInt('REINDEXER_POLL_INTERVAL_MS', 10_000),
    settleDelayMs: overrides.settleDelayMs ?? readInt('REINDEXER_SETTLE_DELAY_MS', 5_000),
    stallPolls: overrides.stallPolls ?? readInt('REINDEXER_STALL_POLLS', 0),
    staleAfterMs: readInt('REINDEXER_STALE_AFTER_MS', 300_000),
    readOnlySource: overrides.readOnlySource ?? readBool('REINDEXER_READ_ONLY_SOURCE', false),
    readOnlyDestination:
      overrides.readOnlyDestination ?? readBool('REINDEXER_READ_ONLY_DEST', false),
    destinationReplicas: readInt('REINDEXER_DEST_REPLICAS', 1),
    destinationRefreshInterval: readString('REINDEXER_DEST_REFRESH_INTERVAL', '1s'),
  });

  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'config'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid reindexer configuration: ${details}`);
  }

  const value = parsed.data;
  let auth: StoreAuth = { type: 'none' };
  if (value.apiKey) {
    auth = { type: 'api-key', apiKey: value.apiKey };
  } else if (value.username && value.password) {
    auth = { type: 'basic', username: value.username, password: value.password };
  }

  return {
    hosts: value.hosts,
    auth,
    requestTimeoutMs: value.requestTimeoutMs,
    checkpointCollection: value.checkpointCollection,
    pollIntervalMs: value.pollIntervalMs,
    settleDelayMs: value.settleDelayMs,
    stallPolls: value.stallPolls,
    staleAfterMs: value.staleAfterMs,
    readOnlySource: value.readOnlySource,
    readOnlyDestination: value.readOnlyDestination,
    destination: {
      replicas: value.destinationReplicas,
      refreshInterval: value.destinationRefreshInterval,
    },
  };
}
