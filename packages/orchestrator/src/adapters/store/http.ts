import { URL } from 'node:url';
import { z } from 'zod';

import type { StoreFailureKind, StoreResult } from '@reindexer/contracts';

import type { StoreAuth } from '../../config.js';
import {
  type IndexSettings,
  type MigrateOptions,
  type SearchStore,
  type StoreDocument,
  type TaskStatusData,
  done,
  fail,
  ok,
} from '../../store.js';

export interface HttpSearchStoreOptions {
  hosts: string[];
  auth?: StoreAuth;
  timeoutMs?: number;
  /** Upper bound on documents returned by `getAll`. */
  maxDocuments?: number;
  fetchImplementation?: typeof fetch;
}

type HttpMethod = 'GET' | 'HEAD' | 'PUT' | 'POST' | 'DELETE';

interface HttpReply {
  status: number;
  body: unknown;
}

const ErrorBodySchema = z.object({
  error: z.union([
    z.string(),
    z.object({ type: z.string().optional(), reason: z.string().optional() }),
  ]),
});

const CountSchema = z.object({ count: z.number() });
const ReindexSchema = z.object({ task: z.string().min(1) });
const TaskSchema = z.object({
  completed: z.boolean(),
  task: z.object({
    running_time_in_nanos: z.number(),
    status: z.object({
      total: z.number(),
      created: z.number(),
      updated: z.number(),
      deleted: z.number(),
    }),
  }),
});
const CatIndicesSchema = z.array(z.object({ index: z.string(), status: z.string().optional() }));
const SearchSchema = z.object({
  hits: z.object({
    hits: z.array(z.object({ _id: z.string(), _source: z.record(z.string(), z.unknown()) })),
  }),
});

/**
 * `SearchStore` over the store's REST API. Requests rotate across `hosts`;
 * nothing is retried.
 */
export class HttpSearchStore implements SearchStore {
  private readonly hosts: string[];
  private readonly auth: StoreAuth;
  private readonly timeoutMs: number;
  private readonly maxDocuments: number;
  private readonly fetchImpl: typeof fetch;
  private cursor = 0;

  constructor(options: HttpSearchStoreOptions) {
    if (options.hosts.length === 0) {
      throw new Error('HttpSearchStore requires at least one host.');
    }

    this.hosts = [...options.hosts];
    this.auth = options.auth ?? { type: 'none' };
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.maxDocuments = options.maxDocuments ?? 10_000;
    this.fetchImpl = options.fetchImplementation ?? globalThis.fetch;

    if (!this.fetchImpl) {
      throw new Error('HttpSearchStore requires a fetch implementation (Node 18+).');
    }
  }

  async exists(name: string): Promise<StoreResult<boolean>> {
    const reply = await this.request('HEAD', `/${encodeURIComponent(name)}`);
    if (!reply.ok) {
      return reply.failure.kind === 'not-found' ? ok(false) : reply;
    }
    return ok(true);
  }

  async isOpen(name: string): Promise<StoreResult<boolean>> {
    const listed = await this.catIndices(name);
    if (!listed.ok) return listed;
    const entry = listed.value.find((item) => item.index === name);
    if (!entry) return fail('not-found', `no such index: ${name}`, 404);
    return ok(entry.status === 'open');
  }

  async open(name: string): Promise<StoreResult<void>> {
    return this.voidRequest('POST', `/${encodeURIComponent(name)}/_open`);
  }

  async close(name: string): Promise<StoreResult<void>> {
    return this.voidRequest('POST', `/${encodeURIComponent(name)}/_close`);
  }

  async create(name: string, settings: IndexSettings): Promise<StoreResult<void>> {
    return this.voidRequest('PUT', `/${encodeURIComponent(name)}`, { settings });
  }

  async putSettings(name: string, settings: IndexSettings): Promise<StoreResult<void>> {
    return this.voidRequest('PUT', `/${encodeURIComponent(name)}/_settings`, settings);
  }

  async count(name: string): Promise<StoreResult<number>> {
    const reply = await this.request('GET', `/${encodeURIComponent(name)}/_count`);
    if (!reply.ok) return reply;
    return this.parse(CountSchema, reply.value, 'count', (body) => body.count);
  }

  async forceMerge(name: string): Promise<StoreResult<void>> {
    // merging can outlast any request timeout; only trigger it
    return this.voidRequest(
      'POST',
      `/${encodeURIComponent(name)}/_forcemerge?max_num_segments=1&wait_for_completion=false`,
    );
  }

  async migrateAsync(
    source: string,
    destination: string,
    options: MigrateOptions,
  ): Promise<StoreResult<string>> {
    const reply = await this.request('POST', '/_reindex?wait_for_completion=false', {
      conflicts: options.conflicts,
      source: { index: source },
      dest: { index: destination, version_type: options.versionType },
    });
    if (!reply.ok) return reply;
    return this.parse(ReindexSchema, reply.value, 'reindex', (body) => body.task);
  }

  async taskStatus(handle: string): Promise<StoreResult<TaskStatusData>> {
    const reply = await this.request('GET', `/_tasks/${encodeURIComponent(handle)}`);
    if (!reply.ok) {
      // the store answers 400 for a handle it cannot parse
      if (reply.failure.status === 400) {
        return fail('not-found', `unknown task handle ${handle}: ${reply.failure.message}`, 400);
      }
      return reply;
    }
    return this.parse(TaskSchema, reply.value, 'task status', (body) => ({
      completed: body.completed,
      runningTimeInNanos: body.task.running_time_in_nanos,
      total: body.task.status.total,
      created: body.task.status.created,
      updated: body.task.status.updated,
      deleted: body.task.status.deleted,
    }));
  }

  async listMatching(pattern: string): Promise<StoreResult<string[]>> {
    const listed = await this.catIndices(pattern);
    if (!listed.ok) {
      return listed.failure.kind === 'not-found' ? ok([]) : listed;
    }
    const names = listed.value.map((item) => item.index);
    return ok([...new Set(names)].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0)));
  }

  async getAll(collection: string): Promise<StoreResult<StoreDocument[]>> {
    const reply = await this.request('POST', `/${encodeURIComponent(collection)}/_search`, {
      size: this.maxDocuments,
      query: { match_all: {} },
    });
    if (!reply.ok) return reply;
    return this.parse(SearchSchema, reply.value, 'search', (body) =>
      body.hits.hits.map((hit) => hit._source),
    );
  }

  async put(collection: string, id: string, document: StoreDocument): Promise<StoreResult<void>> {
    return this.voidRequest(
      'PUT',
      `/${encodeURIComponent(collection)}/_doc/${encodeURIComponent(id)}?refresh=wait_for`,
      document,
    );
  }

  async delete(collection: string, id: string): Promise<StoreResult<void>> {
    return this.voidRequest(
      'DELETE',
      `/${encodeURIComponent(collection)}/_doc/${encodeURIComponent(id)}?refresh=wait_for`,
    );
  }

  private async catIndices(
    pattern: string,
  ): Promise<StoreResult<z.infer<typeof CatIndicesSchema>>> {
    const reply = await this.request(
      'GET',
      `/_cat/indices/${encodeURIComponent(pattern)}?format=json&h=index,status&expand_wildcards=all`,
    );
    if (!reply.ok) return reply;
    return this.parse(CatIndicesSchema, reply.value, 'cat indices', (body) => body);
  }

  private async voidRequest(
    method: HttpMethod,
    path: string,
    body?: unknown,
  ): Promise<StoreResult<void>> {
    const reply = await this.request(method, path, body);
    return reply.ok ? done() : reply;
  }

  private parse<S extends z.ZodType, T>(
    schema: S,
    reply: HttpReply,
    label: string,
    map: (body: z.infer<S>) => T,
  ): StoreResult<T> {
    const parsed = schema.safeParse(reply.body);
    if (!parsed.success) {
      return fail('rejected', `unexpected ${label} response`, reply.status);
    }
    return ok(map(parsed.data));
  }

  private nextHost(): string {
    const host = this.hosts[this.cursor % this.hosts.length];
    this.cursor = (this.cursor + 1) % this.hosts.length;
    return host;
  }

  private async request(
    method: HttpMethod,
    path: string,
    body?: unknown,
  ): Promise<StoreResult<HttpReply>> {
    const url = new URL(path, this.nextHost()).toString();
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);
    timeout.unref?.();

    try {
      const response = await this.fetchImpl(url, {
        method,
        headers: this.buildHeaders(body !== undefined),
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: controller.signal,
      });
      const text = method === 'HEAD' ? '' : await response.text();
      const parsedBody = parseJson(text);

      if (response.ok) {
        return ok({ status: response.status, body: parsedBody });
      }
      const reason = describeError(parsedBody, response.statusText);
      return fail(classifyStatus(response.status, reason.type), reason.message, response.status);
    } catch (error) {
      const message = controller.signal.aborted
        ? `${method} ${url} timed out after ${this.timeoutMs}ms`
        : `${method} ${url} failed: ${error instanceof Error ? error.message : String(error)}`;
      return fail('unavailable', message);
    } finally {
      clearTimeout(timeout);
    }
  }

  private buildHeaders(hasBody: boolean): Record<string, string> {
    const headers: Record<string, string> = { Accept: 'application/json' };
    if (hasBody) {
      headers['Content-Type'] = 'application/json';
    }
    if (this.auth.type === 'basic') {
      const token = Buffer.from(`${this.auth.username}:${this.auth.password}`).toString('base64');
      headers.Authorization = `Basic ${token}`;
    } else if (this.auth.type === 'api-key') {
      headers.Authorization = `ApiKey ${this.auth.apiKey}`;
    }
    return headers;
  }
}

function parseJson(text: string): unknown {
  if (text === '') return null;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

function describeError(body: unknown, statusText: string): { type?: string; message: string } {
  const parsed = ErrorBodySchema.safeParse(body);
  if (!parsed.success) {
    return { message: typeof body === 'string' && body !== '' ? body : statusText };
  }
  const { error } = parsed.data;
  if (typeof error === 'string') return { message: error };
  return { type: error.type, message: error.reason ?? error.type ?? statusText };
}

export function classifyStatus(status: number, errorType?: string): StoreFailureKind {
  if (status === 404) return 'not-found';
  if (status === 400 && errorType === 'index_closed_exception') return 'closed';
  if (status >= 500) return 'unavailable';
  return 'rejected';
}
