import { type Mock, beforeEach, describe, expect, it, vi } from 'vitest';

import { HttpSearchStore, classifyStatus } from '../src/adapters/store/http.js';
import { DEFAULT_MIGRATE_OPTIONS } from '../src/store.js';

const jsonResponse = (body: unknown, status = 200) =>
  new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });

const requestAt = (fetchMock: Mock<typeof fetch>, index: number) => {
  const call = fetchMock.mock.calls[index];
  if (!call) throw new Error(`no fetch call #${index}`);
  const [url, init] = call;
  return { url: String(url), init: init ?? {} };
};

describe('HttpSearchStore', () => {
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(() => {
    fetchMock.mockReset();
  });

  const createStore = (hosts = ['http://search-1:9200']) =>
    new HttpSearchStore({
      hosts,
      auth: { type: 'basic', username: 'migrator', password: 'test-secret' },
      fetchImplementation: fetchMock,
    });

  it('rotates requests across hosts and sends basic auth', async () => {
    fetchMock
      .mockResolvedValueOnce(jsonResponse({ count: 3 }))
      .mockResolvedValueOnce(jsonResponse({ count: 4 }));
    const store = createStore(['http://search-1:9200', 'http://search-2:9200/']);

    await expect(store.count('logs-2020')).resolves.toEqual({ ok: true, value: 3 });
    await expect(store.count('logs-2021')).resolves.toEqual({ ok: true, value: 4 });

    expect(requestAt(fetchMock, 0).url).toBe('http://search-1:9200/logs-2020/_count');
    expect(requestAt(fetchMock, 1).url).toBe('http://search-2:9200/logs-2021/_count');
    const headers = new Headers(requestAt(fetchMock, 0).init.headers);
    expect(headers.get('Authorization')).toBe(
      `Basic ${Buffer.from('migrator:test-secret').toString('base64')}`,
    );
  });

  it('maps a closed index to the closed failure kind', async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse(
        { error: { type: 'index_closed_exception', reason: 'closed' }, status: 400 },
        400,
      ),
    );

    await expect(createStore().count('logs-2020')).resolves.toEqual({
      ok: false,
      failure: { kind: 'closed', message: 'closed', status: 400 },
    });
  });

  it('answers exists from the HEAD status', async () => {
    fetchMock
      .mockResolvedValueOnce(new Response(null, { status: 200 }))
      .mockResolvedValueOnce(new Response(null, { status: 404 }));
    const store = createStore();

    await expect(store.exists('logs-all')).resolves.toEqual({ ok: true, value: true });
    await expect(store.exists('missing')).resolves.toEqual({ ok: true, value: false });
    expect(requestAt(fetchMock, 0).init.method).toBe('HEAD');
  });

  it('reads the open state from the index listing', async () => {
    fetchMock
      .mockResolvedValueOnce(jsonResponse([{ index: 'logs-2020', status: 'close' }]))
      .mockResolvedValueOnce(jsonResponse([{ index: 'logs-2021', status: 'open' }]))
      .mockResolvedValueOnce(jsonResponse([]));
    const store = createStore();

    await expect(store.isOpen('logs-2020')).resolves.toEqual({ ok: true, value: false });
    await expect(store.isOpen('logs-2021')).resolves.toEqual({ ok: true, value: true });
    await expect(store.isOpen('logs-2099')).resolves.toEqual({
      ok: false,
      failure: { kind: 'not-found', message: 'no such index: logs-2099', status: 404 },
    });
    expect(requestAt(fetchMock, 0).url).toBe(
      'http://search-1:9200/_cat/indices/logs-2020?format=json&h=index,status&expand_wildcards=all',
    );
  });

  it('starts an asynchronous migrate and returns the task handle', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ task: 'node-1:42' }));

    const result = await createStore().migrateAsync('logs-2020', 'logs-all', DEFAULT_MIGRATE_OPTIONS);

    expect(result).toEqual({ ok: true, value: 'node-1:42' });
    const { url, init } = requestAt(fetchMock, 0);
    expect(url).toBe('http://search-1:9200/_reindex?wait_for_completion=false');
    expect(init.method).toBe('POST');
    expect(JSON.parse(String(init.body))).toEqual({
      conflicts: 'proceed',
      source: { index: 'logs-2020' },
      dest: { index: 'logs-all', version_type: 'external' },
    });
  });

  it('reads task status fields', async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({
        completed: false,
        task: {
          running_time_in_nanos: 3_000_000_000,
          status: { total: 100, created: 40, updated: 5, deleted: 0 },
        },
      }),
    );

    await expect(createStore().taskStatus('node-1:42')).resolves.toEqual({
      ok: true,
      value: {
        completed: false,
        runningTimeInNanos: 3_000_000_000,
        total: 100,
        created: 40,
        updated: 5,
        deleted: 0,
      },
    });
    expect(requestAt(fetchMock, 0).url).toBe('http://search-1:9200/_tasks/node-1%3A42');
  });

  it('reports a task handle the store cannot parse as not found', async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({ error: { type: 'illegal_argument_exception', reason: 'malformed task id' } }, 400),
    );

    const result = await createStore().taskStatus('garbage');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.failure.kind).toBe('not-found');
  });

  it('lists matching names sorted and treats a missing pattern as empty', async () => {
    fetchMock
      .mockResolvedValueOnce(
        jsonResponse([
          { index: 'logs-2021', status: 'open' },
          { index: 'logs-2020', status: 'close' },
        ]),
      )
      .mockResolvedValueOnce(jsonResponse({ error: { type: 'index_not_found_exception' } }, 404));
    const store = createStore();

    await expect(store.listMatching('logs-*')).resolves.toEqual({
      ok: true,
      value: ['logs-2020', 'logs-2021'],
    });
    await expect(store.listMatching('nothing-*')).resolves.toEqual({ ok: true, value: [] });
    expect(requestAt(fetchMock, 0).url).toBe(
      'http://search-1:9200/_cat/indices/logs-*?format=json&h=index,status&expand_wildcards=all',
    );
  });

  it('returns document sources from getAll', async () => {
    fetchMock.mockResolvedValueOnce(
      jsonResponse({ hits: { hits: [{ _id: 'job-1', _source: { id: 'job-1', status: 'OK' } }] } }),
    );

    await expect(createStore().getAll('.reindexer-checkpoints')).resolves.toEqual({
      ok: true,
      value: [{ id: 'job-1', status: 'OK' }],
    });
  });

  it('reports server errors and network failures as unavailable', async () => {
    fetchMock
      .mockResolvedValueOnce(jsonResponse({ error: 'overloaded' }, 503))
      .mockRejectedValueOnce(new Error('ECONNREFUSED'));
    const store = createStore();

    await expect(store.open('logs-2020')).resolves.toEqual({
      ok: false,
      failure: { kind: 'unavailable', message: 'overloaded', status: 503 },
    });
    const failed = await store.close('logs-2020');
    expect(failed).toEqual({
      ok: false,
      failure: {
        kind: 'unavailable',
        message: 'POST http://search-1:9200/logs-2020/_close failed: ECONNREFUSED',
      },
    });
  });
});

describe('classifyStatus', () => {
  it('maps HTTP statuses to failure kinds', () => {
    expect(classifyStatus(404)).toBe('not-found');
    expect(classifyStatus(400, 'index_closed_exception')).toBe('closed');
    expect(classifyStatus(400, 'mapper_parsing_exception')).toBe('rejected');
    expect(classifyStatus(409)).toBe('rejected');
    expect(classifyStatus(502)).toBe('unavailable');
  });
});
