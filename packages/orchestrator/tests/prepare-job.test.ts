import { describe, expect, it, vi } from 'vitest';

import { JobAlreadyExistsError } from '@reindexer/contracts';

import { CheckpointStore, DEFAULT_CHECKPOINT_COLLECTION } from '../src/checkpoint-store.js';
import type { PipelineLogEvent } from '../src/observability.js';
import { type ConfirmFn, prepareJob } from '../src/prepare-job.js';
import { jobKeyOf } from '../src/segment-planner.js';
import { MemoryStore } from './support/memory-store.js';

const NOW = new Date('2026-03-01T12:00:00.000Z');

const setup = () => {
  const store = new MemoryStore()
    .seed('logs-2021', { documents: 5 })
    .seed('logs-2020', { documents: 3 })
    .seed('logs-all');
  const checkpoints = new CheckpointStore(store, {
    identity: () => ({ host: 'test-host', processId: 42 }),
    now: () => NOW,
    newId: () => 'job-1',
  });
  const events: PipelineLogEvent[] = [];
  const confirm = vi.fn<ConfirmFn>().mockResolvedValue(true);
  const base = {
    store,
    checkpoints,
    sourcePattern: 'logs-*',
    destination: 'logs-all',
    confirm,
    logger: { log: (event: PipelineLogEvent) => events.push(event) },
    now: () => NOW,
  };
  return { store, checkpoints, events, confirm, base };
};

describe('prepareJob', () => {
  it('plans a new job over the matching segments, excluding the destination', async () => {
    const { store, confirm, base } = setup();

    const prepared = await prepareJob(base);

    expect(prepared.kind).toBe('ready');
    if (prepared.kind !== 'ready') return;
    expect(prepared.resumed).toBe(false);
    expect(prepared.checkpoint.sourceSegments).toEqual(['logs-2020', 'logs-2021']);
    expect(prepared.checkpoint.currentSegment).toBe('');
    expect(confirm).toHaveBeenCalledWith('Migrate 2 segment(s) matching "logs-*" into logs-all?');
    expect(store.collection(DEFAULT_CHECKPOINT_COLLECTION)).toBeDefined();
  });

  it('reports nothing to do when no segment matches', async () => {
    const { confirm, base } = setup();

    await expect(prepareJob({ ...base, sourcePattern: 'metrics-*' })).resolves.toEqual({
      kind: 'nothing-to-do',
      sourcePattern: 'metrics-*',
    });
    expect(confirm).not.toHaveBeenCalled();
  });

  it('refuses to start a second job with the same identity', async () => {
    const { store, checkpoints, base } = setup();
    await checkpoints.save(checkpoints.draft(jobKeyOf(['logs-2020', 'logs-2021'], 'logs-all')));
    const writesBefore = store.callsTo('put').length;

    await expect(prepareJob(base)).rejects.toThrow(JobAlreadyExistsError);
    await expect(prepareJob(base)).rejects.toThrow(/Re-run with --resume to continue it\.$/);
    expect(store.callsTo('put')).toHaveLength(writesBefore);
  });

  it('resumes the matching checkpoint and warns when it still looks active', async () => {
    const { checkpoints, events, confirm, base } = setup();
    await checkpoints.save({
      ...checkpoints.draft(jobKeyOf(['logs-2020', 'logs-2021'], 'logs-all')),
      currentSegment: 'logs-2020',
    });

    const prepared = await prepareJob({ ...base, resume: true });

    expect(prepared).toMatchObject({ kind: 'ready', resumed: true, checkpoint: { id: 'job-1' } });
    expect(confirm).toHaveBeenCalledWith('Resume migration into logs-all at logs-2021?');
    expect(events.map((event) => event.message)).toEqual(['checkpoint.possibly_active']);
  });

  it('starts a new job with a warning when asked to resume one that does not exist', async () => {
    const { events, base } = setup();

    const prepared = await prepareJob({ ...base, resume: true });

    expect(prepared).toMatchObject({ kind: 'ready', resumed: false });
    expect(events).toEqual([expect.objectContaining({ level: 'warn', message: 'checkpoint.resume_missing' })]);
  });

  it('returns declined when the caller says no', async () => {
    const { confirm, base } = setup();
    confirm.mockResolvedValueOnce(false);

    await expect(prepareJob(base)).resolves.toMatchObject({ kind: 'declined', resumed: false });
  });

  it('skips the question when auto-confirmed', async () => {
    const { confirm, base } = setup();

    await expect(prepareJob({ ...base, autoConfirm: true })).resolves.toMatchObject({ kind: 'ready' });
    expect(confirm).not.toHaveBeenCalled();
  });

  it('writes nothing on a dry run', async () => {
    const { store, confirm, base } = setup();

    const prepared = await prepareJob({ ...base, dryRun: true });

    expect(prepared.kind).toBe('dry-run');
    expect(confirm).not.toHaveBeenCalled();
    expect(store.callsTo('create')).toEqual([]);
    expect(store.callsTo('put')).toEqual([]);
    expect(store.collection(DEFAULT_CHECKPOINT_COLLECTION)).toBeUndefined();
  });
});
