import { describe, it, expect, beforeEach, vi } from 'vitest';
import { AsanaClient, FetchLike } from '../services/asana/asana.client';
import { TaskFetcherService } from '../services/asana/task-fetcher.service';
import { IngestionService } from '../services/ingestion/ingestion.service';
import { AuthError, SourceApiError } from '../utils/errors.util';
import { isTransientSourceError } from '../utils/retry.util';
import { FakeTaskSource, MemoryTaskStore, asanaTask, fastPolicy, noSleep } from './_helpers/fakes';

const estimated = (hours: number, rate: number) => [
  { name: 'estimated_time', number_value: hours },
  { name: 'time_achievement_rate', number_value: rate },
];

describe('IngestionService', () => {
  let source: FakeTaskSource;
  let store: MemoryTaskStore;
  let ingestion: IngestionService;

  beforeEach(() => {
    source = new FakeTaskSource();
    store = new MemoryTaskStore();
    let tick = 0;
    store.now = () => new Date(Date.UTC(2024, 3, 1, 0, 0, tick++));

    const fetcher = new TaskFetcherService(source, noSleep);
    ingestion = new IngestionService(fetcher, store);

    source.addProject('p1', 'Alpha', [
      asanaTask({ gid: 't1', custom_fields: estimated(2, 0.5) }),
      asanaTask({ gid: 't2' }),
      asanaTask({ gid: 't3', completed: false, completed_at: null, num_subtasks: 1 }),
    ]);
    source.subtasks.set('t3', [asanaTask({ gid: 's1', custom_fields: estimated(1, 1) })]);
  });

  it('inserts every completed task on the first run', async () => {
    const summary = await ingestion.run();

    expect(summary.status).toBe('success');
    expect(summary.projects).toEqual({ total: 1, processed: 1, skipped: 0 });
    expect(summary.tasks).toEqual({ processed: 3, inserted: 3, updated: 0, unchanged: 0, failed: 0, unestimated: 1 });
    expect([...store.rows.keys()].sort()).toEqual(['s1', 't1', 't2']);
    expect(store.rows.get('s1')?.parent_task_id).toBe('t3');
  });

  it('is idempotent: a second run changes nothing', async () => {
    await ingestion.run();
    const before = new Map([...store.rows].map(([id, row]) => [id, row.inserted_at.getTime()]));

    const summary = await ingestion.run();

    expect(summary.tasks).toMatchObject({ processed: 3, inserted: 0, updated: 0, unchanged: 3 });
    for (const [id, row] of store.rows) {
      expect(row.inserted_at.getTime()).toBe(before.get(id));
    }
  });

  it('updates only the tasks whose tracked fields changed', async () => {
    await ingestion.run();
    const firstWrite = store.rows.get('t1')?.inserted_at.getTime();

    source.tasks.set('p1', [
      asanaTask({ gid: 't1', custom_fields: estimated(2, 0.75) }),
      asanaTask({ gid: 't2' }),
    ]);
    const summary = await ingestion.run();

    expect(summary.tasks).toMatchObject({ inserted: 0, updated: 1, unchanged: 1 });
    expect(store.rows.get('t1')?.actual_time).toBe(1.5);
    expect(store.rows.get('t1')?.inserted_at.getTime()).toBeGreaterThan(firstWrite ?? Infinity);
  });

  it('skips a project the source keeps failing on and reports partial', async () => {
    source.addProject('p2', 'Beta', [asanaTask({ gid: 'b1' })]);
    source.failures.set('p2', [new SourceApiError('Asana 503 on /projects/p2/tasks', { status: 503, transient: true })]);

    const summary = await ingestion.run();

    expect(summary.status).toBe('partial');
    expect(summary.projects).toEqual({ total: 2, processed: 1, skipped: 1 });
    expect(summary.skippedProjects).toEqual([
      { projectId: 'p2', projectName: 'Beta', error: 'Asana 503 on /projects/p2/tasks' },
    ]);
    expect(store.rows.has('b1')).toBe(false);
    expect(store.rows.size).toBe(3);
  });

  it('counts unreadable tasks as failed and keeps going', async () => {
    source.tasks.set('p1', [asanaTask({ gid: 't1', completed_at: 'not-a-date' }), asanaTask({ gid: 't2' })]);

    const summary = await ingestion.run();

    expect(summary.status).toBe('partial');
    expect(summary.tasks).toMatchObject({ processed: 1, inserted: 1, failed: 1 });
  });

  it('fails the run on a store error and names the task', async () => {
    store.failOn.add('t2');

    const summary = await ingestion.run();

    expect(summary.status).toBe('failure');
    expect(summary.error).toEqual({
      kind: 'StoreWriteError',
      message: 'Failed to upsert task t2: connection terminated',
      taskId: 't2',
    });
    // Earlier upserts stay committed
    expect(store.rows.has('t1')).toBe(true);
  });

  it('fails the run on an auth error', async () => {
    source.failures.set('p1', [new AuthError('Asana 401 on /projects/p1/tasks: Not Authorized')]);

    const summary = await ingestion.run();

    expect(summary.status).toBe('failure');
    expect(summary.error?.kind).toBe('AuthError');
    expect(store.rows.size).toBe(0);
  });

  it('asks for tasks modified since the previous complete run began', async () => {
    const clock = vi.fn<() => Date>()
      .mockReturnValueOnce(new Date('2024-04-01T03:00:00.000Z'))
      .mockReturnValueOnce(new Date('2024-04-02T03:00:00.000Z'));
    ingestion = new IngestionService(new TaskFetcherService(source, noSleep), store, clock);

    await ingestion.run();
    await ingestion.run({ incremental: true });

    // Rows were written after the first run began; the watermark is still its start time
    expect(source.taskCalls[source.taskCalls.length - 1].options).toEqual({
      modifiedSince: '2024-04-01T03:00:00.000Z',
    });
    expect(store.fetchRuns).toEqual([
      new Date('2024-04-01T03:00:00.000Z'),
      new Date('2024-04-02T03:00:00.000Z'),
    ]);
  });

  it('does not move the watermark after a partial or filtered run', async () => {
    source.addProject('p2', 'Beta', [asanaTask({ gid: 't9' })]);
    source.failures.set('p2', [new SourceApiError('Asana request failed with 503', { status: 503, transient: true })]);

    const partial = await ingestion.run();
    const filtered = await ingestion.run({ projectFilter: 'Alpha' });

    expect(partial.status).toBe('partial');
    expect(filtered.status).toBe('success');
    expect(store.fetchRuns).toEqual([]);
  });

  it('runs a full fetch in incremental mode when no complete run is recorded', async () => {
    await ingestion.run({ incremental: true, completedSince: '2024-01-01T00:00:00.000Z' });

    expect(source.taskCalls[0].options).toEqual({ completedSince: '2024-01-01T00:00:00.000Z' });
  });

  it('keeps a successful status when the watermark cannot be recorded', async () => {
    store.recordFetchRun = async () => {
      throw new Error('connection terminated');
    };

    const summary = await ingestion.run();

    expect(summary.status).toBe('success');
  });
});

describe('IngestionService over the Asana client', () => {
  function json(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
    return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json', ...headers } });
  }

  function brokenBody(): Response {
    const body = new ReadableStream<Uint8Array>({
      start(controller) {
        controller.error(new TypeError('terminated'));
      },
    });
    return new Response(body, { status: 200, headers: { 'Content-Type': 'application/json' } });
  }

  let rateLimited: boolean;
  const fetchImpl = vi.fn<FetchLike>();

  beforeEach(() => {
    rateLimited = false;
    fetchImpl.mockReset();
    fetchImpl.mockImplementation(async (raw) => {
      const url = new URL(raw);
      const offset = url.searchParams.get('offset');

      if (url.pathname.endsWith('/workspaces/ws1/projects')) {
        return json({ data: [{ gid: 'p1', name: 'Alpha' }, { gid: 'p2', name: 'Beta' }], next_page: null });
      }
      if (url.pathname.endsWith('/projects/p1/tasks') && offset === null) {
        return json({ data: [asanaTask({ gid: 't1' })], next_page: { offset: 'o2' } });
      }
      if (url.pathname.endsWith('/projects/p1/tasks') && offset === 'o2') {
        if (!rateLimited) {
          rateLimited = true;
          return json({ errors: [{ message: 'Rate limited' }] }, 429, { 'Retry-After': '1' });
        }
        return json({ data: [asanaTask({ gid: 't2' })], next_page: null });
      }
      return brokenBody();
    });
  });

  function ingestion(store: MemoryTaskStore): IngestionService {
    const client = new AsanaClient({
      accessToken: 'test-secret',
      workspaceId: 'ws1',
      baseUrl: 'https://asana.test/api/1.0',
      fetchImpl,
      retryPolicy: fastPolicy(isTransientSourceError),
      retryHooks: noSleep,
    });
    return new IngestionService(new TaskFetcherService(client, noSleep), store);
  }

  function requestsFor(pathname: string, offset: string | null): number {
    return fetchImpl.mock.calls.filter(([raw]) => {
      const url = new URL(raw);
      return url.pathname.endsWith(pathname) && url.searchParams.get('offset') === offset;
    }).length;
  }

  it('resumes a rate-limited listing at the page that failed', async () => {
    const store = new MemoryTaskStore();

    await ingestion(store).run();

    expect([...store.rows.keys()].sort()).toEqual(['t1', 't2']);
    expect(requestsFor('/projects/p1/tasks', null)).toBe(1);
    expect(requestsFor('/projects/p1/tasks', 'o2')).toBe(2);
  });

  it('skips a project whose response body cannot be read and keeps the others', async () => {
    const store = new MemoryTaskStore();

    const summary = await ingestion(store).run();

    expect(summary.status).toBe('partial');
    expect(summary.projects).toEqual({ total: 2, processed: 1, skipped: 1 });
    expect(summary.skippedProjects.map((p) => p.projectId)).toEqual(['p2']);
    expect(summary.skippedProjects[0].error).toMatch(/^Unreadable response body from \/projects\/p2\/tasks: /);
    expect(requestsFor('/projects/p2/tasks', null)).toBe(3);
  });
});
