import { describe, it, expect, vi, beforeEach } from 'vitest';
import { TaskRecordRepository, diffTrackedFields } from '../repositories/task-record.repository';
import { OpenTaskSnapshotRepository } from '../repositories/open-task-snapshot.repository';
import { StoreWriteError } from '../utils/errors.util';
import { taskRecord } from './_helpers/fakes';

describe('diffTrackedFields', () => {
  const base = taskRecord({ task_id: 't1', tags: ['a', 'b'] });

  it('finds no difference between equal records', () => {
    const copy = { ...base, completed_at: new Date(base.completed_at.getTime()), tags: ['a', 'b'] };
    expect(diffTrackedFields(base, copy)).toEqual([]);
  });

  it('names each changed field', () => {
    const changed = { ...base, task_name: 'Renamed', actual_time: null, tags: ['b', 'a'] };
    expect(diffTrackedFields(base, changed)).toEqual(['task_name', 'actual_time', 'tags']);
  });

  it('sees a moved completion time', () => {
    const moved = { ...base, completed_at: new Date('2024-03-16T03:00:00.000Z') };
    expect(diffTrackedFields(base, moved)).toEqual(['completed_at']);
  });
});

describe('TaskRecordRepository', () => {
  const query = vi.fn();
  const repository = new TaskRecordRepository({ query });
  const record = taskRecord({ task_id: 't1' });

  beforeEach(() => {
    query.mockReset();
  });

  it('inserts a task it has not seen', async () => {
    query.mockResolvedValueOnce({ rows: [] }).mockResolvedValueOnce({ rows: [{ inserted: true }] });

    await expect(repository.upsert(record)).resolves.toBe('inserted');

    const [sql, values] = query.mock.calls[1];
    expect(sql).toContain('ON CONFLICT (task_id) DO UPDATE SET');
    expect(sql).toContain('IS DISTINCT FROM');
    expect(values).toHaveLength(13);
    expect(values[0]).toBe('t1');
    expect(values[12]).toEqual([]);
  });

  it('leaves an identical row alone without writing', async () => {
    query.mockResolvedValueOnce({ rows: [{ ...record, inserted_at: new Date('2024-04-01T00:00:00.000Z') }] });

    await expect(repository.upsert(record)).resolves.toBe('unchanged');
    expect(query).toHaveBeenCalledTimes(1);
  });

  it('updates a row whose tracked fields changed', async () => {
    query
      .mockResolvedValueOnce({ rows: [{ ...record, actual_time: 5, inserted_at: new Date('2024-04-01T00:00:00.000Z') }] })
      .mockResolvedValueOnce({ rows: [{ inserted: false }] });

    await expect(repository.upsert(record)).resolves.toBe('updated');
  });

  it('reports unchanged when a concurrent run already wrote the same values', async () => {
    query.mockResolvedValueOnce({ rows: [] }).mockResolvedValueOnce({ rows: [] });

    await expect(repository.upsert(record)).resolves.toBe('unchanged');
  });

  it('wraps database failures with the task id', async () => {
    query.mockRejectedValueOnce(new Error('connection terminated'));

    const error = await repository.upsert(record).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(StoreWriteError);
    expect(error).toMatchObject({ taskId: 't1', message: 'Failed to upsert task t1: connection terminated' });
  });

  it('lists completed tasks inside a half-open range', async () => {
    query.mockResolvedValueOnce({ rows: [] });
    const from = new Date('2024-02-29T00:00:00.000Z');
    const to = new Date('2024-04-02T00:00:00.000Z');

    await repository.listCompleted({ from, to });

    const [sql, values] = query.mock.calls[0];
    expect(sql).toContain('WHERE completed_at >= $1 AND completed_at < $2');
    expect(values).toEqual([from, to]);
  });

  it('returns null as the watermark when no fetch run is recorded', async () => {
    query.mockResolvedValueOnce({ rows: [{ latest: null }] });

    await expect(repository.lastFetchStartedAt()).resolves.toBeNull();
    expect(query.mock.calls[0][0]).toBe('SELECT MAX(started_at) AS latest FROM fetch_runs');
  });

  it('records the start time of a fetch run', async () => {
    query.mockResolvedValueOnce({ rows: [] });
    const startedAt = new Date('2024-04-01T03:00:00.000Z');

    await repository.recordFetchRun(startedAt);

    expect(query).toHaveBeenCalledWith('INSERT INTO fetch_runs (started_at) VALUES ($1)', [startedAt]);
  });
});

describe('OpenTaskSnapshotRepository', () => {
  it('inserts every row in one statement', async () => {
    const query = vi.fn().mockResolvedValue({ rowCount: 2 });
    const repository = new OpenTaskSnapshotRepository({ query });
    const row = {
      snapshot_date: '2024-03-15',
      task_id: 't1',
      task_name: 'Draft',
      project_name: 'Alpha',
      assignee_name: null,
      due_date: null,
      status: 'open' as const,
    };

    const written = await repository.appendMany([row, { ...row, task_id: 't2' }]);

    expect(written).toBe(2);
    expect(query).toHaveBeenCalledTimes(1);
    const [sql, values] = query.mock.calls[0];
    expect(sql).toContain('VALUES ($1, $2, $3, $4, $5, $6, $7), ($8, $9, $10, $11, $12, $13, $14)');
    expect(values).toHaveLength(14);
    expect(values[8]).toBe('t2');
  });

  it('does nothing for an empty batch', async () => {
    const query = vi.fn();
    const repository = new OpenTaskSnapshotRepository({ query });

    await expect(repository.appendMany([])).resolves.toBe(0);
    expect(query).not.toHaveBeenCalled();
  });
});
