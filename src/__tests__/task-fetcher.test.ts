import { describe, it, expect, beforeEach } from 'vitest';
import { DEFAULT_COMPLETED_SINCE, TaskFetcherService } from '../services/asana/task-fetcher.service';
import { FakeTaskSource, asanaTask, noSleep } from './_helpers/fakes';

describe('TaskFetcherService', () => {
  let source: FakeTaskSource;
  let fetcher: TaskFetcherService;

  beforeEach(() => {
    source = new FakeTaskSource();
    fetcher = new TaskFetcherService(source, noSleep);
  });

  describe('selectProjects', () => {
    beforeEach(() => {
      source.addProject('p1', 'Alpha').addProject('p2', 'Beta').addProject('p3', 'Gamma Alpha');
    });

    it('filters by name substring', async () => {
      const projects = await fetcher.selectProjects({ projectFilter: 'Alpha' });
      expect(projects.map((p) => p.gid)).toEqual(['p1', 'p3']);
    });

    it('takes one batch of the list', async () => {
      const projects = await fetcher.selectProjects({ batchSize: 2, batchNumber: 1 });
      expect(projects.map((p) => p.gid)).toEqual(['p3']);
    });

    it('applies the filter before batching', async () => {
      const projects = await fetcher.selectProjects({ projectFilter: 'Alpha', batchSize: 1, batchNumber: 1 });
      expect(projects.map((p) => p.gid)).toEqual(['p3']);
    });
  });

  describe('fetchCompletedTasks', () => {
    it('maps completed tasks and subtasks to records', async () => {
      source.addProject('p1', ' Alpha ', [
        asanaTask({
          gid: 't1',
          custom_fields: [
            { name: 'estimated_time', number_value: 2 },
            { name: 'time_achievement_rate', number_value: 0.5 },
          ],
          tags: [{ name: 'b' }, { name: 'a' }, { name: 'b' }, { name: null }],
        }),
        asanaTask({ gid: 't2', completed: false, completed_at: null, num_subtasks: 1 }),
      ]);
      source.subtasks.set('t2', [asanaTask({ gid: 's1', assignee: null })]);

      const result = await fetcher.fetchCompletedTasks(source.projects[0]);

      expect(result.records.map((r) => [r.task_id, r.parent_task_id])).toEqual([
        ['t1', null],
        ['s1', 't2'],
      ]);
      expect(result.records[0]).toMatchObject({
        project_id: 'p1',
        project_name: 'Alpha',
        assignee_id: 'u1',
        assignee_name: 'Sato',
        estimated_time: 2,
        time_achievement_rate: 0.5,
        actual_time: 1,
        tags: ['a', 'b'],
        completed_at: new Date('2024-03-15T03:00:00.000Z'),
      });
      expect(result.records[1]).toMatchObject({ assignee_id: null, assignee_name: null, actual_time: null });
      expect(result.unestimated).toBe(1);
    });

    it('queries from the default start date unless told otherwise', async () => {
      source.addProject('p1', 'Alpha');
      await fetcher.fetchCompletedTasks(source.projects[0]);
      await fetcher.fetchCompletedTasks(source.projects[0], { completedSince: '2024-01-01T00:00:00.000Z' });
      await fetcher.fetchCompletedTasks(source.projects[0], { modifiedSince: '2024-02-01T00:00:00.000Z' });

      expect(source.taskCalls.map((call) => call.options)).toEqual([
        { completedSince: DEFAULT_COMPLETED_SINCE },
        { completedSince: '2024-01-01T00:00:00.000Z' },
        { modifiedSince: '2024-02-01T00:00:00.000Z' },
      ]);
    });

    it('rejects a task whose completion time cannot be read', async () => {
      source.addProject('p1', 'Alpha', [asanaTask({ gid: 't1', completed_at: 'yesterday-ish' }), asanaTask({ gid: 't2' })]);

      const result = await fetcher.fetchCompletedTasks(source.projects[0]);

      expect(result.records.map((r) => r.task_id)).toEqual(['t2']);
      expect(result.rejected).toEqual([
        { gid: 't1', reason: "Task t1 has an unreadable completed_at 'yesterday-ish'" },
      ]);
    });

    it('counts custom field warnings', async () => {
      source.addProject('p1', 'Alpha', [
        asanaTask({ gid: 't1', custom_fields: [{ name: '時間達成率', text_value: 'n/a' }] }),
      ]);

      const result = await fetcher.fetchCompletedTasks(source.projects[0]);

      expect(result.parseWarnings).toBe(1);
      expect(result.records).toHaveLength(1);
    });
  });

  describe('fetchOpenTasks', () => {
    it('lists open tasks and open subtasks', async () => {
      source.addProject('p1', 'Alpha', [
        asanaTask({ gid: 't1', completed: false, completed_at: null, due_on: '2024-03-10', num_subtasks: 2 }),
        asanaTask({ gid: 't2' }),
      ]);
      source.subtasks.set('t1', [
        asanaTask({ gid: 's1', completed: false, completed_at: null, assignee: { gid: 'u2', name: 'Kato' } }),
        asanaTask({ gid: 's2' }),
      ]);

      const open = await fetcher.fetchOpenTasks(source.projects[0]);

      expect(open).toEqual([
        { task_id: 't1', task_name: 'Task t1', assignee_name: 'Sato', due_on: '2024-03-10' },
        { task_id: 's1', task_name: 'Task s1', assignee_name: 'Kato', due_on: null },
      ]);
      expect(source.taskCalls[0].options).toEqual({ completedSince: 'now' });
    });
  });
});
