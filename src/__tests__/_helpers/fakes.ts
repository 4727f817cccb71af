import { AsanaProject, AsanaTask, TaskListOptions, TaskPage, TaskSource } from '../../types/asana.types';
import { CellValue, SheetsGateway } from '../../types/report.types';
import {
  CompletedRange,
  CreateTaskRecordInput,
  OpenTaskSnapshot,
  SnapshotStore,
  TaskRecord,
  TaskStore,
  UpsertOutcome,
} from '../../types/task.types';
import { diffTrackedFields } from '../../repositories/task-record.repository';
import { StoreWriteError } from '../../utils/errors.util';
import { RetryHooks, RetryPolicy, createRetryPolicy } from '../../utils/retry.util';

export const noSleep: RetryHooks = { sleep: async () => undefined };

export function fastPolicy(isRetryable: (error: unknown) => boolean, maxAttempts = 3): RetryPolicy {
  return createRetryPolicy(isRetryable, { maxAttempts, baseDelayMs: 1, maxDelayMs: 5 });
}

export function asanaTask(overrides: Partial<AsanaTask> & { gid: string }): AsanaTask {
  return {
    name: `Task ${overrides.gid}`,
    completed: true,
    completed_at: '2024-03-15T03:00:00.000Z',
    assignee: { gid: 'u1', name: 'Sato' },
    num_subtasks: 0,
    custom_fields: [],
    tags: [],
    ...overrides,
  };
}

export function taskRecord(overrides: Partial<CreateTaskRecordInput> & { task_id: string }): CreateTaskRecordInput {
  return {
    task_name: `Task ${overrides.task_id}`,
    parent_task_id: null,
    project_id: 'p1',
    project_name: 'Alpha',
    assignee_id: 'u1',
    assignee_name: 'Sato',
    completed_at: new Date('2024-03-15T03:00:00.000Z'),
    estimated_time: 2,
    time_achievement_rate: 1,
    actual_time_raw: null,
    actual_time: 2,
    tags: [],
    ...overrides,
  };
}

/**
 * In-process TaskStore with the same change detection as the PostgreSQL repository.
 */
export class MemoryTaskStore implements TaskStore {
  readonly rows = new Map<string, TaskRecord>();
  readonly failOn = new Set<string>();
  now: () => Date = () => new Date();

  async upsert(record: CreateTaskRecordInput): Promise<UpsertOutcome> {
    if (this.failOn.has(record.task_id)) {
      throw new StoreWriteError(record.task_id, new Error('connection terminated'));
    }

    const existing = this.rows.get(record.task_id);
    if (existing && diffTrackedFields(existing, record).length === 0) return 'unchanged';

    this.rows.set(record.task_id, { ...record, tags: [...record.tags], inserted_at: this.now() });
    return existing ? 'updated' : 'inserted';
  }

  async listCompleted(range: CompletedRange = {}): Promise<TaskRecord[]> {
    return [...this.rows.values()]
      .filter((row) => !range.from || row.completed_at >= range.from)
      .filter((row) => !range.to || row.completed_at < range.to)
      .sort((a, b) => a.completed_at.getTime() - b.completed_at.getTime() || (a.task_id < b.task_id ? -1 : 1));
  }

  readonly fetchRuns: Date[] = [];

  async lastFetchStartedAt(): Promise<Date | null> {
    let latest: Date | null = null;
    for (const startedAt of this.fetchRuns) {
      if (!latest || startedAt > latest) latest = startedAt;
    }
    return latest;
  }

  async recordFetchRun(startedAt: Date): Promise<void> {
    this.fetchRuns.push(startedAt);
  }
}

export class MemorySnapshotStore implements SnapshotStore {
  readonly rows: OpenTaskSnapshot[] = [];

  async appendMany(rows: OpenTaskSnapshot[]): Promise<number> {
    this.rows.push(...rows);
    return rows.length;
  }
}

/**
 * Scripted TaskSource. `failures` maps a project gid to the errors its task listing throws, in order.
 */
export class FakeTaskSource implements TaskSource {
  projects: AsanaProject[] = [];
  readonly tasks = new Map<string, AsanaTask[]>();
  readonly subtasks = new Map<string, AsanaTask[]>();
  readonly failures = new Map<string, Error[]>();
  readonly taskCalls: Array<{ projectGid: string; options: TaskListOptions }> = [];

  addProject(gid: string, name: string, tasks: AsanaTask[] = []): this {
    this.projects.push({ gid, name, archived: false });
    this.tasks.set(gid, tasks);
    return this;
  }

  async listProjects(): Promise<AsanaProject[]> {
    return [...this.projects];
  }

  async listProjectTasks(projectGid: string, options: TaskListOptions): Promise<TaskPage> {
    this.taskCalls.push({ projectGid, options });
    const pending = this.failures.get(projectGid);
    const failure = pending?.shift();
    if (failure) throw failure;

    const all = this.tasks.get(projectGid) ?? [];
    const tasks = options.completedSince === 'now' ? all.filter((task) => !task.completed) : all;
    return { tasks, rejected: [] };
  }

  async listSubtasks(taskGid: string): Promise<TaskPage> {
    return { tasks: this.subtasks.get(taskGid) ?? [], rejected: [] };
  }
}

/**
 * Spreadsheet double. Cells are kept per tab as a sparse row/column grid.
 * `failWrites(range)` returns an error to throw for a write, or null.
 */
export class FakeSheetsGateway implements SheetsGateway {
  readonly tabs = new Map<string, Map<string, CellValue>>();
  readonly calls: string[] = [];
  failWrites: (range: string) => Error | null = () => null;

  async listTabs(): Promise<string[]> {
    this.calls.push('listTabs');
    return [...this.tabs.keys()];
  }

  async addTab(title: string): Promise<void> {
    this.calls.push(`addTab ${title}`);
    if (this.tabs.has(title)) throw new Error(`A sheet with the name "${title}" already exists`);
    this.tabs.set(title, new Map());
  }

  async clearRange(range: string): Promise<void> {
    this.calls.push(`clear ${range}`);
    const { tab, startCol, endCol } = parseRange(range);
    const cells = this.sheet(tab);
    for (const key of [...cells.keys()]) {
      const col = key.split(':')[1];
      if (col >= startCol && col <= endCol) cells.delete(key);
    }
  }

  async writeValues(range: string, values: CellValue[][]): Promise<number> {
    this.calls.push(`write ${range}`);
    const failure = this.failWrites(range);
    if (failure) throw failure;

    const { tab, startCol } = parseRange(range);
    const cells = this.sheet(tab);
    let written = 0;
    values.forEach((row, r) => {
      row.forEach((value, c) => {
        cells.set(`${r + 1}:${String.fromCharCode(startCol.charCodeAt(0) + c)}`, value);
        written++;
      });
    });
    return written;
  }

  /** Rows of one column block, top to bottom, until the first empty row */
  block(tab: string, startCol: string, width: number): CellValue[][] {
    const cells = this.tabs.get(tab) ?? new Map<string, CellValue>();
    const rows: CellValue[][] = [];
    for (let r = 1; cells.has(`${r}:${startCol}`); r++) {
      const row: CellValue[] = [];
      for (let c = 0; c < width; c++) {
        const value = cells.get(`${r}:${String.fromCharCode(startCol.charCodeAt(0) + c)}`);
        if (value !== undefined) row.push(value);
      }
      rows.push(row);
    }
    return rows;
  }

  private sheet(tab: string): Map<string, CellValue> {
    const cells = this.tabs.get(tab);
    if (!cells) throw new Error(`Unable to parse range: ${tab}`);
    return cells;
  }
}

function parseRange(range: string): { tab: string; startCol: string; endCol: string } {
  const match = /^'((?:[^']|'')+)'!([A-Z])\d*:([A-Z])\d*$/.exec(range);
  if (!match) throw new Error(`Unexpected range ${range}`);
  return { tab: match[1].replace(/''/g, "'"), startCol: match[2], endCol: match[3] };
}
