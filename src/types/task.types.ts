export interface TaskRecord {
  task_id: string;
  task_name: string;
  parent_task_id: string | null;
  project_id: string;
  project_name: string;
  assignee_id: string | null;
  assignee_name: string | null;
  completed_at: Date;
  estimated_time: number | null;
  time_achievement_rate: number | null;
  actual_time_raw: number | null;
  actual_time: number | null;
  tags: string[];
  inserted_at: Date;
}

/**
 * Everything the fetcher produces for a completed task. `inserted_at` is owned by the store.
 */
export type CreateTaskRecordInput = Omit<TaskRecord, 'inserted_at'>;

/**
 * Columns compared on upsert; a difference in any of them refreshes `inserted_at`.
 */
export const TRACKED_FIELDS = [
  'task_name',
  'parent_task_id',
  'project_id',
  'project_name',
  'assignee_id',
  'assignee_name',
  'completed_at',
  'estimated_time',
  'time_achievement_rate',
  'actual_time_raw',
  'actual_time',
  'tags',
] as const satisfies ReadonlyArray<keyof CreateTaskRecordInput>;

export type TrackedField = (typeof TRACKED_FIELDS)[number];

export type UpsertOutcome = 'inserted' | 'updated' | 'unchanged';

export interface CompletedRange {
  from?: Date;
  to?: Date;
}

export type SnapshotStatus = 'open' | 'overdue';

export interface OpenTaskSnapshot {
  snapshot_date: string;
  task_id: string;
  task_name: string;
  project_name: string;
  assignee_name: string | null;
  due_date: string | null;
  status: SnapshotStatus;
}

/**
 * Durable record store for completed tasks.
 */
export interface TaskStore {
  upsert(record: CreateTaskRecordInput): Promise<UpsertOutcome>;
  listCompleted(range?: CompletedRange): Promise<TaskRecord[]>;
  /** Start time of the latest fetch that covered every project without errors */
  lastFetchStartedAt(): Promise<Date | null>;
  recordFetchRun(startedAt: Date): Promise<void>;
}

export interface SnapshotStore {
  appendMany(rows: OpenTaskSnapshot[]): Promise<number>;
}
