import { Queryable } from '../config/database';
import {
  CompletedRange,
  CreateTaskRecordInput,
  TRACKED_FIELDS,
  TaskRecord,
  TaskStore,
  TrackedField,
  UpsertOutcome,
} from '../types/task.types';
import { StoreWriteError } from '../utils/errors.util';

type TrackedValue = CreateTaskRecordInput[TrackedField];

function sameValue(a: TrackedValue, b: TrackedValue): boolean {
  if (a instanceof Date && b instanceof Date) return a.getTime() === b.getTime();
  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((item, i) => item === b[i]);
  }
  return Object.is(a, b);
}

/**
 * Tracked fields whose stored value differs from the incoming record.
 */
export function diffTrackedFields(stored: CreateTaskRecordInput, incoming: CreateTaskRecordInput): TrackedField[] {
  return TRACKED_FIELDS.filter((field) => !sameValue(stored[field], incoming[field]));
}

const COLUMNS = TRACKED_FIELDS.join(', ');
const PLACEHOLDERS = TRACKED_FIELDS.map((_, i) => `$${i + 2}`).join(', ');
const ASSIGNMENTS = TRACKED_FIELDS.map((field) => `${field} = EXCLUDED.${field}`).join(',\n        ');
const STORED_ROW = TRACKED_FIELDS.map((field) => `completed_tasks.${field}`).join(', ');
const EXCLUDED_ROW = TRACKED_FIELDS.map((field) => `EXCLUDED.${field}`).join(', ');

// The WHERE clause keeps a concurrent run's identical write from refreshing inserted_at.
const UPSERT_SQL = `
  INSERT INTO completed_tasks (task_id, ${COLUMNS}, inserted_at)
  VALUES ($1, ${PLACEHOLDERS}, NOW())
  ON CONFLICT (task_id) DO UPDATE SET
        ${ASSIGNMENTS},
        inserted_at = NOW()
  WHERE (${STORED_ROW}) IS DISTINCT FROM (${EXCLUDED_ROW})
  RETURNING (xmax = 0) AS inserted`;

/**
 * PostgreSQL store for completed tasks, keyed by Asana task gid.
 */
export class TaskRecordRepository implements TaskStore {
  constructor(private readonly db: Queryable) {}

  async findById(taskId: string): Promise<TaskRecord | null> {
    const result = await this.db.query<TaskRecord>(
      'SELECT * FROM completed_tasks WHERE task_id = $1',
      [taskId]
    );
    return result.rows[0] || null;
  }

  /**
   * Insert, overwrite when a tracked field changed, or leave the row alone.
   */
  async upsert(record: CreateTaskRecordInput): Promise<UpsertOutcome> {
    try {
      const existing = await this.findById(record.task_id);
      if (existing && diffTrackedFields(existing, record).length === 0) {
        return 'unchanged';
      }

      const values = [record.task_id, ...TRACKED_FIELDS.map((field) => record[field])];
      const result = await this.db.query<{ inserted: boolean }>(UPSERT_SQL, values);

      // No row back: another run already wrote the same values
      if (result.rows.length === 0) return 'unchanged';
      return result.rows[0].inserted ? 'inserted' : 'updated';
    } catch (error) {
      throw new StoreWriteError(record.task_id, error);
    }
  }

  async listCompleted(range: CompletedRange = {}): Promise<TaskRecord[]> {
    const conditions: string[] = [];
    const params: Date[] = [];

    if (range.from) {
      params.push(range.from);
      conditions.push(`completed_at >= $${params.length}`);
    }
    if (range.to) {
      params.push(range.to);
      conditions.push(`completed_at < $${params.length}`);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    const result = await this.db.query<TaskRecord>(
      `SELECT * FROM completed_tasks ${where} ORDER BY completed_at ASC, task_id ASC`,
      params
    );
    return result.rows;
  }

  async lastFetchStartedAt(): Promise<Date | null> {
    const result = await this.db.query<{ latest: Date | null }>(
      'SELECT MAX(started_at) AS latest FROM fetch_runs'
    );
    return result.rows[0]?.latest ?? null;
  }

  async recordFetchRun(startedAt: Date): Promise<void> {
    await this.db.query('INSERT INTO fetch_runs (started_at) VALUES ($1)', [startedAt]);
  }
}
