import { Queryable } from '../config/database';
import { OpenTaskSnapshot, SnapshotStore } from '../types/task.types';

const COLUMNS = ['snapshot_date', 'task_id', 'task_name', 'project_name', 'assignee_name', 'due_date', 'status'] as const;
const CHUNK_SIZE = 500;

/**
 * Append-only history of open tasks. Rows are never updated or merged.
 */
export class OpenTaskSnapshotRepository implements SnapshotStore {
  constructor(private readonly db: Queryable) {}

  async appendMany(rows: OpenTaskSnapshot[]): Promise<number> {
    let written = 0;

    for (let start = 0; start < rows.length; start += CHUNK_SIZE) {
      const chunk = rows.slice(start, start + CHUNK_SIZE);
      const placeholders = chunk
        .map((_, r) => `(${COLUMNS.map((__, c) => `$${r * COLUMNS.length + c + 1}`).join(', ')})`)
        .join(', ');
      const params = chunk.flatMap((row) => COLUMNS.map((column) => row[column]));

      const result = await this.db.query(
        `INSERT INTO open_task_snapshots (${COLUMNS.join(', ')}) VALUES ${placeholders}`,
        params
      );
      written += result.rowCount ?? 0;
    }

    return written;
  }
}
