import { SnapshotSummary } from '../../types/job.types';
import { OpenTaskSnapshot, SnapshotStore } from '../../types/task.types';
import { SourceApiError, toRunError } from '../../utils/errors.util';
import { RetryExhaustedError } from '../../utils/retry.util';
import { dateInZone } from '../../utils/month.util';
import { OpenTask, ProjectSelection, TaskFetcherService } from '../asana/task-fetcher.service';

export interface SnapshotJobOptions extends ProjectSelection {
  projectDelayMs?: number;
  /** Clock override for the snapshot date */
  now?: Date;
}

export function snapshotRow(task: OpenTask, projectName: string, snapshotDate: string): OpenTaskSnapshot {
  const overdue = task.due_on !== null && task.due_on < snapshotDate;
  return {
    snapshot_date: snapshotDate,
    task_id: task.task_id,
    task_name: task.task_name,
    project_name: projectName,
    assignee_name: task.assignee_name,
    due_date: task.due_on,
    status: overdue ? 'overdue' : 'open',
  };
}

/**
 * Daily capture of open tasks. Every run appends; nothing is merged.
 */
export class SnapshotService {
  constructor(
    private readonly fetcher: TaskFetcherService,
    private readonly store: SnapshotStore,
    private readonly timeZone: string
  ) {}

  async run(options: SnapshotJobOptions = {}): Promise<SnapshotSummary> {
    const startedAt = new Date().toISOString();
    const snapshotDate = dateInZone(options.now ?? new Date(), this.timeZone);
    const summary: SnapshotSummary = {
      job: 'snapshot',
      status: 'success',
      startedAt,
      finishedAt: startedAt,
      snapshotDate,
      projects: { total: 0, processed: 0, skipped: 0 },
      rowsWritten: 0,
      skippedProjects: [],
    };

    try {
      const projects = await this.fetcher.selectProjects(options);
      summary.projects.total = projects.length;
      console.log(`📸 Snapshotting open tasks for ${snapshotDate} across ${projects.length} project(s)`);

      const rows: OpenTaskSnapshot[] = [];
      for (const [index, project] of projects.entries()) {
        if (index > 0) await this.fetcher.pause(options.projectDelayMs ?? 0);

        try {
          const openTasks = await this.fetcher.fetchOpenTasks(project);
          rows.push(...openTasks.map((task) => snapshotRow(task, project.name.trim(), snapshotDate)));
          summary.projects.processed++;
        } catch (error) {
          if (!(error instanceof SourceApiError || error instanceof RetryExhaustedError)) throw error;
          const message = toRunError(error).message;
          console.error(`✗ Skipping project '${project.name}' in snapshot: ${message}`);
          summary.projects.skipped++;
          summary.skippedProjects.push({ projectId: project.gid, projectName: project.name, error: message });
        }
      }

      summary.rowsWritten = await this.store.appendMany(rows);
      summary.status = summary.projects.skipped > 0 ? 'partial' : 'success';
      console.log(`✓ Snapshot ${summary.status}: ${summary.rowsWritten} open task row(s) for ${snapshotDate}`);
    } catch (error) {
      summary.status = 'failure';
      summary.error = toRunError(error);
      console.error('✗ Snapshot failed:', summary.error.message);
    }

    summary.finishedAt = new Date().toISOString();
    return summary;
  }
}
