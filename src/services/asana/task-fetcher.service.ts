import { AsanaProject, AsanaTask, RejectedTask, TaskPage, TaskSource } from '../../types/asana.types';
import { CreateTaskRecordInput } from '../../types/task.types';
import { RetryHooks, defaultSleep } from '../../utils/retry.util';
import { ParseError } from '../../utils/errors.util';
import { FieldParserService, fieldParserService } from './field-parser.service';

export interface ProjectSelection {
  /** Substring match on the project name */
  projectFilter?: string;
  batchSize?: number;
  batchNumber?: number;
}

export interface CompletedTaskQuery {
  completedSince?: string;
  modifiedSince?: string;
}

export interface CompletedTasksResult {
  project: AsanaProject;
  records: CreateTaskRecordInput[];
  rejected: RejectedTask[];
  parseWarnings: number;
  unestimated: number;
}

export interface OpenTask {
  task_id: string;
  task_name: string;
  assignee_name: string | null;
  due_on: string | null;
}

export const DEFAULT_COMPLETED_SINCE = '2023-01-01T00:00:00.000Z';

/**
 * Pulls tasks from the source API project by project and turns them into store records.
 * Requests are retried inside the source; whatever still fails is left to the caller.
 */
export class TaskFetcherService {
  constructor(
    private readonly source: TaskSource,
    private readonly hooks: RetryHooks = {},
    private readonly parser: FieldParserService = fieldParserService
  ) {}

  async selectProjects(selection: ProjectSelection = {}): Promise<AsanaProject[]> {
    let projects = await this.source.listProjects();

    if (selection.projectFilter) {
      const filter = selection.projectFilter;
      projects = projects.filter((p) => p.name.includes(filter));
      console.log(`Filtered to ${projects.length} project(s) matching '${filter}'`);
    }

    if (selection.batchSize && selection.batchSize > 0) {
      const start = (selection.batchNumber ?? 0) * selection.batchSize;
      projects = projects.slice(start, start + selection.batchSize);
      console.log(`Batch ${selection.batchNumber ?? 0}: ${projects.length} project(s) from index ${start}`);
    }

    return projects;
  }

  /**
   * Completed tasks and completed subtasks of one project.
   * Subtasks are included even when their parent is still open.
   */
  async fetchCompletedTasks(project: AsanaProject, query: CompletedTaskQuery = {}): Promise<CompletedTasksResult> {
    const listOptions = query.modifiedSince
      ? { modifiedSince: query.modifiedSince }
      : { completedSince: query.completedSince ?? DEFAULT_COMPLETED_SINCE };

    const page = await this.source.listProjectTasks(project.gid, listOptions);

    const result: CompletedTasksResult = {
      project,
      records: [],
      rejected: [...page.rejected],
      parseWarnings: 0,
      unestimated: 0,
    };

    for (const task of page.tasks) {
      if ((task.num_subtasks ?? 0) > 0) {
        const subtasks = await this.subtasksOf(task);
        result.rejected.push(...subtasks.rejected);
        for (const subtask of subtasks.tasks) {
          this.collect(result, subtask, task.gid);
        }
      }
      this.collect(result, task, null);
    }

    console.log(`  Found ${result.records.length} completed task(s) in '${project.name}'`);
    return result;
  }

  /**
   * Incomplete tasks and incomplete subtasks of one project.
   */
  async fetchOpenTasks(project: AsanaProject): Promise<OpenTask[]> {
    const page = await this.source.listProjectTasks(project.gid, { completedSince: 'now' });

    const open: OpenTask[] = [];
    for (const task of page.tasks) {
      if (!task.completed) open.push(toOpenTask(task));

      if ((task.num_subtasks ?? 0) > 0) {
        const subtasks = await this.subtasksOf(task);
        for (const subtask of subtasks.tasks) {
          if (!subtask.completed) open.push(toOpenTask(subtask));
        }
      }
    }
    return open;
  }

  async pause(ms: number): Promise<void> {
    if (ms <= 0) return;
    await (this.hooks.sleep ?? defaultSleep)(ms);
  }

  private subtasksOf(task: AsanaTask): Promise<TaskPage> {
    return this.source.listSubtasks(task.gid);
  }

  private collect(result: CompletedTasksResult, task: AsanaTask, parentGid: string | null): void {
    if (!task.completed || !task.completed_at) return;

    try {
      const { record, warnings, unestimated } = this.toRecord(task, result.project, parentGid);
      result.records.push(record);
      result.parseWarnings += warnings;
      if (unestimated) result.unestimated++;
    } catch (error) {
      if (!(error instanceof ParseError)) throw error;
      console.warn(`⚠️  ${error.message}`);
      result.rejected.push({ gid: error.taskId, reason: error.message });
    }
  }

  private toRecord(
    task: AsanaTask,
    project: AsanaProject,
    parentGid: string | null
  ): { record: CreateTaskRecordInput; warnings: number; unestimated: boolean } {
    const completedAt = new Date(task.completed_at ?? '');
    if (Number.isNaN(completedAt.getTime())) {
      throw new ParseError(`Task ${task.gid} has an unreadable completed_at '${task.completed_at}'`, task.gid);
    }

    const parsed = this.parser.parse(task.custom_fields, task.actual_time_minutes);
    for (const warning of parsed.warnings) {
      console.warn(`⚠️  Task ${task.gid}: ${warning.message}`);
    }

    const tags = [...new Set((task.tags ?? []).flatMap((tag) => (tag.name ? [tag.name] : [])))].sort();

    return {
      record: {
        task_id: task.gid,
        task_name: task.name,
        parent_task_id: parentGid,
        project_id: project.gid,
        project_name: project.name.trim(),
        assignee_id: task.assignee?.gid ?? null,
        assignee_name: task.assignee?.name ?? null,
        completed_at: completedAt,
        estimated_time: parsed.estimated_time,
        time_achievement_rate: parsed.time_achievement_rate,
        actual_time_raw: parsed.actual_time_raw,
        actual_time: parsed.actual_time,
        tags,
      },
      warnings: parsed.warnings.length,
      unestimated: parsed.unestimated,
    };
  }
}

function toOpenTask(task: AsanaTask): OpenTask {
  return {
    task_id: task.gid,
    task_name: task.name,
    assignee_name: task.assignee?.name ?? null,
    due_on: task.due_on ?? null,
  };
}
