import { z } from 'zod';

export const AsanaCustomFieldSchema = z.object({
  gid: z.string().optional(),
  name: z.string().nullish(),
  resource_subtype: z.string().nullish(),
  number_value: z.number().nullish(),
  text_value: z.string().nullish(),
  display_value: z.string().nullish(),
});

export const AsanaUserRefSchema = z.object({
  gid: z.string(),
  name: z.string().nullish(),
});

export const AsanaTaskSchema = z.object({
  gid: z.string(),
  name: z.string().default(''),
  completed: z.boolean().default(false),
  completed_at: z.string().nullish(),
  due_on: z.string().nullish(),
  modified_at: z.string().nullish(),
  assignee: AsanaUserRefSchema.nullish(),
  num_subtasks: z.number().nullish(),
  actual_time_minutes: z.number().nullish(),
  custom_fields: z.array(AsanaCustomFieldSchema.nullable()).nullish(),
  tags: z.array(z.object({ gid: z.string().optional(), name: z.string().nullish() })).nullish(),
});

export const AsanaProjectSchema = z.object({
  gid: z.string(),
  name: z.string(),
  archived: z.boolean().nullish(),
});

/**
 * Envelope of every Asana list endpoint. Items are validated one by one so a single
 * malformed task does not reject the page.
 */
export const AsanaPageSchema = z.object({
  data: z.array(z.unknown()),
  next_page: z
    .object({ offset: z.string().nullish() })
    .nullish(),
});

export type AsanaCustomField = z.infer<typeof AsanaCustomFieldSchema>;
export type AsanaTask = z.infer<typeof AsanaTaskSchema>;
export type AsanaProject = z.infer<typeof AsanaProjectSchema>;

export interface TaskListOptions {
  completedSince?: string;
  modifiedSince?: string;
}

/**
 * A task payload that failed validation, kept so the caller can count and log it.
 */
export interface RejectedTask {
  gid: string | null;
  reason: string;
}

export interface TaskPage {
  tasks: AsanaTask[];
  rejected: RejectedTask[];
}

/**
 * Read side of the project-management API consumed by the fetcher and the snapshotter.
 */
export interface TaskSource {
  listProjects(): Promise<AsanaProject[]>;
  listProjectTasks(projectGid: string, options: TaskListOptions): Promise<TaskPage>;
  listSubtasks(taskGid: string): Promise<TaskPage>;
}
