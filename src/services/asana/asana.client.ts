import { ZodType } from 'zod';
import {
  AsanaPageSchema,
  AsanaProject,
  AsanaProjectSchema,
  AsanaTask,
  AsanaTaskSchema,
  RejectedTask,
  TaskListOptions,
  TaskPage,
  TaskSource,
} from '../../types/asana.types';
import { AuthError, SourceApiError, errorMessage } from '../../utils/errors.util';
import { RetryHooks, RetryPolicy, withRetry } from '../../utils/retry.util';

export type FetchLike = (url: string, init?: { headers?: Record<string, string> }) => Promise<Response>;

export interface AsanaClientOptions {
  accessToken: string;
  workspaceId: string;
  baseUrl?: string;
  pageSize?: number;
  fetchImpl?: FetchLike;
  /** Applied to every request, so a failing page is retried without refetching earlier pages */
  retryPolicy?: RetryPolicy;
  retryHooks?: RetryHooks;
}

export const TASK_OPT_FIELDS = [
  'gid',
  'name',
  'completed',
  'completed_at',
  'due_on',
  'modified_at',
  'assignee',
  'assignee.name',
  'num_subtasks',
  'actual_time_minutes',
  'tags.name',
  'custom_fields',
  'custom_fields.name',
  'custom_fields.number_value',
  'custom_fields.text_value',
  'custom_fields.display_value',
].join(',');

type QueryParams = Record<string, string | number | boolean | undefined>;

/**
 * Read-only client for the Asana REST API.
 * Classifies failures into AuthError / SourceApiError and retries each request under `retryPolicy`.
 */
export class AsanaClient implements TaskSource {
  private readonly accessToken: string;
  private readonly workspaceId: string;
  private readonly baseUrl: string;
  private readonly pageSize: number;
  private readonly fetchImpl: FetchLike;
  private readonly retryPolicy: RetryPolicy | null;
  private readonly retryHooks: RetryHooks;

  constructor(options: AsanaClientOptions) {
    if (!options.accessToken) {
      throw new AuthError('Asana access token is not configured');
    }
    this.accessToken = options.accessToken;
    this.workspaceId = options.workspaceId;
    this.baseUrl = (options.baseUrl ?? 'https://app.asana.com/api/1.0').replace(/\/$/, '');
    this.pageSize = options.pageSize ?? 100;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.retryPolicy = options.retryPolicy ?? null;
    this.retryHooks = options.retryHooks ?? {};
  }

  /**
   * All non-archived projects in the workspace
   */
  async listProjects(): Promise<AsanaProject[]> {
    const items = await this.paginate(`/workspaces/${this.workspaceId}/projects`, {
      archived: false,
      opt_fields: 'gid,name,archived',
    });

    const projects: AsanaProject[] = [];
    for (const item of items) {
      const parsed = AsanaProjectSchema.safeParse(item);
      if (!parsed.success) {
        console.warn('⚠️  Skipping malformed project payload:', parsed.error.message);
        continue;
      }
      if (!parsed.data.archived) projects.push(parsed.data);
    }
    return projects;
  }

  /**
   * Tasks of one project. `completedSince: 'now'` returns only incomplete tasks.
   */
  async listProjectTasks(projectGid: string, options: TaskListOptions): Promise<TaskPage> {
    const items = await this.paginate(`/projects/${projectGid}/tasks`, {
      opt_fields: TASK_OPT_FIELDS,
      completed_since: options.completedSince,
      modified_since: options.modifiedSince,
    });
    return this.validateTasks(items);
  }

  async listSubtasks(taskGid: string): Promise<TaskPage> {
    const items = await this.paginate(`/tasks/${taskGid}/subtasks`, {
      opt_fields: TASK_OPT_FIELDS,
    });
    return this.validateTasks(items);
  }

  private validateTasks(items: unknown[]): TaskPage {
    const tasks: AsanaTask[] = [];
    const rejected: RejectedTask[] = [];

    for (const item of items) {
      const parsed = AsanaTaskSchema.safeParse(item);
      if (parsed.success) {
        tasks.push(parsed.data);
      } else {
        rejected.push({ gid: gidOf(item), reason: parsed.error.issues[0]?.message ?? 'invalid task' });
      }
    }
    return { tasks, rejected };
  }

  private async paginate(path: string, params: QueryParams): Promise<unknown[]> {
    const items: unknown[] = [];
    let offset: string | undefined;

    do {
      const page = await this.request(path, { ...params, limit: this.pageSize, offset }, AsanaPageSchema);
      items.push(...page.data);
      offset = page.next_page?.offset ?? undefined;
    } while (offset);

    return items;
  }

  private request<T>(path: string, params: QueryParams, schema: ZodType<T>): Promise<T> {
    if (!this.retryPolicy) return this.send(path, params, schema);

    return withRetry(() => this.send(path, params, schema), this.retryPolicy, {
      ...this.retryHooks,
      onRetry: (error, attempt, delayMs) => {
        console.warn(`⚠️  Asana ${path} failed (attempt ${attempt}): ${errorMessage(error)}; retrying in ${delayMs}ms`);
        this.retryHooks.onRetry?.(error, attempt, delayMs);
      },
    });
  }

  private async send<T>(path: string, params: QueryParams, schema: ZodType<T>): Promise<T> {
    const url = new URL(`${this.baseUrl}${path}`);
    for (const [key, value] of Object.entries(params)) {
      if (value !== undefined) url.searchParams.set(key, String(value));
    }

    let response: Response;
    try {
      response = await this.fetchImpl(url.toString(), {
        headers: {
          Authorization: `Bearer ${this.accessToken}`,
          Accept: 'application/json',
        },
      });
    } catch (error) {
      throw new SourceApiError(`Asana request failed: ${errorMessage(error)}`, {
        status: null,
        transient: true,
        cause: error,
      });
    }

    if (!response.ok) {
      throw await this.toError(path, response);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new SourceApiError(`Unreadable response body from ${path}: ${errorMessage(error)}`, {
        status: response.status,
        transient: true,
        cause: error,
      });
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new SourceApiError(`Unexpected response shape from ${path}: ${parsed.error.message}`, {
        status: response.status,
        transient: false,
      });
    }
    return parsed.data;
  }

  private async toError(path: string, response: Response): Promise<Error> {
    const detail = await response.text().catch((error: unknown) => `<unreadable body: ${errorMessage(error)}>`);
    const message = `Asana ${response.status} on ${path}: ${detail.slice(0, 200)}`;

    if (response.status === 401 || response.status === 403) {
      return new AuthError(message);
    }

    const transient = response.status === 429 || response.status >= 500;
    return new SourceApiError(message, {
      status: response.status,
      transient,
      retryAfterMs: parseRetryAfter(response.headers.get('retry-after')),
    });
  }
}

export function parseRetryAfter(header: string | null): number | null {
  if (!header) return null;
  const seconds = Number(header);
  if (Number.isFinite(seconds) && seconds >= 0) return seconds * 1000;
  const date = Date.parse(header);
  if (Number.isNaN(date)) return null;
  return Math.max(0, date - Date.now());
}

function gidOf(item: unknown): string | null {
  if (typeof item === 'object' && item !== null && 'gid' in item && typeof item.gid === 'string') {
    return item.gid;
  }
  return null;
}
