import { FetchSummary } from '../../types/job.types';
import { TaskStore } from '../../types/task.types';
import { SourceApiError, errorMessage, toRunError } from '../../utils/errors.util';
import { RetryExhaustedError } from '../../utils/retry.util';
import { CompletedTasksResult, ProjectSelection, TaskFetcherService } from '../asana/task-fetcher.service';

export interface FetchJobOptions extends ProjectSelection {
  /** Only tasks modified since the last complete fetch run began */
  incremental?: boolean;
  completedSince?: string;
  projectDelayMs?: number;
}

/**
 * Fetch → parse → upsert for every selected project.
 * A failing project is skipped; auth and store failures end the run.
 *
 * A run over every project that ends in success records its start time. Incremental runs ask
 * Asana for changes since then, so edits made while that run was fetching are picked up again.
 */
export class IngestionService {
  constructor(
    private readonly fetcher: TaskFetcherService,
    private readonly store: TaskStore,
    private readonly now: () => Date = () => new Date()
  ) {}

  async run(options: FetchJobOptions = {}): Promise<FetchSummary> {
    const runStart = this.now();
    const startedAt = runStart.toISOString();
    const summary: FetchSummary = {
      job: 'fetch',
      status: 'success',
      startedAt,
      finishedAt: startedAt,
      projects: { total: 0, processed: 0, skipped: 0 },
      tasks: { processed: 0, inserted: 0, updated: 0, unchanged: 0, failed: 0, unestimated: 0 },
      parseWarnings: 0,
      skippedProjects: [],
    };

    try {
      const projects = await this.fetcher.selectProjects(options);
      summary.projects.total = projects.length;
      console.log(`📥 Fetching completed tasks from ${projects.length} project(s)`);

      let modifiedSince: string | undefined;
      if (options.incremental) {
        const watermark = await this.store.lastFetchStartedAt();
        modifiedSince = watermark?.toISOString();
        console.log(
          watermark ? `  Incremental fetch since ${modifiedSince}` : '  No complete fetch recorded, running a full fetch'
        );
      }

      for (const [index, project] of projects.entries()) {
        if (index > 0) await this.fetcher.pause(options.projectDelayMs ?? 0);
        console.log(`Processing project ${index + 1}/${projects.length}: ${project.name}`);

        let result: CompletedTasksResult;
        try {
          result = await this.fetcher.fetchCompletedTasks(project, {
            completedSince: options.completedSince,
            modifiedSince,
          });
        } catch (error) {
          if (!(error instanceof SourceApiError || error instanceof RetryExhaustedError)) throw error;
          const message = toRunError(error).message;
          console.error(`✗ Skipping project '${project.name}': ${message}`);
          summary.projects.skipped++;
          summary.skippedProjects.push({ projectId: project.gid, projectName: project.name, error: message });
          continue;
        }

        summary.projects.processed++;
        summary.tasks.failed += result.rejected.length;
        summary.tasks.unestimated += result.unestimated;
        summary.parseWarnings += result.parseWarnings;

        for (const record of result.records) {
          const outcome = await this.store.upsert(record);
          summary.tasks[outcome]++;
          summary.tasks.processed++;
        }
      }

      const degraded = summary.projects.skipped > 0 || summary.tasks.failed > 0;
      summary.status = degraded ? 'partial' : 'success';
      if (summary.status === 'success' && coversEveryProject(options)) {
        await this.recordWatermark(runStart);
      }
      console.log(
        `✓ Fetch ${summary.status}: ${summary.tasks.processed} task(s) ` +
          `(${summary.tasks.inserted} inserted, ${summary.tasks.updated} updated, ${summary.tasks.unchanged} unchanged)`
      );
    } catch (error) {
      summary.status = 'failure';
      summary.error = toRunError(error);
      console.error('✗ Fetch failed:', summary.error.message);
    }

    summary.finishedAt = new Date().toISOString();
    return summary;
  }

  // A lost record only widens the next incremental fetch
  private async recordWatermark(runStart: Date): Promise<void> {
    try {
      await this.store.recordFetchRun(runStart);
    } catch (error) {
      console.error(`⚠️  Could not record fetch watermark: ${errorMessage(error)}`);
    }
  }
}

function coversEveryProject(options: ProjectSelection): boolean {
  return !options.projectFilter && options.batchSize === undefined;
}
