import { DigestSummary, ExportSummary, FetchSummary, JobName, RunSummary, SnapshotSummary } from '../../types/job.types';
import { ReportOptions } from '../../types/report.types';
import { toRunError } from '../../utils/errors.util';
import { sendRunAlert } from '../alert/alert.service';
import { TaskFetcherService } from '../asana/task-fetcher.service';
import { FetchJobOptions, IngestionService } from '../ingestion/ingestion.service';
import { AggregatorService } from '../reporting/aggregator.service';
import { DigestJobOptions, DigestService } from '../reporting/digest.service';
import { ExportService } from '../reporting/export.service';
import { ReportExporterService } from '../reporting/report-exporter.service';
import { SnapshotJobOptions, SnapshotService } from '../snapshot/snapshot.service';
import { RunContext, createRunContext } from './run-context';

export type JobRequest =
  | { job: 'fetch'; options?: FetchJobOptions }
  | { job: 'export'; options?: ReportOptions }
  | { job: 'snapshot'; options?: SnapshotJobOptions }
  | { job: 'digest'; options: DigestJobOptions };

/**
 * Summary for a run that failed before any work started
 */
export function failureSummary(job: JobName, error: unknown, startedAt: string): RunSummary {
  const base = {
    status: 'failure' as const,
    startedAt,
    finishedAt: new Date().toISOString(),
    error: toRunError(error),
  };

  switch (job) {
    case 'fetch':
      return {
        ...base,
        job,
        projects: { total: 0, processed: 0, skipped: 0 },
        tasks: { processed: 0, inserted: 0, updated: 0, unchanged: 0, failed: 0, unestimated: 0 },
        parseWarnings: 0,
        skippedProjects: [],
      };
    case 'export':
      return { ...base, job, tabs: [] };
    case 'snapshot':
      return {
        ...base,
        job,
        snapshotDate: '',
        projects: { total: 0, processed: 0, skipped: 0 },
        rowsWritten: 0,
        skippedProjects: [],
      };
    case 'digest':
      return { ...base, job, period: null, label: '', tasks: 0, actualHours: 0, delivered: false };
  }
}

export class JobRunnerService {
  constructor(private readonly createContext: () => RunContext = createRunContext) {}

  async run(request: JobRequest): Promise<RunSummary> {
    const startedAt = new Date().toISOString();
    console.log(`▶️  Starting ${request.job} run`);

    let context: RunContext | null = null;
    let summary: RunSummary;
    try {
      context = this.createContext();
      summary = await this.execute(context, request);
    } catch (error) {
      summary = failureSummary(request.job, error, startedAt);
      console.error(`✗ ${request.job} run could not start:`, summary.error?.message);
    }

    console.log(`■ ${request.job} run finished with status ${summary.status}`);
    // A delivered digest is its own notification
    if (!(summary.job === 'digest' && summary.delivered)) {
      await sendRunAlert(context?.notifier ?? null, summary);
    }
    return summary;
  }

  private execute(context: RunContext, request: JobRequest): Promise<RunSummary> {
    switch (request.job) {
      case 'fetch':
        return this.fetch(context, request.options ?? {});
      case 'export':
        return this.export(context, request.options ?? {});
      case 'snapshot':
        return this.snapshot(context, request.options ?? {});
      case 'digest':
        return this.digest(context, request.options);
    }
  }

  private fetch(context: RunContext, options: FetchJobOptions): Promise<FetchSummary> {
    const fetcher = new TaskFetcherService(context.taskSource(), context.retryHooks);
    return new IngestionService(fetcher, context.taskStore).run({
      ...options,
      completedSince: options.completedSince ?? context.completedSince,
      projectDelayMs: options.projectDelayMs ?? context.projectDelayMs,
    });
  }

  private export(context: RunContext, options: ReportOptions): Promise<ExportSummary> {
    const aggregator = new AggregatorService(context.taskStore, context.timeZone);
    const exporter = new ReportExporterService(context.sheets(), context.sheetsRetry, {
      locale: context.locale,
      timeZone: context.timeZone,
      retryHooks: context.retryHooks,
    });
    return new ExportService(aggregator, exporter).run(options);
  }

  private snapshot(context: RunContext, options: SnapshotJobOptions): Promise<SnapshotSummary> {
    const fetcher = new TaskFetcherService(context.taskSource(), context.retryHooks);
    return new SnapshotService(fetcher, context.snapshotStore, context.timeZone).run({
      ...options,
      projectDelayMs: options.projectDelayMs ?? context.projectDelayMs,
    });
  }

  private digest(context: RunContext, options: DigestJobOptions): Promise<DigestSummary> {
    return new DigestService(
      context.taskStore,
      context.notifier,
      context.timeZone,
      context.locale,
      context.digestTopN
    ).run(options);
  }
}

export const jobRunnerService = new JobRunnerService();
