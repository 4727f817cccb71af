import { ExportSummary, RunStatus } from '../../types/job.types';
import { ReportOptions, TabOutcome } from '../../types/report.types';
import { toRunError } from '../../utils/errors.util';
import { AggregatorService } from './aggregator.service';
import { ReportExporterService } from './report-exporter.service';

export function exportStatus(tabs: readonly TabOutcome[]): RunStatus {
  const failed = tabs.filter((tab) => tab.status === 'failure').length;
  if (failed === 0) return 'success';
  return failed === tabs.length ? 'failure' : 'partial';
}

/**
 * Aggregate the store and write every view into its month tabs.
 */
export class ExportService {
  constructor(
    private readonly aggregator: AggregatorService,
    private readonly exporter: ReportExporterService
  ) {}

  async run(options: ReportOptions = {}): Promise<ExportSummary> {
    const startedAt = new Date().toISOString();
    const summary: ExportSummary = {
      job: 'export',
      status: 'success',
      startedAt,
      finishedAt: startedAt,
      tabs: [],
    };

    try {
      const views = await this.aggregator.reportAll(options);
      console.log(
        `📊 Exporting ${views.project.length} project, ${views.assignee.length} assignee and ` +
          `${views.project_assignee.length} project×assignee row(s)`
      );

      summary.tabs = await this.exporter.writeAll(views);
      summary.status = exportStatus(summary.tabs);

      const failed = summary.tabs.filter((tab) => tab.status === 'failure');
      if (failed.length > 0) {
        console.error(`✗ ${failed.length}/${summary.tabs.length} tab write(s) failed`);
      } else {
        console.log(`✓ Export finished: ${summary.tabs.length} tab write(s)`);
      }
    } catch (error) {
      summary.status = 'failure';
      summary.error = toRunError(error);
      console.error('✗ Export failed:', summary.error.message);
    }

    summary.finishedAt = new Date().toISOString();
    return summary;
  }
}
