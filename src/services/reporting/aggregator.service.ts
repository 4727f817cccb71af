import { CompletedRange, TaskRecord, TaskStore } from '../../types/task.types';
import { ReportDimension, ReportOptions, ReportRow } from '../../types/report.types';
import { monthOf, normalizeMonth } from '../../utils/month.util';

export const UNASSIGNED_LABEL = '未割当';

const DAY_MS = 24 * 60 * 60 * 1000;

function compareText(a: string | null, b: string | null): number {
  const left = a ?? '';
  const right = b ?? '';
  if (left < right) return -1;
  if (left > right) return 1;
  return 0;
}

function assigneeKey(record: TaskRecord): string {
  const name = record.assignee_name?.trim();
  return name ? name : UNASSIGNED_LABEL;
}

export function compareReportRows(a: ReportRow, b: ReportRow): number {
  return (
    compareText(a.month, b.month) ||
    compareText(a.project_name, b.project_name) ||
    compareText(a.assignee_name, b.assignee_name)
  );
}

/**
 * Group records by (month of completed_at, dimension keys).
 * Null actual_time is left out of the sum and counted as unestimated.
 */
export function aggregateRecords(
  records: readonly TaskRecord[],
  dimension: ReportDimension,
  timeZone: string,
  months?: ReadonlySet<string>
): ReportRow[] {
  const groups = new Map<string, ReportRow>();

  for (const record of records) {
    const month = monthOf(record.completed_at, timeZone);
    if (months && !months.has(month)) continue;

    const projectName = dimension === 'assignee' ? null : record.project_name;
    const assigneeName = dimension === 'project' ? null : assigneeKey(record);
    const key = JSON.stringify([month, projectName, assigneeName]);

    let row = groups.get(key);
    if (!row) {
      row = {
        month,
        dimension,
        project_name: projectName,
        assignee_name: assigneeName,
        total_actual_time: 0,
        total_estimated_time: 0,
        task_count: 0,
        unestimated_count: 0,
      };
      groups.set(key, row);
    }

    row.task_count++;
    if (record.actual_time === null) {
      row.unestimated_count++;
    } else {
      row.total_actual_time += record.actual_time;
    }
    if (record.estimated_time !== null) {
      row.total_estimated_time += record.estimated_time;
    }
  }

  return [...groups.values()].sort(compareReportRows);
}

/**
 * Store read window covering the requested months, padded a day each side for time-zone offsets.
 */
export function rangeForMonths(months: ReadonlySet<string>): CompletedRange {
  if (months.size === 0) return {};
  const sorted = [...months].sort();
  const [firstYear, firstMonth] = sorted[0].split('-').map(Number);
  const [lastYear, lastMonth] = sorted[sorted.length - 1].split('-').map(Number);

  return {
    from: new Date(Date.UTC(firstYear, firstMonth - 1, 1) - DAY_MS),
    to: new Date(Date.UTC(lastYear, lastMonth, 1) + DAY_MS),
  };
}

export class AggregatorService {
  constructor(
    private readonly store: TaskStore,
    private readonly timeZone: string
  ) {}

  async reportData(dimension: ReportDimension, options: ReportOptions = {}): Promise<ReportRow[]> {
    const months = this.monthFilter(options);
    const records = await this.store.listCompleted(months ? rangeForMonths(months) : {});
    return aggregateRecords(records, dimension, this.timeZone, months);
  }

  /**
   * All three views from a single store read.
   */
  async reportAll(options: ReportOptions = {}): Promise<Record<ReportDimension, ReportRow[]>> {
    const months = this.monthFilter(options);
    const records = await this.store.listCompleted(months ? rangeForMonths(months) : {});

    const build = (dimension: ReportDimension) =>
      aggregateRecords(records, dimension, this.timeZone, months);
    return {
      project: build('project'),
      assignee: build('assignee'),
      project_assignee: build('project_assignee'),
    };
  }

  private monthFilter(options: ReportOptions): Set<string> | undefined {
    if (!options.months || options.months.length === 0) return undefined;

    const months = new Set<string>();
    for (const value of options.months) {
      const month = normalizeMonth(value);
      if (!month) throw new Error(`Invalid month filter '${value}', expected YYYY-MM`);
      months.add(month);
    }
    return months;
  }
}
