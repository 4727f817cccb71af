import {
  CellValue,
  REPORT_DIMENSIONS,
  ReportDimension,
  ReportRow,
  SheetsGateway,
  TabOutcome,
} from '../../types/report.types';
import { ExportWriteError, errorMessage } from '../../utils/errors.util';
import { RetryExhaustedError, RetryHooks, RetryPolicy, withRetry } from '../../utils/retry.util';
import { dateTimeInZone, monthTabName } from '../../utils/month.util';

interface BlockLayout {
  startColumn: string;
  endColumn: string;
  header: string[];
  toCells(row: ReportRow): CellValue[];
}

const UPDATED_AT_HEADER = '最終更新日時';

const round2 = (value: number): number => Math.round(value * 100) / 100;

const totals = (row: ReportRow): CellValue[] => [
  row.task_count,
  round2(row.total_actual_time),
  round2(row.total_estimated_time),
  row.unestimated_count,
];

/**
 * Column block each dimension owns inside a month tab. Blocks are separated by one empty column
 * and end with the time of the write.
 */
export const DIMENSION_LAYOUT: Record<ReportDimension, BlockLayout> = {
  project: {
    startColumn: 'A',
    endColumn: 'G',
    header: ['対象月', 'プロジェクト名', '完了タスク数', '合計実績時間', '合計見積時間', '見積なし件数'],
    toCells: (row) => [row.month.slice(0, 7), row.project_name ?? '', ...totals(row)],
  },
  assignee: {
    startColumn: 'I',
    endColumn: 'O',
    header: ['対象月', '担当者名', '完了タスク数', '合計実績時間', '合計見積時間', '見積なし件数'],
    toCells: (row) => [row.month.slice(0, 7), row.assignee_name ?? '', ...totals(row)],
  },
  project_assignee: {
    startColumn: 'Q',
    endColumn: 'X',
    header: ['対象月', 'プロジェクト名', '担当者名', '完了タスク数', '合計実績時間', '合計見積時間', '見積なし件数'],
    toCells: (row) => [row.month.slice(0, 7), row.project_name ?? '', row.assignee_name ?? '', ...totals(row)],
  },
};

export function quoteTab(tab: string): string {
  return `'${tab.replace(/'/g, "''")}'`;
}

export function renderBlock(dimension: ReportDimension, rows: readonly ReportRow[], updatedAt: string): CellValue[][] {
  const layout = DIMENSION_LAYOUT[dimension];
  return [[...layout.header, UPDATED_AT_HEADER], ...rows.map((row) => [...layout.toCells(row), updatedAt])];
}

export interface ReportExporterOptions {
  locale?: string;
  /** Zone of the last-updated column */
  timeZone?: string;
  retryHooks?: RetryHooks;
  now?: () => Date;
}

/**
 * Writes report rows into one tab per month. A tab that keeps failing is reported, not thrown.
 */
export class ReportExporterService {
  private knownTabs: Set<string> | null = null;
  private readonly locale: string;
  private readonly timeZone: string;
  private readonly retryHooks: RetryHooks;
  private readonly now: () => Date;

  constructor(
    private readonly gateway: SheetsGateway,
    private readonly retryPolicy: RetryPolicy,
    options: ReportExporterOptions = {}
  ) {
    this.locale = options.locale ?? 'ja-JP';
    this.timeZone = options.timeZone ?? 'Asia/Tokyo';
    this.retryHooks = options.retryHooks ?? {};
    this.now = options.now ?? (() => new Date());
  }

  async write(
    dimension: ReportDimension,
    rows: readonly ReportRow[],
    updatedAt: string = dateTimeInZone(this.now(), this.timeZone)
  ): Promise<TabOutcome[]> {
    const byMonth = new Map<string, ReportRow[]>();
    for (const row of rows) {
      const bucket = byMonth.get(row.month) ?? [];
      bucket.push(row);
      byMonth.set(row.month, bucket);
    }

    const outcomes: TabOutcome[] = [];
    for (const [month, monthRows] of byMonth) {
      outcomes.push(await this.writeMonth(dimension, month, monthRows, updatedAt));
    }
    return outcomes;
  }

  async writeAll(views: Record<ReportDimension, ReportRow[]>): Promise<TabOutcome[]> {
    const updatedAt = dateTimeInZone(this.now(), this.timeZone);
    const outcomes: TabOutcome[] = [];
    for (const dimension of REPORT_DIMENSIONS) {
      outcomes.push(...(await this.write(dimension, views[dimension], updatedAt)));
    }
    return outcomes;
  }

  private async writeMonth(
    dimension: ReportDimension,
    month: string,
    rows: ReportRow[],
    updatedAt: string
  ): Promise<TabOutcome> {
    const tab = monthTabName(month, this.locale);
    const layout = DIMENSION_LAYOUT[dimension];
    const values = renderBlock(dimension, rows, updatedAt);
    let attempts = 0;

    try {
      await withRetry(
        async (attempt) => {
          attempts = attempt;
          await this.ensureTab(tab);
          await this.gateway.clearRange(`${quoteTab(tab)}!${layout.startColumn}:${layout.endColumn}`);
          await this.gateway.writeValues(
            `${quoteTab(tab)}!${layout.startColumn}1:${layout.endColumn}${values.length}`,
            values
          );
        },
        this.retryPolicy,
        {
          ...this.retryHooks,
          onRetry: (error, attempt, delayMs) => {
            // Tab list may be stale after a failed addSheet
            this.knownTabs = null;
            console.warn(`⚠️  Writing '${tab}' (${dimension}) failed on attempt ${attempt}: ${errorMessage(error)}; retrying in ${delayMs}ms`);
            this.retryHooks.onRetry?.(error, attempt, delayMs);
          },
        }
      );

      console.log(`✓ Wrote ${rows.length} ${dimension} row(s) to '${tab}'`);
      return { tab, month, dimension, status: 'success', rowsWritten: rows.length, attempts };
    } catch (error) {
      const cause = error instanceof RetryExhaustedError ? error.lastError : error;
      const failure = new ExportWriteError(tab, attempts, cause);
      console.error(`✗ ${failure.message}`);
      return { tab, month, dimension, status: 'failure', rowsWritten: 0, attempts, error: failure.message };
    }
  }

  private async ensureTab(tab: string): Promise<void> {
    if (!this.knownTabs) {
      this.knownTabs = new Set(await this.gateway.listTabs());
    }
    if (this.knownTabs.has(tab)) return;

    await this.gateway.addTab(tab);
    this.knownTabs.add(tab);
  }
}
