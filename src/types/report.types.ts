export const REPORT_DIMENSIONS = ['project', 'assignee', 'project_assignee'] as const;

export type ReportDimension = (typeof REPORT_DIMENSIONS)[number];

export interface ReportRow {
  /** First day of the month, `YYYY-MM-01` */
  month: string;
  dimension: ReportDimension;
  project_name: string | null;
  assignee_name: string | null;
  total_actual_time: number;
  total_estimated_time: number;
  task_count: number;
  unestimated_count: number;
}

export interface ReportOptions {
  /** `YYYY-MM` months to keep; every month in the store when omitted */
  months?: string[];
}

export type TabStatus = 'success' | 'failure';

export interface TabOutcome {
  tab: string;
  month: string;
  dimension: ReportDimension;
  status: TabStatus;
  rowsWritten: number;
  attempts: number;
  error?: string;
}

export type CellValue = string | number;

/**
 * Narrow surface of the spreadsheet API the exporter needs.
 */
export interface SheetsGateway {
  listTabs(): Promise<string[]>;
  addTab(title: string): Promise<void>;
  clearRange(range: string): Promise<void>;
  writeValues(range: string, values: CellValue[][]): Promise<number>;
}

export type DigestPeriod = 'monthly' | 'daily';

export interface DigestEntry {
  name: string;
  hours: number;
  tasks: number;
}

interface DigestTotals {
  tasks: number;
  actualHours: number;
  estimatedHours: number;
  topProjects: DigestEntry[];
  topAssignees: DigestEntry[];
}

export interface MonthlyDigest extends DigestTotals {
  period: 'monthly';
  /** `YYYY-MM-01` */
  month: string;
}

export interface DailyDigest extends DigestTotals {
  period: 'daily';
  /** `YYYY-MM-DD` in the report time zone */
  date: string;
  /** Mean over the previous seven days that had completions; null when none did */
  baseline: { tasks: number; hours: number } | null;
  /** Percent change against the baseline */
  change: { tasks: number | null; hours: number | null };
  /** A change of 50% or more either way */
  unusual: boolean;
  monthToDate: { tasks: number; hours: number };
}

export type Digest = MonthlyDigest | DailyDigest;
