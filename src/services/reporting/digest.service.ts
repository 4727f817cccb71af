import { DailyDigest, Digest, DigestEntry, DigestPeriod, MonthlyDigest } from '../../types/report.types';
import { DigestSummary } from '../../types/job.types';
import { CompletedRange, TaskRecord, TaskStore } from '../../types/task.types';
import { toRunError } from '../../utils/errors.util';
import { dateInZone, monthOf, monthTabName, normalizeMonth, shiftDate } from '../../utils/month.util';
import { ALERT_PREFIX, AlertNotifier } from '../alert/alert.service';
import { rangeForMonths } from './aggregator.service';

export const DEFAULT_TOP_N = 5;
const BASELINE_DAYS = 7;
const UNUSUAL_CHANGE_PCT = 50;
const DAY_MS = 24 * 60 * 60 * 1000;

export interface DigestJobOptions {
  period: DigestPeriod;
  /** Monthly: `YYYY-MM`; the latest month with completions when omitted */
  month?: string;
  /** Daily: `YYYY-MM-DD`; yesterday in the report time zone when omitted */
  date?: string;
  topN?: number;
  now?: Date;
}

const round2 = (value: number): number => Math.round(value * 100) / 100;

function sumHours(records: readonly TaskRecord[], field: 'actual_time' | 'estimated_time'): number {
  return records.reduce((total, record) => total + (record[field] ?? 0), 0);
}

/**
 * Busiest names by actual hours, then task count. Blank names are left out.
 */
export function rankTop(
  records: readonly TaskRecord[],
  field: 'project_name' | 'assignee_name',
  topN: number
): DigestEntry[] {
  const groups = new Map<string, { hours: number; tasks: number }>();
  for (const record of records) {
    const name = record[field]?.trim();
    if (!name) continue;
    const entry = groups.get(name) ?? { hours: 0, tasks: 0 };
    entry.hours += record.actual_time ?? 0;
    entry.tasks++;
    groups.set(name, entry);
  }

  return [...groups.entries()]
    .map(([name, entry]) => ({ name, hours: round2(entry.hours), tasks: entry.tasks }))
    .sort((a, b) => b.hours - a.hours || b.tasks - a.tasks || (a.name < b.name ? -1 : a.name > b.name ? 1 : 0))
    .slice(0, topN);
}

function totals(records: readonly TaskRecord[], topN: number) {
  return {
    tasks: records.length,
    actualHours: round2(sumHours(records, 'actual_time')),
    estimatedHours: round2(sumHours(records, 'estimated_time')),
    topProjects: rankTop(records, 'project_name', topN),
    topAssignees: rankTop(records, 'assignee_name', topN),
  };
}

function percentChange(value: number, baseline: number): number | null {
  if (baseline === 0) return null;
  return Math.round(((value - baseline) / baseline) * 1000) / 10;
}

/**
 * Month totals. Without `month`, the latest month that has completions, or the current one.
 */
export function monthlyDigest(
  records: readonly TaskRecord[],
  options: { timeZone: string; month?: string; now: Date; topN: number }
): MonthlyDigest {
  let month = options.month;
  if (!month) {
    const latest = records.reduce<Date | null>(
      (max, record) => (!max || record.completed_at > max ? record.completed_at : max),
      null
    );
    month = monthOf(latest ?? options.now, options.timeZone);
  }

  const inMonth = records.filter((record) => monthOf(record.completed_at, options.timeZone) === month);
  return { period: 'monthly', month, ...totals(inMonth, options.topN) };
}

/**
 * One day's totals against the mean of the previous seven days that had completions.
 */
export function dailyDigest(
  records: readonly TaskRecord[],
  options: { timeZone: string; date: string; topN: number }
): DailyDigest {
  const { date, timeZone } = options;
  const byDay = new Map<string, TaskRecord[]>();
  for (const record of records) {
    const day = dateInZone(record.completed_at, timeZone);
    const bucket = byDay.get(day) ?? [];
    bucket.push(record);
    byDay.set(day, bucket);
  }

  const day = totals(byDay.get(date) ?? [], options.topN);

  const windowStart = shiftDate(date, -BASELINE_DAYS);
  const previous = [...byDay.entries()].filter(([key]) => key >= windowStart && key < date).map(([, rows]) => rows);
  const baselineTasks = previous.reduce((total, rows) => total + rows.length, 0) / (previous.length || 1);
  const baselineHours = previous.reduce((total, rows) => total + sumHours(rows, 'actual_time'), 0) / (previous.length || 1);

  const change =
    previous.length > 0
      ? { tasks: percentChange(day.tasks, baselineTasks), hours: percentChange(day.actualHours, baselineHours) }
      : { tasks: null, hours: null };
  const unusual = [change.tasks, change.hours].some(
    (value) => value !== null && Math.abs(value) >= UNUSUAL_CHANGE_PCT
  );

  const monthStart = `${date.slice(0, 7)}-01`;
  const monthToDate = [...byDay.entries()]
    .filter(([key]) => key >= monthStart && key <= date)
    .flatMap(([, rows]) => rows);

  return {
    period: 'daily',
    date,
    ...day,
    baseline: previous.length > 0 ? { tasks: round2(baselineTasks), hours: round2(baselineHours) } : null,
    change,
    unusual,
    monthToDate: { tasks: monthToDate.length, hours: round2(sumHours(monthToDate, 'actual_time')) },
  };
}

const hours = (value: number): string => `${round2(value)}h`;

function ranking(entries: readonly DigestEntry[]): string {
  if (entries.length === 0) return 'none';
  return entries.map((entry) => `${entry.name} ${hours(entry.hours)} (${entry.tasks})`).join(', ');
}

function signed(value: number | null): string {
  if (value === null) return 'n/a';
  return `${value >= 0 ? '+' : ''}${value.toFixed(1)}%`;
}

/**
 * Multi-line digest body for SMS delivery
 */
export function formatDigest(digest: Digest, locale: string = 'ja-JP'): string {
  const ratio =
    digest.estimatedHours > 0 ? ` (${Math.round((digest.actualHours / digest.estimatedHours) * 1000) / 10}%)` : '';
  const body = [
    `Actual ${hours(digest.actualHours)} / estimated ${hours(digest.estimatedHours)}${ratio}, ${digest.tasks} tasks`,
  ];

  if (digest.period === 'monthly') {
    return [
      `${ALERT_PREFIX} ${monthTabName(digest.month, locale)} monthly digest`,
      ...body,
      `Top projects: ${ranking(digest.topProjects)}`,
      `Top assignees: ${ranking(digest.topAssignees)}`,
    ].join('\n');
  }

  const versus = digest.baseline
    ? `vs 7-day avg: tasks ${signed(digest.change.tasks)}, hours ${signed(digest.change.hours)}`
    : 'vs 7-day avg: no data';

  return [
    `${ALERT_PREFIX} daily digest ${digest.date}${digest.unusual ? ' ⚠️' : ''}`,
    ...body,
    versus,
    `Top projects: ${ranking(digest.topProjects)}`,
    `Top assignees: ${ranking(digest.topAssignees)}`,
    `Month to date: ${hours(digest.monthToDate.hours)}, ${digest.monthToDate.tasks} tasks`,
  ].join('\n');
}

/**
 * Store window for a daily digest: the baseline week and the month so far, padded for time zones.
 */
export function rangeForDay(date: string): CompletedRange {
  const baselineStart = shiftDate(date, -BASELINE_DAYS);
  const monthStart = `${date.slice(0, 7)}-01`;
  const first = baselineStart < monthStart ? baselineStart : monthStart;
  return {
    from: new Date(Date.parse(`${first}T00:00:00.000Z`) - DAY_MS),
    to: new Date(Date.parse(`${date}T00:00:00.000Z`) + 2 * DAY_MS),
  };
}

/**
 * Builds the monthly or daily hours digest from the store and sends it through the notifier.
 */
export class DigestService {
  constructor(
    private readonly store: TaskStore,
    private readonly notifier: AlertNotifier | null,
    private readonly timeZone: string,
    private readonly locale: string = 'ja-JP',
    private readonly defaultTopN: number = DEFAULT_TOP_N
  ) {}

  async build(options: DigestJobOptions): Promise<Digest> {
    const now = options.now ?? new Date();
    const topN = options.topN ?? this.defaultTopN;

    if (options.period === 'monthly') {
      let month: string | undefined;
      if (options.month) {
        const normalized = normalizeMonth(options.month);
        if (!normalized) {
          throw new Error(`Invalid digest month '${options.month}', expected YYYY-MM`);
        }
        month = normalized;
      }
      const records = await this.store.listCompleted(month ? rangeForMonths(new Set([month])) : {});
      return monthlyDigest(records, { timeZone: this.timeZone, month, now, topN });
    }

    const date = options.date ?? shiftDate(dateInZone(now, this.timeZone), -1);
    const records = await this.store.listCompleted(rangeForDay(date));
    return dailyDigest(records, { timeZone: this.timeZone, date, topN });
  }

  async run(options: DigestJobOptions): Promise<DigestSummary> {
    const startedAt = new Date().toISOString();
    const summary: DigestSummary = {
      job: 'digest',
      status: 'success',
      startedAt,
      finishedAt: startedAt,
      period: options.period,
      label: '',
      tasks: 0,
      actualHours: 0,
      delivered: false,
    };

    try {
      const digest = await this.build(options);
      summary.label = digest.period === 'monthly' ? digest.month.slice(0, 7) : digest.date;
      summary.tasks = digest.tasks;
      summary.actualHours = digest.actualHours;

      const message = formatDigest(digest, this.locale);
      if (!this.notifier) {
        console.log(`Alerting not configured, ${options.period} digest not sent:\n${message}`);
      } else {
        await this.notifier.notify(message);
        summary.delivered = true;
        console.log(`✓ ${options.period} digest sent for ${summary.label}`);
      }
    } catch (error) {
      summary.status = 'failure';
      summary.error = toRunError(error);
      console.error('✗ Digest failed:', summary.error.message);
    }

    summary.finishedAt = new Date().toISOString();
    return summary;
  }
}
