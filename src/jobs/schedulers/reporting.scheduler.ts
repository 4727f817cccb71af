import { config } from '../../config';
import { JobName } from '../../types/job.types';
import { reportingQueue } from '../queue';

interface Schedule {
  key: string;
  job: JobName;
  cron: string;
  data: Record<string, unknown>;
}

export function reportingSchedules(): Schedule[] {
  return [
    { key: 'fetch', job: 'fetch', cron: config.schedule.fetchCron, data: {} },
    { key: 'export', job: 'export', cron: config.schedule.exportCron, data: {} },
    { key: 'snapshot', job: 'snapshot', cron: config.schedule.snapshotCron, data: {} },
    { key: 'digest-daily', job: 'digest', cron: config.schedule.dailyDigestCron, data: { period: 'daily' } },
    { key: 'digest-monthly', job: 'digest', cron: config.schedule.monthlyDigestCron, data: { period: 'monthly' } },
  ];
}

/**
 * Register the repeat jobs. The fetch cron should fire before the export and digest crons.
 */
export async function scheduleReportingJobs() {
  for (const { key, job, cron, data } of reportingSchedules()) {
    await reportingQueue.add(job, data, {
      repeat: { cron, tz: config.schedule.tz },
      jobId: `${key}-scheduled`, // Prevent duplicates
    });
    console.log(`  ⏰ ${key}: ${cron} (${config.schedule.tz})`);
  }

  console.log('✓ Reporting jobs scheduled');
}
