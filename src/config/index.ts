import dotenv from 'dotenv';
import { JobName } from '../types/job.types';

dotenv.config();

function intFromEnv(name: string, fallback: number): number {
  const value = parseInt(process.env[name] || '', 10);
  return Number.isNaN(value) ? fallback : value;
}

export const config = {
  // Server
  nodeEnv: process.env.NODE_ENV || 'development',
  port: parseInt(process.env.PORT || '3000', 10),

  // Database
  databaseUrl: process.env.DATABASE_URL || '',

  // Redis (Bull scheduler)
  redisUrl: process.env.REDIS_URL || 'redis://localhost:6379',

  // Asana
  asana: {
    accessToken: process.env.ASANA_ACCESS_TOKEN || '',
    workspaceId: process.env.ASANA_WORKSPACE_ID || '',
    baseUrl: process.env.ASANA_BASE_URL || 'https://app.asana.com/api/1.0',
    completedSince: process.env.ASANA_COMPLETED_SINCE || '2023-01-01T00:00:00.000Z',
    projectDelayMs: intFromEnv('ASANA_PROJECT_DELAY_MS', 1000),
  },

  // Google Sheets
  google: {
    spreadsheetId: process.env.SPREADSHEET_ID || '',
    credentialsPath: process.env.GOOGLE_APPLICATION_CREDENTIALS || '',
  },

  // Reporting
  report: {
    timeZone: process.env.REPORT_TIMEZONE || 'Asia/Tokyo',
    locale: process.env.REPORT_LOCALE || 'ja-JP',
    digestTopN: intFromEnv('DIGEST_TOP_N', 5),
  },

  // Retry policy shared by the Asana and Sheets boundaries
  retry: {
    maxAttempts: intFromEnv('RETRY_MAX_ATTEMPTS', 5),
    baseDelayMs: intFromEnv('RETRY_BASE_DELAY_MS', 1000),
    maxDelayMs: intFromEnv('RETRY_MAX_DELAY_MS', 30000),
  },

  // Schedules (cron, Bull repeat jobs)
  schedule: {
    fetchCron: process.env.FETCH_CRON || '0 3 * * *',
    exportCron: process.env.EXPORT_CRON || '0 5 * * *',
    snapshotCron: process.env.SNAPSHOT_CRON || '0 6 * * *',
    dailyDigestCron: process.env.DAILY_DIGEST_CRON || '0 9 * * *',
    monthlyDigestCron: process.env.MONTHLY_DIGEST_CRON || '0 9 1 * *',
    tz: process.env.SCHEDULE_TZ || 'Asia/Tokyo',
  },

  // Twilio alerts (optional)
  twilio: {
    accountSid: process.env.TWILIO_ACCOUNT_SID || '',
    authToken: process.env.TWILIO_AUTH_TOKEN || '',
    phoneNumber: process.env.TWILIO_PHONE_NUMBER || '',
  },
  alertPhoneNumber: process.env.ALERT_PHONE_NUMBER || '',

  // JWT auth for job endpoints; required when NODE_ENV=production
  jwtSecret: process.env.JWT_SECRET || 'dev-secret-change-me',
};

const REQUIRED_BY_JOB: Record<JobName, string[]> = {
  fetch: ['DATABASE_URL', 'ASANA_ACCESS_TOKEN', 'ASANA_WORKSPACE_ID'],
  export: ['DATABASE_URL', 'SPREADSHEET_ID'],
  snapshot: ['DATABASE_URL', 'ASANA_ACCESS_TOKEN', 'ASANA_WORKSPACE_ID'],
  digest: ['DATABASE_URL'],
};

export const ALL_JOBS: JobName[] = ['fetch', 'export', 'snapshot', 'digest'];

export interface ConfigCheckOptions {
  /** The HTTP job endpoints will be served, so JWT_SECRET matters */
  http?: boolean;
}

export function missingConfig(jobs: JobName[], options: ConfigCheckOptions = {}): string[] {
  const required = new Set(jobs.flatMap((job) => REQUIRED_BY_JOB[job]));
  if (options.http && process.env.NODE_ENV === 'production') {
    required.add('JWT_SECRET');
  }
  return [...required].filter((key) => !process.env[key]);
}

// Validation: Check required env vars
export function validateConfig(jobs: JobName[] = ALL_JOBS, options: ConfigCheckOptions = {}) {
  const missing = missingConfig(jobs, options);

  if (missing.length > 0) {
    console.error('❌ Missing required environment variables:', missing.join(', '));
    console.error('Please check your .env file');
    process.exit(1);
  }

  console.log('✓ All required environment variables are set');
}

export default config;
