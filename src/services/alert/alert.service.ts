import twilio from 'twilio';
import { RunSummary } from '../../types/job.types';
import { errorMessage } from '../../utils/errors.util';

export const ALERT_PREFIX = '[task-hours]';

export interface AlertNotifier {
  notify(message: string): Promise<void>;
}

/**
 * One-line run outcome suitable for an SMS body
 */
export function formatRunAlert(summary: RunSummary): string {
  const head = `${ALERT_PREFIX} ${summary.job} ${summary.status}`;
  if (summary.status === 'failure' && summary.error) {
    const task = summary.error.taskId ? ` (task ${summary.error.taskId})` : '';
    return `${head}: ${summary.error.kind}${task}: ${summary.error.message}`;
  }

  switch (summary.job) {
    case 'fetch': {
      const { tasks, projects } = summary;
      return (
        `${head}: ${tasks.processed} tasks (${tasks.inserted} new, ${tasks.updated} updated, ` +
        `${tasks.unchanged} unchanged), ${tasks.failed} failed, ${projects.skipped} projects skipped`
      );
    }
    case 'export': {
      const failed = summary.tabs.filter((tab) => tab.status === 'failure');
      const written = summary.tabs.length - failed.length;
      const detail = failed.length > 0
        ? `; failed: ${failed.map((tab) => `${tab.tab} (${tab.dimension})`).join(', ')}`
        : '';
      return `${head}: ${written}/${summary.tabs.length} tab writes${detail}`;
    }
    case 'snapshot':
      return `${head}: ${summary.rowsWritten} rows for ${summary.snapshotDate}, ${summary.projects.skipped} projects skipped`;
    case 'digest':
      return `${head}: ${summary.period ?? 'unknown'} digest ${summary.label || 'not built'}, ${summary.tasks} tasks, ${summary.actualHours}h`;
  }
}

export class SmsAlertNotifier implements AlertNotifier {
  private client: twilio.Twilio;

  constructor(
    accountSid: string,
    authToken: string,
    private readonly from: string,
    private readonly to: string
  ) {
    this.client = twilio(accountSid, authToken);
  }

  async notify(message: string): Promise<void> {
    await this.client.messages.create({ from: this.from, to: this.to, body: message });
    console.log(`Alert sent to ${this.to}: ${message.substring(0, 50)}...`);
  }
}

export interface AlertSettings {
  accountSid: string;
  authToken: string;
  from: string;
  to: string;
}

/**
 * Null when alerting is not configured
 */
export function createAlertNotifier(settings: AlertSettings): AlertNotifier | null {
  if (!settings.accountSid || !settings.authToken || !settings.from || !settings.to) {
    return null;
  }
  return new SmsAlertNotifier(settings.accountSid, settings.authToken, settings.from, settings.to);
}

/**
 * Deliver the run alert. Delivery problems are logged and never change the run outcome.
 */
export async function sendRunAlert(notifier: AlertNotifier | null, summary: RunSummary): Promise<boolean> {
  const line = formatRunAlert(summary);
  if (!notifier) {
    console.log(`Alerting not configured, skipping: ${line}`);
    return false;
  }

  try {
    await notifier.notify(line);
    return true;
  } catch (error) {
    console.error(`✗ Failed to send run alert: ${errorMessage(error)}`);
    return false;
  }
}
