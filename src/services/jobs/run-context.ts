import { config } from '../../config';
import { asQueryable, pool } from '../../config/database';
import { TaskSource } from '../../types/asana.types';
import { SheetsGateway } from '../../types/report.types';
import { SnapshotStore, TaskStore } from '../../types/task.types';
import {
  RetryHooks,
  RetryPolicy,
  createRetryPolicy,
  isRetryableSheetsError,
  isTransientSourceError,
} from '../../utils/retry.util';
import { AlertNotifier, createAlertNotifier } from '../alert/alert.service';
import { AsanaClient } from '../asana/asana.client';
import { GoogleSheetsGateway } from '../reporting/sheets.gateway';
import { TaskRecordRepository } from '../../repositories/task-record.repository';
import { OpenTaskSnapshotRepository } from '../../repositories/open-task-snapshot.repository';

/**
 * Everything one job run talks to. Built fresh for every run.
 * Remote clients are factories so a missing credential fails the run instead of the process.
 */
export interface RunContext {
  taskSource(): TaskSource;
  sheets(): SheetsGateway;
  taskStore: TaskStore;
  snapshotStore: SnapshotStore;
  notifier: AlertNotifier | null;
  timeZone: string;
  locale: string;
  completedSince: string;
  projectDelayMs: number;
  digestTopN: number;
  sheetsRetry: RetryPolicy;
  retryHooks?: RetryHooks;
}

export function createRunContext(): RunContext {
  const db = asQueryable(pool);
  const retry = {
    maxAttempts: config.retry.maxAttempts,
    baseDelayMs: config.retry.baseDelayMs,
    maxDelayMs: config.retry.maxDelayMs,
  };

  return {
    taskSource: () =>
      new AsanaClient({
        accessToken: config.asana.accessToken,
        workspaceId: config.asana.workspaceId,
        baseUrl: config.asana.baseUrl,
        retryPolicy: createRetryPolicy(isTransientSourceError, retry),
      }),
    sheets: () =>
      GoogleSheetsGateway.create({
        spreadsheetId: config.google.spreadsheetId,
        keyFile: config.google.credentialsPath,
      }),
    taskStore: new TaskRecordRepository(db),
    snapshotStore: new OpenTaskSnapshotRepository(db),
    notifier: createAlertNotifier({
      accountSid: config.twilio.accountSid,
      authToken: config.twilio.authToken,
      from: config.twilio.phoneNumber,
      to: config.alertPhoneNumber,
    }),
    timeZone: config.report.timeZone,
    locale: config.report.locale,
    completedSince: config.asana.completedSince,
    projectDelayMs: config.asana.projectDelayMs,
    digestTopN: config.report.digestTopN,
    sheetsRetry: createRetryPolicy(isRetryableSheetsError, retry),
  };
}
