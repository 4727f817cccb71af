import { DigestPeriod, TabOutcome } from './report.types';

export type JobName = 'fetch' | 'export' | 'snapshot' | 'digest';

export type RunStatus = 'success' | 'partial' | 'failure';

export interface RunError {
  kind: string;
  message: string;
  taskId?: string;
}

export interface SkippedProject {
  projectId: string;
  projectName: string;
  error: string;
}

interface BaseSummary {
  job: JobName;
  status: RunStatus;
  startedAt: string;
  finishedAt: string;
  error?: RunError;
}

export interface FetchSummary extends BaseSummary {
  job: 'fetch';
  projects: { total: number; processed: number; skipped: number };
  tasks: {
    processed: number;
    inserted: number;
    updated: number;
    unchanged: number;
    failed: number;
    unestimated: number;
  };
  parseWarnings: number;
  skippedProjects: SkippedProject[];
}

export interface ExportSummary extends BaseSummary {
  job: 'export';
  tabs: TabOutcome[];
}

export interface SnapshotSummary extends BaseSummary {
  job: 'snapshot';
  snapshotDate: string;
  projects: { total: number; processed: number; skipped: number };
  rowsWritten: number;
  skippedProjects: SkippedProject[];
}

export interface DigestSummary extends BaseSummary {
  job: 'digest';
  period: DigestPeriod | null;
  /** Month (`YYYY-MM`) or date (`YYYY-MM-DD`) the digest covers */
  label: string;
  tasks: number;
  actualHours: number;
  delivered: boolean;
}

export type RunSummary = FetchSummary | ExportSummary | SnapshotSummary | DigestSummary;
