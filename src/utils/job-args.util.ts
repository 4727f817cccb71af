import { parseArgs } from 'util';
import { JobName } from '../types/job.types';
import { ValidationError } from '../validators/job-request.validator';

const FLAGS = {
  'project-filter': { type: 'string' },
  'batch-size': { type: 'string' },
  'batch-number': { type: 'string' },
  incremental: { type: 'boolean' },
  'completed-since': { type: 'string' },
  months: { type: 'string' },
  period: { type: 'string' },
  month: { type: 'string' },
  date: { type: 'string' },
  'top-n': { type: 'string' },
} as const;

type Flag = keyof typeof FLAGS;

const SELECTION: Flag[] = ['project-filter', 'batch-size', 'batch-number'];

export const FLAGS_BY_JOB: Record<JobName, Flag[]> = {
  fetch: [...SELECTION, 'incremental', 'completed-since'],
  export: ['months'],
  snapshot: SELECTION,
  digest: ['period', 'month', 'date', 'top-n'],
};

function optionalInt(value: string | undefined): number | undefined {
  return value === undefined ? undefined : Number(value);
}

/**
 * CLI flags → the same options object the HTTP endpoint accepts.
 * A flag that belongs to another job is an error rather than silently dropped.
 */
export function optionsFromArgs(job: JobName, args: string[]): Record<string, unknown> {
  const { values } = parseArgs({ args, options: FLAGS, strict: true });

  const allowed = new Set<string>(FLAGS_BY_JOB[job]);
  const stray = Object.keys(values).filter((flag) => !allowed.has(flag));
  if (stray.length > 0) {
    throw new ValidationError(
      `Option not supported by the ${job} job`,
      stray.map((flag) => `--${flag}: not a ${job} option`)
    );
  }

  switch (job) {
    case 'export':
      return { months: values.months?.split(',').map((m) => m.trim()) };
    case 'digest': {
      // Each period's schema is strict, so only the flags given become keys
      const options: Record<string, unknown> = { period: values.period ?? 'daily' };
      if (values.month !== undefined) options.month = values.month;
      if (values.date !== undefined) options.date = values.date;
      if (values['top-n'] !== undefined) options.topN = optionalInt(values['top-n']);
      return options;
    }
    case 'snapshot':
    case 'fetch': {
      const selection = {
        projectFilter: values['project-filter'],
        batchSize: optionalInt(values['batch-size']),
        batchNumber: optionalInt(values['batch-number']),
      };
      if (job === 'snapshot') return selection;
      return {
        ...selection,
        incremental: values.incremental,
        completedSince: values['completed-since'],
      };
    }
  }
}
