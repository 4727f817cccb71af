import { z } from 'zod';
import { AppError } from '../utils/errors.util';
import { isCalendarDate } from '../utils/month.util';
import type { JobRequest } from '../services/jobs/job-runner.service';

const projectSelection = {
  projectFilter: z.string().trim().min(1).optional(),
  batchSize: z.number().int().positive().optional(),
  batchNumber: z.number().int().min(0).optional(),
  projectDelayMs: z.number().int().min(0).optional(),
};

const instant = z.string().refine((value) => !Number.isNaN(Date.parse(value)), {
  message: 'must be an ISO-8601 date or date-time',
});

export const fetchOptionsSchema = z
  .object({
    ...projectSelection,
    incremental: z.boolean().optional(),
    completedSince: instant.optional(),
  })
  .strict();

const month = z.string().regex(/^\d{4}-(0[1-9]|1[0-2])(-01)?$/, 'expected YYYY-MM');

export const exportOptionsSchema = z
  .object({
    months: z.array(month).min(1).optional(),
  })
  .strict();

export const snapshotOptionsSchema = z.object(projectSelection).strict();

const topN = z.number().int().min(1).max(20).optional();

export const digestOptionsSchema = z.discriminatedUnion('period', [
  z.object({ period: z.literal('monthly'), month: month.optional(), topN }).strict(),
  z
    .object({
      period: z.literal('daily'),
      date: z.string().refine(isCalendarDate, { message: 'expected YYYY-MM-DD' }).optional(),
      topN,
    })
    .strict(),
]);

export const jobNameSchema = z.enum(['fetch', 'export', 'snapshot', 'digest']);

export class ValidationError extends AppError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message, 400);
    this.issues = issues;
  }
}

function issuesOf(error: z.ZodError): string[] {
  return error.issues.map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message));
}

function parseOptions<S extends z.ZodTypeAny>(schema: S, body: unknown, job: string): z.infer<S> {
  const result = schema.safeParse(body ?? {});
  if (!result.success) {
    throw new ValidationError(`Invalid options for ${job} job`, issuesOf(result.error));
  }
  return result.data;
}

/**
 * Turn an untrusted job name and options object into a typed run request.
 */
export function parseJobRequest(job: unknown, body: unknown): JobRequest {
  const name = jobNameSchema.safeParse(job);
  if (!name.success) {
    throw new ValidationError(`Unknown job '${String(job)}'`, [`job: expected one of ${jobNameSchema.options.join(', ')}`]);
  }

  switch (name.data) {
    case 'fetch':
      return { job: 'fetch', options: parseOptions(fetchOptionsSchema, body, 'fetch') };
    case 'export':
      return { job: 'export', options: parseOptions(exportOptionsSchema, body, 'export') };
    case 'snapshot':
      return { job: 'snapshot', options: parseOptions(snapshotOptionsSchema, body, 'snapshot') };
    case 'digest':
      return { job: 'digest', options: parseOptions(digestOptionsSchema, body, 'digest') };
  }
}
