import { Job } from 'bull';
import { jobRunnerService } from '../../services/jobs/job-runner.service';
import { parseJobRequest, jobNameSchema } from '../../validators/job-request.validator';
import { reportingQueue } from '../queue';

/**
 * Runs one scheduled or queued job. A failed run rejects so Bull records it as failed.
 */
export async function reportingWorker(job: Job<Record<string, unknown>>): Promise<void> {
  const request = parseJobRequest(job.name, job.data);
  const summary = await jobRunnerService.run(request);

  if (summary.status === 'failure') {
    throw new Error(`${summary.job} run failed: ${summary.error?.message ?? 'unknown error'}`);
  }
}

// Register worker
for (const name of jobNameSchema.options) {
  reportingQueue.process(name, reportingWorker);
}

console.log('✓ Reporting worker registered');
