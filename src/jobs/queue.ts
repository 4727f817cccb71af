import Bull from 'bull';
import { config } from '../config';

// Runs retry their remote calls internally, so Bull never re-runs a job
export const reportingQueue = new Bull<Record<string, unknown>>('task-reporting', config.redisUrl, {
  defaultJobOptions: {
    attempts: 1,
    removeOnComplete: 50,
    removeOnFail: false,
  },
});

// Queue event handlers
reportingQueue.on('completed', (job) => {
  console.log(`✓ Job ${job.name} (${job.id}) completed`);
});

reportingQueue.on('failed', (job, err) => {
  console.error(`✗ Job ${job?.name} (${job?.id}) failed:`, err.message);
});

reportingQueue.on('error', (error) => {
  console.error('Queue error:', error);
});

export default reportingQueue;
