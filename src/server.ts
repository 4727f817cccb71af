import app from './app';
import { ALL_JOBS, config, validateConfig } from './config';
import { pool } from './config/database';
import { redis } from './config/redis';
import { reportingQueue } from './jobs/queue';
import { scheduleReportingJobs } from './jobs/schedulers/reporting.scheduler';

// Register queue workers
import './jobs/workers/reporting.worker';

async function startServer() {
  try {
    // Validate environment variables
    validateConfig(ALL_JOBS, { http: true });

    // Test database connection
    await pool.query('SELECT 1');
    console.log('✓ Database connected');

    // Test Redis connection
    await redis.ping();
    console.log('✓ Redis connected');

    // Initialize scheduled jobs
    await scheduleReportingJobs();

    // Start server
    const port = config.port;
    app.listen(port, () => {
      console.log('');
      console.log('🚀 Task hours reporter is live!');
      console.log(`📍 Server running on port ${port}`);
      console.log(`🌍 Environment: ${config.nodeEnv}`);
      console.log(`🕐 Report time zone: ${config.report.timeZone}`);
      console.log('');
      console.log('Endpoints:');
      console.log(`  GET  /health`);
      console.log(`  GET  /health/integrations`);
      console.log(`  POST /jobs/fetch     (Bearer token)`);
      console.log(`  POST /jobs/export    (Bearer token)`);
      console.log(`  POST /jobs/snapshot  (Bearer token)`);
      console.log(`  POST /jobs/digest    (Bearer token)`);
      console.log('');
    });
  } catch (error) {
    console.error('❌ Failed to start server:', error);
    process.exit(1);
  }
}

// Graceful shutdown
process.on('SIGTERM', async () => {
  console.log('Closing reporting queue...');
  await reportingQueue.close();
  await redis.quit();
  await pool.end();
  process.exit(0);
});

startServer();
