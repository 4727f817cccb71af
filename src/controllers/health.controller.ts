import { Request, Response } from 'express';
import { config } from '../config';
import { pool } from '../config/database';
import { redis } from '../config/redis';

type ProbeStatus = 'ok' | 'error' | 'missing' | 'configured';

export class HealthController {
  /**
   * Basic health check
   */
  async check(_req: Request, res: Response): Promise<void> {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    });
  }

  /**
   * Check integrations: live probes for database and redis, configuration for Asana and Sheets
   */
  async checkIntegrations(_req: Request, res: Response): Promise<void> {
    const integrations: Record<'database' | 'redis' | 'asana' | 'sheets', ProbeStatus> = {
      database: 'error',
      redis: 'error',
      asana: config.asana.accessToken && config.asana.workspaceId ? 'configured' : 'missing',
      sheets: config.google.spreadsheetId ? 'configured' : 'missing',
    };

    // Check PostgreSQL
    try {
      await pool.query('SELECT 1');
      integrations.database = 'ok';
    } catch (error) {
      console.error('Database health check failed:', error);
    }

    // Check Redis
    try {
      await redis.ping();
      integrations.redis = 'ok';
    } catch (error) {
      console.error('Redis health check failed:', error);
    }

    const allOk = Object.values(integrations).every((status) => status === 'ok' || status === 'configured');

    res.status(allOk ? 200 : 503).json({
      status: allOk ? 'ok' : 'degraded',
      integrations,
      timestamp: new Date().toISOString(),
    });
  }
}

export const healthController = new HealthController();
