import { Request, Response, NextFunction } from 'express';
import { JobRunnerService, jobRunnerService } from '../services/jobs/job-runner.service';
import { parseJobRequest } from '../validators/job-request.validator';

export class JobsController {
  constructor(private readonly runner: Pick<JobRunnerService, 'run'> = jobRunnerService) {}

  /**
   * POST /jobs/:job
   * Runs the named job and returns its summary.
   * 200 for success and partial runs, 500 when the run failed.
   */
  async trigger(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const request = parseJobRequest(req.params.job, req.body);
      console.log(`Job ${request.job} triggered by ${req.caller?.sub ?? 'unknown caller'}`);

      const summary = await this.runner.run(request);
      res.status(summary.status === 'failure' ? 500 : 200).json(summary);
    } catch (error) {
      next(error);
    }
  }
}

export const jobsController = new JobsController();
