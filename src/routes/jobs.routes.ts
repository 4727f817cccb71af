import { Router } from 'express';
import { jobsController } from '../controllers/jobs.controller';
import { authMiddleware } from '../middleware/auth.middleware';

const router = Router();

router.post('/:job', authMiddleware, jobsController.trigger.bind(jobsController));

export default router;
