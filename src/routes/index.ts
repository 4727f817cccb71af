import { Router } from 'express';
import healthRoutes from './health.routes';
import jobRoutes from './jobs.routes';

const router = Router();

// Mount routes
router.use('/health', healthRoutes);
router.use('/jobs', jobRoutes);

export default router;
