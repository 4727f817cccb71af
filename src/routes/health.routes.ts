import { Router } from 'express';
import { healthController } from '../controllers/health.controller';

const router = Router();

// Unauthenticated: used by the platform's liveness and readiness probes
router.get('/', healthController.check.bind(healthController));
router.get('/integrations', healthController.checkIntegrations.bind(healthController));

export default router;
