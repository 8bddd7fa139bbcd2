import { Router } from 'express';
import { StatusController } from '../controllers/StatusController';

/**
 * Creates and configures status routes
 */
export function createStatusRoutes(statusController: StatusController): Router {
  const router = Router();

  // Session status as JSON
  router.get('/status', (req, res) => statusController.getStatus(req, res));

  // Status line, as in the status file
  router.get('/status.txt', (req, res) => statusController.getStatusLine(req, res));

  router.get('/health', (req, res) => statusController.getHealth(req, res));

  return router;
}
