import express, { Express } from 'express';
import {
  GetSessionStatusUseCase,
  SessionStatusProvider
} from '../../application/use-cases/GetSessionStatusUseCase';
import { StatusController } from './controllers/StatusController';
import { createStatusRoutes } from './routes/status.routes';

/**
 * Creates and configures the Express status application
 * Can be used both for the CLI's status server and testing
 */
export function createStatusApp(provider: SessionStatusProvider): Express {
  // Initialize use cases
  const getSessionStatusUseCase = new GetSessionStatusUseCase(provider);

  // Initialize controllers
  const statusController = new StatusController(getSessionStatusUseCase);

  // Initialize Express app
  const app: Express = express();

  // Setup routes
  app.use('/', createStatusRoutes(statusController));

  return app;
}
