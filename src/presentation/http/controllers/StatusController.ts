import { Request, Response } from 'express';
import { GetSessionStatusUseCase } from '../../../application/use-cases/GetSessionStatusUseCase';

/**
 * Controller for handling session status HTTP requests
 */
export class StatusController {
  constructor(
    private getSessionStatusUseCase: GetSessionStatusUseCase
  ) { }

  /**
   * Handles GET /status
   * Returns JSON with the session state and the latest snapshot
   */
  getStatus(_req: Request, res: Response): void {
    const result = this.getSessionStatusUseCase.execute();

    if (!result.success || !result.status) {
      res.status(404).json({
        state: result.state,
        error: result.error || 'No status available'
      });
      return;
    }

    res.json(result.status);
  }

  /**
   * Handles GET /status.txt
   * Returns the same pipe-delimited line the status file holds
   */
  getStatusLine(_req: Request, res: Response): void {
    const result = this.getSessionStatusUseCase.execute();
    const line = result.status?.line ?? null;

    res.type('text/plain');
    if (line === null) {
      res.status(404).send('');
      return;
    }

    res.send(`${line}\n`);
  }

  /**
   * Handles GET /health
   */
  getHealth(_req: Request, res: Response): void {
    const result = this.getSessionStatusUseCase.execute();
    res.json({ status: 'ok', state: result.state });
  }
}
