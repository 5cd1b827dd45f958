import { Response } from 'express';
import { z } from 'zod';
import { AppError } from '../utils/errors';
import { errorMessage, logger } from '../utils/logger';

/**
 * Map a thrown error to a JSON response. Known errors answer with their own
 * status; anything else is logged and reported as a 500.
 */
export function sendError(res: Response, err: unknown, action: string): void {
  if (err instanceof z.ZodError) {
    res.status(400).json({ error: 'Validation error', details: err.issues });
    return;
  }
  if (err instanceof AppError) {
    if (err.status >= 500) {
      logger.error(`Error ${action}`, { error: err.message, kind: err.name });
    }
    res.status(err.status).json({ error: err.message });
    return;
  }
  logger.error(`Error ${action}`, { error: errorMessage(err) });
  res.status(500).json({ error: 'Internal server error' });
}
