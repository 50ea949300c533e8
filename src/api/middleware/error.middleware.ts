/**
 * UAE Mortgage Advisor - Error Handling Middleware
 */

import { Request, Response, NextFunction } from 'express';
import { ConversationNotFoundError, InvalidInputError, ModelNotConfiguredError } from '../../shared/errors';

export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof InvalidInputError) {
    res.status(400).json({ error: 'Invalid input', field: err.field, message: err.message });
    return;
  }

  if (err instanceof ModelNotConfiguredError) {
    res.status(503).json({ error: err.message });
    return;
  }

  if (err instanceof ConversationNotFoundError) {
    res.status(404).json({ error: 'Conversation not found' });
    return;
  }

  // Malformed JSON body from express.json()
  if (err instanceof SyntaxError && 'body' in err) {
    res.status(400).json({ error: 'Invalid input', field: 'body', message: 'Request body is not valid JSON' });
    return;
  }

  console.error('[Error]', err);
  res.status(500).json({ error: 'Internal server error' });
}
