/**
 * UAE Mortgage Advisor - Authentication Middleware
 * API key validation for admin endpoints
 */

import { Request, Response, NextFunction, RequestHandler } from 'express';

export function createAdminAuthMiddleware(expectedKey: string | undefined): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!expectedKey) {
      console.error('[Auth] ADMIN_API_KEY not configured');
      res.status(503).json({ error: 'Admin access not configured' });
      return;
    }

    const apiKey = req.header('x-api-key');
    if (!apiKey) {
      res.status(401).json({ error: 'Missing API key' });
      return;
    }

    if (apiKey !== expectedKey) {
      res.status(403).json({ error: 'Invalid API key' });
      return;
    }

    next();
  };
}
