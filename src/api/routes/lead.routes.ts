/**
 * UAE Mortgage Advisor - Lead API Routes
 */

import { Router, Request, Response, NextFunction, RequestHandler } from 'express';
import { Lead, LeadService } from '../../modules/leads';

function toJson(lead: Lead) {
  return {
    id: lead.id,
    conversation_id: lead.conversationId,
    email: lead.email,
    phone: lead.phone,
    name: lead.name,
    created_at: lead.createdAt.toISOString(),
  };
}

export function createLeadRoutes(leads: LeadService, adminAuth: RequestHandler): Router {
  const router = Router();

  /**
   * POST /api/lead
   * Capture contact details for specialist follow-up
   */
  router.post('/lead', async (req: Request, res: Response, next: NextFunction) => {
    try {
      await leads.capture(req.body);
      res.json({ status: 'success', message: "Thank you! We'll be in touch soon." });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/leads
   * Admin only
   */
  router.get('/leads', adminAuth, async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const all = await leads.list();
      res.json({ count: all.length, leads: all.map(toJson) });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
