/**
 * UAE Mortgage Advisor - Express Application
 */

import express, { Express, NextFunction, Request, Response } from 'express';
import helmet from 'helmet';
import cors from 'cors';
import rateLimit from 'express-rate-limit';
import { InMemorySessionStore, MortgageAdvisorAgent } from '../agents';
import { Settings, isModelConfigured } from '../config';
import { LeadService } from '../modules/leads';
import { MortgageEngine } from '../modules/mortgage';
import { createAdminAuthMiddleware } from './middleware/auth.middleware';
import { errorHandler } from './middleware/error.middleware';
import { createCalculatorRoutes } from './routes/calculator.routes';
import { createChatRoutes } from './routes/chat.routes';
import { createLeadRoutes } from './routes/lead.routes';

export interface AppDependencies {
  settings: Settings;
  engine: MortgageEngine;
  sessions: InMemorySessionStore;
  /** null when no model credentials are configured */
  agent: MortgageAdvisorAgent | null;
  leads: LeadService;
}

export function createApp(deps: AppDependencies): Express {
  const { settings, engine, sessions, agent, leads } = deps;
  const app = express();

  // Security middleware
  app.use(helmet());
  app.use(cors());
  app.use(express.json());

  if (settings.debug) {
    app.use((req: Request, _res: Response, next: NextFunction) => {
      console.log(`[API] ${req.method} ${req.path}`);
      next();
    });
  }

  const chatLimiter = rateLimit({
    windowMs: 60 * 1000,
    max: settings.chatRateLimitPerMinute,
  });
  app.use('/api/chat', chatLimiter);

  app.get('/', (_req: Request, res: Response) => {
    res.json({
      service: 'UAE Mortgage Advisor',
      status: 'running',
      endpoints: [
        'POST /api/chat',
        'POST /api/chat/stream',
        'GET /api/conversation/:id',
        'POST /api/lead',
        'POST /api/calculate/mortgage',
        'POST /api/calculate/affordability',
        'POST /api/calculate/buy-vs-rent',
        'POST /api/calculate/eligibility',
        'GET /api/rules',
        'GET /api/health',
      ],
    });
  });

  app.get('/api/health', (_req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      model: agent ? agent.modelName : settings.modelName,
      api_key_configured: isModelConfigured(settings),
      lead_storage: leads.storageMode,
    });
  });

  app.use('/api', createChatRoutes({ agent, sessions }));
  app.use('/api', createCalculatorRoutes(engine));
  app.use('/api', createLeadRoutes(leads, createAdminAuthMiddleware(settings.adminApiKey)));

  // Error handler
  app.use(errorHandler);

  return app;
}
