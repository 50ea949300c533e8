/**
 * UAE Mortgage Advisor - Calculator API Routes
 * Deterministic REST surface over the mortgage engine
 */

import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { MortgageEngine } from '../../modules/mortgage';
import { parseInput } from '../../shared/validation';

// Only the extra field is checked here; the engine validates the rest.
const TargetPriceSchema = z
  .object({
    desiredPropertyPrice: z
      .number({ invalid_type_error: 'desiredPropertyPrice must be a number' })
      .finite()
      .positive('desiredPropertyPrice must be greater than 0')
      .optional(),
  })
  .passthrough();

export function createCalculatorRoutes(engine: MortgageEngine): Router {
  const router = Router();

  /**
   * POST /api/calculate/mortgage
   */
  router.post('/calculate/mortgage', (req: Request, res: Response, next: NextFunction) => {
    try {
      const quote = engine.computeLoan(req.body);
      const upfront = engine.computeUpfrontCosts({
        propertyPrice: quote.propertyPrice,
        downPaymentPercent: quote.downPaymentPercent,
      });
      res.json({ quote, upfront });
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /api/calculate/affordability
   */
  router.post('/calculate/affordability', (req: Request, res: Response, next: NextFunction) => {
    try {
      const assessment = engine.computeAffordability(req.body);
      const { desiredPropertyPrice } = parseInput(TargetPriceSchema, req.body);
      const targetPrice =
        desiredPropertyPrice !== undefined
          ? engine.classifyTargetPrice(assessment, desiredPropertyPrice)
          : null;
      res.json({ assessment, targetPrice });
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /api/calculate/buy-vs-rent
   */
  router.post('/calculate/buy-vs-rent', (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(engine.compareBuyVsRent(req.body));
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /api/calculate/eligibility
   */
  router.post('/calculate/eligibility', (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(engine.validateEligibility(req.body));
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/rules
   */
  router.get('/rules', (_req: Request, res: Response) => {
    res.json(engine.getRules());
  });

  return router;
}
