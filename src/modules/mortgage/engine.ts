/**
 * @file modules/mortgage/engine.ts
 * @description Mortgage Calculation Engine
 *
 * Binds the pure calculators to one policy. Callers that only need the
 * default UAE rules use getMortgageEngine(); tests and alternate regimes
 * construct their own.
 */

import { classifyTargetPrice, computeAffordability } from './affordability';
import { computeLoan } from './amortization';
import { compareBuyVsRent } from './buy-vs-rent';
import { validateEligibility } from './eligibility';
import { MortgagePolicy, UAE_MORTGAGE_POLICY } from './policy';
import { getMortgageRules } from './rules';
import { computeUpfrontCosts } from './upfront-costs';
import {
  AffordabilityAssessment,
  AffordabilityInput,
  BuyVsRentInput,
  BuyVsRentVerdict,
  EligibilityInput,
  EligibilityReport,
  LoanInput,
  LoanQuote,
  MortgageRulesSummary,
  TargetPriceCheck,
  UpfrontCosts,
  UpfrontCostsInput,
} from './types';

export class MortgageEngine {
  constructor(public readonly policy: MortgagePolicy = UAE_MORTGAGE_POLICY) {}

  computeLoan(input: LoanInput): LoanQuote {
    return computeLoan(input, this.policy);
  }

  computeUpfrontCosts(input: UpfrontCostsInput): UpfrontCosts {
    return computeUpfrontCosts(input, this.policy);
  }

  computeAffordability(input: AffordabilityInput): AffordabilityAssessment {
    return computeAffordability(input, this.policy);
  }

  classifyTargetPrice(assessment: AffordabilityAssessment, targetPrice: number): TargetPriceCheck {
    return classifyTargetPrice(assessment, targetPrice);
  }

  compareBuyVsRent(input: BuyVsRentInput): BuyVsRentVerdict {
    return compareBuyVsRent(input, this.policy);
  }

  validateEligibility(input: EligibilityInput): EligibilityReport {
    return validateEligibility(input, this.policy);
  }

  getRules(): MortgageRulesSummary {
    return getMortgageRules(this.policy);
  }
}

// Singleton
let engine: MortgageEngine | null = null;

export function getMortgageEngine(): MortgageEngine {
  if (!engine) {
    engine = new MortgageEngine();
  }
  return engine;
}
