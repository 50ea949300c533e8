/**
 * UAE Mortgage Advisor - Mortgage Calculation Module
 */

export * from './types';
export * from './policy';
export { roundCurrency, roundTo } from './rounding';
export {
  computeLoan,
  annuityPayment,
  principalForPayment,
  monthlyRateFor,
  scanSchedule,
} from './amortization';
export { computeUpfrontCosts } from './upfront-costs';
export { computeAffordability, classifyTargetPrice } from './affordability';
export { compareBuyVsRent, estimateBreakEvenYears, projectTotalRent } from './buy-vs-rent';
export { validateEligibility } from './eligibility';
export { getMortgageRules } from './rules';
export { MortgageEngine, getMortgageEngine } from './engine';
export { NationalitySchema, EmploymentTypeSchema } from './schemas';
