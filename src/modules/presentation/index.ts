/**
 * UAE Mortgage Advisor - Presentation Module
 */

export {
  formatMortgageQuote,
  formatAffordability,
  formatBuyVsRent,
  formatEligibility,
  formatMortgageRules,
} from './formatters';
