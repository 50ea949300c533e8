/**
 * Static summary of the rules the engine enforces, for the "rules" tool.
 */

import { MortgagePolicy, UAE_MORTGAGE_POLICY, totalFeesPercent } from './policy';
import { roundCurrency } from './rounding';
import { MortgageRulesSummary } from './types';

export function getMortgageRules(policy: MortgagePolicy = UAE_MORTGAGE_POLICY): MortgageRulesSummary {
  const fees = totalFeesPercent(policy);

  return {
    policyName: policy.name,
    policyVersion: policy.version,
    currency: policy.currency,
    maxLtvPercent: {
      expat: roundCurrency(policy.maxLtv.expat * 100),
      uae_national: roundCurrency(policy.maxLtv.uae_national * 100),
    },
    minDownPaymentPercent: policy.minDownPaymentPercent,
    maxTenureYears: policy.maxTenureYears,
    fees: [
      { label: 'Dubai Land Department transfer fee', percent: policy.fees.transferFeePercent },
      { label: 'Real estate agent commission', percent: policy.fees.agencyFeePercent },
      { label: 'Valuation, mortgage registration, insurance', percent: policy.fees.miscFeesPercent },
    ],
    totalFeesPercent: fees,
    totalCashPercent: policy.minDownPaymentPercent + fees,
    defaultAnnualRatePercent: policy.defaultAnnualRatePercent,
    minimumIncome: { ...policy.eligibility.minimumIncome },
    maxDtiRatioPercent: policy.defaultMaxDtiPercent,
    maintenanceRatePercent: policy.maintenanceRatePercent,
    shortStayYears: policy.buyVsRent.shortStayYears,
    longStayYears: policy.buyVsRent.longStayYears,
  };
}
