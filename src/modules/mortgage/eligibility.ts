/**
 * @file modules/mortgage/eligibility.ts
 * @description Eligibility Validator
 *
 * Issues are hard blockers; warnings are advisory and never change
 * isEligible.
 */

import { MortgagePolicy, UAE_MORTGAGE_POLICY } from './policy';
import { roundCurrency } from './rounding';
import { EligibilityInputSchema, parseInput } from './schemas';
import { EligibilityInput, EligibilityReport, EmploymentType } from './types';
import { formatAmount } from '../../shared/format';

const REQUIRED_DOCUMENTS = [
  'Gather salary certificates (3 months)',
  'Prepare bank statements (6 months)',
  'Get Emirates ID copy',
  'Obtain passport copy with residence visa',
] as const;

function isSelfEmployed(employmentType: EmploymentType): boolean {
  return employmentType === 'self_employed' || employmentType === 'business_owner';
}

export function validateEligibility(
  input: EligibilityInput,
  policy: MortgagePolicy = UAE_MORTGAGE_POLICY
): EligibilityReport {
  const parsed = parseInput(EligibilityInputSchema, input);
  const employmentType = parsed.employmentType ?? 'salaried';
  const yearsInUae = parsed.yearsInUae ?? 0;
  const isExpat = parsed.nationality === 'expat';
  const rules = policy.eligibility;

  const issues: string[] = [];
  const warnings: string[] = [];

  const maxLtv = policy.maxLtv[parsed.nationality];
  const minimumIncome = rules.minimumIncome[parsed.nationality];

  if (parsed.monthlyIncome < minimumIncome) {
    issues.push(`Most banks require minimum income of ${formatAmount(minimumIncome)} ${policy.currency}/month`);
  }

  if (isSelfEmployed(employmentType)) {
    warnings.push(
      'Self-employed applicants may face stricter documentation requirements (2+ years of audited accounts)'
    );
    if (isExpat && yearsInUae < rules.selfEmployedMinYearsInUae) {
      issues.push(`Self-employed expats typically need ${rules.selfEmployedMinYearsInUae}+ years in UAE`);
    }
  }

  if (isExpat && yearsInUae < rules.advisedMinYearsInUae) {
    warnings.push(`Some banks require ${Math.round(rules.advisedMinYearsInUae * 12)}+ months UAE residency`);
  }

  const isEligible = issues.length === 0;

  return {
    nationality: parsed.nationality,
    nationalityLabel: isExpat ? 'Expat' : 'UAE National',
    employmentType,
    isEligible,
    maxLtv,
    maxLtvPercent: roundCurrency(maxLtv * 100),
    minDownPaymentPercent: roundCurrency((1 - maxLtv) * 100),
    minimumIncome,
    issues,
    warnings,
    nextSteps: isEligible ? [...REQUIRED_DOCUMENTS] : ['Address the issues listed above first'],
  };
}
