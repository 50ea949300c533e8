/**
 * @file modules/mortgage/amortization.ts
 * @description Amortization Engine
 *
 * EMI (equated monthly installment) for a fixed-rate loan, the inverse
 * (principal supported by a payment), and the month-by-month schedule scan
 * used to measure principal repaid over a stay horizon.
 */

import { MortgagePolicy, UAE_MORTGAGE_POLICY } from './policy';
import { roundCurrency } from './rounding';
import { LoanInputSchema, parseInput } from './schemas';
import { LoanInput, LoanQuote, PolicyAdjustment } from './types';

// ============================================
// ANNUITY MATH
// ============================================

export function monthlyRateFor(annualRatePercent: number): number {
  return annualRatePercent / 100 / 12;
}

/**
 * EMI = P × r × (1+r)^n / ((1+r)^n − 1); straight-line P / n at r = 0.
 */
export function annuityPayment(principal: number, monthlyRate: number, months: number): number {
  if (monthlyRate === 0) return principal / months;

  const growth = Math.pow(1 + monthlyRate, months);
  return (principal * monthlyRate * growth) / (growth - 1);
}

/**
 * Inverse of annuityPayment: the principal a given payment amortizes.
 * P = EMI × ((1+r)^n − 1) / (r × (1+r)^n)
 */
export function principalForPayment(payment: number, monthlyRate: number, months: number): number {
  if (monthlyRate === 0) return payment * months;

  const growth = Math.pow(1 + monthlyRate, months);
  return (payment * (growth - 1)) / (monthlyRate * growth);
}

export interface ScheduleProgress {
  principalPaid: number;
  interestPaid: number;
  remainingBalance: number;
}

/**
 * Walk the schedule for `months` payments. A linear scan rather than a
 * closed form so it can stop at an arbitrary horizon.
 */
export function scanSchedule(
  loanAmount: number,
  monthlyRate: number,
  payment: number,
  months: number
): ScheduleProgress {
  let principalPaid = 0;
  let interestPaid = 0;
  let balance = loanAmount;

  for (let month = 0; month < months; month++) {
    const interestPortion = balance * monthlyRate;
    const principalPortion = payment - interestPortion;
    interestPaid += interestPortion;
    principalPaid += principalPortion;
    balance -= principalPortion;
  }

  return { principalPaid, interestPaid, remainingBalance: balance };
}

// ============================================
// POLICY CLAMPS
// ============================================

export function applyDownPaymentFloor(
  requested: number,
  policy: MortgagePolicy
): { applied: number; adjustment?: PolicyAdjustment } {
  if (requested >= policy.minDownPaymentPercent) {
    return { applied: requested };
  }

  return {
    applied: policy.minDownPaymentPercent,
    adjustment: {
      field: 'downPaymentPercent',
      requested,
      applied: policy.minDownPaymentPercent,
      reason: `Minimum down payment is ${policy.minDownPaymentPercent}%`,
    },
  };
}

export function applyTenureCap(
  requested: number,
  policy: MortgagePolicy
): { applied: number; adjustment?: PolicyAdjustment } {
  if (requested <= policy.maxTenureYears) {
    return { applied: requested };
  }

  return {
    applied: policy.maxTenureYears,
    adjustment: {
      field: 'tenureYears',
      requested,
      applied: policy.maxTenureYears,
      reason: `Maximum tenure is ${policy.maxTenureYears} years`,
    },
  };
}

// ============================================
// LOAN QUOTE
// ============================================

export function computeLoan(input: LoanInput, policy: MortgagePolicy = UAE_MORTGAGE_POLICY): LoanQuote {
  const parsed = parseInput(LoanInputSchema, input);

  const downPayment = applyDownPaymentFloor(
    parsed.downPaymentPercent ?? policy.minDownPaymentPercent,
    policy
  );
  const tenure = applyTenureCap(parsed.tenureYears ?? policy.maxTenureYears, policy);
  const annualRatePercent = parsed.annualRatePercent ?? policy.defaultAnnualRatePercent;

  const adjustments: PolicyAdjustment[] = [];
  if (downPayment.adjustment) adjustments.push(downPayment.adjustment);
  if (tenure.adjustment) adjustments.push(tenure.adjustment);

  const downPaymentAmount = parsed.propertyPrice * (downPayment.applied / 100);
  const loanAmount = parsed.propertyPrice - downPaymentAmount;
  const tenureMonths = tenure.applied * 12;

  const monthlyPayment = roundCurrency(
    annuityPayment(loanAmount, monthlyRateFor(annualRatePercent), tenureMonths)
  );
  const roundedLoan = roundCurrency(loanAmount);
  const totalPayment = roundCurrency(monthlyPayment * tenureMonths);

  return {
    propertyPrice: roundCurrency(parsed.propertyPrice),
    downPaymentPercent: downPayment.applied,
    downPayment: roundCurrency(downPaymentAmount),
    loanAmount: roundedLoan,
    loanToValuePercent: 100 - downPayment.applied,
    annualRatePercent,
    tenureYears: tenure.applied,
    tenureMonths,
    monthlyPayment,
    totalPayment,
    totalInterest: roundCurrency(totalPayment - roundedLoan),
    adjustments,
  };
}
