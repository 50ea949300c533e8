/**
 * @file modules/mortgage/affordability.ts
 * @description Affordability Engine
 *
 * Maximum purchasing power from income under a debt-to-income cap. The
 * payment left under the cap is turned into a loan by inverting the annuity
 * at the policy's default rate and maximum tenure, then into a price by
 * dividing by the expat LTV cap.
 */

import { monthlyRateFor, principalForPayment } from './amortization';
import { MortgagePolicy, UAE_MORTGAGE_POLICY } from './policy';
import { roundCurrency, roundTo } from './rounding';
import { AffordabilityInputSchema, parseInput } from './schemas';
import {
  AffordabilityAssessment,
  AffordabilityInput,
  PolicyAdjustment,
  TargetPriceCheck,
} from './types';

function unaffordableReason(monthlyIncome: number, maxDtiRatioPercent: number): string {
  if (monthlyIncome === 0) {
    return 'No income was provided, so no mortgage payment can be supported.';
  }
  if (maxDtiRatioPercent === 0) {
    return 'A 0% debt-to-income limit leaves nothing for a mortgage payment.';
  }
  return 'Your existing debts already use the full debt-to-income allowance. Reduce debts before considering a mortgage.';
}

export function computeAffordability(
  input: AffordabilityInput,
  policy: MortgagePolicy = UAE_MORTGAGE_POLICY
): AffordabilityAssessment {
  const parsed = parseInput(AffordabilityInputSchema, input);
  const monthlyIncome = parsed.monthlyIncome;
  const monthlyExpenses = parsed.monthlyExpenses ?? 0;
  const existingDebts = parsed.existingDebts ?? 0;

  // A requested ratio above the regulatory cap is held at the cap
  const requestedDti = parsed.maxDtiRatioPercent ?? policy.defaultMaxDtiPercent;
  const maxDtiRatioPercent = Math.min(requestedDti, policy.defaultMaxDtiPercent);
  const adjustments: PolicyAdjustment[] = [];
  if (requestedDti > maxDtiRatioPercent) {
    adjustments.push({
      field: 'maxDtiRatioPercent',
      requested: requestedDti,
      applied: maxDtiRatioPercent,
      reason: `Debt-to-income is capped at ${policy.defaultMaxDtiPercent}%`,
    });
  }

  const expensesWithinComfort = monthlyExpenses < monthlyIncome * policy.expenseComfortRatio;
  const availableForDebt = monthlyIncome * (maxDtiRatioPercent / 100);
  const maxMonthlyPayment = availableForDebt - existingDebts;

  if (maxMonthlyPayment <= 0) {
    return {
      monthlyIncome,
      monthlyExpenses,
      existingDebts,
      maxDtiRatioPercent,
      maxMonthlyPayment: 0,
      recommendedMonthlyPayment: 0,
      maxLoanAmount: 0,
      maxPropertyPrice: 0,
      comfortablePropertyPrice: 0,
      debtToIncomeRatio: 100,
      isAffordable: false,
      expensesWithinComfort,
      message: unaffordableReason(monthlyIncome, maxDtiRatioPercent),
      adjustments,
    };
  }

  const maxLoanAmount = principalForPayment(
    maxMonthlyPayment,
    monthlyRateFor(policy.defaultAnnualRatePercent),
    policy.maxTenureYears * 12
  );
  const maxPropertyPrice = maxLoanAmount / policy.maxLtv.expat;
  const debtToIncomeRatio = ((maxMonthlyPayment + existingDebts) / monthlyIncome) * 100;

  return {
    monthlyIncome,
    monthlyExpenses,
    existingDebts,
    maxDtiRatioPercent,
    maxMonthlyPayment: roundCurrency(maxMonthlyPayment),
    recommendedMonthlyPayment: roundCurrency(maxMonthlyPayment * policy.comfortMargin),
    maxLoanAmount: roundCurrency(maxLoanAmount),
    maxPropertyPrice: roundCurrency(maxPropertyPrice),
    comfortablePropertyPrice: roundCurrency(maxPropertyPrice * policy.comfortMargin),
    debtToIncomeRatio: roundTo(debtToIncomeRatio, 1),
    isAffordable: true,
    expensesWithinComfort,
    message: `A comfortable budget is ${Math.round(policy.comfortMargin * 100)}% of the maximum, leaving room for emergencies.`,
    adjustments,
  };
}

/**
 * Place a specific asking price against an assessment.
 */
export function classifyTargetPrice(
  assessment: AffordabilityAssessment,
  targetPrice: number
): TargetPriceCheck {
  if (assessment.isAffordable && targetPrice <= assessment.comfortablePropertyPrice) {
    return { targetPrice, fit: 'COMFORTABLE', gap: 0 };
  }
  if (assessment.isAffordable && targetPrice <= assessment.maxPropertyPrice) {
    return { targetPrice, fit: 'STRETCH', gap: 0 };
  }
  return {
    targetPrice,
    fit: 'OVER_BUDGET',
    gap: roundCurrency(targetPrice - assessment.maxPropertyPrice),
  };
}
