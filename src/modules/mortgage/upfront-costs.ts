/**
 * @file modules/mortgage/upfront-costs.ts
 * @description Upfront Cost Calculator
 *
 * Cash due at transfer: the down payment plus the fixed transaction fees.
 * Fee rates belong to the policy; callers cannot override them.
 */

import { applyDownPaymentFloor } from './amortization';
import { MortgagePolicy, UAE_MORTGAGE_POLICY, totalFeesPercent } from './policy';
import { roundCurrency } from './rounding';
import { UpfrontCostsInputSchema, parseInput } from './schemas';
import { PolicyAdjustment, UpfrontCosts, UpfrontCostsInput } from './types';

export function computeUpfrontCosts(
  input: UpfrontCostsInput,
  policy: MortgagePolicy = UAE_MORTGAGE_POLICY
): UpfrontCosts {
  const parsed = parseInput(UpfrontCostsInputSchema, input);
  const price = parsed.propertyPrice;

  const downPayment = applyDownPaymentFloor(
    parsed.downPaymentPercent ?? policy.minDownPaymentPercent,
    policy
  );
  const adjustments: PolicyAdjustment[] = downPayment.adjustment ? [downPayment.adjustment] : [];

  const downPaymentAmount = roundCurrency(price * (downPayment.applied / 100));
  const transferFee = roundCurrency(price * (policy.fees.transferFeePercent / 100));
  const agencyFee = roundCurrency(price * (policy.fees.agencyFeePercent / 100));
  const miscFees = roundCurrency(price * (policy.fees.miscFeesPercent / 100));
  const totalFees = roundCurrency(transferFee + agencyFee + miscFees);

  return {
    propertyPrice: roundCurrency(price),
    downPaymentPercent: downPayment.applied,
    downPayment: downPaymentAmount,
    transferFeePercent: policy.fees.transferFeePercent,
    transferFee,
    agencyFeePercent: policy.fees.agencyFeePercent,
    agencyFee,
    miscFeesPercent: policy.fees.miscFeesPercent,
    miscFees,
    totalFees,
    totalFeesPercent: totalFeesPercent(policy),
    totalCashNeeded: roundCurrency(downPaymentAmount + totalFees),
    adjustments,
  };
}
