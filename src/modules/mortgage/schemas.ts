/**
 * Input schemas for the calculation engine.
 *
 * Validation failures surface as InvalidInputError naming the first bad
 * field; the calculation never runs on a value outside its basic domain.
 */

import { z } from 'zod';
import { parseInput } from '../../shared/validation';

export { parseInput };

// Upper bounds keep every result finite and the yearly loops short.
export const MAX_AMOUNT = 1_000_000_000_000;
export const MAX_PERCENT = 100;
export const MAX_STAY_YEARS = 100;

function amount(field: string) {
  return z
    .number({
      required_error: `${field} is required`,
      invalid_type_error: `${field} must be a number`,
    })
    .finite(`${field} must be a finite number`)
    .max(MAX_AMOUNT, `${field} cannot exceed 1,000,000,000,000`);
}

function wholeYears(field: string) {
  return amount(field)
    .int(`${field} must be a whole number of years`)
    .positive(`${field} must be greater than 0`);
}

export const NationalitySchema = z.enum(['expat', 'uae_national'], {
  errorMap: () => ({ message: "nationality must be 'expat' or 'uae_national'" }),
});

export const EmploymentTypeSchema = z.enum(['salaried', 'self_employed', 'business_owner'], {
  errorMap: () => ({
    message: "employmentType must be 'salaried', 'self_employed' or 'business_owner'",
  }),
});

const downPaymentPercent = amount('downPaymentPercent')
  .min(0, 'downPaymentPercent cannot be negative')
  .max(100, 'downPaymentPercent cannot exceed 100');

const annualRatePercent = amount('annualRatePercent')
  .min(0, 'annualRatePercent cannot be negative')
  .max(MAX_PERCENT, 'annualRatePercent cannot exceed 100');

// Growth rates below -100% would make values negative.
function growthPercent(field: string) {
  return amount(field)
    .gt(-100, `${field} must be greater than -100`)
    .max(MAX_PERCENT, `${field} cannot exceed 100`);
}

export const LoanInputSchema = z.object({
  propertyPrice: amount('propertyPrice').positive('propertyPrice must be greater than 0'),
  downPaymentPercent: downPaymentPercent.optional(),
  annualRatePercent: annualRatePercent.optional(),
  tenureYears: wholeYears('tenureYears').optional(),
});

export const UpfrontCostsInputSchema = z.object({
  propertyPrice: amount('propertyPrice').positive('propertyPrice must be greater than 0'),
  downPaymentPercent: downPaymentPercent.optional(),
});

export const AffordabilityInputSchema = z.object({
  monthlyIncome: amount('monthlyIncome').min(0, 'monthlyIncome cannot be negative'),
  monthlyExpenses: amount('monthlyExpenses').min(0, 'monthlyExpenses cannot be negative').optional(),
  existingDebts: amount('existingDebts').min(0, 'existingDebts cannot be negative').optional(),
  maxDtiRatioPercent: amount('maxDtiRatioPercent').min(0, 'maxDtiRatioPercent cannot be negative').optional(),
});

export const BuyVsRentInputSchema = z.object({
  propertyPrice: amount('propertyPrice').positive('propertyPrice must be greater than 0'),
  monthlyRent: amount('monthlyRent').min(0, 'monthlyRent cannot be negative'),
  yearsStaying: wholeYears('yearsStaying').max(MAX_STAY_YEARS, 'yearsStaying cannot exceed 100'),
  downPaymentPercent: downPaymentPercent.optional(),
  annualRatePercent: annualRatePercent.optional(),
  appreciationPercent: growthPercent('appreciationPercent').optional(),
  rentIncreasePercent: growthPercent('rentIncreasePercent').optional(),
});

export const EligibilityInputSchema = z.object({
  nationality: NationalitySchema,
  monthlyIncome: amount('monthlyIncome').min(0, 'monthlyIncome cannot be negative'),
  employmentType: EmploymentTypeSchema.optional(),
  yearsInUae: amount('yearsInUae').min(0, 'yearsInUae cannot be negative').optional(),
});
