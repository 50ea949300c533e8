/**
 * UAE Mortgage Advisor - Mortgage Policy
 *
 * The rule set every calculation reads from. Nothing in the engine holds a
 * policy number of its own: calculations take a MortgagePolicy (defaulting
 * to UAE_MORTGAGE_POLICY), so an alternate regime can be substituted without
 * touching calculation logic.
 */

import { Nationality } from './types';

export interface FeeSchedule {
  /** Dubai Land Department transfer fee, % of price. */
  readonly transferFeePercent: number;
  /** Real estate agent commission, % of price. */
  readonly agencyFeePercent: number;
  /** Valuation, mortgage registration and similar, % of price. */
  readonly miscFeesPercent: number;
}

export interface BuyVsRentThresholds {
  /** Stays shorter than this always recommend renting. */
  readonly shortStayYears: number;
  /** Stays longer than this always recommend buying. */
  readonly longStayYears: number;
  /** Savings band (AED) inside which a mid-length stay is BORDERLINE. */
  readonly borderlineBand: number;
  readonly breakEvenCapYears: number;
  readonly defaultAppreciationPercent: number;
  readonly defaultRentIncreasePercent: number;
}

export interface EligibilityRules {
  readonly minimumIncome: Readonly<Record<Nationality, number>>;
  /** Self-employed expats need at least this many years in the UAE. */
  readonly selfEmployedMinYearsInUae: number;
  /** Expats below this residency get an advisory warning. */
  readonly advisedMinYearsInUae: number;
}

export interface MortgagePolicy {
  readonly name: string;
  readonly version: string;
  readonly currency: string;
  readonly maxLtv: Readonly<Record<Nationality, number>>;
  readonly minDownPaymentPercent: number;
  readonly maxTenureYears: number;
  readonly defaultAnnualRatePercent: number;
  readonly fees: FeeSchedule;
  /** Annual maintenance as % of property value. */
  readonly maintenanceRatePercent: number;
  readonly defaultMaxDtiPercent: number;
  /** Share of the maximum that is still comfortable (payment and price). */
  readonly comfortMargin: number;
  /** Fixed expenses above this share of income are flagged. */
  readonly expenseComfortRatio: number;
  readonly buyVsRent: BuyVsRentThresholds;
  readonly eligibility: EligibilityRules;
}

export const UAE_MORTGAGE_POLICY: MortgagePolicy = Object.freeze({
  name: 'UAE Residential Mortgage',
  version: 'UAE-2024.1',
  currency: 'AED',
  maxLtv: Object.freeze({ expat: 0.8, uae_national: 0.85 }),
  minDownPaymentPercent: 20,
  maxTenureYears: 25,
  defaultAnnualRatePercent: 4.5,
  fees: Object.freeze({
    transferFeePercent: 4,
    agencyFeePercent: 2,
    miscFeesPercent: 1,
  }),
  maintenanceRatePercent: 1.5,
  defaultMaxDtiPercent: 50,
  comfortMargin: 0.7,
  expenseComfortRatio: 0.4,
  buyVsRent: Object.freeze({
    shortStayYears: 3,
    longStayYears: 5,
    borderlineBand: 50_000,
    breakEvenCapYears: 99,
    defaultAppreciationPercent: 3,
    defaultRentIncreasePercent: 5,
  }),
  eligibility: Object.freeze({
    minimumIncome: Object.freeze({ expat: 15_000, uae_national: 10_000 }),
    selfEmployedMinYearsInUae: 2,
    advisedMinYearsInUae: 0.5,
  }),
});

export function totalFeesPercent(policy: MortgagePolicy): number {
  const { transferFeePercent, agencyFeePercent, miscFeesPercent } = policy.fees;
  return transferFeePercent + agencyFeePercent + miscFeesPercent;
}
