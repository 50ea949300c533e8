/**
 * UAE Mortgage Advisor - Calculation Result Types
 *
 * Every engine call returns a fresh readonly record. Monetary values are AED,
 * rounded to cents. Percentages are expressed as percent (20 = 20%), ratios
 * as fractions (0.8 = 80%).
 */

// ============================================================================
// INPUT ENUMS
// ============================================================================

export type Nationality = 'expat' | 'uae_national';

export type EmploymentType = 'salaried' | 'self_employed' | 'business_owner';

export type BuyVsRentRecommendation = 'BUY' | 'RENT' | 'BORDERLINE';

export type TargetPriceFit = 'COMFORTABLE' | 'STRETCH' | 'OVER_BUDGET';

// ============================================================================
// POLICY CLAMPS
// ============================================================================

/**
 * A requested value the engine replaced with the nearest value the policy
 * allows. Clamps are results, not errors.
 */
export interface PolicyAdjustment {
  readonly field: 'downPaymentPercent' | 'tenureYears' | 'maxDtiRatioPercent';
  readonly requested: number;
  readonly applied: number;
  readonly reason: string;
}

// ============================================================================
// INPUTS
// ============================================================================

export interface LoanInput {
  propertyPrice: number;
  downPaymentPercent?: number;
  annualRatePercent?: number;
  tenureYears?: number;
}

export interface UpfrontCostsInput {
  propertyPrice: number;
  downPaymentPercent?: number;
}

export interface AffordabilityInput {
  monthlyIncome: number;
  monthlyExpenses?: number;
  existingDebts?: number;
  maxDtiRatioPercent?: number;
}

export interface BuyVsRentInput {
  propertyPrice: number;
  monthlyRent: number;
  yearsStaying: number;
  downPaymentPercent?: number;
  annualRatePercent?: number;
  appreciationPercent?: number;
  rentIncreasePercent?: number;
}

export interface EligibilityInput {
  nationality: Nationality;
  monthlyIncome: number;
  employmentType?: EmploymentType;
  yearsInUae?: number;
}

// ============================================================================
// RESULTS
// ============================================================================

export interface LoanQuote {
  readonly propertyPrice: number;
  readonly downPaymentPercent: number;
  readonly downPayment: number;
  readonly loanAmount: number;
  readonly loanToValuePercent: number;
  readonly annualRatePercent: number;
  readonly tenureYears: number;
  readonly tenureMonths: number;
  readonly monthlyPayment: number;
  readonly totalPayment: number;
  readonly totalInterest: number;
  readonly adjustments: readonly PolicyAdjustment[];
}

export interface UpfrontCosts {
  readonly propertyPrice: number;
  readonly downPaymentPercent: number;
  readonly downPayment: number;
  readonly transferFeePercent: number;
  readonly transferFee: number;
  readonly agencyFeePercent: number;
  readonly agencyFee: number;
  readonly miscFeesPercent: number;
  readonly miscFees: number;
  readonly totalFees: number;
  readonly totalFeesPercent: number;
  readonly totalCashNeeded: number;
  readonly adjustments: readonly PolicyAdjustment[];
}

export interface AffordabilityAssessment {
  readonly monthlyIncome: number;
  readonly monthlyExpenses: number;
  readonly existingDebts: number;
  readonly maxDtiRatioPercent: number;
  readonly maxMonthlyPayment: number;
  readonly recommendedMonthlyPayment: number;
  readonly maxLoanAmount: number;
  readonly maxPropertyPrice: number;
  readonly comfortablePropertyPrice: number;
  readonly debtToIncomeRatio: number;
  readonly isAffordable: boolean;
  /** Fixed expenses below 40% of income. */
  readonly expensesWithinComfort: boolean;
  readonly message: string;
  readonly adjustments: readonly PolicyAdjustment[];
}

export interface TargetPriceCheck {
  readonly targetPrice: number;
  readonly fit: TargetPriceFit;
  /** Amount above the maximum property price; 0 unless OVER_BUDGET. */
  readonly gap: number;
}

export interface MonthlyCostBreakdown {
  readonly mortgagePayment: number;
  readonly maintenance: number;
  readonly totalMonthlyBuyCost: number;
  readonly monthlyRent: number;
  /** totalMonthlyBuyCost - monthlyRent; positive when buying costs more. */
  readonly difference: number;
}

export interface BuyVsRentAssumptions {
  readonly annualRatePercent: number;
  readonly appreciationPercent: number;
  readonly rentIncreasePercent: number;
  readonly maintenanceRatePercent: number;
  /** breakEvenYears at this value means no break-even within the horizon */
  readonly breakEvenCapYears: number;
}

export interface BuyVsRentVerdict {
  readonly recommendation: BuyVsRentRecommendation;
  readonly reasoning: string;
  readonly yearsStaying: number;
  readonly monthlyBreakdown: MonthlyCostBreakdown;
  readonly averageMonthlyRent: number;
  readonly principalPaid: number;
  readonly remainingBalance: number;
  readonly futureValue: number;
  readonly appreciationGain: number;
  readonly equityBuildup: number;
  readonly totalBuyCost: number;
  readonly totalRentCost: number;
  readonly savingsIfBuying: number;
  /** Heuristic estimate in years, clamped to [0, assumptions.breakEvenCapYears]. */
  readonly breakEvenYears: number;
  readonly loan: LoanQuote;
  readonly upfront: UpfrontCosts;
  readonly assumptions: BuyVsRentAssumptions;
}

export interface EligibilityReport {
  readonly nationality: Nationality;
  readonly nationalityLabel: string;
  readonly employmentType: EmploymentType;
  readonly isEligible: boolean;
  readonly maxLtv: number;
  readonly maxLtvPercent: number;
  readonly minDownPaymentPercent: number;
  readonly minimumIncome: number;
  readonly issues: readonly string[];
  readonly warnings: readonly string[];
  readonly nextSteps: readonly string[];
}

export interface FeeRule {
  readonly label: string;
  readonly percent: number;
}

export interface MortgageRulesSummary {
  readonly policyName: string;
  readonly policyVersion: string;
  readonly currency: string;
  readonly maxLtvPercent: Readonly<Record<Nationality, number>>;
  readonly minDownPaymentPercent: number;
  readonly maxTenureYears: number;
  readonly fees: readonly FeeRule[];
  readonly totalFeesPercent: number;
  readonly totalCashPercent: number;
  readonly defaultAnnualRatePercent: number;
  readonly minimumIncome: Readonly<Record<Nationality, number>>;
  readonly maxDtiRatioPercent: number;
  readonly maintenanceRatePercent: number;
  readonly shortStayYears: number;
  readonly longStayYears: number;
}
