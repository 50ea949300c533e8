/**
 * @file modules/mortgage/buy-vs-rent.ts
 * @description Buy-vs-Rent Analyzer
 *
 * Compares the cost of owning against renting over the user's stay:
 * - Loan amortized over min(stay, max tenure), i.e. "cost during my stay"
 * - Upfront cash (down payment + fees) and annual maintenance
 * - Rent compounding once per year
 * - Equity = down payment + principal repaid during the stay + appreciation
 * - Deterministic recommendation thresholds on stay length and savings
 */

import { computeLoan, monthlyRateFor, scanSchedule } from './amortization';
import { MortgagePolicy, UAE_MORTGAGE_POLICY } from './policy';
import { roundCurrency, roundTo } from './rounding';
import { BuyVsRentInputSchema, parseInput } from './schemas';
import { computeUpfrontCosts } from './upfront-costs';
import { BuyVsRentInput, BuyVsRentRecommendation, BuyVsRentVerdict } from './types';
import { formatAed } from '../../shared/format';

// ============================================
// HELPERS
// ============================================

/**
 * Total rent over the stay, compounding once a year.
 */
export function projectTotalRent(monthlyRent: number, years: number, annualIncreasePercent: number): number {
  let total = 0;
  let currentRent = monthlyRent;

  for (let year = 0; year < years; year++) {
    total += currentRent * 12;
    currentRent *= 1 + annualIncreasePercent / 100;
  }

  return total;
}

export interface BreakEvenInputs {
  monthlyBuyCost: number;
  monthlyRent: number;
  principalPaid: number;
  appreciationGain: number;
  totalCashNeeded: number;
  years: number;
  capYears: number;
}

/**
 * Rough linear break-even estimate, clamped to [0, capYears].
 *
 * When owning costs more per month, upfront cash is recovered by the
 * annual equity gain in excess of the annual extra cost. When owning costs
 * less, it is recovered by the monthly saving plus principal repaid. The two
 * branches are not the same model; treat the result as an approximation.
 */
export function estimateBreakEvenYears(inputs: BreakEvenInputs): number {
  const { monthlyBuyCost, monthlyRent, principalPaid, appreciationGain, totalCashNeeded, years, capYears } =
    inputs;

  let estimate: number;
  if (monthlyBuyCost > monthlyRent) {
    const annualEquityGain = principalPaid / years + appreciationGain / years;
    const annualExtraCost = (monthlyBuyCost - monthlyRent) * 12;
    estimate =
      annualEquityGain > 0 && annualEquityGain > annualExtraCost
        ? totalCashNeeded / (annualEquityGain - annualExtraCost)
        : capYears;
  } else {
    const annualRecovery = (monthlyRent - monthlyBuyCost) * 12 + principalPaid / years;
    estimate = annualRecovery > 0 ? totalCashNeeded / annualRecovery : capYears;
  }

  return Math.max(0, Math.min(estimate, capYears));
}

interface ReasoningFacts {
  years: number;
  fees: number;
  totalRent: number;
  totalBuyCost: number;
  equityBuildup: number;
  savingsIfBuying: number;
  rentIncreasePercent: number;
  breakEvenYears: number;
  currency: string;
}

function decide(
  facts: ReasoningFacts,
  policy: MortgagePolicy
): { recommendation: BuyVsRentRecommendation; reasoning: string } {
  const { years, currency } = facts;
  const { shortStayYears, longStayYears, borderlineBand } = policy.buyVsRent;

  if (years < shortStayYears) {
    return {
      recommendation: 'RENT',
      reasoning: [
        '**Recommendation: Keep Renting**',
        '',
        `At ${years} years, the transaction fees (${formatAed(facts.fees, currency)}) will eat into any potential gains. ` +
          `You need at least ${shortStayYears}-${shortStayYears + 1} years to recover these costs.`,
        '',
        `**Your rent over ${years} years:** ${formatAed(facts.totalRent, currency)}`,
        `**Buying costs (excluding equity):** ${formatAed(facts.totalBuyCost, currency)}`,
      ].join('\n'),
    };
  }

  if (years <= longStayYears) {
    if (facts.savingsIfBuying > borderlineBand) {
      return {
        recommendation: 'BUY',
        reasoning: [
          '**Recommendation: Consider Buying**',
          '',
          `For ${years} years, buying starts to make sense. You'll build ${formatAed(facts.equityBuildup, currency)} in equity.`,
          '',
          `**Net benefit vs renting:** ~${formatAed(facts.savingsIfBuying, currency)}`,
        ].join('\n'),
      };
    }

    if (facts.savingsIfBuying < -borderlineBand) {
      return {
        recommendation: 'RENT',
        reasoning: [
          '**Recommendation: Keep Renting**',
          '',
          `The numbers don't favor buying for your ${years}-year timeline. ` +
            `The upfront costs and monthly difference would cost you ~${formatAed(-facts.savingsIfBuying, currency)} more than renting.`,
        ].join('\n'),
      };
    }

    return {
      recommendation: 'BORDERLINE',
      reasoning: [
        "**It's a Close Call**",
        '',
        `For ${years} years, buying and renting are financially similar. Consider your personal preferences:`,
        '- Want stability and to customize your home? **Buy**',
        '- Want flexibility to move? **Rent**',
        '',
        `**Difference:** Only ~${formatAed(Math.abs(facts.savingsIfBuying), currency)} over ${years} years`,
      ].join('\n'),
    };
  }

  return {
    recommendation: 'BUY',
    reasoning: [
      '**Recommendation: Buy**',
      '',
      `At ${years}+ years, buying makes strong financial sense. ` +
        `You'll build equity while rent keeps increasing ${facts.rentIncreasePercent}% per year.`,
      '',
      `**Equity after ${years} years:** ${formatAed(facts.equityBuildup, currency)}`,
      `**If you rented instead:** ${formatAed(facts.totalRent, currency)} paid in rent`,
      `**Break-even point:** ~${facts.breakEvenYears} years`,
    ].join('\n'),
  };
}

// ============================================
// ANALYZER
// ============================================

export function compareBuyVsRent(
  input: BuyVsRentInput,
  policy: MortgagePolicy = UAE_MORTGAGE_POLICY
): BuyVsRentVerdict {
  const parsed = parseInput(BuyVsRentInputSchema, input);
  const { propertyPrice, monthlyRent, yearsStaying } = parsed;
  const annualRatePercent = parsed.annualRatePercent ?? policy.defaultAnnualRatePercent;
  const appreciationPercent = parsed.appreciationPercent ?? policy.buyVsRent.defaultAppreciationPercent;
  const rentIncreasePercent = parsed.rentIncreasePercent ?? policy.buyVsRent.defaultRentIncreasePercent;
  const months = yearsStaying * 12;

  // 1-2. Loan over the stay horizon (capped at max tenure), and cash due at transfer
  const loan = computeLoan(
    {
      propertyPrice,
      downPaymentPercent: parsed.downPaymentPercent,
      annualRatePercent,
      tenureYears: yearsStaying,
    },
    policy
  );
  const upfront = computeUpfrontCosts(
    { propertyPrice, downPaymentPercent: parsed.downPaymentPercent },
    policy
  );

  // 3-4. Monthly cost of owning
  const monthlyMaintenance = (propertyPrice * policy.maintenanceRatePercent) / 100 / 12;
  const monthlyBuyCost = loan.monthlyPayment + monthlyMaintenance;

  // 5. Rent with annual increases
  const totalRent = projectTotalRent(monthlyRent, yearsStaying, rentIncreasePercent);

  // 6. Principal repaid during the stay
  const progress = scanSchedule(
    loan.loanAmount,
    monthlyRateFor(annualRatePercent),
    loan.monthlyPayment,
    Math.min(months, loan.tenureMonths)
  );

  // 7-8. Appreciation and equity
  const futureValue = propertyPrice * Math.pow(1 + appreciationPercent / 100, yearsStaying);
  const appreciationGain = futureValue - propertyPrice;
  const equityBuildup = upfront.downPayment + progress.principalPaid + appreciationGain;

  // 9-10. Totals
  const totalBuyCost = upfront.totalCashNeeded + monthlyBuyCost * months;
  const savingsIfBuying = equityBuildup - (totalBuyCost - totalRent);

  // 11. Break-even
  const breakEvenYears = roundTo(
    estimateBreakEvenYears({
      monthlyBuyCost,
      monthlyRent,
      principalPaid: progress.principalPaid,
      appreciationGain,
      totalCashNeeded: upfront.totalCashNeeded,
      years: yearsStaying,
      capYears: policy.buyVsRent.breakEvenCapYears,
    }),
    1
  );

  // 12. Recommendation
  const { recommendation, reasoning } = decide(
    {
      years: yearsStaying,
      fees: upfront.totalFees,
      totalRent,
      totalBuyCost,
      equityBuildup,
      savingsIfBuying,
      rentIncreasePercent,
      breakEvenYears,
      currency: policy.currency,
    },
    policy
  );

  return {
    recommendation,
    reasoning,
    yearsStaying,
    monthlyBreakdown: {
      mortgagePayment: loan.monthlyPayment,
      maintenance: roundCurrency(monthlyMaintenance),
      totalMonthlyBuyCost: roundCurrency(monthlyBuyCost),
      monthlyRent: roundCurrency(monthlyRent),
      difference: roundCurrency(monthlyBuyCost - monthlyRent),
    },
    averageMonthlyRent: roundCurrency(totalRent / months),
    principalPaid: roundCurrency(progress.principalPaid),
    remainingBalance: roundCurrency(progress.remainingBalance),
    futureValue: roundCurrency(futureValue),
    appreciationGain: roundCurrency(appreciationGain),
    equityBuildup: roundCurrency(equityBuildup),
    totalBuyCost: roundCurrency(totalBuyCost),
    totalRentCost: roundCurrency(totalRent),
    savingsIfBuying: roundCurrency(savingsIfBuying),
    breakEvenYears,
    loan,
    upfront,
    assumptions: {
      annualRatePercent,
      appreciationPercent,
      rentIncreasePercent,
      maintenanceRatePercent: policy.maintenanceRatePercent,
      breakEvenCapYears: policy.buyVsRent.breakEvenCapYears,
    },
  };
}
