/**
 * @file modules/presentation/formatters.ts
 * @description Chat-facing text for engine results
 *
 * Each formatter maps a result record to markdown. Numbers are read from the
 * record and only formatted; nothing here recomputes a figure.
 */

import {
  AffordabilityAssessment,
  BuyVsRentVerdict,
  EligibilityReport,
  LoanQuote,
  MortgageRulesSummary,
  PolicyAdjustment,
  TargetPriceCheck,
  UpfrontCosts,
} from '../mortgage';
import { formatAed, formatAmount, formatPercent, formatSignedAmount } from '../../shared/format';

function adjustmentNotes(adjustments: readonly PolicyAdjustment[]): string[] {
  return adjustments.map(
    (a) => `_Note: ${a.reason}; you asked for ${a.requested}, so ${a.applied} was used._`
  );
}

// ============================================================================
// MORTGAGE QUOTE
// ============================================================================

export function formatMortgageQuote(quote: LoanQuote, upfront: UpfrontCosts, currency = 'AED'): string {
  const aed = (value: number) => formatAed(value, currency);
  const notes = adjustmentNotes(quote.adjustments);

  return [
    `**Mortgage Calculation for ${aed(quote.propertyPrice)} Property**`,
    '',
    `**Monthly Payment (EMI):** ${aed(quote.monthlyPayment)}`,
    `**Loan Amount:** ${aed(quote.loanAmount)} (${formatPercent(quote.loanToValuePercent)} of property)`,
    `**Interest Rate:** ${formatPercent(quote.annualRatePercent)} per year`,
    `**Tenure:** ${quote.tenureYears} years (${quote.tenureMonths} months)`,
    ...(notes.length > 0 ? ['', ...notes] : []),
    '',
    `**Over ${quote.tenureYears} years, you'll pay:**`,
    `- Total Principal: ${aed(quote.loanAmount)}`,
    `- Total Interest: ${aed(quote.totalInterest)}`,
    `- **Grand Total:** ${aed(quote.totalPayment)}`,
    '',
    '**IMPORTANT: Upfront Cash Required**',
    `You need ${aed(upfront.totalCashNeeded)} in CASH to buy (not just ${aed(upfront.downPayment)} down payment!)`,
    '',
    '**Breakdown of upfront costs:**',
    `- Down Payment (${formatPercent(upfront.downPaymentPercent)}): ${aed(upfront.downPayment)}`,
    `- Transfer Fee (${formatPercent(upfront.transferFeePercent)} to DLD): ${aed(upfront.transferFee)}`,
    `- Agency Fee (${formatPercent(upfront.agencyFeePercent)}): ${aed(upfront.agencyFee)}`,
    `- Misc Fees (${formatPercent(upfront.miscFeesPercent)}): ${aed(upfront.miscFees)}`,
    `- **Total Cash Needed:** ${aed(upfront.totalCashNeeded)}`,
  ].join('\n');
}

// ============================================================================
// AFFORDABILITY
// ============================================================================

function formatTargetCheck(check: TargetPriceCheck, currency: string): string {
  const price = formatAed(check.targetPrice, currency);
  switch (check.fit) {
    case 'COMFORTABLE':
      return `**${price}** is comfortably within your budget.`;
    case 'STRETCH':
      return `**${price}** is possible but stretches your budget. Consider a lower price.`;
    case 'OVER_BUDGET':
      return `**${price}** exceeds your maximum by ${formatAed(check.gap, currency)}.`;
  }
}

export function formatAffordability(
  assessment: AffordabilityAssessment,
  target?: TargetPriceCheck,
  currency = 'AED'
): string {
  const aed = (value: number) => formatAed(value, currency);
  const header = [
    '**Affordability Assessment**',
    '',
    `**Your Income:** ${aed(assessment.monthlyIncome)}/month`,
    `**Existing Debts:** ${aed(assessment.existingDebts)}/month`,
  ];

  if (!assessment.isAffordable) {
    return [
      ...header,
      '',
      `**Not affordable right now.** ${assessment.message}`,
      ...(target ? ['', formatTargetCheck(target, currency)] : []),
    ].join('\n');
  }

  return [
    ...header,
    `**Available for Mortgage:** ${aed(assessment.maxMonthlyPayment)}/month (max)`,
    `**Recommended Payment:** ${aed(assessment.recommendedMonthlyPayment)}/month`,
    '',
    '**What you can afford:**',
    `- Maximum Property: ${aed(assessment.maxPropertyPrice)}`,
    `- Comfortable Budget: ${aed(assessment.comfortablePropertyPrice)} (recommended)`,
    `- Maximum Loan: ${aed(assessment.maxLoanAmount)}`,
    '',
    `**Debt-to-Income Ratio:** ${formatPercent(assessment.debtToIncomeRatio)}`,
    ...adjustmentNotes(assessment.adjustments),
    ...(assessment.expensesWithinComfort
      ? []
      : ['', 'Your fixed expenses are high relative to income; the comfortable budget is the safer target.']),
    '',
    assessment.message,
    ...(target ? ['', formatTargetCheck(target, currency)] : []),
  ].join('\n');
}

// ============================================================================
// BUY VS RENT
// ============================================================================

export function formatBuyVsRent(verdict: BuyVsRentVerdict, currency = 'AED'): string {
  const aed = (value: number) => formatAed(value, currency);
  const m = verdict.monthlyBreakdown;
  const a = verdict.assumptions;
  const breakEven =
    verdict.breakEvenYears >= a.breakEvenCapYears
      ? `not within ${a.breakEvenCapYears} years`
      : `~${verdict.breakEvenYears} years`;

  return [
    verdict.reasoning,
    '',
    '---',
    '',
    '**Monthly Cost Comparison**',
    '| Buying | Renting |',
    '|--------|---------|',
    `| EMI: ${aed(m.mortgagePayment)} | Rent: ${aed(m.monthlyRent)} |`,
    `| Maintenance: ${aed(m.maintenance)} | (included) |`,
    `| **Total: ${aed(m.totalMonthlyBuyCost)}** | **Total: ${aed(m.monthlyRent)}** |`,
    '',
    `**Difference:** ${formatSignedAmount(m.difference)} ${currency}/month (${m.difference > 0 ? 'more' : 'less'} if buying)`,
    ...adjustmentNotes(verdict.loan.adjustments),
    '',
    '---',
    '',
    `**${verdict.yearsStaying}-Year Analysis**`,
    '',
    '**If you BUY:**',
    `- Upfront Cash Needed: ${aed(verdict.upfront.totalCashNeeded)}`,
    `- Total Payments: ${aed(verdict.totalBuyCost)}`,
    `- Equity Built: ${aed(verdict.equityBuildup)}`,
    '',
    '**If you RENT:**',
    `- Upfront Cost: 0 ${currency} (just security deposit)`,
    `- Total Rent Paid: ${aed(verdict.totalRentCost)}`,
    `- Equity Built: 0 ${currency}`,
    '',
    `**Net benefit of buying:** ${formatSignedAmount(verdict.savingsIfBuying)} ${currency}`,
    `**Break-even Point:** ${breakEven}`,
    '',
    '---',
    '',
    '**Assumptions Used:**',
    `- Interest Rate: ${formatPercent(a.annualRatePercent)}`,
    `- Property Appreciation: ${formatPercent(a.appreciationPercent)} per year`,
    `- Annual Rent Increase: ${formatPercent(a.rentIncreasePercent)}`,
    `- Maintenance: ${formatPercent(a.maintenanceRatePercent)} of property value per year`,
  ].join('\n');
}

// ============================================================================
// ELIGIBILITY
// ============================================================================

export function formatEligibility(report: EligibilityReport): string {
  const lines = [
    report.isEligible
      ? '**You appear eligible for a UAE mortgage!**'
      : '**There may be some challenges:**',
    '',
    '**Your Profile:**',
    `- Status: ${report.nationalityLabel}`,
    `- Maximum LTV: ${formatPercent(report.maxLtvPercent)} (requires ${formatPercent(report.minDownPaymentPercent)} down payment)`,
  ];

  if (report.issues.length > 0) {
    lines.push('', '**Issues to Address:**', ...report.issues.map((issue) => `- ${issue}`));
  }

  if (report.warnings.length > 0) {
    lines.push('', '**Things to Note:**', ...report.warnings.map((warning) => `- ${warning}`));
  }

  lines.push(
    '',
    report.isEligible ? "**Documents You'll Need:**" : '**Next Steps:**',
    ...report.nextSteps.map((step) => `- ${step}`)
  );

  return lines.join('\n');
}

// ============================================================================
// RULES
// ============================================================================

export function formatMortgageRules(rules: MortgageRulesSummary): string {
  const { currency } = rules;

  return [
    `**UAE Mortgage Rules (${rules.policyName}, ${rules.policyVersion})**`,
    '',
    '**1. Loan-to-Value (LTV) Limits:**',
    `- Expats: Maximum **${formatPercent(rules.maxLtvPercent.expat)} LTV** (${formatPercent(rules.minDownPaymentPercent)} down payment required)`,
    `- UAE Nationals: Maximum ${formatPercent(rules.maxLtvPercent.uae_national)} LTV`,
    '',
    '**2. Maximum Tenure:**',
    `- **${rules.maxTenureYears} years maximum**`,
    '',
    `**3. Upfront Costs (~${formatPercent(rules.totalFeesPercent)} on top of the price):**`,
    ...rules.fees.map((fee) => `- **${formatPercent(fee.percent)}**: ${fee.label}`),
    `- Total: You need **${formatPercent(rules.totalCashPercent)}+ cash** (${formatPercent(rules.minDownPaymentPercent)} down + ${formatPercent(rules.totalFeesPercent)} fees)`,
    '',
    '**4. Interest Rates:**',
    `- Standard market rate: ~**${formatPercent(rules.defaultAnnualRatePercent)}** per annum`,
    '- Rates are typically variable (linked to EIBOR)',
    '',
    '**5. Eligibility Requirements:**',
    `- Minimum income: ${formatAmount(rules.minimumIncome.expat)} ${currency}/month for expats, ${formatAmount(rules.minimumIncome.uae_national)} ${currency}/month for UAE nationals`,
    `- Maximum debt-to-income: ${formatPercent(rules.maxDtiRatioPercent)}`,
    '- Required documents: Salary certificate, bank statements, Emirates ID',
    '',
    '**6. Buy vs Rent Rule of Thumb:**',
    `- Staying < ${rules.shortStayYears} years? **Rent** (fees will eat profits)`,
    `- Staying > ${rules.longStayYears} years? **Consider buying** (equity buildup)`,
    `- Budget ${formatPercent(rules.maintenanceRatePercent)} of the property value per year for maintenance`,
  ].join('\n');
}
