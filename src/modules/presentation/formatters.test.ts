import { describe, it, expect } from '@jest/globals';
import {
  formatAffordability,
  formatBuyVsRent,
  formatEligibility,
  formatMortgageQuote,
  formatMortgageRules,
} from './formatters';
import { MortgageEngine, UAE_MORTGAGE_POLICY, getMortgageEngine } from '../mortgage';

const engine = getMortgageEngine();

describe('formatMortgageQuote', () => {
  it('renders the payment and the upfront cash', () => {
    const quote = engine.computeLoan({ propertyPrice: 2_000_000 });
    const upfront = engine.computeUpfrontCosts({ propertyPrice: 2_000_000 });

    expect(formatMortgageQuote(quote, upfront)).toBe(
      [
        '**Mortgage Calculation for 2,000,000 AED Property**',
        '',
        '**Monthly Payment (EMI):** 8,893 AED',
        '**Loan Amount:** 1,600,000 AED (80% of property)',
        '**Interest Rate:** 4.5% per year',
        '**Tenure:** 25 years (300 months)',
        '',
        "**Over 25 years, you'll pay:**",
        '- Total Principal: 1,600,000 AED',
        '- Total Interest: 1,067,996 AED',
        '- **Grand Total:** 2,667,996 AED',
        '',
        '**IMPORTANT: Upfront Cash Required**',
        'You need 540,000 AED in CASH to buy (not just 400,000 AED down payment!)',
        '',
        '**Breakdown of upfront costs:**',
        '- Down Payment (20%): 400,000 AED',
        '- Transfer Fee (4% to DLD): 80,000 AED',
        '- Agency Fee (2%): 40,000 AED',
        '- Misc Fees (1%): 20,000 AED',
        '- **Total Cash Needed:** 540,000 AED',
      ].join('\n')
    );
  });

  it('notes a clamped value', () => {
    const quote = engine.computeLoan({ propertyPrice: 2_000_000, downPaymentPercent: 10 });
    const upfront = engine.computeUpfrontCosts({ propertyPrice: 2_000_000, downPaymentPercent: 10 });

    expect(formatMortgageQuote(quote, upfront).split('\n')).toContain(
      '_Note: Minimum down payment is 20%; you asked for 10, so 20 was used._'
    );
  });
});

describe('formatAffordability', () => {
  it('renders the budget and the target check', () => {
    const assessment = engine.computeAffordability({ monthlyIncome: 30_000 });
    const target = engine.classifyTargetPrice(assessment, 2_000_000);
    const lines = formatAffordability(assessment, target).split('\n');

    expect(lines).toContain('**Available for Mortgage:** 15,000 AED/month (max)');
    expect(lines).toContain('**Recommended Payment:** 10,500 AED/month');
    expect(lines).toContain('- Maximum Property: 3,373,319 AED');
    expect(lines).toContain('- Comfortable Budget: 2,361,323 AED (recommended)');
    expect(lines).toContain('**Debt-to-Income Ratio:** 50%');
    expect(lines[lines.length - 1]).toBe('**2,000,000 AED** is comfortably within your budget.');
  });

  it('explains an unaffordable result', () => {
    const assessment = engine.computeAffordability({ monthlyIncome: 10_000, existingDebts: 6_000 });
    const target = engine.classifyTargetPrice(assessment, 900_000);

    expect(formatAffordability(assessment, target)).toBe(
      [
        '**Affordability Assessment**',
        '',
        '**Your Income:** 10,000 AED/month',
        '**Existing Debts:** 6,000 AED/month',
        '',
        '**Not affordable right now.** Your existing debts already use the full debt-to-income allowance. ' +
          'Reduce debts before considering a mortgage.',
        '',
        '**900,000 AED** exceeds your maximum by 900,000 AED.',
      ].join('\n')
    );
  });
});

describe('formatBuyVsRent', () => {
  it('adds the cost comparison to the reasoning', () => {
    const verdict = engine.compareBuyVsRent({ propertyPrice: 2_000_000, monthlyRent: 10_000, yearsStaying: 10 });
    const text = formatBuyVsRent(verdict);
    const lines = text.split('\n');

    expect(text.startsWith(verdict.reasoning)).toBe(true);
    expect(lines).toContain('| EMI: 16,582 AED | Rent: 10,000 AED |');
    expect(lines).toContain('| Maintenance: 2,500 AED | (included) |');
    expect(lines).toContain('**Difference:** +9,082 AED/month (more if buying)');
    expect(lines).toContain('- Total Rent Paid: 1,509,347 AED');
    expect(lines).toContain('**Net benefit of buying:** +1,367,323 AED');
    expect(lines).toContain('**Break-even Point:** ~4.5 years');
    expect(lines).toContain('- Maintenance: 1.5% of property value per year');
  });

  it('says when there is no break-even', () => {
    const verdict = engine.compareBuyVsRent({
      propertyPrice: 1_000_000,
      monthlyRent: 2_000,
      yearsStaying: 4,
      appreciationPercent: -3,
    });

    expect(formatBuyVsRent(verdict).split('\n')).toContain('**Break-even Point:** not within 99 years');
  });

  it('reads the break-even cap from the policy', () => {
    const shortHorizon = new MortgageEngine({
      ...UAE_MORTGAGE_POLICY,
      buyVsRent: { ...UAE_MORTGAGE_POLICY.buyVsRent, breakEvenCapYears: 40 },
    });
    const verdict = shortHorizon.compareBuyVsRent({
      propertyPrice: 1_000_000,
      monthlyRent: 2_000,
      yearsStaying: 4,
      appreciationPercent: -3,
    });

    expect(verdict.breakEvenYears).toBe(40);
    expect(formatBuyVsRent(verdict).split('\n')).toContain('**Break-even Point:** not within 40 years');
  });

  it('notes the tenure cap for a stay beyond the maximum loan term', () => {
    const verdict = engine.compareBuyVsRent({ propertyPrice: 2_000_000, monthlyRent: 8_000, yearsStaying: 30 });

    expect(formatBuyVsRent(verdict).split('\n')).toContain(
      '_Note: Maximum tenure is 25 years; you asked for 30, so 25 was used._'
    );
  });
});

describe('formatEligibility', () => {
  it('lists documents when eligible', () => {
    const report = engine.validateEligibility({ nationality: 'expat', monthlyIncome: 25_000, yearsInUae: 3 });

    expect(formatEligibility(report)).toBe(
      [
        '**You appear eligible for a UAE mortgage!**',
        '',
        '**Your Profile:**',
        '- Status: Expat',
        '- Maximum LTV: 80% (requires 20% down payment)',
        '',
        "**Documents You'll Need:**",
        '- Gather salary certificates (3 months)',
        '- Prepare bank statements (6 months)',
        '- Get Emirates ID copy',
        '- Obtain passport copy with residence visa',
      ].join('\n')
    );
  });

  it('lists issues and warnings otherwise', () => {
    const report = engine.validateEligibility({
      nationality: 'expat',
      monthlyIncome: 10_000,
      employmentType: 'self_employed',
      yearsInUae: 1,
    });
    const lines = formatEligibility(report).split('\n');

    expect(lines[0]).toBe('**There may be some challenges:**');
    expect(lines).toContain('- Most banks require minimum income of 15,000 AED/month');
    expect(lines).toContain('- Self-employed expats typically need 2+ years in UAE');
    expect(lines).toContain('**Things to Note:**');
    expect(lines.slice(-2)).toEqual(['**Next Steps:**', '- Address the issues listed above first']);
  });
});

describe('formatMortgageRules', () => {
  it('renders the rule set', () => {
    const lines = formatMortgageRules(engine.getRules()).split('\n');

    expect(lines[0]).toBe('**UAE Mortgage Rules (UAE Residential Mortgage, UAE-2024.1)**');
    expect(lines).toContain('- Expats: Maximum **80% LTV** (20% down payment required)');
    expect(lines).toContain('- UAE Nationals: Maximum 85% LTV');
    expect(lines).toContain('- **4%**: Dubai Land Department transfer fee');
    expect(lines).toContain('- Total: You need **27%+ cash** (20% down + 7% fees)');
    expect(lines).toContain(
      '- Minimum income: 15,000 AED/month for expats, 10,000 AED/month for UAE nationals'
    );
    expect(lines).toContain('- Staying < 3 years? **Rent** (fees will eat profits)');
  });
});
