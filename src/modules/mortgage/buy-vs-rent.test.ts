/**
 * @file modules/mortgage/buy-vs-rent.test.ts
 * @description Buy-vs-Rent Analyzer Tests
 *
 * The loan is amortized over the stay, so a stay of N years pays the loan
 * off by the end of it. Expected figures are traced through that model.
 */

import { describe, it, expect } from '@jest/globals';
import { compareBuyVsRent, estimateBreakEvenYears, projectTotalRent } from './buy-vs-rent';
import { InvalidInputError } from '../../shared/errors';

describe('projectTotalRent', () => {
  it('compounds rent once a year', () => {
    expect(projectTotalRent(10_000, 2, 5)).toBeCloseTo(246_000, 6);
    expect(projectTotalRent(10_000, 1, 5)).toBe(120_000);
    expect(projectTotalRent(0, 10, 5)).toBe(0);
  });
});

describe('estimateBreakEvenYears', () => {
  const base = { totalCashNeeded: 100_000, years: 5, capYears: 99 };

  it('recovers upfront cash from equity gain net of the extra monthly cost', () => {
    const years = estimateBreakEvenYears({
      ...base,
      monthlyBuyCost: 5_000,
      monthlyRent: 4_000,
      principalPaid: 100_000,
      appreciationGain: 50_000,
    });
    // 100,000 / (30,000 - 12,000)
    expect(years).toBeCloseTo(5.5556, 4);
  });

  it('returns the cap when the extra cost outweighs the equity gain', () => {
    expect(
      estimateBreakEvenYears({
        ...base,
        monthlyBuyCost: 9_000,
        monthlyRent: 4_000,
        principalPaid: 100_000,
        appreciationGain: 0,
      })
    ).toBe(99);
  });

  it('recovers upfront cash from monthly savings when owning is cheaper', () => {
    expect(
      estimateBreakEvenYears({
        ...base,
        totalCashNeeded: 110_000,
        monthlyBuyCost: 3_000,
        monthlyRent: 4_000,
        principalPaid: 50_000,
        appreciationGain: 0,
      })
    ).toBe(5);
  });

  it('returns the cap when nothing is recovered', () => {
    expect(
      estimateBreakEvenYears({
        ...base,
        monthlyBuyCost: 3_000,
        monthlyRent: 3_000,
        principalPaid: 0,
        appreciationGain: 0,
      })
    ).toBe(99);
  });

  it('stays within [0, cap]', () => {
    const years = estimateBreakEvenYears({
      ...base,
      totalCashNeeded: 10_000_000,
      monthlyBuyCost: 1_000,
      monthlyRent: 1_100,
      principalPaid: 0,
      appreciationGain: 0,
      capYears: 40,
    });
    expect(years).toBe(40);
  });
});

describe('compareBuyVsRent', () => {
  it('recommends renting for a short stay, whatever the savings', () => {
    const verdict = compareBuyVsRent({ propertyPrice: 2_000_000, monthlyRent: 10_000, yearsStaying: 2 });

    expect(verdict.recommendation).toBe('RENT');
    expect(verdict.savingsIfBuying).toBe(91_724.04);
    expect(verdict.totalRentCost).toBe(246_000);
    expect(verdict.totalBuyCost).toBe(2_276_076);
    expect(verdict.breakEvenYears).toBe(4.8);
    expect(verdict.reasoning).toBe(
      [
        '**Recommendation: Keep Renting**',
        '',
        'At 2 years, the transaction fees (140,000 AED) will eat into any potential gains. ' +
          'You need at least 3-4 years to recover these costs.',
        '',
        '**Your rent over 2 years:** 246,000 AED',
        '**Buying costs (excluding equity):** 2,276,076 AED',
      ].join('\n')
    );
  });

  it('recommends buying for a long stay', () => {
    const verdict = compareBuyVsRent({ propertyPrice: 2_000_000, monthlyRent: 10_000, yearsStaying: 10 });

    expect(verdict.recommendation).toBe('BUY');
    expect(verdict.loan.tenureYears).toBe(10);
    expect(verdict.monthlyBreakdown).toEqual({
      mortgagePayment: 16_582.15,
      maintenance: 2_500,
      totalMonthlyBuyCost: 19_082.15,
      monthlyRent: 10_000,
      difference: 9_082.15,
    });
    expect(verdict.averageMonthlyRent).toBe(12_577.89);
    expect(verdict.principalPaid).toBe(1_600_000.7);
    expect(verdict.futureValue).toBe(2_687_832.76);
    expect(verdict.appreciationGain).toBe(687_832.76);
    expect(verdict.equityBuildup).toBe(2_687_833.45);
    expect(verdict.totalBuyCost).toBe(2_829_858);
    expect(verdict.totalRentCost).toBe(1_509_347.1);
    expect(verdict.savingsIfBuying).toBe(1_367_322.56);
    expect(verdict.breakEvenYears).toBe(4.5);
    expect(verdict.upfront.totalCashNeeded).toBe(540_000);
    expect(verdict.assumptions).toEqual({
      annualRatePercent: 4.5,
      appreciationPercent: 3,
      rentIncreasePercent: 5,
      maintenanceRatePercent: 1.5,
      breakEvenCapYears: 99,
    });
    expect(verdict.reasoning.split('\n')).toEqual([
      '**Recommendation: Buy**',
      '',
      "At 10+ years, buying makes strong financial sense. You'll build equity while rent keeps increasing 5% per year.",
      '',
      '**Equity after 10 years:** 2,687,833 AED',
      '**If you rented instead:** 1,509,347 AED paid in rent',
      '**Break-even point:** ~4.5 years',
    ]);
  });

  it('recommends buying in the middle band when savings clear the threshold', () => {
    const verdict = compareBuyVsRent({ propertyPrice: 1_500_000, monthlyRent: 8_000, yearsStaying: 4 });

    expect(verdict.recommendation).toBe('BUY');
    expect(verdict.savingsIfBuying).toBe(293_554.4);
    expect(verdict.reasoning).toContain('**Recommendation: Consider Buying**');
    expect(verdict.reasoning).toContain("You'll build 1,688,263 AED in equity.");
    expect(verdict.reasoning).toContain('**Net benefit vs renting:** ~293,554 AED');
  });

  it('calls it close when savings sit inside the band', () => {
    const verdict = compareBuyVsRent({ propertyPrice: 1_000_000, monthlyRent: 2_000, yearsStaying: 4 });

    expect(verdict.recommendation).toBe('BORDERLINE');
    expect(verdict.savingsIfBuying).toBe(23_297.95);
    expect(verdict.reasoning).toContain('**Difference:** Only ~23,298 AED over 4 years');
  });

  it('recommends renting in the middle band when buying loses money', () => {
    const verdict = compareBuyVsRent({
      propertyPrice: 1_000_000,
      monthlyRent: 2_000,
      yearsStaying: 4,
      appreciationPercent: -3,
    });

    expect(verdict.recommendation).toBe('RENT');
    expect(verdict.appreciationGain).toBe(-114_707.19);
    expect(verdict.savingsIfBuying).toBe(-216_918.05);
    expect(verdict.breakEvenYears).toBe(99);
    expect(verdict.reasoning).toContain('would cost you ~216,918 AED more than renting');
  });

  it('treats 3 and 5 years as the middle band', () => {
    expect(compareBuyVsRent({ propertyPrice: 800_000, monthlyRent: 6_000, yearsStaying: 3 }).savingsIfBuying).toBe(
      163_792.46
    );
    expect(compareBuyVsRent({ propertyPrice: 800_000, monthlyRent: 6_000, yearsStaying: 3 }).reasoning).toContain(
      'Consider Buying'
    );
    expect(compareBuyVsRent({ propertyPrice: 1_200_000, monthlyRent: 7_000, yearsStaying: 5 }).reasoning).toContain(
      'Consider Buying'
    );
  });

  it('estimates break-even from monthly savings when owning is cheaper than rent', () => {
    const verdict = compareBuyVsRent({ propertyPrice: 1_000_000, monthlyRent: 25_000, yearsStaying: 10 });

    expect(verdict.monthlyBreakdown.difference).toBe(-15_458.93);
    expect(verdict.breakEvenYears).toBe(1);
  });

  it('caps the loan at 25 years for a longer stay', () => {
    const verdict = compareBuyVsRent({ propertyPrice: 2_000_000, monthlyRent: 8_000, yearsStaying: 30 });

    expect(verdict.loan.tenureYears).toBe(25);
    expect(verdict.loan.adjustments).toEqual([
      { field: 'tenureYears', requested: 30, applied: 25, reason: 'Maximum tenure is 25 years' },
    ]);
    expect(verdict.monthlyBreakdown.mortgagePayment).toBe(8_893.32);
    expect(verdict.principalPaid).toBe(1_600_000.19);
    expect(verdict.totalBuyCost).toBe(4_641_595.2);
    expect(verdict.breakEvenYears).toBe(5);
  });

  it('limits the stay horizon to 100 years', () => {
    expect(() => compareBuyVsRent({ propertyPrice: 1_000_000, monthlyRent: 5_000, yearsStaying: 101 })).toThrow(
      'yearsStaying cannot exceed 100'
    );
    expect(compareBuyVsRent({ propertyPrice: 1_000_000, monthlyRent: 5_000, yearsStaying: 100 }).yearsStaying).toBe(100);
  });

  it('returns the same verdict for the same inputs', () => {
    const input = { propertyPrice: 1_750_000, monthlyRent: 9_500, yearsStaying: 6, rentIncreasePercent: 4 };
    expect(compareBuyVsRent(input)).toEqual(compareBuyVsRent(input));
  });

  it.each([
    [{ propertyPrice: 1_000_000, monthlyRent: 5_000, yearsStaying: 0 }, 'yearsStaying'],
    [{ propertyPrice: 1_000_000, monthlyRent: -1, yearsStaying: 5 }, 'monthlyRent'],
    [{ propertyPrice: 1_000_000, monthlyRent: 5_000, yearsStaying: 5, appreciationPercent: -100 }, 'appreciationPercent'],
    [{ propertyPrice: 1_000_000, monthlyRent: 5_000, yearsStaying: 5, rentIncreasePercent: 150 }, 'rentIncreasePercent'],
    [{ propertyPrice: 1_000_000, monthlyRent: 5_000, yearsStaying: 300_000_000 }, 'yearsStaying'],
  ])('rejects %o', (input, field) => {
    let thrown: unknown;
    try {
      compareBuyVsRent(input);
    } catch (error) {
      thrown = error;
    }
    expect(thrown).toBeInstanceOf(InvalidInputError);
    expect(thrown).toMatchObject({ field });
  });
});
