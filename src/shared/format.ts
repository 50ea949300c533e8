/**
 * UAE Mortgage Advisor - Display Formatting
 *
 * Presentation only: these helpers change how a number reads, never its value.
 */

const wholeNumber = new Intl.NumberFormat('en-US', { maximumFractionDigits: 0 });

const signedWholeNumber = new Intl.NumberFormat('en-US', {
  maximumFractionDigits: 0,
  signDisplay: 'exceptZero',
});

/** 1234567.89 → "1,234,568" */
export function formatAmount(value: number): string {
  return wholeNumber.format(value);
}

/** 1234567.89 → "1,234,568 AED" */
export function formatAed(value: number, currency = 'AED'): string {
  return `${formatAmount(value)} ${currency}`;
}

/** -250 → "-250", 250 → "+250", 0 → "0" */
export function formatSignedAmount(value: number): string {
  return signedWholeNumber.format(value);
}

/** Percentages print as given: 4.5 → "4.5%", 20 → "20%" */
export function formatPercent(value: number): string {
  return `${value}%`;
}
