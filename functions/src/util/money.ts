/**
 * Rounds to 2 decimals on the number's shortest decimal form, so 2.4875
 * (stored as 2.48749999...) becomes 2.49 rather than 2.48.
 */
export const round2 = (value: number): number => {
  const text = String(value);
  if (text.includes("e")) {
    return Math.round(value * 100) / 100;
  }
  return Number(`${Math.round(Number(`${text}e2`))}e-2`);
};

export const formatPrice = (value: number): string => value.toFixed(2);

/** Whole cents, so running totals compare exactly against a budget. */
export const toCents = (value: number): number => Math.round(value * 100);
