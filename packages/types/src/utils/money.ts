export function roundToTwoDecimals(num: number): number {
  return Math.round(num * 100) / 100;
}

export function sumAmounts(amounts: readonly number[]): number {
  return roundToTwoDecimals(amounts.reduce((sum, amt) => sum + amt, 0));
}

export function formatAmount(amount: number): string {
  return roundToTwoDecimals(amount).toFixed(2);
}

/** Banker's rounding: exact halves go to the nearest even integer. */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const diff = value - floor;
  if (diff > 0.5) return floor + 1;
  if (diff < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}
