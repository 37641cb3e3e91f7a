import { Decimal } from "decimal.js";

/** Presentation precision for percentages and prices. */
export const PCT_DP = 2;

/** Half-up rounding on the decimal value, so 1.005 → 1.01 (not 1.00 as toFixed gives). */
export function roundTo(value: number, dp: number = PCT_DP): number {
  return new Decimal(value).toDecimalPlaces(dp, Decimal.ROUND_HALF_UP).toNumber();
}

export function roundNullable(value: number | null, dp: number = PCT_DP): number | null {
  return value === null ? null : roundTo(value, dp);
}
