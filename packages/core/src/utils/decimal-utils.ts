import { Decimal } from 'decimal.js';

// 28 significant digits, half-away-from-zero rounding
Decimal.set({
  maxE: 9e15, // Maximum exponent
  minE: -9e15, // Minimum exponent
  modulo: Decimal.ROUND_HALF_UP,
  precision: 28,
  rounding: Decimal.ROUND_HALF_UP,
  toExpNeg: -7, // Use exponential notation for numbers smaller than 1e-7
  toExpPos: 21, // Use exponential notation for numbers larger than 1e+21
});

/**
 * Plain decimal literal: optional sign, digits with an optional fraction.
 * Rejects exponents, hex/binary prefixes and the Infinity/NaN keywords Decimal would otherwise accept.
 */
export const DECIMAL_LITERAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;

/**
 * Number of fractional digits balances are rendered with
 */
export const OUTPUT_DECIMAL_PLACES = 4;

/**
 * Try to parse a string or number to a Decimal
 */
export function tryParseDecimal(value: Decimal.Value | undefined | null, out?: { value: Decimal }): boolean {
  if (value === undefined || value === null || value === '') {
    if (out) out.value = new Decimal(0);
    return true;
  }

  try {
    const decimal = new Decimal(value);
    if (out) out.value = decimal;
    return true;
  } catch {
    return false;
  }
}

/**
 * Check whether a string is a plain decimal literal (see DECIMAL_LITERAL_PATTERN)
 */
export function isDecimalLiteral(value: string): boolean {
  return DECIMAL_LITERAL_PATTERN.test(value);
}

/**
 * Round half away from zero to a fixed number of places and drop trailing fractional zeros.
 *
 * 100.0000 → "100", 100.1200 → "100.12", -0.00001 → "0"
 */
export function formatRoundedDecimal(decimal: Decimal, decimalPlaces = OUTPUT_DECIMAL_PLACES): string {
  // toFixed() on the rounded value never prints "-0"
  return decimal.toDecimalPlaces(decimalPlaces, Decimal.ROUND_HALF_UP).toFixed();
}
