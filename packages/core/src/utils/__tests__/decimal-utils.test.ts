import { Decimal } from 'decimal.js';
import { describe, expect, it } from 'vitest';

import {
  formatRoundedDecimal,
  isDecimalLiteral,
  tryParseDecimal,
} from '../decimal-utils.js';

describe('Decimal Utilities', () => {
  describe('tryParseDecimal', () => {
    it('should parse valid string to Decimal', () => {
      const out = { value: new Decimal(0) };
      const result = tryParseDecimal('123.456', out);

      expect(result).toBe(true);
      expect(out.value.toString()).toBe('123.456');
    });

    it('should handle empty string as zero', () => {
      const out = { value: new Decimal(1) };
      const result = tryParseDecimal('', out);

      expect(result).toBe(true);
      expect(out.value.isZero()).toBe(true);
    });

    it('should return false for invalid strings', () => {
      const out = { value: new Decimal(0) };
      expect(tryParseDecimal('invalid', out)).toBe(false);
      expect(tryParseDecimal('12.34.56', out)).toBe(false);
      expect(tryParseDecimal('abc123', out)).toBe(false);
    });
  });

  describe('isDecimalLiteral', () => {
    it('should accept plain decimal literals', () => {
      expect(isDecimalLiteral('1')).toBe(true);
      expect(isDecimalLiteral('1.5')).toBe(true);
      expect(isDecimalLiteral('-1.5')).toBe(true);
      expect(isDecimalLiteral('.5')).toBe(true);
      expect(isDecimalLiteral('5.')).toBe(true);
    });

    it('should reject exponents, prefixes and keywords', () => {
      expect(isDecimalLiteral('1e3')).toBe(false);
      expect(isDecimalLiteral('0x10')).toBe(false);
      expect(isDecimalLiteral('Infinity')).toBe(false);
      expect(isDecimalLiteral('NaN')).toBe(false);
      expect(isDecimalLiteral('')).toBe(false);
      expect(isDecimalLiteral('1,5')).toBe(false);
    });
  });

  describe('formatRoundedDecimal', () => {
    it('should round to 4 places and trim trailing zeros', () => {
      expect(formatRoundedDecimal(new Decimal('1.234549'))).toBe('1.2345');
      expect(formatRoundedDecimal(new Decimal('0.0000499'))).toBe('0');
      expect(formatRoundedDecimal(new Decimal('1.23461779'))).toBe('1.2346');
    });

    it('should round midpoints away from zero', () => {
      expect(formatRoundedDecimal(new Decimal('0.00005'))).toBe('0.0001');
      expect(formatRoundedDecimal(new Decimal('-0.00005'))).toBe('-0.0001');
      expect(formatRoundedDecimal(new Decimal('2.00015'))).toBe('2.0002');
    });

    it('should collapse whole numbers to integer strings', () => {
      expect(formatRoundedDecimal(new Decimal('100.0000'))).toBe('100');
      expect(formatRoundedDecimal(new Decimal('100.1200'))).toBe('100.12');
    });

    it('should never render negative zero', () => {
      expect(formatRoundedDecimal(new Decimal('-0.00001'))).toBe('0');
    });

    it('should keep negative balances', () => {
      expect(formatRoundedDecimal(new Decimal('-77.89'))).toBe('-77.89');
    });

    it('should not switch to exponential notation', () => {
      expect(formatRoundedDecimal(new Decimal('0.0001'))).toBe('0.0001');
      expect(formatRoundedDecimal(new Decimal('12345678901234567890123'))).toBe('12345678901234567890123');
    });

    it('should honour a custom number of places', () => {
      expect(formatRoundedDecimal(new Decimal('1.25'), 1)).toBe('1.3');
    });
  });

});
