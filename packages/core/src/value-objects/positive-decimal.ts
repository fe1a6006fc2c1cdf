import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import { InvalidAmountError } from '../errors/index.js';
import { tryParseDecimal } from '../utils/decimal-utils.js';

/**
 * Decimal restricted to values strictly greater than zero.
 *
 * Only obtainable through `create`, and the wrapped value is never exposed
 * by reference, so holders can do arithmetic without re-checking the sign.
 */
export class PositiveDecimal {
  private constructor(private readonly value: Decimal) {}

  static create(value: Decimal.Value): Result<PositiveDecimal, InvalidAmountError> {
    if (value === '') {
      return err(new InvalidAmountError('', 'value is required'));
    }

    const parsed = { value: new Decimal(0) };
    if (!tryParseDecimal(value, parsed)) {
      return err(new InvalidAmountError(String(value), `value is not a valid decimal: ${String(value)}`));
    }

    const decimal = parsed.value;
    if (!decimal.isFinite() || !decimal.greaterThan(0)) {
      return err(new InvalidAmountError(decimal.toString()));
    }

    return ok(new PositiveDecimal(decimal));
  }

  /**
   * Decimal instances are immutable, so handing out the inner value is safe
   */
  toDecimal(): Decimal {
    return this.value;
  }

  equals(other: PositiveDecimal): boolean {
    return this.value.equals(other.value);
  }

  toString(): string {
    return this.value.toFixed();
  }

  toJSON(): string {
    return this.toString();
  }
}
