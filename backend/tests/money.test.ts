import { Decimal as BaseDecimal } from 'decimal.js';
import { describe, expect, test } from 'vitest';
import { Decimal } from '../src/money.js';

describe('Decimal', () => {
  test('is configured for money without touching the library default', () => {
    expect(Decimal).not.toBe(BaseDecimal);
    expect(Decimal.precision).toBe(20);
    expect(Decimal.rounding).toBe(BaseDecimal.ROUND_HALF_UP);
    expect(new Decimal(2.5).toDecimalPlaces(0).toNumber()).toBe(3);
    expect(new Decimal(0.1).plus(0.2).toNumber()).toBe(0.3);
  });
});
