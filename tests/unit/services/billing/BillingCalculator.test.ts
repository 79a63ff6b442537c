/**
 * BillingCalculator Tests
 */

import { describe, it, expect } from 'vitest';
import {
  computeMonthlyBill,
  computeProratedCredit,
  daysInMonthOf,
  roundCents,
} from '../../../../src/services/billing/BillingCalculator.js';
import { ValidationError } from '../../../../src/utils/errors.js';

describe('computeMonthlyBill', () => {
  it('sums base and upgrade add-ons', () => {
    const bill = computeMonthlyBill(
      100,
      45,
      { 'Fiber 1G': 5, 'Fiber 2G': 2 },
      { 'Fiber 1G': 10, 'Fiber 2G': 20 }
    );

    expect(bill).toEqual({ baseTotal: 4500, upgradeTotal: 90, grandTotal: 4590 });
  });

  it('bills nothing for a package without a configured price', () => {
    const bill = computeMonthlyBill(2, 45, { 'Legacy 300': 3 }, {});

    expect(bill).toEqual({ baseTotal: 90, upgradeTotal: 0, grandTotal: 90 });
  });

  it('handles an empty complex', () => {
    expect(computeMonthlyBill(0, 45, {}, {})).toEqual({ baseTotal: 0, upgradeTotal: 0, grandTotal: 0 });
  });

  it('rejects negative inputs', () => {
    expect(() => computeMonthlyBill(-1, 45, {}, {})).toThrow(ValidationError);
    expect(() => computeMonthlyBill(1, -45, {}, {})).toThrow(ValidationError);
    expect(() => computeMonthlyBill(1, 45, { 'Fiber 1G': -2 }, { 'Fiber 1G': 10 })).toThrow(ValidationError);
  });
});

describe('computeProratedCredit', () => {
  it('credits the unused remainder of the month', () => {
    expect(computeProratedCredit(45, 20, 30)).toBe(15);
  });

  it('credits the last day when it clears the floor', () => {
    expect(computeProratedCredit(45, 29, 30)).toBe(1.5);
  });

  it('returns 0 on the last day of the month', () => {
    expect(computeProratedCredit(45, 30, 30)).toBe(0);
  });

  it('suppresses credits below the floor', () => {
    // 10 / 31 * 1 = 0.32
    expect(computeProratedCredit(10, 30, 31)).toBe(0);
    expect(computeProratedCredit(10, 30, 31, 0)).toBe(0.32);
  });

  it('rounds to cents', () => {
    // 45 / 31 * 11 = 15.9677...
    expect(computeProratedCredit(45, 20, 31)).toBe(15.97);
  });

  it('rejects a month with no days', () => {
    expect(() => computeProratedCredit(45, 1, 0)).toThrow(ValidationError);
  });
});

describe('daysInMonthOf', () => {
  it('knows leap years', () => {
    expect(daysInMonthOf(new Date('2024-02-10T12:00:00Z'))).toBe(29);
    expect(daysInMonthOf(new Date('2026-02-10T12:00:00Z'))).toBe(28);
  });

  it('handles long and short months', () => {
    expect(daysInMonthOf(new Date('2026-03-31T23:00:00Z'))).toBe(31);
    expect(daysInMonthOf(new Date('2026-04-01T00:00:00Z'))).toBe(30);
  });
});

describe('roundCents', () => {
  it('rounds half up at the cent', () => {
    expect(roundCents(0.125)).toBe(0.13);
    expect(roundCents(2.344)).toBe(2.34);
  });
});
