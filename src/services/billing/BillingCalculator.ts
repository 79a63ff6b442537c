/**
 * Billing Calculator
 *
 * Pure functions for the complex's monthly bill and mid-cycle suspension
 * credits. No I/O.
 */

import { ValidationError } from '../../utils/errors.js';
import type { MonthlyBill } from '../../types/index.js';

/** Credits smaller than this are not issued */
export const DEFAULT_CREDIT_FLOOR = 1;

/**
 * Round a currency amount to cents
 */
export function roundCents(amount: number): number {
  return Math.round((amount + Number.EPSILON) * 100) / 100;
}

function assertNonNegative(value: number, field: string): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new ValidationError(`${field} must be a non-negative number, got ${value}`, field);
  }
}

/**
 * Monthly bill for the complex
 *
 * baseTotal = occupiedUnits * baseRate
 * upgradeTotal = sum of count * add-on price per package; a package with no
 * configured price contributes nothing
 */
export function computeMonthlyBill(
  occupiedUnits: number,
  baseRate: number,
  upgradeCounts: Record<string, number>,
  addonPrices: Record<string, number>
): MonthlyBill {
  assertNonNegative(occupiedUnits, 'occupiedUnits');
  assertNonNegative(baseRate, 'baseRate');

  const baseTotal = roundCents(occupiedUnits * baseRate);

  let upgradeTotal = 0;
  for (const [packageName, count] of Object.entries(upgradeCounts)) {
    assertNonNegative(count, `upgradeCounts.${packageName}`);
    upgradeTotal += count * (addonPrices[packageName] ?? 0);
  }
  upgradeTotal = roundCents(upgradeTotal);

  return {
    baseTotal,
    upgradeTotal,
    grandTotal: roundCents(baseTotal + upgradeTotal),
  };
}

/**
 * Credit for the unused remainder of the month after a suspension
 *
 * @param monthlyRate - What the unit pays per month
 * @param suspensionDay - Day of month the suspension took effect (1-based)
 * @param daysInMonth - Length of the month
 * @param floor - Credits below this amount are suppressed
 * @returns the credit rounded to cents; 0 when nothing remains or it is below the floor
 */
export function computeProratedCredit(
  monthlyRate: number,
  suspensionDay: number,
  daysInMonth: number,
  floor: number = DEFAULT_CREDIT_FLOOR
): number {
  assertNonNegative(monthlyRate, 'monthlyRate');
  if (!Number.isInteger(daysInMonth) || daysInMonth < 1) {
    throw new ValidationError(`daysInMonth must be a positive integer, got ${daysInMonth}`, 'daysInMonth');
  }

  const daysRemaining = daysInMonth - suspensionDay;
  if (daysRemaining <= 0) {
    return 0;
  }

  const credit = roundCents((monthlyRate / daysInMonth) * daysRemaining);
  return credit < floor ? 0 : credit;
}

/**
 * Number of days in the month containing `date` (UTC calendar)
 */
export function daysInMonthOf(date: Date): number {
  return new Date(Date.UTC(date.getUTCFullYear(), date.getUTCMonth() + 1, 0)).getUTCDate();
}
