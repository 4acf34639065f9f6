/**
 * Pure calculation functions for time log amounts.
 *
 * `applyTimeLogTrigger` is the single place where `totalAmount` and
 * `updatedAt` are derived. Every repository runs it on every insert and
 * update before the write commits, mirroring the `BEFORE INSERT OR UPDATE`
 * trigger in the Supabase migration.
 */

import { ValidationError } from "../errors";
import { toLocalDate, toLocalISO } from "../utils/time";
import type { TimeLog } from "../../types";

const MS_PER_MINUTE = 60 * 1000;

export interface AmountInputs {
  startTime: string | null;
  endTime: string | null;
  breakDurationMinutes: number;
  hourlyRate: number;
}

// ---------------------------------------------------------------------------
// Rounding
// ---------------------------------------------------------------------------

function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  const rounded = Math.round(Math.abs(value) * factor) / factor;
  // Half away from zero, like Postgres numeric; never yields -0
  return rounded === 0 ? 0 : Math.sign(value) * rounded;
}

/** Round to the 2 decimals of the currency columns. */
export function roundCurrency(amount: number): number {
  return roundTo(amount, 2);
}

/** Round to the 6 decimals of the location columns. */
export function roundCoordinate(value: number): number {
  return roundTo(value, 6);
}

// ---------------------------------------------------------------------------
// Duration
// ---------------------------------------------------------------------------

/**
 * @throws ValidationError if the string is not a parseable date
 */
export function toEpochMs(value: string, label: string): number {
  const ms = Date.parse(value);
  if (Number.isNaN(ms)) {
    throw new ValidationError(`Invalid ${label}: "${value}"`);
  }
  return ms;
}

/**
 * Minutes between start and end, minus the break.
 * No floor: a break longer than the session gives a negative number.
 */
export function calculateWorkedMinutes(
  startTime: string,
  endTime: string,
  breakDurationMinutes = 0,
): number {
  const start = toEpochMs(startTime, "startTime");
  const end = toEpochMs(endTime, "endTime");

  return (end - start) / MS_PER_MINUTE - breakDurationMinutes;
}

// ---------------------------------------------------------------------------
// Amount
// ---------------------------------------------------------------------------

const MS_PER_HOUR = 60n * 60n * 1000n;

/** numeric(12,2): |amount| stays below 10^10, i.e. 10^12 cents */
const AMOUNT_LIMIT_CENTS = 1_000_000_000_000n;

/** Integer division rounding half away from zero. */
function divideRounded(numerator: bigint, denominator: bigint): bigint {
  const negative = numerator < 0n;
  const magnitude = negative ? -numerator : numerator;
  let quotient = magnitude / denominator;
  if ((magnitude % denominator) * 2n >= denominator) {
    quotient += 1n;
  }
  return negative ? -quotient : quotient;
}

/**
 * workedMinutes / 60 * hourlyRate, or 0 while either time is missing.
 *
 * Computed exactly in milliseconds and rate cents, then rounded to cents
 * the way the numeric column rounds.
 *
 * @throws ValidationError if the amount does not fit numeric(12,2)
 */
export function calculateTotalAmount(input: AmountInputs): number {
  if (!input.startTime || !input.endTime) {
    return 0;
  }

  const workedMs =
    toEpochMs(input.endTime, "endTime") -
    toEpochMs(input.startTime, "startTime") -
    Math.round(input.breakDurationMinutes * MS_PER_MINUTE);
  const rateCents = Math.round(input.hourlyRate * 100);

  const cents = divideRounded(BigInt(workedMs) * BigInt(rateCents), MS_PER_HOUR);
  if (cents >= AMOUNT_LIMIT_CENTS || cents <= -AMOUNT_LIMIT_CENTS) {
    throw new ValidationError("Invalid totalAmount: outside the numeric(12,2) range");
  }

  return Number(cents) / 100;
}

/**
 * Returns the record with totalAmount recomputed and updatedAt set to `now`.
 */
export function applyTimeLogTrigger<
  T extends AmountInputs & { totalAmount: number; updatedAt: string },
>(record: T, now: Date): T {
  return {
    ...record,
    totalAmount: calculateTotalAmount(record),
    updatedAt: toLocalISO(now),
  };
}

// ---------------------------------------------------------------------------
// Summaries
// ---------------------------------------------------------------------------

export interface TimeLogTotals {
  logCount: number;
  openSessionCount: number;
  workedMinutes: number;
  travelMinutes: number;
  totalAmount: number;
  approvedAmount: number;
  pendingAmount: number;
}

export interface OrderTotals extends TimeLogTotals {
  orderId: string;
}

export interface DayTotals extends TimeLogTotals {
  /** Local YYYY-MM-DD of startTime */
  date: string;
}

export interface TimeLogSummary {
  totals: TimeLogTotals;
  byOrder: OrderTotals[];
  byDay: DayTotals[];
}

function emptyTotals(): TimeLogTotals {
  return {
    logCount: 0,
    openSessionCount: 0,
    workedMinutes: 0,
    travelMinutes: 0,
    totalAmount: 0,
    approvedAmount: 0,
    pendingAmount: 0,
  };
}

function addLog(totals: TimeLogTotals, log: TimeLog): void {
  totals.logCount += 1;
  totals.travelMinutes += log.travelTimeMinutes;

  if (log.endTime === null) {
    totals.openSessionCount += 1;
  } else {
    totals.workedMinutes += calculateWorkedMinutes(
      log.startTime,
      log.endTime,
      log.breakDurationMinutes,
    );
  }

  totals.totalAmount += log.totalAmount;
  if (log.isApproved) {
    totals.approvedAmount += log.totalAmount;
  } else {
    totals.pendingAmount += log.totalAmount;
  }
}

function roundTotals<T extends TimeLogTotals>(totals: T): T {
  return {
    ...totals,
    workedMinutes: roundTo(totals.workedMinutes, 2),
    totalAmount: roundCurrency(totals.totalAmount),
    approvedAmount: roundCurrency(totals.approvedAmount),
    pendingAmount: roundCurrency(totals.pendingAmount),
  };
}

/**
 * Aggregate logs overall, per order and per local day.
 * Open sessions count towards logCount but add no worked minutes.
 * Groups are ordered by first appearance in `logs`.
 */
export function summarizeTimeLogs(logs: TimeLog[]): TimeLogSummary {
  const totals = emptyTotals();
  const byOrder = new Map<string, OrderTotals>();
  const byDay = new Map<string, DayTotals>();

  for (const log of logs) {
    addLog(totals, log);

    let order = byOrder.get(log.orderId);
    if (!order) {
      order = { orderId: log.orderId, ...emptyTotals() };
      byOrder.set(log.orderId, order);
    }
    addLog(order, log);

    const date = toLocalDate(log.startTime);
    let day = byDay.get(date);
    if (!day) {
      day = { date, ...emptyTotals() };
      byDay.set(date, day);
    }
    addLog(day, log);
  }

  return {
    totals: roundTotals(totals),
    byOrder: Array.from(byOrder.values(), roundTotals),
    byDay: Array.from(byDay.values(), roundTotals),
  };
}
