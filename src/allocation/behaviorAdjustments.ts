import { resolveCategory } from "../categories/taxonomy";
import { EngineSettings } from "../config";
import { addDaysISO, dayOf, dayOfMonth, daysInMonth, monthKeyOf, weekdayOf } from "../dates";
import { isSpendingTransaction } from "../selection/analyzeMonth";
import { Transaction } from "../types";
import { BehaviorAdjustment } from "./types";

function round2(n: number) {
  return Math.round(n * 100) / 100;
}

/** Food and transport spend per calendar day. */
export function flexibleSpendingByDay(transactions: Transaction[]): Record<string, number> {
  const out: Record<string, number> = {};
  for (const tx of transactions) {
    if (!isSpendingTransaction(tx)) continue;
    if (resolveCategory(tx.category).kind !== "flexible") continue;
    const day = dayOf(tx.date);
    out[day] = round2((out[day] ?? 0) + tx.amount);
  }
  return out;
}

export function isPayday(dateISO: string, paydayDays: number[]): boolean {
  const day = dayOfMonth(dateISO);
  if (paydayDays.includes(day)) return true;
  const last = daysInMonth(monthKeyOf(dateISO));
  return day === last && paydayDays.some((p) => p > last);
}

/**
 * Adjustments to the base daily budget for `date`. They are additive and unclamped: an
 * overspend larger than the base leaves a negative effective budget.
 */
export function computeBehaviorAdjustments(opts: {
  baseDailyBudget: number;
  spendingByDay: Record<string, number>;
  date: string;
  settings: Pick<EngineSettings, "weekendBonusRate" | "paydayBonusRate" | "paydayDays" | "weekendDays">;
}): BehaviorAdjustment[] {
  const { baseDailyBudget: base, spendingByDay, date, settings } = opts;
  const out: BehaviorAdjustment[] = [];

  const yesterday = addDaysISO(date, -1);
  const spent = spendingByDay[yesterday] ?? 0;
  if (spent < base) {
    out.push({
      type: "rollover",
      amount: round2(base - spent),
      reason: `Unspent ${round2(base - spent).toFixed(2)} carried over from ${yesterday}`,
      effectiveDate: date,
    });
  } else if (spent > base) {
    out.push({
      type: "overspending",
      amount: -round2(spent - base),
      reason: `Overspent ${round2(spent - base).toFixed(2)} on ${yesterday}`,
      effectiveDate: date,
    });
  }

  if (settings.weekendDays.includes(weekdayOf(date))) {
    out.push({
      type: "weekend",
      amount: round2(base * settings.weekendBonusRate),
      reason: "Weekend bonus",
      effectiveDate: date,
    });
  }

  if (isPayday(date, settings.paydayDays)) {
    out.push({
      type: "payday",
      amount: round2(base * settings.paydayBonusRate),
      reason: "Payday bonus",
      effectiveDate: date,
    });
  }

  return out;
}

export function effectiveDailyBudget(base: number, adjustments: BehaviorAdjustment[], date: string): number {
  const delta = adjustments.filter((a) => a.effectiveDate === date).reduce((sum, a) => sum + a.amount, 0);
  return round2(base + delta);
}
