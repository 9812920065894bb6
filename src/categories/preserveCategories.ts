import { addMonths, monthsBetween } from "../dates";
import { CategorySpending, MonthKey } from "../types";

export interface MonthSpending {
  month: MonthKey;
  spending: CategorySpending;
}

export interface CategoryHistory {
  category: string;
  lastSeen: MonthKey;
  seenIn: MonthKey[];
  monthlyAmounts: number[];
  averageAmount: number;
}

function round2(n: number) {
  return Math.round(n * 100) / 100;
}

/**
 * Months whose spending feeds preservation: up to `lookbackMonths` before the source month,
 * then every month after it through `targetMonth` (capped at the same count).
 */
export function preservationWindow(opts: {
  sourceMonth: MonthKey;
  targetMonth: MonthKey;
  lookbackMonths: number;
}): MonthKey[] {
  const { sourceMonth, targetMonth, lookbackMonths } = opts;
  const months: MonthKey[] = [];
  for (let i = lookbackMonths; i >= 1; i--) months.push(addMonths(sourceMonth, -i));

  const ahead = Math.min(monthsBetween(targetMonth, sourceMonth), lookbackMonths);
  for (let i = 1; i <= ahead; i++) months.push(addMonths(sourceMonth, i));
  return months;
}

export function buildCategoryHistory(months: MonthSpending[]): Map<string, CategoryHistory> {
  const out = new Map<string, CategoryHistory>();
  const ordered = months.slice().sort((a, b) => a.month.localeCompare(b.month));

  for (const { month, spending } of ordered) {
    for (const [category, amount] of Object.entries(spending)) {
      if (amount <= 0) continue;
      const h = out.get(category);
      if (h) {
        h.monthlyAmounts.push(amount);
        h.seenIn.push(month);
        h.lastSeen = month;
      } else {
        out.set(category, { category, lastSeen: month, seenIn: [month], monthlyAmounts: [amount], averageAmount: 0 });
      }
    }
  }

  for (const h of out.values()) {
    h.averageAmount = round2(h.monthlyAmounts.reduce((a, b) => a + b, 0) / h.monthlyAmounts.length);
  }
  return out;
}

/**
 * Fills in categories the source month missed (a bill paid every other month, say) so the
 * budget does not silently drop them. Categories idle for `inactiveMonths` or more are dropped.
 */
export function preserveCategories(opts: {
  sourceMonth: MonthKey;
  sourceSpending: CategorySpending;
  history: MonthSpending[];
  inactiveMonths: number;
}): CategorySpending {
  const { sourceMonth, sourceSpending, history, inactiveMonths } = opts;

  const all = history.filter((m) => m.month !== sourceMonth);
  all.push({ month: sourceMonth, spending: sourceSpending });
  const byCategory = buildCategoryHistory(all);

  const preserved: CategorySpending = {};
  for (const h of byCategory.values()) {
    const nearest = Math.min(...h.seenIn.map((m) => Math.abs(monthsBetween(sourceMonth, m))));
    if (nearest >= inactiveMonths) continue;

    const inSource = sourceSpending[h.category] ?? 0;
    if (inSource > 0) {
      preserved[h.category] = inSource;
    } else if (h.averageAmount > 0) {
      preserved[h.category] = h.averageAmount;
    }
  }
  return preserved;
}
