import { CategoryBudgetAnalysis } from "../budget/types";
import { displayName, fixedCategoryKeys, groupSpending } from "../categories/taxonomy";
import { CategorySpending } from "../types";
import { DailyAllocation, MonthlyAllocation } from "./types";

function round2(n: number) {
  return Math.round(n * 100) / 100;
}

export function computeDailyAllocations(opts: {
  analysis: CategoryBudgetAnalysis;
  sourceSpending: CategorySpending;
  loggedDays: number;
  daysInTargetMonth: number;
  maxDailyBudget?: number | null;
}): DailyAllocation[] {
  const { analysis, sourceSpending, loggedDays, daysInTargetMonth, maxDailyBudget } = opts;
  const logged = groupSpending(sourceSpending).flexible;

  let food = analysis.flexibleNeeds.food / daysInTargetMonth;
  let transport = analysis.flexibleNeeds.transport / daysInTargetMonth;

  if (maxDailyBudget != null && maxDailyBudget > 0 && food + transport > maxDailyBudget) {
    const factor = maxDailyBudget / (food + transport);
    food *= factor;
    transport *= factor;
  }

  const foodAvg = loggedDays > 0 ? round2(logged.food / loggedDays) : 0;
  const transportAvg = loggedDays > 0 ? round2(logged.transport / loggedDays) : 0;

  return [
    {
      category: displayName("food"),
      dailyAmount: round2(food),
      description: `Daily food limit (historical average ${foodAvg.toFixed(2)}/day)`,
      historicalDailyAverage: foodAvg,
    },
    {
      category: displayName("transport"),
      dailyAmount: round2(transport),
      description: `Daily transportation limit (historical average ${transportAvg.toFixed(2)}/day)`,
      historicalDailyAverage: transportAvg,
    },
  ];
}

export function computeMonthlyAllocations(analysis: CategoryBudgetAnalysis): MonthlyAllocation[] {
  const out: MonthlyAllocation[] = [];
  for (const key of fixedCategoryKeys) {
    const amount = analysis.fixedNeeds[key];
    if (amount <= 0) continue;
    const name = displayName(key);
    out.push({ category: name, monthlyAmount: amount, description: `Fixed monthly ${name}`, isFixed: true });
  }
  return out;
}

export function baseDailyBudget(daily: DailyAllocation[]): number {
  return round2(daily.reduce((sum, a) => sum + a.dailyAmount, 0));
}

export function dailyLimitsByCategory(daily: DailyAllocation[]): Record<string, number> {
  const out: Record<string, number> = {};
  for (const a of daily) out[a.category] = a.dailyAmount;
  return out;
}

export function isCategoryNearLimit(
  category: string,
  spent: number,
  limits: Record<string, number>,
  threshold = 0.8,
): boolean {
  const limit = limits[category];
  if (limit == null || limit <= 0) return false;
  return spent >= limit * threshold;
}
