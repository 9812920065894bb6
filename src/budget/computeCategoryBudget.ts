import { groupSpending, fixedCategoryKeys } from "../categories/taxonomy";
import { EngineSettings } from "../config";
import { InvalidInputError } from "../errors";
import { CategorySpending } from "../types";
import { CategoryBudgetAnalysis, FixedNeeds, FlexibleNeeds, ValidationCase } from "./types";

function round2(n: number) {
  return Math.round(n * 100) / 100;
}

function cents(d: number): number {
  return Math.round(d * 100);
}

function fromCents(c: number): number {
  return round2(c / 100);
}

function requirePositive(name: string, n: number) {
  if (!Number.isFinite(n) || n <= 0) throw new InvalidInputError(`${name} must be a positive number (got ${n})`);
}

function flexible(foodC: number, transportC: number): FlexibleNeeds {
  return { food: fromCents(foodC), transport: fromCents(transportC), total: fromCents(foodC + transportC) };
}

/**
 * Splits logged spending into fixed obligations and projected flexible spend, then fits the
 * result to net income. Food and transport never drop below their daily floors.
 */
export function computeCategoryBudget(opts: {
  netIncome: number;
  spending: CategorySpending;
  loggedDays: number;
  daysInTargetMonth: number;
  settings: Pick<EngineSettings, "foodDailyFloor" | "transportDailyFloor">;
}): CategoryBudgetAnalysis {
  const { netIncome, spending, loggedDays, daysInTargetMonth, settings } = opts;
  requirePositive("netIncome", netIncome);
  requirePositive("loggedDays", loggedDays);
  requirePositive("daysInTargetMonth", daysInTargetMonth);

  const grouped = groupSpending(spending);

  let fixedTotalC = 0;
  const fixedNeeds: FixedNeeds = { ...grouped.fixed, total: 0 };
  for (const key of fixedCategoryKeys) {
    fixedNeeds[key] = round2(grouped.fixed[key]);
    fixedTotalC += cents(fixedNeeds[key]);
  }
  fixedNeeds.total = fromCents(fixedTotalC);

  const foodFloorC = cents(settings.foodDailyFloor * daysInTargetMonth);
  const transportFloorC = cents(settings.transportDailyFloor * daysInTargetMonth);
  const floorsC = foodFloorC + transportFloorC;

  const projectedFoodC = Math.max(cents((grouped.flexible.food / loggedDays) * daysInTargetMonth), foodFloorC);
  const projectedTransportC = Math.max(
    cents((grouped.flexible.transport / loggedDays) * daysInTargetMonth),
    transportFloorC,
  );
  const unadjusted = flexible(projectedFoodC, projectedTransportC);

  const netC = cents(netIncome);
  const warnings: string[] = [];
  const adjustments: string[] = [];
  let validationCase: ValidationCase = "none";
  let scaleFactor: number | null = null;
  let foodC = projectedFoodC;
  let transportC = projectedTransportC;
  let isSustainable = true;

  if (fixedTotalC > netC) {
    validationCase = "A";
    foodC = foodFloorC;
    transportC = transportFloorC;
    isSustainable = fixedTotalC + floorsC <= netC;
    warnings.push("Expenses exceed income");
    adjustments.push("Fixed expenses exceed net income - reduced flexible categories to minimums");
    if (!isSustainable) {
      warnings.push("Budget unsustainable");
      adjustments.push("Budget unsustainable: Even minimum flexible expenses exceed net income");
    }
  } else if (fixedTotalC + projectedFoodC + projectedTransportC <= netC) {
    // fits as projected
  } else if (fixedTotalC + floorsC > netC) {
    validationCase = "C";
    foodC = foodFloorC;
    transportC = transportFloorC;
    isSustainable = false;
    warnings.push("Expenses exceed income", "Budget unsustainable");
    adjustments.push("Budget unsustainable: Fixed expenses + minimum flexible expenses exceed net income");
  } else {
    validationCase = "B";
    const availableC = netC - fixedTotalC;
    const scale = availableC / (projectedFoodC + projectedTransportC);
    scaleFactor = Math.round(scale * 10000) / 10000;

    foodC = Math.round(projectedFoodC * scale);
    transportC = availableC - foodC;
    warnings.push("Flexible categories adjusted to fit net income");
    adjustments.push("Applied proportional scaling to fit within net income");

    if (foodC < foodFloorC) {
      foodC = foodFloorC;
      transportC = Math.max(availableC - foodFloorC, transportFloorC);
      adjustments.push("Food raised to its daily minimum after scaling");
    } else if (transportC < transportFloorC) {
      transportC = transportFloorC;
      foodC = Math.max(availableC - transportFloorC, foodFloorC);
      adjustments.push("Transportation raised to its daily minimum after scaling");
    }

    isSustainable = fixedTotalC + foodC + transportC <= netC;
    if (!isSustainable) {
      warnings.push("Budget unsustainable");
      adjustments.push("Budget unsustainable: Fixed expenses + minimum flexible expenses exceed net income");
    }
  }

  const flexibleNeeds = flexible(foodC, transportC);
  const projectedC = fixedTotalC + foodC + transportC;

  return {
    netIncome: fromCents(netC),
    fixedNeeds,
    flexibleNeeds,
    unadjustedFlexibleNeeds: unadjusted,
    projectedBudget: fromCents(projectedC),
    remainingBudget: fromCents(netC - projectedC),
    isSustainable,
    validationCase,
    scaleFactor,
    warnings,
    adjustments,
  };
}
