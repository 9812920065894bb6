import assert from "node:assert/strict";
import { test } from "node:test";
import {
  computeBehaviorAdjustments,
  effectiveDailyBudget,
  flexibleSpendingByDay,
  isPayday,
} from "../allocation/behaviorAdjustments";
import {
  baseDailyBudget,
  computeDailyAllocations,
  computeMonthlyAllocations,
  dailyLimitsByCategory,
  isCategoryNearLimit,
} from "../allocation/computeAllocations";
import { computeCategoryBudget } from "../budget/computeCategoryBudget";
import { defaultEngineSettings } from "../config";
import { tx } from "./fixtures";

const sourceSpending = { "Rent/Mortgage": 25000, Food: 6000, Transport: 2000 };
const analysis = computeCategoryBudget({
  netIncome: 30000,
  spending: sourceSpending,
  loggedDays: 30,
  daysInTargetMonth: 30,
  settings: defaultEngineSettings,
});

function adjustmentsFor(date: string, spendingByDay: Record<string, number>, base = 200) {
  return computeBehaviorAdjustments({ baseDailyBudget: base, spendingByDay, date, settings: defaultEngineSettings });
}

test("daily caps spread flexible needs over the target month", () => {
  const daily = computeDailyAllocations({ analysis, sourceSpending, loggedDays: 30, daysInTargetMonth: 30 });
  assert.deepEqual(
    daily.map((d) => [d.category, d.dailyAmount, d.historicalDailyAverage]),
    [
      ["Food", 116.67, 200],
      ["Transportation", 50, 66.67],
    ],
  );
  assert.equal(baseDailyBudget(daily), 166.67);
});

test("daily caps are scaled together to a maximum", () => {
  const daily = computeDailyAllocations({
    analysis,
    sourceSpending,
    loggedDays: 30,
    daysInTargetMonth: 30,
    maxDailyBudget: 100,
  });
  assert.deepEqual(
    daily.map((d) => d.dailyAmount),
    [70, 30],
  );
});

test("one monthly allocation per non-zero fixed category", () => {
  assert.deepEqual(computeMonthlyAllocations(analysis), [
    {
      category: "Housing and Utilities",
      monthlyAmount: 25000,
      description: "Fixed monthly Housing and Utilities",
      isFixed: true,
    },
  ]);
});

test("underspending rolls over and Friday adds the weekend bonus", () => {
  const date = "2024-06-14"; // Friday
  const adj = adjustmentsFor(date, { "2024-06-13": 150 });
  assert.deepEqual(
    adj.map((a) => [a.type, a.amount]),
    [
      ["rollover", 50],
      ["weekend", 40],
    ],
  );
  assert.ok(adj.every((a) => a.effectiveDate === date));
  assert.equal(effectiveDailyBudget(200, adj, date), 290);
});

test("a day without spending rolls over the whole base", () => {
  const adj = adjustmentsFor("2024-06-12", {});
  assert.deepEqual(
    adj.map((a) => [a.type, a.amount]),
    [["rollover", 200]],
  );
});

test("overspending reduces today's budget without clamping", () => {
  const adj = adjustmentsFor("2024-06-12", { "2024-06-11": 260 });
  assert.deepEqual(
    adj.map((a) => [a.type, a.amount]),
    [["overspending", -60]],
  );
  assert.equal(effectiveDailyBudget(200, adj, "2024-06-12"), 140);

  const deep = adjustmentsFor("2024-06-11", { "2024-06-10": 500 }, 100);
  assert.equal(effectiveDailyBudget(100, deep, "2024-06-11"), -300);
});

test("payday bonus on the 15th when yesterday matched the base", () => {
  const adj = adjustmentsFor("2024-07-15", { "2024-07-14": 200 });
  assert.deepEqual(
    adj.map((a) => [a.type, a.amount]),
    [["payday", 30]],
  );
  assert.equal(effectiveDailyBudget(200, adj, "2024-07-15"), 230);
});

test("payday falls on the last day of months without a 30th", () => {
  const days = defaultEngineSettings.paydayDays;
  assert.equal(isPayday("2024-02-29", days), true);
  assert.equal(isPayday("2024-02-28", days), false);
  assert.equal(isPayday("2023-02-28", days), true);
  assert.equal(isPayday("2024-03-30", days), true);
  assert.equal(isPayday("2024-03-31", days), false);
});

test("only adjustments effective on the date count", () => {
  const adj = [
    ...adjustmentsFor("2024-06-12", {}),
    ...adjustmentsFor("2024-06-14", { "2024-06-13": 200 }),
  ];
  assert.equal(effectiveDailyBudget(200, adj, "2024-06-12"), 400);
  assert.equal(effectiveDailyBudget(200, adj, "2024-06-14"), 240);
});

test("daily spend counts food and transport expenses only", () => {
  const byDay = flexibleSpendingByDay([
    tx("2024-06-10", 120, "Food"),
    tx("2024-06-10T08:00:00Z", 45.5, "Transport"),
    tx("2024-06-10", 900, "Shopping"),
    tx("2024-06-11", 30000, "Food", "income"),
    tx("2024-06-11", 80, "Transportation", "recurring-expense"),
  ]);
  assert.deepEqual(byDay, { "2024-06-10": 165.5, "2024-06-11": 80 });
});

test("near-limit check uses 80% of the category limit", () => {
  const limits = dailyLimitsByCategory(computeDailyAllocations({ analysis, sourceSpending, loggedDays: 30, daysInTargetMonth: 30 }));
  assert.deepEqual(limits, { Food: 116.67, Transportation: 50 });
  assert.equal(isCategoryNearLimit("Transportation", 40, limits), true);
  assert.equal(isCategoryNearLimit("Transportation", 39.99, limits), false);
  assert.equal(isCategoryNearLimit("Transportation", 45, limits, 0.95), false);
  assert.equal(isCategoryNearLimit("Shopping", 1000, limits), false);
});
