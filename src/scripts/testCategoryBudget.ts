import assert from "node:assert/strict";
import { test } from "node:test";
import { computeCategoryBudget } from "../budget/computeCategoryBudget";
import { defaultEngineSettings } from "../config";
import { InvalidInputError } from "../errors";
import { CategorySpending } from "../types";

function budget(netIncome: number, spending: CategorySpending, loggedDays = 30, daysInTargetMonth = 30) {
  return computeCategoryBudget({ netIncome, spending, loggedDays, daysInTargetMonth, settings: defaultEngineSettings });
}

test("scales flexible spending and re-floors transport (30000 net, 25000 fixed)", () => {
  const a = budget(30000, { "Rent/Mortgage": 25000, Food: 6000, Transport: 2000 });

  assert.equal(a.validationCase, "B");
  assert.equal(a.scaleFactor, 0.625);
  assert.deepEqual(a.unadjustedFlexibleNeeds, { food: 6000, transport: 2000, total: 8000 });
  assert.deepEqual(a.flexibleNeeds, { food: 3500, transport: 1500, total: 5000 });
  assert.equal(a.fixedNeeds.housingAndUtilities, 25000);
  assert.equal(a.fixedNeeds.total, 25000);
  assert.equal(a.projectedBudget, 30000);
  assert.equal(a.remainingBudget, 0);
  assert.equal(a.isSustainable, true);
  assert.deepEqual(a.warnings, ["Flexible categories adjusted to fit net income"]);
  assert.deepEqual(a.adjustments, [
    "Applied proportional scaling to fit within net income",
    "Transportation raised to its daily minimum after scaling",
  ]);
});

test("re-floors food when scaling pushes it under the minimum", () => {
  const a = budget(30000, { Groceries: 20000, Food: 3000, Transportation: 12000 });

  assert.equal(a.validationCase, "B");
  assert.equal(a.scaleFactor, 0.6667);
  assert.deepEqual(a.flexibleNeeds, { food: 3000, transport: 7000, total: 10000 });
  assert.equal(a.projectedBudget, 30000);
  assert.equal(a.isSustainable, true);
  assert.equal(a.adjustments[1], "Food raised to its daily minimum after scaling");
});

test("leaves a budget that fits untouched", () => {
  const a = budget(50000, { "Rent/Mortgage": 25000, Food: 6000, Transport: 2000, Shopping: 4000 });

  assert.equal(a.validationCase, "none");
  assert.equal(a.scaleFactor, null);
  assert.deepEqual(a.flexibleNeeds, { food: 6000, transport: 2000, total: 8000 });
  assert.equal(a.projectedBudget, 33000);
  assert.equal(a.remainingBudget, 17000);
  assert.deepEqual(a.warnings, []);
  assert.deepEqual(a.adjustments, []);
});

test("projects sparse logging over the target month but never below the floors", () => {
  const a = budget(50000, { Food: 600 }, 10, 31);
  assert.deepEqual(a.flexibleNeeds, { food: 3100, transport: 1550, total: 4650 });

  const b = budget(50000, { Food: 2000 }, 10, 31);
  assert.equal(b.flexibleNeeds.food, 6200);
});

test("case A: fixed expenses alone exceed income", () => {
  const a = budget(30000, { "Rent/Mortgage": 30000, Groceries: 2000, Food: 9000 });

  assert.equal(a.validationCase, "A");
  assert.deepEqual(a.flexibleNeeds, { food: 3000, transport: 1500, total: 4500 });
  assert.equal(a.projectedBudget, 36500);
  assert.equal(a.remainingBudget, -6500);
  assert.equal(a.isSustainable, false);
  assert.deepEqual(a.warnings, ["Expenses exceed income", "Budget unsustainable"]);
  assert.deepEqual(a.adjustments, [
    "Fixed expenses exceed net income - reduced flexible categories to minimums",
    "Budget unsustainable: Even minimum flexible expenses exceed net income",
  ]);
});

test("case C: floors do not fit next to fixed expenses", () => {
  const a = budget(30000, { "Rent/Mortgage": 27000, Food: 6000 });

  assert.equal(a.validationCase, "C");
  assert.equal(a.scaleFactor, null);
  assert.deepEqual(a.flexibleNeeds, { food: 3000, transport: 1500, total: 4500 });
  assert.equal(a.remainingBudget, -1500);
  assert.equal(a.isSustainable, false);
  assert.deepEqual(a.adjustments, ["Budget unsustainable: Fixed expenses + minimum flexible expenses exceed net income"]);
});

test("rejects non-positive income and logged days", () => {
  assert.throws(() => budget(0, { Food: 100 }), InvalidInputError);
  assert.throws(() => budget(-5, { Food: 100 }), InvalidInputError);
  assert.throws(() => budget(Number.NaN, { Food: 100 }), InvalidInputError);
  assert.throws(() => budget(30000, { Food: 100 }, 0), InvalidInputError);
  assert.throws(() => budget(30000, { Food: 100 }, 10, 0), InvalidInputError);
});

test("projected equals fixed plus flexible and floors always hold", () => {
  const spending = { "Rent/Mortgage": 18000, "Phone Bill": 999.99, Food: 7333.33, Transport: 2111.11 };
  for (const net of [5000, 19000, 23500, 26000, 28777.77, 60000]) {
    const a = budget(net, spending, 27, 31);
    const cents = (n: number) => Math.round(n * 100);

    assert.equal(cents(a.projectedBudget), cents(a.fixedNeeds.total) + cents(a.flexibleNeeds.total), `net ${net}`);
    assert.equal(cents(a.remainingBudget), cents(net) - cents(a.projectedBudget), `net ${net}`);
    assert.ok(a.flexibleNeeds.food >= 3100, `food floor at net ${net}`);
    assert.ok(a.flexibleNeeds.transport >= 1550, `transport floor at net ${net}`);
    if (a.remainingBudget < 0) assert.equal(a.isSustainable, false, `net ${net}`);
  }
});
