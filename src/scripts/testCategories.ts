import assert from "node:assert/strict";
import { test } from "node:test";
import { preservationWindow, preserveCategories } from "../categories/preserveCategories";
import { groupSpending, resolveCategory } from "../categories/taxonomy";

test("resolves canonical names and aliases, case-sensitively", () => {
  assert.deepEqual(resolveCategory("Transport"), { kind: "flexible", key: "transport" });
  assert.deepEqual(resolveCategory("Rent/Mortgage"), { kind: "fixed", key: "housingAndUtilities" });
  assert.deepEqual(resolveCategory("Loan Payment"), { kind: "fixed", key: "debt" });
  assert.deepEqual(resolveCategory("food"), { kind: "excluded" });
  assert.deepEqual(resolveCategory("Shopping"), { kind: "excluded" });
});

test("sums aliases into their canonical bucket", () => {
  const grouped = groupSpending({
    "Rent/Mortgage": 10000,
    "Electric Bill": 1500,
    Food: 3000,
    Transport: 500,
    Shopping: 800,
  });
  assert.equal(grouped.fixed.housingAndUtilities, 11500);
  assert.equal(grouped.fixed.groceries, 0);
  assert.equal(grouped.flexible.food, 3000);
  assert.equal(grouped.flexible.transport, 500);
  assert.deepEqual(grouped.excluded, { Shopping: 800 });
});

test("preservation window spans months before and after the source month", () => {
  assert.deepEqual(preservationWindow({ sourceMonth: "2024-03", targetMonth: "2024-05", lookbackMonths: 3 }), [
    "2023-12",
    "2024-01",
    "2024-02",
    "2024-04",
    "2024-05",
  ]);
});

test("keeps source amounts, averages missing categories and drops stale ones", () => {
  const preserved = preserveCategories({
    sourceMonth: "2024-06",
    sourceSpending: { Food: 3000, Groceries: 4000 },
    history: [
      { month: "2023-11", spending: { Education: 5000 } },
      { month: "2024-02", spending: { "Internet/WiFi": 1300 } },
      { month: "2024-04", spending: { Groceries: 3000, "Internet/WiFi": 1500 } },
      { month: "2024-07", spending: { Childcare: 2000 } },
    ],
    inactiveMonths: 6,
  });

  assert.deepEqual(preserved, {
    Food: 3000,
    Groceries: 4000,
    "Internet/WiFi": 1400,
    Childcare: 2000,
  });
});

test("a category idle for exactly the inactivity window is dropped", () => {
  const preserved = preserveCategories({
    sourceMonth: "2024-06",
    sourceSpending: { Food: 2000 },
    history: [
      { month: "2023-12", spending: { "Phone Bill": 900 } },
      { month: "2024-01", spending: { "Water Bill": 600 } },
    ],
    inactiveMonths: 6,
  });

  assert.deepEqual(preserved, { Food: 2000, "Water Bill": 600 });
});
