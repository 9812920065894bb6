import assert from "node:assert/strict";
import { test } from "node:test";
import { defaultEngineSettings } from "../config";
import { analyzeMonth, confidenceFor } from "../selection/analyzeMonth";
import { selectDataMonth } from "../selection/selectDataMonth";
import { Transaction } from "../types";
import { dailyExpenses, range, tx } from "./fixtures";

function select(transactions: Transaction[], targetMonth = "2024-05") {
  const loaded: string[] = [];
  const result = selectDataMonth({
    targetMonth,
    loadMonth: async (month) => {
      loaded.push(month);
      return analyzeMonth(month, transactions);
    },
    settings: defaultEngineSettings,
  });
  return { result, loaded };
}

test("month stats count only expenses, one day per calendar date", () => {
  const stats = analyzeMonth("2024-04", [
    tx("2024-04-02", 150, "Food"),
    tx("2024-04-02T18:30:00Z", 50, "Transport", "recurring-expense"),
    tx("2024-04-03", 30000, "Salary", "income"),
    tx("2024-05-01", 99, "Food"),
  ]);
  assert.equal(stats.transactionCount, 2);
  assert.equal(stats.daysWithData, 1);
  assert.equal(stats.daysInMonth, 30);
  assert.equal(stats.dataCompleteness, 3.33);
  assert.deepEqual(stats.spending, { Food: 150, Transport: 50 });
});

test("confidence follows the data tier", () => {
  assert.equal(confidenceFor(analyzeMonth("2024-04", dailyExpenses("2024-04", range(1, 24), 100)), defaultEngineSettings), "high");
  assert.equal(confidenceFor(analyzeMonth("2024-04", dailyExpenses("2024-04", range(1, 15), 100)), defaultEngineSettings), "medium");
  assert.equal(confidenceFor(analyzeMonth("2024-04", dailyExpenses("2024-04", range(1, 5), 100)), defaultEngineSettings), "low");
});

test("selects a reliable previous month", async () => {
  const { result } = select(dailyExpenses("2024-04", range(1, 24), 200));
  const selection = await result;
  assert.equal(selection.status, "selected");
  if (selection.status !== "selected") return;
  assert.equal(selection.month, "2024-04");
  assert.equal(selection.rule, "previous-reliable");
  assert.equal(selection.reason, "Reliable data available: previous month has 80.0% days filled (24 transactions)");
  assert.deepEqual(selection.trail, [{ from: "check-previous", to: "selected", reason: "previous month is reliable" }]);
});

test("selects strong and usable previous months", async () => {
  const strong = await select(dailyExpenses("2024-04", range(1, 21), 200)).result;
  assert.equal(strong.status === "selected" && strong.rule, "previous-strong");

  const usable = await select(dailyExpenses("2024-04", range(1, 15), 200)).result;
  assert.equal(usable.status === "selected" && usable.rule, "previous-usable");
});

test("carries forward the last reliable month", async () => {
  const selection = await select([
    ...dailyExpenses("2024-04", [1, 2, 3], 200),
    ...dailyExpenses("2024-03", range(1, 5), 200),
    ...dailyExpenses("2024-02", range(1, 25), 200),
  ]).result;

  assert.equal(selection.status, "selected");
  if (selection.status !== "selected") return;
  assert.equal(selection.month, "2024-02");
  assert.equal(selection.rule, "carry-forward-reliable");
  assert.deepEqual(
    selection.trail.map((t) => t.to),
    ["search-last-reliable", "selected"],
  );
});

test("falls back to a thin previous month when nothing is reliable", async () => {
  const selection = await select([
    ...dailyExpenses("2024-04", [1, 2, 3, 4], 200),
    ...dailyExpenses("2024-01", range(1, 10), 200),
  ]).result;

  assert.equal(selection.status, "selected");
  if (selection.status !== "selected") return;
  assert.equal(selection.month, "2024-04");
  assert.equal(selection.rule, "fallback-previous");
  assert.deepEqual(
    selection.trail.map((t) => t.to),
    ["search-last-reliable", "fallback-previous", "selected"],
  );
});

test("uses the most populated month when the previous month is empty, preferring the later one on ties", async () => {
  const { result, loaded } = select([
    ...dailyExpenses("2023-12", [1, 2, 3], 200),
    ...dailyExpenses("2024-01", range(1, 8), 200),
    ...dailyExpenses("2024-02", range(1, 8), 200),
  ]);
  const selection = await result;

  assert.equal(selection.status, "selected");
  if (selection.status !== "selected") return;
  assert.equal(selection.month, "2024-02");
  assert.equal(selection.rule, "fallback-most-populated");
  assert.deepEqual(
    selection.trail.map((t) => t.to),
    ["search-last-reliable", "fallback-previous", "search-any-data", "selected"],
  );
  assert.equal(loaded.length, 12);
  assert.equal(new Set(loaded).size, 12);
});

test("reports insufficient data when the lookback window is empty", async () => {
  const selection = await select([tx("2022-01-10", 100, "Food")]).result;
  assert.equal(selection.status, "insufficient-data");
  if (selection.status !== "insufficient-data") return;
  assert.equal(selection.reason, "no-usable-month");
  assert.equal(selection.message, "No transactions found in the last 12 months");
  assert.deepEqual(selection.trail[selection.trail.length - 1], {
    from: "search-any-data",
    to: "failed",
    reason: "no-usable-month",
  });
});
