import assert from "node:assert/strict";
import { test } from "node:test";
import { createPrescriptionEngine } from "../prescription/engine";
import { KeyedLock } from "../prescription/keyedLock";
import { resolveNetIncome } from "../prescription/netIncome";
import { InMemoryBudgetStore } from "../storage/inMemoryBudgetStore";
import { Transaction, UserProfile } from "../types";
import { dailyExpenses, profile, range, silentLogger, tx } from "./fixtures";

const now = new Date("2024-06-14T10:00:00Z"); // Friday

function mayHistory(): Transaction[] {
  return [
    tx("2024-05-01", 25000, "Rent/Mortgage", "recurring-expense"),
    ...dailyExpenses("2024-05", range(1, 30), 200, "Food"),
    ...dailyExpenses("2024-05", range(1, 20), 100, "Transport"),
    tx("2024-06-13", 100, "Food"),
  ];
}

// Holds persistPrescription until `open()`; `arrived` resolves when the first write reaches it.
function holdWrites(store: InMemoryBudgetStore) {
  let reached: () => void = () => undefined;
  let open: () => void = () => undefined;
  const arrived = new Promise<void>((resolve) => {
    reached = resolve;
  });
  const gate = new Promise<void>((resolve) => {
    open = resolve;
  });
  const persist = store.persistPrescription.bind(store);
  store.persistPrescription = async (p) => {
    reached();
    await gate;
    await persist(p);
  };
  return { arrived, open };
}

const lateFood: Transaction = {
  id: "late-food",
  amount: 5000,
  type: "expense",
  category: "Food",
  date: "2024-05-31",
  description: "",
};

function setup(p: UserProfile = profile(), txs: Transaction[] = mayHistory()) {
  const store = new InMemoryBudgetStore();
  store.putProfile(p);
  store.putTransactions(p.id, txs);
  const engine = createPrescriptionEngine({ store, logger: silentLogger });
  return { store, engine };
}

test("builds a prescription from a reliable previous month", async () => {
  const { store, engine } = setup();
  const p = await engine.generate("user-1", now);
  assert.ok(p);

  assert.equal(p.id, "user-1_2024_6");
  assert.equal(p.month, "2024-06");
  assert.equal(p.sourceMonth, "2024-05");
  assert.equal(p.selectionRule, "previous-reliable");
  assert.equal(p.confidence, "high");
  assert.equal(p.transactionCount, 51);
  assert.equal(p.daysWithData, 30);
  assert.equal(p.daysInSourceMonth, 31);
  assert.equal(p.dataCompleteness, 96.77);
  assert.equal(p.netIncome, 30000);
  assert.equal(p.netIncomeSource, "declared");
  assert.deepEqual(p.sourceMonthSpending, { "Rent/Mortgage": 25000, Food: 6000, Transport: 2000 });

  assert.equal(p.analysis.validationCase, "B");
  assert.deepEqual(p.analysis.flexibleNeeds, { food: 3500, transport: 1500, total: 5000 });
  assert.equal(p.analysis.projectedBudget, 30000);
  assert.deepEqual(
    p.dailyAllocations.map((d) => d.dailyAmount),
    [116.67, 50],
  );
  assert.equal(p.baseDailyBudget, 166.67);
  assert.deepEqual(
    p.monthlyAllocations.map((m) => [m.category, m.monthlyAmount]),
    [["Housing and Utilities", 25000]],
  );

  assert.equal(p.strategy.strategy, "balanced");
  assert.equal(p.strategy.label, "Balanced (50/30/20)");
  assert.deepEqual(p.strategy.targets, { needs: 15000, wants: 9000, savings: 6000 });

  assert.deepEqual(
    p.behaviorAdjustments.map((a) => [a.type, a.amount]),
    [
      ["rollover", 66.67],
      ["weekend", 33.33],
    ],
  );
  assert.equal(p.effectiveDailyBudget, 266.67);
  assert.deepEqual(p.currentMonthSpending, { Food: 100 });

  assert.equal(p.tips.filter((t) => t.kind === "analysis").length, 5);
  assert.equal(p.tips.filter((t) => t.kind === "strategy").length, 5);
  assert.equal(p.tips[0].message, "Flexible categories adjusted to fit net income");
  assert.deepEqual(
    p.tips.filter((t) => t.kind === "progress").map((t) => t.title),
    ["Excellent Work!"],
  );
  assert.equal(p.lastUpdated, "2024-06-14T10:00:00.000Z");

  assert.deepEqual(await store.fetchExistingPrescription("user-1", "2024-06"), p);
});

test("regenerating with the same inputs gives the same prescription", async () => {
  const { engine } = setup();
  const first = await engine.generate("user-1", now);
  const second = await engine.generate("user-1", now);
  assert.deepEqual(second, first);
});

test("month transactions are served from the cache on regeneration", async () => {
  const { store, engine } = setup();
  await engine.generate("user-1", now);
  const fetched = store.calls.fetchTransactions;
  await engine.generate("user-1", now);
  assert.equal(store.calls.fetchTransactions, fetched);
});

test("a first-time user below both thresholds gets no prescription", async () => {
  const thin = dailyExpenses("2024-05", range(1, 10), 200, "Food");
  const { store, engine } = setup(profile(), thin);
  assert.equal(await engine.generate("user-1", now), null);
  assert.equal(await store.hasAnyPrescription("user-1"), false);
});

test("a returning user is not held to the first-time threshold", async () => {
  const rich = setup();
  const earlier = await rich.engine.generate("user-1", now);
  assert.ok(earlier);

  const returning = profile({ id: "user-3" });
  const { store, engine } = setup(returning, dailyExpenses("2024-05", range(1, 10), 200, "Food"));
  await store.persistPrescription({ ...earlier, id: "user-3_2024_1", userId: "user-3", month: "2024-01" });

  const p = await engine.generate("user-3", now);
  assert.ok(p);
  assert.equal(p.selectionRule, "fallback-previous");
  assert.equal(p.confidence, "low");
  assert.equal(p.analysis.validationCase, "none");
  assert.deepEqual(p.analysis.flexibleNeeds, { food: 6000, transport: 1500, total: 7500 });
});

test("returns null without history or without a profile", async () => {
  const empty = setup(profile(), []);
  assert.equal(await empty.engine.generate("user-1", now), null);

  const { engine } = setup();
  assert.equal(await engine.generate("nobody", now), null);
});

test("net income falls back to income transactions, then to an estimate", async () => {
  const p = profile({ monthlyNetIncome: null });
  const may = mayHistory();

  assert.deepEqual(
    resolveNetIncome({
      profile: p,
      sourceTransactions: [
        ...may,
        tx("2024-05-15", 28000, "Salary", "income"),
        tx("2024-05-16", 5000, "Debt Income", "income"),
        tx("2024-05-17", 2000, "Credit line", "debt"),
        tx("2024-05-18", 1000, "Emergency Fund Withdrawal", "income"),
      ],
      sourceExpenses: 33000,
      estimateMultiplier: 1.2,
    }),
    { amount: 30000, source: "transactions" },
  );

  assert.deepEqual(
    resolveNetIncome({ profile: p, sourceTransactions: may, sourceExpenses: 33000, estimateMultiplier: 1.2 }),
    { amount: 39600, source: "estimated" },
  );
  assert.equal(resolveNetIncome({ profile: p, sourceTransactions: [], sourceExpenses: 0, estimateMultiplier: 1.2 }), null);

  const { engine } = setup(p);
  const generated = await engine.generate("user-1", now);
  assert.ok(generated);
  assert.equal(generated.netIncomeSource, "estimated");
  assert.equal(generated.netIncome, 39600);
});

test("a fresh prescription is reused and a stale one regenerated", async () => {
  const { store, engine } = setup();
  const p = await engine.generate("user-1", now);
  assert.ok(p);
  const persisted = store.calls.persistPrescription;

  const later = new Date("2024-06-14T11:00:00Z");
  assert.deepEqual(await engine.getPrescription("user-1", later), p);
  assert.equal(store.calls.persistPrescription, persisted);

  const stale = new Date("2024-06-14T17:00:00Z");
  const regenerated = await engine.getPrescription("user-1", stale);
  assert.ok(regenerated);
  assert.equal(regenerated.lastUpdated, "2024-06-14T17:00:00.000Z");
  assert.equal(store.calls.persistPrescription, persisted + 1);
});

test("refreshing daily state keeps the generation time", async () => {
  const { engine } = setup();
  const p = await engine.generate("user-1", now);
  assert.ok(p);

  const saturday = new Date("2024-06-15T08:00:00Z");
  const refreshed = await engine.refreshDailyState(p, saturday);
  assert.ok(refreshed);
  assert.deepEqual(
    refreshed.behaviorAdjustments.map((a) => [a.type, a.amount]),
    [
      ["rollover", 166.67],
      ["weekend", 33.33],
      ["payday", 25],
    ],
  );
  assert.equal(refreshed.effectiveDailyBudget, 391.67);
  assert.equal(refreshed.lastUpdated, p.lastUpdated);
});

test("a change in the source month invalidates its prescriptions", async () => {
  const { store, engine } = setup();
  await engine.generate("user-1", now);

  assert.equal(await engine.onTransactionChanged("user-1", "2024-04-20"), 0);
  assert.ok(await store.fetchExistingPrescription("user-1", "2024-06"));

  assert.equal(await engine.onTransactionChanged("user-1", "2024-05-20T09:00:00Z"), 1);
  assert.equal(await store.fetchExistingPrescription("user-1", "2024-06"), null);
});

test("recording and removing transactions write through and invalidate", async () => {
  const { store, engine } = setup();
  await engine.generate("user-1", now);

  await engine.recordTransaction("user-1", { id: "late-food", amount: 200, type: "expense", category: "Food", date: "2024-05-31", description: "" });
  assert.equal(await store.fetchExistingPrescription("user-1", "2024-06"), null);

  const p = await engine.getPrescription("user-1", now);
  assert.ok(p);
  assert.equal(p.sourceMonthSpending.Food, 6200);

  assert.equal(await engine.removeTransaction("user-1", "missing"), false);
  assert.equal(await engine.removeTransaction("user-1", "late-food"), true);
  assert.equal(await store.fetchExistingPrescription("user-1", "2024-06"), null);
});

test("a transaction recorded during a build triggers a rebuild from fresh data", async () => {
  const { store, engine } = setup();
  const { arrived, open } = holdWrites(store);

  const pending = engine.generate("user-1", now);
  await arrived;
  await engine.recordTransaction("user-1", lateFood);
  open();

  const built = await pending;
  assert.ok(built);
  assert.equal(built.sourceMonthSpending.Food, 11000);
  assert.equal(store.calls.persistPrescription, 2);

  const stored = await store.fetchExistingPrescription("user-1", "2024-06");
  assert.ok(stored);
  assert.equal(stored.sourceMonthSpending.Food, 11000);

  const served = await engine.getPrescription("user-1", new Date("2024-06-14T11:00:00Z"));
  assert.ok(served);
  assert.equal(served.sourceMonthSpending.Food, 11000);
});

test("refreshing an invalidated prescription does not write it back", async () => {
  const { store, engine } = setup();
  const p = await engine.getPrescription("user-1", now);
  assert.ok(p);

  await engine.recordTransaction("user-1", lateFood);
  assert.equal(await engine.refreshDailyState(p, new Date("2024-06-15T08:00:00Z")), null);
  assert.equal(await store.fetchExistingPrescription("user-1", "2024-06"), null);
  assert.equal(store.calls.persistPrescription, 1);
});

test("an invalidation during a refresh write removes the refreshed record", async () => {
  const { store, engine } = setup();
  const p = await engine.generate("user-1", now);
  assert.ok(p);

  const { arrived, open } = holdWrites(store);
  const pending = engine.refreshDailyState(p, new Date("2024-06-15T08:00:00Z"));
  await arrived;
  await engine.recordTransaction("user-1", lateFood);
  open();

  assert.equal(await pending, null);
  assert.equal(await store.fetchExistingPrescription("user-1", "2024-06"), null);
});

test("keyed lock runs same-key tasks one at a time", async () => {
  const locks = new KeyedLock();
  const events: string[] = [];
  const task = (name: string, ms: number) => async () => {
    events.push(`${name}:start`);
    await new Promise((resolve) => setTimeout(resolve, ms));
    events.push(`${name}:end`);
    return name;
  };

  const results = await Promise.all([
    locks.run("user-1|2024-06", task("a", 20)),
    locks.run("user-1|2024-06", task("b", 1)),
  ]);
  assert.deepEqual(results, ["a", "b"]);
  assert.deepEqual(events, ["a:start", "a:end", "b:start", "b:end"]);
  assert.equal(locks.isLocked("user-1|2024-06"), false);

  events.length = 0;
  await Promise.all([locks.run("k1", task("c", 20)), locks.run("k2", task("d", 1))]);
  assert.deepEqual(events, ["c:start", "d:start", "d:end", "c:end"]);
});

test("concurrent generation for one user and month yields one consistent record", async () => {
  const { store, engine } = setup();
  const [a, b] = await Promise.all([engine.generate("user-1", now), engine.generate("user-1", now)]);
  assert.deepEqual(a, b);
  assert.equal(store.calls.persistPrescription, 2);
  assert.deepEqual(await store.fetchExistingPrescription("user-1", "2024-06"), a);
});
