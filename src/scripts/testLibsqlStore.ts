import assert from "node:assert/strict";
import { test } from "node:test";
import { PersistenceError } from "../errors";
import { createPrescriptionEngine } from "../prescription/engine";
import { createLibsqlClient, dbExec } from "../storage/libsqlClient";
import { LibsqlBudgetStore } from "../storage/libsqlBudgetStore";
import { Transaction } from "../types";
import { isBudgetPrescription } from "../validation";
import { dailyExpenses, profile, range, silentLogger, tx } from "./fixtures";

const now = new Date("2024-06-14T10:00:00Z");

function openStore() {
  const db = createLibsqlClient({ url: ":memory:" });
  return { db, store: new LibsqlBudgetStore(db) };
}

function expense(id: string, date: string, amount: number, description = ""): Transaction {
  return { id, amount, type: "expense", category: "Food", date, description };
}

test("transactions are filtered by calendar day and upserted per user and id", async (t) => {
  const { db, store } = openStore();
  t.after(() => db.close());

  await store.saveTransaction("user-1", expense("t1", "2024-05-31T23:30:00Z", 100, "late dinner"));
  await store.saveTransaction("user-1", expense("t2", "2024-06-01", 80));
  await store.saveTransaction("user-1", expense("t3", "2024-04-30", 60));
  await store.saveTransaction("user-1", expense("t4", "2024-05-01", 40));

  const may = { startDate: "2024-05-01", endDate: "2024-05-31" };
  assert.deepEqual(
    (await store.fetchTransactions("user-1", may)).map((x) => x.id),
    ["t4", "t1"],
  );

  await store.saveTransaction("user-1", expense("t1", "2024-05-31T23:30:00Z", 250, "late dinner"));
  await store.saveTransaction("user-2", expense("t1", "2024-05-10", 999));

  assert.deepEqual(await store.fetchTransactions("user-1", may), [
    { id: "t4", amount: 40, type: "expense", category: "Food", date: "2024-05-01", description: "" },
    { id: "t1", amount: 250, type: "expense", category: "Food", date: "2024-05-31T23:30:00Z", description: "late dinner" },
  ]);
  assert.equal((await store.fetchTransactions("user-2", may)).length, 1);
});

test("deleting a transaction returns the removed row once", async (t) => {
  const { db, store } = openStore();
  t.after(() => db.close());

  await store.saveTransaction("user-1", expense("t1", "2024-05-20", 150, "lunch"));
  assert.deepEqual(await store.deleteTransaction("user-1", "t1"), expense("t1", "2024-05-20", 150, "lunch"));
  assert.equal(await store.deleteTransaction("user-1", "t1"), null);
  assert.deepEqual(await store.fetchTransactions("user-1", { startDate: "2024-05-01", endDate: "2024-05-31" }), []);
});

test("profiles are upserted and unknown users read as null", async (t) => {
  const { db, store } = openStore();
  t.after(() => db.close());

  await store.upsertUserProfile(profile());
  assert.deepEqual(await store.fetchUserProfile("user-1"), profile());

  await store.upsertUserProfile(profile({ monthlyNetIncome: 32000 }));
  const updated = await store.fetchUserProfile("user-1");
  assert.ok(updated);
  assert.equal(updated.monthlyNetIncome, 32000);
  assert.equal(await store.fetchUserProfile("nobody"), null);
});

test("generate, invalidate and regenerate through the libSQL store", async (t) => {
  const { db, store } = openStore();
  t.after(() => db.close());

  await store.upsertUserProfile(profile());
  const history = [
    tx("2024-05-01", 25000, "Rent/Mortgage", "recurring-expense"),
    ...dailyExpenses("2024-05", range(1, 30), 200, "Food"),
    ...dailyExpenses("2024-05", range(1, 20), 100, "Transport"),
    tx("2024-06-13", 100, "Food"),
  ];
  for (const h of history) await store.saveTransaction("user-1", h);

  const engine = createPrescriptionEngine({ store, logger: silentLogger });
  assert.equal(await store.hasAnyPrescription("user-1"), false);

  const p = await engine.generate("user-1", now);
  assert.ok(p);
  const stored = await store.fetchExistingPrescription("user-1", "2024-06");
  assert.ok(stored);
  assert.equal(stored.id, "user-1_2024_6");
  assert.equal(stored.sourceMonth, "2024-05");
  assert.equal(stored.lastUpdated, "2024-06-14T10:00:00.000Z");
  assert.deepEqual(stored.sourceMonthSpending, { "Rent/Mortgage": 25000, Food: 6000, Transport: 2000 });
  assert.deepEqual(stored.strategy.targets, p.strategy.targets);
  assert.equal(await store.hasAnyPrescription("user-1"), true);

  assert.equal(await engine.onTransactionChanged("user-1", "2024-04-02"), 0);
  assert.equal(await engine.onTransactionChanged("user-1", "2024-05-10"), 1);
  assert.equal(await engine.onTransactionChanged("user-1", "2024-05-10"), 0);

  await engine.recordTransaction("user-1", expense("late-food", "2024-05-31", 5000));
  const regenerated = await engine.getPrescription("user-1", now);
  assert.ok(regenerated);
  assert.equal(regenerated.sourceMonthSpending.Food, 11000);

  assert.equal(await engine.removeTransaction("user-1", "late-food"), true);
  assert.equal(await store.fetchExistingPrescription("user-1", "2024-06"), null);
  assert.equal(await engine.removeTransaction("user-1", "late-food"), false);
});

test("a stored prescription with a corrupt payload is rejected", async (t) => {
  const { db, store } = openStore();
  t.after(() => db.close());

  await store.upsertUserProfile(profile());
  for (const h of dailyExpenses("2024-05", range(1, 30), 200, "Food")) await store.saveTransaction("user-1", h);
  const p = await createPrescriptionEngine({ store, logger: silentLogger }).generate("user-1", now);
  assert.ok(p);
  assert.equal(isBudgetPrescription(p), true);

  const noFlexibleNeeds = { ...p, analysis: { ...p.analysis, flexibleNeeds: null } };
  const noTargets = { ...p, strategy: { ...p.strategy, targets: { needs: 1 } } };
  assert.equal(isBudgetPrescription(noFlexibleNeeds), false);
  assert.equal(isBudgetPrescription(noTargets), false);

  await dbExec(db, `UPDATE budget_prescriptions SET payload_json = ? WHERE id = ?;`, [
    JSON.stringify(noTargets),
    p.id,
  ]);
  await assert.rejects(
    store.fetchExistingPrescription("user-1", "2024-06"),
    (err: unknown) => err instanceof PersistenceError && err.operation === "fetchExistingPrescription",
  );
});
