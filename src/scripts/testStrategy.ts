import assert from "node:assert/strict";
import { test } from "node:test";
import { classifyStrategy, explainStrategy } from "../strategy/classifyStrategy";
import { splitAmounts, strategyLabel, strategySplit } from "../strategy/splits";
import { strategyTips } from "../strategy/tips";
import { BudgetStrategy } from "../strategy/types";
import { profile } from "./fixtures";

const asOf = new Date("2024-05-31T00:00:00Z");

test("two credit-card entries count as two debts", () => {
  const p = profile({ debtStatuses: ["credit-card", "credit-card"] });
  assert.equal(classifyStrategy(p, asOf), "debt-heavy-recovery");
  assert.equal(explainStrategy(p, asOf), "debt-heavy-recovery");
});

test("one debt does not trigger recovery; irregular income means risk control", () => {
  const p = profile({ debtStatuses: ["credit-card", "none"], incomeFrequency: "irregular" });
  assert.equal(classifyStrategy(p, asOf), "risk-control");
  assert.equal(classifyStrategy(profile({ isBusinessOwner: true }), asOf), "risk-control");
  assert.equal(classifyStrategy(profile({ profession: "unemployed" }), asOf), "risk-control");
});

test("risk control outranks retirement", () => {
  assert.equal(classifyStrategy(profile({ profession: "retired", incomeFrequency: "irregular" }), asOf), "risk-control");
  assert.equal(classifyStrategy(profile({ profession: "retired" }), asOf), "conservative");
});

test("conservative starts on the 55th birthday", () => {
  const p = profile({ birthDate: "1969-06-01" });
  assert.equal(classifyStrategy(p, asOf), "balanced");
  assert.equal(classifyStrategy(p, new Date("2024-06-01T00:00:00Z")), "conservative");
});

test("family, builder and balanced rules", () => {
  assert.equal(classifyStrategy(profile({ hasChildren: true, childCount: 2, civilStatus: "married" }), asOf), "family-centric");
  assert.equal(classifyStrategy(profile({ householdSituation: "mortgage" }), asOf), "builder");
  assert.equal(classifyStrategy(profile(), asOf), "balanced");
  assert.equal(explainStrategy(profile(), asOf), "balanced");
});

test("profiles that match no rule fall back to balanced", () => {
  const partnered = profile({ civilStatus: "living-with-partner" });
  assert.equal(explainStrategy(partnered, asOf), "default");
  assert.equal(classifyStrategy(partnered, asOf), "balanced");

  const otherWithKids = profile({ civilStatus: "other", hasChildren: true, childCount: 1 });
  assert.equal(explainStrategy(otherWithKids, asOf), "default");
});

test("classification is deterministic", () => {
  const p = profile({ hasChildren: true, childCount: 4 });
  const results = new Set([1, 2, 3].map(() => classifyStrategy(p, asOf)));
  assert.deepEqual(Array.from(results), ["family-centric"]);
});

test("family-centric tiers by child count", () => {
  assert.deepEqual(strategySplit("family-centric", null), { needs: 60, wants: 25, savings: 15 });
  assert.deepEqual(strategySplit("family-centric", 2), { needs: 60, wants: 25, savings: 15 });
  assert.deepEqual(strategySplit("family-centric", 3), { needs: 65, wants: 20, savings: 15 });
  assert.deepEqual(strategySplit("family-centric", 5), { needs: 65, wants: 20, savings: 15 });
  assert.deepEqual(strategySplit("family-centric", 6), { needs: 70, wants: 15, savings: 15 });
});

test("every split sums to 100", () => {
  const strategies: BudgetStrategy[] = ["debt-heavy-recovery", "risk-control", "conservative", "builder", "balanced"];
  for (const s of strategies) {
    const split = strategySplit(s);
    assert.equal(split.needs + split.wants + split.savings, 100, s);
  }
  for (const children of [null, 1, 3, 6]) {
    const split = strategySplit("family-centric", children);
    assert.equal(split.needs + split.wants + split.savings, 100);
  }
});

test("labels and target amounts", () => {
  assert.equal(strategyLabel("debt-heavy-recovery"), "Debt Recovery (70/20/10)");
  assert.equal(strategyLabel("family-centric", 7), "Family-Centric (70/15/15)");
  assert.deepEqual(splitAmounts(30000, strategySplit("balanced")), { needs: 15000, wants: 9000, savings: 6000 });
});

test("strategy tips are ordered by priority and capped", () => {
  const balanced = strategyTips("balanced");
  assert.equal(balanced.length, 5);
  assert.deepEqual(
    balanced.map((t) => t.priority),
    [1, 2, 3, 4, 5],
  );

  assert.equal(strategyTips("family-centric", 8)[0].title, "Clear rules for a big household");
  assert.equal(strategyTips("family-centric", null).length, 3);
  assert.equal(strategyTips("debt-heavy-recovery", null, 2).length, 2);
});
