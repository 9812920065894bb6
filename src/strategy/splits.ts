import { BudgetStrategy, FamilyTier, StrategySplit } from "./types";

const splits: Record<Exclude<BudgetStrategy, "family-centric">, StrategySplit> = {
  "debt-heavy-recovery": { needs: 70, wants: 20, savings: 10 },
  conservative: { needs: 75, wants: 10, savings: 15 },
  "risk-control": { needs: 40, wants: 40, savings: 20 },
  builder: { needs: 60, wants: 20, savings: 20 },
  balanced: { needs: 50, wants: 30, savings: 20 },
};

const familySplits: Record<FamilyTier, StrategySplit> = {
  small: { needs: 60, wants: 25, savings: 15 },
  growing: { needs: 65, wants: 20, savings: 15 },
  large: { needs: 70, wants: 15, savings: 15 },
  unspecified: { needs: 60, wants: 25, savings: 15 },
};

const labels: Record<BudgetStrategy, string> = {
  "debt-heavy-recovery": "Debt Recovery",
  "risk-control": "Risk Control",
  conservative: "Conservative",
  "family-centric": "Family-Centric",
  builder: "Builder",
  balanced: "Balanced",
};

export function familyTier(childCount: number | null | undefined): FamilyTier {
  if (childCount == null) return "unspecified";
  if (childCount >= 6) return "large";
  if (childCount >= 3) return "growing";
  return "small";
}

export function strategySplit(strategy: BudgetStrategy, childCount?: number | null): StrategySplit {
  if (strategy === "family-centric") return familySplits[familyTier(childCount)];
  return splits[strategy];
}

/** e.g. "Debt Recovery (70/20/10)" */
export function strategyLabel(strategy: BudgetStrategy, childCount?: number | null): string {
  const s = strategySplit(strategy, childCount);
  return `${labels[strategy]} (${s.needs}/${s.wants}/${s.savings})`;
}

function round2(n: number) {
  return Math.round(n * 100) / 100;
}

export function splitAmounts(netIncome: number, split: StrategySplit): StrategySplit {
  return {
    needs: round2((netIncome * split.needs) / 100),
    wants: round2((netIncome * split.wants) / 100),
    savings: round2((netIncome * split.savings) / 100),
  };
}
