import { ageAt } from "../dates";
import { CivilStatus, UserProfile } from "../types";
import { BudgetStrategy, StrategyRuleTag } from "./types";

interface StrategyRule {
  tag: BudgetStrategy;
  matches: (p: UserProfile, asOf: Date) => boolean;
}

const partneredOrSingle: CivilStatus[] = ["single", "married", "widowed", "living-with-partner"];
const singleMarriedOrWidowed: CivilStatus[] = ["single", "married", "widowed"];

function activeDebtCount(p: UserProfile): number {
  // Entries, not kinds: two credit cards are two debts.
  return p.debtStatuses.filter((d) => d !== "none").length;
}

function isFixedIncome(p: UserProfile): boolean {
  return p.incomeFrequency === "fixed";
}

// Order matters; the first match wins.
export const strategyRules: StrategyRule[] = [
  { tag: "debt-heavy-recovery", matches: (p) => activeDebtCount(p) >= 2 },
  {
    tag: "risk-control",
    matches: (p) => p.incomeFrequency === "irregular" || p.profession === "unemployed" || p.isBusinessOwner,
  },
  {
    tag: "conservative",
    matches: (p, asOf) => {
      const age = p.birthDate ? ageAt(p.birthDate, asOf) : null;
      return ((age != null && age >= 55) || p.profession === "retired") && isFixedIncome(p);
    },
  },
  {
    tag: "family-centric",
    matches: (p) => p.hasChildren && isFixedIncome(p) && partneredOrSingle.includes(p.civilStatus),
  },
  {
    tag: "builder",
    matches: (p) => partneredOrSingle.includes(p.civilStatus) && !p.hasChildren && p.householdSituation === "mortgage",
  },
  {
    tag: "balanced",
    matches: (p) =>
      !p.hasChildren &&
      p.householdSituation !== "mortgage" &&
      isFixedIncome(p) &&
      singleMarriedOrWidowed.includes(p.civilStatus),
  },
];

export function explainStrategy(profile: UserProfile, asOf: Date): StrategyRuleTag {
  const rule = strategyRules.find((r) => r.matches(profile, asOf));
  return rule ? rule.tag : "default";
}

export function classifyStrategy(profile: UserProfile, asOf: Date): BudgetStrategy {
  const tag = explainStrategy(profile, asOf);
  return tag === "default" ? "balanced" : tag;
}
