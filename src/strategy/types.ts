export type BudgetStrategy =
  | "debt-heavy-recovery"
  | "risk-control"
  | "conservative"
  | "family-centric"
  | "builder"
  | "balanced";

export interface StrategySplit {
  needs: number; // percent
  wants: number;
  savings: number;
}

export type FamilyTier = "small" | "growing" | "large" | "unspecified";

export interface StrategyTip {
  category: string;
  title: string;
  message: string;
  action: string;
  priority: number; // 1 is most important
}

export type StrategyRuleTag = BudgetStrategy | "default";
