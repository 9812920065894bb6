import { BehaviorAdjustment, DailyAllocation, MonthlyAllocation } from "../allocation/types";
import { CategoryBudgetAnalysis } from "../budget/types";
import { Confidence } from "../selection/analyzeMonth";
import { SelectionRule, SelectionTransition } from "../selection/selectDataMonth";
import { BudgetStrategy, StrategyRuleTag, StrategySplit } from "../strategy/types";
import { CategorySpending, MonthKey } from "../types";

export type NetIncomeSource = "declared" | "transactions" | "estimated";

export type CoachingTipKind = "analysis" | "strategy" | "progress";

export interface CoachingTip {
  kind: CoachingTipKind;
  category: string;
  title: string;
  message: string;
  action?: string;
}

export interface PrescriptionStrategy {
  strategy: BudgetStrategy;
  ruleTag: StrategyRuleTag;
  label: string;
  split: StrategySplit; // percent
  targets: StrategySplit; // amounts of net income
}

export interface BudgetPrescription {
  id: string; // <userId>_<year>_<month>
  userId: string;
  month: MonthKey;
  sourceMonth: MonthKey;
  selectionRule: SelectionRule;
  selectionReason: string;
  selectionTrail: SelectionTransition[];
  dataCompleteness: number;
  daysWithData: number;
  daysInSourceMonth: number;
  transactionCount: number;
  confidence: Confidence;
  netIncome: number;
  netIncomeSource: NetIncomeSource;
  sourceMonthSpending: CategorySpending;
  analysis: CategoryBudgetAnalysis;
  strategy: PrescriptionStrategy;
  dailyAllocations: DailyAllocation[];
  monthlyAllocations: MonthlyAllocation[];
  baseDailyBudget: number;
  behaviorAdjustments: BehaviorAdjustment[];
  effectiveDailyBudget: number;
  currentMonthSpending: CategorySpending;
  tips: CoachingTip[];
  lastUpdated: string; // ISO timestamp
}
