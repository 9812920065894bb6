import { EngineSettings } from "../config";
import { dayOf, daysInMonth, monthKeyOf } from "../dates";
import { CategorySpending, MonthKey, Transaction } from "../types";

export interface MonthStats {
  month: MonthKey;
  spending: CategorySpending;
  transactionCount: number;
  daysWithData: number;
  daysInMonth: number;
  dataCompleteness: number; // percent, 0-100
}

export type DataTier = "reliable" | "strong" | "usable" | "none";

export type Confidence = "high" | "medium" | "low";

type TierSettings = Pick<
  EngineSettings,
  | "usableCompletenessPct"
  | "usableTransactionCount"
  | "strongCompletenessPct"
  | "strongTransactionCount"
  | "reliableCompletenessPct"
  | "reliableTransactionCount"
>;

function round2(n: number) {
  return Math.round(n * 100) / 100;
}

export function isSpendingTransaction(tx: Transaction): boolean {
  return tx.type === "expense" || tx.type === "recurring-expense";
}

export function analyzeMonth(month: MonthKey, transactions: Transaction[]): MonthStats {
  const spending: CategorySpending = {};
  const days = new Set<string>();
  let transactionCount = 0;

  for (const tx of transactions) {
    if (!isSpendingTransaction(tx)) continue;
    if (monthKeyOf(tx.date) !== month) continue;
    transactionCount++;
    days.add(dayOf(tx.date));
    spending[tx.category] = round2((spending[tx.category] ?? 0) + tx.amount);
  }

  const dim = daysInMonth(month);
  return {
    month,
    spending,
    transactionCount,
    daysWithData: days.size,
    daysInMonth: dim,
    dataCompleteness: round2((days.size / dim) * 100),
  };
}

export function dataTier(stats: MonthStats, s: TierSettings): DataTier {
  const { dataCompleteness: pct, transactionCount: n } = stats;
  if (pct >= s.reliableCompletenessPct || n >= s.reliableTransactionCount) return "reliable";
  if (pct >= s.strongCompletenessPct || n >= s.strongTransactionCount) return "strong";
  if (pct >= s.usableCompletenessPct || n >= s.usableTransactionCount) return "usable";
  return "none";
}

export function confidenceFor(stats: MonthStats, s: TierSettings): Confidence {
  const tier = dataTier(stats, s);
  if (tier === "reliable") return "high";
  if (tier === "strong" || tier === "usable") return "medium";
  return "low";
}
