import { Transaction, UserProfile } from "../types";
import { NetIncomeSource } from "./types";

// Money that arrives as "income" but is not earnings.
const nonEarningIncomeCategories = new Set(["Debt Income", "Emergency Fund Withdrawal"]);

function round2(n: number) {
  return Math.round(n * 100) / 100;
}

export function isIncomeTransaction(tx: Transaction): boolean {
  if (tx.type === "income") return !nonEarningIncomeCategories.has(tx.category);
  return tx.type === "debt" || tx.type === "emergency-fund-withdrawal";
}

export function resolveNetIncome(opts: {
  profile: UserProfile;
  sourceTransactions: Transaction[];
  sourceExpenses: number;
  estimateMultiplier: number;
}): { amount: number; source: NetIncomeSource } | null {
  const { profile, sourceTransactions, sourceExpenses, estimateMultiplier } = opts;

  const declared = profile.monthlyNetIncome;
  if (declared != null && Number.isFinite(declared) && declared > 0) {
    return { amount: round2(declared), source: "declared" };
  }

  const fromTransactions = round2(
    sourceTransactions.filter(isIncomeTransaction).reduce((sum, tx) => sum + tx.amount, 0),
  );
  if (fromTransactions > 0) return { amount: fromTransactions, source: "transactions" };

  const estimated = round2(sourceExpenses * estimateMultiplier);
  if (estimated > 0) return { amount: estimated, source: "estimated" };
  return null;
}
