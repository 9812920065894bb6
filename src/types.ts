export type IncomeFrequency = "fixed" | "irregular";

export type Profession = "student" | "employee" | "retired" | "unemployed" | "other";

export type CivilStatus = "single" | "married" | "widowed" | "living-with-partner" | "other";

export type HouseholdSituation = "renting" | "mortgage" | "own-house" | "lives-with-family" | "other";

export type DebtStatus = "none" | "credit-card" | "loan" | "other";

export type SavingsInstrument = "none" | "small-savings" | "emergency-fund" | "investments";

export interface UserProfile {
  id: string;
  monthlyNetIncome?: number | null; // declared; preferred source of net income
  monthlyGrossIncome: number;
  incomeFrequency: IncomeFrequency;
  profession: Profession;
  birthDate?: string | null; // YYYY-MM-DD
  civilStatus: CivilStatus;
  householdSituation: HouseholdSituation;
  hasChildren: boolean;
  childCount?: number | null;
  isBusinessOwner: boolean;
  debtStatuses: DebtStatus[];
  savingsInstruments: SavingsInstrument[];
  emergencyFundBalance?: number | null;
}

export type TransactionType =
  | "income"
  | "expense"
  | "recurring-expense"
  | "savings"
  | "savings-withdrawal"
  | "debt"
  | "debt-payment"
  | "emergency-fund"
  | "emergency-fund-withdrawal";

export const transactionTypes: readonly TransactionType[] = [
  "income",
  "expense",
  "recurring-expense",
  "savings",
  "savings-withdrawal",
  "debt",
  "debt-payment",
  "emergency-fund",
  "emergency-fund-withdrawal",
];

export function isTransactionType(t: unknown): t is TransactionType {
  return typeof t === "string" && transactionTypes.some((x) => x === t);
}

export interface Transaction {
  id: string;
  amount: number; // > 0
  type: TransactionType;
  category: string;
  date: string; // YYYY-MM-DD or full ISO timestamp (UTC)
  description: string;
}

/** Category name → summed amount for one month. */
export type CategorySpending = Record<string, number>;

export type MonthKey = string; // YYYY-MM

export interface DateRange {
  startDate: string; // YYYY-MM-DD, inclusive
  endDate: string; // YYYY-MM-DD, inclusive
}

export interface Logger {
  log: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
}
