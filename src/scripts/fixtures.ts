import { Logger, Transaction, TransactionType, UserProfile } from "../types";

export const silentLogger: Logger = { log: () => undefined, warn: () => undefined };

export function profile(overrides: Partial<UserProfile> = {}): UserProfile {
  return {
    id: "user-1",
    monthlyNetIncome: 30000,
    monthlyGrossIncome: 35000,
    incomeFrequency: "fixed",
    profession: "employee",
    birthDate: "1990-01-15",
    civilStatus: "single",
    householdSituation: "renting",
    hasChildren: false,
    childCount: null,
    isBusinessOwner: false,
    debtStatuses: ["none"],
    savingsInstruments: ["none"],
    emergencyFundBalance: null,
    ...overrides,
  };
}

let seq = 0;

export function tx(
  date: string,
  amount: number,
  category: string,
  type: TransactionType = "expense",
  description = "",
): Transaction {
  seq += 1;
  return { id: `tx-${seq}`, amount, type, category, date, description };
}

/** One expense per listed day of `month` (YYYY-MM), each `amount` in `category`. */
export function dailyExpenses(month: string, days: number[], amount: number, category = "Food"): Transaction[] {
  return days.map((d) => tx(`${month}-${String(d).padStart(2, "0")}`, amount, category));
}

export function range(from: number, to: number): number[] {
  const out: number[] = [];
  for (let i = from; i <= to; i++) out.push(i);
  return out;
}
