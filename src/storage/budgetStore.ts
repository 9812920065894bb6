import { BudgetPrescription } from "../prescription/types";
import { DateRange, MonthKey, Transaction, UserProfile } from "../types";

/** Everything the engine needs from persistence. Implementations own their own I/O. */
export interface BudgetStore {
  fetchTransactions(userId: string, range: DateRange): Promise<Transaction[]>;
  fetchUserProfile(userId: string): Promise<UserProfile | null>;
  fetchExistingPrescription(userId: string, month: MonthKey): Promise<BudgetPrescription | null>;
  hasAnyPrescription(userId: string): Promise<boolean>;
  /** Writes the whole record; replaces any prescription with the same id. */
  persistPrescription(p: BudgetPrescription): Promise<void>;
  /** Returns how many prescriptions were removed. */
  deletePrescriptionsWhereSourceMonth(userId: string, sourceMonth: MonthKey): Promise<number>;
  saveTransaction(userId: string, tx: Transaction): Promise<void>;
  deleteTransaction(userId: string, transactionId: string): Promise<Transaction | null>;
}
