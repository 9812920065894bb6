import { BudgetPrescription } from "../prescription/types";
import { dayOf } from "../dates";
import { DateRange, MonthKey, Transaction, UserProfile } from "../types";
import { BudgetStore } from "./budgetStore";

/** Process-local store for tests and dry runs. Returned records are copies. */
export class InMemoryBudgetStore implements BudgetStore {
  private profiles = new Map<string, UserProfile>();
  private transactions = new Map<string, Map<string, Transaction>>();
  private prescriptions = new Map<string, BudgetPrescription>();

  readonly calls = { fetchTransactions: 0, persistPrescription: 0 };

  putProfile(profile: UserProfile) {
    this.profiles.set(profile.id, structuredClone(profile));
  }

  putTransactions(userId: string, txs: Transaction[]) {
    for (const tx of txs) this.userTransactions(userId).set(tx.id, { ...tx });
  }

  private userTransactions(userId: string): Map<string, Transaction> {
    let m = this.transactions.get(userId);
    if (!m) {
      m = new Map();
      this.transactions.set(userId, m);
    }
    return m;
  }

  async fetchTransactions(userId: string, range: DateRange): Promise<Transaction[]> {
    this.calls.fetchTransactions++;
    return Array.from(this.userTransactions(userId).values())
      .filter((tx) => dayOf(tx.date) >= range.startDate && dayOf(tx.date) <= range.endDate)
      .sort((a, b) => a.date.localeCompare(b.date) || a.id.localeCompare(b.id))
      .map((tx) => ({ ...tx }));
  }

  async fetchUserProfile(userId: string): Promise<UserProfile | null> {
    const p = this.profiles.get(userId);
    return p ? structuredClone(p) : null;
  }

  async fetchExistingPrescription(userId: string, month: MonthKey): Promise<BudgetPrescription | null> {
    for (const p of this.prescriptions.values()) {
      if (p.userId === userId && p.month === month) return structuredClone(p);
    }
    return null;
  }

  async hasAnyPrescription(userId: string): Promise<boolean> {
    return Array.from(this.prescriptions.values()).some((p) => p.userId === userId);
  }

  async persistPrescription(p: BudgetPrescription): Promise<void> {
    this.calls.persistPrescription++;
    this.prescriptions.set(p.id, structuredClone(p));
  }

  async deletePrescriptionsWhereSourceMonth(userId: string, sourceMonth: MonthKey): Promise<number> {
    let removed = 0;
    for (const [id, p] of Array.from(this.prescriptions.entries())) {
      if (p.userId === userId && p.sourceMonth === sourceMonth) {
        this.prescriptions.delete(id);
        removed++;
      }
    }
    return removed;
  }

  async saveTransaction(userId: string, tx: Transaction): Promise<void> {
    this.userTransactions(userId).set(tx.id, { ...tx });
  }

  async deleteTransaction(userId: string, transactionId: string): Promise<Transaction | null> {
    const m = this.userTransactions(userId);
    const tx = m.get(transactionId);
    if (!tx) return null;
    m.delete(transactionId);
    return tx;
  }
}
