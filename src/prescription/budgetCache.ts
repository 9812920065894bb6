import { Transaction } from "../types";
import { BudgetPrescription } from "./types";

interface Entry<T> {
  value: T;
  storedAt: number;
}

function monthKey(userId: string, month: string) {
  return `${userId}|${month}`;
}

/**
 * Per-engine cache of month transactions and prescriptions. Month entries expire after
 * `ttlMs`; prescriptions live until invalidated and are checked for freshness by the engine.
 * Every invalidation bumps the user's epoch, so work that started before it can tell its
 * inputs went stale.
 */
export class BudgetCache {
  private months = new Map<string, Entry<Transaction[]>>();
  private prescriptions = new Map<string, BudgetPrescription>();
  private epochs = new Map<string, number>();

  constructor(
    private readonly ttlMs: number,
    private readonly clock: () => number = Date.now,
  ) {}

  getMonth(userId: string, month: string): Transaction[] | undefined {
    const key = monthKey(userId, month);
    const e = this.months.get(key);
    if (!e) return undefined;
    if (this.clock() - e.storedAt > this.ttlMs) {
      this.months.delete(key);
      return undefined;
    }
    return e.value;
  }

  setMonth(userId: string, month: string, transactions: Transaction[]) {
    this.months.set(monthKey(userId, month), { value: transactions, storedAt: this.clock() });
  }

  getPrescription(userId: string, month: string): BudgetPrescription | undefined {
    return this.prescriptions.get(monthKey(userId, month));
  }

  setPrescription(p: BudgetPrescription) {
    this.prescriptions.set(monthKey(p.userId, p.month), p);
  }

  epoch(userId: string): number {
    return this.epochs.get(userId) ?? 0;
  }

  /** Drops the month's transactions and every cached prescription of the user. */
  invalidate(userId: string, month: string) {
    this.epochs.set(userId, this.epoch(userId) + 1);
    this.months.delete(monthKey(userId, month));
    for (const key of Array.from(this.prescriptions.keys())) {
      if (key.startsWith(`${userId}|`)) this.prescriptions.delete(key);
    }
  }
}
