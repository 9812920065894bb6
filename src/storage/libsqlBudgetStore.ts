import type { Row } from "@libsql/client";
import { PersistenceError } from "../errors";
import { BudgetPrescription } from "../prescription/types";
import { DateRange, MonthKey, Transaction, UserProfile, isTransactionType } from "../types";
import { isBudgetPrescription, isUserProfile } from "../validation";
import { BudgetStore } from "./budgetStore";
import { initDb } from "./initDb";
import { LibsqlClient, dbExec, dbGetAll, dbGetOne } from "./libsqlClient";

function nowISO() {
  return new Date().toISOString();
}

function rowToTransaction(r: Row): Transaction {
  const type = String(r.type);
  if (!isTransactionType(type)) throw new Error(`Unknown transaction type in storage: ${type}`);
  return {
    id: String(r.id),
    amount: Number(r.amount),
    type,
    category: String(r.category),
    date: String(r.date),
    description: r.description == null ? "" : String(r.description),
  };
}

function parsePayload<T>(raw: unknown, guard: (x: unknown) => x is T, what: string): T {
  const parsed: unknown = JSON.parse(String(raw));
  if (!guard(parsed)) throw new Error(`Stored ${what} has an unexpected shape`);
  return parsed;
}

/** libSQL/Turso-backed store. Every driver failure surfaces as a PersistenceError. */
export class LibsqlBudgetStore implements BudgetStore {
  constructor(private readonly db: LibsqlClient) {}

  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      await initDb(this.db);
      return await fn();
    } catch (err) {
      if (err instanceof PersistenceError) throw err;
      throw new PersistenceError(operation, err);
    }
  }

  async fetchTransactions(userId: string, range: DateRange): Promise<Transaction[]> {
    return this.run("fetchTransactions", async () => {
      // Dates may carry a time part, so compare on the calendar day.
      const rows = await dbGetAll(
        this.db,
        `SELECT * FROM transactions
         WHERE user_id = ? AND substr(date, 1, 10) >= ? AND substr(date, 1, 10) <= ?
         ORDER BY date ASC, id ASC;`,
        [userId, range.startDate, range.endDate],
      );
      return rows.map(rowToTransaction);
    });
  }

  async fetchUserProfile(userId: string): Promise<UserProfile | null> {
    return this.run("fetchUserProfile", async () => {
      const row = await dbGetOne(this.db, `SELECT profile_json FROM user_profiles WHERE id = ?;`, [userId]);
      return row ? parsePayload(row.profile_json, isUserProfile, "profile") : null;
    });
  }

  async upsertUserProfile(profile: UserProfile): Promise<void> {
    await this.run("upsertUserProfile", async () => {
      await dbExec(
        this.db,
        `INSERT INTO user_profiles(id, profile_json, updated_at) VALUES (?, ?, ?)
         ON CONFLICT(id) DO UPDATE SET profile_json=excluded.profile_json, updated_at=excluded.updated_at;`,
        [profile.id, JSON.stringify(profile), nowISO()],
      );
    });
  }

  async fetchExistingPrescription(userId: string, month: MonthKey): Promise<BudgetPrescription | null> {
    return this.run("fetchExistingPrescription", async () => {
      const row = await dbGetOne(
        this.db,
        `SELECT payload_json FROM budget_prescriptions WHERE user_id = ? AND month = ?;`,
        [userId, month],
      );
      return row ? parsePayload(row.payload_json, isBudgetPrescription, "prescription") : null;
    });
  }

  async hasAnyPrescription(userId: string): Promise<boolean> {
    return this.run("hasAnyPrescription", async () => {
      const row = await dbGetOne(this.db, `SELECT 1 AS found FROM budget_prescriptions WHERE user_id = ? LIMIT 1;`, [
        userId,
      ]);
      return row != null;
    });
  }

  async persistPrescription(p: BudgetPrescription): Promise<void> {
    await this.run("persistPrescription", async () => {
      await dbExec(
        this.db,
        `INSERT INTO budget_prescriptions(id, user_id, month, source_month, payload_json, last_updated)
         VALUES (?, ?, ?, ?, ?, ?)
         ON CONFLICT(id) DO UPDATE SET
           source_month=excluded.source_month,
           payload_json=excluded.payload_json,
           last_updated=excluded.last_updated;`,
        [p.id, p.userId, p.month, p.sourceMonth, JSON.stringify(p), p.lastUpdated],
      );
    });
  }

  async deletePrescriptionsWhereSourceMonth(userId: string, sourceMonth: MonthKey): Promise<number> {
    return this.run("deletePrescriptionsWhereSourceMonth", async () => {
      const res = await dbExec(this.db, `DELETE FROM budget_prescriptions WHERE user_id = ? AND source_month = ?;`, [
        userId,
        sourceMonth,
      ]);
      return res.rowsAffected;
    });
  }

  async saveTransaction(userId: string, tx: Transaction): Promise<void> {
    await this.run("saveTransaction", async () => {
      await dbExec(
        this.db,
        `INSERT INTO transactions(id, user_id, amount, type, category, date, description, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT(user_id, id) DO UPDATE SET
           amount=excluded.amount,
           type=excluded.type,
           category=excluded.category,
           date=excluded.date,
           description=excluded.description;`,
        [tx.id, userId, tx.amount, tx.type, tx.category, tx.date, tx.description, nowISO()],
      );
    });
  }

  async deleteTransaction(userId: string, transactionId: string): Promise<Transaction | null> {
    return this.run("deleteTransaction", async () => {
      const row = await dbGetOne(this.db, `SELECT * FROM transactions WHERE user_id = ? AND id = ?;`, [
        userId,
        transactionId,
      ]);
      if (!row) return null;
      await dbExec(this.db, `DELETE FROM transactions WHERE user_id = ? AND id = ?;`, [userId, transactionId]);
      return rowToTransaction(row);
    });
  }
}
