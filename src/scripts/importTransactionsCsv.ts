import "dotenv/config";
import fs from "node:fs";
import path from "node:path";
import { settingsFromEnv, storageConfigFromEnv } from "../config";
import { parseTransactionsCsv } from "../csvTransactions";
import { monthKeyOf } from "../dates";
import { createPrescriptionEngine } from "../prescription/engine";
import { createLibsqlClient } from "../storage/libsqlClient";
import { LibsqlBudgetStore } from "../storage/libsqlBudgetStore";

function resolvePath(relOrAbs: string) {
  return path.isAbsolute(relOrAbs) ? relOrAbs : path.join(process.cwd(), relOrAbs);
}

async function main() {
  const [userId, csvArg] = process.argv.slice(2);
  if (!userId || !csvArg) {
    throw new Error("Usage: npm run transactions:import -- <userId> <transactions.csv>");
  }

  const csvPath = resolvePath(csvArg);
  if (!fs.existsSync(csvPath)) throw new Error(`Transactions CSV not found: ${csvPath}`);

  const { transactions, skipped } = parseTransactionsCsv(fs.readFileSync(csvPath, "utf8"));
  for (const s of skipped) console.warn(`Skipping row ${s.row}: ${s.reason}`);
  if (transactions.length === 0) throw new Error(`No valid transactions found in ${csvPath}`);

  const db = createLibsqlClient(storageConfigFromEnv());
  const store = new LibsqlBudgetStore(db);
  const engine = createPrescriptionEngine({ store, settings: settingsFromEnv() });

  const touched = new Map<string, string>();
  for (const tx of transactions) {
    await store.saveTransaction(userId, tx);
    touched.set(monthKeyOf(tx.date), tx.date);
  }

  let invalidated = 0;
  for (const date of touched.values()) invalidated += await engine.onTransactionChanged(userId, date);

  console.log("Import summary:");
  console.log(`- transactions imported: ${transactions.length}`);
  console.log(`- rows skipped: ${skipped.length}`);
  console.log(`- months touched: ${Array.from(touched.keys()).sort().join(", ")}`);
  console.log(`- prescriptions invalidated: ${invalidated}`);

  db.close();
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
