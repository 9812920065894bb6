import "dotenv/config";
import fs from "node:fs";
import path from "node:path";
import { storageConfigFromEnv } from "./config";
import { createLibsqlClient } from "./storage/libsqlClient";
import { LibsqlBudgetStore } from "./storage/libsqlBudgetStore";
import { isTransaction, isUserProfile } from "./validation";

function readJson(p: string): unknown {
  return JSON.parse(fs.readFileSync(p, "utf8"));
}

function resolveSeedPath(relOrAbs: string) {
  return path.isAbsolute(relOrAbs) ? relOrAbs : path.join(process.cwd(), relOrAbs);
}

async function main() {
  const profilePath = resolveSeedPath(process.argv[2] ?? "seed/profile.example.json");
  const transactionsPath = resolveSeedPath(process.argv[3] ?? "seed/transactions.example.json");

  const db = createLibsqlClient(storageConfigFromEnv());
  const store = new LibsqlBudgetStore(db);

  const profile = readJson(profilePath);
  if (!isUserProfile(profile)) throw new Error(`Invalid profile in ${profilePath}`);
  await store.upsertUserProfile(profile);
  console.log(`Seeded profile ${profile.id} from ${profilePath}`);

  if (fs.existsSync(transactionsPath)) {
    const txs = readJson(transactionsPath);
    if (!Array.isArray(txs)) throw new Error(`Expected an array of transactions in ${transactionsPath}`);
    let saved = 0;
    for (const [i, tx] of txs.entries()) {
      if (!isTransaction(tx)) {
        console.warn(`Skipping transaction #${i + 1}: unexpected shape`);
        continue;
      }
      await store.saveTransaction(profile.id, tx);
      saved++;
    }
    console.log(`Seeded ${saved} transaction(s) from ${transactionsPath}`);
  } else {
    console.log(`Transactions seed file not found at ${transactionsPath} (skipping)`);
  }

  db.close();
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
