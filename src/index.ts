import "dotenv/config";
import { settingsFromEnv, storageConfigFromEnv } from "./config";
import { createPrescriptionEngine } from "./prescription/engine";
import { createLibsqlClient } from "./storage/libsqlClient";
import { LibsqlBudgetStore } from "./storage/libsqlBudgetStore";
import { bodyFor } from "./templates";

async function main() {
  const userId = process.argv[2];
  if (!userId) throw new Error("Usage: npm start -- <userId> [--regenerate]");
  const regenerate = process.argv.includes("--regenerate");

  const db = createLibsqlClient(storageConfigFromEnv());
  const engine = createPrescriptionEngine({
    store: new LibsqlBudgetStore(db),
    settings: settingsFromEnv(),
  });

  try {
    const now = new Date();
    const prescription = regenerate ? await engine.generate(userId, now) : await engine.getPrescription(userId, now);
    const current =
      prescription && !regenerate
        ? ((await engine.refreshDailyState(prescription, now)) ?? (await engine.getPrescription(userId, now)))
        : prescription;
    if (!current) {
      console.log(`[${now.toISOString().slice(0, 10)}] No prescription for ${userId}: not enough data yet.`);
      return;
    }
    console.log(bodyFor(current));
  } finally {
    db.close();
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
