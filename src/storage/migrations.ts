import { LibsqlClient, dbExec } from "./libsqlClient";

type Migration = { version: number; name: string; up: string[] };

const migrations: Migration[] = [
  {
    version: 1,
    name: "init_budget_tables",
    up: [
      `CREATE TABLE IF NOT EXISTS user_profiles (
        id TEXT PRIMARY KEY,
        profile_json TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );`,

      `CREATE TABLE IF NOT EXISTS transactions (
        id TEXT NOT NULL,
        user_id TEXT NOT NULL,
        amount REAL NOT NULL,
        type TEXT NOT NULL,
        category TEXT NOT NULL,
        date TEXT NOT NULL, -- YYYY-MM-DD or ISO timestamp (UTC)
        description TEXT NOT NULL DEFAULT '',
        created_at TEXT NOT NULL,
        PRIMARY KEY (user_id, id)
      );`,

      `CREATE INDEX IF NOT EXISTS idx_transactions_user_date ON transactions(user_id, date);`,

      `CREATE TABLE IF NOT EXISTS budget_prescriptions (
        id TEXT PRIMARY KEY, -- <userId>_<year>_<month>
        user_id TEXT NOT NULL,
        month TEXT NOT NULL, -- YYYY-MM
        source_month TEXT NOT NULL,
        payload_json TEXT NOT NULL,
        last_updated TEXT NOT NULL
      );`,

      `CREATE UNIQUE INDEX IF NOT EXISTS idx_prescriptions_user_month ON budget_prescriptions(user_id, month);`,
      `CREATE INDEX IF NOT EXISTS idx_prescriptions_source ON budget_prescriptions(user_id, source_month);`,
    ],
  },
];

function nowISO() {
  return new Date().toISOString();
}

export async function ensureMigrations(db: LibsqlClient): Promise<void> {
  await dbExec(
    db,
    `CREATE TABLE IF NOT EXISTS schema_migrations (
      version INTEGER PRIMARY KEY,
      name TEXT NOT NULL,
      applied_at TEXT NOT NULL
    );`,
  );

  const applied = await dbExec(db, `SELECT version FROM schema_migrations;`);
  const appliedSet = new Set<number>(applied.rows.map((r) => Number(r.version)));

  for (const m of migrations) {
    if (appliedSet.has(m.version)) continue;
    for (const stmt of m.up) {
      await dbExec(db, stmt);
    }
    await dbExec(db, `INSERT INTO schema_migrations(version, name, applied_at) VALUES(?, ?, ?);`, [
      m.version,
      m.name,
      nowISO(),
    ]);
  }
}
