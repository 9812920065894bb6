import { LibsqlClient } from "./libsqlClient";
import { ensureMigrations } from "./migrations";

const ensured = new WeakSet<LibsqlClient>();

export async function initDb(db: LibsqlClient): Promise<void> {
  if (ensured.has(db)) return;
  await ensureMigrations(db);
  ensured.add(db);
}
