import { createClient } from "@libsql/client";
import type { Client, InValue, Row } from "@libsql/client";

export type LibsqlClient = Client;

export function createLibsqlClient(opts: { url: string; authToken?: string }): LibsqlClient {
  return createClient(opts);
}

export async function dbExec(db: LibsqlClient, sql: string, args: InValue[] = []) {
  return db.execute({ sql, args });
}

export async function dbGetOne(db: LibsqlClient, sql: string, args: InValue[] = []): Promise<Row | null> {
  const res = await dbExec(db, sql, args);
  return res.rows[0] ?? null;
}

export async function dbGetAll(db: LibsqlClient, sql: string, args: InValue[] = []): Promise<Row[]> {
  const res = await dbExec(db, sql, args);
  return res.rows;
}
