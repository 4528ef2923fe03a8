import type { Db } from "./libsqlClient";
import { ensureMigrations } from "./migrations";

const ensured = new WeakSet<Db>();

export async function initDb(db: Db): Promise<void> {
  if (ensured.has(db)) return;
  await ensureMigrations(db);
  ensured.add(db);
}
