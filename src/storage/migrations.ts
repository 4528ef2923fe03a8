import { dbExec, type Db } from "./libsqlClient";

type Migration = { version: number; name: string; up: string[] };

const migrations: Migration[] = [
  {
    version: 1,
    name: "init_envelopes",
    up: [
      `CREATE TABLE IF NOT EXISTS envelopes (
        id TEXT PRIMARY KEY,
        name TEXT NOT NULL,
        funding_mode TEXT NOT NULL, -- 'reset' | 'rollover'
        base_amount_cents INTEGER NOT NULL,
        balance_cents INTEGER NOT NULL,
        last_funded_period TEXT NULL, -- YYYY-MM
        active INTEGER NOT NULL DEFAULT 1,
        version INTEGER NOT NULL DEFAULT 0,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );`,

      `CREATE INDEX IF NOT EXISTS idx_envelopes_name ON envelopes(name);`,
      `CREATE INDEX IF NOT EXISTS idx_envelopes_funding ON envelopes(active, last_funded_period);`,
    ],
  },
];

function nowISO() {
  return new Date().toISOString();
}

export async function ensureMigrations(db: Db): Promise<void> {
  await dbExec(
    db,
    `CREATE TABLE IF NOT EXISTS schema_migrations (
      version INTEGER PRIMARY KEY,
      name TEXT NOT NULL,
      applied_at TEXT NOT NULL
    );`
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
