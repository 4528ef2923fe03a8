import { createClient, type Client, type InValue, type ResultSet, type Row } from "@libsql/client";

/** The slice of the libSQL client the repos use. */
export type Db = Pick<Client, "execute">;

let cachedClient: Client | null = null;

export function createDb(opts: { url: string; authToken?: string }): Client {
  if (!opts.url) throw new Error("Missing database url (set DATABASE_URL)");
  return createClient({ url: opts.url, authToken: opts.authToken });
}

/** Process-wide client, created on first use. */
export function getDb(opts: { url: string; authToken?: string }): Client {
  if (!cachedClient) cachedClient = createDb(opts);
  return cachedClient;
}

export async function dbExec(db: Db, sql: string, args: InValue[] = []): Promise<ResultSet> {
  return db.execute({ sql, args });
}

export async function dbGetOne(db: Db, sql: string, args: InValue[] = []): Promise<Row | null> {
  const res = await dbExec(db, sql, args);
  return res.rows[0] ?? null;
}

export async function dbGetAll(db: Db, sql: string, args: InValue[] = []): Promise<Row[]> {
  const res = await dbExec(db, sql, args);
  return res.rows;
}
