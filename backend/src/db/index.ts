import Database from "better-sqlite3";
import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";

import * as schema from "./schema";

export type InvoiceDatabase = BetterSQLite3Database<typeof schema>;

/**
 * Open (or create) the SQLite file and make sure the invoice_logs table exists.
 * Pass ":memory:" for a throwaway database.
 */
export function createDatabase(databasePath: string): {
  db: InvoiceDatabase;
  close: () => void;
} {
  const sqlite = new Database(databasePath);
  if (databasePath !== ":memory:") {
    sqlite.pragma("journal_mode = WAL"); // better concurrent read performance
  }
  // SQLite's lower() folds ASCII only; filename search needs full Unicode.
  sqlite.function("casefold", { deterministic: true }, (value: unknown) =>
    typeof value === "string" ? value.toLowerCase() : value,
  );
  sqlite.exec(schema.createInvoiceLogsTableSql);

  return {
    db: drizzle(sqlite, { schema }),
    close: () => sqlite.close(),
  };
}
