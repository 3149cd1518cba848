import { sql } from "drizzle-orm";
import { blob, integer, sqliteTable, text } from "drizzle-orm/sqlite-core";

import type { InvoiceData } from "../schemas/invoiceData.schema";

// ---------------------------------------------------------------------------
// Invoice logs — one row per successful extraction. The uploaded bytes and the
// validated result live and die together; rows are never updated.
// ---------------------------------------------------------------------------

export const invoiceLogs = sqliteTable("invoice_logs", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  filename: text("filename").notNull(), // as supplied by the uploader
  fileContent: blob("file_content", { mode: "buffer" }).notNull(), // original PDF/image bytes
  extractedSchemaContent: text("extracted_schema_content", { mode: "json" })
    .$type<InvoiceData>()
    .notNull(),
  createdAt: text("created_at")
    .notNull()
    .default(sql`(strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))`),
});

export type InvoiceLogRow = typeof invoiceLogs.$inferSelect;
export type NewInvoiceLogRow = typeof invoiceLogs.$inferInsert;

export const createInvoiceLogsTableSql = `
CREATE TABLE IF NOT EXISTS invoice_logs (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  filename TEXT NOT NULL,
  file_content BLOB NOT NULL,
  extracted_schema_content TEXT NOT NULL,
  created_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
);
CREATE INDEX IF NOT EXISTS invoice_logs_created_at_idx ON invoice_logs (created_at);
`;
