import { desc, eq, sql, type SQL } from "drizzle-orm";

import type { InvoiceDatabase } from "../db";
import { invoiceLogs, type InvoiceLogRow } from "../db/schema";
import {
  InvoiceLogStoreError,
  parseIdSearch,
  type CreateInvoiceLogInput,
  type InvoiceLogMetadata,
  type InvoiceLogStore,
  type ListInvoiceLogsQuery,
  type StoredInvoiceLog,
} from "./invoiceLogStore";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function rowToStoredLog(row: InvoiceLogRow): StoredInvoiceLog {
  return {
    id: row.id,
    filename: row.filename,
    file_content: row.fileContent,
    extracted_schema_content: row.extractedSchemaContent,
    created_at: row.createdAt,
  };
}

function escapeLikePattern(value: string): string {
  return value.replace(/[\\%_]/g, (match) => `\\${match}`);
}

/**
 * Build the WHERE clause for a listing. `false` means the query can never
 * match (an id search with non-numeric text).
 */
function buildSearchFilter(query: ListInvoiceLogsQuery): SQL | undefined | false {
  const searchText = query.searchText?.trim();
  if (!searchText) {
    return undefined;
  }

  if (query.searchMode === "id") {
    const id = parseIdSearch(searchText);
    return id === null ? false : eq(invoiceLogs.id, id);
  }

  const pattern = `%${escapeLikePattern(searchText.toLowerCase())}%`;
  return sql`casefold(${invoiceLogs.filename}) like ${pattern} escape '\\'`;
}

// ---------------------------------------------------------------------------
// DrizzleInvoiceLogStore
// ---------------------------------------------------------------------------

export class DrizzleInvoiceLogStore implements InvoiceLogStore {
  constructor(private readonly db: InvoiceDatabase) {}

  async store(input: CreateInvoiceLogInput): Promise<StoredInvoiceLog> {
    let rows: InvoiceLogRow[];
    try {
      rows = this.db
        .insert(invoiceLogs)
        .values({
          filename: input.filename,
          fileContent: input.fileContent,
          extractedSchemaContent: input.data,
        })
        .returning()
        .all();
    } catch (error) {
      throw new InvoiceLogStoreError(
        error instanceof Error
          ? `Failed to store invoice log: ${error.message}`
          : "Failed to store invoice log.",
        { cause: error },
      );
    }

    const [row] = rows;
    if (!row) {
      throw new InvoiceLogStoreError("Invoice log insert returned no row.");
    }
    return rowToStoredLog(row);
  }

  async findById(id: number): Promise<StoredInvoiceLog | null> {
    const row = this.db
      .select()
      .from(invoiceLogs)
      .where(eq(invoiceLogs.id, id))
      .limit(1)
      .get();

    return row ? rowToStoredLog(row) : null;
  }

  async list(query: ListInvoiceLogsQuery): Promise<InvoiceLogMetadata[]> {
    const filter = buildSearchFilter(query);
    if (filter === false) {
      return [];
    }

    const rows = this.db
      .select({
        id: invoiceLogs.id,
        filename: invoiceLogs.filename,
        created_at: invoiceLogs.createdAt,
        extracted_schema_content: invoiceLogs.extractedSchemaContent,
        file_size: sql<number>`length(${invoiceLogs.fileContent})`,
      })
      .from(invoiceLogs)
      .where(filter)
      .orderBy(desc(invoiceLogs.createdAt), desc(invoiceLogs.id))
      .limit(query.limit)
      .offset(query.offset)
      .all();

    return rows.map((row) => ({ ...row, file_size: Number(row.file_size) }));
  }
}
