import type { InvoiceData } from "../schemas/invoiceData.schema";

export type StoredInvoiceLog = {
  id: number;
  filename: string;
  file_content: Buffer;
  extracted_schema_content: InvoiceData;
  created_at: string;
};

export type InvoiceLogMetadata = Omit<StoredInvoiceLog, "file_content"> & {
  file_size: number;
};

export type InvoiceLogSearchMode = "filename" | "id";

export type ListInvoiceLogsQuery = {
  offset: number;
  limit: number;
  searchText?: string | null;
  searchMode?: InvoiceLogSearchMode;
};

export type CreateInvoiceLogInput = {
  filename: string;
  fileContent: Buffer;
  data: InvoiceData;
};

export interface InvoiceLogStore {
  /** Single atomic write of filename, bytes and validated record. */
  store(input: CreateInvoiceLogInput): Promise<StoredInvoiceLog>;
  findById(id: number): Promise<StoredInvoiceLog | null>;
  /** Newest first; never returns the raw bytes. */
  list(query: ListInvoiceLogsQuery): Promise<InvoiceLogMetadata[]>;
}

export class InvoiceLogStoreError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "InvoiceLogStoreError";
  }
}

/** Digits-only search text as an id; null when the text can never match one. */
export function parseIdSearch(searchText: string): number | null {
  const trimmed = searchText.trim();
  if (!/^\d+$/.test(trimmed)) {
    return null;
  }

  const id = Number(trimmed);
  return Number.isSafeInteger(id) ? id : null;
}
