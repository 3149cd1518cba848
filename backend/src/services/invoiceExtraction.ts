import { defaultRasterConfig, type RasterConfig } from "../config/env";
import type { InvoiceData } from "../schemas/invoiceData.schema";
import { normalizeDocument } from "./documentNormalizer";
import { InvoiceLogNotFoundError, InvoicePipelineError } from "./invoiceErrors";
import type {
  InvoiceLogMetadata,
  InvoiceLogStore,
  ListInvoiceLogsQuery,
  StoredInvoiceLog,
} from "./invoiceLogStore";
import { renderPreview } from "./previewRenderer";
import type { CanonicalImage } from "./raster";
import { extractInvoiceData } from "./responseSanitizer";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** The part of ExtractionClient the pipeline relies on. */
export interface InvoiceCompletionClient {
  readonly model: string;
  complete(image: CanonicalImage): Promise<string>;
}

export type UploadedInvoice = {
  filename: string;
  contentType: string | null;
  fileContent: Buffer;
};

export type InvoiceExtractionResult = {
  logId: number;
  createdAt: string;
  data: InvoiceData;
};

type InvoiceExtractionServiceDeps = {
  store: InvoiceLogStore;
  client: InvoiceCompletionClient;
  raster?: RasterConfig;
};

function describeError(error: unknown): { kind: string; message: string } {
  return {
    kind: error instanceof InvoicePipelineError ? error.kind : "Internal",
    message: error instanceof Error ? error.message : "Unknown error",
  };
}

// ---------------------------------------------------------------------------
// InvoiceExtractionService
// ---------------------------------------------------------------------------

/**
 * upload → normalize → model → sanitize/validate → persist. Any failure before
 * the final write leaves the store untouched.
 */
export class InvoiceExtractionService {
  private readonly store: InvoiceLogStore;
  private readonly client: InvoiceCompletionClient;
  private readonly raster: RasterConfig;

  constructor(deps: InvoiceExtractionServiceDeps) {
    this.store = deps.store;
    this.client = deps.client;
    this.raster = deps.raster ?? defaultRasterConfig;
  }

  async extract(upload: UploadedInvoice): Promise<InvoiceExtractionResult> {
    const startedAt = Date.now();
    console.log(
      JSON.stringify({
        event: "upload_received",
        filename: upload.filename,
        content_type: upload.contentType,
        bytes: upload.fileContent.length,
      }),
    );

    try {
      const image = await normalizeDocument(
        upload.fileContent,
        upload.contentType,
        this.raster,
      );
      console.log(
        JSON.stringify({
          event: "document_normalized",
          filename: upload.filename,
          width: image.width,
          height: image.height,
        }),
      );

      const modelStartedAt = Date.now();
      const rawText = await this.client.complete(image);
      const data = extractInvoiceData(rawText);
      console.log(
        JSON.stringify({
          event: "extraction_complete",
          filename: upload.filename,
          model: this.client.model,
          line_items: data.line_items.length,
          duration_ms: Date.now() - modelStartedAt,
        }),
      );

      const stored = await this.store.store({
        filename: upload.filename,
        fileContent: upload.fileContent,
        data,
      });
      console.log(
        JSON.stringify({
          event: "invoice_log_stored",
          log_id: stored.id,
          filename: stored.filename,
          duration_ms: Date.now() - startedAt,
        }),
      );

      return {
        logId: stored.id,
        createdAt: stored.created_at,
        data: stored.extracted_schema_content,
      };
    } catch (error) {
      console.error(
        JSON.stringify({
          event: "upload_failed",
          filename: upload.filename,
          duration_ms: Date.now() - startedAt,
          ...describeError(error),
        }),
      );
      throw error;
    }
  }

  async lookup(id: number): Promise<StoredInvoiceLog> {
    const record = await this.store.findById(id);
    if (!record) {
      throw new InvoiceLogNotFoundError(id);
    }
    return record;
  }

  list(query: ListInvoiceLogsQuery): Promise<InvoiceLogMetadata[]> {
    return this.store.list(query);
  }

  async preview(id: number): Promise<Buffer> {
    const record = await this.lookup(id);

    try {
      return await renderPreview(record.file_content, this.raster);
    } catch (error) {
      console.error(
        JSON.stringify({
          event: "preview_failed",
          log_id: id,
          ...describeError(error),
        }),
      );
      throw error;
    }
  }
}
