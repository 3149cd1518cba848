import { defaultRasterConfig, type RasterConfig } from "../config/env";
import { EmptyDocumentError, UnsupportedFormatError } from "./invoiceErrors";
import {
  decodeImage,
  renderPdfFirstPage,
  type CanonicalImage,
} from "./raster";

export type DocumentKind = "pdf" | "image";

export function classifyContentType(
  contentType: string | null | undefined,
): DocumentKind | null {
  const normalized = contentType?.trim().toLowerCase() ?? "";
  if (normalized.includes("application/pdf")) {
    return "pdf";
  }
  if (normalized.startsWith("image/")) {
    return "image";
  }
  return null;
}

/**
 * Turn an uploaded PDF or raster image into the single canonical image sent to
 * the extraction model. Only the first page of a PDF is ever used.
 */
export async function normalizeDocument(
  bytes: Buffer,
  contentType: string | null | undefined,
  config: Pick<RasterConfig, "pdfRenderScale"> = defaultRasterConfig,
): Promise<CanonicalImage> {
  const kind = classifyContentType(contentType);

  if (kind === null) {
    throw new UnsupportedFormatError(
      "Unsupported file type. Use PDF or Image.",
      contentType ?? null,
    );
  }

  if (kind === "image") {
    try {
      return await decodeImage(bytes);
    } catch (error) {
      throw new UnsupportedFormatError(
        `Could not decode ${contentType} upload as an image.`,
        contentType ?? null,
        { cause: error },
      );
    }
  }

  let firstPage: CanonicalImage | null;
  try {
    firstPage = await renderPdfFirstPage(bytes, config.pdfRenderScale);
  } catch (error) {
    throw new UnsupportedFormatError(
      `Could not read PDF upload: ${error instanceof Error ? error.message : "unknown error"}`,
      contentType ?? null,
      { cause: error },
    );
  }

  if (!firstPage) {
    throw new EmptyDocumentError("Empty PDF file.");
  }

  return firstPage;
}
