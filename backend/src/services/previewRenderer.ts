import { defaultRasterConfig, type RasterConfig } from "../config/env";
import { PreviewUnavailableError } from "./invoiceErrors";
import {
  decodeImage,
  encodeJpeg,
  renderPdfFirstPage,
  type CanonicalImage,
} from "./raster";

async function decodeStoredBytes(
  bytes: Buffer,
  scale: number,
): Promise<CanonicalImage> {
  try {
    return await decodeImage(bytes);
  } catch (imageError) {
    let firstPage: CanonicalImage | null;
    try {
      firstPage = await renderPdfFirstPage(bytes, scale);
    } catch (pdfError) {
      throw new PreviewUnavailableError(
        "Could not convert file content to image preview.",
        { cause: new AggregateError([imageError, pdfError]) },
      );
    }

    if (!firstPage) {
      throw new PreviewUnavailableError("Stored PDF has no pages to preview.");
    }
    return firstPage;
  }
}

/** Stored bytes of unknown format → JPEG of the image or the PDF's first page. */
export async function renderPreview(
  bytes: Buffer,
  config: RasterConfig = defaultRasterConfig,
): Promise<Buffer> {
  const image = await decodeStoredBytes(bytes, config.pdfRenderScale);
  return encodeJpeg(image, config.jpegQuality);
}
