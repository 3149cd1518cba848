import path from "path";
import { pathToFileURL } from "url";

import { createCanvas, loadImage, type Canvas } from "@napi-rs/canvas";
import { PDFDocument } from "pdf-lib";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** One opaque image, packed RGB (3 bytes per pixel, row-major). */
export type CanonicalImage = {
  width: number;
  height: number;
  pixels: Buffer;
};

type PdfJsModule = typeof import("pdfjs-dist/legacy/build/pdf.mjs");
type PdfDocument = Awaited<ReturnType<PdfJsModule["getDocument"]>["promise"]>;
type PdfPage = Awaited<ReturnType<PdfDocument["getPage"]>>;
type RenderParameters = Parameters<PdfPage["render"]>[0];

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

let pdfjsPromise: Promise<PdfJsModule> | null = null;

function loadPdfJs(): Promise<PdfJsModule> {
  if (!pdfjsPromise) {
    pdfjsPromise = import("pdfjs-dist/legacy/build/pdf.mjs").then((pdfjs) => {
      if (!pdfjs.GlobalWorkerOptions.workerSrc) {
        const workerPath = path.join(
          process.cwd(),
          "node_modules/pdfjs-dist/legacy/build/pdf.worker.mjs",
        );
        pdfjs.GlobalWorkerOptions.workerSrc = pathToFileURL(workerPath).toString();
      }
      return pdfjs;
    });
  }
  return pdfjsPromise;
}

function createWhiteCanvas(width: number, height: number): Canvas {
  const canvas = createCanvas(width, height);
  const context = canvas.getContext("2d");
  context.fillStyle = "#ffffff";
  context.fillRect(0, 0, width, height);
  return canvas;
}

/** Drops the alpha channel of an already-opaque canvas. */
function canvasToCanonical(canvas: Canvas): CanonicalImage {
  const { data, width, height } = canvas
    .getContext("2d")
    .getImageData(0, 0, canvas.width, canvas.height);
  const pixels = Buffer.alloc(width * height * 3);

  for (let source = 0, target = 0; source < data.length; source += 4, target += 3) {
    pixels[target] = data[source];
    pixels[target + 1] = data[source + 1];
    pixels[target + 2] = data[source + 2];
  }

  return { width, height, pixels };
}

// ---------------------------------------------------------------------------
// Decoding
// ---------------------------------------------------------------------------

/**
 * Decode any raster format the canvas backend understands (PNG, JPEG, WebP,
 * GIF, BMP, ...). Transparent areas are composited onto white.
 */
export async function decodeImage(bytes: Buffer): Promise<CanonicalImage> {
  const image = await loadImage(bytes);
  if (image.width === 0 || image.height === 0) {
    throw new Error("Decoded image has no pixels.");
  }

  const canvas = createWhiteCanvas(image.width, image.height);
  canvas.getContext("2d").drawImage(image, 0, 0);
  return canvasToCanonical(canvas);
}

/**
 * Page count as recorded in the document's page tree. pdf.js substitutes a
 * blank default page for an empty tree, so it cannot answer this.
 */
export async function countPdfPages(bytes: Buffer): Promise<number> {
  const document = await PDFDocument.load(bytes, {
    ignoreEncryption: true,
    updateMetadata: false,
  });
  return document.getPageCount();
}

/**
 * Render the first page of a PDF. Returns null when the document parses but has
 * no pages; throws when the bytes are not a readable PDF.
 */
export async function renderPdfFirstPage(
  bytes: Buffer,
  scale: number,
): Promise<CanonicalImage | null> {
  if ((await countPdfPages(bytes)) === 0) {
    return null;
  }

  const pdfjs = await loadPdfJs();

  // pdf.js takes ownership of the array it is given, so hand it a copy.
  const pdf = await pdfjs.getDocument({
    data: new Uint8Array(bytes),
    isEvalSupported: false,
    verbosity: pdfjs.VerbosityLevel.ERRORS,
  }).promise;

  try {
    const page = await pdf.getPage(1);
    const viewport = page.getViewport({ scale });
    const canvas = createWhiteCanvas(
      Math.max(1, Math.floor(viewport.width)),
      Math.max(1, Math.floor(viewport.height)),
    );

    // pdf.js types its targets as DOM canvases; the skia canvas implements the
    // same drawing API.
    const renderParameters = {
      canvas,
      canvasContext: canvas.getContext("2d"),
      viewport,
    } as unknown as RenderParameters;
    await page.render(renderParameters).promise;
    page.cleanup();

    return canvasToCanonical(canvas);
  } finally {
    await pdf.destroy();
  }
}

// ---------------------------------------------------------------------------
// Encoding
// ---------------------------------------------------------------------------

export async function encodeJpeg(
  image: CanonicalImage,
  quality: number,
): Promise<Buffer> {
  const canvas = createCanvas(image.width, image.height);
  const context = canvas.getContext("2d");
  const imageData = context.createImageData(image.width, image.height);

  for (let source = 0, target = 0; source < image.pixels.length; source += 3, target += 4) {
    imageData.data[target] = image.pixels[source];
    imageData.data[target + 1] = image.pixels[source + 1];
    imageData.data[target + 2] = image.pixels[source + 2];
    imageData.data[target + 3] = 255;
  }

  context.putImageData(imageData, 0, 0);
  return canvas.encode("jpeg", quality);
}
