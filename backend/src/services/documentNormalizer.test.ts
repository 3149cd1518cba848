import { describe, expect, it } from "vitest";

import {
  buildPdfBytes,
  buildPngBytes,
  pixelAt,
} from "../test-utils/invoiceFixtures";
import { classifyContentType, normalizeDocument } from "./documentNormalizer";
import { EmptyDocumentError, UnsupportedFormatError } from "./invoiceErrors";

describe("classifyContentType", () => {
  it("routes PDFs and images", () => {
    expect(classifyContentType("application/pdf")).toBe("pdf");
    expect(classifyContentType("Application/PDF; charset=binary")).toBe("pdf");
    expect(classifyContentType("image/png")).toBe("image");
    expect(classifyContentType("image/webp")).toBe("image");
  });

  it("rejects everything else", () => {
    expect(classifyContentType("text/plain")).toBeNull();
    expect(classifyContentType("")).toBeNull();
    expect(classifyContentType(null)).toBeNull();
  });
});

describe("normalizeDocument", () => {
  it("decodes an image into packed RGB pixels", async () => {
    const png = buildPngBytes({ width: 8, height: 4, color: "#ff0000" });

    const image = await normalizeDocument(png, "image/png");

    expect(image.width).toBe(8);
    expect(image.height).toBe(4);
    expect(image.pixels.length).toBe(8 * 4 * 3);
    expect(pixelAt(image, 3, 2)).toEqual([255, 0, 0]);
  });

  it("flattens transparent pixels onto white", async () => {
    const png = buildPngBytes({
      width: 10,
      height: 2,
      color: "#0000ff",
      transparentRightHalf: true,
    });

    const image = await normalizeDocument(png, "image/png");

    expect(pixelAt(image, 1, 1)).toEqual([0, 0, 255]);
    expect(pixelAt(image, 8, 1)).toEqual([255, 255, 255]);
  });

  it("produces identical output for identical input", async () => {
    const png = buildPngBytes({ width: 16, height: 16, color: "#336699" });

    const first = await normalizeDocument(png, "image/png");
    const second = await normalizeDocument(png, "image/png");

    expect(second.width).toBe(first.width);
    expect(second.height).toBe(first.height);
    expect(second.pixels.equals(first.pixels)).toBe(true);
  });

  it("rejects unsupported content types before decoding", async () => {
    const png = buildPngBytes({ width: 2, height: 2, color: "#000000" });

    await expect(normalizeDocument(png, "text/plain")).rejects.toMatchObject({
      kind: "UnsupportedFormat",
      contentType: "text/plain",
      message: "Unsupported file type. Use PDF or Image.",
    });
  });

  it("rejects image bytes that cannot be decoded", async () => {
    await expect(
      normalizeDocument(Buffer.from("definitely not a png"), "image/png"),
    ).rejects.toBeInstanceOf(UnsupportedFormatError);
  });

  it("renders only the first page of a PDF", async () => {
    const pdf = await buildPdfBytes([
      { width: 100, height: 50, color: [1, 0, 0] },
      { width: 60, height: 60, color: [0, 0, 1] },
    ]);

    const image = await normalizeDocument(pdf, "application/pdf", { pdfRenderScale: 1 });

    expect(image.width).toBe(100);
    expect(image.height).toBe(50);
    expect(pixelAt(image, 50, 25)).toEqual([255, 0, 0]);
  });

  it("applies the render scale to PDF pages", async () => {
    const pdf = await buildPdfBytes([{ width: 40, height: 30, color: [0, 1, 0] }]);

    const image = await normalizeDocument(pdf, "application/pdf", { pdfRenderScale: 2 });

    expect(image.width).toBe(80);
    expect(image.height).toBe(60);
  });

  it("raises EmptyDocument for a PDF without pages", async () => {
    const pdf = await buildPdfBytes([]);

    const error = await normalizeDocument(pdf, "application/pdf").catch(
      (caught: unknown) => caught,
    );

    expect(error).toBeInstanceOf(EmptyDocumentError);
    expect(error).toMatchObject({ kind: "EmptyDocument", message: "Empty PDF file." });
  });

  it("rejects bytes that are not a readable PDF", async () => {
    await expect(
      normalizeDocument(Buffer.from("%PDF-1.7 truncated garbage"), "application/pdf"),
    ).rejects.toMatchObject({ kind: "UnsupportedFormat" });
  });
});
