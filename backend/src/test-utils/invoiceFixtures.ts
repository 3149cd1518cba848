import { createCanvas } from "@napi-rs/canvas";
import { PDFDocument, rgb } from "pdf-lib";

import { createDatabase } from "../db";
import type { InvoiceData } from "../schemas/invoiceData.schema";
import { DrizzleInvoiceLogStore } from "../services/drizzleInvoiceLogStore";

export function buildInvoiceData(overrides: Partial<InvoiceData> = {}): InvoiceData {
  return {
    invoice_number: "INV-2081",
    transaction_number: null,
    reference_number: "PO-77",
    invoice_date_ad: "2024-03-14",
    invoice_miti_bs: "2080-12-01",
    vendor_info: {
      name_english: "Himal Office Supplies",
      name_nepali: "हिमाल अफिस सप्लाइज",
      address: "New Road, Kathmandu",
      phone: "01-4000000",
      email: null,
      vat_number: "600000001",
    },
    customer_info: {
      name: "Test Customer Pvt. Ltd.",
      address: null,
      vat_number: "600000002",
    },
    line_items: [
      {
        description: "A4 paper ream",
        quantity: "10",
        unit_price: "550.00",
        total_price: "5,500.00",
      },
      {
        description: "Stapler",
        quantity: "2",
        unit_price: null,
        total_price: "900.00",
      },
    ],
    summary: {
      subtotal: "6,400.00",
      tax_amount: "832.00",
      tax_rate_percent: "13",
      discount_amount: null,
      total_amount_due: "7,232.00",
      amount_in_words: "Seven thousand two hundred thirty-two only",
      has_company_stamp: "Yes",
    },
    ...overrides,
  };
}

/** Solid-colour PNG, optionally leaving the right half transparent. */
export function buildPngBytes(args: {
  width: number;
  height: number;
  color: string;
  transparentRightHalf?: boolean;
}): Buffer {
  const canvas = createCanvas(args.width, args.height);
  const context = canvas.getContext("2d");
  context.fillStyle = args.color;
  const filledWidth = args.transparentRightHalf ? args.width / 2 : args.width;
  context.fillRect(0, 0, filledWidth, args.height);
  return canvas.toBuffer("image/png");
}

/** One solid page per entry, in order. */
export async function buildPdfBytes(
  pages: Array<{ width: number; height: number; color: [number, number, number] }>,
): Promise<Buffer> {
  const pdf = await PDFDocument.create();
  for (const entry of pages) {
    const page = pdf.addPage([entry.width, entry.height]);
    page.drawRectangle({
      x: 0,
      y: 0,
      width: entry.width,
      height: entry.height,
      color: rgb(entry.color[0], entry.color[1], entry.color[2]),
    });
  }
  return Buffer.from(await pdf.save());
}

export function pixelAt(
  image: { width: number; pixels: Buffer },
  x: number,
  y: number,
): [number, number, number] {
  const offset = (y * image.width + x) * 3;
  return [image.pixels[offset], image.pixels[offset + 1], image.pixels[offset + 2]];
}

export function createInMemoryStore() {
  const { db, close } = createDatabase(":memory:");
  return { store: new DrizzleInvoiceLogStore(db), close };
}

export function chatCompletionResponse(content: string | null, status = 200): Response {
  return new Response(
    JSON.stringify({
      id: "chatcmpl-test",
      object: "chat.completion",
      created: 1710000000,
      model: "test-vision-model",
      choices: [
        {
          index: 0,
          message: { role: "assistant", content },
          finish_reason: "stop",
        },
      ],
    }),
    { status, headers: { "content-type": "application/json" } },
  );
}
