import { z } from "zod";

// Every key is required; "not found on the invoice" is an explicit null.
const text = () => z.string().nullable();

export const invoiceItemSchema = z.object({
  description: z.string().describe("Description of the item purchased"),
  quantity: text().describe("Quantity of items"),
  unit_price: text().describe("Price per unit"),
  total_price: text().describe("Total price for this line item"),
});

export const vendorInfoSchema = z.object({
  name_english: text().describe("Vendor name in English"),
  name_nepali: text().describe("Vendor name in Nepali script"),
  address: text(),
  phone: text(),
  email: text(),
  vat_number: text().describe("Vendor VAT/PAN number"),
});

export const customerInfoSchema = z.object({
  name: text(),
  address: text(),
  vat_number: text().describe("Customer VAT/PAN number"),
});

export const summarySchema = z.object({
  subtotal: text(),
  tax_amount: text(),
  tax_rate_percent: text(),
  discount_amount: text(),
  total_amount_due: text(),
  amount_in_words: text(),
  has_company_stamp: z.string().describe("Yes or No"),
});

export const invoiceDataSchema = z.object({
  invoice_number: text(),
  transaction_number: text(),
  reference_number: text(),
  invoice_date_ad: text().describe("Gregorian (AD) invoice date, YYYY-MM-DD"),
  invoice_miti_bs: text().describe("Bikram Sambat (BS) invoice date, YYYY-MM-DD"),
  vendor_info: vendorInfoSchema,
  customer_info: customerInfoSchema,
  line_items: z.array(invoiceItemSchema),
  summary: summarySchema,
});

export type InvoiceItem = z.infer<typeof invoiceItemSchema>;
export type VendorInfo = z.infer<typeof vendorInfoSchema>;
export type CustomerInfo = z.infer<typeof customerInfoSchema>;
export type InvoiceSummary = z.infer<typeof summarySchema>;
export type InvoiceData = z.infer<typeof invoiceDataSchema>;

/**
 * JSON Schema projection of {@link invoiceDataSchema}. The prompt embeds this
 * and the validator uses the zod schema itself, so the two cannot drift.
 */
export function invoiceDataJsonSchema() {
  return z.toJSONSchema(invoiceDataSchema);
}
