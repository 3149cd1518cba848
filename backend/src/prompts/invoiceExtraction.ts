import { invoiceDataJsonSchema } from "../schemas/invoiceData.schema";

/**
 * Rendered on every call from the live schema; there is no cached copy to go
 * stale when the schema changes.
 */
export function buildInvoiceExtractionPrompt(): string {
  return [
    "Analyze the provided invoice image and extract all relevant information.",
    "",
    "Structure your output only as a valid JSON object that strictly adheres to the following schema.",
    "If a specific field or value is not present in the image, use null as the value for that field (do not omit the key).",
    "Do not include any text, explanations, or markdown formatting.",
    "",
    "JSON Schema:",
    JSON.stringify(invoiceDataJsonSchema(), null, 2),
  ].join("\n");
}
