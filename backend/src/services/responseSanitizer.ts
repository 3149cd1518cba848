import {
  invoiceDataSchema,
  type InvoiceData,
} from "../schemas/invoiceData.schema";
import { MalformedResponseError, SchemaViolationError } from "./invoiceErrors";

export type SanitizationRule = "tagged_fence" | "generic_fence" | "raw";

export type SanitizedText = {
  rule: SanitizationRule;
  text: string;
};

const fence = "```";
const taggedFence = "```json";

// Each rule either produces the cleaned text or declines with null. When every
// rule declines the text is used as-is ("raw").
const sanitizationRules: Array<{
  rule: Exclude<SanitizationRule, "raw">;
  apply: (text: string) => string | null;
}> = [
  {
    rule: "tagged_fence",
    apply(text) {
      const start = text.indexOf(taggedFence);
      if (start === -1) {
        return null;
      }
      const contentStart = start + taggedFence.length;
      const end = text.indexOf(fence, contentStart);
      return text.slice(contentStart, end === -1 ? undefined : end).trim();
    },
  },
  {
    rule: "generic_fence",
    apply(text) {
      return text.includes(fence) ? text.split(fence).join("").trim() : null;
    },
  },
];

/** Strip incidental markdown fencing from model output; first matching rule wins. */
export function sanitizeModelText(text: string): SanitizedText {
  for (const { rule, apply } of sanitizationRules) {
    const result = apply(text);
    if (result !== null) {
      return { rule, text: result };
    }
  }

  return { rule: "raw", text };
}

export function parseModelJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new MalformedResponseError(
      `Model did not return valid JSON: ${error instanceof Error ? error.message : "parse failed"}`,
      text,
      { cause: error },
    );
  }
}

export function validateInvoiceData(value: unknown): InvoiceData {
  const parsed = invoiceDataSchema.safeParse(value);
  if (parsed.success) {
    return parsed.data;
  }

  const [issue] = parsed.error.issues;
  const fieldPath = issue && issue.path.length > 0 ? issue.path.join(".") : "(root)";
  throw new SchemaViolationError(fieldPath, issue?.message ?? "invalid value");
}

/** sanitize → parse → validate; never returns a partial record. */
export function extractInvoiceData(rawText: string): InvoiceData {
  const { text } = sanitizeModelText(rawText);
  return validateInvoiceData(parseModelJson(text));
}
