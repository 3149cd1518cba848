export type InvoicePipelineErrorKind =
  | "UnsupportedFormat"
  | "EmptyDocument"
  | "TransportError"
  | "UpstreamError"
  | "MalformedResponse"
  | "SchemaViolation"
  | "PreviewUnavailable"
  | "NotFound";

const maxRawTextLength = 800;

export function truncateForLog(text: string, maxLength = maxRawTextLength): string {
  return text.length > maxLength ? `${text.slice(0, maxLength)}…` : text;
}

export abstract class InvoicePipelineError extends Error {
  abstract readonly kind: InvoicePipelineErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

// Document normalizer

export class UnsupportedFormatError extends InvoicePipelineError {
  readonly kind = "UnsupportedFormat";

  constructor(
    message: string,
    readonly contentType: string | null,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class EmptyDocumentError extends InvoicePipelineError {
  readonly kind = "EmptyDocument";
}

// Extraction client

export class TransportError extends InvoicePipelineError {
  readonly kind = "TransportError";
}

export class UpstreamError extends InvoicePipelineError {
  readonly kind = "UpstreamError";

  constructor(
    readonly status: number,
    readonly body: string,
  ) {
    super(`Extraction model responded with status ${status}: ${truncateForLog(body, 300)}`);
  }
}

// Response sanitizer & validator

export class MalformedResponseError extends InvoicePipelineError {
  readonly kind = "MalformedResponse";
  readonly rawText: string;

  constructor(message: string, rawText: string, options?: { cause?: unknown }) {
    super(message, options);
    this.rawText = truncateForLog(rawText);
  }
}

export class SchemaViolationError extends InvoicePipelineError {
  readonly kind = "SchemaViolation";

  constructor(
    readonly fieldPath: string,
    detail: string,
  ) {
    super(`Extracted invoice failed validation at "${fieldPath}": ${detail}`);
  }
}

// Preview renderer

export class PreviewUnavailableError extends InvoicePipelineError {
  readonly kind = "PreviewUnavailable";
}

// Persistence lookup

export class InvoiceLogNotFoundError extends InvoicePipelineError {
  readonly kind = "NotFound";

  constructor(readonly logId: number) {
    super(`Invoice log ${logId} not found.`);
  }
}
