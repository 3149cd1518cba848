import express, { Request, Response } from "express";
import multer from "multer";

import {
  InvoicePipelineError,
  MalformedResponseError,
  SchemaViolationError,
  UpstreamError,
  type InvoicePipelineErrorKind,
} from "../services/invoiceErrors";
import type { InvoiceExtractionService } from "../services/invoiceExtraction";
import type { InvoiceLogSearchMode } from "../services/invoiceLogStore";

const defaultListLimit = 10;
const maxListLimit = 100;

const statusByKind: Record<InvoicePipelineErrorKind, number> = {
  UnsupportedFormat: 400,
  EmptyDocument: 400,
  TransportError: 502,
  UpstreamError: 502,
  MalformedResponse: 502,
  SchemaViolation: 502,
  PreviewUnavailable: 422,
  NotFound: 404,
};

type InvoicesRouterOptions = {
  maxFileMb: number;
};

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function readQueryString(value: unknown): string | null {
  if (typeof value === "string") {
    return value;
  }
  if (Array.isArray(value) && typeof value[0] === "string") {
    return value[0];
  }
  return null;
}

function readNonNegativeInt(value: unknown, fallback: number): number | null {
  const raw = readQueryString(value);
  if (raw === null || raw.trim() === "") {
    return fallback;
  }
  return /^\d+$/.test(raw.trim()) ? Number(raw.trim()) : null;
}

function parseLogId(value: string): number | null {
  return /^[1-9]\d*$/.test(value) ? Number(value) : null;
}

function sendError(res: Response, error: unknown): void {
  if (error instanceof InvoicePipelineError) {
    res.status(statusByKind[error.kind]).json({
      error: {
        kind: error.kind,
        message: error.message,
        ...(error instanceof MalformedResponseError ? { raw_text: error.rawText } : {}),
        ...(error instanceof SchemaViolationError ? { field: error.fieldPath } : {}),
        ...(error instanceof UpstreamError ? { upstream_status: error.status } : {}),
      },
    });
    return;
  }

  res.status(500).json({
    error: {
      message: error instanceof Error ? error.message : "Unexpected server error",
    },
  });
}

function sendInvalidLogId(res: Response): void {
  res.status(400).json({
    error: {
      message: "Log id must be a positive integer.",
    },
  });
}

// ---------------------------------------------------------------------------
// Router
// ---------------------------------------------------------------------------

export function createInvoicesRouter(
  service: InvoiceExtractionService,
  options: InvoicesRouterOptions,
) {
  const router = express.Router();
  const upload = multer({
    storage: multer.memoryStorage(),
    // Filenames arrive as raw UTF-8 in the part headers (Devanagari, accents).
    defParamCharset: "utf8",
    limits: {
      // multer only takes whole bytes.
      fileSize: Math.floor(options.maxFileMb * 1024 * 1024),
    },
  });

  router.get("/health", (_req: Request, res: Response) => {
    res.json({
      status: "healthy",
      service: "Invoice Extractor",
    });
  });

  // -------------------------------------------------------------------------
  // POST /upload
  //
  // multipart/form-data with a single "file" field (PDF or image).
  //
  // Response (201):
  //   { message: "Success", log_id: number, data: InvoiceData }
  // -------------------------------------------------------------------------
  router.post("/upload", upload.single("file"), async (req: Request, res: Response) => {
    const uploadedFile = req.file;

    if (!uploadedFile) {
      res.status(400).json({
        error: {
          message: 'Missing upload in multipart field "file".',
        },
      });
      return;
    }

    if (!uploadedFile.originalname) {
      res.status(400).json({
        error: {
          message: "No filename provided",
        },
      });
      return;
    }

    try {
      const result = await service.extract({
        filename: uploadedFile.originalname,
        contentType: uploadedFile.mimetype || null,
        fileContent: uploadedFile.buffer,
      });

      res.status(201).json({
        message: "Success",
        log_id: result.logId,
        data: result.data,
      });
    } catch (error) {
      sendError(res, error);
    }
  });

  // -------------------------------------------------------------------------
  // GET /logs?skip=0&limit=10&search=text&type=filename|id
  //
  // Newest first. Each entry carries file_size instead of the bytes.
  // -------------------------------------------------------------------------
  router.get("/logs", async (req: Request, res: Response) => {
    const offset = readNonNegativeInt(req.query.skip, 0);
    const limit = readNonNegativeInt(req.query.limit, defaultListLimit);

    if (offset === null || limit === null) {
      res.status(400).json({
        error: {
          message: "skip and limit must be non-negative integers.",
        },
      });
      return;
    }

    const type = readQueryString(req.query.type) ?? "filename";
    if (type !== "filename" && type !== "id") {
      res.status(400).json({
        error: {
          message: "type must be 'filename' or 'id'.",
        },
      });
      return;
    }
    const searchMode: InvoiceLogSearchMode = type;

    try {
      const logs = await service.list({
        offset,
        limit: Math.min(limit, maxListLimit),
        searchText: readQueryString(req.query.search),
        searchMode,
      });
      res.json(logs);
    } catch (error) {
      sendError(res, error);
    }
  });

  router.get("/logs/:logId", async (req: Request, res: Response) => {
    const logId = parseLogId(req.params.logId);
    if (logId === null) {
      sendInvalidLogId(res);
      return;
    }

    try {
      const record = await service.lookup(logId);
      res.json({
        id: record.id,
        filename: record.filename,
        created_at: record.created_at,
        extracted_schema_content: record.extracted_schema_content,
        file_size: record.file_content.length,
        file_content: record.file_content.toString("base64"),
      });
    } catch (error) {
      sendError(res, error);
    }
  });

  router.get("/logs/:logId/preview", async (req: Request, res: Response) => {
    const logId = parseLogId(req.params.logId);
    if (logId === null) {
      sendInvalidLogId(res);
      return;
    }

    try {
      const jpeg = await service.preview(logId);
      res.setHeader("Content-Type", "image/jpeg");
      res.setHeader("Cache-Control", "private, max-age=3600");
      res.send(jpeg);
    } catch (error) {
      sendError(res, error);
    }
  });

  return router;
}
