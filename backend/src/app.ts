import cors from "cors";
import express, { NextFunction, Request, Response } from "express";
import multer from "multer";

import { createInvoicesRouter } from "./routes/invoices";
import type { InvoiceExtractionService } from "./services/invoiceExtraction";

export function createApp(
  service: InvoiceExtractionService,
  options: { maxFileMb: number },
) {
  const app = express();

  app.use(cors());
  app.use(express.json());

  app.use("/api", createInvoicesRouter(service, options));

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof multer.MulterError && error.code === "LIMIT_FILE_SIZE") {
      res.status(400).json({
        error: {
          message: "File exceeds the configured max size.",
        },
      });
      return;
    }

    if (error instanceof multer.MulterError) {
      res.status(400).json({
        error: {
          message: error.message,
        },
      });
      return;
    }

    const message =
      error instanceof Error ? error.message : "Internal server error";

    res.status(500).json({
      error: {
        message,
      },
    });
  });

  return app;
}
