import "dotenv/config";

import { createApp } from "./app";
import { loadConfig } from "./config/env";
import { createDatabase } from "./db";
import { DrizzleInvoiceLogStore } from "./services/drizzleInvoiceLogStore";
import { ExtractionClient } from "./services/extractionClient";
import { InvoiceExtractionService } from "./services/invoiceExtraction";

const config = loadConfig();
const { db } = createDatabase(config.databasePath);

const service = new InvoiceExtractionService({
  store: new DrizzleInvoiceLogStore(db),
  client: new ExtractionClient({
    ...config.extraction,
    jpegQuality: config.raster.jpegQuality,
  }),
  raster: config.raster,
});

const app = createApp(service, { maxFileMb: config.maxFileMb });

app.listen(config.port, () => {
  console.log(
    JSON.stringify({
      event: "server_started",
      port: config.port,
      database_path: config.databasePath,
      extraction_api_url: config.extraction.apiUrl,
      extraction_model: config.extraction.model,
      health_url: `http://localhost:${config.port}/api/health`,
      upload_url: `http://localhost:${config.port}/api/upload`,
      logs_url: `http://localhost:${config.port}/api/logs`,
      preview_url: `http://localhost:${config.port}/api/logs/:logId/preview`,
    }),
  );
});
