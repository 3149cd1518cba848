import "dotenv/config";

import { promises as fs } from "fs";
import path from "path";
import { pathToFileURL } from "url";

import { loadConfig } from "../config/env";
import { createDatabase } from "../db";
import { DrizzleInvoiceLogStore } from "../services/drizzleInvoiceLogStore";
import type { InvoiceLogStore } from "../services/invoiceLogStore";

const defaultOutputDir = "extracted_files";

export type ExportedFile = {
  logId: number;
  filename: string;
  filePath: string;
  createdAt: string;
};

export function parseLogIdArgument(value: string | undefined): number | null {
  if (!value || !/^\d+$/.test(value.trim())) {
    return null;
  }
  return Number(value.trim());
}

/**
 * Write one stored upload back to disk as `<id>_<filename>`. The id prefix keeps
 * uploads that share a filename apart. Returns null for an unknown id.
 */
export async function exportStoredFile(
  store: InvoiceLogStore,
  logId: number,
  outputDir: string,
): Promise<ExportedFile | null> {
  const record = await store.findById(logId);
  if (!record) {
    return null;
  }

  await fs.mkdir(outputDir, { recursive: true });
  const filePath = path.join(outputDir, `${record.id}_${path.basename(record.filename)}`);
  await fs.writeFile(filePath, record.file_content);

  return {
    logId: record.id,
    filename: record.filename,
    filePath,
    createdAt: record.created_at,
  };
}

async function main(args: string[]): Promise<number> {
  const logId = parseLogIdArgument(args[0]);
  if (logId === null) {
    console.error(
      JSON.stringify({
        event: "export_failed",
        error: "Usage: exportStoredFile <logId> [outputDir] (logId must be numeric)",
      }),
    );
    return 1;
  }

  const config = loadConfig();
  const { db, close } = createDatabase(config.databasePath);

  try {
    const exported = await exportStoredFile(
      new DrizzleInvoiceLogStore(db),
      logId,
      args[1] || defaultOutputDir,
    );

    if (!exported) {
      console.error(
        JSON.stringify({ event: "export_failed", log_id: logId, error: "Invoice log not found" }),
      );
      return 1;
    }

    console.log(
      JSON.stringify({
        event: "export_complete",
        log_id: exported.logId,
        filename: exported.filename,
        file_path: exported.filePath,
        created_at: exported.createdAt,
      }),
    );
    return 0;
  } finally {
    close();
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error(
        JSON.stringify({
          event: "export_failed",
          error: error instanceof Error ? error.message : "Unknown error",
        }),
      );
      process.exitCode = 1;
    });
}
