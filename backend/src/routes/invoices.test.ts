import request from "supertest";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { createApp } from "../app";
import { loadConfig } from "../config/env";
import type { DrizzleInvoiceLogStore } from "../services/drizzleInvoiceLogStore";
import {
  InvoiceExtractionService,
  type InvoiceCompletionClient,
} from "../services/invoiceExtraction";
import {
  buildInvoiceData,
  buildPngBytes,
  createInMemoryStore,
} from "../test-utils/invoiceFixtures";

// ---------------------------------------------------------------------------
// The model is replaced by a stub whose reply each test sets.
// ---------------------------------------------------------------------------
const completionClient = {
  model: "stub-model",
  complete: vi.fn<InvoiceCompletionClient["complete"]>(),
} satisfies InvoiceCompletionClient;

const png = buildPngBytes({ width: 4, height: 4, color: "#ff8800" });

describe("invoices routes", () => {
  let store: DrizzleInvoiceLogStore;
  let close: () => void;
  let app: ReturnType<typeof createApp>;

  beforeEach(() => {
    ({ store, close } = createInMemoryStore());
    app = createApp(
      new InvoiceExtractionService({ store, client: completionClient }),
      { maxFileMb: 0.05 },
    );
    completionClient.complete.mockReset();
    completionClient.complete.mockResolvedValue(JSON.stringify(buildInvoiceData()));
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    close();
    vi.restoreAllMocks();
  });

  function upload(filename: string, bytes: Buffer, contentType: string) {
    return request(app)
      .post("/api/upload")
      .attach("file", bytes, { filename, contentType });
  }

  it("reports health", async () => {
    const res = await request(app).get("/api/health");

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ status: "healthy", service: "Invoice Extractor" });
  });

  // -------------------------------------------------------------------------
  // POST /api/upload
  // -------------------------------------------------------------------------

  it("extracts and stores an uploaded image", async () => {
    const res = await upload("receipt.png", png, "image/png");

    expect(res.status).toBe(201);
    expect(res.body.message).toBe("Success");
    expect(res.body.data).toEqual(buildInvoiceData());
    expect(typeof res.body.log_id).toBe("number");
    expect(completionClient.complete).toHaveBeenCalledTimes(1);

    const stored = await store.findById(res.body.log_id);
    expect(stored?.file_content.equals(png)).toBe(true);
  });

  it("rejects unsupported content types", async () => {
    const res = await upload("notes.txt", Buffer.from("hello"), "text/plain");

    expect(res.status).toBe(400);
    expect(res.body.error).toMatchObject({
      kind: "UnsupportedFormat",
      message: "Unsupported file type. Use PDF or Image.",
    });
    expect(completionClient.complete).not.toHaveBeenCalled();
  });

  it("rejects a request without a file", async () => {
    const res = await request(app).post("/api/upload").field("note", "no file here");

    expect(res.status).toBe(400);
    expect(res.body.error.message).toBe('Missing upload in multipart field "file".');
  });

  it("rejects files over the configured size", async () => {
    const res = await upload("huge.png", Buffer.alloc(60 * 1024), "image/png");

    expect(res.status).toBe(400);
    expect(res.body.error.message).toBe("File exceeds the configured max size.");
  });

  it("enforces a fractional MB limit from the environment", async () => {
    const { maxFileMb } = loadConfig({ MAX_FILE_MB: "0.3" });
    const limitedApp = createApp(
      new InvoiceExtractionService({ store, client: completionClient }),
      { maxFileMb },
    );
    const limitBytes = Math.floor(0.3 * 1024 * 1024);

    const accepted = await request(limitedApp)
      .post("/api/upload")
      .attach("file", png, { filename: "small.png", contentType: "image/png" });
    const rejected = await request(limitedApp)
      .post("/api/upload")
      .attach("file", Buffer.alloc(limitBytes + 1), {
        filename: "large.png",
        contentType: "image/png",
      });

    expect(accepted.status).toBe(201);
    expect(rejected.status).toBe(400);
    expect(rejected.body.error.message).toBe("File exceeds the configured max size.");
  });

  it("keeps non-ASCII filenames as uploaded", async () => {
    const res = await upload("बिल-१.png", png, "image/png");

    expect(res.status).toBe(201);
    const stored = await store.findById(res.body.log_id);
    expect(stored?.filename).toBe("बिल-१.png");

    const search = await request(app).get("/api/logs").query({ search: "बिल" });
    expect(search.body.map((log: { filename: string }) => log.filename)).toEqual([
      "बिल-१.png",
    ]);
  });

  it("returns 502 with the raw text when the model reply is not JSON", async () => {
    completionClient.complete.mockResolvedValue("No invoice detected.");

    const res = await upload("receipt.png", png, "image/png");

    expect(res.status).toBe(502);
    expect(res.body.error).toMatchObject({
      kind: "MalformedResponse",
      raw_text: "No invoice detected.",
    });
    await expect(store.list({ offset: 0, limit: 10 })).resolves.toEqual([]);
  });

  it("returns 502 with the failing field on a schema violation", async () => {
    completionClient.complete.mockResolvedValue(
      JSON.stringify({ ...buildInvoiceData(), line_items: "none" }),
    );

    const res = await upload("receipt.png", png, "image/png");

    expect(res.status).toBe(502);
    expect(res.body.error).toMatchObject({ kind: "SchemaViolation", field: "line_items" });
  });

  // -------------------------------------------------------------------------
  // GET /api/logs
  // -------------------------------------------------------------------------

  it("lists stored logs newest first without file bytes", async () => {
    await upload("first.png", png, "image/png");
    await upload("second.png", png, "image/png");

    const res = await request(app).get("/api/logs");

    expect(res.status).toBe(200);
    expect(res.body.map((log: { filename: string }) => log.filename)).toEqual([
      "second.png",
      "first.png",
    ]);
    expect(res.body[0].file_size).toBe(png.length);
    expect(res.body[0]).not.toHaveProperty("file_content");
  });

  it("supports search, pagination and id lookups", async () => {
    const first = await upload("March.png", png, "image/png");
    await upload("april.png", png, "image/png");

    const byName = await request(app).get("/api/logs").query({ search: "march" });
    const byId = await request(app)
      .get("/api/logs")
      .query({ search: String(first.body.log_id), type: "id" });
    const badId = await request(app).get("/api/logs").query({ search: "abc", type: "id" });
    const paged = await request(app).get("/api/logs").query({ skip: 1, limit: 1 });

    expect(byName.body.map((log: { filename: string }) => log.filename)).toEqual(["March.png"]);
    expect(byId.body.map((log: { id: number }) => log.id)).toEqual([first.body.log_id]);
    expect(badId.status).toBe(200);
    expect(badId.body).toEqual([]);
    expect(paged.body.map((log: { filename: string }) => log.filename)).toEqual(["March.png"]);
  });

  it("rejects invalid list parameters", async () => {
    const badType = await request(app).get("/api/logs").query({ type: "vendor" });
    const badSkip = await request(app).get("/api/logs").query({ skip: "-1" });

    expect(badType.status).toBe(400);
    expect(badSkip.status).toBe(400);
  });

  // -------------------------------------------------------------------------
  // GET /api/logs/:logId and /preview
  // -------------------------------------------------------------------------

  it("returns one log with its bytes base64-encoded", async () => {
    const uploaded = await upload("receipt.png", png, "image/png");

    const res = await request(app).get(`/api/logs/${uploaded.body.log_id}`);

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({
      id: uploaded.body.log_id,
      filename: "receipt.png",
      file_size: png.length,
      file_content: png.toString("base64"),
      extracted_schema_content: buildInvoiceData(),
    });
  });

  it("returns 404 for unknown logs", async () => {
    const res = await request(app).get("/api/logs/9999");

    expect(res.status).toBe(404);
    expect(res.body.error).toEqual({ kind: "NotFound", message: "Invoice log 9999 not found." });
  });

  it("rejects non-numeric log ids", async () => {
    const res = await request(app).get("/api/logs/abc");

    expect(res.status).toBe(400);
    expect(res.body.error.message).toBe("Log id must be a positive integer.");
  });

  it("serves a JPEG preview of a stored upload", async () => {
    const uploaded = await upload("receipt.png", png, "image/png");

    const res = await request(app).get(`/api/logs/${uploaded.body.log_id}/preview`);

    expect(res.status).toBe(200);
    expect(res.headers["content-type"]).toBe("image/jpeg");
    expect(Buffer.isBuffer(res.body)).toBe(true);
    expect([...res.body.subarray(0, 3)]).toEqual([0xff, 0xd8, 0xff]);
  });

  it("returns 422 when a stored file cannot be previewed", async () => {
    const stored = await store.store({
      filename: "mystery.bin",
      fileContent: Buffer.from("not an image"),
      data: buildInvoiceData(),
    });

    const res = await request(app).get(`/api/logs/${stored.id}/preview`);

    expect(res.status).toBe(422);
    expect(res.body.error.kind).toBe("PreviewUnavailable");
  });
});
