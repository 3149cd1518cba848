import { z } from "zod";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const trimmedString = (fallback: string) =>
  z
    .string()
    .trim()
    .optional()
    .transform((value) => (value && value.length > 0 ? value : fallback));

export const serverEnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8501),
  DATABASE_PATH: trimmedString("invoice-logs.db"),

  // OpenAI-compatible chat-completion endpoint (vLLM, OpenAI, ...)
  EXTRACTION_API_URL: trimmedString("http://localhost:8000/v1").pipe(z.url()),
  EXTRACTION_API_KEY: trimmedString("EMPTY"),
  EXTRACTION_MODEL: trimmedString("Qwen/Qwen3-VL-4B-Instruct"),
  EXTRACTION_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),
  EXTRACTION_MAX_TOKENS: z.coerce.number().int().positive().default(2048),
  EXTRACTION_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.1),

  JPEG_QUALITY: z.coerce.number().int().min(1).max(100).default(90),
  PDF_RENDER_SCALE: z.coerce.number().positive().max(8).default(2),
  MAX_FILE_MB: z.coerce.number().positive().default(15),
});

export type ServerEnv = z.infer<typeof serverEnvSchema>;

export type ExtractionConfig = {
  apiUrl: string;
  apiKey: string;
  model: string;
  timeoutMs: number;
  maxTokens: number;
  temperature: number;
};

export type RasterConfig = {
  jpegQuality: number;
  pdfRenderScale: number;
};

export type AppConfig = {
  port: number;
  databasePath: string;
  maxFileMb: number;
  extraction: ExtractionConfig;
  raster: RasterConfig;
};

export const defaultRasterConfig: RasterConfig = {
  jpegQuality: 90,
  pdfRenderScale: 2,
};

/**
 * Validate the environment once and turn it into the explicit config value the
 * server hands to each component. Nothing below the server reads process.env.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  const parsed = serverEnvSchema.safeParse(env);
  if (!parsed.success) {
    const fields = [
      ...new Set(parsed.error.issues.map((issue) => issue.path.join("."))),
    ].join(", ");
    throw new ConfigError(`Invalid server env variables: ${fields}`);
  }

  const values = parsed.data;
  return {
    port: values.PORT,
    databasePath: values.DATABASE_PATH,
    maxFileMb: values.MAX_FILE_MB,
    extraction: {
      apiUrl: values.EXTRACTION_API_URL,
      apiKey: values.EXTRACTION_API_KEY,
      model: values.EXTRACTION_MODEL,
      timeoutMs: values.EXTRACTION_TIMEOUT_MS,
      maxTokens: values.EXTRACTION_MAX_TOKENS,
      temperature: values.EXTRACTION_TEMPERATURE,
    },
    raster: {
      jpegQuality: values.JPEG_QUALITY,
      pdfRenderScale: values.PDF_RENDER_SCALE,
    },
  };
}
