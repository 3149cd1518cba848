import OpenAI from "openai";
import { z } from "zod";

import type { ExtractionConfig } from "../config/env";
import { buildInvoiceExtractionPrompt } from "../prompts/invoiceExtraction";
import {
  MalformedResponseError,
  TransportError,
  UpstreamError,
} from "./invoiceErrors";
import { encodeJpeg, type CanonicalImage } from "./raster";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type ChatCompletionContentPart =
  | { type: "text"; text: string }
  | { type: "image_url"; image_url: { url: string } };

export type ChatCompletionRequest = {
  model: string;
  messages: Array<{
    role: "user";
    content: ChatCompletionContentPart[];
  }>;
  max_tokens: number;
  temperature: number;
};

// The part of a chat-completion body the client reads.
const chatCompletionResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullish(),
        }),
      }),
    )
    .min(1),
});

type ExtractionClientOptions = ExtractionConfig & {
  jpegQuality: number;
  /** Replaces the global fetch used by the SDK; tests point this at a stub. */
  fetch?: (input: string | URL | Request, init?: RequestInit) => Promise<Response>;
};

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export async function toJpegDataUrl(
  image: CanonicalImage,
  quality: number,
): Promise<string> {
  const jpeg = await encodeJpeg(image, quality);
  return `data:image/jpeg;base64,${jpeg.toString("base64")}`;
}

export function buildChatCompletionRequest(args: {
  model: string;
  prompt: string;
  imageDataUrl: string;
  maxTokens: number;
  temperature: number;
}): ChatCompletionRequest {
  return {
    model: args.model,
    messages: [
      {
        role: "user",
        content: [
          { type: "text", text: args.prompt },
          { type: "image_url", image_url: { url: args.imageDataUrl } },
        ],
      },
    ],
    max_tokens: args.maxTokens,
    temperature: args.temperature,
  };
}

function describeUpstreamBody(error: InstanceType<typeof OpenAI.APIError>): string {
  if (error.error !== undefined && error.error !== null) {
    return typeof error.error === "string" ? error.error : JSON.stringify(error.error);
  }
  return error.message;
}

function describeRawResponse(value: unknown): string {
  if (typeof value === "string") {
    return value;
  }
  return JSON.stringify(value) ?? "";
}

function toClientError(error: unknown): Error {
  // Connection and timeout errors are APIError subclasses without a status.
  if (error instanceof OpenAI.APIConnectionError) {
    return new TransportError(
      `Extraction model request failed: ${error.message}`,
      { cause: error.cause ?? error },
    );
  }

  if (error instanceof OpenAI.APIError) {
    return typeof error.status === "number"
      ? new UpstreamError(error.status, describeUpstreamBody(error))
      : new TransportError(`Extraction model request failed: ${error.message}`, {
          cause: error,
        });
  }

  // The SDK reports every network failure as an APIError; anything else was
  // thrown while reading a response that did arrive.
  return new MalformedResponseError(
    error instanceof Error
      ? `Extraction model response could not be read: ${error.message}`
      : "Extraction model response could not be read.",
    "",
    { cause: error },
  );
}

// ---------------------------------------------------------------------------
// ExtractionClient
// ---------------------------------------------------------------------------

/**
 * Sends one canonical image plus the schema prompt to an OpenAI-compatible
 * chat-completion endpoint and returns the first choice's text. Never retries.
 */
export class ExtractionClient {
  private readonly openai: OpenAI;

  constructor(private readonly options: ExtractionClientOptions) {
    this.openai = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.apiUrl,
      timeout: options.timeoutMs,
      maxRetries: 0,
      fetch: options.fetch,
    });
  }

  get model(): string {
    return this.options.model;
  }

  async buildRequest(image: CanonicalImage): Promise<ChatCompletionRequest> {
    return buildChatCompletionRequest({
      model: this.options.model,
      prompt: buildInvoiceExtractionPrompt(),
      imageDataUrl: await toJpegDataUrl(image, this.options.jpegQuality),
      maxTokens: this.options.maxTokens,
      temperature: this.options.temperature,
    });
  }

  async complete(image: CanonicalImage): Promise<string> {
    const request = await this.buildRequest(image);

    let body: unknown;
    try {
      body = await this.openai.chat.completions.create(request);
    } catch (error) {
      throw toClientError(error);
    }

    const parsed = chatCompletionResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new MalformedResponseError(
        "Extraction model response is not a chat completion.",
        describeRawResponse(body),
      );
    }

    const content = parsed.data.choices[0]?.message.content;
    if (typeof content !== "string" || content.trim().length === 0) {
      throw new MalformedResponseError(
        "Extraction model returned no message content.",
        "",
      );
    }

    return content;
  }
}
