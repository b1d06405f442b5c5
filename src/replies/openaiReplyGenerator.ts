import { AppConfig } from "../config";
import { ConfigurationError, GenerationFailedError, errorMessage } from "../errors";
import { ReplyGenerator, ReplyRequest } from "../types";
import { buildSystemPrompt, buildUserPrompt, PromptBrand } from "./promptBuilder";

export interface OpenAIReplyGeneratorOptions {
  apiKey: string;
  baseUrl: string;
  model: string;
  brand: PromptBrand;
  temperature?: number;
  maxTokens?: number;
  fetchImpl?: typeof fetch;
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function extractCompletionText(payload: unknown): string | null {
  if (!isRecord(payload) || !Array.isArray(payload.choices)) return null;
  const first: unknown = payload.choices[0];
  if (!isRecord(first) || !isRecord(first.message)) return null;
  const content = first.message.content;
  return typeof content === "string" && content.trim() ? content.trim() : null;
}

/** Drafts borrower replies through the OpenAI chat completions endpoint. */
export class OpenAIReplyGenerator implements ReplyGenerator {
  readonly model: string;
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly brand: PromptBrand;
  private readonly temperature: number;
  private readonly maxTokens: number;
  private readonly fetchImpl: typeof fetch;

  constructor(opts: OpenAIReplyGeneratorOptions) {
    this.apiKey = opts.apiKey;
    this.baseUrl = opts.baseUrl.replace(/\/+$/, "");
    this.model = opts.model;
    this.brand = opts.brand;
    this.temperature = opts.temperature ?? 0.7;
    this.maxTokens = opts.maxTokens ?? 500;
    this.fetchImpl = opts.fetchImpl ?? fetch;
  }

  async generate(request: ReplyRequest): Promise<string> {
    try {
      return await this.complete(request);
    } catch (err) {
      if (err instanceof GenerationFailedError) throw err;
      throw new GenerationFailedError(`Failed to generate AI reply: ${errorMessage(err)}`, { cause: err });
    }
  }

  private async complete(request: ReplyRequest): Promise<string> {
    const res = await this.fetchImpl(`${this.baseUrl}/chat/completions`, {
      method: "POST",
      headers: {
        Authorization: `Bearer ${this.apiKey}`,
        "Content-Type": "application/json; charset=utf-8",
      },
      body: JSON.stringify({
        model: this.model,
        messages: [
          { role: "system", content: buildSystemPrompt(this.brand) },
          { role: "user", content: buildUserPrompt(request, this.brand) },
        ],
        temperature: this.temperature,
        max_tokens: this.maxTokens,
      }),
    });

    const text = await res.text();
    if (!res.ok) {
      throw new GenerationFailedError(`Failed to generate AI reply: OpenAI error (${res.status}): ${text.slice(0, 500)}`);
    }

    const payload: unknown = text.trim() ? JSON.parse(text) : undefined;
    const reply = extractCompletionText(payload);
    if (!reply) throw new GenerationFailedError("Failed to generate AI reply: empty completion");
    return reply;
  }
}

export function createReplyGenerator(config: AppConfig, fetchImpl?: typeof fetch): OpenAIReplyGenerator {
  const { apiKey, baseUrl, model } = config.openai;
  if (!apiKey) throw new ConfigurationError("Missing OPENAI_API_KEY env var");
  const whatsappNumber = config.brand.whatsappNumber;
  if (!whatsappNumber) throw new ConfigurationError("Missing SUPPORT_WHATSAPP env var");

  return new OpenAIReplyGenerator({
    apiKey,
    baseUrl,
    model,
    brand: { companyName: config.brand.companyName, whatsappNumber },
    fetchImpl,
  });
}
