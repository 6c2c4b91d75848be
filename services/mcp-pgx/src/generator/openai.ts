import OpenAI from "openai";
import { GeneratorUnavailableError } from "../errors.js";
import type { ExplanationPrompt } from "../prompts/templates.js";
import type { GeneratorIdentity } from "../types.js";
import type { ExplanationGenerator, GenerateOptions } from "./types.js";

export type OpenAiGeneratorOptions = {
  provider: "openai" | "groq";
  apiKey: string;
  model: string;
  baseUrl?: string;
  temperature: number;
  maxTokens: number;
  client?: OpenAI;
};

const clientCache = new Map<string, OpenAI>();

function createClient(apiKey: string, baseUrl: string | undefined): OpenAI {
  const cacheKey = `${baseUrl ?? "default"}::${apiKey}`;
  const cached = clientCache.get(cacheKey);
  if (cached) return cached;
  // Retries are owned by generateWithRetry.
  const client = new OpenAI({ apiKey, baseURL: baseUrl, maxRetries: 0 });
  clientCache.set(cacheKey, client);
  return client;
}

/** Chat-completions adapter; Groq is served through its OpenAI-compatible endpoint. */
export class OpenAiExplanationGenerator implements ExplanationGenerator {
  readonly identity: GeneratorIdentity;
  private readonly client: OpenAI;
  private readonly temperature: number;
  private readonly maxTokens: number;

  constructor(options: OpenAiGeneratorOptions) {
    this.identity = {
      provider: options.provider,
      model: options.model,
      version: "chat-v1",
    };
    this.client = options.client ?? createClient(options.apiKey, options.baseUrl);
    this.temperature = options.temperature;
    this.maxTokens = options.maxTokens;
  }

  async generate(prompt: ExplanationPrompt, options: GenerateOptions): Promise<string> {
    const response = await this.client.chat.completions.create(
      {
        model: this.identity.model,
        messages: [
          { role: "system", content: prompt.system },
          { role: "user", content: prompt.user },
        ],
        temperature: this.temperature,
        max_tokens: this.maxTokens,
        response_format: { type: "json_object" },
      },
      { signal: options.signal },
    );

    const content = response.choices[0]?.message?.content?.trim();
    if (!content) {
      throw new GeneratorUnavailableError(`${this.identity.provider} returned empty content`);
    }
    return content;
  }
}
