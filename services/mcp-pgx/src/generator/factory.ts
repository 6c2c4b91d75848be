import type { AppConfig } from "../config.js";
import { OpenAiExplanationGenerator } from "./openai.js";
import { TemplateExplanationGenerator } from "./template.js";
import type { ExplanationGenerator } from "./types.js";

/** Picks the generator implementation once, from configuration. */
export function createExplanationGenerator(config: AppConfig): ExplanationGenerator {
  const { explanation } = config;
  if (explanation.provider === "groq" && config.groq.apiKey) {
    return new OpenAiExplanationGenerator({
      provider: "groq",
      apiKey: config.groq.apiKey,
      model: config.groq.model,
      baseUrl: config.groq.baseUrl,
      temperature: explanation.temperature,
      maxTokens: explanation.maxTokens,
    });
  }
  if (explanation.provider === "openai" && config.openai.apiKey) {
    return new OpenAiExplanationGenerator({
      provider: "openai",
      apiKey: config.openai.apiKey,
      model: config.openai.model,
      baseUrl: config.openai.baseUrl,
      temperature: explanation.temperature,
      maxTokens: explanation.maxTokens,
    });
  }
  return new TemplateExplanationGenerator();
}
