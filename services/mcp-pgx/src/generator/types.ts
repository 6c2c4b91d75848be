import type { ExplanationPrompt } from "../prompts/templates.js";
import type { GeneratorIdentity } from "../types.js";

export type GenerateOptions = {
  signal: AbortSignal;
};

/**
 * Opaque text-generation capability. Implementations may be slow and may
 * fail transiently; retries and deadlines are applied by the caller.
 */
export interface ExplanationGenerator {
  readonly identity: GeneratorIdentity;
  generate(prompt: ExplanationPrompt, options: GenerateOptions): Promise<string>;
}

export function versionTag(identity: GeneratorIdentity): string {
  return `${identity.provider}:${identity.model}:${identity.version}`;
}
