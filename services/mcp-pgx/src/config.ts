import fs from "node:fs";
import path from "node:path";
import { config as loadDotenv } from "dotenv";
import { logEvent } from "./telemetry.js";

const envCandidates = [
  path.resolve(process.cwd(), ".env.local"),
  path.resolve(process.cwd(), ".env"),
  path.resolve(process.cwd(), "..", "..", ".env"),
];

for (const envPath of envCandidates) {
  if (fs.existsSync(envPath)) {
    loadDotenv({ path: envPath, override: false, quiet: true });
  }
}

export type ExplanationProvider = "openai" | "groq" | "template";

export type EnvSource = Record<string, string | undefined>;

export const parseNumber = (value: string | undefined, fallback: number): number => {
  if (!value) return fallback;
  const parsed = Number(value);
  if (Number.isNaN(parsed)) return fallback;
  return parsed;
};

export const parseBoolean = (value: string | undefined, fallback: boolean): boolean => {
  if (!value) return fallback;
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") return true;
  if (normalized === "0" || normalized === "false" || normalized === "no") return false;
  return fallback;
};

const parseProviderPreference = (
  value: string | undefined,
): ExplanationProvider | "auto" => {
  const normalized = value?.trim().toLowerCase();
  if (normalized === "openai" || normalized === "groq" || normalized === "template") {
    return normalized;
  }
  return "auto";
};

export function selectProvider(env: EnvSource): {
  provider: ExplanationProvider;
  requested: ExplanationProvider | "auto";
  missingKey: boolean;
} {
  const requested = parseProviderPreference(env.EXPLANATION_PROVIDER);
  if (requested === "auto") {
    if (env.GROQ_API_KEY) return { provider: "groq", requested, missingKey: false };
    if (env.OPENAI_API_KEY) return { provider: "openai", requested, missingKey: false };
    return { provider: "template", requested, missingKey: false };
  }
  if (requested === "groq" && !env.GROQ_API_KEY) {
    return { provider: "template", requested, missingKey: true };
  }
  if (requested === "openai" && !env.OPENAI_API_KEY) {
    return { provider: "template", requested, missingKey: true };
  }
  return { provider: requested, requested, missingKey: false };
}

export function buildConfig(env: EnvSource) {
  const selection = selectProvider(env);
  return {
    explanation: {
      provider: selection.provider,
      requestedProvider: selection.requested,
      providerKeyMissing: selection.missingKey,
      temperature: parseNumber(env.EXPLANATION_TEMPERATURE, 0.4),
      maxTokens: Math.max(1, Math.floor(parseNumber(env.EXPLANATION_MAX_TOKENS, 600))),
    },
    openai: {
      apiKey: env.OPENAI_API_KEY,
      model: env.OPENAI_MODEL ?? "gpt-4o-mini",
      baseUrl: env.OPENAI_BASE_URL,
    },
    groq: {
      apiKey: env.GROQ_API_KEY,
      model: env.GROQ_MODEL ?? "llama-3.3-70b-versatile",
      baseUrl: env.GROQ_BASE_URL ?? "https://api.groq.com/openai/v1",
    },
    generator: {
      timeoutMs: parseNumber(env.GENERATOR_TIMEOUT_MS, 30_000),
      maxAttempts: Math.max(1, Math.floor(parseNumber(env.GENERATOR_MAX_ATTEMPTS, 3))),
      backoffBaseMs: parseNumber(env.GENERATOR_BACKOFF_BASE_MS, 500),
      backoffMaxMs: parseNumber(env.GENERATOR_BACKOFF_MAX_MS, 8_000),
    },
    cache: {
      durable: parseBoolean(env.EXPLANATION_CACHE_DURABLE, true),
      path: env.EXPLANATION_CACHE_PATH ?? "./.pgx-data/explanations.ndjson",
      memoryEntries: Math.max(
        1,
        Math.floor(parseNumber(env.EXPLANATION_CACHE_MEMORY_ENTRIES, 2_000)),
      ),
    },
    jobs: {
      storeDir: env.JOB_STORE_DIR ?? "./.pgx-data/jobs",
      workers: Math.max(1, Math.floor(parseNumber(env.JOB_WORKERS, 4))),
    },
    data: {
      dir: env.PGX_DATA_DIR,
    },
    http: {
      host: env.HOST ?? "0.0.0.0",
      port: parseNumber(env.PORT, 3_000),
    },
  };
}

export type AppConfig = ReturnType<typeof buildConfig>;

export const appConfig: AppConfig = buildConfig(process.env);

export function assertRuntimeConfig(config: AppConfig = appConfig): void {
  if (config.explanation.providerKeyMissing) {
    logEvent("warn", "config.provider_key_missing", {
      requested: config.explanation.requestedProvider,
      fallback: config.explanation.provider,
    });
  }
}
