import {
  GeneratorTimeoutError,
  GeneratorUnavailableError,
  toErrorMessage,
} from "../errors.js";
import type { ExplanationPrompt } from "../prompts/templates.js";
import { isRateLimitError, resolveRetryAfterMs } from "./rate-limit.js";
import type { ExplanationGenerator } from "./types.js";

export type RetryPolicy = {
  timeoutMs: number;
  maxAttempts: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
};

export type AttemptFailure = {
  attempt: number;
  error: GeneratorTimeoutError | GeneratorUnavailableError;
  delayMs: number;
  rateLimited: boolean;
};

export type RetryHooks = {
  sleep?: (ms: number) => Promise<void>;
  onAttemptFailed?: (failure: AttemptFailure) => void;
};

export type GenerationResult = {
  text: string;
  attempts: number;
};

const defaultSleep = (ms: number) =>
  new Promise<void>((resolve) => {
    setTimeout(resolve, ms);
  });

/**
 * Runs `task` with an AbortSignal that fires after `timeoutMs`. Expiry
 * rejects with GeneratorTimeoutError even if the task ignores the signal.
 */
export function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
): Promise<T> {
  const controller = new AbortController();
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      controller.abort();
      reject(new GeneratorTimeoutError(timeoutMs));
    }, timeoutMs);
    task(controller.signal)
      .then((value) => {
        clearTimeout(timer);
        resolve(value);
      })
      .catch((error: unknown) => {
        clearTimeout(timer);
        reject(error);
      });
  });
}

function normalizeFailure(error: unknown): GeneratorTimeoutError | GeneratorUnavailableError {
  if (error instanceof GeneratorTimeoutError || error instanceof GeneratorUnavailableError) {
    return error;
  }
  return new GeneratorUnavailableError(toErrorMessage(error), error);
}

export function backoffDelayMs(attempt: number, policy: RetryPolicy, cause?: unknown): number {
  if (cause !== undefined && isRateLimitError(cause)) {
    const hinted = resolveRetryAfterMs(cause);
    if (hinted != null) return Math.max(0, Math.min(hinted, policy.backoffMaxMs));
  }
  const exponential = policy.backoffBaseMs * 2 ** Math.max(0, attempt - 1);
  return Math.min(exponential, policy.backoffMaxMs);
}

export async function generateWithRetry(
  generator: ExplanationGenerator,
  prompt: ExplanationPrompt,
  policy: RetryPolicy,
  hooks: RetryHooks = {},
): Promise<GenerationResult> {
  const sleep = hooks.sleep ?? defaultSleep;
  const maxAttempts = Math.max(1, Math.floor(policy.maxAttempts));
  let lastFailure: GeneratorTimeoutError | GeneratorUnavailableError | null = null;

  for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
    try {
      const text = await withTimeout(
        (signal) => generator.generate(prompt, { signal }),
        policy.timeoutMs,
      );
      return { text, attempts: attempt };
    } catch (error) {
      lastFailure = normalizeFailure(error);
      if (attempt === maxAttempts) break;

      const cause = lastFailure instanceof GeneratorUnavailableError ? lastFailure.cause : error;
      const delayMs = backoffDelayMs(attempt, policy, cause);
      hooks.onAttemptFailed?.({
        attempt,
        error: lastFailure,
        delayMs,
        rateLimited: isRateLimitError(cause),
      });
      await sleep(delayMs);
    }
  }

  throw lastFailure ?? new GeneratorUnavailableError("no attempts were made");
}
