type HeaderBag = Record<string, unknown> | { get: (key: string) => unknown };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null;
}

function parseRetryAfterValue(value: unknown, assumeSeconds = false): number | null {
  if (value == null) return null;
  if (typeof value === "number" && Number.isFinite(value)) {
    return assumeSeconds ? value * 1000 : value;
  }

  if (typeof value === "string") {
    const trimmed = value.trim();
    if (!trimmed) return null;
    const numeric = Number(trimmed);
    if (!Number.isNaN(numeric)) {
      return assumeSeconds ? numeric * 1000 : numeric;
    }

    const parsed = Date.parse(trimmed);
    if (!Number.isNaN(parsed)) {
      const delta = parsed - Date.now();
      return delta > 0 ? delta : null;
    }
  }

  return null;
}

function isHeaderGetter(headers: HeaderBag): headers is { get: (key: string) => unknown } {
  return "get" in headers && typeof headers.get === "function";
}

function readHeaderValue(headers: HeaderBag, key: string): unknown {
  if (isHeaderGetter(headers)) return headers.get(key);
  return headers[key];
}

const headerCandidates: Array<{ key: string; assumeSeconds: boolean }> = [
  { key: "retry-after-ms", assumeSeconds: false },
  { key: "retry-after", assumeSeconds: true },
  { key: "Retry-After", assumeSeconds: true },
  { key: "x-retry-after", assumeSeconds: true },
];

/** Server-provided retry delay in milliseconds, if the error carries one. */
export function resolveRetryAfterMs(error: unknown): number | null {
  if (!isRecord(error)) return null;
  const response = isRecord(error.response) ? error.response : undefined;
  const sources = [error.headers, response?.headers, response];

  for (const source of sources) {
    if (!isRecord(source)) continue;
    for (const candidate of headerCandidates) {
      const value = readHeaderValue(source, candidate.key);
      if (value != null) {
        const parsed = parseRetryAfterValue(value, candidate.assumeSeconds);
        if (parsed != null) return parsed;
      }
    }
  }

  const fallback = error.retryAfterMs ?? error.retry_after_ms;
  return fallback != null ? parseRetryAfterValue(fallback, false) : null;
}

function normalizeMessage(error: unknown): string {
  if (error instanceof Error) return error.message.toLowerCase();
  if (typeof error === "string") return error.toLowerCase();
  if (isRecord(error) && typeof error.message === "string") return error.message.toLowerCase();
  return "";
}

export function isRateLimitError(error: unknown): boolean {
  if (!error) return false;
  if (isRecord(error)) {
    const response = isRecord(error.response) ? error.response : undefined;
    const status = error.status ?? response?.status;
    if (status === 429) return true;
    const code = error.code ?? response?.code;
    if (code === 429 || String(code) === "429" || code === "rate_limit_exceeded") return true;
  }
  return /\b429\b|rate limit|too many requests/i.test(normalizeMessage(error));
}
