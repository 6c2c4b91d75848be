type LogLevel = "info" | "warn" | "error";

export type JobLogContext = {
  jobId: string;
  patientId: string;
  startedAt: number;
};

export type LogSink = (line: string) => void;

// stdout carries the MCP stdio protocol, so every level goes to stderr.
let sink: LogSink = (line) => {
  process.stderr.write(`${line}\n`);
};

export function setLogSink(next: LogSink): LogSink {
  const previous = sink;
  sink = next;
  return previous;
}

function nowIso() {
  return new Date().toISOString();
}

export function compactString(value: string, max = 240): string {
  const normalized = value.replace(/\s+/g, " ").trim();
  if (normalized.length <= max) return normalized;
  return `${normalized.slice(0, max - 1)}…`;
}

function toLogMessage(error: unknown): string {
  if (error instanceof Error) return compactString(error.message);
  if (typeof error === "string") return compactString(error);
  return "unknown error";
}

export function logEvent(level: LogLevel, event: string, fields: Record<string, unknown> = {}) {
  const payload = {
    ts: nowIso(),
    level,
    event,
    ...fields,
  };
  sink(JSON.stringify(payload));
}

export function logError(event: string, error: unknown, fields: Record<string, unknown> = {}) {
  logEvent("error", event, { ...fields, message: toLogMessage(error) });
}

export function startJobLog(
  jobId: string,
  patientId: string,
  fields: Record<string, unknown> = {},
): JobLogContext {
  const context: JobLogContext = {
    jobId,
    patientId,
    startedAt: Date.now(),
  };

  logEvent("info", "job.start", {
    jobId,
    patientId,
    ...fields,
  });
  return context;
}

export function stepJobLog(
  context: JobLogContext,
  event: string,
  fields: Record<string, unknown> = {},
) {
  logEvent("info", event, {
    jobId: context.jobId,
    elapsedMs: Date.now() - context.startedAt,
    ...fields,
  });
}

export function warnJobLog(
  context: JobLogContext,
  event: string,
  fields: Record<string, unknown> = {},
) {
  logEvent("warn", event, {
    jobId: context.jobId,
    elapsedMs: Date.now() - context.startedAt,
    ...fields,
  });
}

export function errorJobLog(
  context: JobLogContext,
  event: string,
  error: unknown,
  fields: Record<string, unknown> = {},
) {
  logEvent("error", event, {
    jobId: context.jobId,
    elapsedMs: Date.now() - context.startedAt,
    message: toLogMessage(error),
    ...fields,
  });
}

export function endJobLog(context: JobLogContext, fields: Record<string, unknown> = {}) {
  logEvent("info", "job.end", {
    jobId: context.jobId,
    patientId: context.patientId,
    elapsedMs: Date.now() - context.startedAt,
    ...fields,
  });
}
