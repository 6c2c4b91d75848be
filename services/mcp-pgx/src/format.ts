import { InvalidGenotypeError, isPgxError, toErrorMessage } from "./errors.js";

export function createMCPResponse(text: string) {
  return {
    content: [
      {
        type: "text" as const,
        text,
      },
    ],
  };
}

export function createJsonResponse(value: unknown) {
  return createMCPResponse(JSON.stringify(value, null, 2));
}

export function describeError(error: unknown): string {
  if (error instanceof InvalidGenotypeError) {
    const lines = error.violations.map((violation) => `- [${violation.code}] ${violation.message}`);
    return [`[${error.code}] Genotype rejected, no job was created:`, ...lines].join("\n");
  }
  if (isPgxError(error)) return `[${error.code}] ${error.message}`;
  return `[InternalError] ${toErrorMessage(error)}`;
}

export function createErrorResponse(operation: string, error: unknown) {
  return {
    ...createMCPResponse(`Error ${operation}: ${describeError(error)}`),
    isError: true,
  };
}
