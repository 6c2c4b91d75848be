export type PgxErrorCode =
  | "UnknownAllele"
  | "UnknownGene"
  | "MissingGenotype"
  | "RuleNotFound"
  | "CacheKeyConflict"
  | "GeneratorTimeout"
  | "GeneratorUnavailable"
  | "JobNotFound"
  | "JobNotPurgeable"
  | "InvalidGenotype"
  | "InvalidRequest"
  | "CatalogDefect";

export class PgxError extends Error {
  readonly code: PgxErrorCode;
  readonly details: Record<string, unknown>;

  constructor(
    code: PgxErrorCode,
    message: string,
    details: Record<string, unknown> = {},
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = `${code}Error`;
    this.code = code;
    this.details = details;
  }
}

export class UnknownAlleleError extends PgxError {
  constructor(gene: string, allele: string) {
    super("UnknownAllele", `Allele ${allele} is not in the catalog for ${gene}`, {
      gene,
      allele,
    });
  }
}

export class UnknownGeneError extends PgxError {
  constructor(gene: string) {
    super("UnknownGene", `Gene ${gene} is not in the allele catalog`, { gene });
  }
}

export class MissingGenotypeError extends PgxError {
  constructor(drug: string, genes: readonly string[]) {
    super(
      "MissingGenotype",
      `No genotype supplied for ${drug}; expected one of ${genes.join(", ")}`,
      { drug, genes: [...genes] },
    );
  }
}

export class RuleNotFoundError extends PgxError {
  constructor(drug: string, gene?: string, phenotype?: string) {
    super(
      "RuleNotFound",
      gene
        ? `No guideline rule for ${drug} with ${gene} ${phenotype ?? ""}`.trimEnd()
        : `No guideline rules cover ${drug}`,
      { drug, gene, phenotype },
    );
  }
}

export class CacheKeyConflictError extends PgxError {
  constructor(key: string) {
    super("CacheKeyConflict", `Cache key ${key} already holds different content`, { key });
  }
}

export class GeneratorTimeoutError extends PgxError {
  constructor(timeoutMs: number) {
    super("GeneratorTimeout", `Explanation generator timed out after ${timeoutMs}ms`, {
      timeoutMs,
    });
  }
}

export class GeneratorUnavailableError extends PgxError {
  constructor(message: string, cause?: unknown) {
    super("GeneratorUnavailable", `Explanation generator unavailable: ${message}`, {}, { cause });
  }
}

export class JobNotFoundError extends PgxError {
  constructor(jobId: string) {
    super("JobNotFound", `Job ${jobId} not found`, { jobId });
  }
}

export class JobNotPurgeableError extends PgxError {
  constructor(jobId: string, state: string) {
    super("JobNotPurgeable", `Job ${jobId} is ${state}; only finished jobs can be purged`, {
      jobId,
      state,
    });
  }
}

export class InvalidGenotypeError extends PgxError {
  readonly violations: readonly PgxError[];

  constructor(violations: readonly PgxError[]) {
    super(
      "InvalidGenotype",
      `Genotype rejected: ${violations.map((violation) => violation.message).join("; ")}`,
      { violations: violations.map((violation) => violation.code) },
    );
    this.violations = violations;
  }
}

export class InvalidRequestError extends PgxError {
  constructor(message: string, details: Record<string, unknown> = {}) {
    super("InvalidRequest", message, details);
  }
}

export class CatalogDefectError extends PgxError {
  readonly problems: readonly string[];

  constructor(source: string, problems: readonly string[]) {
    super("CatalogDefect", `${source} failed validation: ${problems.join("; ")}`, {
      source,
    });
    this.problems = problems;
  }
}

export function isPgxError(error: unknown): error is PgxError {
  return error instanceof PgxError;
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === "string") return error;
  return "unknown error";
}

export function toFailure(error: unknown): { code: string; reason: string } {
  if (isPgxError(error)) {
    return { code: error.code, reason: error.message };
  }
  return { code: "InternalError", reason: toErrorMessage(error) };
}
