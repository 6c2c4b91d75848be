import { createHash } from "node:crypto";
import type { RiskAssessment } from "../types.js";

export const CACHE_KEY_PREFIX = "expl:v1:";

export type ExplanationKeyInput = {
  gene: string;
  diplotype: string | null;
  phenotype: string;
  activityScore: number | null;
  drug: string;
  verdict: {
    riskLabel: string;
    severity: string;
    category: string;
    dosing: string;
    monitoring: string;
    evidenceLevel: string;
    strength: string;
    citation: string;
  };
  templateId: string;
  generatorTag: string;
};

function canonicalize(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(canonicalize);
  if (value && typeof value === "object") {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      sorted[key] = canonicalize(Reflect.get(value, key));
    }
    return sorted;
  }
  return value;
}

/** JSON with object keys sorted at every depth. */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(canonicalize(value));
}

function normalizeDiplotype(diplotype: string | null): string {
  if (!diplotype) return "";
  return diplotype
    .split(/[/|]/)
    .map((part) => part.trim())
    .sort((left, right) => left.localeCompare(right, "en", { numeric: true }))
    .join("/");
}

/**
 * Content address of an explanation: identical explanation-relevant inputs
 * always produce the same key.
 */
export function explanationCacheKey(input: ExplanationKeyInput): string {
  const material = canonicalJson({
    gene: input.gene.trim().toUpperCase(),
    diplotype: normalizeDiplotype(input.diplotype),
    phenotype: input.phenotype,
    activityScore: input.activityScore,
    drug: input.drug.trim().toLowerCase(),
    verdict: input.verdict,
    templateId: input.templateId,
    generator: input.generatorTag,
  });
  return `${CACHE_KEY_PREFIX}${createHash("sha256").update(material).digest("hex")}`;
}

export function keyInputFor(
  assessment: RiskAssessment,
  templateId: string,
  generatorTag: string,
): ExplanationKeyInput {
  const { rule } = assessment;
  return {
    gene: assessment.gene,
    diplotype: assessment.diplotype,
    phenotype: assessment.phenotype.code,
    activityScore: assessment.activityScore,
    drug: assessment.drug,
    verdict: {
      riskLabel: rule.riskLabel,
      severity: rule.severity,
      category: rule.category,
      dosing: rule.dosing,
      monitoring: rule.monitoring,
      evidenceLevel: rule.evidenceLevel,
      strength: rule.strength,
      citation: rule.citation,
    },
    templateId,
    generatorTag,
  };
}
