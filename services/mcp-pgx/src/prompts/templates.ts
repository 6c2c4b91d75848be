import { z } from "zod";
import type { Explanation, RiskAssessment } from "../types.js";

export const EXPLANATION_TEMPLATE = {
  name: "drug-risk-explanation",
  version: "v1",
  id: "drug-risk-explanation@v1",
} as const;

export type ExplanationPrompt = {
  templateId: string;
  system: string;
  user: string;
  assessment: RiskAssessment;
};

const SYSTEM_PROMPT = [
  "You are a clinical pharmacogenomics assistant.",
  "You explain guideline-based drug risk verdicts to clinicians in clear, accurate language.",
  "Never change the verdict, the dosing guidance or the monitoring guidance you are given.",
  "Respond with a single JSON object and nothing else.",
].join(" ");

function formatScore(score: number | null): string {
  return score === null ? "not assigned" : score.toFixed(2);
}

export function buildExplanationPrompt(assessment: RiskAssessment): ExplanationPrompt {
  const { rule } = assessment;
  const user = `Explain this pharmacogenomic drug risk assessment.

Drug: ${assessment.drug}
Gene: ${assessment.gene}
Diplotype: ${assessment.diplotype ?? "not reported"}
Phenotype: ${assessment.phenotype.label}
Activity score: ${formatScore(assessment.activityScore)}
Risk label: ${rule.riskLabel}
Severity: ${rule.severity}
Category: ${rule.category}
Dosing guidance: ${rule.dosing}
Monitoring guidance: ${rule.monitoring}
Evidence level: ${rule.evidenceLevel} (${rule.strength})

Return JSON with exactly these string fields:
- "interpretation": what this diplotype and phenotype mean for ${assessment.drug} (2-3 sentences)
- "riskRationale": why the risk is ${rule.riskLabel} (1-2 sentences)
- "dosingRationale": the reasoning behind the dosing guidance (1-2 sentences)
- "monitoringRationale": what to watch for and why (1-2 sentences)`;

  return {
    templateId: EXPLANATION_TEMPLATE.id,
    system: SYSTEM_PROMPT,
    user,
    assessment,
  };
}

const explanationSchema = z.object({
  interpretation: z.string().default(""),
  riskRationale: z.string().default(""),
  dosingRationale: z.string().default(""),
  monitoringRationale: z.string().default(""),
});

export const EMPTY_EXPLANATION: Explanation = Object.freeze({
  interpretation: "",
  riskRationale: "",
  dosingRationale: "",
  monitoringRationale: "",
});

function parseObject(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}

function extractJsonCandidate(text: string): unknown {
  const trimmed = text.trim();
  const direct = parseObject(trimmed);
  if (direct !== undefined) return direct;

  const fenced = trimmed.match(/```(?:json)?\s*([\s\S]*?)```/i);
  if (fenced?.[1]) {
    const inner = parseObject(fenced[1].trim());
    if (inner !== undefined) return inner;
  }

  const objectMatch = trimmed.match(/\{[\s\S]*\}/);
  if (objectMatch) return parseObject(objectMatch[0]);
  return undefined;
}

/**
 * Reads generator output into the four explanation fields. Text that holds
 * no usable JSON object becomes the interpretation.
 */
export function parseExplanation(text: string): Explanation {
  const parsed = explanationSchema.safeParse(extractJsonCandidate(text));
  if (parsed.success) {
    const fields = parsed.data;
    const hasContent = Object.values(fields).some((value) => value.trim().length > 0);
    if (hasContent) {
      return {
        interpretation: fields.interpretation.trim(),
        riskRationale: fields.riskRationale.trim(),
        dosingRationale: fields.dosingRationale.trim(),
        monitoringRationale: fields.monitoringRationale.trim(),
      };
    }
  }
  return { ...EMPTY_EXPLANATION, interpretation: text.trim() };
}
