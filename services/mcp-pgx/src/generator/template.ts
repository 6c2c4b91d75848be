import type { ExplanationPrompt } from "../prompts/templates.js";
import type { GeneratorIdentity, RiskCategory } from "../types.js";
import type { ExplanationGenerator } from "./types.js";

const categoryEffect: Readonly<Record<RiskCategory, string>> = {
  safe: "is expected to respond to standard dosing",
  adjust_dosage: "may need a dose adjustment to reach the intended exposure",
  toxic: "is at increased risk of adverse effects from drug accumulation",
  ineffective: "is at risk of reduced therapeutic benefit",
  indeterminate: "cannot be assigned a confident metabolic classification",
};

/**
 * Offline generator that phrases the rule-table verdict without calling a
 * model. Output is deterministic for a given assessment.
 */
export class TemplateExplanationGenerator implements ExplanationGenerator {
  readonly identity: GeneratorIdentity = {
    provider: "template",
    model: "rule-text",
    version: "1",
  };

  async generate(prompt: ExplanationPrompt): Promise<string> {
    const { assessment } = prompt;
    const { rule } = assessment;
    const diplotype = assessment.diplotype ? ` (${assessment.diplotype})` : "";

    return JSON.stringify({
      interpretation:
        `A ${assessment.phenotype.label.toLowerCase()} genotype for ${assessment.gene}${diplotype} ` +
        `means this patient ${categoryEffect[rule.category]} when taking ${assessment.drug}.`,
      riskRationale:
        `Guideline evidence level ${rule.evidenceLevel} classifies this combination as ` +
        `${rule.riskLabel} risk with ${rule.severity} severity.`,
      dosingRationale: rule.dosing,
      monitoringRationale: rule.monitoring,
    });
  }
}
