import type { RuleTable } from "../catalog/rule-table.js";
import { MissingGenotypeError, RuleNotFoundError } from "../errors.js";
import {
  severityTiers,
  type Clock,
  type GenotypeProfile,
  type PhenotypeCode,
  type ResolvedDiplotype,
  type RiskAssessment,
  type SeverityTier,
} from "../types.js";
import { phenotypeOf, type DiplotypeResolver } from "./resolver.js";

const evidenceConfidence: Readonly<Record<string, number>> = {
  "1A": 0.95,
  "1B": 0.9,
  "2A": 0.85,
  "2B": 0.8,
};

export function confidenceFor(evidenceLevel: string, phenotype: PhenotypeCode): number {
  if (phenotype === "indeterminate") return 0.5;
  return evidenceConfidence[evidenceLevel.trim().toUpperCase()] ?? 0.6;
}

export function severityRank(severity: SeverityTier): number {
  return severityTiers.indexOf(severity);
}

export type ObservedDiplotype = Pick<ResolvedDiplotype, "diplotype" | "activityScore">;

export class RiskClassifier {
  constructor(
    private readonly rules: RuleTable,
    private readonly resolver: DiplotypeResolver,
    private readonly clock: Clock = () => new Date(),
  ) {}

  /**
   * Matches one gene's phenotype against the rule table. A missing rule is
   * an error, never a default verdict.
   */
  classify(
    gene: string,
    phenotype: PhenotypeCode,
    drug: string,
    observed?: ObservedDiplotype,
  ): RiskAssessment {
    const symbol = this.resolver.canonicalGene(gene) ?? gene.trim().toUpperCase();
    const rule = this.rules.lookup(symbol, drug, phenotype);
    if (!rule) {
      throw new RuleNotFoundError(drug.trim(), symbol, phenotype);
    }
    const assessment: RiskAssessment = {
      gene: rule.gene,
      drug: rule.drug,
      diplotype: observed?.diplotype ?? null,
      activityScore: observed?.activityScore ?? null,
      phenotype: phenotypeOf(phenotype),
      rule,
      confidence: confidenceFor(rule.evidenceLevel, phenotype),
      assessedAt: this.clock().toISOString(),
    };
    return Object.freeze(assessment);
  }

  /**
   * Assesses a drug against every gene it depends on that the profile
   * genotyped and keeps the most severe verdict. Ties keep the earlier gene.
   */
  assessDrug(profile: GenotypeProfile, drug: string): RiskAssessment {
    const canonical = this.rules.canonicalDrug(drug);
    const genes = this.rules.genesForDrug(drug);
    if (!canonical || genes.length === 0) {
      throw new RuleNotFoundError(drug.trim());
    }

    const genotyped = new Map<string, readonly [string, string]>();
    for (const [symbol, alleles] of Object.entries(profile.genotypes)) {
      genotyped.set(symbol.trim().toUpperCase(), alleles);
    }

    let worst: RiskAssessment | null = null;
    for (const gene of genes) {
      const alleles = genotyped.get(gene) ?? this.aliasLookup(gene, genotyped);
      if (!alleles) continue;
      const resolved = this.resolver.resolve(gene, alleles[0], alleles[1]);
      const assessment = this.classify(resolved.gene, resolved.phenotype.code, canonical, resolved);
      if (!worst || severityRank(assessment.rule.severity) > severityRank(worst.rule.severity)) {
        worst = assessment;
      }
    }

    if (!worst) throw new MissingGenotypeError(canonical, genes);
    return worst;
  }

  private aliasLookup(
    gene: string,
    genotyped: ReadonlyMap<string, readonly [string, string]>,
  ): readonly [string, string] | undefined {
    for (const [symbol, alleles] of genotyped) {
      if (this.resolver.canonicalGene(symbol) === gene) return alleles;
    }
    return undefined;
  }
}
