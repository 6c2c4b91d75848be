import { reachablePhenotypes } from "../engine/resolver.js";
import { CatalogDefectError } from "../errors.js";
import type { DrugRule, PhenotypeCode } from "../types.js";
import type { AlleleCatalog } from "./allele-catalog.js";

export type DrugSummary = {
  drug: string;
  genes: string[];
  evidenceLevels: string[];
};

export function ruleKey(gene: string, drug: string, phenotype: PhenotypeCode): string {
  return `${gene.trim().toUpperCase()}|${drug.trim().toLowerCase()}|${phenotype}`;
}

/**
 * Frozen (gene, drug, phenotype) → rule lookup. Built only through
 * `RuleTable.build`, which refuses tables that leave a reachable phenotype
 * without a rule.
 */
export class RuleTable {
  private readonly rules: ReadonlyMap<string, DrugRule>;
  private readonly drugGenes: ReadonlyMap<string, readonly string[]>;
  private readonly canonicalNames: ReadonlyMap<string, string>;

  private constructor(
    rules: Map<string, DrugRule>,
    drugGenes: Map<string, readonly string[]>,
    canonicalNames: Map<string, string>,
  ) {
    this.rules = rules;
    this.drugGenes = drugGenes;
    this.canonicalNames = canonicalNames;
  }

  static build(rules: readonly DrugRule[], catalog: AlleleCatalog): RuleTable {
    const problems: string[] = [];
    const byKey = new Map<string, DrugRule>();
    const drugGenes = new Map<string, string[]>();
    const canonicalNames = new Map<string, string>();
    const covered = new Map<string, Set<PhenotypeCode>>();

    for (const raw of rules) {
      const gene = catalog.canonicalGene(raw.gene);
      if (!gene) {
        problems.push(`rule ${raw.drug}/${raw.phenotype} names unknown gene ${raw.gene}`);
        continue;
      }
      const drugKey = raw.drug.trim().toLowerCase();
      const drug = canonicalNames.get(drugKey) ?? raw.drug.trim();
      canonicalNames.set(drugKey, drug);

      const key = ruleKey(gene, drug, raw.phenotype);
      if (byKey.has(key)) {
        problems.push(`duplicate rule ${key}`);
        continue;
      }
      byKey.set(key, Object.freeze({ ...raw, gene, drug }));

      const genes = drugGenes.get(drugKey) ?? [];
      if (!genes.includes(gene)) genes.push(gene);
      drugGenes.set(drugKey, genes);

      const pairKey = `${gene}|${drugKey}`;
      const phenotypes = covered.get(pairKey) ?? new Set<PhenotypeCode>();
      phenotypes.add(raw.phenotype);
      covered.set(pairKey, phenotypes);
    }

    for (const [drugKey, genes] of drugGenes) {
      for (const gene of genes) {
        const phenotypes = covered.get(`${gene}|${drugKey}`) ?? new Set<PhenotypeCode>();
        for (const phenotype of reachablePhenotypes(catalog.gene(gene))) {
          if (!phenotypes.has(phenotype)) {
            problems.push(
              `no rule for ${canonicalNames.get(drugKey) ?? drugKey} with ${gene} ${phenotype}`,
            );
          }
        }
      }
    }

    if (problems.length > 0) {
      throw new CatalogDefectError("drug rule table", problems);
    }

    const frozenGenes = new Map<string, readonly string[]>();
    for (const [drugKey, genes] of drugGenes) frozenGenes.set(drugKey, Object.freeze([...genes]));
    return new RuleTable(byKey, frozenGenes, canonicalNames);
  }

  lookup(gene: string, drug: string, phenotype: PhenotypeCode): DrugRule | undefined {
    return this.rules.get(ruleKey(gene, drug, phenotype));
  }

  canonicalDrug(drug: string): string | null {
    return this.canonicalNames.get(drug.trim().toLowerCase()) ?? null;
  }

  genesForDrug(drug: string): readonly string[] {
    return this.drugGenes.get(drug.trim().toLowerCase()) ?? [];
  }

  get size(): number {
    return this.rules.size;
  }

  drugs(): DrugSummary[] {
    const summaries: DrugSummary[] = [];
    for (const [drugKey, genes] of this.drugGenes) {
      const levels = new Set<string>();
      for (const rule of this.rules.values()) {
        if (rule.drug.toLowerCase() === drugKey && rule.phenotype !== "indeterminate") {
          levels.add(rule.evidenceLevel);
        }
      }
      summaries.push({
        drug: this.canonicalNames.get(drugKey) ?? drugKey,
        genes: [...genes],
        evidenceLevels: [...levels].sort(),
      });
    }
    return summaries;
  }
}
