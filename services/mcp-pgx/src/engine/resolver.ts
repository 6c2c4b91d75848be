import type { AlleleCatalog } from "../catalog/allele-catalog.js";
import { CatalogDefectError } from "../errors.js";
import {
  PHENOTYPE_LABELS,
  type Allele,
  type FunctionalStatus,
  type GeneDefinition,
  type Phenotype,
  type PhenotypeCode,
  type ResolvedDiplotype,
} from "../types.js";

export type StatusResolution = {
  phenotype: PhenotypeCode;
  activityScore: number | null;
};

export function phenotypeOf(code: PhenotypeCode): Phenotype {
  return { code, label: PHENOTYPE_LABELS[code] };
}

export function compareAlleleLabels(left: string, right: string): number {
  return left.localeCompare(right, "en", { numeric: true, sensitivity: "base" });
}

function weightOf(definition: GeneDefinition, status: FunctionalStatus): number {
  if (status === "unknown") {
    throw new CatalogDefectError("allele catalog", [`${definition.gene}: unknown status has no weight`]);
  }
  const weight = definition.statusWeights[status];
  if (weight === undefined) {
    throw new CatalogDefectError("allele catalog", [
      `${definition.gene}: status ${status} has no weight`,
    ]);
  }
  return weight;
}

/**
 * Maps a pair of functional statuses to a phenotype using only the gene's
 * catalog data. Symmetric in its two status arguments.
 */
export function resolveStatuses(
  definition: GeneDefinition,
  first: FunctionalStatus,
  second: FunctionalStatus,
): StatusResolution {
  if (first === "unknown" || second === "unknown") {
    return { phenotype: "indeterminate", activityScore: null };
  }

  const activityScore = weightOf(definition, first) + weightOf(definition, second);
  const pair = [first, second].sort().join("+");
  const override = definition.pairOverrides[pair];
  if (override) return { phenotype: override, activityScore };

  const tier = definition.tiers.find((candidate) => activityScore >= candidate.minScore);
  if (!tier) {
    throw new CatalogDefectError("allele catalog", [
      `${definition.gene}: no tier covers activity score ${activityScore}`,
    ]);
  }
  return { phenotype: tier.phenotype, activityScore };
}

/** Every phenotype some unordered allele pair of the gene resolves to. */
export function reachablePhenotypes(definition: GeneDefinition): Set<PhenotypeCode> {
  const statuses = [...new Set([...definition.alleles.values()].map((allele) => allele.status))];
  const reachable = new Set<PhenotypeCode>();
  statuses.forEach((first, index) => {
    for (const second of statuses.slice(index)) {
      reachable.add(resolveStatuses(definition, first, second).phenotype);
    }
  });
  return reachable;
}

export class DiplotypeResolver {
  constructor(private readonly catalog: AlleleCatalog) {}

  canonicalGene(symbol: string): string | null {
    return this.catalog.canonicalGene(symbol);
  }

  resolve(gene: string, allele1: string, allele2: string): ResolvedDiplotype {
    const definition = this.catalog.gene(gene);
    const first = this.catalog.allele(definition.gene, allele1);
    const second = this.catalog.allele(definition.gene, allele2);
    const alleles: [Allele, Allele] =
      compareAlleleLabels(first.label, second.label) <= 0 ? [first, second] : [second, first];
    const { phenotype, activityScore } = resolveStatuses(definition, first.status, second.status);

    const resolved: ResolvedDiplotype = {
      gene: definition.gene,
      diplotype: `${alleles[0].label}/${alleles[1].label}`,
      alleles: Object.freeze(alleles),
      zygosity: first.label === second.label ? "homozygous" : "heterozygous",
      activityScore,
      phenotype: phenotypeOf(phenotype),
    };
    return Object.freeze(resolved);
  }
}
