import type { GeneRecord } from "../contracts.js";
import { CatalogDefectError, UnknownAlleleError, UnknownGeneError } from "../errors.js";
import type { Allele, GeneDefinition, WeightedStatus } from "../types.js";

const weightedStatuses: readonly WeightedStatus[] = [
  "increased",
  "non-functional",
  "normal",
  "reduced",
];

export function normalizeGeneSymbol(symbol: string): string {
  return symbol.trim().toUpperCase();
}

export function normalizeAlleleLabel(label: string): string {
  return label.trim().toUpperCase();
}

function isWeightedStatus(value: string): value is WeightedStatus {
  return weightedStatuses.some((status) => status === value);
}

function validPairKey(key: string): boolean {
  const parts = key.split("+");
  if (parts.length !== 2) return false;
  const [first, second] = parts;
  if (!first || !second || !isWeightedStatus(first) || !isWeightedStatus(second)) return false;
  return first <= second;
}

function collectGeneProblems(record: GeneRecord): string[] {
  const problems: string[] = [];
  const gene = normalizeGeneSymbol(record.gene);

  const seen = new Set<string>();
  for (const allele of record.alleles) {
    const label = normalizeAlleleLabel(allele.label);
    if (seen.has(label)) problems.push(`${gene}: duplicate allele ${allele.label}`);
    seen.add(label);
    if (allele.status !== "unknown" && record.statusWeights[allele.status] === undefined) {
      problems.push(`${gene}: allele ${allele.label} has status ${allele.status} with no weight`);
    }
  }

  record.tiers.forEach((tier, index) => {
    const previous = record.tiers[index - 1];
    if (previous && previous.minScore <= tier.minScore) {
      problems.push(`${gene}: tiers must be strictly descending at ${tier.phenotype}`);
    }
  });
  const last = record.tiers[record.tiers.length - 1];
  if (last && last.minScore !== 0) {
    problems.push(`${gene}: last tier must start at 0`);
  }

  for (const key of Object.keys(record.pairOverrides)) {
    if (!validPairKey(key)) {
      problems.push(`${gene}: pair override ${key} is not a sorted status pair`);
    }
  }
  return problems;
}

/**
 * Immutable lookup over recognized alleles per gene. Symbols and labels are
 * matched case-insensitively; gene aliases resolve to their canonical symbol.
 */
export class AlleleCatalog {
  private readonly definitions: ReadonlyMap<string, GeneDefinition>;
  private readonly aliases: ReadonlyMap<string, string>;

  private constructor(
    definitions: Map<string, GeneDefinition>,
    aliases: Map<string, string>,
  ) {
    this.definitions = definitions;
    this.aliases = aliases;
  }

  static fromRecords(records: readonly GeneRecord[]): AlleleCatalog {
    const problems: string[] = [];
    const definitions = new Map<string, GeneDefinition>();
    const aliases = new Map<string, string>();

    for (const record of records) {
      const gene = normalizeGeneSymbol(record.gene);
      if (definitions.has(gene) || aliases.has(gene)) {
        problems.push(`${gene}: declared more than once`);
        continue;
      }
      problems.push(...collectGeneProblems(record));

      const alleles = new Map<string, Allele>();
      for (const allele of record.alleles) {
        alleles.set(
          normalizeAlleleLabel(allele.label),
          Object.freeze({ gene, label: allele.label.trim(), status: allele.status }),
        );
      }

      for (const alias of record.aliases) {
        const normalized = normalizeGeneSymbol(alias);
        if (definitions.has(normalized) || aliases.has(normalized)) {
          problems.push(`${gene}: alias ${alias} collides with another gene`);
          continue;
        }
        aliases.set(normalized, gene);
      }

      definitions.set(
        gene,
        Object.freeze({
          gene,
          aliases: Object.freeze(record.aliases.map(normalizeGeneSymbol)),
          geneClass: record.geneClass,
          statusWeights: Object.freeze({ ...record.statusWeights }),
          tiers: Object.freeze(record.tiers.map((tier) => Object.freeze({ ...tier }))),
          pairOverrides: Object.freeze({ ...record.pairOverrides }),
          alleles,
        }),
      );
    }

    if (problems.length > 0) {
      throw new CatalogDefectError("allele catalog", problems);
    }
    return new AlleleCatalog(definitions, aliases);
  }

  canonicalGene(symbol: string): string | null {
    const normalized = normalizeGeneSymbol(symbol);
    if (this.definitions.has(normalized)) return normalized;
    return this.aliases.get(normalized) ?? null;
  }

  hasGene(symbol: string): boolean {
    return this.canonicalGene(symbol) !== null;
  }

  gene(symbol: string): GeneDefinition {
    const canonical = this.canonicalGene(symbol);
    const definition = canonical ? this.definitions.get(canonical) : undefined;
    if (!definition) throw new UnknownGeneError(symbol.trim());
    return definition;
  }

  allele(geneSymbol: string, label: string): Allele {
    const definition = this.gene(geneSymbol);
    const allele = definition.alleles.get(normalizeAlleleLabel(label));
    if (!allele) throw new UnknownAlleleError(definition.gene, label.trim());
    return allele;
  }

  genes(): string[] {
    return [...this.definitions.keys()];
  }

  definitionsList(): GeneDefinition[] {
    return [...this.definitions.values()];
  }
}
