import { describe, it } from "node:test";
import assert from "node:assert";
import { UnknownAlleleError, UnknownGeneError } from "../errors.js";
import { testReferenceData } from "../testing/fakes.js";
import { DiplotypeResolver, reachablePhenotypes } from "./resolver.js";

const { catalog } = testReferenceData();
const resolver = new DiplotypeResolver(catalog);

describe("DiplotypeResolver", () => {
  it("resolves every allele pair of every gene identically in both orders", () => {
    for (const definition of catalog.definitionsList()) {
      const labels = [...definition.alleles.values()].map((allele) => allele.label);
      for (const first of labels) {
        for (const second of labels) {
          const forward = resolver.resolve(definition.gene, first, second);
          const reverse = resolver.resolve(definition.gene, second, first);
          assert.deepStrictEqual(forward, reverse, `${definition.gene} ${first}/${second}`);
        }
      }
    }
  });

  it("treats two normal CYP2D6 alleles as ultra-rapid", () => {
    const resolved = resolver.resolve("CYP2D6", "*1", "*1");
    assert.strictEqual(resolved.phenotype.code, "ultra_rapid_metabolizer");
    assert.strictEqual(resolved.phenotype.label, "Ultra-Rapid Metabolizer");
    assert.strictEqual(resolved.activityScore, 2);
    assert.strictEqual(resolved.zygosity, "homozygous");
  });

  it("resolves CYP2C9 *1/*2 to an intermediate metabolizer", () => {
    const resolved = resolver.resolve("cyp2c9", "*2", "*1");
    assert.strictEqual(resolved.gene, "CYP2C9");
    assert.strictEqual(resolved.diplotype, "*1/*2");
    assert.strictEqual(resolved.zygosity, "heterozygous");
    assert.strictEqual(resolved.activityScore, 1.5);
    assert.strictEqual(resolved.phenotype.code, "intermediate_metabolizer");
  });

  it("sorts star alleles numerically in the diplotype", () => {
    assert.strictEqual(resolver.resolve("CYP2D6", "*10", "*4").diplotype, "*4/*10");
  });

  it("maps two non-functional alleles to a poor metabolizer", () => {
    const resolved = resolver.resolve("CYP2D6", "*4", "*5");
    assert.strictEqual(resolved.phenotype.code, "poor_metabolizer");
    assert.strictEqual(resolved.activityScore, 0);
  });

  it("maps one normal and one non-functional allele to intermediate", () => {
    assert.strictEqual(
      resolver.resolve("CYP2C19", "*1", "*2").phenotype.code,
      "intermediate_metabolizer",
    );
  });

  it("uses the pair override table before activity tiers", () => {
    const resolved = resolver.resolve("CYP2C19", "*17", "*9");
    assert.strictEqual(resolved.activityScore, 2);
    assert.strictEqual(resolved.phenotype.code, "intermediate_metabolizer");
  });

  it("maps an increased-function allele with a normal one to rapid", () => {
    assert.strictEqual(resolver.resolve("CYP2C19", "*1", "*17").phenotype.code, "rapid_metabolizer");
  });

  it("returns indeterminate with no activity score for uncharacterized alleles", () => {
    const resolved = resolver.resolve("CYP2D6", "*1", "*22");
    assert.strictEqual(resolved.phenotype.code, "indeterminate");
    assert.strictEqual(resolved.activityScore, null);
  });

  it("uses the transporter tier model and gene aliases", () => {
    const resolved = resolver.resolve("SLC01B1", "*1A", "*5");
    assert.strictEqual(resolved.gene, "SLCO1B1");
    assert.strictEqual(resolved.phenotype.code, "decreased_function");
  });

  it("rejects alleles missing from the catalog", () => {
    assert.throws(
      () => resolver.resolve("CYP2D6", "*1", "*99"),
      (error: unknown) =>
        error instanceof UnknownAlleleError &&
        error.code === "UnknownAllele" &&
        error.details.allele === "*99" &&
        error.details.gene === "CYP2D6",
    );
  });

  it("rejects genes missing from the catalog", () => {
    assert.throws(() => resolver.resolve("NUDT15", "*1", "*1"), UnknownGeneError);
  });
});

describe("reachablePhenotypes", () => {
  it("enumerates the phenotypes each gene can produce", () => {
    assert.deepStrictEqual(
      [...reachablePhenotypes(catalog.gene("CYP2D6"))].sort(),
      [
        "indeterminate",
        "intermediate_metabolizer",
        "normal_metabolizer",
        "poor_metabolizer",
        "rapid_metabolizer",
        "ultra_rapid_metabolizer",
      ],
    );
    assert.deepStrictEqual(
      [...reachablePhenotypes(catalog.gene("TPMT"))].sort(),
      ["intermediate_metabolizer", "normal_metabolizer", "poor_metabolizer"],
    );
    assert.deepStrictEqual(
      [...reachablePhenotypes(catalog.gene("SLCO1B1"))].sort(),
      ["decreased_function", "normal_function", "poor_function"],
    );
  });
});
