import { describe, it } from "node:test";
import assert from "node:assert";
import { RiskClassifier } from "../engine/classifier.js";
import { DiplotypeResolver } from "../engine/resolver.js";
import { EXPLANATION_TEMPLATE } from "../prompts/templates.js";
import { fixedClock, testReferenceData } from "../testing/fakes.js";
import type { RiskAssessment } from "../types.js";
import {
  CACHE_KEY_PREFIX,
  canonicalJson,
  explanationCacheKey,
  keyInputFor,
  type ExplanationKeyInput,
} from "./digest.js";

const base: ExplanationKeyInput = {
  gene: "CYP2D6",
  diplotype: "*1/*4",
  phenotype: "intermediate_metabolizer",
  activityScore: 1,
  drug: "Codeine",
  verdict: {
    riskLabel: "Moderate",
    severity: "moderate",
    category: "adjust_dosage",
    dosing: "Use label-recommended dosing and watch response.",
    monitoring: "Monitor for reduced analgesia.",
    evidenceLevel: "1A",
    strength: "moderate",
    citation: "Test guideline 2024",
  },
  templateId: "drug-risk-explanation@v1",
  generatorTag: "scripted:test-model:1",
};

describe("explanationCacheKey", () => {
  it("produces a prefixed sha256 address", () => {
    const key = explanationCacheKey(base);
    assert.match(key, /^expl:v1:[0-9a-f]{64}$/);
    assert.ok(key.startsWith(CACHE_KEY_PREFIX));
  });

  it("ignores allele order, case and surrounding whitespace", () => {
    assert.strictEqual(
      explanationCacheKey(base),
      explanationCacheKey({ ...base, gene: " cyp2d6", diplotype: "*4|*1", drug: "CODEINE " }),
    );
  });

  it("changes when any explanation-relevant input changes", () => {
    const key = explanationCacheKey(base);
    const variants: ExplanationKeyInput[] = [
      { ...base, diplotype: "*1/*5" },
      { ...base, phenotype: "poor_metabolizer" },
      { ...base, activityScore: 1.25 },
      { ...base, activityScore: null },
      { ...base, drug: "Tramadol" },
      { ...base, verdict: { ...base.verdict, riskLabel: "High" } },
      { ...base, verdict: { ...base.verdict, severity: "high" } },
      { ...base, verdict: { ...base.verdict, category: "toxic" } },
      { ...base, verdict: { ...base.verdict, dosing: "Reduce the starting dose by 20-25%." } },
      { ...base, verdict: { ...base.verdict, monitoring: "Monitor for sedation." } },
      { ...base, verdict: { ...base.verdict, evidenceLevel: "2A" } },
      { ...base, verdict: { ...base.verdict, strength: "strong" } },
      { ...base, verdict: { ...base.verdict, citation: "Test guideline 2025" } },
      { ...base, templateId: "drug-risk-explanation@v2" },
      { ...base, generatorTag: "scripted:test-model:2" },
    ];
    const keys = new Set(variants.map(explanationCacheKey));
    assert.strictEqual(keys.size, variants.length);
    assert.ok(!keys.has(key));
  });
});

describe("keyInputFor", () => {
  const { catalog, rules } = testReferenceData();
  const classifier = new RiskClassifier(rules, new DiplotypeResolver(catalog), fixedClock());
  const warfarin = classifier.classify("CYP2C9", "intermediate_metabolizer", "Warfarin");
  const keyOf = (assessment: RiskAssessment) =>
    explanationCacheKey(keyInputFor(assessment, EXPLANATION_TEMPLATE.id, "template:rule-text:1"));

  it("carries the rule guidance the prompt is built from", () => {
    const input = keyInputFor(warfarin, EXPLANATION_TEMPLATE.id, "template:rule-text:1");
    assert.strictEqual(input.verdict.dosing, warfarin.rule.dosing);
    assert.strictEqual(input.verdict.monitoring, warfarin.rule.monitoring);
    assert.strictEqual(input.verdict.strength, warfarin.rule.strength);
    assert.strictEqual(input.verdict.citation, warfarin.rule.citation);
    assert.strictEqual(input.activityScore, null);
  });

  it("moves to a new key when the dosing guidance is edited", () => {
    const edited: RiskAssessment = {
      ...warfarin,
      rule: { ...warfarin.rule, dosing: "Reduce the starting dose by 20-25%." },
    };
    assert.notStrictEqual(keyOf(edited), keyOf(warfarin));
  });

  it("moves to a new key when the activity score differs", () => {
    assert.notStrictEqual(keyOf({ ...warfarin, activityScore: 1.5 }), keyOf(warfarin));
  });
});

describe("canonicalJson", () => {
  it("sorts object keys at every depth", () => {
    assert.strictEqual(
      canonicalJson({ b: 1, a: { d: [{ z: 1, y: 2 }], c: null } }),
      '{"a":{"c":null,"d":[{"y":2,"z":1}]},"b":1}',
    );
  });
});
