import { z } from "zod";
import {
  functionalStatuses,
  phenotypeCodes,
  recommendationStrengths,
  riskCategories,
  riskLabels,
  severityTiers,
} from "./types.js";

const weightedStatusSchema = z.enum(["normal", "reduced", "non-functional", "increased"]);

export const alleleRecordSchema = z.object({
  label: z.string().min(1),
  status: z.enum(functionalStatuses),
});

export const geneRecordSchema = z.object({
  gene: z.string().min(1),
  aliases: z.array(z.string().min(1)).default([]),
  geneClass: z.enum(["metabolizer", "transporter"]),
  statusWeights: z.record(weightedStatusSchema, z.number().nonnegative()),
  tiers: z
    .array(
      z.object({
        minScore: z.number().nonnegative(),
        phenotype: z.enum(phenotypeCodes),
      }),
    )
    .min(1),
  pairOverrides: z.record(z.string(), z.enum(phenotypeCodes)).default({}),
  alleles: z.array(alleleRecordSchema).min(1),
});

export const alleleCatalogFileSchema = z.object({
  version: z.string(),
  genes: z.array(geneRecordSchema).min(1),
});

export type GeneRecord = z.infer<typeof geneRecordSchema>;
export type AlleleCatalogFile = z.infer<typeof alleleCatalogFileSchema>;

export const drugRuleSchema = z.object({
  gene: z.string().min(1),
  drug: z.string().min(1),
  phenotype: z.enum(phenotypeCodes),
  riskLabel: z.enum(riskLabels),
  severity: z.enum(severityTiers),
  category: z.enum(riskCategories),
  dosing: z.string().min(1),
  monitoring: z.string().min(1),
  evidenceLevel: z.string().min(1),
  strength: z.enum(recommendationStrengths),
  citation: z.string().min(1),
});

export const drugRuleFileSchema = z.object({
  version: z.string(),
  rules: z.array(drugRuleSchema).min(1),
});

export type DrugRuleFile = z.infer<typeof drugRuleFileSchema>;

// Accepts "*1/*2", "*1|*2" (phased) or ["*1", "*2"].
export const diplotypeInputSchema = z.union([
  z.string().min(1),
  z.tuple([z.string().min(1), z.string().min(1)]),
]);

export type DiplotypeInput = z.infer<typeof diplotypeInputSchema>;

export function splitDiplotype(input: DiplotypeInput): [string, string] | null {
  if (typeof input !== "string") return [input[0].trim(), input[1].trim()];
  const parts = input.split(/[/|]/).map((part) => part.trim());
  if (parts.length !== 2) return null;
  const [first, second] = parts;
  if (!first || !second) return null;
  return [first, second];
}

export const analysisRequestSchema = z.object({
  patientId: z.string().trim().min(1),
  genotypes: z
    .record(z.string().min(1), diplotypeInputSchema)
    .refine((value) => Object.keys(value).length > 0, {
      message: "at least one genotyped gene is required",
    }),
  drugs: z.array(z.string().trim().min(1)).min(1),
});

export type AnalysisRequest = z.infer<typeof analysisRequestSchema>;

export const jobIdShape = {
  jobId: z.string().min(1).describe("Job identifier returned by submit-analysis"),
};

export const resolveDiplotypeShape = {
  gene: z.string().min(1).describe("Gene symbol, e.g. CYP2D6"),
  allele1: z.string().min(1).describe("First allele label, e.g. *1"),
  allele2: z.string().min(1).describe("Second allele label, e.g. *4"),
};

export const submitAnalysisShape = {
  patientId: z.string().min(1).describe("Patient profile identifier"),
  genotypes: z
    .record(z.string(), diplotypeInputSchema)
    .describe('Gene to diplotype, e.g. { "CYP2D6": "*1/*4" }'),
  drugs: z.array(z.string()).min(1).describe("Drug names in the order results should be listed"),
};

export const generatorIdentitySchema = z.object({
  provider: z.string().min(1),
  model: z.string().min(1),
  version: z.string().min(1),
});

export const cacheEntrySchema = z.object({
  key: z.string().min(1),
  text: z.string(),
  generator: generatorIdentitySchema,
  templateId: z.string().min(1),
  createdAt: z.string().min(1),
});

const explanationRecordSchema = z.object({
  interpretation: z.string(),
  riskRationale: z.string(),
  dosingRationale: z.string(),
  monitoringRationale: z.string(),
});

const riskAssessmentSchema = z.object({
  gene: z.string(),
  drug: z.string(),
  diplotype: z.string().nullable(),
  activityScore: z.number().nullable(),
  phenotype: z.object({ code: z.enum(phenotypeCodes), label: z.string() }),
  rule: drugRuleSchema,
  confidence: z.number(),
  assessedAt: z.string(),
});

const drugFailureSchema = z.object({
  stage: z.enum(["classification", "explanation", "cancelled", "orchestration"]),
  code: z.string(),
  reason: z.string(),
});

const drugTaskSchema = z.object({
  drug: z.string(),
  state: z.enum(["pending", "resolving", "explaining", "done", "failed"]),
  assessment: riskAssessmentSchema.optional(),
  cacheKey: z.string().optional(),
  explanation: explanationRecordSchema.optional(),
  cacheHit: z.boolean(),
  generator: generatorIdentitySchema.optional(),
  failure: drugFailureSchema.optional(),
  updatedAt: z.string(),
});

/** Persisted job file. Results are derived again on load, so they are not read back. */
export const storedJobSchema = z.object({
  id: z.string().min(1),
  profile: z.object({
    patientId: z.string(),
    genotypes: z.record(z.string(), z.tuple([z.string(), z.string()])),
  }),
  drugs: z.array(drugTaskSchema),
  state: z.enum(["queued", "running", "completed", "failed"]),
  createdAt: z.string(),
  startedAt: z.string().optional(),
  completedAt: z.string().optional(),
  cancelledAt: z.string().optional(),
  genesAnalyzed: z.number().int().nonnegative().optional(),
  error: z.string().optional(),
});
