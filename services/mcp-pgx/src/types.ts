export const functionalStatuses = [
  "normal",
  "reduced",
  "non-functional",
  "increased",
  "unknown",
] as const;

export type FunctionalStatus = (typeof functionalStatuses)[number];

export type WeightedStatus = Exclude<FunctionalStatus, "unknown">;

export const phenotypeCodes = [
  "ultra_rapid_metabolizer",
  "rapid_metabolizer",
  "normal_metabolizer",
  "intermediate_metabolizer",
  "poor_metabolizer",
  "normal_function",
  "decreased_function",
  "poor_function",
  "indeterminate",
] as const;

export type PhenotypeCode = (typeof phenotypeCodes)[number];

export const PHENOTYPE_LABELS: Readonly<Record<PhenotypeCode, string>> = {
  ultra_rapid_metabolizer: "Ultra-Rapid Metabolizer",
  rapid_metabolizer: "Rapid Metabolizer",
  normal_metabolizer: "Normal Metabolizer",
  intermediate_metabolizer: "Intermediate Metabolizer",
  poor_metabolizer: "Poor Metabolizer",
  normal_function: "Normal Function",
  decreased_function: "Decreased Function",
  poor_function: "Poor Function",
  indeterminate: "Indeterminate",
};

export type GeneClass = "metabolizer" | "transporter";

export type Allele = {
  gene: string;
  label: string;
  status: FunctionalStatus;
};

export type PhenotypeTier = {
  minScore: number;
  phenotype: PhenotypeCode;
};

export type GeneDefinition = {
  gene: string;
  aliases: readonly string[];
  geneClass: GeneClass;
  statusWeights: Readonly<Partial<Record<WeightedStatus, number>>>;
  tiers: readonly PhenotypeTier[];
  pairOverrides: Readonly<Record<string, PhenotypeCode>>;
  alleles: ReadonlyMap<string, Allele>;
};

export type Zygosity = "homozygous" | "heterozygous";

export type Phenotype = {
  code: PhenotypeCode;
  label: string;
};

export type ResolvedDiplotype = {
  gene: string;
  diplotype: string;
  alleles: readonly [Allele, Allele];
  zygosity: Zygosity;
  activityScore: number | null;
  phenotype: Phenotype;
};

export const riskLabels = ["Low", "Moderate", "High"] as const;
export type RiskLabel = (typeof riskLabels)[number];

export const severityTiers = ["none", "low", "moderate", "high", "critical"] as const;
export type SeverityTier = (typeof severityTiers)[number];

export const riskCategories = [
  "safe",
  "adjust_dosage",
  "toxic",
  "ineffective",
  "indeterminate",
] as const;
export type RiskCategory = (typeof riskCategories)[number];

export const recommendationStrengths = ["Strong", "Moderate", "Optional"] as const;
export type RecommendationStrength = (typeof recommendationStrengths)[number];

export type DrugRule = {
  gene: string;
  drug: string;
  phenotype: PhenotypeCode;
  riskLabel: RiskLabel;
  severity: SeverityTier;
  category: RiskCategory;
  dosing: string;
  monitoring: string;
  evidenceLevel: string;
  strength: RecommendationStrength;
  citation: string;
};

export type Clock = () => Date;

export type RiskAssessment = {
  gene: string;
  drug: string;
  diplotype: string | null;
  activityScore: number | null;
  phenotype: Phenotype;
  rule: DrugRule;
  confidence: number;
  assessedAt: string;
};

export type GenotypeProfile = {
  patientId: string;
  genotypes: Readonly<Record<string, readonly [string, string]>>;
};

export type GeneratorIdentity = {
  provider: string;
  model: string;
  version: string;
};

export type CacheEntry = {
  key: string;
  text: string;
  generator: GeneratorIdentity;
  templateId: string;
  createdAt: string;
};

export type Explanation = {
  interpretation: string;
  riskRationale: string;
  dosingRationale: string;
  monitoringRationale: string;
};

export type JobState = "queued" | "running" | "completed" | "failed";

export type DrugState = "pending" | "resolving" | "explaining" | "done" | "failed";

export type FailureStage = "classification" | "explanation" | "cancelled" | "orchestration";

export type DrugFailure = {
  stage: FailureStage;
  code: string;
  reason: string;
};

export type DrugTask = {
  drug: string;
  state: DrugState;
  assessment?: RiskAssessment;
  cacheKey?: string;
  explanation?: Explanation;
  cacheHit: boolean;
  generator?: GeneratorIdentity;
  failure?: DrugFailure;
  updatedAt: string;
};

export type DrugOutcome = "complete" | "verdict_only" | "failed";

export type ResultRecord = {
  patientId: string;
  drug: string;
  timestamp: string;
  riskAssessment: {
    riskLabel: RiskLabel;
    severity: SeverityTier;
    category: RiskCategory;
    confidence: number;
    phenotype: PhenotypeCode;
    phenotypeLabel: string;
  };
  pharmacogenomicProfile: {
    gene: string;
    diplotype: string | null;
    activityScore: number | null;
  };
  guideline: {
    evidenceLevel: string;
    strength: RecommendationStrength;
    citation: string;
  };
  clinicalRecommendation: {
    dosing: string;
    monitoring: string;
  };
  explanation: Explanation;
  qualityMetrics: {
    generator: string | null;
    explanationCached: boolean;
    explanationAvailable: boolean;
    genesAnalyzed: number;
  };
};

export type DrugResult = {
  drug: string;
  state: DrugState;
  outcome: DrugOutcome;
  result?: ResultRecord;
  failure?: DrugFailure;
};

export type JobResults = {
  drugs: DrugResult[];
  summary: Record<DrugOutcome, number>;
};

export type Job = {
  id: string;
  profile: GenotypeProfile;
  drugs: DrugTask[];
  state: JobState;
  createdAt: string;
  startedAt?: string;
  completedAt?: string;
  cancelledAt?: string;
  genesAnalyzed?: number;
  error?: string;
  results?: JobResults;
};
