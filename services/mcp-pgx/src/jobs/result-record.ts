import { versionTag } from "../generator/types.js";
import { EMPTY_EXPLANATION } from "../prompts/templates.js";
import type {
  DrugOutcome,
  DrugResult,
  DrugTask,
  Job,
  JobResults,
  ResultRecord,
  RiskAssessment,
} from "../types.js";
import { drugOutcome } from "./state.js";

export function buildResultRecord(
  patientId: string,
  task: DrugTask,
  assessment: RiskAssessment,
  genesAnalyzed: number,
): ResultRecord {
  const { rule } = assessment;
  return {
    patientId,
    drug: assessment.drug,
    timestamp: task.updatedAt,
    riskAssessment: {
      riskLabel: rule.riskLabel,
      severity: rule.severity,
      category: rule.category,
      confidence: assessment.confidence,
      phenotype: assessment.phenotype.code,
      phenotypeLabel: assessment.phenotype.label,
    },
    pharmacogenomicProfile: {
      gene: assessment.gene,
      diplotype: assessment.diplotype,
      activityScore: assessment.activityScore,
    },
    guideline: {
      evidenceLevel: rule.evidenceLevel,
      strength: rule.strength,
      citation: rule.citation,
    },
    clinicalRecommendation: {
      dosing: rule.dosing,
      monitoring: rule.monitoring,
    },
    explanation: { ...(task.explanation ?? EMPTY_EXPLANATION) },
    qualityMetrics: {
      generator: task.generator ? versionTag(task.generator) : null,
      explanationCached: task.cacheHit,
      explanationAvailable: task.explanation !== undefined,
      genesAnalyzed,
    },
  };
}

function toDrugResult(job: Job, task: DrugTask): DrugResult {
  const outcome = drugOutcome(task) ?? "failed";
  const result: DrugResult = { drug: task.drug, state: task.state, outcome };
  if (task.assessment) {
    result.result = buildResultRecord(
      job.profile.patientId,
      task,
      task.assessment,
      job.genesAnalyzed ?? 0,
    );
  }
  if (task.failure) result.failure = { ...task.failure };
  return result;
}

/** Aggregates terminal drug tasks into the job's exported results. */
export function aggregateResults(job: Job): JobResults {
  const summary: Record<DrugOutcome, number> = { complete: 0, verdict_only: 0, failed: 0 };
  const drugs = job.drugs.map((task) => {
    const result = toDrugResult(job, task);
    summary[result.outcome] += 1;
    return result;
  });
  return { drugs, summary };
}
