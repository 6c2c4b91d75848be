import type { DrugOutcome, DrugState, DrugTask, Job, JobState } from "../types.js";

const drugTransitions: Readonly<Record<DrugState, readonly DrugState[]>> = {
  pending: ["resolving", "failed"],
  resolving: ["explaining", "done", "failed"],
  explaining: ["done", "failed"],
  done: [],
  failed: [],
};

const jobTransitions: Readonly<Record<JobState, readonly JobState[]>> = {
  queued: ["running", "completed", "failed"],
  running: ["completed", "failed"],
  completed: [],
  failed: [],
};

export type DrugPatch = Partial<
  Pick<DrugTask, "assessment" | "cacheKey" | "explanation" | "cacheHit" | "generator" | "failure">
>;

export function isTerminalDrug(state: DrugState): boolean {
  return state === "done" || state === "failed";
}

export function isTerminalJob(state: JobState): boolean {
  return state === "completed" || state === "failed";
}

export function canAdvanceDrug(from: DrugState, to: DrugState): boolean {
  return drugTransitions[from].includes(to);
}

export function canAdvanceJob(from: JobState, to: JobState): boolean {
  return jobTransitions[from].includes(to);
}

export function createDrugTask(drug: string, now: string): DrugTask {
  return { drug, state: "pending", cacheHit: false, updatedAt: now };
}

/**
 * Moves a drug task forward. Disallowed transitions return the input task
 * untouched with `changed: false`.
 */
export function advanceDrug(
  task: DrugTask,
  to: DrugState,
  now: string,
  patch: DrugPatch = {},
): { task: DrugTask; changed: boolean } {
  if (!canAdvanceDrug(task.state, to)) {
    return { task, changed: false };
  }
  return {
    task: { ...task, ...patch, state: to, updatedAt: now },
    changed: true,
  };
}

export function advanceJob(job: Job, to: JobState, now: string): { job: Job; changed: boolean } {
  if (!canAdvanceJob(job.state, to)) {
    return { job, changed: false };
  }
  const next: Job = { ...job, state: to };
  if (to === "running") next.startedAt = now;
  if (isTerminalJob(to)) next.completedAt = now;
  return { job: next, changed: true };
}

/**
 * Puts work that was in flight when the process stopped back to pending.
 * Finished drugs keep their results.
 */
export function resetForRecovery(job: Job, now: string): Job {
  return {
    ...job,
    state: "queued",
    startedAt: undefined,
    drugs: job.drugs.map((task) =>
      isTerminalDrug(task.state) ? task : createDrugTask(task.drug, now),
    ),
  };
}

export function drugOutcome(task: DrugTask): DrugOutcome | null {
  if (task.state === "done") return "complete";
  if (task.state !== "failed") return null;
  return task.assessment ? "verdict_only" : "failed";
}
