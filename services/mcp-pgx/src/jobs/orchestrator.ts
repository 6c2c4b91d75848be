import { randomUUID } from "node:crypto";
import type { AlleleCatalog } from "../catalog/allele-catalog.js";
import type { RuleTable } from "../catalog/rule-table.js";
import { explanationCacheKey, keyInputFor } from "../cache/digest.js";
import type { ExplanationCache, ExplanationCacheStats } from "../cache/explanation-cache.js";
import { SingleFlight } from "../cache/single-flight.js";
import { analysisRequestSchema, splitDiplotype } from "../contracts.js";
import { RiskClassifier } from "../engine/classifier.js";
import { DiplotypeResolver } from "../engine/resolver.js";
import {
  CacheKeyConflictError,
  InvalidGenotypeError,
  InvalidRequestError,
  JobNotFoundError,
  JobNotPurgeableError,
  PgxError,
  toErrorMessage,
  toFailure,
} from "../errors.js";
import { generateWithRetry, type RetryPolicy } from "../generator/retry.js";
import { versionTag, type ExplanationGenerator } from "../generator/types.js";
import { buildExplanationPrompt, EXPLANATION_TEMPLATE, parseExplanation } from "../prompts/templates.js";
import {
  errorJobLog,
  logError,
  startJobLog,
  stepJobLog,
  warnJobLog,
  endJobLog,
  type JobLogContext,
} from "../telemetry.js";
import type {
  CacheEntry,
  Clock,
  DrugFailure,
  DrugOutcome,
  DrugResult,
  DrugState,
  GenotypeProfile,
  Job,
  JobState,
  RiskAssessment,
} from "../types.js";
import type { JobStore } from "./job-store.js";
import { aggregateResults } from "./result-record.js";
import {
  advanceDrug,
  advanceJob,
  createDrugTask,
  isTerminalDrug,
  isTerminalJob,
  resetForRecovery,
  type DrugPatch,
} from "./state.js";

export type OrchestratorDeps = {
  catalog: AlleleCatalog;
  rules: RuleTable;
  cache: ExplanationCache;
  generator: ExplanationGenerator;
  jobStore: JobStore;
  clock?: Clock;
};

export type OrchestratorOptions = {
  workers: number;
  retry: RetryPolicy;
  sleep?: (ms: number) => Promise<void>;
  idFactory?: () => string;
};

export type JobDrugView = {
  drug: string;
  state: DrugState;
  outcome?: DrugOutcome;
  result?: DrugResult["result"];
  failure?: DrugFailure;
};

export type JobView = {
  id: string;
  patientId: string;
  state: JobState;
  createdAt: string;
  startedAt?: string;
  completedAt?: string;
  cancelled: boolean;
  cancelledAt?: string;
  error?: string;
  drugs: JobDrugView[];
  summary?: Record<DrugOutcome, number>;
};

export type OrchestratorStats = {
  jobs: Record<JobState, number>;
  queueDepth: number;
  activeWorkers: number;
  cache: ExplanationCacheStats & { inFlight: number; sharedWaits: number };
  generator: string;
};

type ProducedEntry = {
  entry: CacheEntry;
  fromCache: boolean;
};

const CANCELLED_FAILURE: DrugFailure = {
  stage: "cancelled",
  code: "Cancelled",
  reason: "Job cancelled",
};

/**
 * Owns every job: accepts submissions, runs them on a bounded worker pool,
 * and exposes results only once every drug has reached a terminal state.
 */
export class JobOrchestrator {
  private readonly jobs = new Map<string, Job>();
  private readonly queue: string[] = [];
  private readonly waiters = new Map<string, Array<(view: JobView) => void>>();
  private readonly logs = new Map<string, JobLogContext>();
  private readonly running = new Set<Promise<void>>();
  private readonly flights = new SingleFlight<ProducedEntry>();
  private readonly resolver: DiplotypeResolver;
  private readonly classifier: RiskClassifier;
  private readonly clock: Clock;
  private readonly workers: number;
  private readonly generatorTag: string;
  private active = 0;

  constructor(
    private readonly deps: OrchestratorDeps,
    private readonly options: OrchestratorOptions,
  ) {
    this.clock = deps.clock ?? (() => new Date());
    this.resolver = new DiplotypeResolver(deps.catalog);
    this.classifier = new RiskClassifier(deps.rules, this.resolver, this.clock);
    this.workers = Math.max(1, Math.floor(options.workers));
    this.generatorTag = versionTag(deps.generator.identity);
  }

  private now(): string {
    return this.clock().toISOString();
  }

  private requireJob(jobId: string): Job {
    const job = this.jobs.get(jobId);
    if (!job) throw new JobNotFoundError(jobId);
    return job;
  }

  /** Checks a request against the catalog without creating anything. */
  validate(request: unknown): { profile: GenotypeProfile; drugs: string[] } {
    const parsed = analysisRequestSchema.safeParse(request);
    if (!parsed.success) {
      throw new InvalidRequestError(
        parsed.error.issues
          .map((issue) => `${issue.path.join(".") || "request"}: ${issue.message}`)
          .join("; "),
      );
    }

    const violations: PgxError[] = [];
    const genotypes: Record<string, readonly [string, string]> = {};
    for (const [symbol, input] of Object.entries(parsed.data.genotypes)) {
      const alleles = splitDiplotype(input);
      if (!alleles) {
        violations.push(
          new InvalidRequestError(`Diplotype for ${symbol} must name exactly two alleles`, {
            gene: symbol,
          }),
        );
        continue;
      }
      try {
        const resolved = this.resolver.resolve(symbol, alleles[0], alleles[1]);
        if (genotypes[resolved.gene]) {
          violations.push(
            new InvalidRequestError(`Gene ${resolved.gene} is genotyped more than once`, {
              gene: resolved.gene,
            }),
          );
          continue;
        }
        genotypes[resolved.gene] = [alleles[0], alleles[1]];
      } catch (error) {
        if (!(error instanceof PgxError)) throw error;
        violations.push(error);
      }
    }
    if (violations.length > 0) throw new InvalidGenotypeError(violations);

    const seen = new Set<string>();
    const drugs: string[] = [];
    for (const drug of parsed.data.drugs) {
      const key = drug.toLowerCase();
      if (seen.has(key)) continue;
      seen.add(key);
      drugs.push(this.deps.rules.canonicalDrug(drug) ?? drug);
    }

    return { profile: { patientId: parsed.data.patientId, genotypes }, drugs };
  }

  async submit(request: unknown): Promise<{ jobId: string; state: JobState }> {
    const { profile, drugs } = this.validate(request);
    const now = this.now();
    const job: Job = {
      id: this.options.idFactory?.() ?? randomUUID(),
      profile,
      drugs: drugs.map((drug) => createDrugTask(drug, now)),
      state: "queued",
      createdAt: now,
    };
    this.jobs.set(job.id, job);
    await this.persist(job);

    const log = startJobLog(job.id, profile.patientId, {
      drugs,
      genes: Object.keys(profile.genotypes),
    });
    this.logs.set(job.id, log);
    stepJobLog(log, "job.submitted", { state: "queued" });

    this.enqueue(job.id);
    return { jobId: job.id, state: "queued" };
  }

  poll(jobId: string): JobView {
    return this.view(this.requireJob(jobId));
  }

  waitForJob(jobId: string): Promise<JobView> {
    const job = this.jobs.get(jobId);
    if (!job) return Promise.reject(new JobNotFoundError(jobId));
    if (isTerminalJob(job.state)) return Promise.resolve(this.view(job));
    return new Promise<JobView>((resolve) => {
      const pending = this.waiters.get(jobId) ?? [];
      pending.push(resolve);
      this.waiters.set(jobId, pending);
    });
  }

  async cancel(jobId: string): Promise<JobView> {
    const job = this.requireJob(jobId);
    if (isTerminalJob(job.state)) return this.view(job);

    const now = this.now();
    job.drugs.forEach((task, index) => {
      if (isTerminalDrug(task.state)) return;
      this.advance(job, index, "failed", { failure: { ...CANCELLED_FAILURE } });
    });
    job.cancelledAt = now;
    await this.finish(job, "completed");
    return this.view(job);
  }

  async purge(jobId: string): Promise<void> {
    const job = this.requireJob(jobId);
    if (!isTerminalJob(job.state)) throw new JobNotPurgeableError(jobId, job.state);
    this.jobs.delete(jobId);
    this.logs.delete(jobId);
    await this.deps.jobStore.delete(jobId);
  }

  async purgeCompletedBefore(cutoff: Date): Promise<number> {
    const cutoffMs = cutoff.getTime();
    const expired = [...this.jobs.values()].filter(
      (job) =>
        isTerminalJob(job.state) &&
        job.completedAt !== undefined &&
        Date.parse(job.completedAt) < cutoffMs,
    );
    for (const job of expired) await this.purge(job.id);
    return expired.length;
  }

  /**
   * Loads persisted jobs. Unfinished ones go back to the queue with their
   * in-flight drugs reset to pending.
   */
  async recover(): Promise<{ restored: number; requeued: number }> {
    const stored = await this.deps.jobStore.load();
    let restored = 0;
    let requeued = 0;
    for (const loaded of stored) {
      if (this.jobs.has(loaded.id)) continue;
      restored += 1;
      if (isTerminalJob(loaded.state)) {
        this.jobs.set(loaded.id, loaded);
        continue;
      }
      const job = resetForRecovery(loaded, this.now());
      this.jobs.set(job.id, job);
      await this.persist(job);
      const log = startJobLog(job.id, job.profile.patientId, { recovered: true });
      this.logs.set(job.id, log);
      requeued += 1;
      this.enqueue(job.id);
    }
    return { restored, requeued };
  }

  stats(): OrchestratorStats {
    const jobs: Record<JobState, number> = { queued: 0, running: 0, completed: 0, failed: 0 };
    for (const job of this.jobs.values()) jobs[job.state] += 1;
    return {
      jobs,
      queueDepth: this.queue.length,
      activeWorkers: this.active,
      cache: {
        ...this.deps.cache.stats(),
        inFlight: this.flights.inFlight(),
        sharedWaits: this.flights.joinedCount(),
      },
      generator: this.generatorTag,
    };
  }

  /** Resolves once no job is queued or running in this process. */
  async drain(): Promise<void> {
    while (this.running.size > 0) {
      await Promise.all([...this.running]);
    }
  }

  private enqueue(jobId: string): void {
    this.queue.push(jobId);
    this.pump();
  }

  private pump(): void {
    while (this.active < this.workers && this.queue.length > 0) {
      const jobId = this.queue.shift();
      const job = jobId ? this.jobs.get(jobId) : undefined;
      if (!job || job.state !== "queued") continue;

      const claimed = advanceJob(job, "running", this.now());
      if (!claimed.changed) continue;
      Object.assign(job, claimed.job);

      this.active += 1;
      const run = this.runJob(job).finally(() => {
        this.active -= 1;
        this.running.delete(run);
        this.pump();
      });
      this.running.add(run);
    }
  }

  private logFor(job: Job): JobLogContext {
    const existing = this.logs.get(job.id);
    if (existing) return existing;
    const log = startJobLog(job.id, job.profile.patientId);
    this.logs.set(job.id, log);
    return log;
  }

  private async runJob(job: Job): Promise<void> {
    const log = this.logFor(job);
    try {
      stepJobLog(log, "job.running", { drugs: job.drugs.length });
      await this.persist(job);
      if (isTerminalJob(job.state)) return;

      const genesAnalyzed = this.countResolvableGenes(job.profile, log);
      if (genesAnalyzed === 0) {
        await this.fail(job, "No gene in the patient profile could be resolved");
        return;
      }
      job.genesAnalyzed = genesAnalyzed;

      await Promise.all(job.drugs.map((_task, index) => this.runDrug(job, index, log)));
      if (job.state === "running") await this.finish(job, "completed");
    } catch (error) {
      errorJobLog(log, "job.fault", error);
      await this.fail(job, toErrorMessage(error));
    }
  }

  private countResolvableGenes(profile: GenotypeProfile, log: JobLogContext): number {
    let resolved = 0;
    for (const [gene, alleles] of Object.entries(profile.genotypes)) {
      try {
        this.resolver.resolve(gene, alleles[0], alleles[1]);
        resolved += 1;
      } catch (error) {
        warnJobLog(log, "job.gene_unresolvable", { gene, ...toFailure(error) });
      }
    }
    return resolved;
  }

  private async runDrug(job: Job, index: number, log: JobLogContext): Promise<void> {
    const drug = job.drugs[index]?.drug ?? "";
    if (!this.advance(job, index, "resolving")) return;

    let assessment: RiskAssessment;
    try {
      assessment = this.classifier.assessDrug(job.profile, drug);
    } catch (error) {
      this.advance(job, index, "failed", {
        failure: { stage: "classification", ...toFailure(error) },
      });
      await this.persist(job);
      return;
    }

    const key = explanationCacheKey(
      keyInputFor(assessment, EXPLANATION_TEMPLATE.id, this.generatorTag),
    );

    const cached = await this.readCache(() => this.deps.cache.get(key), log, { drug, key });
    if (cached) {
      stepJobLog(log, "cache.hit", { drug, key });
      this.advance(job, index, "done", {
        assessment,
        cacheKey: key,
        explanation: parseExplanation(cached.text),
        cacheHit: true,
        generator: cached.generator,
      });
      await this.persist(job);
      return;
    }

    stepJobLog(log, "cache.miss", { drug, key });
    if (!this.advance(job, index, "explaining", { assessment, cacheKey: key })) return;

    try {
      const { value, shared } = await this.flights.run(key, () =>
        this.produceEntry(key, assessment, log),
      );
      if (shared) stepJobLog(log, "cache.single_flight_join", { drug, key });
      this.advance(job, index, "done", {
        explanation: parseExplanation(value.entry.text),
        cacheHit: shared || value.fromCache,
        generator: value.entry.generator,
      });
    } catch (error) {
      warnJobLog(log, "explanation.failed", { drug, ...toFailure(error) });
      this.advance(job, index, "failed", {
        cacheHit: false,
        failure: { stage: "explanation", ...toFailure(error) },
      });
    }
    await this.persist(job);
  }

  /** Generates and stores one entry. Runs at most once per key at a time. */
  private async produceEntry(
    key: string,
    assessment: RiskAssessment,
    log: JobLogContext,
  ): Promise<ProducedEntry> {
    const existing = await this.readCache(() => this.deps.cache.peek(key), log, {
      drug: assessment.drug,
      key,
    });
    if (existing) return { entry: existing, fromCache: true };

    const prompt = buildExplanationPrompt(assessment);
    const { text, attempts } = await generateWithRetry(
      this.deps.generator,
      prompt,
      this.options.retry,
      {
        sleep: this.options.sleep,
        onAttemptFailed: (failure) =>
          warnJobLog(log, "generator.attempt_failed", {
            drug: assessment.drug,
            attempt: failure.attempt,
            delayMs: failure.delayMs,
            rateLimited: failure.rateLimited,
            code: failure.error.code,
            reason: failure.error.message,
          }),
      },
    );

    const entry: CacheEntry = {
      key,
      text,
      generator: { ...this.deps.generator.identity },
      templateId: prompt.templateId,
      createdAt: this.now(),
    };

    try {
      const outcome = await this.deps.cache.put(entry);
      stepJobLog(log, "cache.write", { drug: assessment.drug, key, outcome, attempts });
      return { entry, fromCache: false };
    } catch (error) {
      if (!(error instanceof CacheKeyConflictError)) throw error;
      const original = await this.deps.cache.peek(key);
      if (!original) throw error;
      return { entry: original, fromCache: true };
    }
  }

  /** A failed cache read counts as a miss. */
  private async readCache(
    read: () => Promise<CacheEntry | null>,
    log: JobLogContext,
    fields: { drug: string; key: string },
  ): Promise<CacheEntry | null> {
    try {
      return await read();
    } catch (error) {
      warnJobLog(log, "cache.read_failed", { ...fields, ...toFailure(error) });
      return null;
    }
  }

  /** Applies a drug transition unless the job is already terminal. */
  private advance(job: Job, index: number, to: DrugState, patch: DrugPatch = {}): boolean {
    if (isTerminalJob(job.state)) return false;
    const task = job.drugs[index];
    if (!task) return false;
    const next = advanceDrug(task, to, this.now(), patch);
    if (!next.changed) return false;
    job.drugs[index] = next.task;
    stepJobLog(this.logFor(job), "drug.transition", {
      drug: task.drug,
      from: task.state,
      to,
      ...(next.task.failure && to === "failed" ? { code: next.task.failure.code } : {}),
    });
    return true;
  }

  private async fail(job: Job, reason: string): Promise<void> {
    if (isTerminalJob(job.state)) return;
    job.drugs.forEach((task, index) => {
      if (isTerminalDrug(task.state)) return;
      this.advance(job, index, "failed", {
        failure: { stage: "orchestration", code: "OrchestrationFault", reason },
      });
    });
    job.error = reason;
    await this.finish(job, "failed");
  }

  private async finish(job: Job, to: "completed" | "failed"): Promise<void> {
    const next = advanceJob(job, to, this.now());
    if (!next.changed) return;
    Object.assign(job, next.job);
    job.results = aggregateResults(job);
    await this.persist(job);

    const log = this.logFor(job);
    if (to === "failed") {
      warnJobLog(log, "job.failed", { error: job.error });
    } else {
      stepJobLog(log, job.cancelledAt ? "job.cancelled" : "job.completed");
    }
    endJobLog(log, { state: job.state, summary: job.results.summary });
    this.logs.delete(job.id);
    this.notify(job);
  }

  private notify(job: Job): void {
    const pending = this.waiters.get(job.id);
    if (!pending) return;
    this.waiters.delete(job.id);
    const view = this.view(job);
    for (const resolve of pending) resolve(view);
  }

  private async persist(job: Job): Promise<void> {
    try {
      await this.deps.jobStore.save(job);
    } catch (error) {
      logError("job_store.save_failed", error, { jobId: job.id, state: job.state });
    }
  }

  private view(job: Job): JobView {
    const view: JobView = {
      id: job.id,
      patientId: job.profile.patientId,
      state: job.state,
      createdAt: job.createdAt,
      startedAt: job.startedAt,
      completedAt: job.completedAt,
      cancelled: job.cancelledAt !== undefined,
      cancelledAt: job.cancelledAt,
      error: job.error,
      drugs: job.drugs.map((task) => ({ drug: task.drug, state: task.state })),
    };
    if (!isTerminalJob(job.state)) return view;

    const results = job.results ?? aggregateResults(job);
    view.drugs = results.drugs.map((entry) => structuredClone(entry));
    view.summary = { ...results.summary };
    return view;
  }
}
