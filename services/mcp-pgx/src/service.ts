import { ExplanationCache } from "./cache/explanation-cache.js";
import { FileExplanationStore, MemoryExplanationStore, type ExplanationStore } from "./cache/store.js";
import { defaultDataDir, loadReferenceData, type ReferenceData } from "./catalog/data.js";
import type { AppConfig } from "./config.js";
import { DiplotypeResolver } from "./engine/resolver.js";
import { createExplanationGenerator } from "./generator/factory.js";
import { versionTag, type ExplanationGenerator } from "./generator/types.js";
import { FileJobStore, MemoryJobStore, type JobStore } from "./jobs/job-store.js";
import { JobOrchestrator } from "./jobs/orchestrator.js";
import { logEvent } from "./telemetry.js";
import type { Clock } from "./types.js";

export type PgxService = {
  reference: ReferenceData;
  resolver: DiplotypeResolver;
  cache: ExplanationCache;
  generator: ExplanationGenerator;
  orchestrator: JobOrchestrator;
  close(): Promise<void>;
};

export type ServiceOverrides = {
  dataDir?: string;
  generator?: ExplanationGenerator;
  store?: ExplanationStore;
  jobStore?: JobStore;
  clock?: Clock;
  sleep?: (ms: number) => Promise<void>;
};

/** Wires reference data, cache, generator and orchestrator from configuration. */
export async function createPgxService(
  config: AppConfig,
  overrides: ServiceOverrides = {},
): Promise<PgxService> {
  const reference = loadReferenceData(overrides.dataDir ?? config.data.dir ?? defaultDataDir);
  const generator = overrides.generator ?? createExplanationGenerator(config);

  const store =
    overrides.store ??
    (config.cache.durable
      ? await FileExplanationStore.open(config.cache.path)
      : new MemoryExplanationStore());
  const cache = new ExplanationCache(store, { memoryEntries: config.cache.memoryEntries });

  const jobStore =
    overrides.jobStore ??
    (config.jobs.storeDir ? new FileJobStore(config.jobs.storeDir) : new MemoryJobStore());

  const orchestrator = new JobOrchestrator(
    {
      catalog: reference.catalog,
      rules: reference.rules,
      cache,
      generator,
      jobStore,
      clock: overrides.clock,
    },
    {
      workers: config.jobs.workers,
      retry: config.generator,
      sleep: overrides.sleep,
    },
  );
  const recovered = await orchestrator.recover();

  logEvent("info", "service.ready", {
    generator: versionTag(generator.identity),
    catalogVersion: reference.versions.catalog,
    rulesVersion: reference.versions.rules,
    genes: reference.catalog.genes().length,
    rules: reference.rules.size,
    cacheEntries: store.size(),
    ...recovered,
  });

  return {
    reference,
    resolver: new DiplotypeResolver(reference.catalog),
    cache,
    generator,
    orchestrator,
    async close() {
      await orchestrator.drain();
      await cache.close();
    },
  };
}
