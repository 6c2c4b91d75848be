import { promises as fs } from "node:fs";
import path from "node:path";
import { storedJobSchema } from "../contracts.js";
import {
  ensureDir,
  isMissingFile,
  removeIfExists,
  withFileLock,
  writeJsonAtomic,
} from "../storage/files.js";
import { logEvent } from "../telemetry.js";
import type { Job } from "../types.js";
import { aggregateResults } from "./result-record.js";
import { isTerminalJob } from "./state.js";

export interface JobStore {
  load(): Promise<Job[]>;
  save(job: Job): Promise<void>;
  delete(jobId: string): Promise<void>;
}

function snapshot(job: Job): Job {
  return structuredClone(job);
}

export class MemoryJobStore implements JobStore {
  private readonly jobs = new Map<string, Job>();

  async load(): Promise<Job[]> {
    return [...this.jobs.values()].map(snapshot);
  }

  async save(job: Job): Promise<void> {
    this.jobs.set(job.id, snapshot(job));
  }

  async delete(jobId: string): Promise<void> {
    this.jobs.delete(jobId);
  }
}

/** One JSON file per job, replaced atomically on every save. */
export class FileJobStore implements JobStore {
  constructor(readonly dir: string) {}

  private fileFor(jobId: string): string {
    return path.join(this.dir, `${encodeURIComponent(jobId)}.json`);
  }

  async load(): Promise<Job[]> {
    let names: string[];
    try {
      names = await fs.readdir(this.dir);
    } catch (error) {
      if (isMissingFile(error)) return [];
      throw error;
    }

    const jobs: Job[] = [];
    for (const name of names.filter((entry) => entry.endsWith(".json")).sort()) {
      const filePath = path.join(this.dir, name);
      const raw = await fs.readFile(filePath, "utf-8");
      const parsed = storedJobSchema.safeParse(parseJson(raw));
      if (!parsed.success) {
        logEvent("warn", "job_store.unreadable_job", {
          file: filePath,
          issues: parsed.error.issues.length,
        });
        continue;
      }
      const job: Job = parsed.data;
      if (isTerminalJob(job.state)) job.results = aggregateResults(job);
      jobs.push(job);
    }
    return jobs;
  }

  async save(job: Job): Promise<void> {
    const filePath = this.fileFor(job.id);
    const stored: Job = { ...job, results: undefined };
    await withFileLock(filePath, async () => {
      await ensureDir(this.dir);
      await writeJsonAtomic(filePath, stored);
    });
  }

  async delete(jobId: string): Promise<void> {
    const filePath = this.fileFor(jobId);
    await withFileLock(filePath, () => removeIfExists(filePath));
  }
}

function parseJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
}
