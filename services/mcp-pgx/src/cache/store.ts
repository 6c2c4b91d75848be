import { cacheEntrySchema } from "../contracts.js";
import { appendLine, readBytesIfExists, readTextRange, withFileLock } from "../storage/files.js";
import { logEvent } from "../telemetry.js";
import type { CacheEntry } from "../types.js";

export type AppendResult = {
  entry: CacheEntry;
  stored: boolean;
};

/**
 * Append-only backing store for explanation entries. `append` is atomic per
 * key: when the key is already present nothing is written and the held
 * entry is returned with `stored: false`.
 */
export interface ExplanationStore {
  read(key: string): Promise<CacheEntry | null>;
  append(entry: CacheEntry): Promise<AppendResult>;
  size(): number;
  close(): Promise<void>;
}

export class MemoryExplanationStore implements ExplanationStore {
  private readonly entries = new Map<string, CacheEntry>();

  async read(key: string): Promise<CacheEntry | null> {
    return this.entries.get(key) ?? null;
  }

  async append(entry: CacheEntry): Promise<AppendResult> {
    const existing = this.entries.get(entry.key);
    if (existing) return { entry: existing, stored: false };
    const frozen = freezeEntry(entry);
    this.entries.set(entry.key, frozen);
    return { entry: frozen, stored: true };
  }

  size(): number {
    return this.entries.size;
  }

  async close(): Promise<void> {}
}

type LineLocation = {
  offset: number;
  length: number;
};

const NEWLINE = 0x0a;

/**
 * Durable NDJSON store. The file is replayed on open; the first line for a key
 * wins. Only line locations stay in memory, entries are read back from disk.
 */
export class FileExplanationStore implements ExplanationStore {
  private readonly index = new Map<string, LineLocation>();
  private endOffset = 0;
  private needsSeparator = false;
  private closed = false;

  private constructor(readonly filePath: string) {}

  static async open(filePath: string): Promise<FileExplanationStore> {
    const store = new FileExplanationStore(filePath);
    await store.replay();
    return store;
  }

  private async replay(): Promise<void> {
    const raw = await readBytesIfExists(this.filePath);
    if (raw === null) return;

    let skipped = 0;
    let offset = 0;
    while (offset < raw.length) {
      const newline = raw.indexOf(NEWLINE, offset);
      const end = newline === -1 ? raw.length : newline;
      const trimmed = raw.subarray(offset, end).toString("utf-8").trim();
      if (trimmed) {
        const parsed = cacheEntrySchema.safeParse(parseLine(trimmed));
        if (!parsed.success) {
          skipped += 1;
        } else if (!this.index.has(parsed.data.key)) {
          this.index.set(parsed.data.key, { offset, length: end - offset });
        }
      }
      offset = end + 1;
    }
    this.endOffset = raw.length;
    this.needsSeparator = raw.length > 0 && raw[raw.length - 1] !== NEWLINE;
    if (skipped > 0) {
      logEvent("warn", "cache.replay_skipped_lines", { file: this.filePath, skipped });
    }
  }

  async read(key: string): Promise<CacheEntry | null> {
    const location = this.index.get(key);
    return location ? this.readAt(key, location) : null;
  }

  private async readAt(key: string, location: LineLocation): Promise<CacheEntry> {
    const line = await readTextRange(this.filePath, location.offset, location.length);
    const parsed = cacheEntrySchema.safeParse(parseLine(line.trim()));
    if (!parsed.success || parsed.data.key !== key) {
      throw new Error(`explanation store ${this.filePath} has no readable entry for ${key}`);
    }
    return freezeEntry(parsed.data);
  }

  async append(entry: CacheEntry): Promise<AppendResult> {
    return withFileLock(this.filePath, async () => {
      if (this.closed) throw new Error(`explanation store ${this.filePath} is closed`);
      const existing = this.index.get(entry.key);
      if (existing) return { entry: await this.readAt(entry.key, existing), stored: false };

      if (this.needsSeparator) {
        await appendLine(this.filePath, "");
        this.endOffset += 1;
        this.needsSeparator = false;
      }
      const frozen = freezeEntry(entry);
      const line = JSON.stringify(frozen);
      await appendLine(this.filePath, line);
      const length = Buffer.byteLength(line, "utf-8");
      this.index.set(frozen.key, { offset: this.endOffset, length });
      this.endOffset += length + 1;
      return { entry: frozen, stored: true };
    });
  }

  size(): number {
    return this.index.size;
  }

  async close(): Promise<void> {
    await withFileLock(this.filePath, async () => {
      this.closed = true;
    });
  }
}

function freezeEntry(entry: CacheEntry): CacheEntry {
  return Object.freeze({ ...entry, generator: Object.freeze({ ...entry.generator }) });
}

function parseLine(line: string): unknown {
  try {
    return JSON.parse(line);
  } catch {
    return undefined;
  }
}
