import { after, afterEach, before, beforeEach, describe, it } from "node:test";
import assert from "node:assert";
import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import { CacheKeyConflictError } from "../errors.js";
import { muteLogs } from "../testing/fakes.js";
import type { CacheEntry } from "../types.js";
import { ExplanationCache } from "./explanation-cache.js";
import { FileExplanationStore, MemoryExplanationStore } from "./store.js";

function entry(overrides: Partial<CacheEntry> = {}): CacheEntry {
  return {
    key: "expl:v1:abc",
    text: '{"interpretation":"first"}',
    generator: { provider: "scripted", model: "test-model", version: "1" },
    templateId: "drug-risk-explanation@v1",
    createdAt: "2024-05-01T12:00:00.000Z",
    ...overrides,
  };
}

let restoreLogs: () => void = () => undefined;
before(() => {
  restoreLogs = muteLogs();
});
after(() => restoreLogs());

describe("ExplanationCache", () => {
  it("stores a new entry and reports hits and misses", async () => {
    const cache = new ExplanationCache(new MemoryExplanationStore());
    assert.strictEqual(await cache.get("expl:v1:abc"), null);
    assert.strictEqual(await cache.put(entry()), "stored");
    assert.strictEqual((await cache.get("expl:v1:abc"))?.text, '{"interpretation":"first"}');
    assert.deepStrictEqual(cache.stats(), {
      entries: 1,
      hits: 1,
      misses: 1,
      hitRate: 0.5,
      conflicts: 0,
    });
  });

  it("treats a repeated put with identical content as a no-op", async () => {
    const cache = new ExplanationCache(new MemoryExplanationStore());
    await cache.put(entry());
    assert.strictEqual(await cache.put(entry({ createdAt: "2024-06-01T00:00:00.000Z" })), "unchanged");
    assert.strictEqual(cache.stats().entries, 1);
  });

  it("rejects different content under an existing key and keeps the original", async () => {
    const cache = new ExplanationCache(new MemoryExplanationStore());
    await cache.put(entry());
    await assert.rejects(cache.put(entry({ text: "replacement" })), CacheKeyConflictError);
    assert.strictEqual((await cache.peek("expl:v1:abc"))?.text, '{"interpretation":"first"}');
    assert.strictEqual(cache.stats().conflicts, 1);
  });

  it("does not count peeks as lookups", async () => {
    const cache = new ExplanationCache(new MemoryExplanationStore());
    await cache.peek("missing");
    assert.strictEqual(cache.stats().misses, 0);
    assert.strictEqual(cache.stats().hitRate, 0);
  });

  it("falls through to the store when the memory front has evicted a key", async () => {
    const cache = new ExplanationCache(new MemoryExplanationStore(), { memoryEntries: 1 });
    await cache.put(entry());
    await cache.put(entry({ key: "expl:v1:def" }));
    assert.strictEqual((await cache.get("expl:v1:abc"))?.key, "expl:v1:abc");
  });
});

describe("FileExplanationStore", () => {
  let dir = "";
  let filePath = "";

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "pgx-cache-"));
    filePath = path.join(dir, "nested", "explanations.ndjson");
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("survives a reopen", async () => {
    const first = await FileExplanationStore.open(filePath);
    const cache = new ExplanationCache(first);
    await cache.put(entry());
    await cache.close();

    const reopened = new ExplanationCache(await FileExplanationStore.open(filePath));
    assert.deepStrictEqual(await reopened.get("expl:v1:abc"), entry());
    assert.strictEqual(reopened.stats().entries, 1);
  });

  it("writes each key once", async () => {
    const store = await FileExplanationStore.open(filePath);
    const results = await Promise.all([
      store.append(entry()),
      store.append(entry({ text: "late" })),
    ]);
    assert.deepStrictEqual(
      results.map((result) => result.stored),
      [true, false],
    );
    const lines = (await fs.readFile(filePath, "utf-8")).trim().split("\n");
    assert.strictEqual(lines.length, 1);
  });

  it("keeps the first line for a key and skips unreadable lines on replay", async () => {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(
      filePath,
      [
        JSON.stringify(entry()),
        "not json",
        JSON.stringify(entry({ text: "second" })),
        JSON.stringify({ key: "expl:v1:partial" }),
        "",
      ].join("\n"),
      "utf-8",
    );
    const store = await FileExplanationStore.open(filePath);
    assert.strictEqual(store.size(), 1);
    assert.strictEqual((await store.read("expl:v1:abc"))?.text, '{"interpretation":"first"}');
  });

  it("serves evicted entries from disk", async () => {
    const store = await FileExplanationStore.open(filePath);
    const cache = new ExplanationCache(store, { memoryEntries: 1 });
    await cache.put(entry());
    await cache.put(entry({ key: "expl:v1:déf", text: '{"interpretation":"zweite Erklärung"}' }));

    assert.deepStrictEqual(await cache.get("expl:v1:abc"), entry());
    assert.strictEqual(
      (await store.read("expl:v1:déf"))?.text,
      '{"interpretation":"zweite Erklärung"}',
    );
    assert.deepStrictEqual(cache.stats(), {
      entries: 2,
      hits: 1,
      misses: 0,
      hitRate: 1,
      conflicts: 0,
    });
  });

  it("returns the entry already on disk for a repeated key", async () => {
    const store = await FileExplanationStore.open(filePath);
    await store.append(entry());
    const reopened = await FileExplanationStore.open(filePath);
    const result = await reopened.append(entry({ text: "late" }));
    assert.strictEqual(result.stored, false);
    assert.deepStrictEqual(result.entry, entry());
  });

  it("starts a new line after a truncated final line", async () => {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, `${JSON.stringify(entry())}\n{"key":"expl:v1:cut`, "utf-8");
    const store = await FileExplanationStore.open(filePath);
    await store.append(entry({ key: "expl:v1:def" }));
    assert.strictEqual((await store.read("expl:v1:def"))?.key, "expl:v1:def");

    const reopened = await FileExplanationStore.open(filePath);
    assert.strictEqual(reopened.size(), 2);
    assert.strictEqual((await reopened.read("expl:v1:def"))?.text, '{"interpretation":"first"}');
  });

  it("refuses writes after close", async () => {
    const store = await FileExplanationStore.open(filePath);
    await store.close();
    await assert.rejects(store.append(entry()), /is closed/);
  });
});
