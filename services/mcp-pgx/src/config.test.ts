import { describe, it } from "node:test";
import assert from "node:assert";
import { buildConfig, parseBoolean, parseNumber, selectProvider } from "./config.js";
import { createExplanationGenerator } from "./generator/factory.js";
import { versionTag } from "./generator/types.js";

describe("selectProvider", () => {
  it("prefers groq, then openai, then the offline template", () => {
    assert.strictEqual(selectProvider({ GROQ_API_KEY: "test-key", OPENAI_API_KEY: "test-key" }).provider, "groq");
    assert.strictEqual(selectProvider({ OPENAI_API_KEY: "test-key" }).provider, "openai");
    assert.deepStrictEqual(selectProvider({}), {
      provider: "template",
      requested: "auto",
      missingKey: false,
    });
  });

  it("falls back to the template when the requested provider has no key", () => {
    assert.deepStrictEqual(selectProvider({ EXPLANATION_PROVIDER: "OpenAI" }), {
      provider: "template",
      requested: "openai",
      missingKey: true,
    });
  });

  it("honours an explicit template request", () => {
    assert.strictEqual(
      selectProvider({ EXPLANATION_PROVIDER: "template", GROQ_API_KEY: "test-key" }).provider,
      "template",
    );
  });
});

describe("buildConfig", () => {
  it("applies defaults", () => {
    const config = buildConfig({});
    assert.strictEqual(config.generator.timeoutMs, 30_000);
    assert.strictEqual(config.generator.maxAttempts, 3);
    assert.strictEqual(config.cache.durable, true);
    assert.strictEqual(config.jobs.workers, 4);
    assert.strictEqual(config.groq.baseUrl, "https://api.groq.com/openai/v1");
    assert.strictEqual(config.data.dir, undefined);
  });

  it("reads overrides and ignores malformed numbers", () => {
    const config = buildConfig({
      GENERATOR_MAX_ATTEMPTS: "5",
      JOB_WORKERS: "zero",
      EXPLANATION_CACHE_DURABLE: "no",
      EXPLANATION_CACHE_PATH: "/tmp/pgx.ndjson",
    });
    assert.strictEqual(config.generator.maxAttempts, 5);
    assert.strictEqual(config.jobs.workers, 4);
    assert.strictEqual(config.cache.durable, false);
    assert.strictEqual(config.cache.path, "/tmp/pgx.ndjson");
  });

  it("parses primitive values", () => {
    assert.strictEqual(parseNumber("2.5", 1), 2.5);
    assert.strictEqual(parseNumber(undefined, 1), 1);
    assert.strictEqual(parseBoolean("YES", false), true);
    assert.strictEqual(parseBoolean("maybe", false), false);
  });
});

describe("createExplanationGenerator", () => {
  it("builds the generator named by the configuration", () => {
    assert.strictEqual(
      versionTag(createExplanationGenerator(buildConfig({})).identity),
      "template:rule-text:1",
    );
    assert.strictEqual(
      versionTag(createExplanationGenerator(buildConfig({ GROQ_API_KEY: "test-key" })).identity),
      "groq:llama-3.3-70b-versatile:chat-v1",
    );
    assert.strictEqual(
      versionTag(
        createExplanationGenerator(
          buildConfig({ OPENAI_API_KEY: "test-key", OPENAI_MODEL: "gpt-test" }),
        ).identity,
      ),
      "openai:gpt-test:chat-v1",
    );
  });
});
