import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { jobIdShape, resolveDiplotypeShape, submitAnalysisShape } from "./contracts.js";
import { createErrorResponse, createJsonResponse, createMCPResponse } from "./format.js";
import { versionTag } from "./generator/types.js";
import type { PgxService } from "./service.js";

export function createPgxServer(service: PgxService): McpServer {
  const { orchestrator, reference, resolver, generator } = service;

  const server = new McpServer(
    {
      name: "pgx-mcp",
      version: "1.0.0",
    },
    {
      capabilities: {
        tools: {},
      },
    },
  );

  server.tool(
    "submit-analysis",
    "Submit a pharmacogenomic analysis for one patient and one or more drugs. Returns a job id to poll.",
    submitAnalysisShape,
    async (args) => {
      try {
        const submitted = await orchestrator.submit(args);
        return createJsonResponse(submitted);
      } catch (error) {
        return createErrorResponse("submitting analysis", error);
      }
    },
  );

  server.tool(
    "poll-job",
    "Get a job's state. Per-drug verdicts and explanations appear once every drug has finished.",
    jobIdShape,
    async ({ jobId }) => {
      try {
        return createJsonResponse(orchestrator.poll(jobId));
      } catch (error) {
        return createErrorResponse("polling job", error);
      }
    },
  );

  server.tool(
    "cancel-job",
    "Cancel a queued or running job. Unfinished drugs are marked failed; cached explanations are kept.",
    jobIdShape,
    async ({ jobId }) => {
      try {
        return createJsonResponse(await orchestrator.cancel(jobId));
      } catch (error) {
        return createErrorResponse("cancelling job", error);
      }
    },
  );

  server.tool(
    "purge-job",
    "Remove a finished job and its stored record.",
    jobIdShape,
    async ({ jobId }) => {
      try {
        await orchestrator.purge(jobId);
        return createMCPResponse(`Job ${jobId} purged.`);
      } catch (error) {
        return createErrorResponse("purging job", error);
      }
    },
  );

  server.tool(
    "resolve-diplotype",
    "Resolve two alleles of a gene to a metabolizer or transporter phenotype.",
    resolveDiplotypeShape,
    async ({ gene, allele1, allele2 }) => {
      try {
        const resolved = resolver.resolve(gene, allele1, allele2);
        return createJsonResponse({
          gene: resolved.gene,
          diplotype: resolved.diplotype,
          zygosity: resolved.zygosity,
          alleleStatuses: resolved.alleles.map((allele) => allele.status),
          activityScore: resolved.activityScore,
          phenotype: resolved.phenotype,
        });
      } catch (error) {
        return createErrorResponse("resolving diplotype", error);
      }
    },
  );

  server.tool(
    "list-supported-drugs",
    "List drugs covered by the guideline rule table with the genes each depends on.",
    async () => createJsonResponse({ drugs: reference.rules.drugs() }),
  );

  server.tool(
    "engine-stats",
    "Job counts, explanation cache statistics and the active explanation generator.",
    async () =>
      createJsonResponse({
        ...orchestrator.stats(),
        generatorIdentity: generator.identity,
        generatorTag: versionTag(generator.identity),
        reference: {
          catalogVersion: reference.versions.catalog,
          rulesVersion: reference.versions.rules,
          genes: reference.catalog.genes(),
          ruleCount: reference.rules.size,
        },
      }),
  );

  return server;
}
