import type { Request, Response } from "express";
import express from "express";
import cors from "cors";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { appConfig, assertRuntimeConfig } from "./config.js";
import { createPgxServer } from "./server.js";
import { createPgxService, type PgxService } from "./service.js";
import { logError, logEvent } from "./telemetry.js";

function getArgValue(prefix: string): string | undefined {
  const arg = process.argv.find((candidate) => candidate.startsWith(`${prefix}=`));
  if (!arg) return undefined;
  const [, value] = arg.split("=", 2);
  return value;
}

async function runStdio(service: PgxService) {
  const server = createPgxServer(service);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logEvent("info", "server.listening", { transport: "stdio" });
}

async function runHttp(service: PgxService) {
  const app = express();
  app.use(express.json({ limit: "2mb" }));
  app.use(cors());
  app.options("/mcp", cors());

  const host = appConfig.http.host;
  const port = Number(getArgValue("--port") ?? appConfig.http.port);

  app.all("/mcp", async (req: Request, res: Response) => {
    // Stateless mode: one server and transport per request, sharing the service.
    const server = createPgxServer(service);
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: undefined,
    });
    res.on("close", () => {
      transport.close().catch((error: unknown) => logError("http.transport_close_failed", error));
      server.close().catch((error: unknown) => logError("http.server_close_failed", error));
    });

    try {
      await server.connect(transport);
      await transport.handleRequest(req, res, req.body);
    } catch (error) {
      logError("http.request_failed", error);
      if (!res.headersSent) {
        res.status(500).json({
          jsonrpc: "2.0",
          error: { code: -32603, message: "Internal server error" },
          id: null,
        });
      }
    }
  });

  app.listen(port, host, () => {
    logEvent("info", "server.listening", { transport: "http", url: `http://${host}:${port}/mcp` });
  });
}

async function main() {
  assertRuntimeConfig();
  const service = await createPgxService(appConfig);

  const shutdown = (signal: string) => {
    logEvent("info", "server.shutdown", { signal });
    service
      .close()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logError("server.shutdown_failed", error);
        process.exit(1);
      });
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));

  if (process.argv.includes("--http")) return runHttp(service);
  return runStdio(service);
}

main().catch((error: unknown) => {
  logError("server.fatal", error);
  process.exit(1);
});
