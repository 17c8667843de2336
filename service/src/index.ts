import { Hono } from "hono";
import { serve } from "@hono/node-server";
import { createRuntime, type OracleRuntime } from "../../oracle/src/index.js";
import { config, loadParameters } from "./config.js";
import { healthRoutes } from "./routes/health.js";
import { operationRoutes } from "./routes/operations.js";
import { queryRoutes } from "./routes/queries.js";

export function createApp(runtime: OracleRuntime): Hono {
  const app = new Hono();

  app.route("/", healthRoutes(runtime));
  app.route("/", operationRoutes(runtime));
  app.route("/", queryRoutes(runtime));

  return app;
}

export const runtime = createRuntime({
  admin: config.admin,
  parameters: loadParameters(),
  log: (message) => console.log(`[${config.instance}] ${message}`),
});

export const app = createApp(runtime);

// Only start server when run directly (not imported for tests)
const isDirectRun =
  process.argv[1]?.endsWith("index.ts") ||
  process.argv[1]?.endsWith("index.js");

if (isDirectRun) {
  console.log(
    `[${config.instance}] Starting oracle on port ${config.port} (admin: ${config.admin})`,
  );
  serve({ fetch: app.fetch, port: config.port });
}
