import { Hono } from "hono";
import type { OracleRuntime } from "../../../oracle/src/index.js";
import { config } from "../config.js";

export function healthRoutes(runtime: OracleRuntime): Hono {
  const routes = new Hono();

  routes.get("/health", (c) =>
    c.json({ status: "ok", instance: config.instance, paused: runtime.state.isPaused }),
  );

  return routes;
}
