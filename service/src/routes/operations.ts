import { Hono } from "hono";
import {
  MessageSchema,
  OperationSchema,
  executeMessage,
  executeOperation,
  type OracleRuntime,
} from "../../../oracle/src/index.js";

export function operationRoutes(runtime: OracleRuntime): Hono {
  const routes = new Hono();

  routes.post("/operations", async (c) => {
    const caller = c.req.header("x-caller");
    if (!caller) {
      return c.json({ error: "Missing x-caller header" }, 400);
    }

    const body: unknown = await c.req.json().catch(() => null);
    const parsed = OperationSchema.safeParse(body);
    if (!parsed.success) {
      return c.json(
        { error: "Invalid operation", details: parsed.error.flatten() },
        400,
      );
    }

    const response = executeOperation(runtime, caller, parsed.data);
    return c.json(response, response.success ? 200 : 422);
  });

  routes.post("/messages", async (c) => {
    const chain = c.req.header("x-sender-chain");
    if (!chain) {
      return c.json({ error: "Missing x-sender-chain header" }, 400);
    }
    // Voter messages act for the signing account; chain-level senders act
    // as the chain itself.
    const sender = c.req.header("x-caller") ?? chain;

    const body: unknown = await c.req.json().catch(() => null);
    const parsed = MessageSchema.safeParse(body);
    if (!parsed.success) {
      return c.json(
        { error: "Invalid message", details: parsed.error.flatten() },
        400,
      );
    }

    const response = executeMessage(runtime, { chain, sender }, parsed.data);
    return c.json(response, response.success ? 200 : 422);
  });

  return routes;
}
