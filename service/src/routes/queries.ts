import { Hono } from "hono";
import { drainOutbox, pendingRewards, type OracleRuntime } from "../../../oracle/src/index.js";
import { outboundView, queryView, voterView } from "../views.js";

export function queryRoutes(runtime: OracleRuntime): Hono {
  const routes = new Hono();

  routes.get("/queries/:id", (c) => {
    const id = Number(c.req.param("id"));
    const query = Number.isInteger(id) ? runtime.state.queries.get(id) : undefined;
    if (!query) {
      return c.json({ error: `Query ${c.req.param("id")} not found` }, 404);
    }
    return c.json(queryView(query));
  });

  routes.get("/voters/:address", (c) => {
    const address = c.req.param("address");
    const voter = runtime.state.voters.get(address);
    if (!voter) {
      return c.json({ error: `Voter ${address} is not registered` }, 404);
    }
    return c.json(voterView(voter, pendingRewards(runtime, address), runtime.now()));
  });

  routes.get("/outbox", (c) => {
    const messages = runtime.state.outbox.map(outboundView);
    return c.json({ count: messages.length, messages });
  });

  // Handing messages to the transport removes them from the outbox.
  routes.post("/outbox/drain", (c) => {
    const messages = drainOutbox(runtime).map(outboundView);
    return c.json({ count: messages.length, messages });
  });

  return routes;
}
