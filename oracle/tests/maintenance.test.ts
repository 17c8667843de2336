import { describe, it, expect } from "vitest";
import {
  autoResolveQueries,
  checkExpiredQueries,
  createQuery,
  expireQuery,
  getQuery,
  getVoter,
  submitVote,
  type CreateQueryInput,
} from "../src/index.js";
import { ADMIN, expectOracleError, registerAll, setup } from "./helpers.js";

const QUESTION: CreateQueryInput = {
  description: "Was the upgrade proposal accepted?",
  outcomes: ["Yes", "No"],
  strategy: "Majority",
  rewardAmount: 300n,
};

function twoQueries() {
  const harness = setup();
  const { runtime } = harness;
  registerAll(runtime, { v1: 1000n, v2: 1000n, v3: 1000n });
  createQuery(runtime, "c", QUESTION);
  createQuery(runtime, "c", QUESTION);
  for (const voter of ["v1", "v2", "v3"]) submitVote(runtime, voter, 1, "Yes");
  submitVote(runtime, "v1", 2, "No");
  return harness;
}

describe("maintenance sweeps", () => {
  it("leave queries alone before their deadline", () => {
    const { runtime } = twoQueries();
    expect(checkExpiredQueries(runtime)).toEqual([]);
    expect(autoResolveQueries(runtime)).toEqual([]);
  });

  it("expire queries that missed quorum", () => {
    const { runtime, clock } = twoQueries();
    clock.advance(3600);

    expect(checkExpiredQueries(runtime)).toEqual([2]);
    expect(getQuery(runtime, 2).status).toBe("Expired");
    expect(getQuery(runtime, 1).status).toBe("Active");
  });

  it("resolve queries that reached quorum", () => {
    const { runtime, clock } = twoQueries();
    clock.advance(3600);

    const resolved = autoResolveQueries(runtime);
    expect(resolved.map((r) => [r.queryId, r.status])).toEqual([[1, "Resolved"]]);
    expect(getQuery(runtime, 1).result).toBe("Yes");
    expect(getQuery(runtime, 2).status).toBe("Active");
    // the vote on query 2 keeps its lock until that query ends
    expect(getVoter(runtime, "v1").lockedStake).toBe(90n);
  });
});

describe("expireQuery", () => {
  it("is admin only and waits for the deadline", () => {
    const { runtime, clock } = twoQueries();
    expectOracleError(() => expireQuery(runtime, "v1", 1), "Unauthorized");
    expectOracleError(() => expireQuery(runtime, ADMIN, 1), "DeadlineNotReached");

    clock.advance(3600);
    expireQuery(runtime, ADMIN, 1);
    expect(getQuery(runtime, 1).status).toBe("Expired");
    expect(getVoter(runtime, "v2").lockedStake).toBe(0n);
    expectOracleError(() => expireQuery(runtime, ADMIN, 1), "QueryNotActive");
  });
});
