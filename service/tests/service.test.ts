import { describe, it, expect, beforeEach } from "vitest";
import type { Hono } from "hono";
import { OracleError, createRuntime, DEFAULT_PARAMETERS } from "../../oracle/src/index.js";
import { fakeClock, type FakeClock } from "../../oracle/tests/helpers.js";
import { loadParameters } from "../src/config.js";
import { createApp } from "../src/index.js";

let app: Hono;
let clock: FakeClock;

beforeEach(() => {
  clock = fakeClock();
  const runtime = createRuntime({ admin: "admin", clock: clock.now, log: () => undefined });
  app = createApp(runtime);
});

function req(path: string, init?: RequestInit) {
  return app.request(path, init);
}

function post(path: string, body: unknown, headers: Record<string, string> = {}) {
  return req(path, {
    method: "POST",
    headers: { "Content-Type": "application/json", ...headers },
    body: JSON.stringify(body),
  });
}

function operate(caller: string, body: unknown) {
  return post("/operations", body, { "x-caller": caller });
}

describe("GET /health", () => {
  it("returns ok status with instance info", async () => {
    const res = await req("/health");
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: "ok", instance: "oracle", paused: false });
  });

  it("reflects the paused flag", async () => {
    await operate("admin", { type: "PauseProtocol" });
    const data = await (await req("/health")).json();
    expect(data).toHaveProperty("paused", true);
  });
});

describe("POST /operations", () => {
  it("requires a caller", async () => {
    const res = await post("/operations", { type: "ClaimRewards" });
    expect(res.status).toBe(400);
  });

  it("rejects invalid input", async () => {
    const res = await operate("v1", { type: "Nope" });
    expect(res.status).toBe(400);
    const data = await res.json();
    expect(data).toHaveProperty("error", "Invalid operation");
    expect(data).toHaveProperty("details");
  });

  it("rejects a body that is not JSON", async () => {
    const res = await req("/operations", {
      method: "POST",
      headers: { "Content-Type": "application/json", "x-caller": "v1" },
      body: "{oops",
    });
    expect(res.status).toBe(400);
  });

  it("registers a voter", async () => {
    const res = await operate("v1", { type: "RegisterVoter", stake: "1000" });
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      success: true,
      message: "Voter registered successfully",
      data: { voter: "v1", stake: "1000", reputation: 50 },
    });
  });

  it("maps operation errors to 422", async () => {
    await operate("v1", { type: "RegisterVoter", stake: "1000" });
    const res = await operate("v1", { type: "RegisterVoter", stake: "1000" });
    expect(res.status).toBe(422);
    expect(await res.json()).toEqual({
      success: false,
      code: 2003,
      error: "AlreadyRegistered",
      message: "Voter v1 is already registered",
    });
  });
});

describe("GET /voters/:address", () => {
  it("includes reputation stats", async () => {
    await operate("v1", { type: "RegisterVoter", stake: "1000", name: "Node One" });
    const res = await req("/voters/v1");
    expect(res.status).toBe(200);
    const data = await res.json();
    expect(data).toMatchObject({
      address: "v1",
      name: "Node One",
      stake: "1000",
      lockedStake: "0",
      isActive: true,
      pendingRewards: "0",
      stats: {
        reputation: 50,
        tier: "Intermediate",
        weight: 1.25,
        accuracyPercentage: 0,
        power: "50000",
      },
    });
  });

  it("returns 404 for unknown voters", async () => {
    const res = await req("/voters/nobody");
    expect(res.status).toBe(404);
  });
});

describe("query lifecycle over HTTP", () => {
  it("resolves a query and hands the callback to the transport", async () => {
    for (const voter of ["v1", "v2", "v3"]) {
      await operate(voter, { type: "RegisterVoter", stake: "1000" });
    }
    const created = await operate("dapp", {
      type: "CreateQueryWithCallback",
      description: "Will the test network halt?",
      outcomes: ["Yes", "No"],
      strategy: "Majority",
      rewardAmount: "900",
      durationSecs: 600,
      callbackChain: "market-chain",
      callbackApp: "market",
      callbackData: "0x0700000000000000",
    });
    expect(await created.json()).toMatchObject({ success: true, data: { queryId: 1 } });

    await operate("v1", { type: "SubmitVote", queryId: 1, value: "Yes" });
    await operate("v2", { type: "SubmitVote", queryId: 1, value: "Yes", confidence: 70 });
    await operate("v3", { type: "SubmitVote", queryId: 1, value: 1 });

    const early = await operate("keeper", { type: "ResolveQuery", queryId: 1 });
    expect(early.status).toBe(422);
    expect(await early.json()).toMatchObject({ error: "DeadlineNotReached", code: 1007 });

    clock.advance(600);
    const resolved = await operate("keeper", { type: "ResolveQuery", queryId: 1 });
    expect(await resolved.json()).toEqual({
      success: true,
      message: "Query resolved successfully",
      data: { queryId: 1, status: "Resolved", result: "Yes", confidence: 66.66 },
    });

    const query = await (await req("/queries/1")).json();
    expect(query).toMatchObject({ id: 1, status: "Resolved", result: "Yes", voteCount: 3 });

    const queued = await (await req("/outbox")).json();
    expect(queued).toMatchObject({ count: 1 });
    expect(await (await req("/outbox")).json()).toEqual(queued);

    const outbox = await (await post("/outbox/drain", {})).json();
    expect(outbox).toMatchObject({
      count: 1,
      messages: [
        {
          destination: "market-chain",
          app: "market",
          callback: {
            type: "QueryResolutionCallback",
            queryId: 1,
            resolvedOutcome: "Yes",
            callbackData: "0x0700000000000000",
          },
        },
      ],
    });
    expect(await (await req("/outbox")).json()).toEqual({ count: 0, messages: [] });
    expect(await (await post("/outbox/drain", {})).json()).toEqual({ count: 0, messages: [] });
  });

  it("returns 404 for unknown queries", async () => {
    expect((await req("/queries/9")).status).toBe(404);
    expect((await req("/queries/abc")).status).toBe(404);
  });
});

describe("POST /messages", () => {
  it("requires the sending chain", async () => {
    const res = await post("/messages", { type: "ClaimRewards" });
    expect(res.status).toBe(400);
  });

  it("acts for the signing account", async () => {
    const res = await post(
      "/messages",
      { type: "RegisterVoter", stake: "300" },
      { "x-sender-chain": "voter-chain", "x-caller": "v7" },
    );
    expect(await res.json()).toMatchObject({ success: true, data: { voter: "v7", stake: "300" } });
  });

  it("refuses resolution callbacks addressed to the oracle", async () => {
    const res = await post(
      "/messages",
      {
        type: "QueryResolutionCallback",
        queryId: 1,
        resolvedOutcome: "Yes",
        resolvedAt: "0",
        callbackData: "0x0100000000000000",
      },
      { "x-sender-chain": "market-chain" },
    );
    expect(res.status).toBe(422);
    expect(await res.json()).toMatchObject({ code: 5004, error: "InvalidCallback" });
  });
});

describe("loadParameters", () => {
  it("applies environment overrides", () => {
    expect(loadParameters({ ORACLE_MIN_STAKE: "500", ORACLE_SLASH_BPS: "250" })).toEqual({
      ...DEFAULT_PARAMETERS,
      minStake: 500n,
      slashPercentage: 250,
    });
  });

  it("uses the defaults when nothing is set", () => {
    expect(loadParameters({})).toEqual(DEFAULT_PARAMETERS);
  });

  it("rejects out-of-range values", () => {
    expect(() => loadParameters({ ORACLE_FEE_BPS: "5000" })).toThrow(OracleError);
    expect(() => loadParameters({ ORACLE_MIN_VOTES: "many" })).toThrow(OracleError);
  });
});
