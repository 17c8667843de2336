import { describe, it, expect } from "vitest";
import {
  DEFAULT_PARAMETERS,
  decodeMarketId,
  decodeMessage,
  decodeOperation,
  encodeMarketId,
  encodeMessage,
  encodeOperation,
  type Message,
  type Operation,
} from "../src/index.js";
import { T0, expectOracleError } from "./helpers.js";

describe("wire codec", () => {
  it("writes bigints as decimal strings and bytes as hex", () => {
    expect(encodeOperation({ type: "UpdateStake", additionalStake: 250n })).toBe(
      '{"type":"UpdateStake","additionalStake":"250"}',
    );

    const op: Operation = {
      type: "CreateQueryWithCallback",
      description: "Price of the test asset at close",
      outcomes: ["10", "20"],
      strategy: "Median",
      rewardAmount: 5n,
      deadline: T0,
      callbackChain: "market-chain",
      callbackApp: "market",
      callbackData: new Uint8Array([1, 2, 255]),
    };
    const wire = JSON.parse(encodeOperation(op));
    expect(wire.rewardAmount).toBe("5");
    expect(wire.deadline).toBe(T0.toString());
    expect(wire.callbackData).toBe("0x0102ff");
  });

  it("restores operations exactly", () => {
    const ops: Operation[] = [
      {
        type: "CreateQueryWithCallback",
        description: "Price of the test asset at close",
        outcomes: ["10", "20"],
        strategy: "Median",
        votingMode: "commitReveal",
        minVotes: 2,
        rewardAmount: 12_345_678_901_234_567_890n,
        deadline: T0,
        callbackChain: "market-chain",
        callbackApp: "market",
        callbackData: encodeMarketId(42n),
      },
      { type: "UpdateParameters", params: { ...DEFAULT_PARAMETERS, minStake: 500n } },
      { type: "SubmitVote", queryId: 3, value: 1, confidence: 90 },
      { type: "RevealVote", queryId: 3, value: "Yes", salt: "salt-1" },
      { type: "RegisterVoterFor", voterAddress: "v9", stake: 100n, name: "Backup" },
      { type: "DeregisterVoter" },
    ];
    for (const op of ops) {
      expect(decodeOperation(encodeOperation(op))).toEqual(op);
    }
  });

  it("restores messages exactly", () => {
    const messages: Message[] = [
      {
        type: "CreateQueryFromMarket",
        marketId: 7n,
        question: "Will it rain tomorrow?",
        outcomes: ["Yes", "No"],
        deadline: T0,
        callbackChain: "market-chain",
        callbackData: encodeMarketId(7n),
      },
      {
        type: "QueryResolutionCallback",
        queryId: 1,
        resolvedOutcome: "Yes",
        resolvedAt: T0,
        callbackData: new Uint8Array([7, 0, 0, 0, 0, 0, 0, 0]),
      },
      { type: "CommitVote", queryId: 1, commitment: `0x${"ab".repeat(32)}` },
    ];
    for (const message of messages) {
      expect(decodeMessage(encodeMessage(message))).toEqual(message);
    }
  });

  it("rejects malformed or unknown payloads", () => {
    expectOracleError(() => decodeOperation("{not json"), "InvalidParameters");
    expectOracleError(() => decodeOperation('{"type":"Nope"}'), "InvalidParameters");
    expectOracleError(() => decodeOperation('{"type":"UpdateStake","additionalStake":"-1"}'), "InvalidParameters");
    const err = expectOracleError(
      () => decodeMessage('{"type":"SubmitVote","queryId":1,"value":"Yes","confidence":101}'),
      "InvalidParameters",
    );
    expect(err.message).toMatch(/^Invalid message at confidence: /);
  });
});

describe("callback data", () => {
  it("encodes market ids as 8 little-endian bytes", () => {
    expect([...encodeMarketId(258n)]).toEqual([2, 1, 0, 0, 0, 0, 0, 0]);
    expect(decodeMarketId(new Uint8Array([2, 1, 0, 0, 0, 0, 0, 0]))).toBe(258n);
    expect(decodeMarketId(encodeMarketId(0xffff_ffff_ffff_ffffn))).toBe(0xffff_ffff_ffff_ffffn);
  });

  it("rejects data of the wrong length", () => {
    expectOracleError(() => decodeMarketId(new Uint8Array([1, 2, 3])), "InvalidCallback");
    expectOracleError(() => encodeMarketId(-1n), "InvalidCallback");
  });
});
