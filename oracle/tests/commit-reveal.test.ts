import { describe, it, expect } from "vitest";
import {
  MICROS_PER_SECOND,
  commitVote,
  computeCommitment,
  createQuery,
  getQuery,
  getVoter,
  isCommitment,
  resolveQuery,
  revealVote,
  submitVote,
  type CreateQueryInput,
} from "../src/index.js";
import { T0, expectOracleError, registerAll, setup } from "./helpers.js";

const SEALED: CreateQueryInput = {
  description: "Which release candidate passes the audit?",
  outcomes: ["rc1", "rc2"],
  strategy: "Majority",
  votingMode: "commitReveal",
  minVotes: 2,
  rewardAmount: 600n,
};

function sealedQuery() {
  const harness = setup();
  registerAll(harness.runtime, { v1: 1000n, v2: 1000n, v3: 1000n });
  createQuery(harness.runtime, "creator", SEALED);
  return harness;
}

describe("computeCommitment", () => {
  it("produces a 32-byte lower-case hex digest", () => {
    const digest = computeCommitment("rc1", "salt-1");
    expect(digest).toMatch(/^0x[0-9a-f]{64}$/);
    expect(isCommitment(digest)).toBe(true);
    expect(isCommitment("0x1234")).toBe(false);
  });

  it("binds value, salt and confidence", () => {
    const base = computeCommitment("rc1", "salt-1");
    expect(computeCommitment("rc1", "salt-1")).toBe(base);
    expect(computeCommitment("rc2", "salt-1")).not.toBe(base);
    expect(computeCommitment("rc1", "salt-2")).not.toBe(base);
    expect(computeCommitment("rc1", "salt-1", 80)).not.toBe(base);
  });
});

describe("commit-reveal voting", () => {
  it("splits the voting window in half", () => {
    const { runtime } = sealedQuery();
    const query = getQuery(runtime, 1);
    expect(query.commitDeadline).toBe(T0 + 1800n * MICROS_PER_SECOND);
    expect(query.revealDeadline).toBe(T0 + 3600n * MICROS_PER_SECOND);
    expect(query.deadline).toBe(query.revealDeadline);
  });

  it("accepts commits only during the commit phase", () => {
    const { runtime, clock } = sealedQuery();
    const commit = commitVote(runtime, "v1", 1, computeCommitment("rc1", "salt-1"));
    expect(commit.lockedAmount).toBe(100n);
    expect(getVoter(runtime, "v1").totalVotes).toBe(1);

    expectOracleError(() => commitVote(runtime, "v1", 1, computeCommitment("rc2", "x")), "AlreadyVoted");
    expectOracleError(() => commitVote(runtime, "v2", 1, "0x1234"), "InvalidParameters");
    expectOracleError(() => submitVote(runtime, "v2", 1, "rc1"), "VotingPhaseClosed");

    clock.advance(1800);
    expectOracleError(
      () => commitVote(runtime, "v2", 1, computeCommitment("rc1", "salt-2")),
      "VotingPhaseClosed",
    );
  });

  it("accepts reveals only during the reveal phase", () => {
    const { runtime, clock } = sealedQuery();
    commitVote(runtime, "v1", 1, computeCommitment("rc1", "salt-1"));
    expectOracleError(() => revealVote(runtime, "v1", 1, "rc1", "salt-1"), "VotingPhaseClosed");

    clock.advance(3600);
    expectOracleError(() => revealVote(runtime, "v1", 1, "rc1", "salt-1"), "VotingPhaseClosed");
  });

  it("checks the reveal against the commitment", () => {
    const { runtime, clock } = sealedQuery();
    commitVote(runtime, "v1", 1, computeCommitment("rc1", "salt-1", 80));
    clock.advance(1800);

    expectOracleError(() => revealVote(runtime, "v2", 1, "rc1", "salt-1"), "CommitmentNotFound");
    expectOracleError(() => revealVote(runtime, "v1", 1, "rc1", "wrong-salt", 80), "InvalidReveal");
    expectOracleError(() => revealVote(runtime, "v1", 1, "rc1", "salt-1"), "InvalidReveal");

    const vote = revealVote(runtime, "v1", 1, "rc1", "salt-1", 80);
    expect(vote).toMatchObject({ value: "rc1", outcomeIndex: 0, confidence: 80, lockedAmount: 100n, salt: "salt-1" });
    expect(getQuery(runtime, 1).votes.size).toBe(1);

    expectOracleError(() => revealVote(runtime, "v1", 1, "rc1", "salt-1", 80), "AlreadyVoted");
  });

  it("releases unrevealed commits at settlement without slashing", () => {
    const { runtime, clock } = sealedQuery();
    commitVote(runtime, "v1", 1, computeCommitment("rc2", "a"));
    commitVote(runtime, "v2", 1, computeCommitment("rc2", "b"));
    commitVote(runtime, "v3", 1, computeCommitment("rc1", "c"));
    clock.advance(1800);
    revealVote(runtime, "v1", 1, "rc2", "a");
    revealVote(runtime, "v2", 1, "rc2", "b");
    clock.advance(1800);

    const outcome = resolveQuery(runtime, 1);
    expect(outcome.status).toBe("Resolved");
    expect(outcome.consensus?.outcome).toBe("rc2");
    expect(outcome.settlement?.slashes).toEqual([]);

    const silent = getVoter(runtime, "v3");
    expect(silent.lockedStake).toBe(0n);
    expect(silent.stake).toBe(1000n);
    expect(silent.totalVotes).toBe(1);
    expect(silent.correctVotes).toBe(0);
    expect(silent.reputation).toBe(0);
  });
});
