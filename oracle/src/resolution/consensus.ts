import type { Address, Query, Vote, Voter } from "../../../shared/types.js";
import { BPS } from "../constants.js";
import { invariant } from "../errors.js";
import { parseNumericOutcome } from "../queries/validate.js";
import { reputationWeightBps } from "../reputation/reputation.js";
import type { ConsensusResult, OutcomeTally } from "../types.js";

type ConsensusInput = Pick<Query, "id" | "outcomes" | "strategy" | "votes">;
type VoterLookup = ReadonlyMap<Address, Voter>;

// ─── Resolution ──────────────────────────────────────────────────────────────

export function computeConsensus(query: ConsensusInput, voters: VoterLookup): ConsensusResult {
  invariant(query.votes.size > 0, `consensus requested for query ${query.id} with no votes`);
  const votes = [...query.votes.values()];

  switch (query.strategy) {
    case "Majority":
      return weightedPlurality(query, votes, () => 1n);
    case "WeightedByStake":
      return weightedPlurality(query, votes, (vote) => vote.lockedAmount);
    case "WeightedByReputation":
      return weightedPlurality(query, votes, (vote) =>
        reputationWeightBps(lookupVoter(voters, vote.voter).reputation),
      );
    case "Median":
      return median(query, votes);
    default: {
      const unreachable: never = query.strategy;
      throw new Error(`Unknown strategy: ${String(unreachable)}`);
    }
  }
}

/** floor(part × 10000 / whole) / 100: a percentage with two decimals, floored. */
export function confidencePercent(part: bigint, whole: bigint): number {
  if (whole === 0n) return 0;
  return Number((part * BPS) / whole) / 100;
}

// ─── Plurality (Majority, WeightedByStake, WeightedByReputation) ────────────

function weightedPlurality(
  query: ConsensusInput,
  votes: Vote[],
  weightOf: (vote: Vote) => bigint,
): ConsensusResult {
  const tally = emptyTally(query.outcomes);
  let total = 0n;

  for (const vote of votes) {
    const entry = tally[vote.outcomeIndex];
    invariant(entry !== undefined, `vote by ${vote.voter} names outcome ${vote.outcomeIndex}`);
    const weight = weightOf(vote);
    entry.weight += weight;
    entry.votes += 1;
    total += weight;
  }

  // Strictly greater keeps the lowest index on a tie.
  let winner = tally[0];
  invariant(winner !== undefined, `query ${query.id} has no outcomes`);
  for (const entry of tally) {
    if (entry.weight > winner.weight) winner = entry;
  }

  const correct = new Map<Address, boolean>();
  for (const vote of votes) correct.set(vote.voter, vote.outcomeIndex === winner.index);

  return {
    outcome: winner.outcome,
    outcomeIndex: winner.index,
    confidence: confidencePercent(winner.weight, total),
    tally,
    correct,
  };
}

// ─── Median ──────────────────────────────────────────────────────────────────

function median(query: ConsensusInput, votes: Vote[]): ConsensusResult {
  const numeric = votes.map((vote) => {
    const value = parseNumericOutcome(vote.value);
    invariant(value !== undefined, `median vote "${vote.value}" on query ${query.id} is not numeric`);
    return { vote, value };
  });
  numeric.sort((a, b) => a.value - b.value || a.vote.outcomeIndex - b.vote.outcomeIndex);

  // Even counts take the lower of the two middle values.
  const middle = numeric[Math.floor((numeric.length - 1) / 2)];
  invariant(middle !== undefined, `median of query ${query.id} is empty`);

  const tally = emptyTally(query.outcomes);
  for (const { vote } of numeric) {
    const entry = tally[vote.outcomeIndex];
    invariant(entry !== undefined, `vote by ${vote.voter} names outcome ${vote.outcomeIndex}`);
    entry.weight += 1n;
    entry.votes += 1;
  }

  const correct = new Map<Address, boolean>();
  let agreeing = 0n;
  for (const { vote, value } of numeric) {
    const matches = value === middle.value;
    correct.set(vote.voter, matches);
    if (matches) agreeing += 1n;
  }

  return {
    outcome: middle.vote.value,
    outcomeIndex: middle.vote.outcomeIndex,
    confidence: confidencePercent(agreeing, BigInt(numeric.length)),
    tally,
    correct,
  };
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

function emptyTally(outcomes: string[]): OutcomeTally[] {
  return outcomes.map((outcome, index) => ({ outcome, index, weight: 0n, votes: 0 }));
}

function lookupVoter(voters: VoterLookup, address: Address): Voter {
  const voter = voters.get(address);
  invariant(voter !== undefined, `vote cast by unregistered voter ${address}`);
  return voter;
}
