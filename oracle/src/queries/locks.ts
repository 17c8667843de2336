import type { Query, Voter } from "../../../shared/types.js";
import { BPS, VOTE_LOCK_BPS } from "../constants.js";
import { VoterError, invariant } from "../errors.js";
import { availableStake, lockStake, unlockStake } from "../registry/voters.js";
import type { OracleRuntime } from "../runtime.js";

/**
 * Locks a tenth of the voter's free stake (at least 1) behind a vote and
 * returns the amount, which the vote or commit carries until settlement.
 */
export function lockForVote(voter: Voter): bigint {
  const free = availableStake(voter);
  if (free === 0n) {
    throw new VoterError(
      "InsufficientStake",
      `Voter ${voter.address} has no free stake to lock (locked ${voter.lockedStake} of ${voter.stake})`,
    );
  }
  const share = (free * VOTE_LOCK_BPS) / BPS;
  const amount = share > 0n ? share : 1n;
  lockStake(voter, amount);
  return amount;
}

/** Releases every lock held by votes and unrevealed commits on the query. */
export function releaseQueryLocks(runtime: OracleRuntime, query: Query): bigint {
  let released = 0n;

  const release = (address: string, amount: bigint): void => {
    const voter = runtime.state.voters.get(address);
    invariant(voter !== undefined, `voter ${address} holds a lock on query ${query.id} but is not registered`);
    unlockStake(voter, amount);
    released += amount;
  };

  for (const vote of query.votes.values()) release(vote.voter, vote.lockedAmount);
  for (const commit of query.commits.values()) {
    if (!commit.revealed) release(commit.voter, commit.lockedAmount);
  }
  return released;
}
