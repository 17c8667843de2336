import type { Address, Query } from "../../../shared/types.js";
import { requireNotPaused } from "../admin/admin.js";
import { BPS } from "../constants.js";
import { VoterError, invariant } from "../errors.js";
import { releaseQueryLocks } from "../queries/locks.js";
import { getVoter } from "../registry/voters.js";
import { calculateReputation, rewardMultiplierBps } from "../reputation/reputation.js";
import type { OracleRuntime } from "../runtime.js";
import type {
  ConsensusResult,
  SettlementReport,
  VoterReward,
  VoterSlash,
} from "../types.js";

/**
 * Rewards and slashes for a query that has just become Resolved. Runs exactly
 * once per query, in the same operation as the resolution.
 *
 * All amounts are integer basis-point arithmetic, truncated at each step:
 *   base  = rewardAmount / correctCount
 *   gross = base × (8000 + 40 × reputation) / 10000
 *   net   = gross × (10000 − protocolFee) / 10000
 *   slash = stake × slashPercentage / 10000
 */
export function settleQuery(
  runtime: OracleRuntime,
  query: Query,
  consensus: ConsensusResult,
): SettlementReport {
  invariant(query.status === "Resolved", `settlement of query ${query.id} in status ${query.status}`);
  const { state } = runtime;
  const { protocolFee, slashPercentage, minStake } = state.parameters;

  releaseQueryLocks(runtime, query);

  // ─── Reputation ────────────────────────────────────────────────────────────
  // totalVotes was counted when each vote or commit was cast.

  const correctVoters: Address[] = [];
  const incorrectVoters: Address[] = [];
  for (const [address, isCorrect] of consensus.correct) {
    const voter = getVoter(runtime, address);
    if (isCorrect) {
      voter.correctVotes += 1;
      correctVoters.push(address);
    } else {
      incorrectVoters.push(address);
    }
    voter.reputation = calculateReputation(voter);
  }
  for (const commit of query.commits.values()) {
    if (commit.revealed) continue;
    const voter = getVoter(runtime, commit.voter);
    voter.reputation = calculateReputation(voter);
  }

  // ─── Rewards ───────────────────────────────────────────────────────────────

  const rewards: VoterReward[] = [];
  let feeCollected = 0n;
  if (correctVoters.length > 0) {
    const base = query.rewardAmount / BigInt(correctVoters.length);
    for (const address of correctVoters) {
      const voter = getVoter(runtime, address);
      const gross = (base * rewardMultiplierBps(voter.reputation)) / BPS;
      const net = (gross * (BPS - BigInt(protocolFee))) / BPS;
      if (net > 0n) {
        state.pendingRewards.set(address, (state.pendingRewards.get(address) ?? 0n) + net);
      }
      feeCollected += gross - net;
      rewards.push({ voter: address, gross, net });
    }
  }

  // ─── Slashing ──────────────────────────────────────────────────────────────

  const slashes: VoterSlash[] = [];
  let totalSlashed = 0n;
  for (const address of incorrectVoters) {
    const voter = getVoter(runtime, address);
    const amount = (voter.stake * BigInt(slashPercentage)) / BPS;

    // lockedStake keeps tracking the open votes' lockedAmounts even when it
    // now exceeds stake; availableStake reads that as nothing free.
    voter.stake -= amount;
    state.totalStake -= amount;
    totalSlashed += amount;

    const deactivated = voter.isActive && voter.stake < minStake;
    if (deactivated) voter.isActive = false;
    slashes.push({ voter: address, amount, deactivated });

    if (amount > 0n) {
      runtime.log(
        `[settlement] Voter ${address} slashed ${amount} on query ${query.id}${deactivated ? " and deactivated" : ""}`,
      );
    }
  }

  state.treasury += feeCollected + totalSlashed;
  runtime.log(
    `[settlement] Query ${query.id}: ${rewards.length} rewarded, ${slashes.length} slashed, fee ${feeCollected}, slashed ${totalSlashed}`,
  );

  return {
    queryId: query.id,
    outcome: consensus.outcome,
    rewards,
    slashes,
    feeCollected,
    totalSlashed,
  };
}

// ─── Claims ──────────────────────────────────────────────────────────────────

export function pendingRewards(runtime: OracleRuntime, address: Address): bigint {
  return runtime.state.pendingRewards.get(address) ?? 0n;
}

/** Pays out the voter's whole pending balance and returns the amount. */
export function claimRewards(runtime: OracleRuntime, address: Address): bigint {
  requireNotPaused(runtime);
  getVoter(runtime, address);

  const amount = pendingRewards(runtime, address);
  if (amount === 0n) {
    throw new VoterError("NoPendingRewards", `No pending rewards for ${address}`);
  }

  runtime.state.pendingRewards.delete(address);
  runtime.state.totalRewardsDistributed += amount;
  runtime.log(`[settlement] Voter ${address} claimed ${amount}`);
  return amount;
}
