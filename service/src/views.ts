import { bytesToHex } from "viem";
import { reputationStats } from "../../oracle/src/index.js";
import type { OutboundMessage, Query, Timestamp, Voter } from "../../shared/types.js";

// ─── JSON views (bigint → decimal string, bytes → 0x-hex) ───────────────────

export function queryView(query: Query) {
  return {
    id: query.id,
    description: query.description,
    outcomes: query.outcomes,
    strategy: query.strategy,
    votingMode: query.votingMode,
    minVotes: query.minVotes,
    rewardAmount: query.rewardAmount.toString(),
    creator: query.creator,
    createdAt: query.createdAt.toString(),
    deadline: query.deadline.toString(),
    commitDeadline: query.commitDeadline.toString(),
    revealDeadline: query.revealDeadline.toString(),
    status: query.status,
    result: query.result ?? null,
    confidence: query.confidence ?? null,
    resolvedAt: query.resolvedAt?.toString() ?? null,
    voteCount: query.votes.size,
    commitCount: query.commits.size,
    votes: [...query.votes.values()].map((vote) => ({
      voter: vote.voter,
      value: vote.value,
      outcomeIndex: vote.outcomeIndex,
      confidence: vote.confidence ?? null,
      lockedAmount: vote.lockedAmount.toString(),
    })),
  };
}

export function voterView(voter: Voter, pendingRewards: bigint, now: Timestamp) {
  const stats = reputationStats(voter, now);
  return {
    address: voter.address,
    name: voter.name ?? null,
    metadataUrl: voter.metadataUrl ?? null,
    stake: voter.stake.toString(),
    lockedStake: voter.lockedStake.toString(),
    isActive: voter.isActive,
    registeredAt: voter.registeredAt.toString(),
    pendingRewards: pendingRewards.toString(),
    stats: { ...stats, power: stats.power.toString() },
  };
}

export function outboundView(message: OutboundMessage) {
  return {
    destination: message.destination,
    app: message.app,
    callback: {
      type: "QueryResolutionCallback" as const,
      queryId: message.callback.queryId,
      resolvedOutcome: message.callback.resolvedOutcome,
      resolvedAt: message.callback.resolvedAt.toString(),
      callbackData: bytesToHex(message.callback.callbackData),
    },
  };
}
