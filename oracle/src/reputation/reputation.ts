import type {
  ReputationStats,
  ReputationTier,
  Timestamp,
  Voter,
} from "../../../shared/types.js";
import { BPS, INITIAL_REPUTATION, MICROS_PER_DAY } from "../constants.js";

// ─── Score ───────────────────────────────────────────────────────────────────

/**
 * Reputation = accuracy % + participation bonus (1 point per 10 votes, at
 * most 10), capped at 100 and floored to an integer.
 *
 * Computed over a common denominator of 10 × total so no fractional value is
 * ever rounded before the final floor:
 *   correct/total × 100 + min(100, total)/10
 *   = (correct × 1000 + min(100, total) × total) / (10 × total)
 */
export function calculateReputation(
  voter: Pick<Voter, "totalVotes" | "correctVotes">,
): number {
  const total = BigInt(voter.totalVotes);
  if (total === 0n) return INITIAL_REPUTATION;

  const correct = BigInt(voter.correctVotes);
  const capped = total < 100n ? total : 100n;
  const score = (correct * 1000n + capped * total) / (10n * total);

  return Number(score > 100n ? 100n : score);
}

const DECAY_AFTER_DAYS = 30n;
const DECAY_MIN_VOTES = 10;

/** Voters registered for over 30 days with fewer than 10 votes lose 10%. */
export function reputationWithDecay(voter: Voter, now: Timestamp): number {
  const base = calculateReputation(voter);
  const age = now > voter.registeredAt ? now - voter.registeredAt : 0n;
  const days = age / MICROS_PER_DAY;

  if (days > DECAY_AFTER_DAYS && voter.totalVotes < DECAY_MIN_VOTES) {
    return Math.floor((base * 9) / 10);
  }
  return base;
}

// ─── Tiers & weights ─────────────────────────────────────────────────────────

export function reputationTier(reputation: number): ReputationTier {
  if (reputation <= 40) return "Novice";
  if (reputation <= 70) return "Intermediate";
  if (reputation <= 90) return "Expert";
  return "Master";
}

/** 0.5 + reputation/100 × 1.5, in basis points (5000–20000). */
export function reputationWeightBps(reputation: number): bigint {
  return 5_000n + 150n * BigInt(reputation);
}

/** 0.8 + reputation/100 × 0.4, in basis points (8000–12000). */
export function rewardMultiplierBps(reputation: number): bigint {
  return 8_000n + 40n * BigInt(reputation);
}

export function accuracyPercentage(
  voter: Pick<Voter, "totalVotes" | "correctVotes">,
): number {
  if (voter.totalVotes === 0) return 0;
  return (voter.correctVotes / voter.totalVotes) * 100;
}

/** Stake × reputation, used to rank voters. */
export function voterPower(voter: Pick<Voter, "stake" | "reputation">): bigint {
  return voter.stake * BigInt(voter.reputation);
}

export function reputationStats(voter: Voter, now: Timestamp): ReputationStats {
  return {
    reputation: voter.reputation,
    effectiveReputation: reputationWithDecay(voter, now),
    tier: reputationTier(voter.reputation),
    weight: Number(reputationWeightBps(voter.reputation)) / Number(BPS),
    totalVotes: voter.totalVotes,
    correctVotes: voter.correctVotes,
    accuracyPercentage: accuracyPercentage(voter),
    power: voterPower(voter),
  };
}
