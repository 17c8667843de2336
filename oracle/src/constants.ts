import type { ProtocolParameters } from "../../shared/types.js";

// ─── Time ────────────────────────────────────────────────────────────────────

export const MICROS_PER_SECOND = 1_000_000n;
export const MICROS_PER_DAY = 86_400n * MICROS_PER_SECOND;

/** Furthest a query deadline may sit from its creation time. */
export const MAX_QUERY_HORIZON = 365n * MICROS_PER_DAY;

// ─── Limits ──────────────────────────────────────────────────────────────────

export const MAX_DESCRIPTION_LENGTH = 1000;
export const MIN_OUTCOMES = 2;
export const MAX_OUTCOMES = 100;
export const MAX_OUTCOME_LENGTH = 200;
export const MAX_NAME_LENGTH = 100;
export const MAX_METADATA_URL_LENGTH = 500;
export const MAX_CONFIDENCE = 100;

export const BPS = 10_000n;

/** Share of a voter's free stake locked behind each vote. */
export const VOTE_LOCK_BPS = 1_000n;

export const INITIAL_REPUTATION = 50;

export const DEFAULT_PARAMETERS: ProtocolParameters = {
  minStake: 100n,
  minVotesDefault: 3,
  defaultQueryDuration: 3600,
  rewardPercentage: 1000,
  slashPercentage: 500,
  protocolFee: 100,
};

// ─── Error codes ─────────────────────────────────────────────────────────────
// 1000s query, 2000s voter, 3000s vote, 4000s protocol/admin,
// 5000s system/callback, 6000s voter-side application.

export const ErrorCode = {
  QueryNotFound: 1001,
  InvalidOutcomes: 1002,
  InvalidQuery: 1003,
  QueryNotActive: 1004,
  AlreadyResolved: 1005,
  NotEnoughVotes: 1006,
  DeadlineNotReached: 1007,

  NotRegistered: 2001,
  InsufficientStake: 2002,
  AlreadyRegistered: 2003,
  VoterInactive: 2004,
  StakeLocked: 2005,
  NoPendingRewards: 2006,
  PendingRewardsOutstanding: 2007,

  CommitmentNotFound: 3001,
  InvalidReveal: 3002,
  AlreadyVoted: 3003,
  VotingPhaseClosed: 3004,
  InvalidVoteValue: 3005,

  ProtocolPaused: 4001,
  Unauthorized: 4002,
  InvalidParameters: 4003,

  StateCorruption: 5001,
  CallbackFailed: 5002,
  MaxRetriesExceeded: 5003,
  InvalidCallback: 5004,
  DuplicateCallback: 5005,

  VoteNotFound: 6004,
  InvalidOutcomeIndex: 6006,
  InvalidConfidence: 6007,
} as const;

export type ErrorName = keyof typeof ErrorCode;
