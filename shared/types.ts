// ─── Registry state (voters, queries, votes) ────────────────────────────────

export type Address = string;

/** Microseconds since the Unix epoch. */
export type Timestamp = bigint;

export interface Voter {
  address: Address;
  stake: bigint;
  lockedStake: bigint;
  reputation: number;
  totalVotes: number;
  correctVotes: number;
  isActive: boolean;
  registeredAt: Timestamp;
  name?: string;
  metadataUrl?: string;
}

export interface ProtocolParameters {
  minStake: bigint;
  minVotesDefault: number;
  /** Seconds. */
  defaultQueryDuration: number;
  /** Basis points. */
  rewardPercentage: number;
  slashPercentage: number;
  protocolFee: number;
}

export const DECISION_STRATEGIES = [
  "Majority",
  "Median",
  "WeightedByStake",
  "WeightedByReputation",
] as const;

export type DecisionStrategy = (typeof DECISION_STRATEGIES)[number];

export type VotingMode = "direct" | "commitReveal";

export type QueryStatus = "Active" | "Resolved" | "Expired" | "Cancelled";

export interface Vote {
  voter: Address;
  value: string;
  outcomeIndex: number;
  confidence?: number;
  lockedAmount: bigint;
  timestamp: Timestamp;
  salt?: string;
}

export interface Commit {
  voter: Address;
  commitment: string;
  committedAt: Timestamp;
  lockedAmount: bigint;
  revealed: boolean;
}

export interface CallbackTarget {
  chain: string;
  app: string;
  data: Uint8Array;
}

export interface Query {
  id: number;
  description: string;
  outcomes: string[];
  strategy: DecisionStrategy;
  votingMode: VotingMode;
  minVotes: number;
  rewardAmount: bigint;
  creator: Address;
  createdAt: Timestamp;
  deadline: Timestamp;
  commitDeadline: Timestamp;
  revealDeadline: Timestamp;
  status: QueryStatus;
  result?: string;
  confidence?: number;
  resolvedAt?: Timestamp;
  votes: Map<Address, Vote>;
  commits: Map<Address, Commit>;
  callback?: CallbackTarget;
}

// ─── Derived views ───────────────────────────────────────────────────────────

export type ReputationTier = "Novice" | "Intermediate" | "Expert" | "Master";

export interface ReputationStats {
  reputation: number;
  effectiveReputation: number;
  tier: ReputationTier;
  /** Voting weight multiplier, 0.5–2.0. */
  weight: number;
  totalVotes: number;
  correctVotes: number;
  accuracyPercentage: number;
  power: bigint;
}

// ─── Cross-chain callback ────────────────────────────────────────────────────

export interface QueryResolutionCallback {
  queryId: number;
  resolvedOutcome: string;
  resolvedAt: Timestamp;
  callbackData: Uint8Array;
}

export interface OutboundMessage {
  destination: string;
  app: string;
  callback: QueryResolutionCallback;
}
