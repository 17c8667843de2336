import { z } from "zod";
import type {
  Address,
  CallbackTarget,
  DecisionStrategy,
  ProtocolParameters,
  QueryStatus,
  Timestamp,
  VotingMode,
} from "../../shared/types.js";
import { invalidParameters } from "./errors.js";

// ─── Scalar schemas ──────────────────────────────────────────────────────────

// Amounts travel as decimal strings on the wire; numbers and bigints are
// accepted from in-process callers.
export const AmountSchema = z
  .union([
    z.bigint().nonnegative(),
    z.number().int().nonnegative(),
    z.string().regex(/^\d+$/),
  ])
  .transform((v) => BigInt(v));

export const TimestampSchema = AmountSchema;

// ─── Protocol parameters (validated on every update) ────────────────────────

export const ProtocolParametersSchema = z
  .object({
    minStake: AmountSchema.refine((v) => v > 0n, {
      message: "Minimum stake must be greater than zero",
    }),
    minVotesDefault: z.number().int().min(1).max(1000),
    defaultQueryDuration: z.number().int().min(60).max(31_536_000),
    rewardPercentage: z.number().int().min(0).max(10_000),
    slashPercentage: z.number().int().min(0).max(5_000),
    protocolFee: z.number().int().min(0).max(1_000),
  })
  .refine(
    (p) => p.rewardPercentage + p.slashPercentage + p.protocolFee <= 10_000,
    { message: "Total of reward, slash, and fee percentages exceeds 100%" },
  );

export type ProtocolParametersInput = z.input<typeof ProtocolParametersSchema>;

export function parseParameters(input: unknown): ProtocolParameters {
  const parsed = ProtocolParametersSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    throw invalidParameters(`${where}${issue?.message ?? "invalid protocol parameters"}`);
  }
  return parsed.data;
}

// ─── Query creation ──────────────────────────────────────────────────────────

export interface CreateQueryInput {
  description: string;
  outcomes: string[];
  strategy: DecisionStrategy;
  votingMode?: VotingMode;
  minVotes?: number;
  rewardAmount: bigint;
  deadline?: Timestamp;
  /** Seconds from now; ignored when an explicit deadline is given. */
  durationSecs?: number;
  callback?: CallbackTarget;
}

// ─── Consensus ───────────────────────────────────────────────────────────────

export interface OutcomeTally {
  outcome: string;
  index: number;
  weight: bigint;
  votes: number;
}

export interface ConsensusResult {
  outcome: string;
  outcomeIndex: number;
  /** Percentage with two decimals, floored. */
  confidence: number;
  tally: OutcomeTally[];
  correct: Map<Address, boolean>;
}

// ─── Settlement ──────────────────────────────────────────────────────────────

export interface VoterReward {
  voter: Address;
  gross: bigint;
  net: bigint;
}

export interface VoterSlash {
  voter: Address;
  amount: bigint;
  deactivated: boolean;
}

export interface SettlementReport {
  queryId: number;
  outcome: string;
  rewards: VoterReward[];
  slashes: VoterSlash[];
  feeCollected: bigint;
  totalSlashed: bigint;
}

export interface ResolutionOutcome {
  queryId: number;
  status: Extract<QueryStatus, "Resolved" | "Expired">;
  consensus?: ConsensusResult;
  settlement?: SettlementReport;
}

// ─── Operation responses ─────────────────────────────────────────────────────

export type ResponseData = Record<string, string | number | boolean | null>;

export type OperationResponse =
  | { success: true; message: string; data?: ResponseData }
  | { success: false; code: number; error: string; message: string };
