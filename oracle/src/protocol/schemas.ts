import { hexToBytes, type Hex } from "viem";
import { z } from "zod";
import { DECISION_STRATEGIES } from "../../../shared/types.js";
import { AmountSchema, ProtocolParametersSchema, TimestampSchema } from "../types.js";

// ─── Wire scalars ────────────────────────────────────────────────────────────

const HEX_BYTES = /^0x(?:[0-9a-fA-F]{2})*$/;

/** Opaque bytes: a Uint8Array in process, 0x-hex on the wire. */
export const BytesSchema = z.union([
  z.instanceof(Uint8Array),
  z
    .custom<Hex>((v) => typeof v === "string" && HEX_BYTES.test(v), {
      message: "Expected 0x-prefixed hex bytes",
    })
    .transform((hex) => hexToBytes(hex)),
]);

const QueryIdSchema = z.number().int().positive();
const ConfidenceSchema = z.number().int().min(0).max(100);
const StrategySchema = z.enum(DECISION_STRATEGIES);
const VotingModeSchema = z.enum(["direct", "commitReveal"]);

const RegistrationFields = {
  stake: AmountSchema,
  name: z.string().optional(),
  metadataUrl: z.string().optional(),
};

const QueryFields = {
  description: z.string(),
  outcomes: z.array(z.string()),
  strategy: StrategySchema,
  votingMode: VotingModeSchema.optional(),
  minVotes: z.number().int().optional(),
  rewardAmount: AmountSchema,
  deadline: TimestampSchema.optional(),
  durationSecs: z.number().int().optional(),
};

// ─── Voter payloads (operations and cross-chain messages) ────────────────────

const RegisterVoter = z.object({ type: z.literal("RegisterVoter"), ...RegistrationFields });
const UpdateStake = z.object({ type: z.literal("UpdateStake"), additionalStake: AmountSchema });
const WithdrawStake = z.object({ type: z.literal("WithdrawStake"), amount: AmountSchema });
const DeregisterVoter = z.object({ type: z.literal("DeregisterVoter") });
const SubmitVote = z.object({
  type: z.literal("SubmitVote"),
  queryId: QueryIdSchema,
  value: z.union([z.string(), z.number().int().nonnegative()]),
  confidence: ConfidenceSchema.optional(),
});
const CommitVote = z.object({
  type: z.literal("CommitVote"),
  queryId: QueryIdSchema,
  commitment: z.string(),
});
const RevealVote = z.object({
  type: z.literal("RevealVote"),
  queryId: QueryIdSchema,
  value: z.string(),
  salt: z.string(),
  confidence: ConfidenceSchema.optional(),
});
const ClaimRewards = z.object({ type: z.literal("ClaimRewards") });

// ─── Operations ──────────────────────────────────────────────────────────────

export const OperationSchema = z.discriminatedUnion("type", [
  RegisterVoter,
  z.object({
    type: z.literal("RegisterVoterFor"),
    voterAddress: z.string().min(1),
    ...RegistrationFields,
  }),
  UpdateStake,
  WithdrawStake,
  DeregisterVoter,
  z.object({ type: z.literal("CreateQuery"), ...QueryFields }),
  z.object({
    type: z.literal("CreateQueryWithCallback"),
    ...QueryFields,
    callbackChain: z.string(),
    callbackApp: z.string(),
    callbackData: BytesSchema,
  }),
  SubmitVote,
  CommitVote,
  RevealVote,
  z.object({ type: z.literal("ResolveQuery"), queryId: QueryIdSchema }),
  z.object({ type: z.literal("CancelQuery"), queryId: QueryIdSchema }),
  ClaimRewards,
  z.object({ type: z.literal("UpdateParameters"), params: ProtocolParametersSchema }),
  z.object({ type: z.literal("PauseProtocol") }),
  z.object({ type: z.literal("UnpauseProtocol") }),
  z.object({ type: z.literal("CheckExpiredQueries") }),
  z.object({ type: z.literal("ExpireQuery"), queryId: QueryIdSchema }),
  z.object({ type: z.literal("AutoResolveQueries") }),
]);

export type Operation = z.output<typeof OperationSchema>;
export type OperationInput = z.input<typeof OperationSchema>;
export type OperationType = Operation["type"];

// ─── Messages ────────────────────────────────────────────────────────────────

export const QueryResolutionCallbackSchema = z.object({
  type: z.literal("QueryResolutionCallback"),
  queryId: QueryIdSchema,
  resolvedOutcome: z.string(),
  resolvedAt: TimestampSchema,
  callbackData: BytesSchema,
});

export const MessageSchema = z.discriminatedUnion("type", [
  RegisterVoter,
  UpdateStake,
  WithdrawStake,
  DeregisterVoter,
  SubmitVote,
  CommitVote,
  RevealVote,
  ClaimRewards,
  z.object({
    type: z.literal("CreateQueryFromMarket"),
    marketId: AmountSchema,
    question: z.string(),
    outcomes: z.array(z.string()),
    deadline: TimestampSchema,
    callbackChain: z.string().min(1),
    callbackApp: z.string().min(1).optional(),
    callbackData: BytesSchema,
  }),
  QueryResolutionCallbackSchema,
]);

export type Message = z.output<typeof MessageSchema>;
export type MessageInput = z.input<typeof MessageSchema>;
