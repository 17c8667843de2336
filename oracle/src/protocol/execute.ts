import type { Address } from "../../../shared/types.js";
import { pauseProtocol, unpauseProtocol, updateParameters } from "../admin/admin.js";
import { CallbackError, OracleError } from "../errors.js";
import {
  cancelQuery,
  commitVote,
  createQuery,
  createQueryFromMarket,
  createQueryWithCallback,
  resolveQuery,
  revealVote,
  submitVote,
} from "../queries/ledger.js";
import {
  autoResolveQueries,
  checkExpiredQueries,
  expireQuery,
} from "../queries/maintenance.js";
import {
  deregisterVoter,
  registerVoter,
  registerVoterFor,
  updateStake,
  withdrawStake,
} from "../registry/voters.js";
import type { OracleRuntime } from "../runtime.js";
import { claimRewards } from "../settlement/settle.js";
import type { CreateQueryInput, OperationResponse, ResponseData } from "../types.js";
import { DEFAULT_MARKET_APP } from "./callback.js";
import type { Message, Operation } from "./schemas.js";

interface HandlerResult {
  message: string;
  data?: ResponseData;
}

/** Where a cross-chain message came from, as vouched for by the transport. */
export interface MessageOrigin {
  chain: string;
  sender: Address;
}

// ─── All-or-nothing dispatch ─────────────────────────────────────────────────

/**
 * Runs one handler against a snapshot of the state. Any failure restores the
 * snapshot, so a rejected operation leaves nothing behind. Oracle errors
 * become error responses; anything else is a bug and propagates.
 */
export function runAtomically(runtime: OracleRuntime, handler: () => HandlerResult): OperationResponse {
  const snapshot = structuredClone(runtime.state);
  try {
    const result = handler();
    return result.data === undefined
      ? { success: true, message: result.message }
      : { success: true, message: result.message, data: result.data };
  } catch (err) {
    runtime.state = snapshot;
    if (err instanceof OracleError) {
      runtime.log(`[protocol] Rejected: ${err.errorName} (${err.message})`);
      return { success: false, code: err.code, error: err.errorName, message: err.message };
    }
    throw err;
  }
}

export function executeOperation(
  runtime: OracleRuntime,
  caller: Address,
  operation: Operation,
): OperationResponse {
  return runAtomically(runtime, () => applyOperation(runtime, caller, operation));
}

export function executeMessage(
  runtime: OracleRuntime,
  origin: MessageOrigin,
  message: Message,
): OperationResponse {
  return runAtomically(runtime, () => applyMessage(runtime, origin, message));
}

// ─── Voter payloads ──────────────────────────────────────────────────────────

type VoterPayload = Extract<
  Operation,
  {
    type:
      | "RegisterVoter"
      | "UpdateStake"
      | "WithdrawStake"
      | "DeregisterVoter"
      | "SubmitVote"
      | "CommitVote"
      | "RevealVote"
      | "ClaimRewards";
  }
>;

function applyVoterPayload(
  runtime: OracleRuntime,
  caller: Address,
  payload: VoterPayload,
): HandlerResult {
  switch (payload.type) {
    case "RegisterVoter": {
      const voter = registerVoter(runtime, caller, payload);
      return {
        message: "Voter registered successfully",
        data: { voter: voter.address, stake: voter.stake.toString(), reputation: voter.reputation },
      };
    }
    case "UpdateStake": {
      const voter = updateStake(runtime, caller, payload.additionalStake);
      return {
        message: "Stake updated successfully",
        data: { voter: voter.address, stake: voter.stake.toString(), isActive: voter.isActive },
      };
    }
    case "WithdrawStake": {
      const voter = withdrawStake(runtime, caller, payload.amount);
      return {
        message: "Stake withdrawn successfully",
        data: { withdrawn: payload.amount.toString(), stake: voter.stake.toString() },
      };
    }
    case "DeregisterVoter": {
      const returned = deregisterVoter(runtime, caller);
      return {
        message: "Voter deregistered successfully",
        data: { returnedStake: returned.toString() },
      };
    }
    case "SubmitVote": {
      const vote = submitVote(runtime, caller, payload.queryId, payload.value, payload.confidence);
      return {
        message: "Vote submitted successfully",
        data: { queryId: payload.queryId, value: vote.value, lockedAmount: vote.lockedAmount.toString() },
      };
    }
    case "CommitVote": {
      const commit = commitVote(runtime, caller, payload.queryId, payload.commitment);
      return {
        message: "Vote committed successfully",
        data: { queryId: payload.queryId, lockedAmount: commit.lockedAmount.toString() },
      };
    }
    case "RevealVote": {
      const vote = revealVote(
        runtime,
        caller,
        payload.queryId,
        payload.value,
        payload.salt,
        payload.confidence,
      );
      return {
        message: "Vote revealed successfully",
        data: { queryId: payload.queryId, value: vote.value },
      };
    }
    case "ClaimRewards": {
      const claimed = claimRewards(runtime, caller);
      return { message: "Rewards claimed successfully", data: { claimed: claimed.toString() } };
    }
  }
}

// ─── Operations ──────────────────────────────────────────────────────────────

function toQueryInput(
  payload: Extract<Operation, { type: "CreateQuery" | "CreateQueryWithCallback" }>,
): CreateQueryInput {
  return {
    description: payload.description,
    outcomes: payload.outcomes,
    strategy: payload.strategy,
    votingMode: payload.votingMode,
    minVotes: payload.minVotes,
    rewardAmount: payload.rewardAmount,
    deadline: payload.deadline,
    durationSecs: payload.durationSecs,
  };
}

function applyOperation(runtime: OracleRuntime, caller: Address, op: Operation): HandlerResult {
  switch (op.type) {
    case "RegisterVoter":
    case "UpdateStake":
    case "WithdrawStake":
    case "DeregisterVoter":
    case "SubmitVote":
    case "CommitVote":
    case "RevealVote":
    case "ClaimRewards":
      return applyVoterPayload(runtime, caller, op);

    case "RegisterVoterFor": {
      const voter = registerVoterFor(runtime, caller, op.voterAddress, op);
      return {
        message: "Voter registered successfully",
        data: { voter: voter.address, stake: voter.stake.toString(), reputation: voter.reputation },
      };
    }
    case "CreateQuery": {
      const query = createQuery(runtime, caller, toQueryInput(op));
      return {
        message: "Query created successfully",
        data: { queryId: query.id, deadline: query.deadline.toString() },
      };
    }
    case "CreateQueryWithCallback": {
      const query = createQueryWithCallback(runtime, caller, toQueryInput(op), {
        chain: op.callbackChain,
        app: op.callbackApp,
        data: op.callbackData,
      });
      return {
        message: "Query created successfully",
        data: { queryId: query.id, deadline: query.deadline.toString() },
      };
    }
    case "ResolveQuery": {
      const outcome = resolveQuery(runtime, op.queryId);
      if (outcome.status === "Expired" || !outcome.consensus) {
        return {
          message: `Query ${op.queryId} expired: not enough votes`,
          data: { queryId: op.queryId, status: "Expired" },
        };
      }
      return {
        message: "Query resolved successfully",
        data: {
          queryId: op.queryId,
          status: "Resolved",
          result: outcome.consensus.outcome,
          confidence: outcome.consensus.confidence,
        },
      };
    }
    case "CancelQuery": {
      cancelQuery(runtime, caller, op.queryId);
      return {
        message: "Query cancelled successfully",
        data: { queryId: op.queryId, status: "Cancelled" },
      };
    }
    case "UpdateParameters":
      updateParameters(runtime, caller, op.params);
      return { message: "Protocol parameters updated successfully" };
    case "PauseProtocol":
      pauseProtocol(runtime, caller);
      return { message: "Protocol paused successfully" };
    case "UnpauseProtocol":
      unpauseProtocol(runtime, caller);
      return { message: "Protocol unpaused successfully" };
    case "CheckExpiredQueries": {
      const expired = checkExpiredQueries(runtime);
      return {
        message: `Expired ${expired.length} queries`,
        data: { expiredCount: expired.length, expiredIds: expired.join(",") },
      };
    }
    case "ExpireQuery":
      expireQuery(runtime, caller, op.queryId);
      return {
        message: "Query expired successfully",
        data: { queryId: op.queryId, status: "Expired" },
      };
    case "AutoResolveQueries": {
      const resolved = autoResolveQueries(runtime);
      return {
        message: `Auto-resolved ${resolved.length} queries`,
        data: { resolvedCount: resolved.length, resolvedIds: resolved.map((r) => r.queryId).join(",") },
      };
    }
  }
}

// ─── Messages ────────────────────────────────────────────────────────────────

function applyMessage(runtime: OracleRuntime, origin: MessageOrigin, msg: Message): HandlerResult {
  switch (msg.type) {
    case "CreateQueryFromMarket": {
      const query = createQueryFromMarket(runtime, origin.chain, {
        marketId: msg.marketId,
        question: msg.question,
        outcomes: msg.outcomes,
        deadline: msg.deadline,
        callbackChain: msg.callbackChain,
        callbackApp: msg.callbackApp ?? DEFAULT_MARKET_APP,
        callbackData: msg.callbackData,
      });
      return {
        message: "Query created from market",
        data: { queryId: query.id, marketId: msg.marketId.toString() },
      };
    }
    case "QueryResolutionCallback":
      throw new CallbackError(
        "InvalidCallback",
        "Registry does not handle QueryResolutionCallback",
      );
    default:
      return applyVoterPayload(runtime, origin.sender, msg);
  }
}
