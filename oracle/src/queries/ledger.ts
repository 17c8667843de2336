import type {
  Address,
  CallbackTarget,
  Commit,
  Query,
  Timestamp,
  Vote,
} from "../../../shared/types.js";
import { requireAdmin, requireNotPaused } from "../admin/admin.js";
import { QueryError, VoteError, invalidParameters } from "../errors.js";
import { enqueueCallback } from "../protocol/callback.js";
import { getActiveVoter, voterCount } from "../registry/voters.js";
import { computeConsensus } from "../resolution/consensus.js";
import { hasQuorum, maxQuorum, validateQuorum } from "../resolution/quorum.js";
import type { OracleRuntime } from "../runtime.js";
import { settleQuery } from "../settlement/settle.js";
import type { CreateQueryInput, ResolutionOutcome } from "../types.js";
import { computeCommitment, isCommitment } from "./commit.js";
import { lockForVote, releaseQueryLocks } from "./locks.js";
import {
  deadlineFromDuration,
  resolveOutcome,
  validateConfidence,
  validateDeadline,
  validateDescription,
  validateOutcomes,
  validateStrategyOutcomes,
} from "./validate.js";

// ─── Lookups ─────────────────────────────────────────────────────────────────

export function getQuery(runtime: OracleRuntime, queryId: number): Query {
  const query = runtime.state.queries.get(queryId);
  if (!query) throw new QueryError("QueryNotFound", `Query ${queryId} not found`);
  return query;
}

export function activeQueries(runtime: OracleRuntime): Query[] {
  return [...runtime.state.queries.values()].filter((q) => q.status === "Active");
}

function requireActive(query: Query): void {
  if (query.status !== "Active") {
    throw new QueryError("QueryNotActive", `Query ${query.id} is ${query.status}`);
  }
}

/** Active and still inside its deadline. */
function requireOpen(runtime: OracleRuntime, query: Query): void {
  requireActive(query);
  if (runtime.now() >= query.deadline) {
    throw new QueryError("QueryNotActive", `Query ${query.id} deadline has passed`);
  }
}

// ─── Creation ────────────────────────────────────────────────────────────────

export function createQuery(
  runtime: OracleRuntime,
  creator: Address,
  input: CreateQueryInput,
): Query {
  requireNotPaused(runtime);
  if (input.rewardAmount <= 0n) {
    throw invalidParameters("Reward amount must be greater than zero");
  }
  return insertQuery(runtime, creator, input);
}

export function createQueryWithCallback(
  runtime: OracleRuntime,
  creator: Address,
  input: CreateQueryInput,
  callback: CallbackTarget,
): Query {
  requireNotPaused(runtime);
  if (callback.chain.length === 0 || callback.app.length === 0) {
    throw invalidParameters("Callback chain and application are required");
  }
  return createQuery(runtime, creator, { ...input, callback });
}

export interface MarketQueryRequest {
  marketId: bigint;
  question: string;
  outcomes: string[];
  deadline: Timestamp;
  callbackChain: string;
  callbackApp: string;
  callbackData: Uint8Array;
}

/**
 * A market chain asks for resolution. The query is free (no reward), always
 * Majority under commit-reveal, and answers to `callbackChain`.
 */
export function createQueryFromMarket(
  runtime: OracleRuntime,
  senderChain: string,
  request: MarketQueryRequest,
): Query {
  requireNotPaused(runtime);
  const count = voterCount(runtime);
  const minVotes = Math.max(
    1,
    Math.min(runtime.state.parameters.minVotesDefault, maxQuorum(count)),
  );

  const query = insertQuery(
    runtime,
    senderChain,
    {
      description: request.question,
      outcomes: request.outcomes,
      strategy: "Majority",
      votingMode: "commitReveal",
      minVotes,
      rewardAmount: 0n,
      deadline: request.deadline,
      callback: {
        chain: request.callbackChain,
        app: request.callbackApp,
        data: request.callbackData,
      },
    },
    false,
  );
  runtime.log(`[ledger] Query ${query.id} created for market ${request.marketId} on ${senderChain}`);
  return query;
}

function insertQuery(
  runtime: OracleRuntime,
  creator: Address,
  input: CreateQueryInput,
  checkQuorum = true,
): Query {
  validateDescription(input.description);
  validateOutcomes(input.outcomes);
  validateStrategyOutcomes(input.strategy, input.outcomes);

  const { state } = runtime;
  const now = runtime.now();

  let deadline: Timestamp;
  if (input.deadline !== undefined) {
    validateDeadline(input.deadline, now);
    deadline = input.deadline;
  } else {
    deadline = deadlineFromDuration(
      input.durationSecs ?? state.parameters.defaultQueryDuration,
      now,
    );
  }

  const minVotes = input.minVotes ?? state.parameters.minVotesDefault;
  if (checkQuorum) validateQuorum(minVotes, voterCount(runtime));

  const votingMode = input.votingMode ?? "direct";
  const commitDeadline = votingMode === "commitReveal" ? now + (deadline - now) / 2n : deadline;

  const query: Query = {
    id: state.nextQueryId,
    description: input.description,
    outcomes: [...input.outcomes],
    strategy: input.strategy,
    votingMode,
    minVotes,
    rewardAmount: input.rewardAmount,
    creator,
    createdAt: now,
    deadline,
    commitDeadline,
    revealDeadline: deadline,
    status: "Active",
    votes: new Map(),
    commits: new Map(),
    callback: input.callback,
  };

  state.queries.set(query.id, query);
  state.nextQueryId += 1;
  state.totalQueriesCreated += 1;
  runtime.log(
    `[ledger] Query ${query.id} created by ${creator}: ${query.strategy}/${votingMode}, ${query.outcomes.length} outcomes, minVotes ${minVotes}`,
  );
  return query;
}

// ─── Direct voting ───────────────────────────────────────────────────────────

export function submitVote(
  runtime: OracleRuntime,
  voterAddress: Address,
  queryId: number,
  value: string | number,
  confidence?: number,
): Vote {
  requireNotPaused(runtime);
  const query = getQuery(runtime, queryId);
  requireOpen(runtime, query);
  if (query.votingMode !== "direct") {
    throw new VoteError(
      "VotingPhaseClosed",
      `Query ${queryId} uses commit-reveal voting; commit a hash instead`,
    );
  }

  const voter = getActiveVoter(runtime, voterAddress);
  if (query.votes.has(voterAddress)) {
    throw new VoteError("AlreadyVoted", `Voter ${voterAddress} already voted on query ${queryId}`);
  }
  const outcome = resolveOutcome(query.outcomes, value);
  validateConfidence(confidence);

  const vote: Vote = {
    voter: voterAddress,
    value: outcome.value,
    outcomeIndex: outcome.index,
    confidence,
    lockedAmount: lockForVote(voter),
    timestamp: runtime.now(),
  };

  query.votes.set(voterAddress, vote);
  voter.totalVotes += 1;
  runtime.state.totalVotesSubmitted += 1;
  runtime.log(`[ledger] Vote on query ${queryId} by ${voterAddress}: "${vote.value}"`);
  return vote;
}

// ─── Commit-reveal voting ────────────────────────────────────────────────────
// Both phases live inside Active; only the clock decides which one is open.

function requireCommitReveal(query: Query): void {
  if (query.votingMode !== "commitReveal") {
    throw new VoteError("VotingPhaseClosed", `Query ${query.id} takes direct votes only`);
  }
}

export function commitVote(
  runtime: OracleRuntime,
  voterAddress: Address,
  queryId: number,
  commitment: string,
): Commit {
  requireNotPaused(runtime);
  const query = getQuery(runtime, queryId);
  requireActive(query);
  requireCommitReveal(query);

  const now = runtime.now();
  if (now >= query.commitDeadline) {
    throw new VoteError("VotingPhaseClosed", `Commit phase for query ${queryId} has ended`);
  }

  const voter = getActiveVoter(runtime, voterAddress);
  if (query.commits.has(voterAddress)) {
    throw new VoteError("AlreadyVoted", `Voter ${voterAddress} already committed on query ${queryId}`);
  }
  if (!isCommitment(commitment)) {
    throw invalidParameters("Commitment must be a 32-byte hex string");
  }

  const commit: Commit = {
    voter: voterAddress,
    commitment: commitment.toLowerCase(),
    committedAt: now,
    lockedAmount: lockForVote(voter),
    revealed: false,
  };

  query.commits.set(voterAddress, commit);
  voter.totalVotes += 1;
  runtime.state.totalVotesSubmitted += 1;
  runtime.log(`[ledger] Commit on query ${queryId} by ${voterAddress}`);
  return commit;
}

export function revealVote(
  runtime: OracleRuntime,
  voterAddress: Address,
  queryId: number,
  value: string,
  salt: string,
  confidence?: number,
): Vote {
  requireNotPaused(runtime);
  const query = getQuery(runtime, queryId);
  requireActive(query);
  requireCommitReveal(query);

  const now = runtime.now();
  if (now < query.commitDeadline) {
    throw new VoteError("VotingPhaseClosed", `Reveal phase for query ${queryId} has not started`);
  }
  if (now >= query.revealDeadline) {
    throw new VoteError("VotingPhaseClosed", `Reveal phase for query ${queryId} has ended`);
  }

  const commit = query.commits.get(voterAddress);
  if (!commit) {
    throw new VoteError(
      "CommitmentNotFound",
      `No commitment from ${voterAddress} on query ${queryId}`,
    );
  }
  if (commit.revealed) {
    throw new VoteError("AlreadyVoted", `Voter ${voterAddress} already revealed on query ${queryId}`);
  }

  validateConfidence(confidence);
  if (computeCommitment(value, salt, confidence) !== commit.commitment) {
    throw new VoteError("InvalidReveal", "Revealed value does not match commitment");
  }
  const outcome = resolveOutcome(query.outcomes, value);

  const vote: Vote = {
    voter: voterAddress,
    value: outcome.value,
    outcomeIndex: outcome.index,
    confidence,
    lockedAmount: commit.lockedAmount,
    timestamp: now,
    salt,
  };

  commit.revealed = true;
  query.votes.set(voterAddress, vote);
  runtime.log(`[ledger] Reveal on query ${queryId} by ${voterAddress}: "${vote.value}"`);
  return vote;
}

// ─── Terminal transitions ────────────────────────────────────────────────────

export function resolveQuery(runtime: OracleRuntime, queryId: number): ResolutionOutcome {
  requireNotPaused(runtime);
  const query = getQuery(runtime, queryId);
  if (query.status === "Resolved") {
    throw new QueryError("AlreadyResolved", `Query ${queryId} is already resolved`);
  }
  if (query.status !== "Active") {
    throw new QueryError("QueryNotActive", `Query ${queryId} is ${query.status}`);
  }
  if (runtime.now() < query.deadline) {
    throw new QueryError("DeadlineNotReached", `Query ${queryId} deadline has not been reached`);
  }

  if (!hasQuorum(query)) {
    expireActiveQuery(
      runtime,
      query,
      `${query.votes.size} of ${query.minVotes} required votes`,
    );
    return { queryId, status: "Expired" };
  }

  return finalizeQuery(runtime, query);
}

/** Active → Resolved, then settlement and the optional callback. */
export function finalizeQuery(runtime: OracleRuntime, query: Query): ResolutionOutcome {
  const consensus = computeConsensus(query, runtime.state.voters);

  query.status = "Resolved";
  query.result = consensus.outcome;
  query.confidence = consensus.confidence;
  query.resolvedAt = runtime.now();
  runtime.state.totalQueriesResolved += 1;
  runtime.log(
    `[ledger] Query ${query.id} resolved: "${consensus.outcome}" (${consensus.confidence}%)`,
  );

  const settlement = settleQuery(runtime, query, consensus);
  enqueueCallback(runtime, query);
  return { queryId: query.id, status: "Resolved", consensus, settlement };
}

/** Active → Expired with every lock released and nothing settled. */
export function expireActiveQuery(runtime: OracleRuntime, query: Query, reason: string): void {
  releaseQueryLocks(runtime, query);
  query.status = "Expired";
  runtime.log(`[ledger] Query ${query.id} expired: ${reason}`);
}

export function cancelQuery(runtime: OracleRuntime, caller: Address, queryId: number): Query {
  requireNotPaused(runtime);
  requireAdmin(runtime, caller, "cancel queries");
  const query = getQuery(runtime, queryId);
  requireActive(query);

  releaseQueryLocks(runtime, query);
  query.status = "Cancelled";
  runtime.log(`[ledger] Query ${queryId} cancelled by ${caller}`);
  return query;
}
