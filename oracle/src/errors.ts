import { ErrorCode, type ErrorName } from "./constants.js";

export class OracleError extends Error {
  public readonly code: number;

  constructor(
    public readonly errorName: ErrorName,
    message: string,
  ) {
    super(message);
    this.name = "OracleError";
    this.code = ErrorCode[errorName];
  }
}

type QueryErrorName =
  | "QueryNotFound"
  | "InvalidOutcomes"
  | "InvalidQuery"
  | "QueryNotActive"
  | "AlreadyResolved"
  | "NotEnoughVotes"
  | "DeadlineNotReached";

type VoterErrorName =
  | "NotRegistered"
  | "InsufficientStake"
  | "AlreadyRegistered"
  | "VoterInactive"
  | "StakeLocked"
  | "NoPendingRewards"
  | "PendingRewardsOutstanding";

type VoteErrorName =
  | "CommitmentNotFound"
  | "InvalidReveal"
  | "AlreadyVoted"
  | "VotingPhaseClosed"
  | "InvalidVoteValue"
  | "InvalidOutcomeIndex"
  | "InvalidConfidence";

type ProtocolErrorName = "ProtocolPaused" | "Unauthorized" | "InvalidParameters";

type CallbackErrorName =
  | "CallbackFailed"
  | "MaxRetriesExceeded"
  | "InvalidCallback"
  | "DuplicateCallback";

export class QueryError extends OracleError {
  constructor(errorName: QueryErrorName, message: string) {
    super(errorName, message);
    this.name = "QueryError";
  }
}

export class VoterError extends OracleError {
  constructor(errorName: VoterErrorName, message: string) {
    super(errorName, message);
    this.name = "VoterError";
  }
}

export class VoteError extends OracleError {
  constructor(errorName: VoteErrorName, message: string) {
    super(errorName, message);
    this.name = "VoteError";
  }
}

export class ProtocolError extends OracleError {
  constructor(errorName: ProtocolErrorName, message: string) {
    super(errorName, message);
    this.name = "ProtocolError";
  }
}

export class CallbackError extends OracleError {
  constructor(errorName: CallbackErrorName, message: string) {
    super(errorName, message);
    this.name = "CallbackError";
  }
}

/** Raised only when an internal invariant is broken. */
export class StateCorruptionError extends OracleError {
  constructor(detail: string) {
    super("StateCorruption", `State corruption: ${detail}`);
    this.name = "StateCorruptionError";
  }
}

export function invariant(condition: boolean, detail: string): asserts condition {
  if (!condition) throw new StateCorruptionError(detail);
}

export function invalidParameters(message: string): ProtocolError {
  return new ProtocolError("InvalidParameters", message);
}
