import type { Address, Voter } from "../../../shared/types.js";
import { requireAdmin, requireNotPaused } from "../admin/admin.js";
import {
  INITIAL_REPUTATION,
  MAX_METADATA_URL_LENGTH,
  MAX_NAME_LENGTH,
} from "../constants.js";
import { VoterError, invalidParameters } from "../errors.js";
import { byteLength } from "../queries/validate.js";
import type { OracleRuntime } from "../runtime.js";

export interface RegisterVoterInput {
  stake: bigint;
  name?: string;
  metadataUrl?: string;
}

// ─── Validation ──────────────────────────────────────────────────────────────

const NAME_PATTERN = /^[\p{L}\p{N}\s_-]+$/u;
const METADATA_SCHEMES = ["http://", "https://", "ipfs://"];

function validateRegistration(input: RegisterVoterInput): void {
  if (input.stake <= 0n) throw invalidParameters("Stake must be greater than zero");

  if (input.name !== undefined) {
    if (input.name.length === 0) throw invalidParameters("Name cannot be empty");
    if (byteLength(input.name) > MAX_NAME_LENGTH) {
      throw invalidParameters(`Name too long (max ${MAX_NAME_LENGTH} bytes)`);
    }
    if (!NAME_PATTERN.test(input.name)) {
      throw invalidParameters("Name contains invalid characters");
    }
  }

  if (input.metadataUrl !== undefined) {
    const url = input.metadataUrl;
    if (url.length === 0) throw invalidParameters("Metadata URL cannot be empty");
    if (byteLength(url) > MAX_METADATA_URL_LENGTH) {
      throw invalidParameters(`Metadata URL too long (max ${MAX_METADATA_URL_LENGTH} bytes)`);
    }
    if (!METADATA_SCHEMES.some((scheme) => url.startsWith(scheme))) {
      throw invalidParameters("Metadata URL must start with http://, https://, or ipfs://");
    }
  }
}

// ─── Lookups ─────────────────────────────────────────────────────────────────

export function getVoter(runtime: OracleRuntime, address: Address): Voter {
  const voter = runtime.state.voters.get(address);
  if (!voter) throw new VoterError("NotRegistered", `Voter ${address} is not registered`);
  return voter;
}

export function getActiveVoter(runtime: OracleRuntime, address: Address): Voter {
  const voter = getVoter(runtime, address);
  if (!voter.isActive) throw new VoterError("VoterInactive", `Voter ${address} is not active`);
  return voter;
}

export function availableStake(voter: Voter): bigint {
  return voter.stake > voter.lockedStake ? voter.stake - voter.lockedStake : 0n;
}

/** First Active query holding a vote or commit from the voter. */
export function openVoteQuery(runtime: OracleRuntime, address: Address): number | undefined {
  for (const query of runtime.state.queries.values()) {
    if (query.status !== "Active") continue;
    if (query.votes.has(address) || query.commits.has(address)) return query.id;
  }
  return undefined;
}

export function voterCount(runtime: OracleRuntime): number {
  return runtime.state.voters.size;
}

// ─── Registration ────────────────────────────────────────────────────────────

export function registerVoter(
  runtime: OracleRuntime,
  address: Address,
  input: RegisterVoterInput,
): Voter {
  requireNotPaused(runtime);
  validateRegistration(input);

  const { state } = runtime;
  if (state.voters.has(address)) {
    throw new VoterError("AlreadyRegistered", `Voter ${address} is already registered`);
  }
  if (input.stake < state.parameters.minStake) {
    throw new VoterError(
      "InsufficientStake",
      `Insufficient stake: required ${state.parameters.minStake}, provided ${input.stake}`,
    );
  }

  const voter: Voter = {
    address,
    stake: input.stake,
    lockedStake: 0n,
    reputation: INITIAL_REPUTATION,
    totalVotes: 0,
    correctVotes: 0,
    isActive: true,
    registeredAt: runtime.now(),
    name: input.name,
    metadataUrl: input.metadataUrl,
  };

  state.voters.set(address, voter);
  state.totalStake += input.stake;
  runtime.log(`[registry] Voter ${address} registered with stake ${input.stake}`);
  return voter;
}

/** Admin registration on behalf of another address. */
export function registerVoterFor(
  runtime: OracleRuntime,
  caller: Address,
  address: Address,
  input: RegisterVoterInput,
): Voter {
  requireNotPaused(runtime);
  requireAdmin(runtime, caller, "register voters on behalf of others");
  return registerVoter(runtime, address, input);
}

// ─── Stake management ────────────────────────────────────────────────────────

export function updateStake(runtime: OracleRuntime, address: Address, additional: bigint): Voter {
  requireNotPaused(runtime);
  if (additional <= 0n) throw invalidParameters("Additional stake must be greater than zero");

  const voter = getVoter(runtime, address);
  voter.stake += additional;
  runtime.state.totalStake += additional;
  runtime.log(`[registry] Voter ${address} added ${additional} stake (total ${voter.stake})`);

  // A voter deactivated by slashing comes back once the minimum is restored.
  if (!voter.isActive && voter.stake >= runtime.state.parameters.minStake) {
    voter.isActive = true;
    runtime.log(`[registry] Voter ${address} reactivated`);
  }
  return voter;
}

export function withdrawStake(runtime: OracleRuntime, address: Address, amount: bigint): Voter {
  requireNotPaused(runtime);
  if (amount <= 0n) throw invalidParameters("Withdrawal amount must be greater than zero");

  const voter = getVoter(runtime, address);
  const available = availableStake(voter);
  if (amount > available) {
    throw new VoterError(
      "InsufficientStake",
      `Insufficient available stake: have ${available} (total: ${voter.stake}, locked: ${voter.lockedStake}), requested ${amount}`,
    );
  }

  const remaining = voter.stake - amount;
  const { minStake } = runtime.state.parameters;
  if (voter.isActive && remaining < minStake) {
    throw new VoterError(
      "InsufficientStake",
      `Remaining stake ${remaining} would be below minimum ${minStake}; deregister instead`,
    );
  }

  voter.stake = remaining;
  runtime.state.totalStake -= amount;
  runtime.log(`[registry] Voter ${address} withdrew ${amount} stake (total ${voter.stake})`);
  return voter;
}

/** Removes the voter and returns the stake handed back to the ledger. */
export function deregisterVoter(runtime: OracleRuntime, address: Address): bigint {
  requireNotPaused(runtime);

  const voter = getVoter(runtime, address);
  const openQuery = openVoteQuery(runtime, address);
  if (openQuery !== undefined) {
    throw new VoterError(
      "StakeLocked",
      `Cannot deregister: voter has an open vote on query ${openQuery}`,
    );
  }
  if (voter.lockedStake > 0n) {
    throw new VoterError(
      "StakeLocked",
      `Cannot deregister: ${voter.lockedStake} stake is locked in open votes`,
    );
  }
  const pending = runtime.state.pendingRewards.get(address) ?? 0n;
  if (pending > 0n) {
    throw new VoterError(
      "PendingRewardsOutstanding",
      `Cannot deregister: ${pending} pending rewards must be claimed first`,
    );
  }

  runtime.state.voters.delete(address);
  runtime.state.totalStake -= voter.stake;
  runtime.log(`[registry] Voter ${address} deregistered, returning ${voter.stake} stake`);
  return voter.stake;
}

// ─── Vote locks ──────────────────────────────────────────────────────────────

export function lockStake(voter: Voter, amount: bigint): void {
  const available = availableStake(voter);
  if (amount <= 0n || amount > available) {
    throw new VoterError(
      "InsufficientStake",
      `Insufficient available stake: have ${available}, need ${amount}`,
    );
  }
  voter.lockedStake += amount;
}

export function unlockStake(voter: Voter, amount: bigint): void {
  voter.lockedStake = amount >= voter.lockedStake ? 0n : voter.lockedStake - amount;
}
