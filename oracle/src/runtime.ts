import type {
  Address,
  OutboundMessage,
  ProtocolParameters,
  Query,
  Timestamp,
  Voter,
} from "../../shared/types.js";
import { DEFAULT_PARAMETERS } from "./constants.js";
import { parseParameters } from "./types.js";

// ─── Registry state ──────────────────────────────────────────────────────────

export interface OracleState {
  parameters: ProtocolParameters;
  admin: Address;
  isPaused: boolean;

  voters: Map<Address, Voter>;
  totalStake: bigint;

  queries: Map<number, Query>;
  nextQueryId: number;

  pendingRewards: Map<Address, bigint>;
  treasury: bigint;
  totalRewardsDistributed: bigint;

  totalQueriesCreated: number;
  totalQueriesResolved: number;
  totalVotesSubmitted: number;

  /** Outbound callbacks awaiting pickup by the transport. */
  outbox: OutboundMessage[];
}

export function createState(
  admin: Address,
  parameters: ProtocolParameters = DEFAULT_PARAMETERS,
): OracleState {
  return {
    parameters: parseParameters(parameters),
    admin,
    isPaused: false,
    voters: new Map(),
    totalStake: 0n,
    queries: new Map(),
    nextQueryId: 1,
    pendingRewards: new Map(),
    treasury: 0n,
    totalRewardsDistributed: 0n,
    totalQueriesCreated: 0,
    totalQueriesResolved: 0,
    totalVotesSubmitted: 0,
    outbox: [],
  };
}

// ─── Runtime handle ──────────────────────────────────────────────────────────

/**
 * The single handle every entry point receives. Operations for one instance
 * run strictly one after another, so nothing here is synchronized.
 */
export interface OracleRuntime {
  state: OracleState;
  now(): Timestamp;
  log(message: string): void;
}

export interface RuntimeOptions {
  admin: Address;
  parameters?: ProtocolParameters;
  clock?: () => Timestamp;
  log?: (message: string) => void;
}

export function systemClock(): Timestamp {
  return BigInt(Date.now()) * 1000n;
}

export function createRuntime(options: RuntimeOptions): OracleRuntime {
  const clock = options.clock ?? systemClock;
  const sink = options.log ?? ((message: string) => console.log(message));

  return {
    state: createState(options.admin, options.parameters),
    now: () => clock(),
    log: (message) => sink(message),
  };
}
