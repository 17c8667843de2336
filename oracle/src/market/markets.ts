import type { QueryResolutionCallback, Timestamp } from "../../../shared/types.js";
import { MICROS_PER_SECOND } from "../constants.js";
import { CallbackError, QueryError, invalidParameters } from "../errors.js";
import { DEFAULT_MARKET_APP, decodeMarketId, encodeMarketId } from "../protocol/callback.js";
import type { Message } from "../protocol/schemas.js";
import { systemClock } from "../runtime.js";

// ─── Market side of a callback integration ──────────────────────────────────
// A market chain asks the oracle to resolve an expired market and later
// consumes the resolution callback. Callbacks may arrive twice; only the
// first one for a market is applied.

export type MarketStatus = "Open" | "Voting" | "Resolved";

export interface Market {
  id: bigint;
  question: string;
  createdAt: Timestamp;
  endTime: Timestamp;
  status: MarketStatus;
  queryId?: number;
  winningOutcome?: string;
  resolvedAt?: Timestamp;
}

export interface MarketBook {
  chain: string;
  app: string;
  /** Seconds the oracle gets to vote once resolution is requested. */
  resolutionWindowSecs: number;
  markets: Map<bigint, Market>;
  nextMarketId: bigint;
  now(): Timestamp;
  log(message: string): void;
}

export interface MarketBookOptions {
  chain: string;
  app?: string;
  resolutionWindowSecs?: number;
  clock?: () => Timestamp;
  log?: (message: string) => void;
}

const MAX_QUESTION_LENGTH = 200;
export const MARKET_OUTCOMES = ["Yes", "No"];

export function createMarketBook(options: MarketBookOptions): MarketBook {
  const clock = options.clock ?? systemClock;
  const sink = options.log ?? ((message: string) => console.log(message));
  return {
    chain: options.chain,
    app: options.app ?? DEFAULT_MARKET_APP,
    resolutionWindowSecs: options.resolutionWindowSecs ?? 3600,
    markets: new Map(),
    nextMarketId: 1n,
    now: () => clock(),
    log: (message) => sink(message),
  };
}

export function getMarket(book: MarketBook, marketId: bigint): Market {
  const market = book.markets.get(marketId);
  if (!market) throw new QueryError("QueryNotFound", `Market ${marketId} not found`);
  return market;
}

export function createMarket(book: MarketBook, question: string, endTime: Timestamp): Market {
  if (question.trim().length === 0) throw invalidParameters("Question cannot be empty");
  if (question.length > MAX_QUESTION_LENGTH) {
    throw invalidParameters(`Question too long (max ${MAX_QUESTION_LENGTH} characters)`);
  }
  const now = book.now();
  if (endTime <= now) throw invalidParameters("End time must be in the future");

  const market: Market = {
    id: book.nextMarketId,
    question,
    createdAt: now,
    endTime,
    status: "Open",
  };
  book.markets.set(market.id, market);
  book.nextMarketId += 1n;
  book.log(`[market] Market ${market.id} created: ${question}`);
  return market;
}

/**
 * Moves an expired market to Voting and builds the message asking the oracle
 * to resolve it. The market id rides along as callback data.
 */
export function requestResolution(book: MarketBook, marketId: bigint): Message {
  const market = getMarket(book, marketId);
  const now = book.now();
  if (now < market.endTime) {
    throw new QueryError("DeadlineNotReached", `Market ${marketId} has not ended yet`);
  }
  if (market.status !== "Open") {
    throw new QueryError("QueryNotActive", `Market ${marketId} is already ${market.status}`);
  }

  market.status = "Voting";
  book.log(`[market] Market ${marketId} sent for resolution`);
  return {
    type: "CreateQueryFromMarket",
    marketId,
    question: market.question,
    outcomes: [...MARKET_OUTCOMES],
    deadline: now + BigInt(book.resolutionWindowSecs) * MICROS_PER_SECOND,
    callbackChain: book.chain,
    callbackApp: book.app,
    callbackData: encodeMarketId(marketId),
  };
}

export function applyResolutionCallback(
  book: MarketBook,
  callback: QueryResolutionCallback,
): Market {
  const marketId = decodeMarketId(callback.callbackData);
  const market = book.markets.get(marketId);
  if (!market) {
    throw new CallbackError("InvalidCallback", `Callback for unknown market ${marketId}`);
  }
  if (market.status === "Resolved") {
    throw new CallbackError("DuplicateCallback", `Market ${marketId} is already resolved`);
  }
  if (market.status !== "Voting") {
    throw new CallbackError(
      "InvalidCallback",
      `Market ${marketId} has not requested resolution`,
    );
  }
  if (!MARKET_OUTCOMES.includes(callback.resolvedOutcome)) {
    throw new CallbackError(
      "InvalidCallback",
      `Unexpected outcome "${callback.resolvedOutcome}" for market ${marketId}`,
    );
  }

  market.status = "Resolved";
  market.queryId = callback.queryId;
  market.winningOutcome = callback.resolvedOutcome;
  market.resolvedAt = callback.resolvedAt;
  book.log(`[market] Market ${marketId} resolved with outcome: ${callback.resolvedOutcome}`);
  return market;
}
