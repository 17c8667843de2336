import type {
  OutboundMessage,
  Query,
  QueryResolutionCallback,
} from "../../../shared/types.js";
import { CallbackError, invariant } from "../errors.js";
import type { OracleRuntime } from "../runtime.js";

// ─── Callback data ───────────────────────────────────────────────────────────

const ID_BYTES = 8;

/** Application name a market callback is addressed to when none is given. */
export const DEFAULT_MARKET_APP = "market";

/** Market ids travel as 8 little-endian bytes inside `callbackData`. */
export function encodeMarketId(marketId: bigint): Uint8Array {
  if (marketId < 0n || marketId > 0xffff_ffff_ffff_ffffn) {
    throw new CallbackError("InvalidCallback", `Market id ${marketId} does not fit in 8 bytes`);
  }
  const bytes = new Uint8Array(ID_BYTES);
  new DataView(bytes.buffer).setBigUint64(0, marketId, true);
  return bytes;
}

export function decodeMarketId(data: Uint8Array): bigint {
  if (data.length !== ID_BYTES) {
    throw new CallbackError(
      "InvalidCallback",
      `Callback data must be ${ID_BYTES} bytes, got ${data.length}`,
    );
  }
  return new DataView(data.buffer, data.byteOffset, data.byteLength).getBigUint64(0, true);
}

// ─── Outbox ──────────────────────────────────────────────────────────────────

/**
 * Queues the resolution callback for a resolved query that asked for one.
 * Delivery is the transport's job; a lost callback never rolls back the
 * resolution.
 */
export function enqueueCallback(runtime: OracleRuntime, query: Query): OutboundMessage | undefined {
  if (!query.callback) return undefined;
  invariant(
    query.status === "Resolved" && query.result !== undefined && query.resolvedAt !== undefined,
    `callback requested for unresolved query ${query.id}`,
  );

  const callback: QueryResolutionCallback = {
    queryId: query.id,
    resolvedOutcome: query.result,
    resolvedAt: query.resolvedAt,
    callbackData: query.callback.data.slice(),
  };
  const message: OutboundMessage = {
    destination: query.callback.chain,
    app: query.callback.app,
    callback,
  };

  runtime.state.outbox.push(message);
  runtime.log(`[protocol] Callback for query ${query.id} queued to ${message.destination}`);
  return message;
}

/** Hands every queued message to the caller and empties the outbox. */
export function drainOutbox(runtime: OracleRuntime): OutboundMessage[] {
  return runtime.state.outbox.splice(0, runtime.state.outbox.length);
}
