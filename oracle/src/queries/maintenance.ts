import type { Address } from "../../../shared/types.js";
import { requireAdmin, requireNotPaused } from "../admin/admin.js";
import { QueryError } from "../errors.js";
import { hasQuorum } from "../resolution/quorum.js";
import type { OracleRuntime } from "../runtime.js";
import type { ResolutionOutcome } from "../types.js";
import { activeQueries, expireActiveQuery, finalizeQuery, getQuery } from "./ledger.js";

// ─── Periodic sweeps ─────────────────────────────────────────────────────────
// Nothing in the core runs on a timer: a maintenance caller invokes these.

/** Expires every Active query past its deadline that missed quorum. */
export function checkExpiredQueries(runtime: OracleRuntime): number[] {
  requireNotPaused(runtime);
  const now = runtime.now();
  const expired: number[] = [];

  for (const query of activeQueries(runtime)) {
    if (now >= query.deadline && !hasQuorum(query)) {
      expireActiveQuery(runtime, query, `${query.votes.size} of ${query.minVotes} required votes`);
      expired.push(query.id);
    }
  }

  runtime.log(`[maintenance] Expiry sweep: ${expired.length} expired`);
  return expired;
}

/** Resolves every Active query past its deadline that reached quorum. */
export function autoResolveQueries(runtime: OracleRuntime): ResolutionOutcome[] {
  requireNotPaused(runtime);
  const now = runtime.now();
  const resolved: ResolutionOutcome[] = [];

  for (const query of activeQueries(runtime)) {
    if (now >= query.deadline && hasQuorum(query)) {
      resolved.push(finalizeQuery(runtime, query));
    }
  }

  runtime.log(`[maintenance] Auto-resolve sweep: ${resolved.length} resolved`);
  return resolved;
}

// ─── Admin ───────────────────────────────────────────────────────────────────

/** Forces a past-deadline query to Expired whatever its vote count. */
export function expireQuery(runtime: OracleRuntime, caller: Address, queryId: number): void {
  requireNotPaused(runtime);
  requireAdmin(runtime, caller, "expire queries");

  const query = getQuery(runtime, queryId);
  if (query.status !== "Active") {
    throw new QueryError("QueryNotActive", `Query ${queryId} is ${query.status}`);
  }
  if (runtime.now() < query.deadline) {
    throw new QueryError("DeadlineNotReached", `Query ${queryId} deadline has not been reached`);
  }

  expireActiveQuery(runtime, query, `expired by ${caller}`);
}
