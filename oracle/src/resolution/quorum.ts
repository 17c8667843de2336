/**
 * Quorum – the minimum number of votes a query needs before it may resolve.
 *
 * A query that reaches its deadline below quorum expires instead of
 * resolving, so no reward or slash is ever computed from a thin sample.
 *
 * Bounds on the requested quorum (`minVotes`):
 *
 *   - at least 1;
 *   - never more than the number of registered voters, or the query
 *     could never resolve;
 *   - once the registry has more than 10 voters, at most half of them,
 *     so a handful of absent voters cannot stall every query.
 *
 * Quorum table:
 * ┌────────┬──────────────────┐
 * │ Voters │ Max minVotes     │
 * ├────────┼──────────────────┤
 * │    1   │        1         │
 * │    5   │        5         │
 * │   10   │       10         │
 * │   11   │        5         │
 * │   20   │       10         │
 * │   51   │       25         │
 * └────────┴──────────────────┘
 */

import type { Query } from "../../../shared/types.js";
import { invalidParameters } from "../errors.js";

/** Registry size above which quorum is capped at half the voters. */
export const SMALL_REGISTRY_SIZE = 10;

/**
 * Largest quorum a query may request.
 *
 * @param voterCount - Registered voters at creation time.
 */
export function maxQuorum(voterCount: number): number {
  return voterCount > SMALL_REGISTRY_SIZE ? Math.floor(voterCount / 2) : voterCount;
}

/**
 * @throws InvalidParameters if `minVotes` falls outside [1, maxQuorum].
 */
export function validateQuorum(minVotes: number, voterCount: number): void {
  if (!Number.isInteger(minVotes) || minVotes < 1) {
    throw invalidParameters("Minimum votes must be at least 1");
  }
  if (minVotes > voterCount) {
    throw invalidParameters(
      `Minimum votes (${minVotes}) exceeds total registered voters (${voterCount})`,
    );
  }
  if (minVotes > maxQuorum(voterCount)) {
    throw invalidParameters(
      `Minimum votes (${minVotes}) is more than 50% of registered voters (${voterCount})`,
    );
  }
}

export function hasQuorum(query: Pick<Query, "votes" | "minVotes">): boolean {
  return query.votes.size >= query.minVotes;
}
