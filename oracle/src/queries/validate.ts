import { stringToBytes } from "viem";
import type { DecisionStrategy, Timestamp } from "../../../shared/types.js";
import {
  MAX_CONFIDENCE,
  MAX_DESCRIPTION_LENGTH,
  MAX_OUTCOME_LENGTH,
  MAX_OUTCOMES,
  MAX_QUERY_HORIZON,
  MICROS_PER_SECOND,
  MIN_OUTCOMES,
} from "../constants.js";
import { QueryError, VoteError, invalidParameters } from "../errors.js";

/** Length limits count UTF-8 bytes, not UTF-16 code units. */
export function byteLength(text: string): number {
  return stringToBytes(text).length;
}

// ─── Description & outcomes ──────────────────────────────────────────────────

export function validateDescription(description: string): void {
  if (description.trim().length === 0) {
    throw new QueryError("InvalidQuery", "Description cannot be empty");
  }
  if (byteLength(description) > MAX_DESCRIPTION_LENGTH) {
    throw new QueryError(
      "InvalidQuery",
      `Description too long (max ${MAX_DESCRIPTION_LENGTH} bytes)`,
    );
  }
}

export function validateOutcomes(outcomes: string[]): void {
  if (outcomes.length < MIN_OUTCOMES) {
    throw new QueryError("InvalidOutcomes", `At least ${MIN_OUTCOMES} outcomes required`);
  }
  if (outcomes.length > MAX_OUTCOMES) {
    throw new QueryError("InvalidOutcomes", `Too many outcomes (max ${MAX_OUTCOMES})`);
  }

  const seen = new Set<string>();
  for (const outcome of outcomes) {
    if (outcome.trim().length === 0) {
      throw new QueryError("InvalidOutcomes", "Outcome cannot be empty");
    }
    if (byteLength(outcome) > MAX_OUTCOME_LENGTH) {
      throw new QueryError(
        "InvalidOutcomes",
        `Outcome too long (max ${MAX_OUTCOME_LENGTH} bytes)`,
      );
    }
    if (seen.has(outcome)) {
      throw new QueryError("InvalidOutcomes", `Duplicate outcome: ${outcome}`);
    }
    seen.add(outcome);
  }
}

const NUMERIC_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export function parseNumericOutcome(outcome: string): number | undefined {
  const trimmed = outcome.trim();
  if (!NUMERIC_PATTERN.test(trimmed)) return undefined;
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : undefined;
}

/** Median queries need every outcome to be a finite number. */
export function validateStrategyOutcomes(strategy: DecisionStrategy, outcomes: string[]): void {
  if (strategy !== "Median") return;
  for (const outcome of outcomes) {
    if (parseNumericOutcome(outcome) === undefined) {
      throw new QueryError(
        "InvalidOutcomes",
        `Median strategy requires numeric outcomes, got "${outcome}"`,
      );
    }
  }
}

// ─── Deadlines ───────────────────────────────────────────────────────────────

export function validateDeadline(deadline: Timestamp, now: Timestamp): void {
  if (deadline <= now) {
    throw invalidParameters("Deadline must be in the future");
  }
  if (deadline - now > MAX_QUERY_HORIZON) {
    throw invalidParameters("Deadline too far in the future (max 1 year)");
  }
}

export function deadlineFromDuration(durationSecs: number, now: Timestamp): Timestamp {
  if (!Number.isInteger(durationSecs) || durationSecs <= 0) {
    throw invalidParameters("Duration must be a positive number of seconds");
  }
  const deadline = now + BigInt(durationSecs) * MICROS_PER_SECOND;
  validateDeadline(deadline, now);
  return deadline;
}

// ─── Votes ───────────────────────────────────────────────────────────────────

export function validateConfidence(confidence: number | undefined): void {
  if (confidence === undefined) return;
  if (!Number.isInteger(confidence) || confidence < 0 || confidence > MAX_CONFIDENCE) {
    throw new VoteError(
      "InvalidConfidence",
      `Confidence must be an integer between 0 and ${MAX_CONFIDENCE}, got ${confidence}`,
    );
  }
}

/** Resolves a vote given as outcome text or as an outcome index. */
export function resolveOutcome(
  outcomes: string[],
  value: string | number,
): { value: string; index: number } {
  if (typeof value === "number") {
    const outcome = outcomes[value];
    if (!Number.isInteger(value) || outcome === undefined) {
      throw new VoteError(
        "InvalidOutcomeIndex",
        `Outcome index ${value} out of range (0-${outcomes.length - 1})`,
      );
    }
    return { value: outcome, index: value };
  }

  const index = outcomes.indexOf(value);
  if (index < 0) {
    throw new VoteError(
      "InvalidVoteValue",
      `Invalid vote value "${value}". Valid outcomes: ${outcomes.join(", ")}`,
    );
  }
  return { value, index };
}
