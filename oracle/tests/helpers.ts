import { expect } from "vitest";
import type { ProtocolParameters, Timestamp } from "../../shared/types.js";
import {
  DEFAULT_PARAMETERS,
  MICROS_PER_SECOND,
  OracleError,
  createRuntime,
  registerVoter,
  type ErrorName,
  type OracleRuntime,
} from "../src/index.js";

export const T0: Timestamp = 1_700_000_000n * MICROS_PER_SECOND;
export const ADMIN = "admin";

export interface FakeClock {
  now(): Timestamp;
  advance(seconds: number): void;
}

export function fakeClock(start: Timestamp = T0): FakeClock {
  let current = start;
  return {
    now: () => current,
    advance: (seconds) => {
      current += BigInt(seconds) * MICROS_PER_SECOND;
    },
  };
}

export interface Harness {
  runtime: OracleRuntime;
  clock: FakeClock;
  logs: string[];
}

export function setup(parameters: Partial<ProtocolParameters> = {}): Harness {
  const clock = fakeClock();
  const logs: string[] = [];
  const runtime = createRuntime({
    admin: ADMIN,
    parameters: { ...DEFAULT_PARAMETERS, ...parameters },
    clock: clock.now,
    log: (message) => logs.push(message),
  });
  return { runtime, clock, logs };
}

export function registerAll(runtime: OracleRuntime, stakes: Record<string, bigint>): void {
  for (const [address, stake] of Object.entries(stakes)) {
    registerVoter(runtime, address, { stake });
  }
}

export function expectOracleError(fn: () => unknown, name: ErrorName): OracleError {
  try {
    fn();
  } catch (err) {
    expect(err).toBeInstanceOf(OracleError);
    if (err instanceof OracleError) {
      expect(err.errorName).toBe(name);
      return err;
    }
  }
  throw new Error(`Expected ${name} to be thrown`);
}
