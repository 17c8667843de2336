import type { ProtocolParameters } from "../../shared/types.js";
import { DEFAULT_PARAMETERS, parseParameters } from "../../oracle/src/index.js";

export const config = {
  port: parseInt(process.env.ORACLE_PORT || "3001", 10),
  instance: process.env.ORACLE_INSTANCE || "oracle",
  admin: process.env.ORACLE_ADMIN || "admin",
};

type Env = Record<string, string | undefined>;

function numberOr(value: string | undefined, fallback: number): number {
  return value === undefined || value === "" ? fallback : Number(value);
}

/** Protocol parameters with any ORACLE_* overrides applied and validated. */
export function loadParameters(env: Env = process.env): ProtocolParameters {
  const d = DEFAULT_PARAMETERS;
  return parseParameters({
    minStake: env.ORACLE_MIN_STAKE || d.minStake,
    minVotesDefault: numberOr(env.ORACLE_MIN_VOTES, d.minVotesDefault),
    defaultQueryDuration: numberOr(env.ORACLE_QUERY_DURATION, d.defaultQueryDuration),
    rewardPercentage: numberOr(env.ORACLE_REWARD_BPS, d.rewardPercentage),
    slashPercentage: numberOr(env.ORACLE_SLASH_BPS, d.slashPercentage),
    protocolFee: numberOr(env.ORACLE_FEE_BPS, d.protocolFee),
  });
}
