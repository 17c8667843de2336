import type { Address, ProtocolParameters } from "../../../shared/types.js";
import { ProtocolError, invalidParameters } from "../errors.js";
import type { OracleRuntime } from "../runtime.js";
import { parseParameters } from "../types.js";

// ─── Guards ──────────────────────────────────────────────────────────────────

export function requireNotPaused(runtime: OracleRuntime): void {
  if (runtime.state.isPaused) {
    throw new ProtocolError("ProtocolPaused", "Protocol is paused");
  }
}

export function requireAdmin(runtime: OracleRuntime, caller: Address, action: string): void {
  if (caller !== runtime.state.admin) {
    throw new ProtocolError("Unauthorized", `Unauthorized: only admin can ${action}`);
  }
}

// ─── Admin operations ────────────────────────────────────────────────────────

export function pauseProtocol(runtime: OracleRuntime, caller: Address): void {
  requireNotPaused(runtime);
  requireAdmin(runtime, caller, "pause protocol");

  runtime.state.isPaused = true;
  runtime.log(`[admin] Protocol paused by ${caller}`);
}

export function unpauseProtocol(runtime: OracleRuntime, caller: Address): void {
  requireAdmin(runtime, caller, "unpause protocol");
  if (!runtime.state.isPaused) throw invalidParameters("Protocol is not paused");

  runtime.state.isPaused = false;
  runtime.log(`[admin] Protocol unpaused by ${caller}`);
}

export function updateParameters(
  runtime: OracleRuntime,
  caller: Address,
  params: unknown,
): ProtocolParameters {
  requireNotPaused(runtime);
  requireAdmin(runtime, caller, "update parameters");
  const next = parseParameters(params);

  runtime.state.parameters = next;
  runtime.log(
    `[admin] Parameters updated: minStake=${next.minStake} slash=${next.slashPercentage}bps fee=${next.protocolFee}bps`,
  );
  return next;
}
