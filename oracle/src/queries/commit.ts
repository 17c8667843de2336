import { encodeAbiParameters, keccak256 } from "viem";

const COMMITMENT_PARAMS = [
  { name: "value", type: "string" },
  { name: "salt", type: "string" },
  { name: "confidence", type: "uint8" },
] as const;

/** Placeholder confidence folded into the hash when a voter gives none. */
export const NO_CONFIDENCE = 255;

const COMMITMENT_PATTERN = /^0x[0-9a-f]{64}$/i;

/**
 * keccak256(abi.encode(value, salt, confidence ?? 255)) as lower-case 0x-hex.
 * Voters compute this off-line and submit it during the commit window.
 */
export function computeCommitment(value: string, salt: string, confidence?: number): string {
  return keccak256(
    encodeAbiParameters(COMMITMENT_PARAMS, [value, salt, confidence ?? NO_CONFIDENCE]),
  );
}

export function isCommitment(candidate: string): boolean {
  return COMMITMENT_PATTERN.test(candidate);
}
