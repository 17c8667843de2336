import { bytesToHex } from "viem";
import type { z } from "zod";
import { invalidParameters } from "../errors.js";
import {
  MessageSchema,
  OperationSchema,
  type Message,
  type Operation,
} from "./schemas.js";

// ─── JSON wire format ────────────────────────────────────────────────────────
// bigint → decimal string, Uint8Array → 0x-hex. Decoding runs the payload
// back through the zod schema, which restores both.

function replacer(_key: string, value: unknown): unknown {
  if (typeof value === "bigint") return value.toString();
  if (value instanceof Uint8Array) return bytesToHex(value);
  return value;
}

export function toWire(value: unknown): string {
  return JSON.stringify(value, replacer);
}

function decodeWith<T extends z.ZodTypeAny>(schema: T, text: string, what: string): z.output<T> {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw invalidParameters(`Malformed ${what}: ${err instanceof Error ? err.message : String(err)}`);
  }
  return parsePayload(schema, raw, what);
}

/** Validates an already-parsed JSON payload. */
export function parsePayload<T extends z.ZodTypeAny>(
  schema: T,
  raw: unknown,
  what: string,
): z.output<T> {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw invalidParameters(`Invalid ${what}${where}: ${issue?.message ?? "schema mismatch"}`);
  }
  return parsed.data;
}

// ─── Operations & messages ───────────────────────────────────────────────────

export function encodeOperation(operation: Operation): string {
  return toWire(operation);
}

export function decodeOperation(text: string): Operation {
  return decodeWith(OperationSchema, text, "operation");
}

export function encodeMessage(message: Message): string {
  return toWire(message);
}

export function decodeMessage(text: string): Message {
  return decodeWith(MessageSchema, text, "message");
}
