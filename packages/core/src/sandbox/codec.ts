import { MarshalError } from "./errors.js";
import type { BoundaryMessage, Envelope } from "./types.js";

/**
 * JSON Codec for the sandbox boundary.
 * Encodes messages to/from Uint8Array (via string). Units never share the
 * objects they exchange: each side only ever sees its own decoded copy.
 *
 * Values follow JSON rules: `undefined` object members are dropped and
 * `undefined` array items become `null`. Functions, symbols and bigints are
 * rejected.
 */

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder();

function rejectUnmarshalable(key: string, value: unknown): unknown {
  if (
    typeof value === "function" ||
    typeof value === "symbol" ||
    typeof value === "bigint"
  ) {
    throw new MarshalError(
      `Cannot marshal a ${typeof value} at "${key || "(root)"}".`,
    );
  }
  return value;
}

function isEnvelope(value: unknown): value is Envelope {
  if (typeof value !== "object" || value === null) return false;
  if (!("v" in value) || !("msg" in value)) return false;
  const msg = value.msg;
  return (
    typeof msg === "object" &&
    msg !== null &&
    "type" in msg &&
    typeof msg.type === "string"
  );
}

export function encodeMessage(msg: BoundaryMessage): Uint8Array {
  const envelope: Envelope = {
    v: "v1",
    ts: Date.now(),
    msg,
  };
  return textEncoder.encode(JSON.stringify(envelope, rejectUnmarshalable));
}

export function decodeMessage(data: Uint8Array): BoundaryMessage {
  const json = textDecoder.decode(data);
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (e) {
    throw new MarshalError(
      `Failed to decode boundary message: ${String(e)}`,
      e,
    );
  }
  if (!isEnvelope(parsed)) {
    throw new MarshalError("Malformed boundary envelope.");
  }
  if (parsed.v !== "v1") {
    throw new MarshalError(
      `Unsupported boundary protocol version: ${String(parsed.v)}`,
    );
  }
  return parsed.msg;
}
