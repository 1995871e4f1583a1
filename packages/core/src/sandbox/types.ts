/**
 * Boundary Types
 * Everything that crosses from one sandbox unit into another is one of these.
 */

/**
 * Top-level envelope for all boundary messages.
 */
export interface Envelope {
  v: "v1";
  /** Timestamp of creation. */
  ts: number;
  msg: BoundaryMessage;
}

export type BoundaryMessage =
  | CallMessage
  | ReturnMessage
  | ThrowMessage
  | EventMessage;

// ---- Capability calls ----

export interface CallMessage {
  type: "CALL";
  capability: string;
  method: string;
  args: unknown[];
}

export interface ReturnMessage {
  type: "RETURN";
  value?: unknown;
}

export interface ThrowMessage {
  type: "THROW";
  error: { name: string; message: string };
}

// ---- Events ----

export interface EventMessage {
  type: "EVENT";
  event: string;
  payload?: unknown;
}
