import type { SandboxUnit } from "../sandbox/sandbox.js";

/**
 * A registered `(event kind, handler, owning system)` triple.
 */
export interface EventBinding {
  readonly event: string;
  readonly system: string;
  readonly module: string;
  /** Unit the owning system runs in; the handler is always entered there. */
  readonly unit: SandboxUnit;
  /** Runs the handler with a decoded copy of the payload. */
  invoke(payload: unknown): void;
}

/**
 * Structured report of a handler that failed during a dispatch cycle.
 */
export interface HandlerFault {
  readonly system: string;
  readonly module: string;
  readonly event: string;
  readonly error: Error;
}

export interface DispatchReport {
  readonly event: string;
  /** Handlers that were entered, faulted ones included. */
  readonly invoked: number;
  readonly faults: readonly HandlerFault[];
}
