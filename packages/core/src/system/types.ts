import type { z } from "zod";
import type { Capability } from "../capability/capability.js";
import type { ContextHandle } from "../capability/context.js";

/**
 * An event kind. Payloads cross the boundary by value and are validated with
 * `schema` before a handler sees them.
 */
export interface EventKind<P = unknown> {
  readonly id: string;
  readonly schema: z.ZodType<P>;
}

export function defineEvent<P>(id: string, schema: z.ZodType<P>): EventKind<P> {
  if (id.length === 0) {
    throw new RangeError("Event id must not be empty.");
  }
  return Object.freeze({ id, schema });
}

/** One `(event kind, handler)` binding, as declared by a system. */
export interface HandlerDeclaration {
  readonly event: string;
}

/**
 * Static metadata of a system type, known before anything is instantiated.
 * Everything but `instantiate` is plain data.
 */
export interface SystemDescriptor {
  readonly name: string;
  /** Feature toggle that must be enabled for this system to be selected. */
  readonly feature?: string;
  readonly requires: readonly Capability[];
  readonly optional: readonly Capability[];
  readonly provides: readonly Capability[];
  readonly handlers: readonly HandlerDeclaration[];

  instantiate(ctx: ContextHandle<Capability, Capability>): LiveSystem;
}

/**
 * A system instance as the host sees it: its state stays hidden behind
 * these three entry points.
 */
export interface LiveSystem {
  /** The object serving `capabilityId`, if this system provides it. */
  expose(capabilityId: string): object | undefined;
  /** Run the handler declared at `index` against this system's own state. */
  handle(index: number, payload: unknown): void;
  destroy(): void;
}
