import { decodeMessage, encodeMessage } from "../sandbox/codec.js";
import { MarshalError } from "../sandbox/errors.js";
import type { EventKind } from "../system/types.js";
import type { DispatchReport, EventBinding, HandlerFault } from "./types.js";

/** A handler tried to dispatch while a cycle was still running. */
export class ReentrantDispatchError extends Error {
  constructor(event: string, running: string) {
    super(
      `Cannot dispatch "${event}" while "${running}" is being dispatched.`,
    );
    this.name = "ReentrantDispatchError";
  }
}

/** Registration is closed once the dispatch phase began. */
export class DispatcherSealedError extends Error {
  constructor(system: string, event: string) {
    super(
      `Dispatcher is sealed; cannot register "${event}" handler of "${system}".`,
    );
    this.name = "DispatcherSealedError";
  }
}

/**
 * Keeps, per event kind, the handlers in registration order and runs them
 * synchronously, one cycle per `dispatch` call.
 *
 * A faulting handler never stops the cycle: its error is captured by its
 * unit and returned in the report for the host to act upon.
 */
export class EventDispatcher {
  private readonly byEvent = new Map<string, EventBinding[]>();
  private readonly disabled = new Set<string>();
  private sealed = false;
  private running: string | null = null;

  register(binding: EventBinding): void {
    if (this.sealed) {
      throw new DispatcherSealedError(binding.system, binding.event);
    }
    const list = this.byEvent.get(binding.event) ?? [];
    list.push(binding);
    this.byEvent.set(binding.event, list);
  }

  seal(): void {
    this.sealed = true;
  }

  /** Skip every handler of `system` from now on. */
  disable(system: string): void {
    this.disabled.add(system);
  }

  isDisabled(system: string): boolean {
    return this.disabled.has(system);
  }

  /** Bindings for `event`, in dispatch order. */
  bindings(event: string): readonly EventBinding[] {
    return [...(this.byEvent.get(event) ?? [])];
  }

  dispatch<P>(event: EventKind<P>, payload: P): DispatchReport {
    if (this.running !== null) {
      throw new ReentrantDispatchError(event.id, this.running);
    }

    // Encoded once; every handler decodes its own copy.
    const frame = encodeMessage({ type: "EVENT", event: event.id, payload });
    const bindings = this.byEvent.get(event.id) ?? [];
    const faults: HandlerFault[] = [];
    let invoked = 0;

    this.running = event.id;
    try {
      for (const binding of bindings) {
        if (this.disabled.has(binding.system)) continue;
        invoked++;

        const result = binding.unit.enter(() => {
          const msg = decodeMessage(frame);
          if (msg.type !== "EVENT") {
            throw new MarshalError(`Expected EVENT, got ${msg.type}.`);
          }
          binding.invoke(msg.payload);
        });

        if (!result.ok) {
          faults.push({
            system: binding.system,
            module: binding.module,
            event: event.id,
            error: result.error,
          });
        }
      }
    } finally {
      this.running = null;
    }

    return { event: event.id, invoked, faults };
  }

  clear(): void {
    this.byEvent.clear();
    this.disabled.clear();
  }
}
