import { SystemContext } from "../capability/context.js";
import {
  CapabilityContractError,
  CapabilityScopeViolationError,
} from "../capability/errors.js";
import { CapabilityRegistry } from "../capability/registry.js";
import { EventDispatcher } from "../dispatch/dispatcher.js";
import type { DispatchReport, HandlerFault } from "../dispatch/types.js";
import { createConsoleLogger, type Logger } from "../log/logger.js";
import { resolveSystems } from "../resolve/resolver.js";
import {
  InProcessSandbox,
  type SandboxHost,
  type SandboxUnit,
} from "../sandbox/sandbox.js";
import {
  applyFeatures,
  type FeatureToggles,
  type ModuleSystem,
  type PluginModule,
  selectSystems,
} from "../system/module.js";
import type { EventKind, LiveSystem } from "../system/types.js";
import { type Target, toError } from "../types.js";
import {
  HostAbortedError,
  HostStateError,
  SystemInstantiationError,
} from "./errors.js";
import {
  type FaultAction,
  type FaultPolicy,
  resolveFaultPolicy,
} from "./fault-policy.js";

export type HostStatus = "idle" | "running" | "stopped";

export interface HostLoopOptions {
  /** Every plugin module the host knows about. */
  modules: readonly PluginModule[];
  /** Modules to load, by name. Defaults to all of `modules`. */
  manifest?: readonly string[];
  target: Target;
  features?: FeatureToggles;
  faults?: Partial<FaultPolicy>;
  logger?: Logger;
  sandbox?: SandboxHost;
  /** Monotonic milliseconds clock used by `run`. Defaults to `performance.now`. */
  clock?: () => number;
}

export interface RunOptions<P> {
  event: EventKind<P>;
  intervalMs: number;
  /** Payload for each cycle, from the time elapsed since `run` was called. */
  payload: (elapsedMs: number) => P;
}

export type FaultListener = (fault: HandlerFault) => void;

interface ActiveSystem {
  readonly descriptor: ModuleSystem;
  readonly unit: SandboxUnit;
  readonly context: SystemContext;
  readonly live: LiveSystem;
  available: boolean;
  faults: number;
}

/**
 * Owns a session: loads the manifest's modules, instantiates their systems
 * in dependency order, dispatches events to them and tears everything down
 * in reverse order.
 *
 * @example
 * const host = new HostLoop({ modules: [engine, hello], target: "client" });
 * host.start();
 * host.run({ event: Frame, intervalMs: 16, payload: (timeMs) => ({ timeMs }) });
 */
export class HostLoop {
  private readonly registry = new CapabilityRegistry();
  private readonly dispatcher = new EventDispatcher();
  private readonly sandbox: SandboxHost;
  private readonly logger: Logger;
  private readonly policy: FaultPolicy;
  private readonly clock: () => number;
  private readonly units = new Map<string, SandboxUnit>();
  private readonly timers = new Set<ReturnType<typeof setInterval>>();
  private readonly faultListeners = new Set<FaultListener>();
  private active: ActiveSystem[] = [];
  private resolved: string[] = [];
  private state: HostStatus = "idle";

  constructor(private readonly opts: HostLoopOptions) {
    this.sandbox = opts.sandbox ?? new InProcessSandbox();
    this.logger = opts.logger ?? createConsoleLogger({ scope: "HostLoop" });
    this.policy = resolveFaultPolicy(opts.faults);
    this.clock = opts.clock ?? (() => performance.now());
  }

  get status(): HostStatus {
    return this.state;
  }

  /** System names in instantiation order. Empty until started. */
  order(): string[] {
    return [...this.resolved];
  }

  /** Registered capability ids, in registration order. */
  capabilities(): string[] {
    return this.registry.capabilities();
  }

  isEvicted(system: string): boolean {
    return this.dispatcher.isDisabled(system);
  }

  /**
   * Resolve and instantiate every selected system, then seal the registry
   * and the dispatcher. Resolution errors are thrown before anything is
   * instantiated.
   */
  start(): void {
    if (this.state !== "idle") {
      throw new HostStateError("start", this.state);
    }

    const manifest = this.opts.manifest ?? this.opts.modules.map((m) => m.name);
    const selected = selectSystems(this.opts.modules, manifest, this.opts.target);
    if (!selected.ok) throw selected.error;

    const resolved = resolveSystems(
      applyFeatures(selected.value, this.opts.features ?? {}),
    );
    if (!resolved.ok) throw resolved.error;

    this.resolved = resolved.value.map((d) => d.name);
    this.logger.info(
      `Instantiation order (${this.opts.target}): ${this.resolved.join(" -> ") || "(none)"}`,
    );

    for (const descriptor of resolved.value) {
      try {
        this.instantiate(descriptor);
      } catch (e) {
        const error = new SystemInstantiationError(descriptor.name, toError(e));
        this.logger.error(error.message);
        this.state = "stopped";
        this.teardown();
        throw error;
      }
    }

    this.registry.seal();
    this.dispatcher.seal();
    this.state = "running";
  }

  /**
   * Run one dispatch cycle. Every fault of the cycle is logged and passed to
   * the fault listeners, then the fault policy acts on them. A system that
   * reached past its declared capabilities is faulted even if it caught the
   * error itself.
   */
  dispatch<P>(event: EventKind<P>, payload: P): DispatchReport {
    if (this.state !== "running") {
      throw new HostStateError(`dispatch "${event.id}"`, this.state);
    }
    const report = this.dispatcher.dispatch(event, payload);
    const faults = [
      ...report.faults,
      ...this.caughtScopeViolations(report.event, report.faults),
    ];
    for (const fault of faults) {
      this.reportFault(fault);
    }
    this.applyFaultPolicy(faults);
    return { ...report, faults };
  }

  /**
   * Dispatch `event` every `intervalMs` until cancelled or stopped.
   * A dispatch that throws (an abort, a payload that cannot be marshaled)
   * stops the session.
   */
  run<P>(opts: RunOptions<P>): () => void {
    if (this.state !== "running") {
      throw new HostStateError(`run "${opts.event.id}"`, this.state);
    }
    if (!(opts.intervalMs > 0)) {
      throw new RangeError(
        `intervalMs must be positive, got ${opts.intervalMs}.`,
      );
    }

    const startedAt = this.clock();
    const timer = setInterval(() => {
      try {
        const elapsedMs = Math.max(0, this.clock() - startedAt);
        this.dispatch(opts.event, opts.payload(elapsedMs));
      } catch (e) {
        cancel();
        this.logger.error(
          `Dispatching "${opts.event.id}" failed: ${toError(e).message}`,
        );
        this.stop();
      }
    }, opts.intervalMs);
    this.timers.add(timer);

    const cancel = () => {
      clearInterval(timer);
      this.timers.delete(timer);
    };
    return cancel;
  }

  /** Called for every handler fault, before the policy acts on it. */
  onFault(listener: FaultListener): () => void {
    this.faultListeners.add(listener);
    return () => {
      this.faultListeners.delete(listener);
    };
  }

  /**
   * Stop every timer and tear the session down. Stopping twice is a no-op.
   */
  stop(): void {
    if (this.state === "stopped") return;
    this.state = "stopped";
    for (const timer of this.timers) clearInterval(timer);
    this.timers.clear();
    this.teardown();
    this.logger.info("Session stopped");
  }

  // ---- Instantiation ----

  private unitFor(module: string): SandboxUnit {
    const existing = this.units.get(module);
    if (existing) return existing;
    const unit = this.sandbox.load(module);
    this.units.set(module, unit);
    this.logger.debug(`Loaded unit for module "${module}"`);
    return unit;
  }

  private instantiate(descriptor: ModuleSystem): void {
    const unit = this.unitFor(descriptor.module);
    const context = new SystemContext(descriptor.name, descriptor, this.registry);

    const created = unit.enter(() => descriptor.instantiate(context));
    if (!created.ok) throw created.error;
    const [violation] = context.scopeViolations();
    if (violation !== undefined) {
      throw new CapabilityScopeViolationError(descriptor.name, violation);
    }

    const active: ActiveSystem = {
      descriptor,
      unit,
      context,
      live: created.value,
      available: true,
      faults: 0,
    };
    this.active.push(active);

    for (const capability of descriptor.provides) {
      const exposed = unit.enter(() => active.live.expose(capability.id));
      if (!exposed.ok) throw exposed.error;
      if (exposed.value === undefined) {
        throw new CapabilityContractError(
          descriptor.name,
          capability.id,
          "no implementation was exposed",
        );
      }
      this.registry.register(capability, {
        system: descriptor.name,
        module: descriptor.module,
        unit,
        implementation: exposed.value,
        isAvailable: () => active.available,
      });
    }

    descriptor.handlers.forEach((handler, index) => {
      this.dispatcher.register({
        event: handler.event,
        system: descriptor.name,
        module: descriptor.module,
        unit,
        invoke: (payload) => active.live.handle(index, payload),
      });
    });

    this.logger.debug(
      `Instantiated "${descriptor.name}" (module "${descriptor.module}")`,
    );
  }

  // ---- Faults ----

  private reportFault(fault: HandlerFault): void {
    this.logger.error(
      `System "${fault.system}" faulted handling "${fault.event}": ${fault.error.message}`,
    );
    for (const listener of this.faultListeners) {
      try {
        listener(fault);
      } catch (e) {
        this.logger.warn(`Fault listener failed: ${toError(e).message}`);
      }
    }
  }

  /** Scope violations a handler caught instead of letting them fault it. */
  private caughtScopeViolations(
    event: string,
    reported: readonly HandlerFault[],
  ): HandlerFault[] {
    const faults: HandlerFault[] = [];
    for (const active of this.active) {
      const violations = active.context.scopeViolations();
      const last = violations[violations.length - 1];
      if (!active.available || last === undefined) continue;
      if (reported.some((f) => f.system === active.descriptor.name)) continue;
      faults.push({
        system: active.descriptor.name,
        module: active.descriptor.module,
        event,
        error: new CapabilityScopeViolationError(active.descriptor.name, last),
      });
    }
    return faults;
  }

  private applyFaultPolicy(faults: readonly HandlerFault[]): void {
    let aborting: HandlerFault | undefined;

    for (const fault of faults) {
      const active = this.active.find((a) => a.descriptor.name === fault.system);
      if (!active?.available) continue;
      active.faults++;

      // Reaching an undeclared capability is never tolerated.
      const fatal = active.context.scopeViolations().length > 0;
      if (!fatal && active.faults < this.policy.maxFaults) continue;

      switch (fatal ? escalate(this.policy.action) : this.policy.action) {
        case "ignore":
          break;
        case "evict-system":
          this.evict([active], fatal);
          break;
        case "evict-plugin":
          this.evict(
            this.active.filter((a) => a.descriptor.module === fault.module),
            fatal,
          );
          break;
        case "abort":
          if (!aborting) aborting = fault;
          break;
      }
    }

    if (aborting) {
      this.stop();
      throw new HostAbortedError(aborting, faults);
    }
  }

  private evict(systems: readonly ActiveSystem[], scopeViolation: boolean): void {
    for (const system of systems) {
      if (!system.available) continue;
      system.available = false;
      this.dispatcher.disable(system.descriptor.name);
      const reason = scopeViolation
        ? "a capability scope violation"
        : `${system.faults} fault(s)`;
      this.logger.warn(
        `Evicted "${system.descriptor.name}" (module "${system.descriptor.module}") after ${reason}`,
      );
    }
  }

  // ---- Teardown ----

  private teardown(): void {
    for (const system of [...this.active].reverse()) {
      const destroyed = system.unit.enter(() => system.live.destroy());
      if (!destroyed.ok) {
        this.logger.error(
          `Destroying "${system.descriptor.name}" failed: ${destroyed.error.message}`,
        );
      }
      system.available = false;
      system.context.revoke();
    }
    this.active = [];
    this.registry.clear();
    this.dispatcher.clear();

    for (const unit of this.units.values()) {
      this.sandbox.unload(unit);
    }
    this.units.clear();
  }
}

/** Policy action for a fault that may not be ignored or retried. */
function escalate(action: FaultAction): FaultAction {
  return action === "ignore" ? "evict-system" : action;
}
