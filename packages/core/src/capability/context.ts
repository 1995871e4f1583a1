import { createInvoker } from "../sandbox/boundary.js";
import type { Availability, Capability } from "./capability.js";
import {
  CapabilityScopeViolationError,
  CapabilityUnavailableError,
  ContextRevokedError,
} from "./errors.js";
import type { CapabilityRegistry } from "./registry.js";

/**
 * Per-system accessor to the capabilities the system declared.
 *
 * `R` is the union of required capabilities, `O` of optional ones. Passing
 * any other capability is a type error; at runtime it throws
 * `CapabilityScopeViolationError` even when that capability is registered.
 */
export interface ContextHandle<
  R extends Capability = never,
  O extends Capability = never,
> {
  /** Name of the system this handle was issued to. */
  readonly system: string;

  /** Stub of a required capability. */
  get<T extends object>(capability: Capability<T> & R): T;

  /**
   * Stub of a declared capability, or `{ available: false }` when nothing
   * provides it (optional capabilities) or its provider was evicted.
   */
  lookup<T extends object>(
    capability: Capability<T> & (R | O),
  ): Availability<T>;

  has(capability: R | O): boolean;
}

/**
 * The host's implementation of `ContextHandle`. A non-owning view into the
 * registry, revoked when its system is destroyed.
 */
export class SystemContext implements ContextHandle<Capability, Capability> {
  private readonly required: ReadonlySet<string>;
  private readonly optional: ReadonlySet<string>;
  private revoked = false;
  private violations: string[] = [];

  constructor(
    readonly system: string,
    declared: {
      requires: readonly Capability[];
      optional: readonly Capability[];
    },
    private readonly registry: CapabilityRegistry,
  ) {
    this.required = new Set(declared.requires.map((c) => c.id));
    this.optional = new Set(declared.optional.map((c) => c.id));
  }

  get<T extends object>(capability: Capability<T> & Capability): T {
    const found = this.lookup<T>(capability);
    if (!found.available) {
      throw new CapabilityUnavailableError(this.system, capability.id);
    }
    return found.value;
  }

  lookup<T extends object>(
    capability: Capability<T> & Capability,
  ): Availability<T> {
    this.assertDeclared(capability.id);
    const provider = this.registry.provider(capability.id);
    if (!provider?.isAvailable()) {
      return { available: false };
    }
    const invoke = createInvoker(capability, provider, () =>
      this.assertLive(),
    );
    return { available: true, value: capability.bind(invoke) };
  }

  has(capability: Capability): boolean {
    this.assertDeclared(capability.id);
    return this.registry.provider(capability.id)?.isAvailable() ?? false;
  }

  /** Whether `capabilityId` is in this system's declared set. */
  declares(capabilityId: string): boolean {
    return this.required.has(capabilityId) || this.optional.has(capabilityId);
  }

  /** Ids of undeclared capabilities this handle was asked for. */
  scopeViolations(): readonly string[] {
    return this.violations;
  }

  revoke(): void {
    this.revoked = true;
  }

  isRevoked(): boolean {
    return this.revoked;
  }

  private assertLive(): void {
    if (this.revoked) {
      throw new ContextRevokedError(this.system);
    }
  }

  private assertDeclared(capabilityId: string): void {
    this.assertLive();
    if (!this.declares(capabilityId)) {
      this.violations = [...this.violations, capabilityId];
      throw new CapabilityScopeViolationError(this.system, capabilityId);
    }
  }
}
