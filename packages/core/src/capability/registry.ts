import type { SandboxUnit } from "../sandbox/sandbox.js";
import type { Capability } from "./capability.js";
import {
  CapabilityAlreadyRegisteredError,
  CapabilityContractError,
  RegistrySealedError,
} from "./errors.js";

/**
 * A live system serving a capability, together with the unit it runs in.
 */
export interface CapabilityProvider {
  readonly system: string;
  readonly module: string;
  readonly unit: SandboxUnit;
  /** The object the provider exposed for this capability. */
  readonly implementation: object;
  /** False once the provider was evicted or destroyed. */
  isAvailable(): boolean;
}

/**
 * Maps each capability id to the one system providing it.
 *
 * Entries are written while systems are instantiated and never replaced.
 * `seal()` closes the registry when the dispatch phase begins.
 */
export class CapabilityRegistry {
  private readonly providers = new Map<string, CapabilityProvider>();
  private sealed = false;

  register(capability: Capability, provider: CapabilityProvider): void {
    if (this.sealed) {
      throw new RegistrySealedError(capability.id);
    }
    const existing = this.providers.get(capability.id);
    if (existing) {
      throw new CapabilityAlreadyRegisteredError(
        capability.id,
        existing.system,
        provider.system,
      );
    }
    for (const method of capability.methods) {
      if (typeof Reflect.get(provider.implementation, method) !== "function") {
        throw new CapabilityContractError(
          provider.system,
          capability.id,
          `method "${method}" is not implemented`,
        );
      }
    }
    this.providers.set(capability.id, provider);
  }

  provider(capabilityId: string): CapabilityProvider | undefined {
    return this.providers.get(capabilityId);
  }

  /** Capability ids in registration order. */
  capabilities(): string[] {
    return [...this.providers.keys()];
  }

  seal(): void {
    this.sealed = true;
  }

  isSealed(): boolean {
    return this.sealed;
  }

  /** Drops every entry. Only the host calls this, at the end of a session. */
  clear(): void {
    this.providers.clear();
  }
}
