/**
 * A system looked up a capability it never declared as a dependency.
 * This is a programming error in the plugin and is never recovered from.
 */
export class CapabilityScopeViolationError extends Error {
  readonly system: string;
  readonly capability: string;

  constructor(system: string, capability: string) {
    super(
      `System "${system}" accessed capability "${capability}" without declaring it as a dependency.`,
    );
    this.name = "CapabilityScopeViolationError";
    this.system = system;
    this.capability = capability;
  }
}

/** A declared capability has no active provider. */
export class CapabilityUnavailableError extends Error {
  readonly system: string;
  readonly capability: string;

  constructor(system: string, capability: string) {
    super(
      `Capability "${capability}" requested by system "${system}" is unavailable.`,
    );
    this.name = "CapabilityUnavailableError";
    this.system = system;
    this.capability = capability;
  }
}

/** The context handle outlived the system it was issued to. */
export class ContextRevokedError extends Error {
  readonly system: string;

  constructor(system: string) {
    super(`Context handle of system "${system}" has been revoked.`);
    this.name = "ContextRevokedError";
    this.system = system;
  }
}

/** A second provider tried to register an already provided capability. */
export class CapabilityAlreadyRegisteredError extends Error {
  readonly capability: string;
  readonly existing: string;
  readonly provider: string;

  constructor(capability: string, existing: string, provider: string) {
    super(
      `Capability "${capability}" is already provided by "${existing}"; "${provider}" cannot provide it too.`,
    );
    this.name = "CapabilityAlreadyRegisteredError";
    this.capability = capability;
    this.existing = existing;
    this.provider = provider;
  }
}

/** The registry no longer accepts providers once the dispatch phase began. */
export class RegistrySealedError extends Error {
  constructor(capability: string) {
    super(
      `Capability registry is sealed; cannot register "${capability}".`,
    );
    this.name = "RegistrySealedError";
  }
}

/** A provider does not implement the interface it claims to provide. */
export class CapabilityContractError extends Error {
  readonly capability: string;
  readonly system: string;

  constructor(system: string, capability: string, reason: string) {
    super(
      `System "${system}" does not satisfy capability "${capability}": ${reason}.`,
    );
    this.name = "CapabilityContractError";
    this.capability = capability;
    this.system = system;
  }
}
