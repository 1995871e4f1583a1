/** A required capability has no provider in the active set. */
export class UnresolvedCapabilityError extends Error {
  readonly capability: string;
  readonly system: string;

  constructor(capability: string, system: string) {
    super(
      `System "${system}" requires capability "${capability}", but nothing in the active set provides it.`,
    );
    this.name = "UnresolvedCapabilityError";
    this.capability = capability;
    this.system = system;
  }
}

/** More than one system provides the same capability. */
export class AmbiguousCapabilityError extends Error {
  readonly capability: string;
  readonly providers: readonly string[];

  constructor(capability: string, providers: readonly string[]) {
    super(
      `Capability "${capability}" is provided by more than one system: ${providers.join(", ")}.`,
    );
    this.name = "AmbiguousCapabilityError";
    this.capability = capability;
    this.providers = providers;
  }
}

/**
 * Required capabilities form a cycle. `path` starts and ends with the same
 * system, e.g. `["a", "b", "a"]`.
 */
export class DependencyCycleError extends Error {
  readonly path: readonly string[];

  constructor(path: readonly string[]) {
    super(`Dependency cycle: ${path.join(" -> ")}.`);
    this.name = "DependencyCycleError";
    this.path = path;
  }
}

/** Two descriptors in the active set share a name. */
export class DuplicateSystemError extends Error {
  readonly system: string;

  constructor(system: string) {
    super(`System "${system}" is declared more than once.`);
    this.name = "DuplicateSystemError";
    this.system = system;
  }
}

export type ResolutionError =
  | UnresolvedCapabilityError
  | AmbiguousCapabilityError
  | DependencyCycleError
  | DuplicateSystemError;
