/** A value cannot cross the sandbox boundary, or a frame is not a valid message. */
export class MarshalError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = "MarshalError";
    this.cause = cause;
  }
}

/** A capability call failed inside the providing system. */
export class RemoteCallError extends Error {
  readonly capability: string;
  readonly method: string;
  readonly remoteName: string;

  constructor(
    capability: string,
    method: string,
    remote: { name: string; message: string },
  ) {
    super(`${capability}.${method} failed: ${remote.name}: ${remote.message}`);
    this.name = "RemoteCallError";
    this.capability = capability;
    this.method = method;
    this.remoteName = remote.name;
  }
}

/** The providing system was evicted or destroyed. */
export class SystemUnavailableError extends Error {
  readonly system: string;
  readonly capability: string;

  constructor(system: string, capability: string) {
    super(
      `System "${system}" providing "${capability}" is no longer available.`,
    );
    this.name = "SystemUnavailableError";
    this.system = system;
    this.capability = capability;
  }
}

/** Code was sent into a unit that has been unloaded. */
export class UnitUnloadedError extends Error {
  constructor(module: string) {
    super(`Sandbox unit of module "${module}" has been unloaded.`);
    this.name = "UnitUnloadedError";
  }
}

/** A module may be hosted by at most one unit at a time. */
export class ModuleAlreadyLoadedError extends Error {
  constructor(module: string) {
    super(`Module "${module}" is already loaded.`);
    this.name = "ModuleAlreadyLoadedError";
  }
}
