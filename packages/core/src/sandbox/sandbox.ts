import { err, ok, type Result, toError } from "../types.js";
import { ModuleAlreadyLoadedError, UnitUnloadedError } from "./errors.js";

export type UnitStatus = "loaded" | "unloaded";

/**
 * An isolated execution unit hosting one plugin module.
 * Nothing thrown inside a unit escapes it: `enter` turns every throw into a
 * failed result the caller has to look at.
 */
export interface SandboxUnit {
  readonly module: string;
  readonly status: UnitStatus;

  /** Run `fn` inside this unit. */
  enter<T>(fn: () => T): Result<T, Error>;
}

/**
 * The facility that instantiates one unit per plugin module.
 * Implementations can run units in-process, in worker threads, in a separate
 * runtime, etc.; the host loop only relies on this interface.
 */
export interface SandboxHost {
  load(module: string): SandboxUnit;
  unload(unit: SandboxUnit): void;
}

class InProcessUnit implements SandboxUnit {
  status: UnitStatus = "loaded";

  constructor(readonly module: string) {}

  enter<T>(fn: () => T): Result<T, Error> {
    if (this.status === "unloaded") {
      return err(new UnitUnloadedError(this.module));
    }
    try {
      return ok(fn());
    } catch (e) {
      return err(toError(e));
    }
  }
}

/**
 * Runs every unit in the current process. Memory isolation then rests on
 * the boundary codec: units only exchange encoded messages.
 */
export class InProcessSandbox implements SandboxHost {
  private readonly units = new Map<string, InProcessUnit>();

  load(module: string): SandboxUnit {
    if (this.units.has(module)) {
      throw new ModuleAlreadyLoadedError(module);
    }
    const unit = new InProcessUnit(module);
    this.units.set(module, unit);
    return unit;
  }

  unload(unit: SandboxUnit): void {
    const loaded = this.units.get(unit.module);
    if (!loaded || loaded !== unit) return;
    loaded.status = "unloaded";
    this.units.delete(unit.module);
  }

  loadedModules(): string[] {
    return [...this.units.keys()];
  }
}
