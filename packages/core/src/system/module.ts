import { err, ok, type Result, type Target } from "../types.js";
import type { SystemDescriptor } from "./types.js";

/**
 * A plugin module: the unit of loading and isolation. It lists, per
 * deployment target, the system types it contributes.
 */
export interface PluginModule {
  readonly name: string;
  readonly systems: Readonly<Partial<Record<Target, readonly SystemDescriptor[]>>>;
}

/** A descriptor together with the module it was loaded from. */
export interface ModuleSystem extends SystemDescriptor {
  readonly module: string;
}

/** Feature toggles; a feature missing from the map is enabled. */
export type FeatureToggles = Readonly<Record<string, boolean>>;

/** The manifest names a module that was never provided to the host. */
export class UnknownModuleError extends Error {
  readonly module: string;

  constructor(module: string) {
    super(`Manifest references unknown module "${module}".`);
    this.name = "UnknownModuleError";
    this.module = module;
  }
}

export function definePlugin(
  name: string,
  systems: PluginModule["systems"],
): PluginModule {
  if (name.length === 0) {
    throw new RangeError("Plugin module name must not be empty.");
  }
  return Object.freeze({ name, systems });
}

/**
 * Collect the descriptors the manifest selects for `target`, in manifest
 * order. A module listed twice is only read once.
 */
export function selectSystems(
  modules: readonly PluginModule[],
  manifest: readonly string[],
  target: Target,
): Result<ModuleSystem[], UnknownModuleError> {
  const byName = new Map(
    modules.map((m): [string, PluginModule] => [m.name, m]),
  );
  const selected: ModuleSystem[] = [];

  for (const name of new Set(manifest)) {
    const plugin = byName.get(name);
    if (!plugin) return err(new UnknownModuleError(name));

    for (const descriptor of plugin.systems[target] ?? []) {
      selected.push({ ...descriptor, module: plugin.name });
    }
  }

  return ok(selected);
}

export function isFeatureEnabled(
  feature: string | undefined,
  toggles: FeatureToggles,
): boolean {
  return feature === undefined || toggles[feature] !== false;
}

/** Drop systems whose feature toggle is switched off. */
export function applyFeatures<D extends SystemDescriptor>(
  systems: readonly D[],
  toggles: FeatureToggles,
): D[] {
  return systems.filter((s) => isFeatureEnabled(s.feature, toggles));
}
