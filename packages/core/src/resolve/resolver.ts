import type { Capability } from "../capability/capability.js";
import { err, ok, type Result } from "../types.js";
import {
  AmbiguousCapabilityError,
  DependencyCycleError,
  DuplicateSystemError,
  type ResolutionError,
  UnresolvedCapabilityError,
} from "./errors.js";

/** The parts of a descriptor resolution looks at. */
export interface Resolvable {
  readonly name: string;
  readonly requires: readonly Capability[];
  readonly provides: readonly Capability[];
}

function insertSorted(queue: number[], index: number): void {
  const at = queue.findIndex((i) => i > index);
  if (at === -1) queue.push(index);
  else queue.splice(at, 0, index);
}

/**
 * Walk from a stuck descriptor to one of its stuck providers until a
 * descriptor repeats. Every stuck descriptor has at least one stuck provider,
 * so the walk always closes a loop.
 */
function findCycle(
  descriptors: readonly Resolvable[],
  providerOf: ReadonlyMap<string, number>,
  pending: readonly number[],
): string[] {
  const path: number[] = [];
  let current = pending.findIndex((p) => p > 0);

  while (!path.includes(current)) {
    path.push(current);
    const stuck = descriptors[current].requires
      .map((c) => providerOf.get(c.id))
      .find((p) => p !== undefined && pending[p] > 0);
    if (stuck === undefined) break;
    current = stuck;
  }

  return [...path.slice(path.indexOf(current)), current].map(
    (i) => descriptors[i].name,
  );
}

/**
 * Order descriptors so that every provider comes before the systems that
 * require what it provides.
 *
 * Pure and deterministic: among the descriptors that are ready at any step,
 * the one declared first goes next. Optional capabilities add no edges.
 *
 * Checks, in this order: duplicate names, capabilities with several
 * providers, required capabilities without a provider, cycles.
 */
export function resolveSystems<D extends Resolvable>(
  descriptors: readonly D[],
): Result<D[], ResolutionError> {
  const names = new Set<string>();
  for (const d of descriptors) {
    if (names.has(d.name)) return err(new DuplicateSystemError(d.name));
    names.add(d.name);
  }

  // capability id -> providing descriptors, in declaration order
  const providers = new Map<string, number[]>();
  descriptors.forEach((d, index) => {
    for (const capability of d.provides) {
      const list = providers.get(capability.id) ?? [];
      list.push(index);
      providers.set(capability.id, list);
    }
  });

  const providerOf = new Map<string, number>();
  for (const [capability, indices] of providers) {
    if (indices.length > 1) {
      return err(
        new AmbiguousCapabilityError(
          capability,
          indices.map((i) => descriptors[i].name),
        ),
      );
    }
    providerOf.set(capability, indices[0]);
  }

  // Edges run provider -> dependent; pending counts unmet requirements.
  const dependents: number[][] = descriptors.map(() => []);
  const pending: number[] = descriptors.map(() => 0);
  for (const [index, d] of descriptors.entries()) {
    for (const capability of d.requires) {
      const provider = providerOf.get(capability.id);
      if (provider === undefined) {
        return err(new UnresolvedCapabilityError(capability.id, d.name));
      }
      dependents[provider].push(index);
      pending[index]++;
    }
  }

  const ready: number[] = [];
  pending.forEach((count, index) => {
    if (count === 0) ready.push(index);
  });

  const order: D[] = [];
  for (let next = ready.shift(); next !== undefined; next = ready.shift()) {
    order.push(descriptors[next]);
    for (const dependent of dependents[next]) {
      pending[dependent]--;
      if (pending[dependent] === 0) insertSorted(ready, dependent);
    }
  }

  if (order.length < descriptors.length) {
    return err(
      new DependencyCycleError(findCycle(descriptors, providerOf, pending)),
    );
  }
  return ok(order);
}
