/**
 * Names of the members of `T` that are callable. Only these cross the
 * sandbox boundary.
 */
export type MethodName<T> = {
  [K in keyof T]-?: T[K] extends (...args: never[]) => unknown ? K : never;
}[keyof T] &
  string;

/** Forwards one method call of a capability stub to wherever it is served. */
export type CapabilityInvoker = (
  method: string,
  args: readonly unknown[],
) => unknown;

/**
 * A capability identifier: a globally unique token for an interface `T`
 * that one system provides and others declare as dependencies. `Id` keeps
 * the literal id in the type, so two capabilities with the same interface
 * shape are still told apart by a context handle.
 */
export interface Capability<
  T extends object = object,
  Id extends string = string,
> {
  readonly id: Id;
  /** Callable members of `T`, in declaration order. */
  readonly methods: readonly string[];
  /** Builds a stub of `T` whose every method goes through `invoke`. */
  bind(invoke: CapabilityInvoker): T;
}

/** Type of the interface a capability stands for. */
export type CapabilityOf<C> = C extends Capability<infer T> ? T : never;

/**
 * Explicit result of looking up a capability through a context handle.
 */
export type Availability<T> =
  | { available: true; value: T }
  | { available: false };

/** Second half of `defineCapability`, fixing the interface type. */
export interface CapabilityDeclaration<Id extends string> {
  of<T extends object>(methods: readonly MethodName<T>[]): Capability<T, Id>;
}

/**
 * Declares a capability. The id is taken first so its literal type is kept
 * while the interface is given explicitly.
 *
 * @example
 * interface FrameTiming {
 *   frameCount(): number;
 * }
 * const FrameTiming = defineCapability("engine.frame-timing").of<FrameTiming>([
 *   "frameCount",
 * ]);
 */
export function defineCapability<Id extends string>(
  id: Id,
): CapabilityDeclaration<Id> {
  if (id.length === 0) {
    throw new RangeError("Capability id must not be empty.");
  }
  return {
    of<T extends object>(methods: readonly MethodName<T>[]): Capability<T, Id> {
      const names: readonly string[] = Object.freeze([...new Set(methods)]);

      return Object.freeze({
        id,
        methods: names,
        bind(invoke: CapabilityInvoker): T {
          const stub: Record<string, (...args: unknown[]) => unknown> = {};
          for (const method of names) {
            stub[method] = (...args: unknown[]) => invoke(method, args);
          }
          // Values come back decoded from the boundary, like any wire message.
          return Object.freeze(stub) as T;
        },
      });
    },
  };
}
