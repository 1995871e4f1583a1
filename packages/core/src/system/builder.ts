import type { Capability } from "../capability/capability.js";
import type { ContextHandle } from "../capability/context.js";
import type {
  EventKind,
  HandlerDeclaration,
  LiveSystem,
  SystemDescriptor,
} from "./types.js";

interface Declarations {
  readonly name: string;
  readonly feature?: string;
  readonly requires: readonly Capability[];
  readonly optional: readonly Capability[];
}

interface Provision<S> {
  readonly capability: Capability;
  readonly expose: (state: S) => object;
}

interface Handler<S> {
  readonly event: string;
  readonly run: (state: S, payload: unknown) => void;
}

interface Definition<S> extends Declarations {
  readonly create: (ctx: ContextHandle<Capability, Capability>) => S;
  readonly provisions: readonly Provision<S>[];
  readonly handlers: readonly Handler<S>[];
  readonly destroy?: (state: S) => void;
}

/**
 * Start declaring a system type.
 *
 * @example
 * const logger = system("frame-logger")
 *   .requires(FrameTiming)
 *   .create((ctx) => ({ timing: ctx.get(FrameTiming), lines: [] as string[] }))
 *   .on(Frame, (self) => {
 *     self.lines.push(`frame took ${self.timing.frameDurationMs()}ms`);
 *   })
 *   .build();
 */
export function system(name: string): SystemBuilder<never, never> {
  if (name.length === 0) {
    throw new RangeError("System name must not be empty.");
  }
  return new SystemBuilder({ name, requires: [], optional: [] });
}

/**
 * Dependency half of the declaration. `create` closes it and fixes the state
 * type every later binding works with.
 */
export class SystemBuilder<R extends Capability, O extends Capability> {
  constructor(private readonly decl: Declarations) {}

  requires<C extends Capability[]>(
    ...capabilities: C
  ): SystemBuilder<R | C[number], O> {
    return new SystemBuilder<R | C[number], O>({
      ...this.decl,
      requires: [...this.decl.requires, ...capabilities],
    });
  }

  optional<C extends Capability[]>(
    ...capabilities: C
  ): SystemBuilder<R, O | C[number]> {
    return new SystemBuilder<R, O | C[number]>({
      ...this.decl,
      optional: [...this.decl.optional, ...capabilities],
    });
  }

  /** Only select this system when `feature` is enabled. */
  feature(feature: string): SystemBuilder<R, O> {
    return new SystemBuilder<R, O>({ ...this.decl, feature });
  }

  create<S>(factory: (ctx: ContextHandle<R, O>) => S): SystemDefinition<S> {
    return new SystemDefinition<S>({
      ...this.decl,
      create: factory,
      provisions: [],
      handlers: [],
    });
  }
}

export class SystemDefinition<S> {
  constructor(private readonly def: Definition<S>) {}

  /** Serve `capability` with the object `expose` returns for the state. */
  provides<T extends object>(
    capability: Capability<T>,
    expose: (state: S) => T,
  ): SystemDefinition<S> {
    return new SystemDefinition({
      ...this.def,
      provisions: [...this.def.provisions, { capability, expose }],
    });
  }

  /** Handlers run in the order they are declared. */
  on<P>(
    event: EventKind<P>,
    handler: (state: S, payload: P) => void,
  ): SystemDefinition<S> {
    const run = (state: S, payload: unknown): void =>
      handler(state, event.schema.parse(payload));
    return new SystemDefinition({
      ...this.def,
      handlers: [...this.def.handlers, { event: event.id, run }],
    });
  }

  destroy(hook: (state: S) => void): SystemDefinition<S> {
    return new SystemDefinition({ ...this.def, destroy: hook });
  }

  build(): SystemDescriptor {
    const def = this.def;
    const handlers: readonly HandlerDeclaration[] = def.handlers.map((h) => ({
      event: h.event,
    }));

    return Object.freeze({
      name: def.name,
      feature: def.feature,
      requires: def.requires,
      optional: def.optional,
      provides: def.provisions.map((p) => p.capability),
      handlers,
      instantiate(ctx: ContextHandle<Capability, Capability>): LiveSystem {
        const state = def.create(ctx);
        return {
          expose(capabilityId) {
            return def.provisions
              .find((p) => p.capability.id === capabilityId)
              ?.expose(state);
          },
          handle(index, payload) {
            const handler = def.handlers[index];
            if (!handler) {
              throw new RangeError(
                `System "${def.name}" has no handler at index ${index}.`,
              );
            }
            handler.run(state, payload);
          },
          destroy() {
            def.destroy?.(state);
          },
        };
      },
    });
  }
}
