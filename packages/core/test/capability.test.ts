import { beforeEach, describe, expect, it, vi } from "vitest";
import { defineCapability } from "../src/capability/capability.js";
import { SystemContext } from "../src/capability/context.js";
import {
  CapabilityAlreadyRegisteredError,
  CapabilityContractError,
  CapabilityScopeViolationError,
  CapabilityUnavailableError,
  ContextRevokedError,
  RegistrySealedError,
} from "../src/capability/errors.js";
import {
  type CapabilityProvider,
  CapabilityRegistry,
} from "../src/capability/registry.js";
import { createInvoker } from "../src/sandbox/boundary.js";
import {
  MarshalError,
  RemoteCallError,
  SystemUnavailableError,
} from "../src/sandbox/errors.js";
import { InProcessSandbox } from "../src/sandbox/sandbox.js";

interface Counter {
  add(n: number): number;
  snapshot(): { items: number[] };
  push(list: number[]): number;
  fail(): void;
}

const Counter = defineCapability("test.counter").of<Counter>([
  "add",
  "snapshot",
  "push",
  "fail",
]);

interface Clock {
  now(): number;
}

const Clock = defineCapability("test.clock").of<Clock>(["now"]);

function counterImpl() {
  const state = { total: 0, items: [1, 2] };
  return {
    state,
    implementation: {
      add(n: number) {
        state.total += n;
        return state.total;
      },
      snapshot() {
        return { items: state.items };
      },
      push(list: number[]) {
        list.push(99);
        return list.length;
      },
      fail() {
        throw new TypeError("nope");
      },
    },
  };
}

describe("defineCapability", () => {
  it("keeps method names in order without duplicates", () => {
    const cap = defineCapability("test.dupes").of<Counter>([
      "add",
      "fail",
      "add",
    ]);
    expect(cap.methods).toEqual(["add", "fail"]);
  });

  it("rejects an empty id", () => {
    expect(() => defineCapability("").of<Clock>(["now"])).toThrow(RangeError);
  });

  it("binds a stub forwarding every method to the invoker", () => {
    const invoke = vi.fn((method: string, args: readonly unknown[]) =>
      method === "now" ? args.length : undefined,
    );
    const stub = Clock.bind(invoke);

    expect(stub.now()).toBe(0);
    expect(invoke).toHaveBeenCalledWith("now", []);
    expect(Object.isFrozen(stub)).toBe(true);
  });
});

describe("CapabilityRegistry", () => {
  let registry: CapabilityRegistry;
  let provider: CapabilityProvider;

  beforeEach(() => {
    registry = new CapabilityRegistry();
    provider = {
      system: "counter",
      module: "m1",
      unit: new InProcessSandbox().load("m1"),
      implementation: counterImpl().implementation,
      isAvailable: () => true,
    };
  });

  it("maps a capability to its provider", () => {
    registry.register(Counter, provider);
    expect(registry.provider("test.counter")).toBe(provider);
    expect(registry.provider("test.clock")).toBeUndefined();
    expect(registry.capabilities()).toEqual(["test.counter"]);
  });

  it("never replaces an entry", () => {
    registry.register(Counter, provider);
    const error = (() => {
      try {
        registry.register(Counter, { ...provider, system: "other" });
      } catch (e) {
        return e;
      }
    })();
    expect(error).toBeInstanceOf(CapabilityAlreadyRegisteredError);
    expect(error).toMatchObject({ existing: "counter", provider: "other" });
    expect(registry.provider("test.counter")).toBe(provider);
  });

  it("refuses registration once sealed", () => {
    registry.seal();
    expect(registry.isSealed()).toBe(true);
    expect(() => registry.register(Counter, provider)).toThrow(
      RegistrySealedError,
    );
  });

  it("checks the provider implements every method", () => {
    expect(() =>
      registry.register(Counter, { ...provider, implementation: { add: 1 } }),
    ).toThrow(
      'System "counter" does not satisfy capability "test.counter": method "add" is not implemented.',
    );
  });
});

describe("SystemContext", () => {
  let registry: CapabilityRegistry;
  let sandbox: InProcessSandbox;
  let counter: ReturnType<typeof counterImpl>;
  let available: boolean;

  beforeEach(() => {
    registry = new CapabilityRegistry();
    sandbox = new InProcessSandbox();
    counter = counterImpl();
    available = true;
    registry.register(Counter, {
      system: "counter",
      module: "m1",
      unit: sandbox.load("m1"),
      implementation: counter.implementation,
      isAvailable: () => available,
    });
  });

  function contextFor(
    requires: (typeof Counter | typeof Clock)[],
    optional: (typeof Counter | typeof Clock)[] = [],
  ) {
    return new SystemContext("consumer", { requires, optional }, registry);
  }

  it("calls through to the provider", () => {
    const ctx = contextFor([Counter]);
    const stub = ctx.get(Counter);

    expect(stub.add(2)).toBe(2);
    expect(stub.add(3)).toBe(5);
    expect(counter.state.total).toBe(5);
  });

  it("passes arguments and results by value", () => {
    const stub = contextFor([Counter]).get(Counter);

    const mine = [1];
    expect(stub.push(mine)).toBe(2);
    expect(mine).toEqual([1]);

    const snapshot = stub.snapshot();
    snapshot.items.push(3);
    expect(counter.state.items).toEqual([1, 2]);
  });

  it("rejects capabilities outside the declared set", () => {
    registry = new CapabilityRegistry();
    const ctx = new SystemContext(
      "consumer",
      { requires: [Clock], optional: [] },
      registry,
    );
    registry.register(Counter, {
      system: "counter",
      module: "m1",
      unit: sandbox.load("m2"),
      implementation: counter.implementation,
      isAvailable: () => true,
    });

    expect(() => ctx.get(Counter)).toThrow(CapabilityScopeViolationError);
    expect(() => ctx.lookup(Counter)).toThrow(
      'System "consumer" accessed capability "test.counter" without declaring it as a dependency.',
    );
    expect(() => ctx.has(Counter)).toThrow(CapabilityScopeViolationError);
  });

  it("reports a missing optional capability as unavailable", () => {
    const ctx = contextFor([], [Clock]);

    expect(ctx.lookup(Clock)).toEqual({ available: false });
    expect(ctx.has(Clock)).toBe(false);
    expect(() => ctx.get(Clock)).toThrow(CapabilityUnavailableError);
  });

  it("sees optional capabilities registered later", () => {
    const ctx = contextFor([], [Clock]);
    expect(ctx.has(Clock)).toBe(false);

    registry.register(Clock, {
      system: "clock",
      module: "m3",
      unit: sandbox.load("m3"),
      implementation: { now: () => 42 },
      isAvailable: () => true,
    });

    const found = ctx.lookup(Clock);
    expect(found.available).toBe(true);
    if (found.available) expect(found.value.now()).toBe(42);
  });

  it("returns the provider's error as a RemoteCallError", () => {
    const stub = contextFor([Counter]).get(Counter);

    const error = (() => {
      try {
        stub.fail();
      } catch (e) {
        return e;
      }
    })();
    expect(error).toBeInstanceOf(RemoteCallError);
    expect(error).toMatchObject({
      capability: "test.counter",
      method: "fail",
      remoteName: "TypeError",
      message: "test.counter.fail failed: TypeError: nope",
    });
  });

  it("stops calls into an unavailable provider", () => {
    const ctx = contextFor([Counter]);
    const stub = ctx.get(Counter);
    available = false;

    expect(() => stub.add(1)).toThrow(SystemUnavailableError);
    expect(ctx.lookup(Counter)).toEqual({ available: false });
    expect(() => ctx.get(Counter)).toThrow(CapabilityUnavailableError);
    expect(counter.state.total).toBe(0);
  });

  it("revokes the handle and every stub it handed out", () => {
    const ctx = contextFor([Counter]);
    const stub = ctx.get(Counter);
    ctx.revoke();

    expect(ctx.isRevoked()).toBe(true);
    expect(() => ctx.get(Counter)).toThrow(ContextRevokedError);
    expect(() => stub.add(1)).toThrow(ContextRevokedError);
    expect(counter.state.total).toBe(0);
  });

  it("refuses arguments that cannot be marshaled", () => {
    const invoke = createInvoker(Counter, requireProvider(), () => undefined);

    expect(() => invoke("add", [() => 1])).toThrow(MarshalError);
    expect(() => invoke("add", [1n])).toThrow(MarshalError);
    expect(counter.state.total).toBe(0);
  });

  it("refuses methods outside the interface", () => {
    const invoke = createInvoker(Counter, requireProvider(), () => undefined);
    expect(() => invoke("reset", [])).toThrow(CapabilityContractError);
    expect(() => invoke("reset", [])).toThrow(
      'System "counter" does not satisfy capability "test.counter": "reset" is not part of the interface.',
    );
  });

  it("fails calls into an unloaded unit", () => {
    const provider = requireProvider();
    const stub = contextFor([Counter]).get(Counter);
    sandbox.unload(provider.unit);

    expect(() => stub.add(1)).toThrow(RemoteCallError);
    expect(() => stub.add(1)).toThrow(
      'test.counter.add failed: UnitUnloadedError: Sandbox unit of module "m1" has been unloaded.',
    );
  });

  function requireProvider(): CapabilityProvider {
    const provider = registry.provider("test.counter");
    if (!provider) throw new Error("counter is not registered");
    return provider;
  }
});
