import type { Capability, CapabilityInvoker } from "../capability/capability.js";
import { CapabilityContractError } from "../capability/errors.js";
import type { CapabilityProvider } from "../capability/registry.js";
import { decodeMessage, encodeMessage } from "./codec.js";
import {
  MarshalError,
  RemoteCallError,
  SystemUnavailableError,
} from "./errors.js";

/**
 * Builds the invoker behind a capability stub.
 *
 * One call:
 * 1. `CALL` is encoded on the caller side and decoded for the provider
 * 2. the provider method runs inside the provider's unit
 * 3. the outcome is encoded as `RETURN` or `THROW` and decoded for the caller
 *
 * `assertCaller` runs first on every call so a revoked handle cannot keep
 * using a stub it obtained earlier.
 */
export function createInvoker(
  capability: Capability,
  provider: CapabilityProvider,
  assertCaller: () => void,
): CapabilityInvoker {
  return (method, args) => {
    assertCaller();
    if (!capability.methods.includes(method)) {
      throw new CapabilityContractError(
        provider.system,
        capability.id,
        `"${method}" is not part of the interface`,
      );
    }
    if (!provider.isAvailable()) {
      throw new SystemUnavailableError(provider.system, capability.id);
    }

    const request = decodeMessage(
      encodeMessage({
        type: "CALL",
        capability: capability.id,
        method,
        args: [...args],
      }),
    );
    if (request.type !== "CALL") {
      throw new MarshalError(`Expected CALL, got ${request.type}.`);
    }

    const outcome = provider.unit.enter(() => {
      const fn: unknown = Reflect.get(provider.implementation, request.method);
      if (typeof fn !== "function") {
        throw new CapabilityContractError(
          provider.system,
          capability.id,
          `method "${request.method}" is not implemented`,
        );
      }
      const value: unknown = Reflect.apply(
        fn,
        provider.implementation,
        request.args,
      );
      return encodeMessage({ type: "RETURN", value });
    });

    const reply = decodeMessage(
      outcome.ok
        ? outcome.value
        : encodeMessage({
            type: "THROW",
            error: { name: outcome.error.name, message: outcome.error.message },
          }),
    );

    switch (reply.type) {
      case "RETURN":
        return reply.value;
      case "THROW":
        throw new RemoteCallError(capability.id, method, reply.error);
      default:
        throw new MarshalError(`Expected RETURN or THROW, got ${reply.type}.`);
    }
  };
}
