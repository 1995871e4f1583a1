import { describe, expect, it } from "vitest";
import { decodeMessage, encodeMessage } from "../src/sandbox/codec.js";
import {
  MarshalError,
  ModuleAlreadyLoadedError,
  UnitUnloadedError,
} from "../src/sandbox/errors.js";
import { InProcessSandbox } from "../src/sandbox/sandbox.js";

const encoder = new TextEncoder();

describe("boundary codec", () => {
  it("decodes what it encoded", () => {
    const msg = decodeMessage(
      encodeMessage({
        type: "CALL",
        capability: "test.counter",
        method: "add",
        args: [1, "two", { three: [3] }],
      }),
    );
    expect(msg).toEqual({
      type: "CALL",
      capability: "test.counter",
      method: "add",
      args: [1, "two", { three: [3] }],
    });
  });

  it("wraps messages in a versioned envelope", () => {
    const raw: unknown = JSON.parse(
      new TextDecoder().decode(encodeMessage({ type: "RETURN", value: 1 })),
    );
    expect(raw).toMatchObject({ v: "v1", msg: { type: "RETURN", value: 1 } });
  });

  it("follows JSON rules for undefined", () => {
    const msg = decodeMessage(
      encodeMessage({
        type: "EVENT",
        event: "test.event",
        payload: { kept: 1, dropped: undefined, list: [undefined, 2] },
      }),
    );
    expect(msg).toEqual({
      type: "EVENT",
      event: "test.event",
      payload: { kept: 1, list: [null, 2] },
    });
  });

  it("rejects functions, symbols and bigints", () => {
    const call = (arg: unknown) =>
      encodeMessage({ type: "CALL", capability: "c", method: "m", args: [arg] });

    expect(() => call(() => 1)).toThrow('Cannot marshal a function at "0".');
    expect(() => call(Symbol("s"))).toThrow(MarshalError);
    expect(() => call({ big: 10n })).toThrow('Cannot marshal a bigint at "big".');
  });

  it("rejects frames that are not boundary messages", () => {
    expect(() => decodeMessage(encoder.encode("not json"))).toThrow(
      MarshalError,
    );
    expect(() => decodeMessage(encoder.encode('{"v":"v1"}'))).toThrow(
      "Malformed boundary envelope.",
    );
    expect(() =>
      decodeMessage(
        encoder.encode('{"v":"v2","ts":0,"msg":{"type":"RETURN"}}'),
      ),
    ).toThrow("Unsupported boundary protocol version: v2");
  });
});

describe("InProcessSandbox", () => {
  it("captures throws inside a unit", () => {
    const unit = new InProcessSandbox().load("m1");

    expect(unit.enter(() => 3)).toEqual({ ok: true, value: 3 });

    const failed = unit.enter(() => {
      throw new TypeError("boom");
    });
    expect(failed.ok).toBe(false);
    if (!failed.ok) {
      expect(failed.error).toBeInstanceOf(TypeError);
      expect(failed.error.message).toBe("boom");
    }
  });

  it("turns thrown non-errors into errors", () => {
    const unit = new InProcessSandbox().load("m1");
    const failed = unit.enter(() => {
      throw "plain";
    });
    expect(failed).toEqual({ ok: false, error: new Error("plain") });
  });

  it("hosts a module in at most one unit", () => {
    const sandbox = new InProcessSandbox();
    sandbox.load("m1");
    expect(() => sandbox.load("m1")).toThrow(ModuleAlreadyLoadedError);
    expect(sandbox.loadedModules()).toEqual(["m1"]);
  });

  it("stops running code once unloaded", () => {
    const sandbox = new InProcessSandbox();
    const unit = sandbox.load("m1");
    sandbox.unload(unit);

    expect(unit.status).toBe("unloaded");
    expect(sandbox.loadedModules()).toEqual([]);

    let ran = false;
    const result = unit.enter(() => {
      ran = true;
    });
    expect(ran).toBe(false);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error).toBeInstanceOf(UnitUnloadedError);

    // a fresh unit can be loaded for the module again
    expect(sandbox.load("m1").status).toBe("loaded");
  });
});
