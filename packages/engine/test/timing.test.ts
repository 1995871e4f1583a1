import {
  createConsoleLogger,
  definePlugin,
  HostLoop,
  system,
} from "@modhost/core";
import { describe, expect, it } from "vitest";
import { Frame, Tick } from "../src/events.js";
import { enginePlugin } from "../src/plugin.js";
import { getCurrentTick, getTickDeadline, getTickStartTime } from "../src/time.js";
import { FrameTiming, TickTiming } from "../src/timing.js";

const silent = createConsoleLogger({ scope: "test", level: "silent" });

describe("tick math", () => {
  it("finds the tick containing a time", () => {
    expect(getCurrentTick(0, 0, 50)).toBe(0);
    expect(getCurrentTick(49, 0, 50)).toBe(0);
    expect(getCurrentTick(50, 0, 50)).toBe(1);
    expect(getCurrentTick(130, 10, 50)).toBe(2);
    expect(getCurrentTick(5, 10, 50)).toBe(-1);
  });

  it("computes tick boundaries", () => {
    expect(getTickDeadline(1, 0, 50)).toBe(100);
    expect(getTickStartTime(2, 10, 50)).toBe(110);
  });

  it("rejects non-positive intervals", () => {
    expect(() => getCurrentTick(0, 0, 0)).toThrow(RangeError);
    expect(() => getTickDeadline(0, 0, -1)).toThrow(RangeError);
  });
});

describe("frame timer", () => {
  it("serves frame timings to a dependent system", () => {
    const samples: number[][] = [];
    const watcher = system("watcher")
      .requires(FrameTiming)
      .create((ctx) => ({ timing: ctx.get(FrameTiming) }))
      .on(Frame, (s) => {
        samples.push([
          s.timing.frameCount(),
          s.timing.frameDurationMs(),
          s.timing.lastFrameMs(),
        ]);
      })
      .build();
    const loop = new HostLoop({
      modules: [
        enginePlugin({ logger: silent }),
        definePlugin("mod", { client: [watcher] }),
      ],
      target: "client",
      logger: silent,
    });
    loop.start();

    loop.dispatch(Frame, { timeMs: 16 });
    loop.dispatch(Frame, { timeMs: 40 });

    expect(loop.order()).toEqual([
      "frame-timer",
      "host-logger",
      "camera",
      "watcher",
    ]);
    expect(samples).toEqual([
      [1, 16, 16],
      [2, 24, 40],
    ]);
  });
});

describe("tick timer", () => {
  it("tracks ticks at its interval", () => {
    const samples: number[][] = [];
    const watcher = system("watcher")
      .requires(TickTiming)
      .create((ctx) => {
        const timing = ctx.get(TickTiming);
        samples.push([timing.intervalMs(), timing.nextTickMs()]);
        return { timing };
      })
      .on(Tick, (s) => {
        samples.push([
          s.timing.tickCount(),
          s.timing.lastTickMs(),
          s.timing.nextTickMs(),
        ]);
      })
      .build();
    const loop = new HostLoop({
      modules: [
        enginePlugin({ logger: silent, tickIntervalMs: 50 }),
        definePlugin("mod", { server: [watcher] }),
      ],
      target: "server",
      logger: silent,
    });
    loop.start();

    loop.dispatch(Tick, { timeMs: 50 });
    // a late tick still reports the boundary of the tick it landed in
    loop.dispatch(Tick, { timeMs: 120 });

    expect(samples).toEqual([
      [50, 50],
      [1, 50, 100],
      [2, 100, 150],
    ]);
  });

  it("rejects a negative tick time", () => {
    const loop = new HostLoop({
      modules: [enginePlugin({ logger: silent })],
      target: "server",
      logger: silent,
    });
    loop.start();

    const report = loop.dispatch(Tick, { timeMs: -1 });
    expect(report.faults.map((f) => [f.system, f.error.name])).toEqual([
      ["tick-timer", "ZodError"],
    ]);
  });
});
