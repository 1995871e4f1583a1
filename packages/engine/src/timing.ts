import { defineCapability, system } from "@modhost/core";
import { Frame, Tick } from "./events.js";
import { getCurrentTick, getTickDeadline, getTickStartTime } from "./time.js";

/** Frame timings. Only available on the client. */
export interface FrameTiming {
  /** Frames since the timer started. */
  frameCount(): number;
  /** Time the last frame took. */
  frameDurationMs(): number;
  /** When the previous frame ended, relative to the timer start. */
  lastFrameMs(): number;
}

export const FrameTiming = defineCapability(
  "engine.frame-timing",
).of<FrameTiming>([
  "frameCount",
  "frameDurationMs",
  "lastFrameMs",
]);

/** Tick timings. Only available on the server. */
export interface TickTiming {
  intervalMs(): number;
  /** Start of the tick the timer is in, relative to its start. */
  lastTickMs(): number;
  /** When the timer ticks next, relative to its start. */
  nextTickMs(): number;
  tickCount(): number;
}

export const TickTiming = defineCapability(
  "engine.tick-timing",
).of<TickTiming>([
  "intervalMs",
  "lastTickMs",
  "nextTickMs",
  "tickCount",
]);

export const frameTimerSystem = system("frame-timer")
  .create(() => ({ frameCount: 0, frameDurationMs: 0, lastFrameMs: 0 }))
  .provides(FrameTiming, (state) => ({
    frameCount: () => state.frameCount,
    frameDurationMs: () => state.frameDurationMs,
    lastFrameMs: () => state.lastFrameMs,
  }))
  .on(Frame, (state, { timeMs }) => {
    state.frameCount++;
    state.frameDurationMs = Math.max(0, timeMs - state.lastFrameMs);
    state.lastFrameMs = timeMs;
  })
  .build();

export function tickTimerSystem(intervalMs: number) {
  const firstDeadline = getTickDeadline(0, 0, intervalMs);

  return system("tick-timer")
    .create(() => ({ tickCount: 0, lastTickMs: 0, nextTickMs: firstDeadline }))
    .provides(TickTiming, (state) => ({
      intervalMs: () => intervalMs,
      lastTickMs: () => state.lastTickMs,
      nextTickMs: () => state.nextTickMs,
      tickCount: () => state.tickCount,
    }))
    .on(Tick, (state, { timeMs }) => {
      const tick = getCurrentTick(timeMs, 0, intervalMs);
      state.tickCount++;
      state.lastTickMs = getTickStartTime(tick, 0, intervalMs);
      state.nextTickMs = getTickDeadline(tick, 0, intervalMs);
    })
    .build();
}
