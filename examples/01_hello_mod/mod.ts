import { definePlugin, system } from "@modhost/core";
import {
  Client,
  Frame,
  FrameTiming,
  Gui,
  Log,
  Server,
  Tick,
  TickTiming,
} from "@modhost/engine";

// --- Client: says hello and draws a window every frame ---
const helloClient = system("hello-client")
  .requires(Log, FrameTiming)
  .optional(Gui)
  .create((ctx) => {
    ctx.get(Log).log("info", "Hello client!");
    return { ctx, timing: ctx.get(FrameTiming), name: "" };
  })
  .on(Frame, (self) => {
    const gui = self.ctx.lookup(Gui);
    if (!gui.available) return;

    gui.value.window("Hello from a plugin!");
    gui.value.label("Welcome to here.");
    self.name = gui.value.textInput("name", self.name);
    gui.value.label(`Frame ${self.timing.frameCount()}`);
    if (gui.value.button("greet", "Greet")) {
      self.ctx.get(Log).log("info", `Hello, ${self.name || "stranger"}!`);
    }
  })
  .build();

// --- Server: says hello, then reports every 20 ticks ---
const helloServer = system("hello-server")
  .requires(Log, TickTiming)
  .create((ctx) => {
    const log = ctx.get(Log);
    log.log("info", "Hello server!");
    return { log, timing: ctx.get(TickTiming) };
  })
  .on(Tick, (self) => {
    const count = self.timing.tickCount();
    if (count % 20 === 0) {
      self.log.log("debug", `tick ${count}, next at ${self.timing.nextTickMs()}ms`);
    }
  })
  .build();

export const helloMod = definePlugin("hello", {
  [Client]: [helloClient],
  [Server]: [helloServer],
});
