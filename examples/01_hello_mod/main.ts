import { fileURLToPath } from "node:url";
import { loadHostConfig } from "@modhost/core";
import { createEngineHost, RecordingSurface } from "@modhost/engine";
import { helloMod } from "./mod.js";

// Usage: main.ts [config.yaml] [seconds]
const configPath =
  process.argv[2] ?? fileURLToPath(new URL("./host.yaml", import.meta.url));
const seconds = Number(process.argv[3] ?? 2);

const config = await loadHostConfig(configPath);
const surface = new RecordingSurface();
const host = createEngineHost(config, [helloMod], { surface });

host.start();
surface.type("name", "modder");
setTimeout(() => surface.click("greet"), 500);

setTimeout(() => {
  host.stop();
  if (config.target === "client") {
    console.log(`[Example] ${surface.frames} frames; last frame drew:`);
    for (const widget of surface.widgets()) {
      console.log(`  ${JSON.stringify(widget)}`);
    }
  }
}, seconds * 1000);
