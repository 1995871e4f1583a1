import {
  createConsoleLogger,
  type HostConfig,
  HostLoop,
  type PluginModule,
  type SandboxHost,
} from "@modhost/core";
import { Frame, Tick } from "./events.js";
import { type EngineAdapters, ENGINE_MODULE, enginePlugin } from "./plugin.js";
import { Client, type EngineTarget, isEngineTarget } from "./targets.js";

export interface EngineHostAdapters extends EngineAdapters {
  sandbox?: SandboxHost;
  clock?: () => number;
}

/**
 * A host loop wired for the engine: the `engine` module is always loaded,
 * and `start()` drives `Frame` on clients and `Tick` on servers at the
 * configured intervals.
 */
export class EngineHost {
  readonly loop: HostLoop;
  readonly target: EngineTarget;
  private cancel: (() => void) | undefined;

  constructor(
    private readonly config: HostConfig,
    plugins: readonly PluginModule[],
    adapters: EngineHostAdapters = {},
  ) {
    if (!isEngineTarget(config.target)) {
      throw new RangeError(
        `Unknown target "${config.target}"; expected "client" or "server".`,
      );
    }
    if (plugins.some((p) => p.name === ENGINE_MODULE)) {
      throw new RangeError(`Module name "${ENGINE_MODULE}" is reserved.`);
    }
    this.target = config.target;

    const logger =
      adapters.logger ??
      createConsoleLogger({ scope: "HostLoop", level: config.logLevel });
    const engine = enginePlugin({
      ...adapters,
      logger,
      tickIntervalMs: config.tickIntervalMs,
    });

    // An empty module list loads every plugin handed in.
    const requested =
      config.modules.length > 0 ? config.modules : plugins.map((p) => p.name);

    this.loop = new HostLoop({
      modules: [engine, ...plugins],
      manifest: [ENGINE_MODULE, ...requested],
      target: config.target,
      features: config.features,
      faults: config.faults,
      logger,
      sandbox: adapters.sandbox,
      clock: adapters.clock,
    });
  }

  start(): void {
    this.loop.start();
    this.cancel =
      this.target === Client
        ? this.loop.run({
            event: Frame,
            intervalMs: this.config.frameIntervalMs,
            payload: (timeMs) => ({ timeMs }),
          })
        : this.loop.run({
            event: Tick,
            intervalMs: this.config.tickIntervalMs,
            payload: (timeMs) => ({ timeMs }),
          });
  }

  stop(): void {
    this.cancel?.();
    this.cancel = undefined;
    this.loop.stop();
  }
}

export function createEngineHost(
  config: HostConfig,
  plugins: readonly PluginModule[],
  adapters?: EngineHostAdapters,
): EngineHost {
  return new EngineHost(config, plugins, adapters);
}
