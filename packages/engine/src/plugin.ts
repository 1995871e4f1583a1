import {
  createConsoleLogger,
  definePlugin,
  type Logger,
  type PluginModule,
  type SystemDescriptor,
} from "@modhost/core";
import { type CameraSystemOptions, cameraSystem } from "./camera.js";
import { type DrawSurface, guiSystem } from "./gui.js";
import { type InputSource, inputSystem } from "./input.js";
import { hostLoggerSystem } from "./logger.js";
import { Client, Server } from "./targets.js";
import { frameTimerSystem, tickTimerSystem } from "./timing.js";

/** Name of the module holding the host-provided systems. */
export const ENGINE_MODULE = "engine";

/** Outside-world hooks the host systems are backed by. */
export interface EngineAdapters {
  logger?: Logger;
  /** Without a source, `Input` is not provided. */
  input?: InputSource;
  /** Without a surface, `Gui` is not provided. */
  surface?: DrawSurface;
  camera?: CameraSystemOptions;
}

export interface EnginePluginOptions extends EngineAdapters {
  tickIntervalMs?: number;
}

/**
 * The `engine` module: host systems serving the engine capabilities.
 *
 * - client: frame-timer, host-logger, camera, input, gui
 * - server: tick-timer, host-logger
 */
export function enginePlugin(opts: EnginePluginOptions = {}): PluginModule {
  const logger = opts.logger ?? createConsoleLogger({ scope: "Engine" });

  const client: SystemDescriptor[] = [
    frameTimerSystem,
    hostLoggerSystem(logger),
    cameraSystem(opts.camera),
  ];
  if (opts.input) client.push(inputSystem(opts.input));
  if (opts.surface) client.push(guiSystem(opts.surface));

  const server: SystemDescriptor[] = [
    tickTimerSystem(opts.tickIntervalMs ?? 50),
    hostLoggerSystem(logger),
  ];

  return definePlugin(ENGINE_MODULE, { [Client]: client, [Server]: server });
}
