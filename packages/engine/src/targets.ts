import type { Target } from "@modhost/core";

/** Systems instantiated on the game client. */
export const Client = "client";
/** Systems instantiated on the game server. */
export const Server = "server";

export type EngineTarget = typeof Client | typeof Server;

export function isEngineTarget(target: Target): target is EngineTarget {
  return target === Client || target === Server;
}
