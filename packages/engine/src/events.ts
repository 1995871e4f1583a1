import { defineEvent } from "@modhost/core";
import { z } from "zod";

export const timePayloadSchema = z.object({
  /** Milliseconds since the host started driving the event. */
  timeMs: z.number().nonnegative(),
});

export type TimePayload = z.infer<typeof timePayloadSchema>;

/** Raised whenever a new frame occurs. Client only. */
export const Frame = defineEvent("engine.frame", timePayloadSchema);

/** Raised whenever a new tick occurs. Server only. */
export const Tick = defineEvent("engine.tick", timePayloadSchema);
