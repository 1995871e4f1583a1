import { defineCapability, system } from "@modhost/core";
import { identityTransform, type Transform, transformSchema } from "./math.js";

/** The local player's camera. Only available on the client. */
export interface Camera {
  getTransform(): Transform;
  setTransform(transform: Transform): void;
}

export const Camera = defineCapability("engine.camera").of<Camera>([
  "getTransform",
  "setTransform",
]);

export interface CameraSystemOptions {
  initial?: Transform;
  /** Called whenever a plugin moves the camera. */
  onChange?: (transform: Transform) => void;
}

export function cameraSystem(opts: CameraSystemOptions = {}) {
  return system("camera")
    .create(() => ({
      transform: transformSchema.parse(opts.initial ?? identityTransform()),
    }))
    .provides(Camera, (state) => ({
      getTransform: () => state.transform,
      setTransform(transform: unknown) {
        state.transform = transformSchema.parse(transform);
        opts.onChange?.(state.transform);
      },
    }))
    .build();
}
