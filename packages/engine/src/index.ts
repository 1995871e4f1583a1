export type { CameraSystemOptions } from "./camera.js";
export { Camera, cameraSystem } from "./camera.js";
export type { TimePayload } from "./events.js";
export { Frame, Tick, timePayloadSchema } from "./events.js";
export type { DrawSurface, Widget } from "./gui.js";
export { GUI_FEATURE, Gui, guiSystem, RecordingSurface } from "./gui.js";
export type { EngineHostAdapters } from "./host.js";
export { createEngineHost, EngineHost } from "./host.js";
export type {
  AnalogActionDescriptor,
  AnalogBinding,
  DigitalActionDescriptor,
  DigitalBinding,
  DigitalResult,
  InputSource,
} from "./input.js";
export {
  analogActionSchema,
  analogBindingSchema,
  DIGITAL_THRESHOLD,
  digitalActionSchema,
  digitalBindingSchema,
  Input,
  inputSystem,
  isDigitalActive,
  ManualInputSource,
} from "./input.js";
export { hostLoggerSystem, Log } from "./logger.js";
export type { Quat, Transform, Vec2, Vec3 } from "./math.js";
export {
  identityTransform,
  interpolateTransform,
  lerpVec3,
  lookDirection,
  normalizeQuat,
  QUAT_IDENTITY,
  quatSchema,
  rotateVec3,
  slerp,
  transformSchema,
  VEC2_ZERO,
  VEC3_ZERO,
  vec2Schema,
  vec3Schema,
} from "./math.js";
export type { EngineAdapters, EnginePluginOptions } from "./plugin.js";
export { ENGINE_MODULE, enginePlugin } from "./plugin.js";
export type { EngineTarget } from "./targets.js";
export { Client, isEngineTarget, Server } from "./targets.js";
export { getCurrentTick, getTickDeadline, getTickStartTime } from "./time.js";
export {
  FrameTiming,
  frameTimerSystem,
  TickTiming,
  tickTimerSystem,
} from "./timing.js";
