import { defineCapability, system } from "@modhost/core";
import { z } from "zod";
import { Frame } from "./events.js";
import { VEC2_ZERO, type Vec2, type Vec3 } from "./math.js";

/**
 * Device-side input, supplied by whatever embeds the host (a window, a
 * test, a replay).
 */
export interface InputSource {
  /** Pointer movement since the previous poll, in device units. */
  pointerDelta(): Vec2;
  /**
   * Normalized direction the pointer points in, in world space, or null
   * while it is over something other than the game.
   */
  pointerDirection(): Vec3 | null;
  /** Wheel movement since the previous poll, in device units. */
  scrollDelta(): Vec2;
  /** Current value of a raw input such as `key:w` or `axis:leftX`. */
  raw(input: string): number;
  pointerLocked(): boolean;
  setPointerLocked(locked: boolean): void;
}

/** Raw value above which a digital action counts as held by default. */
export const DIGITAL_THRESHOLD = 0.5;

const rawInputSchema = z.string().min(1);

export const analogBindingSchema = z.union([
  rawInputSchema.transform((input) => ({ input, invert: false })),
  z.object({
    input: rawInputSchema,
    /** Negate the raw value. */
    invert: z.boolean().default(false),
  }),
]);

export const digitalBindingSchema = z.union([
  rawInputSchema.transform((input) => ({
    input,
    threshold: DIGITAL_THRESHOLD,
  })),
  z.object({
    input: rawInputSchema,
    /**
     * Signed: a positive threshold is crossed by values above it, a
     * negative one by values below it.
     */
    threshold: z.number().finite().default(DIGITAL_THRESHOLD),
  }),
]);

export type AnalogBinding = z.output<typeof analogBindingSchema>;
export type DigitalBinding = z.output<typeof digitalBindingSchema>;

const actionFields = {
  name: z.string().min(1),
  /** Defining system; the same name in two systems is two actions. */
  system: z.string().min(1),
  description: z.string().default(""),
};

export const analogActionSchema = z.object({
  ...actionFields,
  /** The first binding is used. */
  defaultBindings: z.array(analogBindingSchema).min(1),
});

export const digitalActionSchema = z.object({
  ...actionFields,
  /** The first binding is used. */
  defaultBindings: z.array(digitalBindingSchema).min(1),
});

export type AnalogActionDescriptor = z.input<typeof analogActionSchema>;
export type DigitalActionDescriptor = z.input<typeof digitalActionSchema>;

/** State of a digital action for the current frame. */
export interface DigitalResult {
  held: boolean;
  /** Held this frame but not last frame. */
  pressed: boolean;
  /** Held last frame but not this frame. */
  released: boolean;
}

/** Reads the user's input devices. Only available on the client. */
export interface Input {
  getRaw(input: string): number;
  pointerDelta(): Vec2;
  pointerDirection(): Vec3 | null;
  pointerLocked(): boolean;
  setPointerLocked(locked: boolean): void;
  scrollDelta(): Vec2;
  /** Id of the action, defining it on first use. */
  defineAnalog(descriptor: AnalogActionDescriptor): number;
  /** Id of the action, defining it on first use. */
  defineDigital(descriptor: DigitalActionDescriptor): number;
  getAnalog(id: number): number;
  getDigital(id: number): DigitalResult;
}

export const Input = defineCapability("engine.input").of<Input>([
  "getRaw",
  "pointerDelta",
  "pointerDirection",
  "pointerLocked",
  "setPointerLocked",
  "scrollDelta",
  "defineAnalog",
  "defineDigital",
  "getAnalog",
  "getDigital",
]);

export function isDigitalActive(value: number, threshold: number): boolean {
  return threshold < 0 ? value < threshold : value > threshold;
}

interface AnalogAction {
  readonly kind: "analog";
  readonly binding: AnalogBinding;
  value: number;
}

interface DigitalAction {
  readonly kind: "digital";
  readonly binding: DigitalBinding;
  held: boolean;
  wasHeld: boolean;
}

type Action = AnalogAction | DigitalAction;

interface InputState {
  pointerDelta: Vec2;
  pointerDirection: Vec3 | null;
  scrollDelta: Vec2;
  readonly actions: Action[];
  readonly ids: Map<string, number>;
}

function actionKey(
  kind: Action["kind"],
  system: string,
  name: string,
): string {
  return JSON.stringify([kind, system, name]);
}

function defineAnalog(state: InputState, descriptor: unknown): number {
  const { system, name, defaultBindings } =
    analogActionSchema.parse(descriptor);
  const key = actionKey("analog", system, name);
  const existing = state.ids.get(key);
  if (existing !== undefined) return existing;

  const id = state.actions.length;
  state.actions.push({
    kind: "analog",
    binding: defaultBindings[0],
    value: 0,
  });
  state.ids.set(key, id);
  return id;
}

function defineDigital(state: InputState, descriptor: unknown): number {
  const { system, name, defaultBindings } =
    digitalActionSchema.parse(descriptor);
  const key = actionKey("digital", system, name);
  const existing = state.ids.get(key);
  if (existing !== undefined) return existing;

  const id = state.actions.length;
  state.actions.push({
    kind: "digital",
    binding: defaultBindings[0],
    held: false,
    wasHeld: false,
  });
  state.ids.set(key, id);
  return id;
}

function findAction(state: InputState, id: unknown): Action | undefined {
  return typeof id === "number" ? state.actions[id] : undefined;
}

function noAction(kind: Action["kind"], id: unknown): RangeError {
  return new RangeError(`No ${kind} action with id ${String(id)}.`);
}

/**
 * Serves `Input` from `source`. Pointer, scroll and action values are
 * sampled once per `Frame`, so every system sees the same values for the
 * whole frame.
 */
export function inputSystem(source: InputSource) {
  return system("input")
    .create(
      (): InputState => ({
        pointerDelta: { ...VEC2_ZERO },
        pointerDirection: null,
        scrollDelta: { ...VEC2_ZERO },
        actions: [],
        ids: new Map(),
      }),
    )
    .provides(Input, (state) => ({
      getRaw: (input: unknown) => source.raw(String(input)),
      pointerDelta: () => state.pointerDelta,
      pointerDirection: () => state.pointerDirection,
      pointerLocked: () => source.pointerLocked(),
      setPointerLocked: (locked: unknown) =>
        source.setPointerLocked(locked === true),
      scrollDelta: () => state.scrollDelta,
      defineAnalog: (descriptor: unknown) => defineAnalog(state, descriptor),
      defineDigital: (descriptor: unknown) => defineDigital(state, descriptor),
      getAnalog: (id: unknown) => {
        const found = findAction(state, id);
        if (found?.kind !== "analog") throw noAction("analog", id);
        return found.value;
      },
      getDigital: (id: unknown): DigitalResult => {
        const found = findAction(state, id);
        if (found?.kind !== "digital") throw noAction("digital", id);
        return {
          held: found.held,
          pressed: found.held && !found.wasHeld,
          released: !found.held && found.wasHeld,
        };
      },
    }))
    .on(Frame, (state) => {
      state.pointerDelta = source.pointerDelta();
      state.pointerDirection = source.pointerDirection();
      state.scrollDelta = source.scrollDelta();
      for (const action of state.actions) {
        const raw = source.raw(action.binding.input);
        if (action.kind === "analog") {
          action.value = action.binding.invert ? -raw : raw;
        } else {
          action.wasHeld = action.held;
          action.held = isDigitalActive(raw, action.binding.threshold);
        }
      }
    })
    .build();
}

/**
 * An `InputSource` driven by hand: set values, and deltas accumulate until
 * the next poll.
 */
export class ManualInputSource implements InputSource {
  private readonly values = new Map<string, number>();
  private pointer: Vec2 = { ...VEC2_ZERO };
  private direction: Vec3 | null = null;
  private scroll: Vec2 = { ...VEC2_ZERO };
  private locked = false;

  set(input: string, value: number): void {
    this.values.set(input, value);
  }

  movePointer(dx: number, dy: number): void {
    this.pointer = { x: this.pointer.x + dx, y: this.pointer.y + dy };
  }

  /** Point at `direction`, or away from the game with null. */
  pointAt(direction: Vec3 | null): void {
    this.direction = direction;
  }

  scrollBy(dx: number, dy: number): void {
    this.scroll = { x: this.scroll.x + dx, y: this.scroll.y + dy };
  }

  pointerDelta(): Vec2 {
    const delta = this.pointer;
    this.pointer = { ...VEC2_ZERO };
    return delta;
  }

  pointerDirection(): Vec3 | null {
    return this.direction;
  }

  scrollDelta(): Vec2 {
    const delta = this.scroll;
    this.scroll = { ...VEC2_ZERO };
    return delta;
  }

  raw(input: string): number {
    return this.values.get(input) ?? 0;
  }

  pointerLocked(): boolean {
    return this.locked;
  }

  setPointerLocked(locked: boolean): void {
    this.locked = locked;
  }
}
