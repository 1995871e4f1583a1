import { defineCapability, system } from "@modhost/core";
import { Frame } from "./events.js";

/**
 * Immediate-mode widget sink supplied by whatever embeds the host.
 * Widgets drawn during a frame are presented on the next `present()`.
 */
export interface DrawSurface {
  window(title: string): void;
  label(text: string): void;
  /** Whether the button was clicked before the current frame began. */
  button(id: string, text: string): boolean;
  /** Current contents of the text field, starting from `initial`. */
  textInput(id: string, initial: string): string;
  present(): void;
}

/** Draws widgets on the game's overlay. Client only, feature `gui`. */
export interface Gui {
  /** Widgets that follow go into this window. */
  window(title: string): void;
  label(text: string): void;
  button(id: string, text: string): boolean;
  textInput(id: string, initial: string): string;
}

export const Gui = defineCapability("engine.gui").of<Gui>([
  "window",
  "label",
  "button",
  "textInput",
]);

export const GUI_FEATURE = "gui";

/**
 * Serves `Gui` from `surface`. Presents the previous frame's widgets at the
 * start of every `Frame`, before any plugin draws.
 */
export function guiSystem(surface: DrawSurface) {
  return system("gui")
    .feature(GUI_FEATURE)
    .create(() => surface)
    .provides(Gui, (out) => ({
      window: (title: unknown) => out.window(String(title)),
      label: (text: unknown) => out.label(String(text)),
      button: (id: unknown, text: unknown) =>
        out.button(String(id), String(text)),
      textInput: (id: unknown, initial: unknown) =>
        out.textInput(String(id), String(initial ?? "")),
    }))
    .on(Frame, (out) => out.present())
    .build();
}

export type Widget =
  | { kind: "window"; title: string }
  | { kind: "label"; text: string }
  | { kind: "button"; id: string; text: string }
  | { kind: "textInput"; id: string; value: string };

/**
 * A `DrawSurface` that keeps the widgets of the last presented frame.
 * Clicks and typing are simulated with `click` and `type`.
 */
export class RecordingSurface implements DrawSurface {
  private pending: Widget[] = [];
  private presented: Widget[] = [];
  private queuedClicks = new Set<string>();
  private clicks = new Set<string>();
  private readonly texts = new Map<string, string>();
  frames = 0;

  window(title: string): void {
    this.pending.push({ kind: "window", title });
  }

  label(text: string): void {
    this.pending.push({ kind: "label", text });
  }

  button(id: string, text: string): boolean {
    this.pending.push({ kind: "button", id, text });
    return this.clicks.has(id);
  }

  textInput(id: string, initial: string): string {
    const value = this.texts.get(id) ?? initial;
    this.texts.set(id, value);
    this.pending.push({ kind: "textInput", id, value });
    return value;
  }

  present(): void {
    this.presented = this.pending;
    this.pending = [];
    this.clicks = this.queuedClicks;
    this.queuedClicks = new Set();
    this.frames++;
  }

  /** The button reports clicked while the next frame draws. */
  click(id: string): void {
    this.queuedClicks.add(id);
  }

  type(id: string, value: string): void {
    this.texts.set(id, value);
  }

  /** Widgets of the last presented frame. */
  widgets(): readonly Widget[] {
    return this.presented;
  }
}
