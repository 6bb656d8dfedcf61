import type { FrameInput, HeldIntent, PressedIntent, Resize } from "./viewport";

type Binding<T> = readonly [intent: T, keys: readonly string[]];

export const HELD_BINDINGS: readonly Binding<HeldIntent>[] = [
  ["panUp", ["w", "up"]],
  ["panLeft", ["a", "left"]],
  ["panDown", ["s", "down"]],
  ["panRight", ["d", "right"]],
  ["zoomIn", ["i"]],
  ["zoomOut", ["o"]],
];

export const PRESSED_BINDINGS: readonly Binding<PressedIntent>[] = [
  ["iterUp", ["e"]],
  ["iterDown", ["q"]],
  ["export", ["r"]],
];

export const isKnownKey = (key: string): boolean =>
  [...HELD_BINDINGS, ...PRESSED_BINDINGS].some(([, keys]) => keys.includes(key.toLowerCase()));

/**
 * Builds one frame of input from key names.
 *
 * @param heldKeys - keys currently down; a held intent is active if any of its keys is
 * @param pressedKeys - key-down events since the last frame, in order
 */
export function collectFrameInput(
  heldKeys: Iterable<string>,
  pressedKeys: readonly string[],
  resize?: Resize,
  quit = false
): FrameInput {
  const down = new Set(Array.from(heldKeys, (key) => key.toLowerCase()));
  const held = new Set<HeldIntent>();
  for (const [intent, keys] of HELD_BINDINGS) {
    if (keys.some((key) => down.has(key))) {
      held.add(intent);
    }
  }

  const pressed: PressedIntent[] = [];
  for (const key of pressedKeys) {
    const binding = PRESSED_BINDINGS.find(([, keys]) => keys.includes(key.toLowerCase()));
    if (binding) {
      pressed.push(binding[0]);
    }
  }

  return resize ? { held, pressed, resize, quit } : { held, pressed, quit };
}
