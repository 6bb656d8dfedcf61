import { collectFrameInput, isKnownKey } from "./key-bindings";
import type { FrameInput, InputSource, Resize } from "./viewport";

type ScriptFrame = { kind: "keys"; keys: string[] } | { kind: "idle" } | { kind: "resize"; size: Resize } | { kind: "quit" };

const RESIZE_PATTERN = /^resize:(\d+)x(\d+)$/;

/**
 * Parses a key script. Tokens are separated by whitespace and each one is a
 * frame: `w` or `w+i` (keys held and pressed that frame), `.` (nothing
 * pressed), `resize:640x480` or `quit`.
 */
export function parseKeyScript(script: string): ScriptFrame[] {
  return script
    .split(/\s+/)
    .filter((token) => token.length > 0)
    .map((token): ScriptFrame => {
      if (token === ".") {
        return { kind: "idle" };
      }
      if (token === "quit") {
        return { kind: "quit" };
      }
      const resize = RESIZE_PATTERN.exec(token);
      if (resize) {
        const size = { width: Number(resize[1]), height: Number(resize[2]) };
        if (size.width < 1 || size.height < 1) {
          throw new Error(`ScriptedInput: resize needs positive dimensions, got "${token}"`);
        }
        return { kind: "resize", size };
      }

      const keys = token.split("+");
      const unknown = keys.find((key) => !isKnownKey(key));
      if (unknown !== undefined) {
        throw new Error(`ScriptedInput: unknown key "${unknown}" in "${token}"`);
      }
      return { kind: "keys", keys };
    });
}

/**
 * Replays a key script one token per frame. Once the script is exhausted it
 * reports idle frames until the render is complete, then asks to quit.
 */
export class ScriptedInput implements InputSource {
  private readonly frames: ScriptFrame[];
  private readonly isRenderDone: () => boolean;
  private position = 0;

  constructor(script: string, isRenderDone: () => boolean) {
    this.frames = parseKeyScript(script);
    this.isRenderDone = isRenderDone;
  }

  get remaining(): number {
    return this.frames.length - this.position;
  }

  poll(): FrameInput {
    const frame = this.frames[this.position];
    if (frame === undefined) {
      return collectFrameInput([], [], undefined, this.isRenderDone());
    }
    this.position++;

    switch (frame.kind) {
      case "keys":
        return collectFrameInput(frame.keys, frame.keys);
      case "resize":
        return collectFrameInput([], [], frame.size);
      case "quit":
        return collectFrameInput([], [], undefined, true);
      case "idle":
        return collectFrameInput([], []);
    }
  }
}
