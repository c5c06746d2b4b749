// Recording Screen for tests: keeps everything printed or written in memory.

import { Effect, Layer } from "effect";
import { Screen } from "./screen.ts";

export interface RecordingScreen {
  readonly printed: ReadonlyArray<string>;
  readonly written: ReadonlyArray<string>;
  readonly layer: Layer.Layer<Screen>;
}

export function makeRecordingScreen(color = false): RecordingScreen {
  const printed: string[] = [];
  const written: string[] = [];
  const layer = Layer.succeed(
    Screen,
    Screen.of({
      color,
      print: (text) => Effect.sync(() => void printed.push(text)),
      write: (text) => Effect.sync(() => void written.push(text)),
    }),
  );
  return { printed, written, layer };
}
