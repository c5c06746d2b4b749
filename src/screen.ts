// Screen: where rendered text goes.

import { Terminal } from "@effect/platform";
import { Config, Console, Context, Effect, Layer } from "effect";

export class Screen extends Context.Tag("Screen")<
  Screen,
  {
    /** Whether change styles are realized as ANSI colour. */
    readonly color: boolean;
    /** Write text followed by a newline. */
    readonly print: (text: string) => Effect.Effect<void>;
    /** Write text as-is, without a trailing newline. */
    readonly write: (text: string) => Effect.Effect<void>;
  }
>() {}

// NO_COLOR convention: any non-empty value turns colour off.
export const colorEnabled: Config.Config<boolean> = Config.string("NO_COLOR").pipe(
  Config.withDefault(""),
  Config.map((noColor) => noColor.length === 0),
);

export const ScreenLive = Layer.effect(
  Screen,
  Effect.gen(function* () {
    const terminal = yield* Terminal.Terminal;
    const color = yield* colorEnabled;

    return Screen.of({
      color,
      print: (text) => Console.log(text),
      write: (text) => terminal.display(text).pipe(Effect.orDie),
    });
  }),
);
