import { Command, Options, Prompt } from "@effect/cli";
import { FetchHttpClient } from "@effect/platform";
import { NodeContext } from "@effect/platform-node";
import process from "node:process";
import { Config, Effect, Either, Layer } from "effect";
import { InvalidInput } from "./src/price-api.ts";
import { CoinGeckoLive } from "./src/providers/coingecko.ts";
import { PriceApiTestLive } from "./src/providers/price-api-mock.ts";
import {
  commandFromFlags,
  printError,
  runCommand,
  runInteractive,
  selectedModes,
} from "./src/commands.ts";
import { DEFAULT_WATCH_INTERVAL } from "./src/input.ts";
import { runMain } from "./src/runtime.ts";
import { ScreenLive } from "./src/screen.ts";
import { interruptSignal } from "./src/watch.ts";

// --- CLI ---

const top = Options.text("top").pipe(
  Options.withAlias("t"),
  Options.withDescription("Show the top N cryptocurrencies by market cap"),
  Options.optional,
);

const price = Options.text("price").pipe(
  Options.withAlias("p"),
  Options.withDescription("Show the price of one coin by id (e.g. bitcoin)"),
  Options.optional,
);

const search = Options.text("search").pipe(
  Options.withAlias("s"),
  Options.withDescription("Search coins by name or symbol (up to 10 matches)"),
  Options.optional,
);

const watch = Options.text("watch").pipe(
  Options.withAlias("w"),
  Options.withDescription("Watch one coin's price live until Ctrl+C"),
  Options.optional,
);

const interval = Options.text("interval").pipe(
  Options.withAlias("i"),
  Options.withDescription(`Seconds between updates in watch mode (default ${DEFAULT_WATCH_INTERVAL})`),
  Options.optional,
);

const interactive = Options.boolean("interactive").pipe(
  Options.withDescription("Start an interactive shell"),
);

const readLine = Prompt.run(Prompt.text({ message: "crypto>" }));

const command = Command.make(
  "cryptotrack",
  { top, price, search, watch, interval, interactive },
).pipe(
  Command.withHandler((flags) =>
    Effect.gen(function* () {
      if (flags.interactive) {
        const modes = selectedModes(flags);
        if (modes.length > 1) {
          return yield* printError(
            new InvalidInput({ message: `Use only one of ${modes.join(", ")}` }),
          );
        }
        return yield* runInteractive(readLine, interruptSignal);
      }

      const parsed = commandFromFlags(flags);
      if (Either.isLeft(parsed)) return yield* printError(parsed.left);
      yield* runCommand(parsed.right, interruptSignal);
    })
  ),
);

// --- Layers ---
// Set CRYPTOTRACK_PROVIDER to "coingecko" (default) or "test".

const PriceApiLive = Layer.unwrapEffect(
  Effect.gen(function* () {
    const provider = yield* Config.string("CRYPTOTRACK_PROVIDER").pipe(
      Config.withDefault("coingecko"),
    );
    switch (provider) {
      case "test":
        return PriceApiTestLive;
      default:
        return CoinGeckoLive;
    }
  }),
).pipe(Layer.provide(FetchHttpClient.layer));

// --- Run ---

const cli = Command.run(command, {
  name: "cryptotrack",
  version: "0.1.0",
});

cli(process.argv).pipe(
  Effect.provide(Layer.merge(PriceApiLive, ScreenLive)),
  Effect.provide(NodeContext.layer),
  runMain,
);
