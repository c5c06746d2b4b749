import { EventEmitter } from "node:events";
import { describe, expect, it } from "vitest";
import { Terminal } from "@effect/platform";
import { Effect, Either, Fiber, Layer, Option, TestClock, TestContext } from "effect";
import {
  Command,
  commandFromFlags,
  INTERACTIVE_BANNER,
  parseCommand,
  runCommand,
  runInteractive,
  selectedModes,
} from "./commands.ts";
import type { MarketEntry } from "./domain.ts";
import type { InvalidInput, PriceApi } from "./price-api.ts";
import { makeStubPriceApi } from "./providers/price-api-mock.ts";
import { INTERACTIVE_HELP, renderSearchResults, USAGE } from "./render.ts";
import { makeRecordingScreen } from "./screen-mock.ts";
import type { Screen } from "./screen.ts";
import { signalStop } from "./watch.ts";

// --- Helpers ---

function accepted(result: Either.Either<Command, InvalidInput>): Command {
  if (Either.isLeft(result)) throw new Error(`Expected a command, got: ${result.left.message}`);
  return result.right;
}

const parsed = (line: string) => accepted(parseCommand(line));

function rejected(result: Either.Either<Command, InvalidInput>): string {
  if (Either.isRight(result)) throw new Error(`Expected InvalidInput, got ${result.right._tag}`);
  return result.left.message;
}

function run(
  effect: Effect.Effect<void, never, PriceApi | Screen>,
  api: Layer.Layer<PriceApi> = makeStubPriceApi(),
) {
  const screen = makeRecordingScreen();
  return Effect.runPromise(effect.pipe(Effect.provide(Layer.merge(api, screen.layer))))
    .then(() => screen);
}

/** Feeds the given lines to the shell, then behaves like a closed prompt. */
function scriptedInput(lines: ReadonlyArray<string>) {
  const remaining = [...lines];
  const readLine = Effect.suspend((): Effect.Effect<string, Terminal.QuitException> => {
    const next = remaining.shift();
    return next === undefined
      ? Effect.fail(new Terminal.QuitException())
      : Effect.succeed(next);
  });
  return { readLine, remaining };
}

const titleOf = (text: string) => text.split("\n")[1];

const noFlags = {
  top: Option.none(),
  price: Option.none(),
  search: Option.none(),
  watch: Option.none(),
  interval: Option.none(),
};

// --- parseCommand ---

describe("parseCommand", () => {
  it("recognizes quit, exit and q in any case", () => {
    expect(parsed("quit")._tag).toBe("Quit");
    expect(parsed("  EXIT ")._tag).toBe("Quit");
    expect(parsed("Q")._tag).toBe("Quit");
  });

  it("defaults top to 10 entries", () => {
    expect(parsed("top")).toEqual(Command.Top({ limit: 10 }));
    expect(parsed("top 5")).toEqual(Command.Top({ limit: 5 }));
  });

  it("rejects a top count that is not a positive whole number", () => {
    expect(rejected(parseCommand("top abc"))).toBe("Top count must be a number, got 'abc'");
    expect(rejected(parseCommand("top 0"))).toBe(
      "Top count must be a whole number between 1 and 250, got 0",
    );
    expect(rejected(parseCommand("top -3"))).toBe(
      "Top count must be a whole number between 1 and 250, got -3",
    );
    expect(rejected(parseCommand("top 251"))).toBe(
      "Top count must be a whole number between 1 and 250, got 251",
    );
    expect(rejected(parseCommand("top 5 6"))).toBe("Usage: top [N]");
  });

  it("lowercases asset ids", () => {
    expect(parsed("price Bitcoin")).toEqual(Command.Price({ assetId: "bitcoin" }));
    expect(parsed("PRICE ethereum")).toEqual(Command.Price({ assetId: "ethereum" }));
  });

  it("requires exactly one id for price", () => {
    expect(rejected(parseCommand("price"))).toBe("Usage: price <id>");
    expect(rejected(parseCommand("price bitcoin ethereum"))).toBe("Usage: price <id>");
  });

  it("keeps the whole search query", () => {
    expect(parsed("search  wrapped Bitcoin ")).toEqual(Command.Search({ query: "wrapped Bitcoin" }));
    expect(rejected(parseCommand("search"))).toBe("Usage: search <query>");
  });

  it("parses watch with an optional interval", () => {
    expect(parsed("watch bitcoin")).toEqual(
      Command.Watch({ assetId: "bitcoin", intervalSeconds: 30 }),
    );
    expect(parsed("watch bitcoin 10")).toEqual(
      Command.Watch({ assetId: "bitcoin", intervalSeconds: 10 }),
    );
    expect(rejected(parseCommand("watch bitcoin 0"))).toBe(
      "Interval must be a whole number of seconds (1 or more), got 0",
    );
    expect(rejected(parseCommand("watch"))).toBe("Usage: watch <id> [seconds]");
  });

  it("reports unknown commands", () => {
    expect(rejected(parseCommand("moon"))).toBe(
      "Unknown command 'moon'. Type 'help' for a list of commands or 'quit' to exit.",
    );
  });
});

// --- commandFromFlags ---

describe("commandFromFlags", () => {
  it("falls back to the overview without flags", () => {
    expect(accepted(commandFromFlags(noFlags))).toEqual(Command.Overview());
  });

  it("validates --top the same way as the shell", () => {
    expect(accepted(commandFromFlags({ ...noFlags, top: Option.some("20") })))
      .toEqual(Command.Top({ limit: 20 }));
    expect(rejected(commandFromFlags({ ...noFlags, top: Option.some("-1") }))).toBe(
      "Top count must be a whole number between 1 and 250, got -1",
    );
  });

  it("reports a non-numeric --top as invalid input", () => {
    expect(rejected(commandFromFlags({ ...noFlags, top: Option.some("abc") }))).toBe(
      "Top count must be a number, got 'abc'",
    );
  });

  it("normalizes the --price id", () => {
    expect(accepted(commandFromFlags({ ...noFlags, price: Option.some(" Bitcoin ") })))
      .toEqual(Command.Price({ assetId: "bitcoin" }));
  });

  it("applies --interval to --watch", () => {
    const watching = { ...noFlags, watch: Option.some("bitcoin") };
    expect(accepted(commandFromFlags({ ...watching, interval: Option.some("15") })))
      .toEqual(Command.Watch({ assetId: "bitcoin", intervalSeconds: 15 }));
    expect(accepted(commandFromFlags(watching)))
      .toEqual(Command.Watch({ assetId: "bitcoin", intervalSeconds: 30 }));
    expect(rejected(commandFromFlags({ ...watching, interval: Option.some("-5") })))
      .toBe("Interval must be a whole number of seconds (1 or more), got -5");
  });

  it("reports a non-numeric --interval as invalid input", () => {
    const flags = { ...noFlags, watch: Option.some("bitcoin"), interval: Option.some("abc") };
    expect(rejected(commandFromFlags(flags))).toBe("Interval must be a number, got 'abc'");
  });

  it("rejects more than one mode flag", () => {
    const flags = { ...noFlags, top: Option.some("5"), price: Option.some("bitcoin") };
    expect(rejected(commandFromFlags(flags))).toBe("Use only one of --top, --price");
  });
});

describe("selectedModes", () => {
  it("counts --interactive alongside the other mode flags", () => {
    expect(selectedModes({ ...noFlags, interactive: true })).toEqual(["--interactive"]);
    expect(selectedModes({ ...noFlags, search: Option.some("eth"), interactive: true }))
      .toEqual(["--search", "--interactive"]);
  });
});

// --- runCommand ---

describe("runCommand", () => {
  it("top 3 renders a header and three rows in the service's order", async () => {
    const listing: MarketEntry[] = [
      { id: "tether", symbol: "usdt", name: "Tether", currentPrice: 1, change24h: 0 },
      { id: "bitcoin", symbol: "btc", name: "Bitcoin", currentPrice: 67000, change24h: 2 },
      { id: "ethereum", symbol: "eth", name: "Ethereum", currentPrice: 2500, change24h: -1 },
    ];
    const api = makeStubPriceApi({ fetchTopMarkets: () => Effect.succeed(listing) });

    const screen = await run(runCommand(Command.Top({ limit: 3 }), Effect.never), api);

    expect(screen.printed.length).toBe(1);
    const lines = screen.printed[0].split("\n");
    expect(lines.length).toBe(4);
    expect(lines[0].startsWith("Symbol")).toBe(true);
    expect(lines.slice(1).map((line) => line.slice(0, 8).trim())).toEqual(["USDT", "BTC", "ETH"]);
  });

  it("prints a message instead of an empty table", async () => {
    const api = makeStubPriceApi({ fetchTopMarkets: () => Effect.succeed([]) });
    const screen = await run(runCommand(Command.Top({ limit: 3 }), Effect.never), api);
    expect(screen.printed).toEqual(["No market data returned."]);
  });

  it("prints a not-found message for an unknown asset", async () => {
    const screen = await run(runCommand(Command.Price({ assetId: "notacoin" }), Effect.never));
    expect(screen.printed.length).toBe(1);
    expect(titleOf(screen.printed[0])).toBe("✗ Cryptocurrency not found");
  });

  it("prints the quote of a known asset", async () => {
    const screen = await run(runCommand(Command.Price({ assetId: "bitcoin" }), Effect.never));
    const lines = screen.printed[0].split("\n");
    expect(lines.slice(1, 3)).toEqual(["BITCOIN", "Price: $104,250.12"]);
  });

  it("prints search matches, or a message when there are none", async () => {
    const matches = await run(runCommand(Command.Search({ query: "coin" }), Effect.never));
    expect(matches.printed).toEqual([
      renderSearchResults("coin", [
        { id: "bitcoin", name: "Bitcoin", symbol: "btc" },
        { id: "dogecoin", name: "Dogecoin", symbol: "doge" },
      ]),
    ]);

    const none = await run(runCommand(Command.Search({ query: "zzz" }), Effect.never));
    expect(none.printed).toEqual(["No results found."]);
  });

  it("the overview shows the top table followed by usage", async () => {
    const screen = await run(runCommand(Command.Overview(), Effect.never));
    expect(screen.printed.length).toBe(2);
    // Four sample coins: header plus four rows.
    expect(screen.printed[0].split("\n").length).toBe(5);
    expect(screen.printed[1]).toBe(USAGE);
  });

  it("a watch ends when its stop signal completes", async () => {
    const screen = await run(
      runCommand(Command.Watch({ assetId: "bitcoin", intervalSeconds: 5 }), Effect.void),
    );
    expect(screen.printed).toEqual([
      "Watching BITCOIN - Press Ctrl+C to stop\nUpdate interval: 5 seconds",
      "\n\nStopped watching.",
    ]);
  });
});

// --- runInteractive ---

describe("runInteractive", () => {
  it("dispatches commands, reports bad ones, and stops at quit", async () => {
    const input = scriptedInput(["top 2", "bogus", "", "price notacoin", "quit", "top 1"]);

    const screen = await run(runInteractive(input.readLine, Effect.void));

    expect(screen.printed.length).toBe(4);
    expect(screen.printed[0]).toBe(`${INTERACTIVE_BANNER}\n${INTERACTIVE_HELP}`);
    expect(screen.printed[1].split("\n").length).toBe(3);
    expect(titleOf(screen.printed[2])).toBe("✗ Invalid input");
    expect(titleOf(screen.printed[3])).toBe("✗ Cryptocurrency not found");
    expect(input.remaining).toEqual(["top 1"]);
  });

  it("ends normally when the prompt is closed", async () => {
    const input = scriptedInput(["help"]);
    const screen = await run(runInteractive(input.readLine, Effect.void));
    expect(screen.printed).toEqual([`${INTERACTIVE_BANNER}\n${INTERACTIVE_HELP}`, INTERACTIVE_HELP]);
  });

  it("returns to the prompt after a watch session", async () => {
    const input = scriptedInput(["watch bitcoin 5", "price bitcoin", "q"]);
    const screen = await run(runInteractive(input.readLine, Effect.void));

    expect(screen.printed[2]).toBe("\n\nStopped watching.");
    expect(screen.printed[3].split("\n")[1]).toBe("BITCOIN");
  });

  it("Ctrl+C during a watch hands the next line to the shell", async () => {
    const input = scriptedInput(["watch bitcoin 5", "price bitcoin", "q"]);
    const signals = new EventEmitter();
    const screen = makeRecordingScreen();

    await Effect.runPromise(
      Effect.gen(function* () {
        const fiber = yield* Effect.fork(runInteractive(input.readLine, signalStop(signals)));
        yield* Effect.yieldNow();
        yield* TestClock.adjust("6 seconds");
        signals.emit("SIGINT");
        yield* Fiber.join(fiber);
      }).pipe(
        Effect.provide(Layer.merge(makeStubPriceApi(), screen.layer)),
        Effect.provide(TestContext.TestContext),
      ),
    );

    // Cycles at t = 0s and 5s, then the signal.
    expect(screen.written.length).toBe(2);
    expect(screen.printed.length).toBe(4);
    expect(screen.printed[1]).toBe(
      "Watching BITCOIN - Press Ctrl+C to stop\nUpdate interval: 5 seconds",
    );
    expect(screen.printed[2]).toBe("\n\nStopped watching.");
    expect(screen.printed[3].split("\n")[1]).toBe("BITCOIN");
    expect(input.remaining).toEqual([]);
  });
});
