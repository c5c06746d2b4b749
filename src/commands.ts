// Command dispatcher: turns flags or an interactive line into a Command and
// runs it against the price service and the screen.

import type { Terminal } from "@effect/platform";
import { Data, Effect, Either, Option } from "effect";
import {
  DEFAULT_TOP_LIMIT,
  DEFAULT_WATCH_INTERVAL,
  parseInterval,
  parseLimit,
} from "./input.ts";
import { InvalidInput, PriceApi, type PriceApiError } from "./price-api.ts";
import {
  INTERACTIVE_HELP,
  renderError,
  renderQuote,
  renderSearchResults,
  renderTable,
  USAGE,
} from "./render.ts";
import { Screen } from "./screen.ts";
import { makeRefreshLoop } from "./watch.ts";

// --- Commands ---

export type Command = Data.TaggedEnum<{
  Top: { readonly limit: number };
  Price: { readonly assetId: string };
  Search: { readonly query: string };
  Watch: { readonly assetId: string; readonly intervalSeconds: number };
  Overview: {};
  Help: {};
  Quit: {};
}>;

export const Command = Data.taggedEnum<Command>();

// --- Parsing: interactive line ---

const usage = (form: string) =>
  Either.left(new InvalidInput({ message: `Usage: ${form}` }));

export function parseCommand(line: string): Either.Either<Command, InvalidInput> {
  const trimmed = line.trim();
  const [keyword = "", ...args] = trimmed.split(/\s+/);

  switch (keyword.toLowerCase()) {
    case "quit":
    case "exit":
    case "q":
      return Either.right(Command.Quit());
    case "help":
    case "?":
      return Either.right(Command.Help());
    case "top":
      if (args.length === 0) return Either.right(Command.Top({ limit: DEFAULT_TOP_LIMIT }));
      if (args.length > 1) return usage("top [N]");
      return Either.map(parseLimit(args[0]), (limit) => Command.Top({ limit }));
    case "price":
      if (args.length !== 1) return usage("price <id>");
      return Either.right(Command.Price({ assetId: args[0].toLowerCase() }));
    case "search": {
      const query = trimmed.slice(keyword.length).trim();
      if (query.length === 0) return usage("search <query>");
      return Either.right(Command.Search({ query }));
    }
    case "watch": {
      if (args.length === 0 || args.length > 2) return usage("watch <id> [seconds]");
      const interval: Either.Either<number, InvalidInput> = args.length === 2
        ? parseInterval(args[1])
        : Either.right(DEFAULT_WATCH_INTERVAL);
      return Either.map(interval, (intervalSeconds) =>
        Command.Watch({ assetId: args[0].toLowerCase(), intervalSeconds }));
    }
    default:
      return Either.left(
        new InvalidInput({
          message: `Unknown command '${keyword}'. Type 'help' for a list of commands or 'quit' to exit.`,
        }),
      );
  }
}

// --- Parsing: CLI flags ---

// Numeric flags arrive as text so that a bad value is an InvalidInput like
// any other, not a parser failure.
export interface CommandFlags {
  readonly top: Option.Option<string>;
  readonly price: Option.Option<string>;
  readonly search: Option.Option<string>;
  readonly watch: Option.Option<string>;
  readonly interval: Option.Option<string>;
}

/** Names of the mode flags that were given. Only one may be. */
export function selectedModes(
  flags: CommandFlags & { readonly interactive: boolean },
): ReadonlyArray<string> {
  return [
    Option.isSome(flags.top) ? "--top" : undefined,
    Option.isSome(flags.price) ? "--price" : undefined,
    Option.isSome(flags.search) ? "--search" : undefined,
    Option.isSome(flags.watch) ? "--watch" : undefined,
    flags.interactive ? "--interactive" : undefined,
  ].filter((name): name is string => name !== undefined);
}

export function commandFromFlags(
  flags: CommandFlags,
): Either.Either<Command, InvalidInput> {
  const modes = selectedModes({ ...flags, interactive: false });
  if (modes.length > 1) {
    return Either.left(
      new InvalidInput({ message: `Use only one of ${modes.join(", ")}` }),
    );
  }

  if (Option.isSome(flags.top)) {
    return Either.map(parseLimit(flags.top.value), (limit) => Command.Top({ limit }));
  }
  if (Option.isSome(flags.price)) {
    return Either.right(Command.Price({ assetId: flags.price.value.trim().toLowerCase() }));
  }
  if (Option.isSome(flags.search)) {
    return Either.right(Command.Search({ query: flags.search.value.trim() }));
  }
  if (Option.isSome(flags.watch)) {
    const assetId = flags.watch.value.trim().toLowerCase();
    const interval: Either.Either<number, InvalidInput> = Option.match(flags.interval, {
      onNone: () => Either.right(DEFAULT_WATCH_INTERVAL),
      onSome: parseInterval,
    });
    return Either.map(interval, (intervalSeconds) => Command.Watch({ assetId, intervalSeconds }));
  }
  return Either.right(Command.Overview());
}

// --- Running ---

export const printError = (error: PriceApiError | InvalidInput) =>
  Effect.flatMap(Screen, (screen) => screen.print(renderError(error, screen.color)));

const showTop = (limit: number) =>
  Effect.gen(function* () {
    const api = yield* PriceApi;
    const screen = yield* Screen;
    const entries = yield* api.fetchTopMarkets(limit);
    const lines = renderTable(entries, { color: screen.color, currency: api.currency });
    yield* screen.print(lines.length === 0 ? "No market data returned." : lines.join("\n"));
  }).pipe(Effect.catchAll(printError));

const showQuote = (assetId: string) =>
  Effect.gen(function* () {
    const api = yield* PriceApi;
    const screen = yield* Screen;
    const quote = yield* api.fetchQuote(assetId);
    yield* screen.print(renderQuote(quote, { color: screen.color, currency: api.currency }));
  }).pipe(Effect.catchAll(printError));

const showSearch = (query: string) =>
  Effect.gen(function* () {
    const api = yield* PriceApi;
    const screen = yield* Screen;
    const results = yield* api.search(query);
    yield* screen.print(
      results.length === 0 ? "No results found." : renderSearchResults(query, results),
    );
  }).pipe(Effect.catchAll(printError));

const watch = (assetId: string, intervalSeconds: number, stopSignal: Effect.Effect<void>) =>
  Effect.flatMap(makeRefreshLoop, (loop) => loop.start(assetId, intervalSeconds, stopSignal)).pipe(
    Effect.catchAll(printError),
  );

const print = (text: string) => Effect.flatMap(Screen, (screen) => screen.print(text));

/** Run one command. Every error is printed here; nothing escapes. */
export function runCommand(
  command: Command,
  stopSignal: Effect.Effect<void>,
): Effect.Effect<void, never, PriceApi | Screen> {
  return Command.$match(command, {
    Top: ({ limit }) => showTop(limit),
    Price: ({ assetId }) => showQuote(assetId),
    Search: ({ query }) => showSearch(query),
    Watch: ({ assetId, intervalSeconds }) => watch(assetId, intervalSeconds, stopSignal),
    Overview: () => showTop(DEFAULT_TOP_LIMIT).pipe(Effect.zipRight(print(USAGE))),
    Help: () => print(INTERACTIVE_HELP),
    Quit: () => Effect.void,
  });
}

// --- Interactive shell ---

export const INTERACTIVE_BANNER = "CryptoTrack - Interactive Mode";

/** Read-eval loop. Ends on `quit` or when the prompt is closed (Ctrl+D). */
export function runInteractive<R>(
  readLine: Effect.Effect<string, Terminal.QuitException, R>,
  stopSignal: Effect.Effect<void>,
): Effect.Effect<void, never, R | PriceApi | Screen> {
  return Effect.gen(function* () {
    yield* print(`${INTERACTIVE_BANNER}\n${INTERACTIVE_HELP}`);

    while (true) {
      const line = yield* Effect.option(readLine);
      if (Option.isNone(line)) return;
      if (line.value.trim().length === 0) continue;

      const parsed = parseCommand(line.value);
      if (Either.isLeft(parsed)) {
        yield* printError(parsed.left);
        continue;
      }
      if (parsed.right._tag === "Quit") return;
      yield* runCommand(parsed.right, stopSignal);
    }
  });
}
