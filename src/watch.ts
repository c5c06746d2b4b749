// Refresh loop: Effect shell.
//
// Wires the pure state machine (watch-state.ts) to Ref, Clock, the price
// service and the screen. Cancellation is an explicit signal raced against
// the polling loop.

import { Clock, Duration, Effect, Ref } from "effect";
import process from "node:process";
import { InvalidInput, PriceApi } from "./price-api.ts";
import {
  renderWatchHeader,
  renderWatchLine,
  WATCH_STOPPED_NOTICE,
} from "./render.ts";
import { Screen } from "./screen.ts";
import { initialState, start, stop, type WatchState } from "./watch-state.ts";

export type { WatchState } from "./watch-state.ts";

// --- Refresh loop ---

export interface RefreshLoop {
  /** Poll `assetId` every `intervalSeconds` until `stopSignal` completes or
   *  the fiber is interrupted. Prints the stop notice exactly once on the
   *  way out. Fails with InvalidInput if this loop was already started. */
  readonly start: (
    assetId: string,
    intervalSeconds: number,
    stopSignal: Effect.Effect<void>,
  ) => Effect.Effect<void, InvalidInput>;

  /** Observe the current state (useful for testing / diagnostics). */
  readonly state: Effect.Effect<WatchState>;
}

export const makeRefreshLoop: Effect.Effect<RefreshLoop, never, PriceApi | Screen> =
  Effect.gen(function* () {
    const api = yield* PriceApi;
    const screen = yield* Screen;
    const ref = yield* Ref.make<WatchState>(initialState);
    const options = { color: screen.color, currency: api.currency };

    const cycle = (assetId: string) =>
      api.fetchQuote(assetId).pipe(
        Effect.flatMap((quote) =>
          Clock.currentTimeMillis.pipe(
            Effect.flatMap((now) =>
              screen.write(renderWatchLine(assetId, new Date(now), quote, options)),
            ),
          ),
        ),
        // A failed cycle renders nothing; the loop carries on regardless.
        Effect.catchAll((e) => Effect.logDebug(`[watch] ${assetId}: skipped (${e._tag})`)),
      );

    const finish = Ref.update(ref, stop).pipe(
      Effect.zipRight(screen.print(WATCH_STOPPED_NOTICE)),
    );

    const startLoop = (
      assetId: string,
      intervalSeconds: number,
      stopSignal: Effect.Effect<void>,
    ): Effect.Effect<void, InvalidInput> =>
      Effect.gen(function* () {
        const [decision, next] = yield* Ref.modify(ref, (s) => {
          const result = start(s, assetId, intervalSeconds);
          return [result, result[1]] as const;
        });

        if (decision === "reject" || next._tag !== "Running") {
          return yield* Effect.fail(
            new InvalidInput({ message: "This watch session has already been started" }),
          );
        }

        const { session } = next;
        yield* screen.print(renderWatchHeader(session.assetId, session.intervalSeconds));

        const loop = cycle(session.assetId).pipe(
          Effect.zipRight(Effect.sleep(Duration.seconds(session.intervalSeconds))),
          Effect.forever,
        );

        yield* Effect.race(loop, stopSignal).pipe(Effect.ensuring(finish));
      });

    return {
      start: startLoop,
      state: Ref.get(ref),
    } satisfies RefreshLoop;
  });

// --- Live stop signal ---

/** Anything that can deliver SIGINT: the process, or an emitter in tests. */
export interface SignalSource {
  readonly once: (event: "SIGINT", listener: () => void) => unknown;
  readonly off: (event: "SIGINT", listener: () => void) => unknown;
}

// Stop signals currently waiting for Ctrl+C.
let waitingStops = 0;

/** True while a running watch will consume the next Ctrl+C. */
export const watchHoldsInterrupt = (): boolean => waitingStops > 0;

/** Completes on the next SIGINT from `source`. The hold on Ctrl+C is
 *  released after the signal has been delivered, not while it is. */
export const signalStop = (source: SignalSource): Effect.Effect<void> =>
  Effect.acquireUseRelease(
    Effect.sync(() => {
      waitingStops++;
    }),
    () =>
      Effect.async<void>((resume) => {
        const onSigint = () => resume(Effect.void);
        source.once("SIGINT", onSigint);
        return Effect.sync(() => {
          source.off("SIGINT", onSigint);
        });
      }),
    () =>
      Effect.sync(() => {
        waitingStops--;
      }),
  );

/** Completes when the operator presses Ctrl+C. */
export const interruptSignal: Effect.Effect<void> = signalStop(process);
