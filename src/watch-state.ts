// Watch session: pure state machine.
//
// States:
//   Idle    → nothing started yet
//   Running → polling one asset on a fixed interval
//   Stopped → cancelled; never goes back to Running
//
// Only types and pure transition functions live here. The Effect shell is
// in watch.ts.

import type { WatchSession } from "./domain.ts";

// --- State ---

export type Idle = { readonly _tag: "Idle" };
export type Running = { readonly _tag: "Running"; readonly session: WatchSession };
export type Stopped = { readonly _tag: "Stopped"; readonly session: WatchSession };

export type WatchState = Idle | Running | Stopped;

export const Idle: Idle = { _tag: "Idle" };

export const Running = (assetId: string, intervalSeconds: number): Running => ({
  _tag: "Running",
  session: { assetId, intervalSeconds, isRunning: true },
});

export const Stopped = (session: WatchSession): Stopped => ({
  _tag: "Stopped",
  session: { ...session, isRunning: false },
});

export const initialState: WatchState = Idle;

// --- Transitions ---

/** Whole seconds, at least one. */
export function normalizeInterval(seconds: number): number {
  return Number.isFinite(seconds) ? Math.max(1, Math.floor(seconds)) : 1;
}

export type StartDecision = "start" | "reject";

/** A session starts once, from Idle. */
export function start(
  state: WatchState,
  assetId: string,
  intervalSeconds: number,
): [StartDecision, WatchState] {
  switch (state._tag) {
    case "Idle":
      return ["start", Running(assetId, normalizeInterval(intervalSeconds))];
    case "Running":
    case "Stopped":
      return ["reject", state];
  }
}

export function stop(state: WatchState): WatchState {
  switch (state._tag) {
    case "Running":
      return Stopped(state.session);
    case "Idle":
    case "Stopped":
      return state;
  }
}
