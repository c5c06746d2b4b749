// Price API: service definition and domain errors.

import { Context, Data, Effect } from "effect";
import type { AssetQuote, MarketEntry, SearchResult } from "./domain.ts";

// --- Errors ---

export type NetworkFailure = "Transport" | "Timeout" | "StatusCode" | "Decode";

/** Anything that kept us from getting a usable response: connection
 *  failures, timeouts, non-2xx statuses and undecodable bodies. */
export class NetworkError extends Data.TaggedError("NetworkError")<{
  readonly reason: NetworkFailure;
  readonly message: string;
  readonly status?: number;
}> {}

/** A well-formed response that does not contain the requested asset. */
export class NotFound extends Data.TaggedError("NotFound")<{
  readonly assetId: string;
}> {}

export class InvalidInput extends Data.TaggedError("InvalidInput")<{
  readonly message: string;
}> {}

export type PriceApiError = NetworkError | NotFound;

// --- Service ---

export class PriceApi extends Context.Tag("PriceApi")<
  PriceApi,
  {
    /** Quote currency every price from this service is expressed in. */
    readonly currency: string;
    readonly fetchQuote: (
      assetId: string,
    ) => Effect.Effect<AssetQuote, NetworkError | NotFound>;
    readonly fetchTopMarkets: (
      limit: number,
    ) => Effect.Effect<ReadonlyArray<MarketEntry>, NetworkError | InvalidInput>;
    readonly search: (
      query: string,
    ) => Effect.Effect<ReadonlyArray<SearchResult>, NetworkError>;
  }
>() {}
