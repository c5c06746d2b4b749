// CoinGecko: implementation of PriceApi.

import { HttpClient } from "@effect/platform";
import { Config, type Context, type Duration, Effect, Layer, Schema } from "effect";
import type { AssetQuote, MarketEntry, SearchResult } from "../domain.ts";
import { validateLimit } from "../input.ts";
import { NetworkError, NotFound, PriceApi } from "../price-api.ts";

// --- Config ---

export interface CoinGeckoConfig {
  readonly baseUrl: string;
  readonly currency: string;
  readonly timeout: Duration.DurationInput;
}

export const defaultCoinGeckoConfig: CoinGeckoConfig = {
  baseUrl: "https://api.coingecko.com/api/v3",
  currency: "usd",
  timeout: "10 seconds",
};

export const MAX_SEARCH_RESULTS = 10;

// --- CoinGecko response schemas ---

// /simple/price keys its per-asset fields by currency ("usd", "usd_24h_change", ...).
const SimplePriceResponse = Schema.Record({
  key: Schema.String,
  value: Schema.Record({
    key: Schema.String,
    value: Schema.NullOr(Schema.Number),
  }),
});

const NullableNumber = Schema.optional(Schema.NullOr(Schema.Number));

const MarketRecord = Schema.Struct({
  id: Schema.String,
  symbol: Schema.String,
  name: Schema.String,
  current_price: NullableNumber,
  price_change_percentage_24h: NullableNumber,
  market_cap: NullableNumber,
  total_volume: NullableNumber,
});

const MarketsResponse = Schema.Array(MarketRecord);

const SearchResponse = Schema.Struct({
  coins: Schema.optional(
    Schema.Array(
      Schema.Struct({
        id: Schema.String,
        name: Schema.String,
        symbol: Schema.String,
      }),
    ),
  ),
});

type SimplePriceResponseType = typeof SimplePriceResponse.Type;
type MarketRecordType = typeof MarketRecord.Type;

const decodeWith = <A, I>(schema: Schema.Schema<A, I>) =>
  (json: unknown): Effect.Effect<A, NetworkError> =>
    Schema.decodeUnknown(schema)(json).pipe(
      Effect.mapError(
        (e) =>
          new NetworkError({
            reason: "Decode",
            message: `Invalid response: ${e.message}`,
          }),
      ),
    );

// --- Decoders ---

export function decodeQuoteResponse(
  json: unknown,
  assetId: string,
  currency: string,
): Effect.Effect<AssetQuote, NetworkError | NotFound> {
  return decodeWith(SimplePriceResponse)(json).pipe(
    Effect.flatMap((response) => interpretQuoteResponse(response, assetId, currency)),
  );
}

function interpretQuoteResponse(
  response: SimplePriceResponseType,
  assetId: string,
  currency: string,
): Effect.Effect<AssetQuote, NotFound> {
  // Unknown ids come back as `{}` with a 200, not as an HTTP error.
  const entry = Object.hasOwn(response, assetId) ? response[assetId] : undefined;
  const price = entry?.[currency];
  if (entry === undefined || typeof price !== "number") {
    return Effect.fail(new NotFound({ assetId }));
  }

  const lastUpdated = entry["last_updated_at"];

  return Effect.succeed({
    id: assetId,
    price,
    change24h: entry[`${currency}_24h_change`] ?? 0,
    lastUpdated: typeof lastUpdated === "number" ? lastUpdated * 1000 : undefined,
    marketCap: entry[`${currency}_market_cap`] ?? undefined,
    volume24h: entry[`${currency}_24h_vol`] ?? undefined,
  });
}

export function decodeMarketsResponse(
  json: unknown,
): Effect.Effect<ReadonlyArray<MarketEntry>, NetworkError> {
  return decodeWith(MarketsResponse)(json).pipe(
    Effect.map((records) => records.map(toMarketEntry)),
  );
}

function toMarketEntry(record: MarketRecordType): MarketEntry {
  return {
    id: record.id,
    symbol: record.symbol,
    name: record.name,
    currentPrice: record.current_price ?? 0,
    change24h: record.price_change_percentage_24h ?? 0,
    marketCap: record.market_cap ?? undefined,
    volume24h: record.total_volume ?? undefined,
  };
}

export function decodeSearchResponse(
  json: unknown,
): Effect.Effect<ReadonlyArray<SearchResult>, NetworkError> {
  return decodeWith(SearchResponse)(json).pipe(
    Effect.map(({ coins = [] }) =>
      coins.slice(0, MAX_SEARCH_RESULTS).map(({ id, name, symbol }) => ({ id, name, symbol })),
    ),
  );
}

// --- Client ---

export function makeCoinGeckoApi(
  config: CoinGeckoConfig,
): Effect.Effect<Context.Tag.Service<typeof PriceApi>, never, HttpClient.HttpClient> {
  return Effect.gen(function* () {
    const client = (yield* HttpClient.HttpClient).pipe(
      HttpClient.filterStatusOk,
    );
    const { baseUrl, currency, timeout } = config;

    // One GET, one JSON body. No retries: a failure surfaces to the caller.
    const getJson = (path: string, params: Record<string, string>) => {
      const url = `${baseUrl}${path}?${new URLSearchParams(params).toString()}`;
      return Effect.logDebug(`[coingecko] GET ${url}`).pipe(
        Effect.zipRight(client.get(url)),
        Effect.flatMap((response) => response.json),
        Effect.scoped,
        Effect.timeoutFail({
          duration: timeout,
          onTimeout: () =>
            new NetworkError({ reason: "Timeout", message: "Request timed out" }),
        }),
        Effect.catchTags({
          RequestError: (e) =>
            Effect.fail(new NetworkError({ reason: "Transport", message: e.message })),
          ResponseError: (e) =>
            e.reason === "StatusCode"
              ? Effect.fail(
                  new NetworkError({
                    reason: "StatusCode",
                    message: `HTTP ${e.response.status}`,
                    status: e.response.status,
                  }),
                )
              : Effect.fail(
                  new NetworkError({
                    reason: "Decode",
                    message: `JSON parse failed: ${e.message}`,
                  }),
                ),
        }),
      );
    };

    return PriceApi.of({
      currency,
      fetchQuote: (assetId: string) =>
        getJson("/simple/price", {
          ids: assetId,
          vs_currencies: currency,
          include_24hr_change: "true",
          include_last_updated_at: "true",
          include_market_cap: "true",
          include_24hr_vol: "true",
        }).pipe(
          Effect.flatMap((json) => decodeQuoteResponse(json, assetId, currency)),
        ),
      fetchTopMarkets: (limit: number) =>
        Effect.gen(function* () {
          const perPage = yield* validateLimit(limit);
          const json = yield* getJson("/coins/markets", {
            vs_currency: currency,
            order: "market_cap_desc",
            per_page: String(perPage),
            page: "1",
            sparkline: "false",
          });
          return yield* decodeMarketsResponse(json);
        }),
      search: (query: string) =>
        getJson("/search", { query }).pipe(Effect.flatMap(decodeSearchResponse)),
    });
  });
}

// --- CoinGecko layer ---

export const CoinGeckoConfigLive: Config.Config<CoinGeckoConfig> = Config.all({
  baseUrl: Config.string("COINGECKO_BASE_URL").pipe(
    Config.withDefault(defaultCoinGeckoConfig.baseUrl),
  ),
  currency: Config.string("CRYPTOTRACK_CURRENCY").pipe(
    Config.map((c) => c.toLowerCase()),
    Config.withDefault(defaultCoinGeckoConfig.currency),
  ),
  timeout: Config.succeed(defaultCoinGeckoConfig.timeout),
});

export const CoinGeckoLive = Layer.effect(
  PriceApi,
  Effect.flatMap(CoinGeckoConfigLive, makeCoinGeckoApi),
);
